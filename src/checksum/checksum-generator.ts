/**
 * Checksum generator.
 *
 * Walks the output directory recursively, hashes every regular file and
 * writes one manifest line per file. Entries are ordered by a name-sorted
 * depth-first walk; the manifest itself is never listed.
 */

import { createHash } from 'crypto';
import { createReadStream, promises as fs } from 'fs';
import path from 'path';
import { ChecksumAlgorithm, ChecksumEntry, Manifest, formatManifest, manifestFileName } from '../domain/checksum';
import { Result, checksumReadError, describeError, err, ok } from '../domain/errors';
import { Logger } from '../logger';

/** Hash a file's contents without loading it whole. */
export async function hashFile(file: string, algorithm: ChecksumAlgorithm): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(file)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/** Regular files under `dir`, relative and '/'-separated, in walk order. */
export async function listFiles(dir: string, prefix = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(dir, prefix), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const relative = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(dir, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files;
}

export class ChecksumGenerator {
  constructor(
    private readonly algorithm: ChecksumAlgorithm,
    private readonly log: Logger,
  ) {}

  /** Hash every file under `dir` and write the manifest into it. */
  async generate(dir: string): Promise<Result<Manifest>> {
    const manifestName = manifestFileName(this.algorithm);
    const manifestPath = path.join(dir, manifestName);

    let files: string[];
    try {
      files = (await listFiles(dir)).filter((f) => f !== manifestName);
    } catch (error) {
      return err(checksumReadError(dir, describeError(error)));
    }

    const entries: ChecksumEntry[] = [];
    for (const file of files) {
      try {
        entries.push({ file, hash: await hashFile(path.join(dir, file), this.algorithm) });
      } catch (error) {
        return err(checksumReadError(file, describeError(error)));
      }
    }

    await fs.writeFile(manifestPath, formatManifest(entries));
    this.log.info('Checksum manifest written', { manifest: manifestName, files: entries.length });
    return ok({ path: manifestPath, algorithm: this.algorithm, entries });
  }
}
