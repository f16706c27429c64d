/**
 * Packaging pipeline.
 *
 * Bundles every produced binary with the shared distributable files
 * (LICENSE, README) into one archive per binary: tar.gz for Linux, macOS
 * and Android, zip for Windows. The binary is deleted once its archive is
 * written. Shared files are copied into the output directory once and
 * removed when packaging ends, whatever the outcome.
 *
 * Artifacts whose files are absent are skipped, so the archive set is
 * exactly the set of binaries actually present. An archiver failure is
 * scoped to its artifact; a missing archiver aborts packaging.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ReleaseConfig } from '../config';
import {
  Archive,
  ArchiveFormat,
  Artifact,
  archiveFormatForName,
  archiveNameFor,
} from '../domain/artifact';
import {
  Result,
  ToolNotFoundError,
  TypedError,
  describeError,
  err,
  ok,
  packagingError,
  sharedFileMissingError,
  toolMissingError,
} from '../domain/errors';
import { fileExists } from '../build/go-build';
import { Logger } from '../logger';
import { ToolInvocation, ToolRunner, tailOutput } from '../tools/tool-runner';

export interface PackagingResult {
  archives: Archive[];
  /** Per-artifact failures; the artifact's binary is left in place. */
  errors: TypedError[];
}

type PackagingConfig = Pick<ReleaseConfig, 'appName' | 'projectDir' | 'sharedFiles' | 'tools'>;

export class PackagingPipeline {
  constructor(
    private readonly config: PackagingConfig,
    private readonly runner: ToolRunner,
    private readonly outputDir: string,
    private readonly log: Logger,
  ) {}

  /** Archiver invocation for one artifact, run from the output directory. */
  archiveCommand(format: ArchiveFormat, archive: string, entries: string[]): ToolInvocation {
    return format === 'zip'
      ? { command: this.config.tools.zip, args: ['-q', archive, ...entries], cwd: this.outputDir }
      : { command: this.config.tools.tar, args: ['-czf', archive, ...entries], cwd: this.outputDir };
  }

  async package(artifacts: readonly Artifact[]): Promise<Result<PackagingResult>> {
    const present: { artifact: Artifact; format: ArchiveFormat }[] = [];
    for (const artifact of artifacts) {
      const format = archiveFormatForName(this.config.appName, artifact.name);
      if (format === undefined) {
        this.log.warn('Artifact name matches no platform pattern; leaving it unpackaged', { artifact: artifact.name });
        continue;
      }
      if (!(await fileExists(artifact.path))) {
        this.log.debug('Artifact not present; skipping', { artifact: artifact.name });
        continue;
      }
      present.push({ artifact, format });
    }

    const result: PackagingResult = { archives: [], errors: [] };
    if (present.length === 0) return ok(result);

    const copied: string[] = [];
    try {
      for (const file of this.config.sharedFiles) {
        const name = path.basename(file);
        try {
          await fs.copyFile(path.resolve(this.config.projectDir, file), path.join(this.outputDir, name));
        } catch (error) {
          return err(sharedFileMissingError(file, describeError(error)));
        }
        copied.push(name);
      }

      for (const { artifact, format } of present) {
        const archived = await this.archive(artifact, format, copied);
        if (archived.success) {
          result.archives.push(archived.value);
          continue;
        }
        if (archived.error.fatal) return archived;
        this.log.error(archived.error.message, { platform: artifact.platform, arch: artifact.arch, code: archived.error.code });
        result.errors.push(archived.error);
      }
      return ok(result);
    } finally {
      for (const name of copied) {
        await fs.rm(path.join(this.outputDir, name), { force: true });
      }
    }
  }

  private async archive(artifact: Artifact, format: ArchiveFormat, shared: string[]): Promise<Result<Archive>> {
    const entry = path.relative(this.outputDir, artifact.path);
    const name = archiveNameFor(artifact.name, format);
    const archivePath = path.join(this.outputDir, name);
    const invocation = this.archiveCommand(format, name, [entry, ...shared]);

    // zip appends to an existing archive
    await fs.rm(archivePath, { force: true });

    this.log.info('Archiving', { platform: artifact.platform, arch: artifact.arch, archive: name });
    try {
      const run = await this.runner.run(invocation);
      if (run.exitCode !== 0) {
        await fs.rm(archivePath, { force: true });
        const failure = packagingError(artifact.name, invocation.command, run.exitCode, tailOutput(run));
        return err({ ...failure, platform: artifact.platform, arch: artifact.arch });
      }
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        return err(toolMissingError(error.tool, artifact.platform, artifact.arch));
      }
      throw error;
    }

    await fs.rm(artifact.path, { force: true });
    return ok({ name, path: archivePath, format, artifact: artifact.name });
  }
}
