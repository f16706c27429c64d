/**
 * Checksum manifest model.
 */

export type ChecksumAlgorithm = 'md5' | 'sha256';

export interface ChecksumEntry {
  /** Path relative to the output directory, '/'-separated. */
  file: string;
  hash: string;
}

export interface Manifest {
  path: string;
  algorithm: ChecksumAlgorithm;
  entries: ChecksumEntry[];
}

/** Manifest file name for an algorithm, e.g. "md5.txt". */
export function manifestFileName(algorithm: ChecksumAlgorithm): string {
  return `${algorithm}.txt`;
}

/** Manifest text: one `<hash>  <file>` line per entry. */
export function formatManifest(entries: ChecksumEntry[]): string {
  return entries.map((e) => `${e.hash}  ${e.file}\n`).join('');
}

/** Parse manifest text back into entries; blank lines are ignored. */
export function parseManifest(text: string): ChecksumEntry[] {
  const entries: ChecksumEntry[] = [];
  for (const line of text.split('\n')) {
    if (line.trim() === '') continue;
    const sep = line.indexOf('  ');
    if (sep < 0) continue;
    entries.push({ hash: line.slice(0, sep), file: line.slice(sep + 2) });
  }
  return entries;
}
