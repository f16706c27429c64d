/**
 * Build matrix vocabulary.
 *
 * Architectures and target platforms are closed sets used as lookup keys
 * into the toolchain and compiler tables. A selection may still carry
 * unknown architecture strings (e.g. "mips" passed on the command line):
 * they become cells that fail with a configuration error instead of being
 * dropped.
 */

/** Supported CPU architectures, in build order. */
export const ARCHITECTURES = ['x86_64', 'x86', 'arm64', 'arm'] as const;

export type Architecture = (typeof ARCHITECTURES)[number];

/** Supported target platforms, in build order. */
export const TARGET_PLATFORMS = ['linux', 'linux-static', 'windows', 'darwin', 'android'] as const;

export type TargetPlatform = (typeof TARGET_PLATFORMS)[number];

/** Go architecture identifiers (GOARCH). */
export const GO_ARCH: Record<Architecture, string> = {
  x86_64: 'amd64',
  x86: '386',
  arm64: 'arm64',
  arm: 'arm',
};

/** Go operating system identifiers (GOOS). */
export const GO_OS: Record<TargetPlatform, string> = {
  linux: 'linux',
  'linux-static': 'linux',
  windows: 'windows',
  darwin: 'darwin',
  android: 'android',
};

export function isArchitecture(value: string): value is Architecture {
  return (ARCHITECTURES as readonly string[]).includes(value);
}

export function isTargetPlatform(value: string): value is TargetPlatform {
  return (TARGET_PLATFORMS as readonly string[]).includes(value);
}

/** Ordered architectures and platforms chosen for one run. */
export interface MatrixSelection {
  /** Requested architectures; may include values outside ARCHITECTURES. */
  architectures: string[];
  platforms: TargetPlatform[];
}

/** One (platform, architecture) pair of the matrix. */
export interface MatrixCell {
  platform: TargetPlatform;
  arch: string;
}

/** Identifier of a cell, e.g. "linux-static/arm64". */
export function cellKey(cell: MatrixCell): string {
  return `${cell.platform}/${cell.arch}`;
}

/** Expand a selection into cells, platform-major, preserving selection order. */
export function expandMatrix(selection: MatrixSelection): MatrixCell[] {
  const cells: MatrixCell[] = [];
  const seen = new Set<string>();
  for (const platform of selection.platforms) {
    for (const arch of selection.architectures) {
      const cell = { platform, arch };
      const key = cellKey(cell);
      if (seen.has(key)) continue;
      seen.add(key);
      cells.push(cell);
    }
  }
  return cells;
}
