/**
 * Build job, artifact and archive domain model.
 *
 * Names are derived deterministically from the application name, platform,
 * architecture and strategy suffix:
 *
 *   linux         {app}-linux-{arch}
 *   linux-static  {app}-linux-musl-{arch}
 *   darwin        {app}-darwin-{arch}
 *   android       {app}-android-{arch}
 *   windows       {app}-windows-{arch}[-upx].exe
 */

import { TargetPlatform } from './matrix';

/** Link-time constants embedded into every binary of a run. */
export interface LinkMetadata {
  version: string;
  buildTime: string;
  author: string;
}

/** Environment handed to the external build. */
export interface BuildEnvironment {
  GOOS: string;
  GOARCH: string;
  CGO_ENABLED: '0' | '1';
  /** C cross-compiler; absent when the build service brings its own. */
  CC?: string;
}

/** A single (platform, architecture) cell ready to build. */
export interface BuildJob {
  platform: TargetPlatform;
  arch: string;
  outputName: string;
  env: BuildEnvironment;
  ldflags: string;
}

/** A binary produced by one build job. */
export interface Artifact {
  name: string;
  path: string;
  platform: TargetPlatform;
  arch: string;
  /** True for executable-packer output. */
  packed: boolean;
}

export type ArchiveFormat = 'tar.gz' | 'zip';

/** A compressed bundle of one artifact plus the shared distributable files. */
export interface Archive {
  name: string;
  path: string;
  format: ArchiveFormat;
  artifact: string;
}

const PACKED_SUFFIX = '-upx';

/** Output file name of a binary before compression. */
export function artifactName(
  app: string,
  platform: TargetPlatform,
  arch: string,
  options: { packed?: boolean } = {},
): string {
  switch (platform) {
    case 'linux-static':
      return `${app}-linux-musl-${arch}`;
    case 'windows':
      return `${app}-windows-${arch}${options.packed ? PACKED_SUFFIX : ''}.exe`;
    default:
      return `${app}-${platform}-${arch}`;
  }
}

/** Archive format used for a platform. */
export function archiveFormatFor(platform: TargetPlatform): ArchiveFormat {
  return platform === 'windows' ? 'zip' : 'tar.gz';
}

/** Archive file name for an artifact name: the extension is dropped. */
export function archiveNameFor(artifact: string, format: ArchiveFormat): string {
  const base = artifact.endsWith('.exe') ? artifact.slice(0, -'.exe'.length) : artifact;
  return `${base}.${format}`;
}

/**
 * Archive format implied by an artifact's name, or undefined when the name
 * matches none of the platform patterns.
 */
export function archiveFormatForName(app: string, name: string): ArchiveFormat | undefined {
  if (name.startsWith(`${app}-windows-`)) return 'zip';
  if (
    name.startsWith(`${app}-linux-`) ||
    name.startsWith(`${app}-darwin-`) ||
    name.startsWith(`${app}-android-`)
  ) {
    return 'tar.gz';
  }
  return undefined;
}
