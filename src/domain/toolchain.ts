/**
 * Toolchain domain model.
 *
 * A toolchain is a cross-compiler bundle cached under the user-scoped
 * toolchain root and reused across runs.
 */

import { Architecture } from './matrix';

/** Toolchain families that are downloaded on demand. */
export type ToolchainFamily = 'musl' | 'android-ndk';

export type ToolchainArchiveFormat = 'tar.gz' | 'zip';

export interface ToolchainSpec {
  family: ToolchainFamily;
  /** Architecture for per-architecture families; absent for shared bundles. */
  arch?: Architecture;
  /** Directory the bundle is extracted into. */
  installDir: string;
  sourceUrl: string;
  /** Compiler whose presence marks the toolchain as installed. */
  compilerPath: string;
  archiveFormat: ToolchainArchiveFormat;
  /** Leading path components dropped on extraction (tar only). */
  stripComponents: number;
}

/** Human-readable toolchain label, e.g. "musl/arm64". */
export function toolchainLabel(spec: Pick<ToolchainSpec, 'family' | 'arch'>): string {
  return spec.arch ? `${spec.family}/${spec.arch}` : spec.family;
}
