/**
 * Typed error model.
 *
 * Components return TypedError values inside Result objects rather than
 * throwing, so the release executor can decide per error whether to skip a
 * cell or abort the run. Errors marked `fatal` cross the run boundary as a
 * thrown ReleaseError.
 */

import { TargetPlatform } from './matrix';

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIGURATION'
  | 'PROVISION'
  | 'BUILD'
  | 'TOOL'
  | 'PACKAGING'
  | 'CHECKSUM'
  | 'RUN';

/** Typed suggested fix an operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "BUILD.FAILED"). */
  code: string;
  message: string;
  /** Cell the error belongs to, when it has one. */
  platform?: TargetPlatform;
  arch?: string;
  /** Whether the same operation may succeed when re-invoked unchanged. */
  retryable: boolean;
  /** Fatal errors abort the whole run; the rest are scoped to a cell or artifact. */
  fatal: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Success/failure variant returned by every phase function. */
export type Result<T, E = TypedError> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function err<E = TypedError>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  platform?: TargetPlatform;
  arch?: string;
  retryable?: boolean;
  fatal?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    platform: params.platform,
    arch: params.arch,
    retryable: params.retryable ?? false,
    fatal: params.fatal ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error thrown when a fatal TypedError aborts the run. */
export class ReleaseError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ReleaseError';
  }
}

/** Thrown by the tool runner when an executable cannot be started. */
export class ToolNotFoundError extends Error {
  constructor(public readonly tool: string) {
    super(`Required tool not found: ${tool}`);
    this.name = 'ToolNotFoundError';
  }
}

function describeCell(platform?: TargetPlatform, arch?: string): string {
  if (platform && arch) return `${platform}/${arch}`;
  return platform ?? arch ?? 'run';
}

// --- CONFIGURATION ---

export function unsupportedTargetError(platform: TargetPlatform, arch: string): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.UNSUPPORTED_TARGET',
    message: `Unsupported architecture "${arch}" for platform ${platform}`,
    platform,
    arch,
    suggestedFixes: [
      { type: 'DESELECT_CELL', params: { platform, arch }, description: `Remove ${arch} from the ${platform} selection` },
    ],
  });
}

export function invalidConfigurationError(errors: string[]): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.INVALID',
    message: `Invalid release configuration: ${errors.join('; ')}`,
    fatal: true,
    details: { errors },
  });
}

export function unknownTargetError(values: string[]): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.UNKNOWN_TARGET',
    message: `Unknown target platform(s): ${values.join(', ')}`,
    fatal: true,
    details: { values },
  });
}

export function selectionCancelledError(): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.SELECTION_CANCELLED',
    message: 'Matrix selection was cancelled before a target was chosen',
    fatal: true,
  });
}

// --- PROVISION ---

export function provisionDownloadError(
  toolchain: string,
  url: string,
  reason: string,
  platform?: TargetPlatform,
  arch?: string,
): TypedError {
  return createTypedError({
    code: 'PROVISION.DOWNLOAD',
    message: `Failed to download ${toolchain} toolchain for ${describeCell(platform, arch)} from ${url}: ${reason}`,
    platform,
    arch,
    retryable: true,
    details: { toolchain, url },
    suggestedFixes: [
      { type: 'RETRY_PROVISION', params: { toolchain }, description: 'Re-run the release; provisioning resumes from scratch' },
    ],
  });
}

export function provisionExtractError(
  toolchain: string,
  installDir: string,
  reason: string,
  platform?: TargetPlatform,
  arch?: string,
): TypedError {
  return createTypedError({
    code: 'PROVISION.EXTRACT',
    message: `Failed to extract ${toolchain} toolchain for ${describeCell(platform, arch)} into ${installDir}: ${reason}`,
    platform,
    arch,
    retryable: true,
    details: { toolchain, installDir },
    suggestedFixes: [
      { type: 'CLEAR_CACHE', params: { installDir }, description: `Delete ${installDir} and re-run` },
    ],
  });
}

export function provisionInstallDirError(
  toolchain: string,
  installDir: string,
  reason: string,
  platform?: TargetPlatform,
  arch?: string,
): TypedError {
  return createTypedError({
    code: 'PROVISION.INSTALL_DIR',
    message: `Cannot create the ${toolchain} install directory ${installDir} for ${describeCell(platform, arch)}: ${reason}`,
    platform,
    arch,
    details: { toolchain, installDir },
    suggestedFixes: [
      { type: 'FIX_CACHE_DIR', params: { installDir }, description: 'Point toolchainDir at a writable directory' },
    ],
  });
}

export function provisionVerifyError(
  toolchain: string,
  compilerPath: string,
  platform?: TargetPlatform,
  arch?: string,
): TypedError {
  return createTypedError({
    code: 'PROVISION.VERIFY',
    message: `Toolchain ${toolchain} for ${describeCell(platform, arch)} installed but compiler is missing or not executable: ${compilerPath}`,
    platform,
    arch,
    details: { toolchain, compilerPath },
    suggestedFixes: [
      { type: 'CLEAR_CACHE', params: { compilerPath } },
    ],
  });
}

// --- BUILD / TOOL ---

export function buildFailedError(
  platform: TargetPlatform,
  arch: string,
  tool: string,
  exitCode: number,
  diagnostics: string,
): TypedError {
  return createTypedError({
    code: 'BUILD.FAILED',
    message: `Build for ${platform}/${arch} failed: ${tool} exited with code ${exitCode}`,
    platform,
    arch,
    details: { tool, exitCode, diagnostics },
  });
}

export function buildOutputMissingError(platform: TargetPlatform, arch: string, expected: string): TypedError {
  return createTypedError({
    code: 'BUILD.OUTPUT_MISSING',
    message: `Build for ${platform}/${arch} reported success but produced no ${expected}`,
    platform,
    arch,
    details: { expected },
  });
}

export function toolMissingError(tool: string, platform?: TargetPlatform, arch?: string): TypedError {
  return createTypedError({
    code: 'TOOL.MISSING',
    message: `Required tool "${tool}" is not available (needed for ${describeCell(platform, arch)})`,
    platform,
    arch,
    fatal: true,
    details: { tool },
    suggestedFixes: [
      { type: 'INSTALL_TOOL', params: { tool }, description: `Install ${tool} and make sure it is on PATH` },
    ],
  });
}

export function versionUnresolvedError(reason: string): TypedError {
  return createTypedError({
    code: 'BUILD.VERSION_UNRESOLVED',
    message: `Cannot determine the release version from the latest git tag: ${reason}`,
    fatal: true,
    suggestedFixes: [
      { type: 'SET_VERSION', params: {}, description: 'Tag the repository or set CROSSFORGE_VERSION' },
    ],
  });
}

// --- PACKAGING ---

export function packagingError(artifact: string, tool: string, exitCode: number, diagnostics: string): TypedError {
  return createTypedError({
    code: 'PACKAGING.ARCHIVE',
    message: `Failed to archive ${artifact}: ${tool} exited with code ${exitCode}`,
    details: { artifact, tool, exitCode, diagnostics },
  });
}

export function sharedFileMissingError(file: string, reason: string): TypedError {
  return createTypedError({
    code: 'PACKAGING.SHARED_FILE',
    message: `Cannot copy shared distributable ${file} into the output directory: ${reason}`,
    fatal: true,
    details: { file },
    suggestedFixes: [
      { type: 'ADD_FILE', params: { file }, description: `Create ${file} or remove it from sharedFiles` },
    ],
  });
}

export function packError(platform: TargetPlatform, arch: string, artifact: string, exitCode: number, diagnostics: string): TypedError {
  return createTypedError({
    code: 'PACKAGING.PACK',
    message: `Failed to pack ${artifact} for ${platform}/${arch}: packer exited with code ${exitCode}`,
    platform,
    arch,
    details: { artifact, exitCode, diagnostics },
  });
}

// --- CHECKSUM ---

export function checksumReadError(file: string, reason: string): TypedError {
  return createTypedError({
    code: 'CHECKSUM.READ',
    message: `Cannot read ${file} for hashing: ${reason}`,
    fatal: true,
    details: { file },
  });
}

/** Whether a cell error is a configuration problem (always skip-and-continue). */
export function isConfigurationError(error: TypedError): boolean {
  return error.code.startsWith('CONFIGURATION.');
}

/** Render an unknown thrown value as a message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
