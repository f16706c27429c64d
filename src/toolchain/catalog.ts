/**
 * Compiler and toolchain tables.
 *
 * Maps each (platform, architecture) pair to the cross compiler that builds
 * it: musl.cc bundles for static Linux, distribution gcc packages for
 * dynamic Linux, NDK clang drivers for Android and the cross-build service's
 * targets for Windows and macOS. Lookups never touch the network or disk.
 */

import path from 'path';
import { ReleaseConfig } from '../config';
import { Architecture, isArchitecture } from '../domain/matrix';
import { Result, err, ok, unsupportedTargetError } from '../domain/errors';
import { ToolchainFamily, ToolchainSpec } from '../domain/toolchain';

export type CatalogConfig = Pick<
  ReleaseConfig,
  'toolchainDir' | 'muslBaseUrl' | 'ndkBaseUrl' | 'ndkVersion' | 'androidApiLevel'
>;

interface MuslTarget {
  /** Directory name under <toolchainDir>/musl. */
  dir: string;
  triple: string;
}

const MUSL_TARGETS: Record<Architecture, MuslTarget> = {
  x86_64: { dir: 'x86_64', triple: 'x86_64-linux-musl' },
  arm64: { dir: 'aarch64', triple: 'aarch64-linux-musl' },
  x86: { dir: 'i686', triple: 'i686-linux-musl' },
  arm: { dir: 'arm', triple: 'arm-linux-musleabihf' },
};

/** Statically-linking musl cross toolchain for an architecture. */
export function muslToolchainSpec(config: CatalogConfig, arch: string): Result<ToolchainSpec> {
  if (!isArchitecture(arch)) {
    return err(unsupportedTargetError('linux-static', arch));
  }
  const target = MUSL_TARGETS[arch];
  const installDir = path.join(config.toolchainDir, 'musl', target.dir);
  return ok({
    family: 'musl',
    arch,
    installDir,
    sourceUrl: `${config.muslBaseUrl}${target.triple}-cross.tgz`,
    compilerPath: path.join(installDir, 'bin', `${target.triple}-gcc`),
    archiveFormat: 'tar.gz',
    stripComponents: 1,
  });
}

/** Directory holding the NDK's LLVM drivers. */
export function ndkBinDir(config: CatalogConfig): string {
  return path.join(
    config.toolchainDir,
    'android-ndk',
    `android-ndk-${config.ndkVersion}`,
    'toolchains',
    'llvm',
    'prebuilt',
    'linux-x86_64',
    'bin',
  );
}

/** The Android NDK bundle, shared by every Android architecture. */
export function ndkToolchainSpec(config: CatalogConfig): ToolchainSpec {
  return {
    family: 'android-ndk',
    installDir: path.join(config.toolchainDir, 'android-ndk'),
    sourceUrl: `${config.ndkBaseUrl}android-ndk-${config.ndkVersion}-linux.zip`,
    compilerPath: path.join(ndkBinDir(config), 'clang'),
    archiveFormat: 'zip',
    stripComponents: 0,
  };
}

const ANDROID_TARGETS: Record<Architecture, string> = {
  x86_64: 'x86_64-linux-android',
  arm64: 'aarch64-linux-android',
  arm: 'armv7a-linux-androideabi',
  x86: 'i686-linux-android',
};

export interface AndroidCompiler {
  cc: string;
  strip: string;
}

/** NDK clang driver and strip tool for an architecture. */
export function androidCompiler(config: CatalogConfig, arch: string): Result<AndroidCompiler> {
  if (!isArchitecture(arch)) {
    return err(unsupportedTargetError('android', arch));
  }
  const bin = ndkBinDir(config);
  return ok({
    cc: path.join(bin, `${ANDROID_TARGETS[arch]}${config.androidApiLevel}-clang`),
    strip: path.join(bin, 'llvm-strip'),
  });
}

export interface GnuCompiler {
  cc: string;
  /** Distribution package providing the compiler. */
  aptPackage: string;
}

const GNU_COMPILERS: Record<Architecture, GnuCompiler> = {
  x86_64: { cc: 'gcc', aptPackage: 'gcc' },
  arm64: { cc: 'aarch64-linux-gnu-gcc', aptPackage: 'gcc-aarch64-linux-gnu' },
  x86: { cc: 'i686-linux-gnu-gcc', aptPackage: 'gcc-i686-linux-gnu' },
  arm: { cc: 'arm-linux-gnueabihf-gcc', aptPackage: 'gcc-arm-linux-gnueabihf' },
};

/** System-installed glibc cross compiler for an architecture. */
export function gnuCompiler(arch: string): Result<GnuCompiler> {
  if (!isArchitecture(arch)) {
    return err(unsupportedTargetError('linux', arch));
  }
  return ok(GNU_COMPILERS[arch]);
}

/** Architectures the cross-build service can produce per platform. */
export const CROSS_SERVICE_ARCHITECTURES: Record<'windows' | 'darwin', readonly Architecture[]> = {
  windows: ['x86_64', 'x86'],
  darwin: ['x86_64', 'arm64'],
};

/** Whether the cross-build service supports a platform/architecture pair. */
export function crossServiceSupports(platform: 'windows' | 'darwin', arch: string): arch is Architecture {
  return isArchitecture(arch) && CROSS_SERVICE_ARCHITECTURES[platform].includes(arch);
}

/**
 * Toolchain for a family and architecture. The NDK is shared, so its spec
 * ignores the architecture; musl needs a supported one.
 */
export function resolveToolchain(config: CatalogConfig, family: ToolchainFamily, arch = ''): Result<ToolchainSpec> {
  return family === 'android-ndk' ? ok(ndkToolchainSpec(config)) : muslToolchainSpec(config, arch);
}
