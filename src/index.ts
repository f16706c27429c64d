/**
 * crossforge: release builds for a Go application across a platform and
 * architecture matrix.
 *
 * Library entry point; the command line lives in ./cli.
 */

export * from './domain';
export * from './config';
export * from './logger';
export { ChildProcessToolRunner, findExecutable, isDirectory, tailOutput } from './tools/tool-runner';
export type { ToolInvocation, ToolResult, ToolRunner } from './tools/tool-runner';
export * from './toolchain/catalog';
export * from './toolchain/downloader';
export * from './toolchain/provisioner';
export * from './build/types';
export * from './build/go-build';
export * from './build/link-metadata';
export * from './build/matrix-executor';
export { AndroidBuilder } from './build/platforms/android';
export { CrossServiceBuilder, findServiceOutput } from './build/platforms/cross-service';
export type { CrossServicePlatform } from './build/platforms/cross-service';
export { LinuxBuilder } from './build/platforms/linux';
export { LinuxStaticBuilder } from './build/platforms/linux-static';
export * from './packaging/packaging-pipeline';
export * from './checksum/checksum-generator';
export * from './matrix/matrix-source';
export * from './matrix/interactive-source';
export * from './engine/state-machine';
export * from './engine/release-executor';
