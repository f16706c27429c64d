/**
 * Platform builder contract.
 *
 * Each target platform has one builder registered on the
 * BuildMatrixExecutor. A builder plans a BuildJob per architecture, then
 * builds jobs either one at a time or, for batch builders, all selected
 * architectures in a single invocation of an external service.
 */

import { ReleaseConfig } from '../config';
import { Artifact, BuildJob, LinkMetadata } from '../domain/artifact';
import { Result, TypedError } from '../domain/errors';
import { TargetPlatform } from '../domain/matrix';
import { Logger } from '../logger';
import { ToolchainProvisioner } from '../toolchain/provisioner';
import { ToolRunner } from '../tools/tool-runner';

/** A successful build: its artifacts plus non-fatal problems (e.g. a failed pack). */
export interface BuildSuccess {
  artifacts: Artifact[];
  warnings: TypedError[];
}

export type BuildResult = Result<BuildSuccess>;

export interface PlatformBuilder {
  readonly platform: TargetPlatform;
  /** Batch builders receive every planned job of the run in one call. */
  readonly batch: boolean;
  /** Plan a job; unsupported architectures yield a configuration error. */
  plan(arch: string, metadata: LinkMetadata): Result<BuildJob>;
  /** Build jobs; the returned results align with `jobs` by index. */
  build(jobs: BuildJob[]): Promise<BuildResult[]>;
}

/** Collaborators shared by the platform builders of one run. */
export interface BuilderDeps {
  config: Readonly<ReleaseConfig>;
  runner: ToolRunner;
  provisioner: ToolchainProvisioner;
  /** Absolute output directory binaries are written to. */
  outputDir: string;
  log: Logger;
}
