/**
 * Android builds with the NDK's clang drivers.
 *
 * The NDK bundle is shared by every architecture and provisioned once per
 * run; a failed provision fails the remaining Android cells without another
 * download. Binaries are stripped of debug symbols after the build.
 */

import { artifactName, BuildJob, LinkMetadata } from '../../domain/artifact';
import {
  Result,
  ToolNotFoundError,
  TypedError,
  buildFailedError,
  err,
  ok,
  toolMissingError,
  unsupportedTargetError,
} from '../../domain/errors';
import { GO_ARCH, isArchitecture } from '../../domain/matrix';
import { androidCompiler } from '../../toolchain/catalog';
import { tailOutput } from '../../tools/tool-runner';
import { goEnvironment, runGoBuild } from '../go-build';
import { linkerFlags } from '../link-metadata';
import { BuildResult, BuilderDeps, PlatformBuilder } from '../types';

export class AndroidBuilder implements PlatformBuilder {
  readonly platform = 'android' as const;
  readonly batch = false;

  private ndkFailure?: TypedError;

  constructor(private readonly deps: BuilderDeps) {}

  plan(arch: string, metadata: LinkMetadata): Result<BuildJob> {
    if (!isArchitecture(arch)) {
      return err(unsupportedTargetError(this.platform, arch));
    }
    const compiler = androidCompiler(this.deps.config, arch);
    if (!compiler.success) return compiler;

    return ok({
      platform: this.platform,
      arch,
      outputName: artifactName(this.deps.config.appName, this.platform, arch),
      env: goEnvironment('android', GO_ARCH[arch], compiler.value.cc),
      ldflags: linkerFlags(metadata),
    });
  }

  async build(jobs: BuildJob[]): Promise<BuildResult[]> {
    const results: BuildResult[] = [];
    for (const job of jobs) {
      results.push(await this.buildOne(job));
    }
    return results;
  }

  private async ensureNdk(arch: string): Promise<Result<string>> {
    if (this.ndkFailure) {
      return err({ ...this.ndkFailure, arch });
    }
    const spec = this.deps.provisioner.resolve('android-ndk');
    const provisioned = spec.success
      ? await this.deps.provisioner.ensure(spec.value, { platform: this.platform, arch })
      : spec;
    if (!provisioned.success) this.ndkFailure = provisioned.error;
    return provisioned;
  }

  private async buildOne(job: BuildJob): Promise<BuildResult> {
    const compiler = androidCompiler(this.deps.config, job.arch);
    if (!compiler.success) return compiler;

    const ndk = await this.ensureNdk(job.arch);
    if (!ndk.success) return ndk;

    this.deps.log.info('Building Android binary', { platform: this.platform, arch: job.arch, output: job.outputName });
    const built = await runGoBuild(job, this.deps);
    if (!built.success) return built;

    try {
      const stripped = await this.deps.runner.run({ command: compiler.value.strip, args: [built.value.path] });
      if (stripped.exitCode !== 0) {
        return err(buildFailedError(this.platform, job.arch, 'llvm-strip', stripped.exitCode, tailOutput(stripped)));
      }
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        return err(toolMissingError(error.tool, this.platform, job.arch));
      }
      throw error;
    }

    return ok({ artifacts: [built.value], warnings: [] });
  }
}
