/**
 * Dynamic (glibc) Linux builds.
 *
 * Uses the distribution's gcc cross compilers, which are a prerequisite of
 * the run rather than something this tool downloads. With
 * `installSystemPackages` enabled they are installed through apt first.
 */

import { artifactName, BuildJob, LinkMetadata } from '../../domain/artifact';
import {
  Result,
  ToolNotFoundError,
  buildFailedError,
  err,
  ok,
  toolMissingError,
  unsupportedTargetError,
} from '../../domain/errors';
import { GO_ARCH, isArchitecture } from '../../domain/matrix';
import { gnuCompiler } from '../../toolchain/catalog';
import { ToolInvocation, tailOutput } from '../../tools/tool-runner';
import { goEnvironment, runGoBuild } from '../go-build';
import { linkerFlags } from '../link-metadata';
import { BuildResult, BuilderDeps, PlatformBuilder } from '../types';

export class LinuxBuilder implements PlatformBuilder {
  readonly platform = 'linux' as const;
  readonly batch = false;

  private packageIndexUpdated = false;
  private readonly installedPackages = new Set<string>();

  constructor(private readonly deps: BuilderDeps) {}

  plan(arch: string, metadata: LinkMetadata): Result<BuildJob> {
    if (!isArchitecture(arch)) {
      return err(unsupportedTargetError(this.platform, arch));
    }
    const compiler = gnuCompiler(arch);
    if (!compiler.success) return compiler;

    return ok({
      platform: this.platform,
      arch,
      outputName: artifactName(this.deps.config.appName, this.platform, arch),
      env: goEnvironment('linux', GO_ARCH[arch], compiler.value.cc),
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

  private async buildOne(job: BuildJob): Promise<BuildResult> {
    const compiler = gnuCompiler(job.arch);
    if (!compiler.success) return compiler;

    if (this.deps.config.installSystemPackages) {
      const installed = await this.installPackage(compiler.value.aptPackage, job.arch);
      if (!installed.success) return installed;
    }

    if ((await this.deps.runner.which(compiler.value.cc)) === undefined) {
      return err(toolMissingError(compiler.value.cc, this.platform, job.arch));
    }

    this.deps.log.info('Building Linux binary', { platform: this.platform, arch: job.arch, output: job.outputName });
    const built = await runGoBuild(job, this.deps);
    if (!built.success) return built;
    return ok({ artifacts: [built.value], warnings: [] });
  }

  private async installPackage(aptPackage: string, arch: string): Promise<Result<void>> {
    if (this.installedPackages.has(aptPackage)) return ok(undefined);

    const { tools } = this.deps.config;
    if (!this.packageIndexUpdated) {
      const updated = await this.runApt({ command: tools.sudo, args: [tools.apt, 'update'] }, arch);
      if (!updated.success) return updated;
      this.packageIndexUpdated = true;
    }

    this.deps.log.info('Installing cross compiler package', { platform: this.platform, arch, package: aptPackage });
    const installed = await this.runApt({ command: tools.sudo, args: [tools.apt, 'install', '-y', aptPackage] }, arch);
    if (!installed.success) return installed;
    this.installedPackages.add(aptPackage);
    return ok(undefined);
  }

  private async runApt(invocation: ToolInvocation, arch: string): Promise<Result<void>> {
    try {
      const result = await this.deps.runner.run(invocation);
      if (result.exitCode !== 0) {
        return err(buildFailedError(this.platform, arch, this.deps.config.tools.apt, result.exitCode, tailOutput(result)));
      }
      return ok(undefined);
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        return err(toolMissingError(error.tool, this.platform, arch));
      }
      throw error;
    }
  }
}
