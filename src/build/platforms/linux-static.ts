/**
 * Static Linux builds against musl cross toolchains.
 *
 * The toolchain for each architecture is provisioned on first use and the
 * binary is linked with `-static -fpic`, so it runs on any distribution.
 */

import { artifactName, BuildJob, LinkMetadata } from '../../domain/artifact';
import { Result, err, ok, unsupportedTargetError } from '../../domain/errors';
import { GO_ARCH, isArchitecture } from '../../domain/matrix';
import { muslToolchainSpec } from '../../toolchain/catalog';
import { goEnvironment, runGoBuild } from '../go-build';
import { linkerFlags } from '../link-metadata';
import { BuildResult, BuilderDeps, PlatformBuilder } from '../types';

export class LinuxStaticBuilder implements PlatformBuilder {
  readonly platform = 'linux-static' as const;
  readonly batch = false;

  constructor(private readonly deps: BuilderDeps) {}

  plan(arch: string, metadata: LinkMetadata): Result<BuildJob> {
    if (!isArchitecture(arch)) {
      return err(unsupportedTargetError(this.platform, arch));
    }
    const spec = muslToolchainSpec(this.deps.config, arch);
    if (!spec.success) return spec;

    return ok({
      platform: this.platform,
      arch,
      outputName: artifactName(this.deps.config.appName, this.platform, arch),
      env: goEnvironment('linux', GO_ARCH[arch], spec.value.compilerPath),
      ldflags: linkerFlags(metadata, { static: true }),
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
    const spec = this.deps.provisioner.resolve('musl', job.arch);
    if (!spec.success) return spec;

    const provisioned = await this.deps.provisioner.ensure(spec.value, { platform: this.platform, arch: job.arch });
    if (!provisioned.success) return provisioned;

    this.deps.log.info('Building Linux musl binary', { platform: this.platform, arch: job.arch, output: job.outputName });
    const built = await runGoBuild(job, this.deps);
    if (!built.success) return built;
    return ok({ artifacts: [built.value], warnings: [] });
  }
}
