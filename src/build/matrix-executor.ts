/**
 * Build matrix executor.
 *
 * Walks the selected architectures of a platform one cell at a time, in
 * selection order, and dispatches to the platform's registered builder.
 * Batch builders get all planned jobs of the platform in one call.
 *
 * Failure policy per cell:
 * - unsupported architecture: the cell gets a configuration error, the
 *   loop continues;
 * - build or provision failure: the cell fails, the loop continues unless
 *   `failFast` is set;
 * - fatal error (a required tool is missing): the loop stops and the
 *   error is handed back for the caller to abort the run.
 */

import { BuildJob, LinkMetadata } from '../domain/artifact';
import { Result, TypedError, createTypedError, err, isConfigurationError } from '../domain/errors';
import { TargetPlatform } from '../domain/matrix';
import { AndroidBuilder } from './platforms/android';
import { CrossServiceBuilder } from './platforms/cross-service';
import { LinuxBuilder } from './platforms/linux';
import { LinuxStaticBuilder } from './platforms/linux-static';
import { BuildResult, BuilderDeps, PlatformBuilder } from './types';

/** Result of one matrix cell. */
export interface CellBuildOutcome {
  platform: TargetPlatform;
  arch: string;
  result: BuildResult;
}

/** Builders for every supported platform. */
export function createDefaultBuilders(deps: BuilderDeps): PlatformBuilder[] {
  return [
    new LinuxBuilder(deps),
    new LinuxStaticBuilder(deps),
    new CrossServiceBuilder('windows', deps),
    new CrossServiceBuilder('darwin', deps),
    new AndroidBuilder(deps),
  ];
}

export class BuildMatrixExecutor {
  private readonly builders = new Map<TargetPlatform, PlatformBuilder>();

  constructor(
    private readonly deps: BuilderDeps,
    builders: PlatformBuilder[] = createDefaultBuilders(deps),
  ) {
    for (const builder of builders) {
      this.register(builder);
    }
  }

  /** Register (or replace) the builder of a platform. */
  register(builder: PlatformBuilder): void {
    this.builders.set(builder.platform, builder);
  }

  getBuilder(platform: TargetPlatform): PlatformBuilder | undefined {
    return this.builders.get(platform);
  }

  /** Build a single planned job. */
  async build(job: BuildJob): Promise<BuildResult> {
    const builder = this.builders.get(job.platform);
    if (!builder) {
      return err(this.noBuilderError(job.platform, job.arch));
    }
    const [result] = await builder.build([job]);
    return result ?? err(this.noBuilderError(job.platform, job.arch));
  }

  /** Whether the matrix walk must stop after this result. */
  shouldStop(result: BuildResult): boolean {
    if (result.success) return false;
    if (result.error.fatal) return true;
    return this.deps.config.failFast && !isConfigurationError(result.error);
  }

  /**
   * Build every requested architecture of a platform, in order. Outcomes are
   * reported through `onCell` as soon as each is known; the returned list
   * stops at the first outcome for which shouldStop() holds.
   */
  async buildPlatform(
    platform: TargetPlatform,
    archs: readonly string[],
    metadata: LinkMetadata,
    onCell: (outcome: CellBuildOutcome) => void = () => {},
  ): Promise<CellBuildOutcome[]> {
    const outcomes: CellBuildOutcome[] = [];
    const report = (outcome: CellBuildOutcome): boolean => {
      outcomes.push(outcome);
      onCell(outcome);
      return this.shouldStop(outcome.result);
    };

    const builder = this.builders.get(platform);
    if (!builder) {
      for (const arch of archs) {
        if (report({ platform, arch, result: err(this.noBuilderError(platform, arch)) })) break;
      }
      return outcomes;
    }

    if (!builder.batch) {
      for (const arch of archs) {
        const plan = this.plan(builder, arch, metadata);
        const result = plan.success ? await this.build(plan.value) : plan;
        if (report({ platform, arch, result })) break;
      }
      return outcomes;
    }

    // Batch builders: unsupported cells are reported first, then one build
    // call covers every planned architecture.
    const planned: BuildJob[] = [];
    for (const arch of archs) {
      const plan = this.plan(builder, arch, metadata);
      if (!plan.success) {
        if (report({ platform, arch, result: plan })) return outcomes;
        continue;
      }
      planned.push(plan.value);
    }

    const results = await builder.build(planned);
    for (const [i, job] of planned.entries()) {
      const result = results[i] ?? err(this.noBuilderError(platform, job.arch));
      if (report({ platform, arch: job.arch, result })) break;
    }
    return outcomes;
  }

  private plan(builder: PlatformBuilder, arch: string, metadata: LinkMetadata): Result<BuildJob> {
    const plan = builder.plan(arch, metadata);
    if (!plan.success) {
      this.deps.log.warn(plan.error.message, { platform: builder.platform, arch, code: plan.error.code });
    }
    return plan;
  }

  private noBuilderError(platform: TargetPlatform, arch: string): TypedError {
    return createTypedError({
      code: 'BUILD.NO_BUILDER',
      message: `No builder registered for platform ${platform} (needed for ${platform}/${arch})`,
      platform,
      arch,
      fatal: true,
    });
  }
}
