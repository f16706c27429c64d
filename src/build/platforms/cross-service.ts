/**
 * Windows and macOS builds through the xgo cross-build service.
 *
 * One xgo invocation produces every selected architecture of a platform.
 * The batch is all-or-nothing: if xgo fails, every cell of the platform
 * fails with xgo's diagnostics. Outputs are collected from a staging
 * directory and renamed to the canonical artifact names. Windows executables
 * are additionally copied and packed with upx, giving a packed and an
 * unpacked artifact per architecture.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { artifactName, Artifact, BuildJob, LinkMetadata } from '../../domain/artifact';
import {
  Result,
  ToolNotFoundError,
  TypedError,
  buildFailedError,
  buildOutputMissingError,
  err,
  ok,
  packError,
  toolMissingError,
  unsupportedTargetError,
} from '../../domain/errors';
import { GO_ARCH, GO_OS } from '../../domain/matrix';
import { crossServiceSupports } from '../../toolchain/catalog';
import { ToolResult, tailOutput } from '../../tools/tool-runner';
import { artifactFor, goEnvironment, tagsArgs } from '../go-build';
import { linkerFlags } from '../link-metadata';
import { BuildResult, BuilderDeps, PlatformBuilder } from '../types';

export type CrossServicePlatform = 'windows' | 'darwin';

/**
 * Find the service's output for an architecture among staged file names,
 * e.g. `bestsub-windows-4.0-amd64.exe` or `bestsub-darwin-arm64`.
 */
export function findServiceOutput(
  files: readonly string[],
  app: string,
  goos: string,
  goarch: string,
): string | undefined {
  const prefix = `${app}-${goos}-`;
  return [...files]
    .sort()
    .find((f) => f.startsWith(prefix) && (f.endsWith(`-${goarch}`) || f.endsWith(`-${goarch}.exe`)));
}

export class CrossServiceBuilder implements PlatformBuilder {
  readonly batch = true;

  constructor(
    readonly platform: CrossServicePlatform,
    private readonly deps: BuilderDeps,
  ) {}

  plan(arch: string, metadata: LinkMetadata): Result<BuildJob> {
    if (!crossServiceSupports(this.platform, arch)) {
      return err(unsupportedTargetError(this.platform, arch));
    }
    return ok({
      platform: this.platform,
      arch,
      outputName: artifactName(this.deps.config.appName, this.platform, arch),
      env: goEnvironment(GO_OS[this.platform], GO_ARCH[arch]),
      ldflags: linkerFlags(metadata),
    });
  }

  async build(jobs: BuildJob[]): Promise<BuildResult[]> {
    if (jobs.length === 0) return [];
    const { config, runner, outputDir, log } = this.deps;
    const stageDir = path.join(outputDir, `.xgo-${this.platform}`);
    const failAll = (error: (job: BuildJob) => TypedError): BuildResult[] => jobs.map((job) => err(error(job)));

    await fs.rm(stageDir, { recursive: true, force: true });
    await fs.mkdir(stageDir, { recursive: true });

    try {
      const targets = jobs.map((job) => `${job.env.GOOS}/${job.env.GOARCH}`).join(',');
      log.info('Building with cross-build service', {
        platform: this.platform,
        targets,
      });

      let result: ToolResult;
      try {
        result = await runner.run({
          command: config.tools.xgo,
          args: [
            `-targets=${targets}`,
            '-out',
            config.appName,
            '-dest',
            stageDir,
            `-ldflags=${jobs[0].ldflags}`,
            ...tagsArgs(config.buildTags),
            '-pkg',
            config.mainPackage,
            '.',
          ],
          cwd: config.projectDir,
        });
      } catch (error) {
        if (error instanceof ToolNotFoundError) {
          const tool = error.tool;
          return failAll((job) => toolMissingError(tool, this.platform, job.arch));
        }
        throw error;
      }

      if (result.exitCode !== 0) {
        const { exitCode } = result;
        const diagnostics = tailOutput(result);
        return failAll((job) => buildFailedError(this.platform, job.arch, config.tools.xgo, exitCode, diagnostics));
      }

      const staged = await fs.readdir(stageDir);
      const results: BuildResult[] = [];
      for (const job of jobs) {
        results.push(await this.collect(job, staged, stageDir));
      }
      return results;
    } finally {
      await fs.rm(stageDir, { recursive: true, force: true });
    }
  }

  private async collect(job: BuildJob, staged: string[], stageDir: string): Promise<BuildResult> {
    const { config, outputDir } = this.deps;
    const found = findServiceOutput(staged, config.appName, job.env.GOOS, job.env.GOARCH);
    if (found === undefined) {
      return err(buildOutputMissingError(this.platform, job.arch, `${job.env.GOOS}/${job.env.GOARCH} output`));
    }

    const target = path.join(outputDir, job.outputName);
    await fs.rename(path.join(stageDir, found), target);
    const artifact = artifactFor(this.platform, job.arch, job.outputName, target, false);

    if (this.platform !== 'windows' || !config.packWindows) {
      return ok({ artifacts: [artifact], warnings: [] });
    }

    const packed = await this.pack(job, artifact);
    if (!packed.success) {
      if (packed.error.fatal) return packed;
      return ok({ artifacts: [artifact], warnings: [packed.error] });
    }
    return ok({ artifacts: [artifact, packed.value], warnings: [] });
  }

  /** Copy an executable to its `-upx` name and pack the copy in place. */
  private async pack(job: BuildJob, artifact: Artifact): Promise<Result<Artifact>> {
    const { config, runner, outputDir, log } = this.deps;
    const packedName = artifactName(config.appName, this.platform, job.arch, { packed: true });
    const packedPath = path.join(outputDir, packedName);
    await fs.copyFile(artifact.path, packedPath);

    log.info('Compressing Windows executable with upx', { platform: this.platform, arch: job.arch, output: packedName });
    try {
      const result = await runner.run({ command: config.tools.upx, args: [`-${config.packLevel}`, packedPath] });
      if (result.exitCode !== 0) {
        await fs.rm(packedPath, { force: true });
        return err(packError(this.platform, job.arch, packedName, result.exitCode, tailOutput(result)));
      }
    } catch (error) {
      await fs.rm(packedPath, { force: true });
      if (error instanceof ToolNotFoundError) {
        return err(toolMissingError(error.tool, this.platform, job.arch));
      }
      throw error;
    }

    return ok(artifactFor(this.platform, job.arch, packedName, packedPath, true));
  }
}
