/**
 * Invocation of the application's external build (`go build`).
 */

import { promises as fs } from 'fs';
import path from 'path';
import { Artifact, BuildEnvironment, BuildJob } from '../domain/artifact';
import {
  Result,
  ToolNotFoundError,
  buildFailedError,
  buildOutputMissingError,
  err,
  ok,
  toolMissingError,
} from '../domain/errors';
import { TargetPlatform } from '../domain/matrix';
import { ToolResult, tailOutput } from '../tools/tool-runner';
import { BuilderDeps } from './types';

/** Go build environment for a platform/architecture pair. */
export function goEnvironment(goos: string, goarch: string, cc?: string): BuildEnvironment {
  return cc === undefined
    ? { GOOS: goos, GOARCH: goarch, CGO_ENABLED: '0' }
    : { GOOS: goos, GOARCH: goarch, CGO_ENABLED: '1', CC: cc };
}

/** `-tags=a,b` argument, or nothing when no tags are configured. */
export function tagsArgs(tags: readonly string[]): string[] {
  return tags.length > 0 ? [`-tags=${tags.join(',')}`] : [];
}

/** Whether a path is an existing regular file. */
export async function fileExists(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Run `go build` for a job and return the produced artifact.
 * A missing go binary is fatal; a non-zero exit fails the cell with the
 * compiler's own diagnostics.
 */
export async function runGoBuild(job: BuildJob, deps: BuilderDeps): Promise<Result<Artifact>> {
  const { config, runner, outputDir } = deps;
  const output = path.join(outputDir, job.outputName);

  let result: ToolResult;
  try {
    result = await runner.run({
      command: config.tools.go,
      args: ['build', '-o', output, `-ldflags=${job.ldflags}`, ...tagsArgs(config.buildTags), config.mainPackage],
      cwd: config.projectDir,
      env: { ...job.env },
    });
  } catch (error) {
    if (error instanceof ToolNotFoundError) {
      return err(toolMissingError(error.tool, job.platform, job.arch));
    }
    throw error;
  }

  if (result.exitCode !== 0) {
    return err(buildFailedError(job.platform, job.arch, config.tools.go, result.exitCode, tailOutput(result)));
  }
  if (!(await fileExists(output))) {
    return err(buildOutputMissingError(job.platform, job.arch, job.outputName));
  }

  return ok(artifactFor(job.platform, job.arch, job.outputName, output, false));
}

export function artifactFor(
  platform: TargetPlatform,
  arch: string,
  name: string,
  file: string,
  packed: boolean,
): Artifact {
  return { name, path: file, platform, arch, packed };
}
