/**
 * Release executor: the core orchestration engine.
 *
 * Drives one release run through its phases in strict order: prepare the
 * output directory, resolve link metadata, build the matrix platform by
 * platform, package, checksum. Cell failures are recorded on the run; a
 * fatal error (or any cell failure under `failFast`) fails the run and is
 * thrown as a ReleaseError. The run object is updated in place, so callers
 * can still report on it after a throw.
 */

import { promises as fs } from 'fs';
import { v4 as uuid } from 'uuid';
import { ReleaseConfig, resolveOutputDir } from '../config';
import { Archive } from '../domain/artifact';
import { ReleaseError, TypedError, createTypedError, describeError, isConfigurationError } from '../domain/errors';
import { MatrixSelection, TargetPlatform, cellKey, expandMatrix } from '../domain/matrix';
import {
  CellOutcome,
  CellStatus,
  ReleasePhase,
  ReleaseRun,
  RunStatus,
  summarizeRun,
} from '../domain/run';
import { BuildMatrixExecutor, CellBuildOutcome } from '../build/matrix-executor';
import { resolveLinkMetadata } from '../build/link-metadata';
import { BuilderDeps, PlatformBuilder } from '../build/types';
import { ChecksumGenerator } from '../checksum/checksum-generator';
import { Logger, logger } from '../logger';
import { PackagingPipeline } from '../packaging/packaging-pipeline';
import { Downloader } from '../toolchain/downloader';
import { ToolchainProvisioner } from '../toolchain/provisioner';
import { ToolRunner } from '../tools/tool-runner';
import { abortCellStatus, isTerminalCellStatus, transitionCellStatus, transitionRunStatus } from './state-machine';

export interface ReleaseExecutorOptions {
  log?: Logger;
  /** Builder factory; defaults to a builder for every supported platform. */
  builders?: (deps: BuilderDeps) => PlatformBuilder[];
  /** Clock used for the embedded build time and run timestamps. */
  now?: () => Date;
  /** Directory toolchain bundles are downloaded to. */
  tempDir?: string;
}

export class ReleaseExecutor {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly runningRuns = new Set<string>();

  constructor(
    private readonly config: Readonly<ReleaseConfig>,
    private readonly runner: ToolRunner,
    private readonly downloader: Downloader,
    private readonly options: ReleaseExecutorOptions = {},
  ) {
    this.log = options.log ?? logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Create a run with one pending cell per selected (platform, arch) pair. */
  createRun(selection: MatrixSelection): ReleaseRun {
    const run: ReleaseRun = {
      id: `rel_${uuid()}`,
      status: RunStatus.Created,
      phase: ReleasePhase.Preparing,
      selection,
      cells: {},
      archives: [],
      errors: [],
      createdAt: this.now().toISOString(),
    };
    for (const cell of expandMatrix(selection)) {
      run.cells[cellKey(cell)] = {
        platform: cell.platform,
        arch: cell.arch,
        status: CellStatus.Pending,
        artifacts: [],
        archives: [],
        warnings: [],
      };
    }
    return run;
  }

  /** Create and execute a run for a selection. */
  async release(selection: MatrixSelection): Promise<ReleaseRun> {
    return this.execute(this.createRun(selection));
  }

  /** Execute a created run to completion. Throws ReleaseError if the run fails. */
  async execute(run: ReleaseRun): Promise<ReleaseRun> {
    if (this.runningRuns.has(run.id)) {
      throw new ReleaseError(
        createTypedError({
          code: 'RUN.ALREADY_RUNNING',
          message: `Run ${run.id} is already executing`,
          fatal: true,
        }),
      );
    }
    this.runningRuns.add(run.id);

    try {
      this.setRunStatus(run, RunStatus.Running);
      run.startedAt = this.now().toISOString();
      await this.runPhases(run);

      run.phase = ReleasePhase.Done;
      this.setRunStatus(run, RunStatus.Succeeded);
      run.completedAt = this.now().toISOString();
      this.log.info('Release run completed', { runId: run.id, ...summarizeRun(run) });
      return run;
    } catch (error) {
      const typed =
        error instanceof ReleaseError
          ? error.typedError
          : createTypedError({ code: 'RUN.UNEXPECTED', message: describeError(error), fatal: true });
      this.failRun(run, typed);
      throw error instanceof ReleaseError ? error : new ReleaseError(typed);
    } finally {
      this.runningRuns.delete(run.id);
    }
  }

  private async runPhases(run: ReleaseRun): Promise<void> {
    const log = this.log.child({ runId: run.id });
    const outputDir = resolveOutputDir(this.config);

    run.phase = ReleasePhase.Preparing;
    log.info('Preparing output directory', { outputDir });
    await fs.mkdir(outputDir, { recursive: true });

    const metadata = await resolveLinkMetadata(this.config, this.runner, this.now());
    if (!metadata.success) throw new ReleaseError(metadata.error);
    run.metadata = metadata.value;
    log.info('Resolved link metadata', { ...metadata.value });

    run.phase = ReleasePhase.Building;
    const provisioner = new ToolchainProvisioner(this.config, this.runner, this.downloader, log.child({ phase: 'provision' }), {
      tempDir: this.options.tempDir,
    });
    const deps: BuilderDeps = { config: this.config, runner: this.runner, provisioner, outputDir, log };
    const matrix = new BuildMatrixExecutor(deps, this.options.builders?.(deps));

    for (const platform of run.selection.platforms) {
      const cells = this.cellsOf(run, platform);
      if (cells.length === 0) continue;
      for (const cell of cells) {
        this.setCellStatus(cell, CellStatus.Running);
        cell.startedAt = this.now().toISOString();
      }

      const outcomes = await matrix.buildPlatform(
        platform,
        cells.map((c) => c.arch),
        metadata.value,
        (outcome) => this.recordCell(run, outcome),
      );

      const last = outcomes[outcomes.length - 1];
      if (last !== undefined && !last.result.success && matrix.shouldStop(last.result)) {
        throw new ReleaseError(last.result.error);
      }
    }

    run.phase = ReleasePhase.Packaging;
    const artifacts = Object.values(run.cells).flatMap((c) => c.artifacts);
    const pipeline = new PackagingPipeline(this.config, this.runner, outputDir, log.child({ phase: 'package' }));
    const packaged = await pipeline.package(artifacts);
    if (!packaged.success) throw new ReleaseError(packaged.error);
    run.archives = packaged.value.archives;
    run.errors.push(...packaged.value.errors);
    this.assignArchives(run, packaged.value.archives);

    run.phase = ReleasePhase.Checksumming;
    const generator = new ChecksumGenerator(this.config.checksumAlgorithm, log.child({ phase: 'checksum' }));
    const manifest = await generator.generate(outputDir);
    if (!manifest.success) throw new ReleaseError(manifest.error);
    run.manifest = manifest.value;
  }

  private cellsOf(run: ReleaseRun, platform: TargetPlatform): CellOutcome[] {
    return Object.values(run.cells).filter((c) => c.platform === platform);
  }

  private recordCell(run: ReleaseRun, outcome: CellBuildOutcome): void {
    const cell = run.cells[cellKey(outcome)];
    if (cell === undefined) return;
    cell.completedAt = this.now().toISOString();
    const { result } = outcome;

    if (result.success) {
      cell.artifacts = result.value.artifacts;
      cell.warnings = result.value.warnings;
      this.setCellStatus(cell, CellStatus.Succeeded);
      for (const warning of result.value.warnings) {
        this.log.warn(warning.message, { platform: cell.platform, arch: cell.arch, code: warning.code });
      }
      this.log.info('Cell succeeded', {
        platform: cell.platform,
        arch: cell.arch,
        artifacts: result.value.artifacts.map((a) => a.name).join(','),
      });
      return;
    }

    cell.error = result.error;
    if (isConfigurationError(result.error)) {
      this.setCellStatus(cell, CellStatus.Skipped, result.error);
      this.log.warn('Cell skipped', { platform: cell.platform, arch: cell.arch, reason: result.error.message });
    } else {
      this.setCellStatus(cell, CellStatus.Failed, result.error);
      this.log.error('Cell failed', { platform: cell.platform, arch: cell.arch, reason: result.error.message });
    }
  }

  private assignArchives(run: ReleaseRun, archives: Archive[]): void {
    for (const archive of archives) {
      const owner = Object.values(run.cells).find((c) => c.artifacts.some((a) => a.name === archive.artifact));
      owner?.archives.push(archive);
    }
  }

  /** Mark the run failed; cells that never finished are skipped. */
  private failRun(run: ReleaseRun, error: TypedError): void {
    run.error = error;
    const completedAt = this.now().toISOString();
    for (const cell of Object.values(run.cells)) {
      if (isTerminalCellStatus(cell.status)) continue;
      cell.status = abortCellStatus(cell.status);
      cell.completedAt = completedAt;
    }
    if (run.status !== RunStatus.Failed) {
      const transition = transitionRunStatus(run.status, RunStatus.Failed);
      if (transition.success && transition.newStatus) run.status = transition.newStatus;
    }
    run.completedAt = completedAt;
    this.log.error('Release run failed', { runId: run.id, code: error.code, reason: error.message });
  }

  private setRunStatus(run: ReleaseRun, target: RunStatus): void {
    const transition = transitionRunStatus(run.status, target);
    if (!transition.success || !transition.newStatus) {
      throw new ReleaseError(
        transition.error ?? createTypedError({ code: 'RUN.INVALID_TRANSITION', message: `${run.status} -> ${target}`, fatal: true }),
      );
    }
    run.status = transition.newStatus;
  }

  private setCellStatus(cell: CellOutcome, target: CellStatus, cause?: TypedError): void {
    const transition = transitionCellStatus(cell.status, target, cause);
    if (!transition.success || !transition.newStatus) {
      throw new ReleaseError(
        transition.error ??
          createTypedError({ code: 'RUN.INVALID_CELL_TRANSITION', message: `${cell.status} -> ${target}`, fatal: true }),
      );
    }
    cell.status = transition.newStatus;
  }
}
