/**
 * Release run domain model.
 *
 * A single invocation of the pipeline: the selected matrix, one outcome per
 * cell, the archives that were produced and the checksum manifest.
 */

import { Archive, Artifact, LinkMetadata } from './artifact';
import { Manifest } from './checksum';
import { TypedError } from './errors';
import { MatrixSelection, TargetPlatform } from './matrix';

/** Release run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
}

/** Strictly ordered pipeline phases. */
export enum ReleasePhase {
  Preparing = 'preparing',
  Building = 'building',
  Packaging = 'packaging',
  Checksumming = 'checksumming',
  Done = 'done',
}

/** Cell-level states. */
export enum CellStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Running, RunStatus.Failed],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
};

/** Valid state transitions for cells. */
export const VALID_CELL_TRANSITIONS: Record<CellStatus, CellStatus[]> = {
  [CellStatus.Pending]: [CellStatus.Running, CellStatus.Skipped, CellStatus.Failed],
  [CellStatus.Running]: [CellStatus.Succeeded, CellStatus.Failed, CellStatus.Skipped],
  [CellStatus.Succeeded]: [],
  [CellStatus.Failed]: [],
  [CellStatus.Skipped]: [],
};

/** Outcome of one (platform, architecture) cell. */
export interface CellOutcome {
  platform: TargetPlatform;
  arch: string;
  status: CellStatus;
  artifacts: Artifact[];
  archives: Archive[];
  error?: TypedError;
  /** Non-fatal problems of a successful cell, e.g. a failed executable pack. */
  warnings: TypedError[];
  startedAt?: string;
  completedAt?: string;
}

/** Counts reported at the end of a run. */
export interface RunSummary {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface ReleaseRun {
  id: string;
  status: RunStatus;
  phase: ReleasePhase;
  selection: MatrixSelection;
  metadata?: LinkMetadata;
  /** Outcomes keyed by "platform/arch", in matrix order. */
  cells: Record<string, CellOutcome>;
  archives: Archive[];
  /** Per-artifact packaging failures. */
  errors: TypedError[];
  manifest?: Manifest;
  /** Run-level error if the run failed. */
  error?: TypedError;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

/** Summarize cell outcomes. */
export function summarizeRun(run: ReleaseRun): RunSummary {
  const outcomes = Object.values(run.cells);
  return {
    total: outcomes.length,
    succeeded: outcomes.filter((c) => c.status === CellStatus.Succeeded).length,
    skipped: outcomes.filter((c) => c.status === CellStatus.Skipped).length,
    failed: outcomes.filter((c) => c.status === CellStatus.Failed).length,
  };
}
