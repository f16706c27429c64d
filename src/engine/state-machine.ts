/**
 * Run and cell state machines.
 *
 * Transitions are checked against the tables in domain/run. Cells add rules
 * of their own on top: a cell only fails or is skipped with a recorded
 * error, and a running cell is skipped only when its builder declined the
 * architecture. Cells left unfinished by an aborted run go through
 * abortCellStatus instead.
 */

import {
  RunStatus,
  CellStatus,
  VALID_RUN_TRANSITIONS,
  VALID_CELL_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError, isConfigurationError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

function rejected<S extends string>(code: string, message: string, current: S, target: S): TransitionResult<S> {
  return {
    success: false,
    error: createTypedError({ code, message, fatal: true, details: { current, target } }),
  };
}

function checkTable<S extends string>(
  table: Record<S, S[]>,
  code: string,
  kind: string,
  current: S,
  target: S,
): TransitionResult<S> {
  if (!table[current].includes(target)) {
    return rejected(code, `Invalid ${kind} state transition: ${current} -> ${target}`, current, target);
  }
  return { success: true, newStatus: target };
}

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  return checkTable(VALID_RUN_TRANSITIONS, 'RUN.INVALID_TRANSITION', 'run', current, target);
}

/**
 * Attempt a cell state transition. `cause` is the error that settles the
 * cell; failing or skipping requires one.
 */
export function transitionCellStatus(
  current: CellStatus,
  target: CellStatus,
  cause?: TypedError,
): TransitionResult<CellStatus> {
  const checked = checkTable(VALID_CELL_TRANSITIONS, 'RUN.INVALID_CELL_TRANSITION', 'cell', current, target);
  if (!checked.success) return checked;

  if ((target === CellStatus.Failed || target === CellStatus.Skipped) && cause === undefined) {
    return rejected('RUN.INVALID_CELL_TRANSITION', `A cell cannot become ${target} without an error`, current, target);
  }
  if (current === CellStatus.Running && target === CellStatus.Skipped && cause && !isConfigurationError(cause)) {
    return rejected(
      'RUN.INVALID_CELL_TRANSITION',
      `A running cell is skipped only for a configuration error, not ${cause.code}`,
      current,
      target,
    );
  }
  return checked;
}

/** Status of a cell after its run was aborted: unfinished cells are skipped. */
export function abortCellStatus(current: CellStatus): CellStatus {
  return isTerminalCellStatus(current) ? current : CellStatus.Skipped;
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return status === RunStatus.Succeeded || status === RunStatus.Failed;
}

/** Check if a cell status is terminal. */
export function isTerminalCellStatus(status: CellStatus): boolean {
  return (
    status === CellStatus.Succeeded ||
    status === CellStatus.Failed ||
    status === CellStatus.Skipped
  );
}
