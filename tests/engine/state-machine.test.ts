import {
  abortCellStatus,
  transitionRunStatus,
  transitionCellStatus,
  isTerminalRunStatus,
  isTerminalCellStatus,
} from '../../src/engine/state-machine';
import { RunStatus, CellStatus } from '../../src/domain/run';
import { buildFailedError, unsupportedTargetError } from '../../src/domain/errors';

describe('Run State Machine', () => {
  test('valid transition: created -> running', () => {
    const result = transitionRunStatus(RunStatus.Created, RunStatus.Running);
    expect(result.success).toBe(true);
    expect(result.newStatus).toBe(RunStatus.Running);
  });

  test('valid transition: running -> succeeded', () => {
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Succeeded).success).toBe(true);
  });

  test('valid transition: running -> failed', () => {
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Failed).success).toBe(true);
  });

  test('invalid transition: succeeded -> running', () => {
    const result = transitionRunStatus(RunStatus.Succeeded, RunStatus.Running);
    expect(result.success).toBe(false);
    expect(result.error!.code).toBe('RUN.INVALID_TRANSITION');
  });

  test('invalid transition: created -> succeeded', () => {
    expect(transitionRunStatus(RunStatus.Created, RunStatus.Succeeded).success).toBe(false);
  });

  test('terminal status detection', () => {
    expect(isTerminalRunStatus(RunStatus.Succeeded)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Failed)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Running)).toBe(false);
    expect(isTerminalRunStatus(RunStatus.Created)).toBe(false);
  });
});

describe('Cell State Machine', () => {
  const unsupported = unsupportedTargetError('android', 'mips');
  const buildFailure = buildFailedError('android', 'arm64', 'go', 1, 'undefined: main');

  test('valid transition: pending -> running', () => {
    expect(transitionCellStatus(CellStatus.Pending, CellStatus.Running).newStatus).toBe(CellStatus.Running);
  });

  test('a running cell succeeds without an error', () => {
    expect(transitionCellStatus(CellStatus.Running, CellStatus.Succeeded).newStatus).toBe(CellStatus.Succeeded);
  });

  test('a running cell fails only with an error', () => {
    expect(transitionCellStatus(CellStatus.Running, CellStatus.Failed, buildFailure).success).toBe(true);
    const result = transitionCellStatus(CellStatus.Running, CellStatus.Failed);
    expect(result.success).toBe(false);
    expect(result.error!.message).toBe('A cell cannot become failed without an error');
  });

  test('a running cell is skipped only for a configuration error', () => {
    expect(transitionCellStatus(CellStatus.Running, CellStatus.Skipped, unsupported).newStatus).toBe(CellStatus.Skipped);
    const result = transitionCellStatus(CellStatus.Running, CellStatus.Skipped, buildFailure);
    expect(result.success).toBe(false);
    expect(result.error!.code).toBe('RUN.INVALID_CELL_TRANSITION');
    expect(result.error!.message).toBe('A running cell is skipped only for a configuration error, not BUILD.FAILED');
  });

  test('invalid transition: failed -> succeeded', () => {
    const result = transitionCellStatus(CellStatus.Failed, CellStatus.Succeeded);
    expect(result.success).toBe(false);
    expect(result.error!.message).toBe('Invalid cell state transition: failed -> succeeded');
  });

  test('pending cells cannot succeed without running', () => {
    expect(transitionCellStatus(CellStatus.Pending, CellStatus.Succeeded).success).toBe(false);
  });

  test('an aborted run skips unfinished cells and keeps settled ones', () => {
    expect(abortCellStatus(CellStatus.Pending)).toBe(CellStatus.Skipped);
    expect(abortCellStatus(CellStatus.Running)).toBe(CellStatus.Skipped);
    expect(abortCellStatus(CellStatus.Failed)).toBe(CellStatus.Failed);
    expect(abortCellStatus(CellStatus.Succeeded)).toBe(CellStatus.Succeeded);
  });

  test('terminal status detection', () => {
    expect(isTerminalCellStatus(CellStatus.Succeeded)).toBe(true);
    expect(isTerminalCellStatus(CellStatus.Skipped)).toBe(true);
    expect(isTerminalCellStatus(CellStatus.Failed)).toBe(true);
    expect(isTerminalCellStatus(CellStatus.Running)).toBe(false);
    expect(isTerminalCellStatus(CellStatus.Pending)).toBe(false);
  });
});
