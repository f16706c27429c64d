/**
 * Matrix sources decide which cells a run builds.
 */

import {
  ARCHITECTURES,
  MatrixSelection,
  TARGET_PLATFORMS,
  TargetPlatform,
  isTargetPlatform,
} from '../domain/matrix';
import { Result, err, ok, unknownTargetError } from '../domain/errors';

export interface MatrixSource {
  select(): Promise<MatrixSelection>;
}

/** Every architecture on every platform. */
export function fullMatrix(): MatrixSelection {
  return { architectures: [...ARCHITECTURES], platforms: [...TARGET_PLATFORMS] };
}

/** Split a comma-separated flag value, dropping blanks and repeats. */
export function splitList(value: string): string[] {
  const items = value.split(',').map((v) => v.trim()).filter((v) => v !== '');
  return [...new Set(items)];
}

/**
 * Selection from `--arch` / `--target` flag values. Omitted flags mean "all".
 * Unknown architectures are kept so their cells surface as configuration
 * errors; unknown targets are rejected outright.
 */
export function parseMatrixPreset(arch?: string, target?: string): Result<MatrixSelection> {
  const architectures = arch === undefined ? [...ARCHITECTURES] : splitList(arch);
  let platforms: TargetPlatform[] = [...TARGET_PLATFORMS];

  if (target !== undefined) {
    const requested = splitList(target);
    const unknown = requested.filter((t) => !isTargetPlatform(t));
    if (unknown.length > 0) return err(unknownTargetError(unknown));
    platforms = requested.filter(isTargetPlatform);
  }

  return ok({ architectures, platforms });
}

/** Fixed selection, used for release mode and flag-driven runs. */
export class PresetMatrixSource implements MatrixSource {
  constructor(private readonly selection: MatrixSelection = fullMatrix()) {}

  async select(): Promise<MatrixSelection> {
    return {
      architectures: [...this.selection.architectures],
      platforms: [...this.selection.platforms],
    };
  }
}
