/**
 * Interactive matrix selection: a two-step terminal menu picking one
 * architecture (or all) and then one target (or all).
 */

import React, { useState } from 'react';
import { Box, Text, render } from 'ink';
import SelectInput from 'ink-select-input';
import { ARCHITECTURES, MatrixSelection, TARGET_PLATFORMS, isTargetPlatform } from '../domain/matrix';
import { ReleaseError, selectionCancelledError } from '../domain/errors';
import { MatrixSource } from './matrix-source';

export const ALL_CHOICE = 'all';

interface MenuItem {
  label: string;
  value: string;
}

const ARCH_ITEMS: MenuItem[] = [
  ...ARCHITECTURES.map((a) => ({ label: a, value: a })),
  { label: 'all architectures', value: ALL_CHOICE },
];

const TARGET_ITEMS: MenuItem[] = [
  ...TARGET_PLATFORMS.map((t) => ({ label: t, value: t })),
  { label: 'all targets', value: ALL_CHOICE },
];

/** Selection for a pair of menu choices. */
export function resolveMenuChoice(arch: string, target: string): MatrixSelection {
  return {
    architectures: arch === ALL_CHOICE ? [...ARCHITECTURES] : [arch],
    platforms: isTargetPlatform(target) ? [target] : [...TARGET_PLATFORMS],
  };
}

export interface MatrixMenuProps {
  onComplete: (selection: MatrixSelection) => void;
}

export function MatrixMenu({ onComplete }: MatrixMenuProps) {
  const [arch, setArch] = useState<string | undefined>(undefined);

  if (arch === undefined) {
    return (
      <Box flexDirection="column">
        <Text bold>Select architecture</Text>
        <SelectInput items={ARCH_ITEMS} onSelect={(item) => setArch(item.value)} />
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Text dimColor>Architecture: {arch}</Text>
      <Text bold>Select target</Text>
      <SelectInput items={TARGET_ITEMS} onSelect={(item) => onComplete(resolveMenuChoice(arch, item.value))} />
    </Box>
  );
}

export class InteractiveMatrixSource implements MatrixSource {
  async select(): Promise<MatrixSelection> {
    let chosen: MatrixSelection | undefined;
    const app = render(
      <MatrixMenu
        onComplete={(selection) => {
          chosen = selection;
          app.unmount();
        }}
      />,
    );
    await app.waitUntilExit();
    if (chosen === undefined) {
      throw new ReleaseError(selectionCancelledError());
    }
    return chosen;
  }
}
