import { formatBuildTime, linkerFlags, resolveLinkMetadata } from '../../src/build/link-metadata';
import { createReleaseConfig } from '../../src/config';
import path from 'path';
import { ChildProcessToolRunner } from '../../src/tools/tool-runner';
import { FakeToolRunner, makeTempDir, removeDir, silentLog } from '../helpers/fakes';

const NOW = new Date('2026-10-19T02:30:05Z');

describe('formatBuildTime', () => {
  test('renders wall-clock time and offset in the zone', () => {
    expect(formatBuildTime(NOW, 'Asia/Shanghai')).toBe('2026-10-19 10:30:05 +0800');
  });

  test('handles UTC and negative offsets', () => {
    expect(formatBuildTime(NOW, 'UTC')).toBe('2026-10-19 02:30:05 +0000');
    expect(formatBuildTime(new Date('2026-01-15T12:00:00Z'), 'America/New_York')).toBe('2026-01-15 07:00:00 -0500');
  });

  test('handles half-hour offsets across a date change', () => {
    expect(formatBuildTime(new Date('2026-10-19T20:00:00Z'), 'Asia/Kolkata')).toBe('2026-10-20 01:30:00 +0530');
  });
});

describe('linkerFlags', () => {
  const metadata = { version: 'v1.2.3', buildTime: '2026-10-19 10:30:05 +0800', author: 'bestrui' };

  test('injects version, build time and author', () => {
    expect(linkerFlags(metadata)).toBe(
      "-X 'main.Version=v1.2.3' -X 'main.BuildTime=2026-10-19 10:30:05 +0800' -X 'main.Author=bestrui'",
    );
  });

  test('static builds add the external linker flags first', () => {
    expect(linkerFlags(metadata, { static: true })).toBe(
      "-extldflags '-static -fpic' -X 'main.Version=v1.2.3' -X 'main.BuildTime=2026-10-19 10:30:05 +0800' -X 'main.Author=bestrui'",
    );
  });
});

describe('resolveLinkMetadata', () => {
  test('a missing project directory is not blamed on git', async () => {
    const root = await makeTempDir();
    try {
      const config = createReleaseConfig({ projectDir: path.join(root, 'absent') });
      const result = await resolveLinkMetadata(config, new ChildProcessToolRunner(silentLog), NOW);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('BUILD.VERSION_UNRESOLVED');
      expect(result.error.message).toBe(
        `Cannot determine the release version from the latest git tag: Working directory does not exist: ${path.join(root, 'absent')}`,
      );
    } finally {
      await removeDir(root);
    }
  });

  test('reads the version from the latest tag', async () => {
    const runner = new FakeToolRunner(() => ({ stdout: 'v2.0.1\n' }));
    const config = createReleaseConfig({ projectDir: '/work/app' });
    const result = await resolveLinkMetadata(config, runner, NOW);

    expect(result).toEqual({
      success: true,
      value: { version: 'v2.0.1', buildTime: '2026-10-19 10:30:05 +0800', author: 'bestrui' },
    });
    expect(runner.calls).toEqual([{ command: 'git', args: ['describe', '--tags', '--abbrev=0'], cwd: '/work/app' }]);
  });

  test('a configured version skips git', async () => {
    const runner = new FakeToolRunner();
    const result = await resolveLinkMetadata(createReleaseConfig({ version: 'v9' }), runner, NOW);
    expect(result.success).toBe(true);
    expect(runner.calls).toEqual([]);
  });

  test('no tag is a fatal error', async () => {
    const runner = new FakeToolRunner(() => ({ exitCode: 128, stderr: 'fatal: No names found, cannot describe anything.' }));
    const result = await resolveLinkMetadata(createReleaseConfig(), runner, NOW);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('BUILD.VERSION_UNRESOLVED');
    expect(result.error.fatal).toBe(true);
    expect(result.error.message).toContain('No names found');
  });

  test('a version with a quote cannot be embedded', async () => {
    const result = await resolveLinkMetadata(createReleaseConfig({ version: "v1'x" }), new FakeToolRunner(), NOW);
    expect(result.success).toBe(false);
  });

  test('missing git is a missing tool', async () => {
    const runner = new FakeToolRunner();
    runner.missing.add('git');
    const result = await resolveLinkMetadata(createReleaseConfig(), runner, NOW);
    if (result.success) throw new Error('expected a failure');
    expect(result.error.code).toBe('TOOL.MISSING');
  });
});
