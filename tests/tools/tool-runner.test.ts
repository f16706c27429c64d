import { promises as fs } from 'fs';
import path from 'path';
import { ToolNotFoundError } from '../../src/domain/errors';
import { ChildProcessToolRunner, findExecutable, isDirectory, tailOutput } from '../../src/tools/tool-runner';
import { makeTempDir, removeDir, silentLog, writeExecutable } from '../helpers/fakes';

describe('tailOutput', () => {
  test('prefers stderr and keeps the last lines', () => {
    const stderr = Array.from({ length: 30 }, (_, i) => `line ${i + 1}`).join('\n');
    const tail = tailOutput({ exitCode: 1, stdout: 'ignored', stderr }, 3);
    expect(tail).toBe('line 28\nline 29\nline 30');
  });

  test('falls back to stdout when stderr is empty', () => {
    expect(tailOutput({ exitCode: 1, stdout: 'only stdout\n', stderr: '  ' })).toBe('only stdout');
  });
});

describe('findExecutable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test('searches PATH entries in order', async () => {
    const first = path.join(dir, 'a');
    const second = path.join(dir, 'b');
    await writeExecutable(path.join(second, 'xgo'));
    await fs.mkdir(first, { recursive: true });
    expect(await findExecutable('xgo', [first, second].join(path.delimiter))).toBe(path.join(second, 'xgo'));
  });

  test('ignores non-executable files', async () => {
    await fs.writeFile(path.join(dir, 'upx'), 'data');
    expect(await findExecutable('upx', dir)).toBeUndefined();
  });

  test('checks paths with a separator directly', async () => {
    const tool = path.join(dir, 'bin', 'go');
    await writeExecutable(tool);
    expect(await findExecutable(tool, '')).toBe(tool);
    expect(await findExecutable(path.join(dir, 'bin', 'gofmt'), '')).toBeUndefined();
  });
});

describe('ChildProcessToolRunner', () => {
  test('an executable that cannot be found raises ToolNotFoundError', async () => {
    const runner = new ChildProcessToolRunner(silentLog, { PATH: '' });
    await expect(runner.run({ command: 'crossforge-no-such-tool', args: [] })).rejects.toBeInstanceOf(ToolNotFoundError);
  });

  test('a missing working directory is not reported as a missing tool', async () => {
    const dir = await makeTempDir();
    try {
      const cwd = path.join(dir, 'missing');
      const runner = new ChildProcessToolRunner(silentLog, { PATH: '' });
      const run = runner.run({ command: process.execPath, args: ['--version'], cwd });
      await expect(run).rejects.toThrow(`Working directory does not exist: ${cwd}`);
      await expect(run).rejects.not.toBeInstanceOf(ToolNotFoundError);
    } finally {
      await removeDir(dir);
    }
  });

  test('which resolves through the base PATH', async () => {
    const dir = await makeTempDir();
    try {
      await writeExecutable(path.join(dir, 'zip'));
      const runner = new ChildProcessToolRunner(silentLog, { PATH: dir });
      expect(await runner.which('zip')).toBe(path.join(dir, 'zip'));
      expect(await runner.which('unzip')).toBeUndefined();
    } finally {
      await removeDir(dir);
    }
  });
});

describe('isDirectory', () => {
  test('distinguishes directories, files and absent paths', async () => {
    const dir = await makeTempDir();
    try {
      await fs.writeFile(path.join(dir, 'file'), 'x');
      expect(await isDirectory(dir)).toBe(true);
      expect(await isDirectory(path.join(dir, 'file'))).toBe(false);
      expect(await isDirectory(path.join(dir, 'absent'))).toBe(false);
      expect(await isDirectory(undefined)).toBe(true);
    } finally {
      await removeDir(dir);
    }
  });
});
