import { promises as fs } from 'fs';
import path from 'path';
import { createReleaseConfig } from '../../src/config';
import { ToolchainSpec } from '../../src/domain/toolchain';
import { ndkToolchainSpec } from '../../src/toolchain/catalog';
import { ToolchainProvisioner } from '../../src/toolchain/provisioner';
import { DownloadError } from '../../src/toolchain/downloader';
import { FakeDownloader, FakeToolRunner, argAfter, makeTempDir, removeDir, silentLog, writeExecutable } from '../helpers/fakes';

describe('ToolchainProvisioner', () => {
  let root: string;
  let runner: FakeToolRunner;
  let downloader: FakeDownloader;
  let provisioner: ToolchainProvisioner;
  let spec: ToolchainSpec;

  /** Extraction that lays the compiler down where the spec expects it. */
  const extractsCompiler = () => {
    runner.handler = async (invocation) => {
      if (invocation.command === 'tar' || invocation.command === 'unzip') {
        await writeExecutable(spec.compilerPath);
      }
      return undefined;
    };
  };

  const leftoverBundles = async (): Promise<string[]> =>
    (await fs.readdir(root)).filter((f) => f.startsWith('crossforge-'));

  beforeEach(async () => {
    root = await makeTempDir();
    const config = createReleaseConfig({ toolchainDir: path.join(root, 'toolchains') });
    runner = new FakeToolRunner();
    downloader = new FakeDownloader();
    provisioner = new ToolchainProvisioner(config, runner, downloader, silentLog, { tempDir: root });
    const resolved = provisioner.resolve('musl', 'arm64');
    if (!resolved.success) throw new Error('expected a musl spec');
    spec = resolved.value;
  });

  afterEach(async () => {
    await removeDir(root);
  });

  test('an installed toolchain needs no network', async () => {
    await writeExecutable(spec.compilerPath);
    const result = await provisioner.ensure(spec);
    expect(result).toEqual({ success: true, value: spec.compilerPath });
    expect(downloader.urls).toEqual([]);
    expect(runner.calls).toEqual([]);
  });

  test('downloads, extracts and verifies on first use', async () => {
    extractsCompiler();
    const result = await provisioner.ensure(spec, { platform: 'linux-static', arch: 'arm64' });

    expect(result).toEqual({ success: true, value: spec.compilerPath });
    expect(downloader.urls).toEqual(['https://musl.cc/aarch64-linux-musl-cross.tgz']);
    const [tar] = runner.callsTo('tar');
    expect(tar.args[0]).toBe('xf');
    expect(path.dirname(tar.args[1])).toBe(root);
    expect(tar.args.slice(2)).toEqual(['--strip-components', '1', '-C', spec.installDir]);
    expect(await leftoverBundles()).toEqual([]);
  });

  test('a second ensure does not download again', async () => {
    extractsCompiler();
    await provisioner.ensure(spec);
    await provisioner.ensure(spec);
    expect(downloader.urls).toHaveLength(1);
  });

  test('zip bundles are extracted with unzip', async () => {
    spec = ndkToolchainSpec(createReleaseConfig({ toolchainDir: path.join(root, 'toolchains') }));
    extractsCompiler();
    const result = await provisioner.ensure(spec);

    expect(result.success).toBe(true);
    const [unzip] = runner.callsTo('unzip');
    expect(unzip.args.slice(0, 2)).toEqual(['-q', '-o']);
    expect(argAfter(unzip.args, '-d')).toBe(spec.installDir);
  });

  test('an install directory that cannot be created fails only this toolchain', async () => {
    await fs.writeFile(path.join(root, 'toolchains'), 'not a directory');
    const result = await provisioner.ensure(spec, { platform: 'linux-static', arch: 'arm64' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('PROVISION.INSTALL_DIR');
    expect(result.error.fatal).toBe(false);
    expect(result.error.arch).toBe('arm64');
    expect(downloader.urls).toEqual([]);
  });

  test('a failed download is reported and leaves nothing behind', async () => {
    downloader.failure = new DownloadError('HTTP 404', 404);
    const result = await provisioner.ensure(spec, { platform: 'linux-static', arch: 'arm64' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('PROVISION.DOWNLOAD');
    expect(result.error.arch).toBe('arm64');
    expect(result.error.message).toContain('HTTP 404');
    expect(runner.calls).toEqual([]);
    expect(await leftoverBundles()).toEqual([]);
  });

  test('a failed extraction removes the downloaded bundle', async () => {
    runner.handler = () => ({ exitCode: 2, stderr: 'gzip: stdin: not in gzip format' });
    const result = await provisioner.ensure(spec);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('PROVISION.EXTRACT');
    expect(result.error.message).toContain('tar exited with code 2: gzip: stdin: not in gzip format');
    expect(await leftoverBundles()).toEqual([]);
  });

  test('an extraction without the compiler fails verification', async () => {
    const result = await provisioner.ensure(spec);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('PROVISION.VERIFY');
  });

  test('a missing extraction tool is fatal', async () => {
    runner.missing.add('tar');
    const result = await provisioner.ensure(spec);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('TOOL.MISSING');
    expect(result.error.fatal).toBe(true);
  });
});
