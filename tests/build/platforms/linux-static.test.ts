import { promises as fs } from 'fs';
import path from 'path';
import { LinuxStaticBuilder } from '../../../src/build/platforms/linux-static';
import { BuilderDeps } from '../../../src/build/types';
import { muslToolchainSpec } from '../../../src/toolchain/catalog';
import {
  FakeDownloader,
  FakeToolRunner,
  TEST_METADATA,
  builderDeps,
  goBuildWritesOutput,
  makeTempDir,
  removeDir,
  writeExecutable,
} from '../../helpers/fakes';

describe('LinuxStaticBuilder', () => {
  let root: string;
  let runner: FakeToolRunner;
  let downloader: FakeDownloader;
  let deps: BuilderDeps;
  let builder: LinuxStaticBuilder;

  const compilerFor = (arch: string): string => {
    const spec = muslToolchainSpec(deps.config, arch);
    if (!spec.success) throw new Error(`no musl toolchain for ${arch}`);
    return spec.value.compilerPath;
  };

  beforeEach(async () => {
    root = await makeTempDir();
    runner = new FakeToolRunner(goBuildWritesOutput);
    downloader = new FakeDownloader();
    deps = await builderDeps(root, runner, {}, downloader);
    builder = new LinuxStaticBuilder(deps);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  test('plans a cgo build against the musl compiler with static link flags', () => {
    const plan = builder.plan('arm64', TEST_METADATA);
    if (!plan.success) throw new Error('expected a plan');
    expect(plan.value.outputName).toBe('bestsub-linux-musl-arm64');
    expect(plan.value.env).toEqual({ GOOS: 'linux', GOARCH: 'arm64', CGO_ENABLED: '1', CC: compilerFor('arm64') });
    expect(plan.value.ldflags.startsWith("-extldflags '-static -fpic' -X 'main.Version=v1.2.3'")).toBe(true);
  });

  test('unknown architectures are configuration errors', () => {
    const plan = builder.plan('mips', TEST_METADATA);
    expect(plan.success).toBe(false);
    if (!plan.success) expect(plan.error.code).toBe('CONFIGURATION.UNSUPPORTED_TARGET');
  });

  test('builds with an installed toolchain', async () => {
    await writeExecutable(compilerFor('x86_64'));
    const plan = builder.plan('x86_64', TEST_METADATA);
    if (!plan.success) throw new Error('expected a plan');

    const [result] = await builder.build([plan.value]);

    const output = path.join(deps.outputDir, 'bestsub-linux-musl-x86_64');
    expect(result).toEqual({
      success: true,
      value: {
        artifacts: [{ name: 'bestsub-linux-musl-x86_64', path: output, platform: 'linux-static', arch: 'x86_64', packed: false }],
        warnings: [],
      },
    });
    expect(runner.calls).toEqual([
      {
        command: 'go',
        args: ['build', '-o', output, `-ldflags=${plan.value.ldflags}`, '-tags=jsoniter', './cmd/server'],
        cwd: deps.config.projectDir,
        env: plan.value.env,
      },
    ]);
    expect(downloader.urls).toEqual([]);
  });

  test('provisions a missing toolchain before building', async () => {
    runner.handler = async (invocation) => {
      if (invocation.command === 'tar') await writeExecutable(compilerFor('x86'));
      return goBuildWritesOutput(invocation);
    };
    const plan = builder.plan('x86', TEST_METADATA);
    if (!plan.success) throw new Error('expected a plan');

    const [result] = await builder.build([plan.value]);

    expect(result.success).toBe(true);
    expect(downloader.urls).toEqual(['https://musl.cc/i686-linux-musl-cross.tgz']);
    expect(runner.calls.map((c) => c.command)).toEqual(['tar', 'go']);
  });

  test('a provisioning failure fails the cell without building', async () => {
    downloader.failure = new Error('connection reset');
    const plan = builder.plan('arm', TEST_METADATA);
    if (!plan.success) throw new Error('expected a plan');

    const [result] = await builder.build([plan.value]);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('PROVISION.DOWNLOAD');
    expect(runner.callsTo('go')).toEqual([]);
  });

  test('compiler errors fail the cell with the diagnostics', async () => {
    await writeExecutable(compilerFor('arm64'));
    runner.handler = () => ({ exitCode: 1, stderr: './main.go:3:2: undefined: foo' });
    const plan = builder.plan('arm64', TEST_METADATA);
    if (!plan.success) throw new Error('expected a plan');

    const [result] = await builder.build([plan.value]);

    if (result.success) throw new Error('expected a failure');
    expect(result.error.code).toBe('BUILD.FAILED');
    expect(result.error.fatal).toBe(false);
    expect(result.error.details).toEqual({ tool: 'go', exitCode: 1, diagnostics: './main.go:3:2: undefined: foo' });
  });

  test('a successful exit without output is reported', async () => {
    await writeExecutable(compilerFor('arm64'));
    runner.handler = () => undefined;
    const plan = builder.plan('arm64', TEST_METADATA);
    if (!plan.success) throw new Error('expected a plan');

    const [result] = await builder.build([plan.value]);

    if (result.success) throw new Error('expected a failure');
    expect(result.error.code).toBe('BUILD.OUTPUT_MISSING');
    await expect(fs.readdir(deps.outputDir)).resolves.toEqual([]);
  });
});
