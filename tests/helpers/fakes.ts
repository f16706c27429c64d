/**
 * In-process stand-ins for external tools and downloads.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ReleaseConfig, ReleaseConfigOverrides, createReleaseConfig } from '../../src/config';
import { ToolNotFoundError } from '../../src/domain/errors';
import { createLogger } from '../../src/logger';
import { ToolchainProvisioner } from '../../src/toolchain/provisioner';
import { Downloader } from '../../src/toolchain/downloader';
import { ToolInvocation, ToolResult, ToolRunner } from '../../src/tools/tool-runner';
import { BuilderDeps } from '../../src/build/types';

export type ToolHandler = (
  invocation: ToolInvocation,
) => Partial<ToolResult> | undefined | Promise<Partial<ToolResult> | undefined>;

/** Records every invocation and answers with a handler (exit 0 by default). */
export class FakeToolRunner implements ToolRunner {
  readonly calls: ToolInvocation[] = [];
  /** Commands that fail to start, as if absent from PATH. */
  readonly missing = new Set<string>();

  constructor(public handler: ToolHandler = () => undefined) {}

  async run(invocation: ToolInvocation): Promise<ToolResult> {
    this.calls.push(invocation);
    if (this.missing.has(invocation.command)) {
      throw new ToolNotFoundError(invocation.command);
    }
    const result = await this.handler(invocation);
    return { exitCode: 0, stdout: '', stderr: '', ...result };
  }

  async which(command: string): Promise<string | undefined> {
    return this.missing.has(command) ? undefined : `/usr/bin/${command}`;
  }

  /** Invocations of one command. */
  callsTo(command: string): ToolInvocation[] {
    return this.calls.filter((c) => c.command === command);
  }
}

/** Records requested URLs; writes a placeholder bundle unless told to fail. */
export class FakeDownloader implements Downloader {
  readonly urls: string[] = [];
  failure?: Error;

  async download(url: string, destination: string): Promise<void> {
    this.urls.push(url);
    if (this.failure) throw this.failure;
    await fs.writeFile(destination, 'bundle');
  }
}

export async function makeTempDir(prefix = 'crossforge-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Write an executable placeholder file, creating parent directories. */
export async function writeExecutable(file: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, '#!/bin/sh\n');
  await fs.chmod(file, 0o755);
}

/** Value following a flag in an argument list, e.g. the path after `-o`. */
export function argAfter(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i >= 0 ? args[i + 1] : undefined;
}

/**
 * Handler that behaves like a successful `go build`: writes the `-o` output.
 * Other commands exit 0 without effect.
 */
export const goBuildWritesOutput: ToolHandler = async (invocation) => {
  if (invocation.command === 'go') {
    const output = argAfter(invocation.args, '-o');
    if (output !== undefined) await fs.writeFile(output, `binary for ${invocation.env?.GOOS}/${invocation.env?.GOARCH}`);
  }
  return undefined;
};

export const silentLog = createLogger({ component: 'test' });

/** Config rooted in a temp project with a toolchain cache beside it. */
export function testConfig(root: string, overrides: ReleaseConfigOverrides = {}): Readonly<ReleaseConfig> {
  return createReleaseConfig({
    projectDir: path.join(root, 'project'),
    toolchainDir: path.join(root, 'toolchains'),
    version: 'v1.2.3',
    ...overrides,
  });
}

/** Builder dependencies over fakes, with the output directory created. */
export async function builderDeps(
  root: string,
  runner: FakeToolRunner,
  overrides: ReleaseConfigOverrides = {},
  downloader: Downloader = new FakeDownloader(),
): Promise<BuilderDeps> {
  const config = testConfig(root, overrides);
  const outputDir = path.join(config.projectDir, config.outputDir);
  await fs.mkdir(outputDir, { recursive: true });
  return {
    config,
    runner,
    provisioner: new ToolchainProvisioner(config, runner, downloader, silentLog, { tempDir: root }),
    outputDir,
    log: silentLog,
  };
}

export const TEST_METADATA = {
  version: 'v1.2.3',
  buildTime: '2026-10-19 10:30:00 +0800',
  author: 'bestrui',
};
