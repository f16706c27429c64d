#!/usr/bin/env node
/**
 * crossforge command line.
 *
 *   crossforge                  interactive matrix menu (on a terminal)
 *   crossforge release          every architecture on every platform
 *   crossforge --arch arm64 --target linux-static,android
 *
 * Exit status: 0 when no cell failed, 2 when some cells or archives failed,
 * 1 when the run was aborted.
 */

import { parseArgs } from 'util';
import {
  ReleaseConfig,
  configFromEnv,
  createReleaseConfig,
  loadConfigFile,
  validateReleaseConfig,
} from './config';
import { formatManifest } from './domain/checksum';
import { ReleaseError, Result, describeError, err, invalidConfigurationError, ok } from './domain/errors';
import { CellStatus, ReleaseRun, summarizeRun } from './domain/run';
import { ReleaseExecutor } from './engine/release-executor';
import { Logger, LogLevel, logger, setLogHandler, setLogLevel, textLogHandler } from './logger';
import { InteractiveMatrixSource } from './matrix/interactive-source';
import { MatrixSource, PresetMatrixSource, parseMatrixPreset } from './matrix/matrix-source';
import { Downloader, FetchDownloader } from './toolchain/downloader';
import { ChildProcessToolRunner, ToolRunner, isDirectory } from './tools/tool-runner';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_CELLS_FAILED = 2;

export interface CliOptions {
  /** `release` was given, or a preset flag was. */
  preset: boolean;
  arch?: string;
  target?: string;
  project?: string;
  output?: string;
  failFast: boolean;
  noPack: boolean;
  installSystemPackages: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: crossforge [release] [options]

Options:
  --arch <a,b>                 architectures (x86_64, x86, arm64, arm)
  --target <t,u>               targets (linux, linux-static, windows, darwin, android)
  --project <dir>              application source root (default: cwd)
  --output <dir>               output directory (default: dist)
  --fail-fast                  abort the run on the first failed cell
  --no-pack                    skip the upx-packed Windows executables
  --install-system-packages    apt-install the glibc cross compilers first
  --verbose                    debug logging
  -h, --help                   show this help
`;

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      arch: { type: 'string' },
      target: { type: 'string' },
      project: { type: 'string' },
      output: { type: 'string' },
      'fail-fast': { type: 'boolean', default: false },
      'no-pack': { type: 'boolean', default: false },
      'install-system-packages': { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

export function parseCliArgs(argv: string[]): Result<CliOptions> {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return err(invalidConfigurationError([describeError(error)]));
  }

  const { values, positionals } = parsed;
  const unexpected = positionals.filter((p) => p !== 'release');
  if (unexpected.length > 0 || positionals.length > 1) {
    return err(invalidConfigurationError([`unexpected argument(s): ${positionals.join(' ')}`]));
  }

  return ok({
    preset: positionals.length === 1 || values.arch !== undefined || values.target !== undefined,
    arch: values.arch,
    target: values.target,
    project: values.project,
    output: values.output,
    failFast: values['fail-fast'] ?? false,
    noPack: values['no-pack'] ?? false,
    installSystemPackages: values['install-system-packages'] ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  });
}

/** Build and validate the config: defaults < config file < environment < flags. */
export async function loadConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv,
  cwd: string,
  log: Logger,
): Promise<Result<Readonly<ReleaseConfig>>> {
  const projectDir = options.project ?? cwd;
  const file = await loadConfigFile(projectDir);
  if (file.errors.length > 0) {
    return err(invalidConfigurationError(file.errors));
  }

  const config = createReleaseConfig({
    ...file.overrides,
    ...configFromEnv(env),
    projectDir,
    ...(options.output !== undefined ? { outputDir: options.output } : {}),
    ...(options.failFast ? { failFast: true } : {}),
    ...(options.noPack ? { packWindows: false } : {}),
    ...(options.installSystemPackages ? { installSystemPackages: true } : {}),
  });

  const validation = validateReleaseConfig(config);
  for (const warning of validation.warnings) {
    log.warn(warning);
  }
  const errors = [...validation.errors];
  if (!(await isDirectory(config.projectDir))) {
    errors.push(`projectDir ${config.projectDir} is not an existing directory`);
  }
  if (errors.length > 0) {
    return err(invalidConfigurationError(errors));
  }
  return ok(config);
}

/** Exit status for a completed run. */
export function exitCodeFor(run: ReleaseRun): number {
  return summarizeRun(run).failed > 0 || run.errors.length > 0 ? EXIT_CELLS_FAILED : EXIT_OK;
}

/** Human-readable end-of-run report. */
export function formatReport(run: ReleaseRun): string[] {
  const summary = summarizeRun(run);
  const lines = [
    `Run ${run.id}: ${run.status}`,
    `  ${summary.succeeded} succeeded, ${summary.skipped} skipped, ${summary.failed} failed of ${summary.total}`,
  ];
  for (const [key, cell] of Object.entries(run.cells)) {
    if (cell.status === CellStatus.Succeeded) continue;
    lines.push(`  ${cell.status.padEnd(7)} ${key}${cell.error ? `: ${cell.error.message}` : ''}`);
  }
  for (const error of run.errors) {
    lines.push(`  error   ${error.message}`);
  }
  return lines;
}

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Whether stdin/stdout are a terminal; decides menu and log format. */
  interactive: boolean;
  out: (line: string) => void;
  runner?: ToolRunner;
  downloader?: Downloader;
  matrixSource?: MatrixSource;
}

export async function main(argv: string[], deps: CliDeps): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.success) {
    deps.out(parsed.error.message);
    deps.out(USAGE);
    return EXIT_FATAL;
  }
  const options = parsed.value;
  if (options.help) {
    deps.out(USAGE);
    return EXIT_OK;
  }

  if (deps.interactive) setLogHandler(textLogHandler);
  if (options.verbose) setLogLevel(LogLevel.Debug);
  const log = logger.child({ component: 'cli' });

  const config = await loadConfig(options, deps.env, deps.cwd, log);
  if (!config.success) {
    log.error(config.error.message, { code: config.error.code });
    return EXIT_FATAL;
  }

  let source = deps.matrixSource;
  if (source === undefined) {
    if (options.preset || !deps.interactive) {
      const preset = parseMatrixPreset(options.arch, options.target);
      if (!preset.success) {
        log.error(preset.error.message, { code: preset.error.code });
        return EXIT_FATAL;
      }
      source = new PresetMatrixSource(preset.value);
    } else {
      source = new InteractiveMatrixSource();
    }
  }

  const runner = deps.runner ?? new ChildProcessToolRunner(logger.child({ component: 'tools' }), deps.env);
  const executor = new ReleaseExecutor(config.value, runner, deps.downloader ?? new FetchDownloader(), { log });

  let run: ReleaseRun | undefined;
  try {
    const selection = await source.select();
    run = executor.createRun(selection);
    await executor.execute(run);
  } catch (error) {
    if (!(error instanceof ReleaseError)) throw error;
    if (run !== undefined) formatReport(run).forEach((line) => deps.out(line));
    else log.error(error.message, { code: error.typedError.code });
    return EXIT_FATAL;
  }

  if (run.manifest) {
    deps.out(formatManifest(run.manifest.entries).trimEnd());
  }
  formatReport(run).forEach((line) => deps.out(line));
  return exitCodeFor(run);
}

if (require.main === module) {
  main(process.argv.slice(2), {
    env: process.env,
    cwd: process.cwd(),
    interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
    out: (line) => console.log(line),
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FATAL;
    },
  );
}
