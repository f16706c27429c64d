/**
 * External tool invocation.
 *
 * Compilers, the cross-build service, archivers and the executable packer are
 * black boxes started through a ToolRunner. Invocations never go through a
 * shell. An executable that cannot be started raises ToolNotFoundError; a
 * non-zero exit status is returned to the caller, which decides what it means.
 */

import { spawn } from 'child_process';
import { constants, promises as fs } from 'fs';
import path from 'path';
import { ToolNotFoundError } from '../domain/errors';
import { Logger } from '../logger';

export interface ToolInvocation {
  command: string;
  args: string[];
  cwd?: string;
  /** Variables layered over the runner's base environment. */
  env?: Record<string, string | undefined>;
}

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolResult>;
  /** Resolve a command to an executable path, or undefined when unavailable. */
  which(command: string): Promise<string | undefined>;
}

/** Last lines of a tool's output, for error diagnostics. */
export function tailOutput(result: ToolResult, maxLines = 20): string {
  const text = (result.stderr.trim() || result.stdout.trim());
  const lines = text.split('\n');
  return lines.slice(-maxLines).join('\n');
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return false;
    await fs.access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Whether a working directory exists; an unset one is the current directory. */
export async function isDirectory(dir: string | undefined): Promise<boolean> {
  if (dir === undefined) return true;
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Look a command up the way a shell would: paths containing a separator are
 * checked as-is, bare names are searched along PATH.
 */
export async function findExecutable(command: string, searchPath: string | undefined): Promise<string | undefined> {
  if (command.includes('/') || command.includes(path.sep)) {
    return (await isExecutable(command)) ? path.resolve(command) : undefined;
  }
  for (const dir of (searchPath ?? '').split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (await isExecutable(candidate)) return candidate;
  }
  return undefined;
}

/** Default runner backed by child_process.spawn. */
export class ChildProcessToolRunner implements ToolRunner {
  constructor(
    private readonly log: Logger,
    private readonly baseEnv: NodeJS.ProcessEnv = process.env,
  ) {}

  async which(command: string): Promise<string | undefined> {
    return findExecutable(command, this.baseEnv.PATH);
  }

  run(invocation: ToolInvocation): Promise<ToolResult> {
    const env: NodeJS.ProcessEnv = { ...this.baseEnv };
    for (const [key, value] of Object.entries(invocation.env ?? {})) {
      if (value !== undefined) env[key] = value;
    }

    this.log.debug('Running tool', {
      command: invocation.command,
      args: invocation.args,
      cwd: invocation.cwd,
    });

    return new Promise<ToolResult>((resolve, reject) => {
      const child = spawn(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      let spawnFailed = false;

      // spawn reports a missing cwd as ENOENT too
      child.on('error', (error: NodeJS.ErrnoException) => {
        spawnFailed = true;
        if (error.code !== 'ENOENT') {
          reject(error);
          return;
        }
        isDirectory(invocation.cwd).then(
          (cwdExists) =>
            reject(
              cwdExists
                ? new ToolNotFoundError(invocation.command)
                : new Error(`Working directory does not exist: ${invocation.cwd}`),
            ),
          reject,
        );
      });

      child.on('close', (code) => {
        if (spawnFailed) return;
        resolve({
          exitCode: code ?? 1,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      });
    });
  }
}
