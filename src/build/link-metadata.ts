/**
 * Link-time metadata.
 *
 * Version, build timestamp and author are resolved once per run and
 * injected into every binary with `-X` linker flags, so all cells of a run
 * carry identical values.
 */

import { ReleaseConfig } from '../config';
import { LinkMetadata } from '../domain/artifact';
import {
  Result,
  ToolNotFoundError,
  describeError,
  err,
  ok,
  toolMissingError,
  versionUnresolvedError,
} from '../domain/errors';
import { ToolRunner, tailOutput } from '../tools/tool-runner';

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/**
 * Format a timestamp as `YYYY-MM-DD HH:MM:SS +ZZZZ` in the given time zone,
 * e.g. `2026-10-19 10:30:00 +0800` for Asia/Shanghai.
 */
export function formatBuildTime(date: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const fields: Record<string, number> = {};
  for (const part of formatter.formatToParts(date)) {
    if (part.type !== 'literal') fields[part.type] = Number(part.value);
  }
  const { year, month, day, hour, minute, second } = fields;

  // Offset = wall clock in the zone minus UTC, at second precision.
  const wallClockMs = Date.UTC(year, month - 1, day, hour, minute, second);
  const utcMs = Math.floor(date.getTime() / 1000) * 1000;
  const offsetMinutes = Math.round((wallClockMs - utcMs) / 60000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);

  return (
    `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)} ` +
    `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`
  );
}

/** `-ldflags` value for a build; static builds add the external linker flags. */
export function linkerFlags(metadata: LinkMetadata, options: { static?: boolean } = {}): string {
  const injections = [
    `-X 'main.Version=${metadata.version}'`,
    `-X 'main.BuildTime=${metadata.buildTime}'`,
    `-X 'main.Author=${metadata.author}'`,
  ].join(' ');
  return options.static ? `-extldflags '-static -fpic' ${injections}` : injections;
}

/** Resolve the run's link metadata. The version comes from the latest tag unless configured. */
export async function resolveLinkMetadata(
  config: Pick<ReleaseConfig, 'version' | 'author' | 'timeZone' | 'projectDir' | 'tools'>,
  runner: ToolRunner,
  now: Date,
): Promise<Result<LinkMetadata>> {
  let version = config.version;

  if (version === undefined) {
    try {
      const result = await runner.run({
        command: config.tools.git,
        args: ['describe', '--tags', '--abbrev=0'],
        cwd: config.projectDir,
      });
      if (result.exitCode !== 0) {
        return err(versionUnresolvedError(tailOutput(result) || `git exited with code ${result.exitCode}`));
      }
      version = result.stdout.trim();
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        return err(toolMissingError(error.tool));
      }
      return err(versionUnresolvedError(describeError(error)));
    }
    if (version === '') {
      return err(versionUnresolvedError('git printed no tag'));
    }
  }

  if (version.includes("'")) {
    return err(versionUnresolvedError(`version "${version}" contains a single quote`));
  }

  return ok({
    version,
    buildTime: formatBuildTime(now, config.timeZone),
    author: config.author,
  });
}
