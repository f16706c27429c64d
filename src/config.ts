/**
 * Release configuration.
 *
 * Built once at process start and passed to every component constructor.
 * Sources, lowest to highest precedence: built-in defaults,
 * `crossforge.config.json` in the project root, CROSSFORGE_* environment
 * variables, then command-line flags.
 *
 * Usage:
 *   const fileOverrides = await loadConfigFile(projectDir);
 *   const config = createReleaseConfig({
 *     ...fileOverrides,
 *     ...configFromEnv(process.env),
 *     failFast: true,
 *   });
 *   const result = validateReleaseConfig(config);
 *   if (!result.valid) throw new ReleaseError(invalidConfigurationError(result.errors));
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ChecksumAlgorithm } from './domain/checksum';

/** External executables the pipeline invokes. */
export interface ToolPaths {
  go: string;
  xgo: string;
  upx: string;
  tar: string;
  zip: string;
  unzip: string;
  git: string;
  sudo: string;
  apt: string;
}

export interface ReleaseConfig {
  appName: string;
  author: string;
  /** Fixed version string; resolved from the latest git tag when absent. */
  version?: string;
  /** IANA time zone the build timestamp is rendered in. */
  timeZone: string;
  /** Root of the application source tree. */
  projectDir: string;
  /** Go package path of the main program, relative to projectDir. */
  mainPackage: string;
  buildTags: string[];
  /** Output directory; relative paths resolve against projectDir. */
  outputDir: string;
  /** Files bundled into every archive, relative to projectDir. */
  sharedFiles: string[];
  /** User-scoped toolchain cache root. */
  toolchainDir: string;
  muslBaseUrl: string;
  ndkBaseUrl: string;
  ndkVersion: string;
  androidApiLevel: number;
  /** Also produce upx-packed Windows executables. */
  packWindows: boolean;
  packLevel: number;
  checksumAlgorithm: ChecksumAlgorithm;
  /** Abort the run on the first failed cell instead of recording it. */
  failFast: boolean;
  /** Install the glibc cross compilers with apt before dynamic Linux builds. */
  installSystemPackages: boolean;
  tools: ToolPaths;
}

/** Overrides accepted by createReleaseConfig. */
export type ReleaseConfigOverrides = Partial<Omit<ReleaseConfig, 'tools'>> & {
  tools?: Partial<ToolPaths>;
};

export const DEFAULT_TOOLS: ToolPaths = {
  go: 'go',
  xgo: 'xgo',
  upx: 'upx',
  tar: 'tar',
  zip: 'zip',
  unzip: 'unzip',
  git: 'git',
  sudo: 'sudo',
  apt: 'apt',
};

const TOOL_NAMES = ['go', 'xgo', 'upx', 'tar', 'zip', 'unzip', 'git', 'sudo', 'apt'] as const satisfies readonly (keyof ToolPaths)[];

export const CONFIG_FILE_NAME = 'crossforge.config.json';

export function defaultToolchainDir(): string {
  return path.join(os.homedir(), '.crossforge', 'toolchains');
}

/** Create an immutable release config with defaults. */
export function createReleaseConfig(overrides: ReleaseConfigOverrides = {}): Readonly<ReleaseConfig> {
  const config: ReleaseConfig = {
    appName: overrides.appName ?? 'bestsub',
    author: overrides.author ?? 'bestrui',
    version: overrides.version,
    timeZone: overrides.timeZone ?? 'Asia/Shanghai',
    projectDir: path.resolve(overrides.projectDir ?? process.cwd()),
    mainPackage: overrides.mainPackage ?? './cmd/server',
    buildTags: [...(overrides.buildTags ?? ['jsoniter'])],
    outputDir: overrides.outputDir ?? 'dist',
    sharedFiles: [...(overrides.sharedFiles ?? ['README.md', 'LICENSE'])],
    toolchainDir: overrides.toolchainDir ?? defaultToolchainDir(),
    muslBaseUrl: overrides.muslBaseUrl ?? 'https://musl.cc/',
    ndkBaseUrl: overrides.ndkBaseUrl ?? 'https://dl.google.com/android/repository/',
    ndkVersion: overrides.ndkVersion ?? 'r27c',
    androidApiLevel: overrides.androidApiLevel ?? 24,
    packWindows: overrides.packWindows ?? true,
    packLevel: overrides.packLevel ?? 9,
    checksumAlgorithm: overrides.checksumAlgorithm ?? 'md5',
    failFast: overrides.failFast ?? false,
    installSystemPackages: overrides.installSystemPackages ?? false,
    tools: { ...DEFAULT_TOOLS, ...overrides.tools },
  };
  Object.freeze(config.buildTags);
  Object.freeze(config.sharedFiles);
  Object.freeze(config.tools);
  return Object.freeze(config);
}

/** Absolute output directory of a config. */
export function resolveOutputDir(config: Pick<ReleaseConfig, 'projectDir' | 'outputDir'>): string {
  return path.resolve(config.projectDir, config.outputDir);
}

/** Validation result for a release configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Validate a release configuration for consistency. */
export function validateReleaseConfig(config: ReleaseConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!NAME_PATTERN.test(config.appName)) {
    errors.push(`appName "${config.appName}" must be a plain file name (letters, digits, ".", "_", "-")`);
  }
  if (config.author.trim() === '') {
    errors.push('author must not be empty');
  }
  if (config.version !== undefined && config.version.trim() === '') {
    errors.push('version must not be empty when set');
  }
  // both are embedded in single-quoted -X linker flags
  if (config.author.includes("'")) {
    errors.push(`author "${config.author}" must not contain a single quote`);
  }
  if (config.version?.includes("'")) {
    errors.push(`version "${config.version}" must not contain a single quote`);
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: config.timeZone });
  } catch {
    errors.push(`timeZone "${config.timeZone}" is not a valid IANA time zone`);
  }
  if (config.mainPackage.trim() === '') {
    errors.push('mainPackage must not be empty');
  }
  if (path.resolve(config.projectDir, config.outputDir) === path.resolve(config.projectDir)) {
    errors.push('outputDir must not be the project directory itself');
  }
  if (config.sharedFiles.length === 0) {
    warnings.push('sharedFiles is empty; archives will contain only the binary');
  }
  const sharedNames = config.sharedFiles.map((f) => path.basename(f));
  if (new Set(sharedNames).size !== sharedNames.length) {
    errors.push('sharedFiles must have distinct file names');
  }
  if (!Number.isInteger(config.androidApiLevel) || config.androidApiLevel < 21) {
    errors.push(`androidApiLevel must be an integer >= 21, got ${config.androidApiLevel}`);
  }
  if (!Number.isInteger(config.packLevel) || config.packLevel < 1 || config.packLevel > 9) {
    errors.push(`packLevel must be an integer between 1 and 9, got ${config.packLevel}`);
  }
  if (!/^r\d+[a-z]?$/.test(config.ndkVersion)) {
    errors.push(`ndkVersion "${config.ndkVersion}" does not look like an NDK release (e.g. r27c)`);
  }
  for (const [name, url] of [['muslBaseUrl', config.muslBaseUrl], ['ndkBaseUrl', config.ndkBaseUrl]]) {
    if (!/^https?:\/\//.test(url)) {
      errors.push(`${name} must be an http(s) URL, got "${url}"`);
    } else if (!url.endsWith('/')) {
      warnings.push(`${name} does not end with "/"; bundle names are appended directly`);
    }
  }
  for (const [name, value] of Object.entries(config.tools)) {
    if (value.trim() === '') {
      errors.push(`tools.${name} must not be empty`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Parsed overrides plus the problems found while reading them. */
export interface ParsedOverrides {
  overrides: ReleaseConfigOverrides;
  errors: string[];
}

const STRING_KEYS = [
  'appName', 'author', 'version', 'timeZone', 'mainPackage', 'outputDir',
  'toolchainDir', 'muslBaseUrl', 'ndkBaseUrl', 'ndkVersion',
] as const;
const BOOLEAN_KEYS = ['packWindows', 'failFast', 'installSystemPackages'] as const;
const NUMBER_KEYS = ['androidApiLevel', 'packLevel'] as const;
const STRING_LIST_KEYS = ['buildTags', 'sharedFiles'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/** Narrow an untyped object (e.g. parsed JSON) into config overrides. */
export function parseConfigOverrides(raw: unknown, source: string): ParsedOverrides {
  const errors: string[] = [];
  const overrides: ReleaseConfigOverrides = {};
  if (!isRecord(raw)) {
    return { overrides, errors: [`${source}: expected a JSON object`] };
  }

  const known = new Set<string>([...STRING_KEYS, ...BOOLEAN_KEYS, ...NUMBER_KEYS, ...STRING_LIST_KEYS, 'tools', 'checksumAlgorithm']);
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) errors.push(`${source}: unknown key "${key}"`);
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'string') overrides[key] = value;
    else errors.push(`${source}: "${key}" must be a string`);
  }
  for (const key of BOOLEAN_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'boolean') overrides[key] = value;
    else errors.push(`${source}: "${key}" must be a boolean`);
  }
  for (const key of NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'number') overrides[key] = value;
    else errors.push(`${source}: "${key}" must be a number`);
  }
  for (const key of STRING_LIST_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isStringList(value)) overrides[key] = value;
    else errors.push(`${source}: "${key}" must be an array of strings`);
  }

  const algorithm = raw.checksumAlgorithm;
  if (algorithm !== undefined) {
    if (algorithm === 'md5' || algorithm === 'sha256') overrides.checksumAlgorithm = algorithm;
    else errors.push(`${source}: "checksumAlgorithm" must be "md5" or "sha256"`);
  }

  const tools = raw.tools;
  if (tools !== undefined) {
    if (!isRecord(tools)) {
      errors.push(`${source}: "tools" must be an object`);
    } else {
      const parsed: Partial<ToolPaths> = {};
      for (const name of TOOL_NAMES) {
        const value = tools[name];
        if (value === undefined) continue;
        if (typeof value === 'string') parsed[name] = value;
        else errors.push(`${source}: "tools.${name}" must be a string`);
      }
      for (const key of Object.keys(tools)) {
        if (!(key in DEFAULT_TOOLS)) errors.push(`${source}: unknown tool "${key}"`);
      }
      overrides.tools = parsed;
    }
  }

  return { overrides, errors };
}

/**
 * Read `crossforge.config.json` from the project root.
 * A missing file yields no overrides; unreadable or malformed files are errors.
 */
export async function loadConfigFile(projectDir: string): Promise<ParsedOverrides> {
  const file = path.join(projectDir, CONFIG_FILE_NAME);
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return { overrides: {}, errors: [] };
    }
    return { overrides: {}, errors: [`${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return { overrides: {}, errors: [`${CONFIG_FILE_NAME}: invalid JSON (${error instanceof Error ? error.message : String(error)})`] };
  }
  return parseConfigOverrides(raw, CONFIG_FILE_NAME);
}

const ENV_STRING_KEYS: Record<string, (typeof STRING_KEYS)[number]> = {
  CROSSFORGE_APP_NAME: 'appName',
  CROSSFORGE_AUTHOR: 'author',
  CROSSFORGE_VERSION: 'version',
  CROSSFORGE_TIME_ZONE: 'timeZone',
  CROSSFORGE_OUTPUT_DIR: 'outputDir',
  CROSSFORGE_TOOLCHAIN_DIR: 'toolchainDir',
  CROSSFORGE_NDK_VERSION: 'ndkVersion',
};

/** Overrides from CROSSFORGE_* environment variables. Empty values are ignored. */
export function configFromEnv(env: NodeJS.ProcessEnv): ReleaseConfigOverrides {
  const overrides: ReleaseConfigOverrides = {};
  for (const [variable, key] of Object.entries(ENV_STRING_KEYS)) {
    const value = env[variable];
    if (value) overrides[key] = value;
  }
  const algorithm = env.CROSSFORGE_CHECKSUM;
  if (algorithm === 'md5' || algorithm === 'sha256') {
    overrides.checksumAlgorithm = algorithm;
  }
  return overrides;
}
