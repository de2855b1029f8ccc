/**
 * Kiln Runtime Host: Build Configuration
 *
 * Resolves the settings of a build with the following precedence, highest
 * first:
 *
 *   1. Explicit flags (from the CLI)
 *   2. Environment: KILN_BUILD_FILE, KILN_STATE_DIR, KILN_JOBS,
 *      KILN_KEEP_GOING, KILN_ISOLATE, KILN_MEMO_ENCODING, KILN_MEMO_KEY
 *   3. kiln.config.json in the working directory
 *   4. Defaults
 *
 * The memo key is accepted from the environment only, never from the
 * config file or a flag, so it stays out of version control and shell
 * history.
 *
 * Every value is validated where it is read; an invalid value raises
 * ConfigError naming its source.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { MEMO_ENCODINGS, type MemoEncoding } from '@kiln/kernel';
import { ConfigError } from '../errors.js';

export const CONFIG_FILE_NAME = 'kiln.config.json';
export const DEFAULT_BUILD_FILE = 'kiln.build.ts';
export const DEFAULT_STATE_DIR = '.kiln';

export interface BuildConfig {
  readonly cwd: string;
  /** Absolute path of the build definition module. */
  readonly buildFile: string;
  /** Absolute path of the directory holding the build log. */
  readonly stateDir: string;
  readonly jobs: number;
  readonly keepGoing: boolean;
  /** Run transferable module actions in worker processes when jobs > 1. */
  readonly isolate: boolean;
  readonly memoEncoding: MemoEncoding;
  readonly memoKey: string | undefined;
}

/** Settings a single layer may provide. Unset fields fall through. */
export interface BuildConfigFlags {
  readonly buildFile?: string | undefined;
  readonly stateDir?: string | undefined;
  readonly jobs?: number | string | undefined;
  readonly keepGoing?: boolean | undefined;
  readonly isolate?: boolean | undefined;
  readonly memoEncoding?: string | undefined;
}

export interface ResolveBuildConfigOptions {
  /** Working directory. Default: process.cwd(). */
  readonly cwd?: string | undefined;
  readonly flags?: BuildConfigFlags | undefined;
  /** Default: process.env. */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
}

// ---------------------------------------------------------------------------
// Value parsers
// ---------------------------------------------------------------------------

function parseJobs(value: number | string, source: string): number {
  const jobs = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new ConfigError(source, `jobs must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return jobs;
}

const TRUE_WORDS = ['1', 'true', 'yes', 'on'];
const FALSE_WORDS = ['0', 'false', 'no', 'off'];

function parseBoolean(value: boolean | string, source: string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) {
    return true;
  }
  if (FALSE_WORDS.includes(word)) {
    return false;
  }
  throw new ConfigError(source, `expected a boolean, got ${JSON.stringify(value)}`);
}

function isMemoEncoding(value: string): value is MemoEncoding {
  return MEMO_ENCODINGS.some((encoding) => encoding === value);
}

function parseEncoding(value: string, source: string): MemoEncoding {
  if (!isMemoEncoding(value)) {
    throw new ConfigError(
      source,
      `memo encoding must be one of ${MEMO_ENCODINGS.join(', ')}, got ${JSON.stringify(value)}`,
    );
  }
  return value;
}

function parsePath(value: string, source: string): string {
  if (value.trim() === '') {
    throw new ConfigError(source, 'path must not be empty');
  }
  return value;
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

/** One source of settings. Undefined fields fall through to lower layers. */
export interface ConfigLayer {
  readonly source: string;
  readonly buildFile?: string | undefined;
  readonly stateDir?: string | undefined;
  readonly jobs?: number | string | undefined;
  readonly keepGoing?: boolean | string | undefined;
  readonly isolate?: boolean | string | undefined;
  readonly memoEncoding?: string | undefined;
}

type LayerKey = Exclude<keyof ConfigLayer, 'source'>;

function flagLayer(flags: BuildConfigFlags): ConfigLayer {
  return { source: 'flags', ...flags };
}

function envLayer(env: Readonly<Record<string, string | undefined>>): ConfigLayer {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === '' ? undefined : value;
  };
  return {
    source: 'environment',
    buildFile: read('KILN_BUILD_FILE'),
    stateDir: read('KILN_STATE_DIR'),
    jobs: read('KILN_JOBS'),
    keepGoing: read('KILN_KEEP_GOING'),
    isolate: read('KILN_ISOLATE'),
    memoEncoding: read('KILN_MEMO_ENCODING'),
  };
}

function expectType(
  record: Record<string, unknown>,
  key: string,
  type: 'string' | 'number' | 'boolean',
  source: string,
): void {
  const value = record[key];
  if (value !== undefined && typeof value !== type) {
    throw new ConfigError(source, `'${key}' must be a ${type}`);
  }
}

/**
 * Read kiln.config.json from `cwd`. A missing file is an empty layer; a
 * file that is not a JSON object, or has fields of the wrong type, is an
 * error.
 */
export function readConfigFile(cwd: string): ConfigLayer {
  const path = resolve(cwd, CONFIG_FILE_NAME);
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return { source: path };
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError(path, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(path, 'expected a JSON object');
  }

  const record: Record<string, unknown> = { ...raw };
  expectType(record, 'buildFile', 'string', path);
  expectType(record, 'stateDir', 'string', path);
  expectType(record, 'memoEncoding', 'string', path);
  expectType(record, 'keepGoing', 'boolean', path);
  expectType(record, 'isolate', 'boolean', path);
  expectType(record, 'jobs', 'number', path);
  if ('memoKey' in record) {
    throw new ConfigError(path, "'memoKey' is not accepted in the config file; set KILN_MEMO_KEY");
  }

  const str = (key: string): string | undefined => {
    const value = record[key];
    return typeof value === 'string' ? value : undefined;
  };
  const bool = (key: string): boolean | undefined => {
    const value = record[key];
    return typeof value === 'boolean' ? value : undefined;
  };
  const jobs = record['jobs'];
  return {
    source: path,
    buildFile: str('buildFile'),
    stateDir: str('stateDir'),
    jobs: typeof jobs === 'number' ? jobs : undefined,
    keepGoing: bool('keepGoing'),
    isolate: bool('isolate'),
    memoEncoding: str('memoEncoding'),
  };
}

/** The first layer that sets `key`, parsed; otherwise the fallback. */
function pick<K extends LayerKey, R>(
  layers: ReadonlyArray<ConfigLayer>,
  key: K,
  parse: (value: NonNullable<ConfigLayer[K]>, source: string) => R,
  fallback: R,
): R {
  for (const layer of layers) {
    const value = layer[key];
    if (value !== undefined && value !== null) {
      return parse(value, layer.source);
    }
  }
  return fallback;
}

// ---------------------------------------------------------------------------
// Primary resolution function
// ---------------------------------------------------------------------------

/**
 * @throws ConfigError if any layer holds an invalid value
 */
export function resolveBuildConfig(options: ResolveBuildConfigOptions = {}): BuildConfig {
  const cwd = resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const layers = [flagLayer(options.flags ?? {}), envLayer(env), readConfigFile(cwd)];

  const memoKey = env['KILN_MEMO_KEY'];
  return {
    cwd,
    buildFile: resolve(cwd, pick(layers, 'buildFile', parsePath, DEFAULT_BUILD_FILE)),
    stateDir: resolve(cwd, pick(layers, 'stateDir', parsePath, DEFAULT_STATE_DIR)),
    jobs: pick(layers, 'jobs', parseJobs, 1),
    keepGoing: pick(layers, 'keepGoing', parseBoolean, false),
    isolate: pick(layers, 'isolate', parseBoolean, true),
    memoEncoding: pick(layers, 'memoEncoding', parseEncoding, 'str-hash'),
    memoKey: memoKey === undefined || memoKey === '' ? undefined : memoKey,
  };
}
