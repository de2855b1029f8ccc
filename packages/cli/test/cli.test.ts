/**
 * Kiln CLI: Command Tests
 *
 * The whole program runs in-process through runCli() with a captured CliIO,
 * in a temporary working directory. Worker processes are disabled.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { EXIT_FATAL, EXIT_INTERRUPTED, runCli } from '../src/commands/index.js';
import type { CliIO } from '../src/session.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const BUILD_FILE = fileURLToPath(new URL('./fixtures/kiln.build.ts', import.meta.url));
const MISSING_INPUT_BUILD = fileURLToPath(new URL('./fixtures/missing-input.build.ts', import.meta.url));
const ANSI = new RegExp(`${String.fromCharCode(27)}\\[[0-9;]*m`, 'g');

let cwd: string;

beforeEach(() => {
  cwd = realpathSync(mkdtempSync(join(tmpdir(), 'kiln-cli-')));
});

afterEach(() => {
  rmSync(cwd, { recursive: true, force: true });
});

interface Run {
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;
}

async function kiln(
  args: ReadonlyArray<string>,
  options: { buildFile?: string; interruptImmediately?: boolean } = {},
): Promise<Run> {
  let stdout = '';
  let stderr = '';
  const io: CliIO = {
    cwd,
    env: {},
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
    onInterrupt: (handler) => {
      if (options.interruptImmediately === true) {
        handler();
      }
      return () => undefined;
    },
    hostDeps: { runner: null },
  };
  const code = await runCli(['--build-file', options.buildFile ?? BUILD_FILE, ...args], io);
  return { code, stdout: stdout.replace(ANSI, ''), stderr: stderr.replace(ANSI, '') };
}

function lines(text: string): string[] {
  return text.split('\n').filter((line) => line.length > 0);
}

// ---------------------------------------------------------------------------
// cli/make
// ---------------------------------------------------------------------------

describe('cli/make', () => {
  it('builds every rule and prints progress and a summary', async () => {
    const run = await kiln(['make']);

    expect(run.code).toBe(0);
    expect(run.stdout).toBe(
      [
        '  make       message',
        '  done       message',
        '  make       shout',
        '  done       shout',
        '',
        '  2 rules: 2 updated, 0 up to date, 0 failed, 0 discarded',
        '',
      ].join('\n'),
    );
    expect(readFileSync(join(cwd, 'out', 'shout.txt'), 'utf-8')).toBe('HELLO');
  });

  it('reports directly requested rules as up to date on the next run', async () => {
    await kiln(['make']);
    const run = await kiln(['make', 'shout']);

    expect(run.code).toBe(0);
    expect(lines(run.stdout)).toEqual([
      '  up to date shout',
      '  2 rules: 0 updated, 2 up to date, 0 failed, 0 discarded',
    ]);
  });

  it('prints a JSON summary keyed by rule name', async () => {
    const run = await kiln(['make', '--json']);
    expect(JSON.parse(run.stdout)).toEqual({
      total: 2,
      updated: 2,
      skip: 0,
      fail: 0,
      discard: 0,
      rules: { message: 'update', shout: 'update' },
    });
  });

  it('runs no action in a dry run', async () => {
    const run = await kiln(['make', '--dry-run']);

    expect(lines(run.stdout)).toEqual([
      '  would make message',
      '  would make shout',
      '  2 rules: 2 to update, 0 up to date, 0 failed, 0 discarded',
    ]);
    expect(existsSync(join(cwd, 'out', 'message.txt'))).toBe(false);
  });

  it('exits 1 and stops after a failing rule', async () => {
    const run = await kiln(['make'], { buildFile: MISSING_INPUT_BUILD });

    expect(run.code).toBe(1);
    expect(lines(run.stdout)).toEqual([
      `  infeasible copy  Input file ${join(cwd, 'src', 'missing.txt')} is missing`,
      '  stopped after a failure; pass --keep-going to build independent rules',
      '  2 rules: 0 updated, 0 up to date, 1 failed, 1 discarded',
    ]);
  });

  it('builds independent rules with --keep-going', async () => {
    const run = await kiln(['make', '--keep-going', '--json'], { buildFile: MISSING_INPUT_BUILD });

    expect(run.code).toBe(1);
    expect(JSON.parse(run.stdout)).toMatchObject({ rules: { copy: 'fail', stamp: 'update' } });
    expect(readFileSync(join(cwd, 'out', 'stamp.txt'), 'utf-8')).toBe('stamp');
  });

  it('exits 2 on an unknown target', async () => {
    const run = await kiln(['make', 'nope']);
    expect(run.code).toBe(EXIT_FATAL);
    expect(run.stderr).toContain("Unknown target 'nope'");
  });

  it('exits 2 on an invalid job count', async () => {
    const run = await kiln(['make', '--jobs', '0']);
    expect(run.code).toBe(EXIT_FATAL);
    expect(run.stderr).toContain('jobs must be a positive integer, got "0"');
  });

  it('stops the build when interrupted', async () => {
    const run = await kiln(['make'], { interruptImmediately: true });
    expect(run.code).toBe(EXIT_INTERRUPTED);
    expect(run.stderr).toBe('interrupted\n');
    expect(existsSync(join(cwd, 'out', 'message.txt'))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// cli/status, cli/list
// ---------------------------------------------------------------------------

describe('cli/status', () => {
  it('lists out-of-date rules before a build', async () => {
    const run = await kiln(['status', '--json']);
    expect(run.code).toBe(0);
    expect(JSON.parse(run.stdout)).toEqual({ total: 2, outOfDate: ['message', 'shout'], infeasible: [] });
  });

  it('reports everything up to date after a build', async () => {
    await kiln(['make']);
    expect((await kiln(['status'])).stdout).toBe('all 2 rules up to date\n');
  });

  it('exits 1 when a rule cannot be updated', async () => {
    const run = await kiln(['status'], { buildFile: MISSING_INPUT_BUILD });
    expect(run.code).toBe(1);
    expect(lines(run.stdout)).toEqual([
      '  out of date  stamp',
      `  infeasible   copy  Input file ${join(cwd, 'src', 'missing.txt')} is missing`,
    ]);
  });
});

describe('cli/list', () => {
  it('lists rules with their outputs and dependencies', async () => {
    const run = await kiln(['list', '--json']);
    expect(JSON.parse(run.stdout)).toEqual([
      { id: 0, name: 'message', outputs: [join('out', 'message.txt')], deps: [] },
      { id: 1, name: 'shout', outputs: [join('out', 'shout.txt')], deps: ['message'] },
    ]);
  });
});

// ---------------------------------------------------------------------------
// cli/clean, cli/touch
// ---------------------------------------------------------------------------

describe('cli/clean and cli/touch', () => {
  it('cleans only the named rule', async () => {
    await kiln(['make']);
    const run = await kiln(['clean', 'shout']);

    expect(run.stdout).toBe('  cleaned  shout\n');
    expect(existsSync(join(cwd, 'out', 'shout.txt'))).toBe(false);
    expect(existsSync(join(cwd, 'out', '.kiln', 'memo', 'shout.txt'))).toBe(false);
    expect(existsSync(join(cwd, 'out', 'message.txt'))).toBe(true);
  });

  it('marks rules up to date without running them', async () => {
    const run = await kiln(['touch']);

    expect(lines(run.stdout)).toEqual(['  touched  message', '  touched  shout']);
    expect(readFileSync(join(cwd, 'out', 'message.txt'), 'utf-8')).toBe('');
    expect((await kiln(['status'])).stdout).toBe('all 2 rules up to date\n');
  });

  it('leaves missing outputs alone with --no-create', async () => {
    await kiln(['touch', '--no-create', 'message']);
    expect(existsSync(join(cwd, 'out', 'message.txt'))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// cli/log, cli/program
// ---------------------------------------------------------------------------

describe('cli/log', () => {
  it('shows the events of previous builds', async () => {
    await kiln(['make']);
    const run = await kiln(['log', '--json']);

    const entries: Array<{ event: string; rule_name: string }> = JSON.parse(run.stdout);
    expect(entries.map((e) => `${e.event} ${e.rule_name}`)).toEqual([
      'Start message',
      'Done message',
      'Start shout',
      'Done shout',
    ]);
  });

  it('limits the number of entries', async () => {
    await kiln(['make']);
    const run = await kiln(['log', '--limit', '1']);
    expect(lines(run.stdout)).toHaveLength(1);
    expect(run.stdout).toContain(`${'Done'.padEnd(17)}shout`);
  });

  it('prints nothing for a project that was never built', async () => {
    const run = await kiln(['log']);
    expect(run).toEqual({ code: 0, stdout: '', stderr: '' });
  });
});

describe('cli/program', () => {
  it('prints help and exits 0', async () => {
    const run = await kiln(['--help']);
    expect(run.code).toBe(0);
    expect(run.stdout).toContain('Usage: kiln');
  });

  it('rejects unknown commands', async () => {
    const run = await kiln(['bake']);
    expect(run.code).toBe(1);
    expect(run.stderr).toContain("unknown command 'bake'");
  });
});
