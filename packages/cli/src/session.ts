/**
 * session.ts: what a command needs from the outside world.
 *
 * Commands never touch process.stdout, process.env or signal handlers
 * directly; they go through the CliIO of their CliSession, so the whole
 * program can run inside a test.
 */

import type { Command } from 'commander';
import {
  createBuildHost,
  resolveBuildConfig,
  type BuildConfig,
  type BuildConfigFlags,
  type BuildHost,
  type BuildHostDeps,
} from '@kiln/runtime-host';

export interface CliIO {
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Register an interrupt handler (SIGINT); returns its removal. */
  readonly onInterrupt: (handler: () => void) => () => void;
  /** Overrides for the build host (tests replace the process runner). */
  readonly hostDeps?: BuildHostDeps | undefined;
}

export function processIO(): CliIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    onInterrupt: (handler) => {
      process.on('SIGINT', handler);
      return () => {
        process.off('SIGINT', handler);
      };
    },
  };
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

export class CliSession {
  /** Highest exit code requested by the command that ran. */
  exitCode = 0;

  constructor(readonly io: CliIO) {}

  fail(code: number): void {
    this.exitCode = Math.max(this.exitCode, code);
  }

  print(line = ''): void {
    this.io.stdout(`${line}\n`);
  }

  warn(line: string): void {
    this.io.stderr(`${line}\n`);
  }

  /** Resolve the build configuration from the global options and `flags`. */
  config(command: Command, flags: BuildConfigFlags = {}): BuildConfig {
    const globals: Record<string, unknown> = command.optsWithGlobals();
    return resolveBuildConfig({
      cwd: this.io.cwd,
      env: this.io.env,
      flags: {
        buildFile: stringOption(globals, 'buildFile'),
        stateDir: stringOption(globals, 'stateDir'),
        ...flags,
      },
    });
  }

  /** Create a build host and load the build file into it. */
  async loadHost(command: Command, flags: BuildConfigFlags = {}): Promise<BuildHost> {
    const host = createBuildHost(this.config(command, flags), this.io.hostDeps);
    await host.loadBuildFile();
    return host;
  }
}
