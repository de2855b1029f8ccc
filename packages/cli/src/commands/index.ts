/**
 * commands/index.ts: the Commander program, configured for one session.
 *
 * Imported by:
 *   src/bin/kiln.ts   (process entry point)
 *   src/index.ts      (library use and tests)
 */

import { Command, CommanderError } from 'commander';
import { BuildInterruptedError } from '@kiln/kernel';
import { t } from '../output/theme.js';
import { CliSession, processIO, type CliIO } from '../session.js';
import { cleanCommand } from './clean.js';
import { listCommand } from './list.js';
import { logCommand } from './log.js';
import { makeCommand } from './make.js';
import { statusCommand } from './status.js';
import { touchCommand } from './touch.js';

export const EXIT_FATAL = 2;
export const EXIT_INTERRUPTED = 130;

export function createProgram(session: CliSession): Command {
  const program = new Command('kiln')
    .description('Incremental build engine: rebuilds what changed, memoizes what did not.')
    .version('0.1.0')
    .option('-f, --build-file <path>', 'build definition module (default: kiln.build.ts)')
    .option('--state-dir <dir>', 'directory for the build event log (default: .kiln)')
    .exitOverride()
    .configureOutput({
      writeOut: session.io.stdout,
      writeErr: session.io.stderr,
    });

  const commands = [
    makeCommand(session),
    statusCommand(session),
    cleanCommand(session),
    touchCommand(session),
    listCommand(session),
    logCommand(session),
  ];
  for (const command of commands) {
    program.addCommand(command.copyInheritedSettings(program));
  }
  return program;
}

function describeError(err: unknown): string {
  if (err instanceof AggregateError) {
    return err.errors.map(describeError).join('\n');
  }
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/**
 * Run the CLI with user arguments (without the node and script paths) and
 * resolve to the process exit code.
 */
export async function runCli(args: ReadonlyArray<string>, io: CliIO = processIO()): Promise<number> {
  const session = new CliSession(io);
  try {
    await createProgram(session).parseAsync([...args], { from: 'user' });
    return session.exitCode;
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof BuildInterruptedError) {
      session.warn(t.amber('interrupted'));
      return EXIT_INTERRUPTED;
    }
    session.warn(t.red(describeError(err)));
    return EXIT_FATAL;
  }
}
