/**
 * kiln touch: Mark targets up to date without running their actions
 *
 * Sets every output's modification time to now (creating missing outputs as
 * empty files unless --no-create) and rewrites the memo record from the
 * current arguments, so the next build skips the rules.
 */

import { Command } from 'commander';
import { t } from '../output/theme.js';
import type { CliSession } from '../session.js';

interface TouchCommandOptions {
  create: boolean;
  memo: boolean;
  files: boolean;
}

export function touchCommand(session: CliSession): Command {
  return new Command('touch')
    .description('Mark the targets up to date (every rule when none is named)')
    .argument('[targets...]', 'rule names, group names or *-globs over rule names')
    .option('--no-create', 'do not create missing outputs')
    .option('--no-memo', 'leave memo records alone')
    .option('--no-files', 'only rewrite memo records')
    .action(async (targets: string[], options: TouchCommandOptions, command: Command) => {
      const host = await session.loadHost(command);
      const time = Date.now();
      for (const rule of host.targetRules(targets)) {
        rule.touch({ files: options.files, memo: options.memo, create: options.create, time });
        session.print(`  ${t.muted('touched')}  ${t.white(rule.name)}`);
      }
    });
}
