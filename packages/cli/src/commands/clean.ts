/**
 * kiln clean: Remove outputs and memo records
 *
 * Only the named rules are cleaned, not their dependencies.
 */

import { Command } from 'commander';
import { t } from '../output/theme.js';
import type { CliSession } from '../session.js';

export function cleanCommand(session: CliSession): Command {
  return new Command('clean')
    .description("Delete the targets' outputs and memo records (every rule when none is named)")
    .argument('[targets...]', 'rule names, group names or *-globs over rule names')
    .action(async (targets: string[], _options: unknown, command: Command) => {
      const host = await session.loadHost(command);
      for (const rule of host.targetRules(targets)) {
        rule.clean();
        session.print(`  ${t.muted('cleaned')}  ${t.white(rule.name)}`);
      }
    });
}
