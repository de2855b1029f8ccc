/**
 * kiln list: Registered rules with their outputs and dependencies
 */

import { Command } from 'commander';
import { relative } from 'node:path';
import { t } from '../output/theme.js';
import type { CliSession } from '../session.js';

interface RuleListing {
  readonly id: number;
  readonly name: string;
  readonly outputs: string[];
  readonly deps: string[];
}

export function listCommand(session: CliSession): Command {
  return new Command('list')
    .description('List the rules the build file registers')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const host = await session.loadHost(command);
      const { rules } = host.store;
      const listings: RuleListing[] = rules.map((rule) => ({
        id: rule.id,
        name: rule.name,
        outputs: rule.outputs.map((output) => relative(host.config.cwd, output)),
        deps: [...rule.deps].map((id) => rules[id]?.name ?? String(id)),
      }));

      if (options.json === true) {
        session.print(JSON.stringify(listings, null, 2));
        return;
      }
      if (listings.length === 0) {
        session.print(t.muted('(no rules)'));
        return;
      }
      for (const listing of listings) {
        session.print(t.white(listing.name));
        session.print(`  ${t.muted('outputs')}  ${listing.outputs.join(', ')}`);
        if (listing.deps.length > 0) {
          session.print(`  ${t.muted('deps   ')}  ${listing.deps.join(', ')}`);
        }
      }
    });
}
