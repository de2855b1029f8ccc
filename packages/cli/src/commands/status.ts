/**
 * kiln status: What would rebuild
 *
 * A dry run over the targets that keeps going past failures. Lists
 * out-of-date rules and rules that cannot be updated (missing original
 * inputs); exits 1 when there are any of the latter.
 */

import { Command } from 'commander';
import { BuildEventType } from '@kiln/kernel';
import { t } from '../output/theme.js';
import type { CliSession } from '../session.js';

interface Infeasible {
  readonly rule: string;
  readonly reason: string;
}

export function statusCommand(session: CliSession): Command {
  return new Command('status')
    .description('List the rules a build of the targets would update')
    .argument('[targets...]', 'rule names, group names or *-globs over rule names')
    .option('--json', 'Output as JSON')
    .action(async (targets: string[], options: { json?: boolean }, command: Command) => {
      const host = await session.loadHost(command);
      const outOfDate: string[] = [];
      const infeasible: Infeasible[] = [];

      const summary = await host.make(targets, {
        dryRun: true,
        keepGoing: true,
        jobs: 1,
        observer: (event) => {
          if (event.type === BuildEventType.DryRun) {
            outOfDate.push(event.rule.name);
          } else if (event.type === BuildEventType.UpdateInfeasible) {
            infeasible.push({ rule: event.rule.name, reason: event.reason });
          }
        },
      });

      if (infeasible.length > 0) {
        session.fail(1);
      }
      if (options.json === true) {
        session.print(JSON.stringify({ total: summary.total, outOfDate, infeasible }, null, 2));
        return;
      }

      if (outOfDate.length === 0 && infeasible.length === 0) {
        session.print(t.green(`all ${summary.total} rules up to date`));
        return;
      }
      for (const name of outOfDate) {
        session.print(`  ${t.amber('out of date')}  ${t.white(name)}`);
      }
      for (const { rule, reason } of infeasible) {
        session.print(`  ${t.red('infeasible ')}  ${t.white(rule)}  ${t.text(reason)}`);
      }
      if (summary.discard > 0) {
        session.print(t.dim(`  ${summary.discard} dependent rules not checked`));
      }
    });
}
