/**
 * kiln make: Bring targets up to date
 *
 * Exit codes:
 *   0  every rule is up to date or was updated
 *   1  at least one rule failed
 *   2  fatal error (configuration, graph, or an error the engine could not
 *      attribute to a rule)
 * 130  interrupted (SIGINT)
 */

import { Command } from 'commander';
import type { BuildObserver } from '@kiln/kernel';
import { renderEvent } from '../output/events.js';
import { t } from '../output/theme.js';
import { renderSummary, summaryToJson } from '../output/summary.js';
import type { CliSession } from '../session.js';

interface MakeCommandOptions {
  jobs?: string;
  dryRun?: boolean;
  keepGoing?: boolean;
  json?: boolean;
}

export function makeCommand(session: CliSession): Command {
  return new Command('make')
    .description('Bring targets up to date (every rule when no target is named)')
    .argument('[targets...]', 'rule names, group names or *-globs over rule names')
    .option('-j, --jobs <n>', 'number of rules to run concurrently')
    .option('-n, --dry-run', 'report what would be rebuilt without running any action')
    .option('-k, --keep-going', 'continue with independent rules after a failure')
    .option('--json', 'print the summary as JSON instead of progress lines')
    .action(async (targets: string[], options: MakeCommandOptions, command: Command) => {
      const host = await session.loadHost(command, {
        jobs: options.jobs,
        keepGoing: options.keepGoing,
      });
      const dryRun = options.dryRun === true;
      const observer: BuildObserver | undefined =
        options.json === true
          ? undefined
          : (event) => {
              const line = renderEvent(event);
              if (line !== null) {
                session.print(line);
              }
            };

      const controller = new AbortController();
      const release = session.io.onInterrupt(() => controller.abort());
      try {
        const summary = await host.make(targets, {
          dryRun,
          observer,
          signal: controller.signal,
          onProbeError: (err) => {
            const reason = err instanceof Error ? err.message : String(err);
            session.warn(t.amber(`worker processes unavailable (${reason}); running every rule in-process`));
          },
        });
        if (options.json === true) {
          const nameOf = (id: number): string => host.store.rules[id]?.name ?? String(id);
          session.print(JSON.stringify(summaryToJson(summary, nameOf), null, 2));
        } else {
          session.print(renderSummary(summary, dryRun));
        }
        if (summary.fail > 0) {
          session.fail(1);
        }
      } finally {
        release();
      }
    });
}
