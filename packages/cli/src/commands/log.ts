/**
 * kiln log: Recent entries of the build event log
 *
 * Reads <stateDir>/logs/build-events.jsonl. The build file is not loaded.
 */

import { Command } from 'commander';
import { BUILD_LOG_FILE, FileStateIO, readBuildLog } from '@kiln/runtime-host';
import { logWarnings, renderLogEntry } from '../output/log.js';
import type { CliSession } from '../session.js';

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new Error(`--limit must be a non-negative integer, got ${JSON.stringify(value)}`);
  }
  return limit;
}

export function logCommand(session: CliSession): Command {
  return new Command('log')
    .description('Show recent build events')
    .option('--json', 'Output as JSON')
    .option('--limit <n>', 'Maximum number of entries to show (0 for all)', '50')
    .action((options: { json?: boolean; limit: string }, command: Command) => {
      const limit = parseLimit(options.limit);
      const config = session.config(command);
      const { entries, stats } = readBuildLog(new FileStateIO(config.stateDir).readLogRaw(BUILD_LOG_FILE));
      const shown = limit === 0 ? entries : entries.slice(-limit);

      for (const warning of logWarnings(stats)) {
        session.warn(warning);
      }
      if (options.json === true) {
        session.print(JSON.stringify(shown, null, 2));
        return;
      }
      for (const entry of shown) {
        session.print(renderLogEntry(entry));
      }
    });
}
