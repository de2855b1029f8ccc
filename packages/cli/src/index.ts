/**
 * @kiln/cli
 *
 * The `kiln` command line. Usage:
 *
 *   kiln make [targets...] [-j n] [--dry-run] [--keep-going] [--json]
 *   kiln status [targets...]
 *   kiln clean [targets...]
 *   kiln touch [targets...]
 *   kiln list
 *   kiln log [--limit n] [--json]
 *
 * Global options: --build-file <path>, --state-dir <dir>. Configuration is
 * also read from KILN_* environment variables and kiln.config.json.
 */

export { createProgram, EXIT_FATAL, EXIT_INTERRUPTED, runCli } from './commands/index.js';
export type { CliIO } from './session.js';
export { CliSession, processIO } from './session.js';
export { renderEvent } from './output/events.js';
export type { SummaryJson } from './output/summary.js';
export { renderSummary, summaryToJson } from './output/summary.js';
export { logWarnings, renderLogEntry } from './output/log.js';
