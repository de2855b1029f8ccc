import type { BuildLogStats, StoredBuildLogEntry } from '@kiln/runtime-host'
import { t } from './theme.js'

const EVENT_WIDTH = 17

/**
 * renderLogEntry: one line of `kiln log`.
 *
 *   2026-01-02T03:04:05.000Z  ExecError         compile  TypeError: bad input
 */
export function renderLogEntry(entry: StoredBuildLogEntry): string {
  const color = entry.error !== null || entry.reason !== null ? t.red : t.blue
  let out = t.dim(entry.timestamp) + '  ' + color(entry.event.padEnd(EVENT_WIDTH)) + t.white(entry.rule_name ?? '-')
  if (entry.reason !== null) {
    out += '  ' + t.text(entry.reason)
  }
  if (entry.error !== null) {
    out += '  ' + t.text(`${entry.error.name}: ${entry.error.message}`)
  }
  return out
}

/** Warnings about lines the reader dropped, or an empty list. */
export function logWarnings(stats: BuildLogStats): string[] {
  const warnings: string[] = []
  if (stats.parseErrors > 0) {
    warnings.push(`${stats.parseErrors} unreadable log ${stats.parseErrors === 1 ? 'line' : 'lines'} skipped`)
  }
  if (stats.partialTrailingLine) {
    warnings.push('the last log line is incomplete (interrupted write) and was skipped')
  }
  return warnings
}
