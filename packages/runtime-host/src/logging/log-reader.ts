/**
 * Kiln Runtime Host: Build Log Reader
 *
 * Pure function over the raw text of `build-events.jsonl`:
 *
 *   - lines that are not JSON, or not a build log entry, are dropped and
 *     counted in parseErrors
 *   - entries are deduplicated by event_id; the first one wins
 *   - content not ending with '\n' has a partial last line (an interrupted
 *     write); it is dropped and flagged
 *   - entries are returned sorted by (timestamp, event_id)
 *
 * No I/O. Callers obtain the raw text with StateIO.readLogRaw().
 */

import { BuildEventType, type LoggedError } from '@kiln/kernel';
import type { StoredBuildLogEntry } from './file-log-sink.js';

export interface BuildLogStats {
  /** Non-empty complete lines processed. */
  readonly totalLines: number;
  readonly parsedEntries: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface BuildLogReadResult {
  readonly entries: ReadonlyArray<StoredBuildLogEntry>;
  readonly stats: BuildLogStats;
}

const EVENT_TYPES: ReadonlyArray<string> = Object.values(BuildEventType);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEventType(value: unknown): value is BuildEventType {
  return typeof value === 'string' && EVENT_TYPES.includes(value);
}

function nullableString(value: unknown): string | null | undefined {
  return value === null || typeof value === 'string' ? value : undefined;
}

function toLoggedError(value: unknown): LoggedError | null | undefined {
  if (value === null) {
    return null;
  }
  if (isObject(value) && typeof value['name'] === 'string' && typeof value['message'] === 'string') {
    return { name: value['name'], message: value['message'] };
  }
  return undefined;
}

/** Validate one parsed line. Returns null when it is not a stored entry. */
function toEntry(raw: unknown): StoredBuildLogEntry | null {
  if (!isObject(raw)) {
    return null;
  }
  const { event_id, event, rule_id, timestamp } = raw;
  const ruleName = nullableString(raw['rule_name']);
  const reason = nullableString(raw['reason']);
  const error = toLoggedError(raw['error']);
  if (
    typeof event_id !== 'string' ||
    !isEventType(event) ||
    typeof timestamp !== 'string' ||
    !(rule_id === null || typeof rule_id === 'number') ||
    ruleName === undefined ||
    reason === undefined ||
    error === undefined
  ) {
    return null;
  }
  return { event_id, event, rule_id, rule_name: ruleName, reason, error, timestamp };
}

function compareEntries(a: StoredBuildLogEntry, b: StoredBuildLogEntry): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? -1 : 1;
  }
  if (a.event_id !== b.event_id) {
    return a.event_id < b.event_id ? -1 : 1;
  }
  return 0;
}

export function readBuildLog(rawContent: string): BuildLogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (line) => line.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const entries: StoredBuildLogEntry[] = [];

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }
    const entry = toEntry(parsed);
    if (entry === null) {
      parseErrors++;
    } else if (seen.has(entry.event_id)) {
      duplicates++;
    } else {
      seen.add(entry.event_id);
      entries.push(entry);
    }
  }

  return {
    entries: entries.sort(compareEntries),
    stats: {
      totalLines: lines.length,
      parsedEntries: entries.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
