/**
 * Kiln Runtime Host: File-backed Build Log Sink
 *
 * Implements the BuildLogSink interface from @kiln/kernel by appending one
 * JSON line per build event to `logs/build-events.jsonl` under the state
 * directory.
 *
 * Synchronous: the line is written before the observer returns, so the log
 * is complete up to the event being processed when a build is interrupted.
 */

import type { BuildLogEntry, BuildLogSink } from '@kiln/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const BUILD_LOG_FILE = 'build-events.jsonl';

/** A BuildLogEntry as persisted, with its deduplication key. */
export interface StoredBuildLogEntry extends BuildLogEntry {
  readonly event_id: string;
}

export class FileLogSink implements BuildLogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = ulid,
  ) {}

  append(entry: BuildLogEntry): void {
    const stored: StoredBuildLogEntry = { event_id: this.nextId(), ...entry };
    this.stateIO.appendLine(BUILD_LOG_FILE, JSON.stringify(stored));
  }
}
