/**
 * Kiln Kernel: Log Sink Interface
 *
 * Defines the injection point for build event log persistence.
 *
 * The kernel owns the contract (this interface) and the BuildEventLogger
 * class. Concrete implementations live in the runtime host layer and are
 * injected at construction time. The kernel never writes logs to disk
 * itself.
 */

import type { BuildEventType } from '../types/events.js';

/** Serializable summary of an error attached to an event. */
export interface LoggedError {
  readonly name: string;
  readonly message: string;
}

/**
 * One persisted build event. Field names are snake_case because entries are
 * written as JSON lines and read by tools outside this codebase.
 */
export interface BuildLogEntry {
  readonly event: BuildEventType;
  /** Absent for events not tied to a rule (StopOnFail). */
  readonly rule_id: number | null;
  readonly rule_name: string | null;
  /** UpdateInfeasible only. */
  readonly reason: string | null;
  readonly error: LoggedError | null;
  /** ISO-8601. */
  readonly timestamp: string;
}

/**
 * A sink that receives and persists build log entries.
 *
 * append() is called synchronously from the event observer, in event order.
 * Implementations must not silently discard entries.
 */
export interface BuildLogSink {
  append(entry: BuildLogEntry): void;
}
