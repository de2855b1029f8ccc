/**
 * Kiln Kernel: Build Event Logger
 *
 * Turns the build event stream into BuildLogEntry records and forwards them
 * to an injected BuildLogSink.
 *
 * The sink is optional: when omitted (tests, embedded use), record() is a
 * no-op. The CLI injects FileLogSink from runtime-host.
 *
 * Use `logger.observer` as (or fanOut() it into) the observer of a build.
 */

import { BuildEventType, type BuildEvent, type BuildObserver } from '../types/events.js';
import type { BuildLogEntry, BuildLogSink, LoggedError } from './log-sink.js';

export function toLoggedError(error: unknown): LoggedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'NonError', message: String(error) };
}

export function toLogEntry(event: BuildEvent, timestamp: string): BuildLogEntry {
  const rule = event.type === BuildEventType.StopOnFail ? null : event.rule;
  return {
    event: event.type,
    rule_id: rule?.id ?? null,
    rule_name: rule?.name ?? null,
    reason: event.type === BuildEventType.UpdateInfeasible ? event.reason : null,
    error: 'error' in event ? toLoggedError(event.error) : null,
    timestamp,
  };
}

export class BuildEventLogger {
  constructor(
    private readonly sink?: BuildLogSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  record(event: BuildEvent): void {
    this.sink?.append(toLogEntry(event, this.clock().toISOString()));
  }

  /** The logger as a build observer. */
  readonly observer: BuildObserver = (event) => this.record(event);
}
