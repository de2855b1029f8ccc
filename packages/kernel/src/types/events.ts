/**
 * Kiln Kernel: Build Events
 *
 * The engine's only output channel besides the filesystem. Observers
 * (loggers, console renderers) receive a stream of these events.
 *
 * Event guarantees:
 * - Every rule that is dispatched produces exactly one terminal event:
 *   Skip, Done, DryRun, UpdateInfeasible, or one of the error events.
 *   Start precedes Done / ExecError / PostProcessError / PreProcessError.
 * - Rules discarded because a dependency failed produce no events.
 * - StopOnFail is emitted once when a failure halts a fail-fast build.
 */

import type { BuildRule } from './rule.js';

export enum BuildEventType {
  Skip = 'Skip',
  Start = 'Start',
  Done = 'Done',
  DryRun = 'DryRun',
  UpdateInfeasible = 'UpdateInfeasible',
  PreProcessError = 'PreProcessError',
  ExecError = 'ExecError',
  PostProcessError = 'PostProcessError',
  FatalError = 'FatalError',
  StopOnFail = 'StopOnFail',
}

export type BuildEvent =
  | {
      readonly type: BuildEventType.Skip;
      readonly rule: BuildRule;
      /** The rule was requested directly, not pulled in as a dependency. */
      readonly directTarget: boolean;
    }
  | { readonly type: BuildEventType.Start; readonly rule: BuildRule }
  | { readonly type: BuildEventType.Done; readonly rule: BuildRule }
  | { readonly type: BuildEventType.DryRun; readonly rule: BuildRule }
  | {
      readonly type: BuildEventType.UpdateInfeasible;
      readonly rule: BuildRule;
      readonly reason: string;
    }
  | {
      readonly type:
        | BuildEventType.PreProcessError
        | BuildEventType.ExecError
        | BuildEventType.PostProcessError
        | BuildEventType.FatalError;
      readonly rule: BuildRule;
      readonly error: unknown;
    }
  | { readonly type: BuildEventType.StopOnFail };

export type BuildObserver = (event: BuildEvent) => void;

/** Observer that drops every event. */
export const ignoreEvents: BuildObserver = () => undefined;

/** Forward each event to every observer, in order. */
export function fanOut(...observers: ReadonlyArray<BuildObserver>): BuildObserver {
  return (event) => {
    for (const observer of observers) {
      observer(event);
    }
  };
}
