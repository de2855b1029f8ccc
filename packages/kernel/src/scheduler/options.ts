/**
 * Kiln Kernel: Build Options
 */

import type { IsolatedRunner } from '../adapters/index.js';
import { BuildEventType, type BuildObserver } from '../types/events.js';
import type { BuildRule } from '../types/rule.js';

/** Where a rule's action runs in a parallel build. */
export type Placement = 'isolated' | 'in-process';

export type PlacementPlan = ReadonlyMap<number, Placement>;

export interface MakeOptions {
  /** Report what would be rebuilt without running any action. */
  readonly dryRun?: boolean | undefined;
  /** Continue with independent rules after a failure. */
  readonly keepGoing?: boolean | undefined;
  /** Number of concurrent workers. Below 2 the build is sequential. */
  readonly jobs?: number | undefined;
  readonly observer?: BuildObserver | undefined;
  /** Aborting interrupts the build; make() rejects with BuildInterruptedError. */
  readonly signal?: AbortSignal | undefined;
  /** Worker processes for transferable module actions (parallel builds only). */
  readonly runner?: IsolatedRunner | undefined;
  /** Receives the placement of every closure rule once it is decided. */
  readonly onPlacement?: ((plan: PlacementPlan) => void) | undefined;
  /** Receives the runner's probe failure; the build then runs every rule in-process. */
  readonly onProbeError?: ((error: unknown) => void) | undefined;
}

/**
 * Report a fatal error for a rule and return the error make() rejects
 * with. If the observer itself throws, both errors are combined.
 */
export function reportFatal(
  observer: BuildObserver,
  rule: BuildRule,
  error: unknown,
): unknown {
  try {
    observer({ type: BuildEventType.FatalError, rule, error });
  } catch (observerError) {
    return new AggregateError(
      [error, observerError],
      'Fatal build error; the event observer also failed while reporting it',
    );
  }
  return error;
}
