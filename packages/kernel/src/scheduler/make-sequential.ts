/**
 * Kiln Kernel: Sequential Scheduler
 *
 * Processes the closure of the requested rules one at a time, dependencies
 * first.
 *
 *   - A rule with a failed (or discarded) dependency is discarded: no
 *     staleness check, no event.
 *   - A failure without keepGoing emits StopOnFail and stops the walk; the
 *     remaining rules are discarded.
 *   - A fatal error (anything the rule pipeline does not report as a rule
 *     failure) emits FatalError and stops the walk regardless of keepGoing;
 *     make() then rejects with that error.
 */

import { BuildInterruptedError } from '../errors.js';
import { topologicalSort } from '../graph/assembly.js';
import { BuildEventType, ignoreEvents } from '../types/events.js';
import type { BuildRule } from '../types/rule.js';
import { createSummary, EMPTY_SUMMARY, type MakeSummary, type SummaryKey } from '../types/summary.js';
import type { MakeOptions } from './options.js';
import { reportFatal } from './options.js';
import { processRule, RuleOutcome } from './process-rule.js';

export async function makeSequential(
  rules: ReadonlyArray<BuildRule>,
  ids: ReadonlyArray<number>,
  options: MakeOptions = {},
): Promise<MakeSummary> {
  if (ids.length === 0) {
    return EMPTY_SUMMARY;
  }

  const observer = options.observer ?? ignoreEvents;
  const dryRun = options.dryRun ?? false;
  const keepGoing = options.keepGoing ?? false;
  const { signal } = options;

  const direct = new Set(ids);
  const order = topologicalSort(rules, ids);
  const failed = new Set<number>();
  const updated = new Set<number>();
  const outcomes = new Map<number, SummaryKey>();

  for (const id of order) {
    const rule = rules[id];
    if (rule === undefined) {
      continue;
    }
    const deps = [...rule.deps];
    if (deps.some((dep) => failed.has(dep))) {
      failed.add(id);
      continue;
    }
    if (signal?.aborted === true) {
      throw new BuildInterruptedError(undefined, { cause: signal.reason });
    }

    let outcome: RuleOutcome;
    try {
      outcome = await processRule(rule, {
        dryRun,
        parentUpdated: deps.some((dep) => updated.has(dep)),
        directTarget: direct.has(id),
        emit: observer,
        signal,
      });
    } catch (err) {
      throw reportFatal(observer, rule, err);
    }

    outcomes.set(id, outcome);
    if (outcome === RuleOutcome.Update) {
      updated.add(id);
    } else if (outcome === RuleOutcome.Fail) {
      failed.add(id);
      if (!keepGoing) {
        observer({ type: BuildEventType.StopOnFail });
        break;
      }
    }
  }

  return createSummary(order, outcomes);
}
