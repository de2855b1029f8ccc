/**
 * Kiln Kernel: Parallel Scheduler
 *
 * Same contract and summary as the sequential scheduler, with up to `jobs`
 * rules in flight at once.
 *
 * Coordination state (ready queue, dependency countdown, updated / failed
 * sets) lives on the orchestrating event loop, so no locking is needed:
 * every mutation happens between two awaits.
 *
 *   - Each closure rule starts with a countdown of its dependencies. When a
 *     rule settles, its dependents count down; a dependent reaching zero is
 *     queued, or discarded if one of its dependencies failed.
 *   - `jobs` worker loops take ready ids in FIFO order.
 *   - A failure without keepGoing, a fatal error, or the abort signal sets
 *     the stop flag and closes the queue. In-flight rules finish; nothing
 *     new is dispatched.
 *
 * Placement: with an IsolatedRunner, module actions whose arguments pass
 * the runner's probe run in worker processes. Everything else runs
 * in-process. The plan is computed once per build, before any dispatch.
 * If the probe itself fails, every rule runs in-process and the error goes
 * to `onProbeError`.
 */

import type { IsolatedRequest, IsolatedRunner } from '../adapters/index.js';
import { BuildInterruptedError } from '../errors.js';
import { collectClosure } from '../graph/assembly.js';
import { BuildEventType, ignoreEvents } from '../types/events.js';
import type { BuildRule } from '../types/rule.js';
import { createSummary, EMPTY_SUMMARY, type MakeSummary, type SummaryKey } from '../types/summary.js';
import { reportFatal, type MakeOptions, type Placement, type PlacementPlan } from './options.js';
import { processRule, RuleOutcome, type RuleExecutor } from './process-rule.js';
import { ReadyQueue } from './ready-queue.js';

function ruleAt(rules: ReadonlyArray<BuildRule>, id: number): BuildRule {
  const rule = rules[id];
  if (rule === undefined) {
    throw new RangeError(`Unknown rule id ${id}`);
  }
  return rule;
}

function toRequest(rule: BuildRule): IsolatedRequest | null {
  const { action } = rule;
  if (action.kind !== 'module') {
    return null;
  }
  return { specifier: action.specifier, exportName: action.exportName, args: rule.realArgs() };
}

/** Decide, once per build, which closure rules run in worker processes. */
export async function planPlacement(
  rules: ReadonlyArray<BuildRule>,
  closure: ReadonlyArray<number>,
  runner: IsolatedRunner | undefined,
  onProbeError?: (error: unknown) => void,
): Promise<PlacementPlan> {
  const plan = new Map<number, Placement>(closure.map((id) => [id, 'in-process']));
  if (runner === undefined) {
    return plan;
  }

  const candidates: number[] = [];
  const requests: IsolatedRequest[] = [];
  for (const id of closure) {
    const request = toRequest(ruleAt(rules, id));
    if (request !== null) {
      candidates.push(id);
      requests.push(request);
    }
  }
  if (requests.length === 0) {
    return plan;
  }

  let verdicts: ReadonlyArray<boolean>;
  try {
    verdicts = await runner.probe(requests);
  } catch (err) {
    onProbeError?.(err);
    return plan;
  }
  candidates.forEach((id, i) => {
    if (verdicts[i] === true) {
      plan.set(id, 'isolated');
    }
  });
  return plan;
}

function isolatedExecutor(runner: IsolatedRunner): RuleExecutor {
  return (rule, signal) => {
    const request = toRequest(rule);
    return request === null ? rule.invoke() : runner.run(request, signal);
  };
}

export async function makeParallel(
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
  const jobs = Math.max(1, Math.floor(options.jobs ?? 2));
  const { signal, runner } = options;
  // Read through a call so the check after the awaits is not narrowed away.
  const isAborted = (): boolean => signal?.aborted === true;

  const direct = new Set(ids);
  const { ids: closure, dependents } = collectClosure(rules, ids);

  if (isAborted()) {
    throw new BuildInterruptedError(undefined, { cause: signal?.reason });
  }

  const plan = await planPlacement(rules, closure, dryRun ? undefined : runner, options.onProbeError);
  options.onPlacement?.(plan);
  const isolated = runner === undefined ? undefined : isolatedExecutor(runner);

  const failed = new Set<number>();
  const updated = new Set<number>();
  const outcomes = new Map<number, SummaryKey>();
  const pendingDeps = new Map<number, number>(
    closure.map((id) => [id, ruleAt(rules, id).deps.size]),
  );
  const queue = new ReadyQueue();
  let unsettled = closure.length;
  // First fatal error wins; later ones are consequences of stopping.
  const fatal: unknown[] = [];

  const stop = (): void => {
    queue.close();
  };
  const onAbort = (): void => stop();
  signal?.addEventListener('abort', onAbort, { once: true });

  // A rule is settled once it has an outcome or was discarded.
  const settle = (id: number): void => {
    unsettled -= 1;
    for (const dependent of dependents.get(id) ?? []) {
      const left = (pendingDeps.get(dependent) ?? 0) - 1;
      pendingDeps.set(dependent, left);
      if (left !== 0) {
        continue;
      }
      if ([...ruleAt(rules, dependent).deps].some((dep) => failed.has(dep))) {
        failed.add(dependent);
        settle(dependent);
      } else {
        queue.push(dependent);
      }
    }
    if (unsettled === 0) {
      queue.close();
    }
  };

  const runOne = async (id: number): Promise<void> => {
    const rule = ruleAt(rules, id);
    let outcome: RuleOutcome;
    try {
      outcome = await processRule(rule, {
        dryRun,
        parentUpdated: [...rule.deps].some((dep) => updated.has(dep)),
        directTarget: direct.has(id),
        emit: observer,
        signal,
        execute: plan.get(id) === 'isolated' ? isolated : undefined,
      });
    } catch (err) {
      outcomes.set(id, 'fail');
      failed.add(id);
      if (fatal.length === 0) {
        fatal.push(reportFatal(observer, rule, err));
      }
      stop();
      return;
    }

    outcomes.set(id, outcome);
    if (outcome === RuleOutcome.Update) {
      updated.add(id);
    } else if (outcome === RuleOutcome.Fail) {
      failed.add(id);
      if (!keepGoing && !queue.isClosed) {
        stop();
        observer({ type: BuildEventType.StopOnFail });
      }
    }
    settle(id);
  };

  const worker = async (): Promise<void> => {
    for (;;) {
      const id = await queue.take();
      if (id === undefined) {
        return;
      }
      try {
        await runOne(id);
      } catch (err) {
        // An observer throwing outside a rule's pipeline (StopOnFail).
        if (fatal.length === 0) {
          fatal.push(err);
        }
        stop();
        return;
      }
    }
  };

  for (const id of closure) {
    if (pendingDeps.get(id) === 0) {
      queue.push(id);
    }
  }

  try {
    await Promise.all(Array.from({ length: jobs }, () => worker()));
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  if (fatal.length > 0) {
    throw fatal[0];
  }
  if (isAborted()) {
    throw new BuildInterruptedError(undefined, { cause: signal?.reason });
  }
  return createSummary(closure, outcomes);
}
