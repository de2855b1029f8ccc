/**
 * Kiln Kernel: Rule Pipeline
 *
 * processRule() takes one dispatched rule through staleness checking and,
 * when needed, execution. Both schedulers share it.
 *
 * Dry run:
 *   Infeasible → UpdateInfeasible, Fail
 *   Necessary / PossiblyNecessary → DryRun, Update (the action is not run)
 *   UpToDate → Skip, Skip
 *
 * Real run:
 *   Infeasible → UpdateInfeasible, Fail
 *   UpToDate → Skip, Skip
 *   Necessary → Start, then
 *     preprocess   (throws → PreProcessError, Fail)
 *     action       (throws → postprocess(false), then ExecError, Fail;
 *                   an invalidation failure joins the action error in an
 *                   AggregateError)
 *     postprocess  (throws → PostProcessError, Fail)
 *     → Done, Update
 *
 * Anything thrown outside those guarded stages (memo authentication, an
 * observer that throws, an unexpected verdict) escapes to the scheduler,
 * which treats it as fatal.
 *
 * Interruption: if the abort signal fires while the action is in flight,
 * the pipeline waits for the action to settle, runs postprocess(false) so
 * half-written outputs are invalid, and throws BuildInterruptedError.
 */

import { BuildInterruptedError, KilnError } from '../errors.js';
import { BuildEventType, type BuildObserver } from '../types/events.js';
import type { BuildRule } from '../types/rule.js';
import { UpdateKind } from '../types/update.js';

export enum RuleOutcome {
  Update = 'update',
  Skip = 'skip',
  Fail = 'fail',
}

/** Runs a rule's action. The default runs it in-process. */
export type RuleExecutor = (rule: BuildRule, signal?: AbortSignal) => Promise<void>;

export const inProcessExecutor: RuleExecutor = (rule) => rule.invoke();

export interface ProcessRuleContext {
  readonly dryRun: boolean;
  /** Some dependency was (or would be) rebuilt in this run. */
  readonly parentUpdated: boolean;
  /** The rule was requested directly rather than pulled in as a dependency. */
  readonly directTarget: boolean;
  readonly emit: BuildObserver;
  readonly signal?: AbortSignal | undefined;
  readonly execute?: RuleExecutor | undefined;
}

export async function processRule(rule: BuildRule, ctx: ProcessRuleContext): Promise<RuleOutcome> {
  const { emit } = ctx;
  const verdict = rule.checkUpdate(ctx.parentUpdated, ctx.dryRun);

  if (verdict.kind === UpdateKind.Infeasible) {
    emit({ type: BuildEventType.UpdateInfeasible, rule, reason: verdict.reason });
    return RuleOutcome.Fail;
  }
  if (verdict.kind === UpdateKind.UpToDate) {
    emit({ type: BuildEventType.Skip, rule, directTarget: ctx.directTarget });
    return RuleOutcome.Skip;
  }
  if (ctx.dryRun) {
    emit({ type: BuildEventType.DryRun, rule });
    return RuleOutcome.Update;
  }
  if (verdict.kind !== UpdateKind.Necessary) {
    throw new KilnError(`Unexpected staleness verdict '${verdict.kind}' for rule '${rule.name}'`);
  }

  emit({ type: BuildEventType.Start, rule });

  try {
    rule.preprocess();
  } catch (err) {
    emit({ type: BuildEventType.PreProcessError, rule, error: err });
    return RuleOutcome.Fail;
  }

  const execute = ctx.execute ?? inProcessExecutor;
  let succeeded = true;
  let actionError: unknown;
  try {
    await execute(rule, ctx.signal);
  } catch (err) {
    succeeded = false;
    actionError = err;
  }

  if (ctx.signal?.aborted === true) {
    try {
      rule.postprocess(false);
    } catch (err) {
      throw new BuildInterruptedError(rule.name, { cause: err });
    }
    throw new BuildInterruptedError(rule.name, { cause: ctx.signal.reason });
  }

  if (!succeeded) {
    let error = actionError;
    try {
      rule.postprocess(false);
    } catch (err) {
      error = new AggregateError(
        [actionError, err],
        `Action of '${rule.name}' failed and its outputs could not be invalidated`,
      );
    }
    emit({ type: BuildEventType.ExecError, rule, error });
    return RuleOutcome.Fail;
  }

  try {
    rule.postprocess(true);
  } catch (err) {
    emit({ type: BuildEventType.PostProcessError, rule, error: err });
    return RuleOutcome.Fail;
  }

  emit({ type: BuildEventType.Done, rule });
  return RuleOutcome.Update;
}
