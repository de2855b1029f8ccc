/**
 * Kiln Kernel: Schedulable Rule Contract
 *
 * The schedulers only see rules through this interface. The concrete Rule
 * class (rule/rule.ts) implements it; tests substitute scripted rules.
 */

import type { RuleAction } from './action.js';
import type { UpdateResult } from './update.js';

export interface BuildRule {
  /** Index of the rule in its store. Stable for the lifetime of the graph. */
  readonly id: number;
  readonly name: string;
  /** Ids of the rules whose outputs this rule reads. */
  readonly deps: ReadonlySet<number>;
  readonly action: RuleAction;

  /**
   * Decide whether the rule must run.
   *
   * @param parentUpdated - some dependency was (or, in a dry run, would be) rebuilt in this run
   * @param dryRun - report only; missing outputs of other rules are tolerated
   * @throws MemoAuthenticationError or MemoFormatError; both are fatal for the build
   */
  checkUpdate(parentUpdated: boolean, dryRun: boolean): UpdateResult;

  /** Best-effort preparation before the action runs (output directories). */
  preprocess(): void;

  /** Run the action in the current process. */
  invoke(): Promise<void>;

  /** Argument values as the action receives them; sent to worker processes. */
  realArgs(): ReadonlyArray<unknown>;

  /**
   * Finalize after the action: persist the memo on success, invalidate the
   * outputs on failure.
   *
   * @throws OutputMissingError when a successful action left an output missing
   */
  postprocess(success: boolean): void;
}
