/**
 * Kiln Kernel: Build Summary
 *
 * The value a make() call resolves to.
 *
 *   updated: rules whose action ran successfully (or would run, in a dry run)
 *   skip:    rules found up to date
 *   fail:    rules that failed (infeasible, action error, lifecycle error, fatal)
 *   discard: rules never evaluated: a dependency failed, or the build stopped
 *
 * total = updated + skip + fail + discard.
 */

export type SummaryKey = 'update' | 'skip' | 'fail' | 'discard';

export interface MakeSummary {
  readonly total: number;
  readonly updated: number;
  readonly skip: number;
  readonly fail: number;
  readonly discard: number;
  /** Outcome per rule id. */
  readonly detail: ReadonlyMap<number, SummaryKey>;
}

export const EMPTY_SUMMARY: MakeSummary = {
  total: 0,
  updated: 0,
  skip: 0,
  fail: 0,
  discard: 0,
  detail: new Map(),
};

/**
 * Build the summary from the per-rule outcomes. Ids of the closure without
 * a recorded outcome are counted as discarded.
 */
export function createSummary(
  closure: Iterable<number>,
  outcomes: ReadonlyMap<number, SummaryKey>,
): MakeSummary {
  const detail = new Map<number, SummaryKey>();
  const counts: Record<SummaryKey, number> = { update: 0, skip: 0, fail: 0, discard: 0 };
  for (const id of closure) {
    const key = outcomes.get(id) ?? 'discard';
    detail.set(id, key);
    counts[key] += 1;
  }
  return {
    total: detail.size,
    updated: counts.update,
    skip: counts.skip,
    fail: counts.fail,
    discard: counts.discard,
    detail,
  };
}
