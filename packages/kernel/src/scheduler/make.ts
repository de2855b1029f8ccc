/**
 * Kiln Kernel: make()
 *
 * Top-level build entry point: assemble the targets into rule ids of one
 * store, then run the sequential scheduler (jobs absent or below 2) or the
 * parallel one.
 *
 * Resolves to the build summary, including when rules failed. Rejects only
 * on configuration errors (raised before anything runs) and fatal errors.
 */

import { assembleTargets } from '../graph/assembly.js';
import type { RuleSource } from '../rule/store.js';
import type { MakeSummary } from '../types/summary.js';
import { makeParallel } from './make-parallel.js';
import { makeSequential } from './make-sequential.js';
import type { MakeOptions } from './options.js';

function isSourceList(
  targets: RuleSource | ReadonlyArray<RuleSource>,
): targets is ReadonlyArray<RuleSource> {
  return Array.isArray(targets);
}

export async function make(
  targets: RuleSource | ReadonlyArray<RuleSource>,
  options: MakeOptions = {},
): Promise<MakeSummary> {
  const { store, ids } = assembleTargets(isSourceList(targets) ? targets : [targets]);
  if ((options.jobs ?? 1) < 2) {
    return makeSequential(store.rules, ids, options);
  }
  return makeParallel(store.rules, ids, options);
}
