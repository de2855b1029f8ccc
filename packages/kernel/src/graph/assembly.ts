/**
 * Kiln Kernel: Graph Assembly
 *
 * Turns requested targets into the id sets the schedulers work on.
 *
 *   assembleTargets: flatten targets into rule ids of one store
 *   topologicalSort: dependency-first order of the closure of some ids
 *   collectClosure:  closure ids plus the reverse-dependency map
 *
 * Both graph walks carry a "visiting" marker. Stores built through
 * RuleStore.add() cannot contain cycles, but the schedulers accept any
 * BuildRule list, and a cycle there must fail loudly instead of recursing
 * forever.
 */

import { CrossStoreError, DependencyCycleError, GraphConfigError } from '../errors.js';
import type { BuildRule } from '../types/rule.js';
import { Rule } from '../rule/rule.js';
import { ownerOf, RuleGroup, RuleStore, type RuleSource } from '../rule/store.js';

export interface AssembledTargets {
  readonly store: RuleStore;
  /** Requested rule ids, duplicates removed, in first-seen order. */
  readonly ids: ReadonlyArray<number>;
}

/**
 * Flatten build targets into ids of a single store.
 *
 * @throws GraphConfigError if no target is given
 * @throws CrossStoreError if targets come from more than one store
 */
export function assembleTargets(targets: ReadonlyArray<RuleSource>): AssembledTargets {
  let store: RuleStore | undefined;
  const ids: number[] = [];
  const seen = new Set<number>();

  const claim = (owner: RuleStore | undefined): RuleStore => {
    if (owner === undefined) {
      throw new GraphConfigError('Target rule is not registered in any store');
    }
    if (store !== undefined && store !== owner) {
      throw new CrossStoreError();
    }
    store = owner;
    return owner;
  };
  const push = (rule: Rule): void => {
    if (!seen.has(rule.id)) {
      seen.add(rule.id);
      ids.push(rule.id);
    }
  };

  for (const target of targets) {
    if (target instanceof RuleStore) {
      claim(target).rules.forEach(push);
    } else if (target instanceof RuleGroup) {
      claim(target.store);
      target.members.forEach(push);
    } else if (target instanceof Rule) {
      claim(ownerOf(target));
      push(target);
    }
  }

  if (store === undefined) {
    throw new GraphConfigError('No build targets given');
  }
  return { store, ids };
}

// ---------------------------------------------------------------------------
// Graph walks
// ---------------------------------------------------------------------------

function ruleAt(rules: ReadonlyArray<BuildRule>, id: number): BuildRule {
  const rule = rules[id];
  if (rule === undefined) {
    throw new GraphConfigError(`Unknown rule id ${id}`);
  }
  return rule;
}

/**
 * Post-order depth-first walk from the seed ids. Every rule appears after
 * all of its dependencies.
 *
 * @throws DependencyCycleError if a rule is reachable from itself
 */
export function topologicalSort(
  rules: ReadonlyArray<BuildRule>,
  seedIds: Iterable<number>,
): number[] {
  const order: number[] = [];
  const done = new Set<number>();
  const visiting: number[] = [];

  const visit = (id: number): void => {
    if (done.has(id)) {
      return;
    }
    const at = visiting.indexOf(id);
    if (at !== -1) {
      throw new DependencyCycleError([...visiting.slice(at), id]);
    }
    visiting.push(id);
    for (const dep of [...ruleAt(rules, id).deps].sort((a, b) => a - b)) {
      visit(dep);
    }
    visiting.pop();
    done.add(id);
    order.push(id);
  };

  for (const id of seedIds) {
    visit(id);
  }
  return order;
}

export interface Closure {
  /** Every id reachable from the seeds, dependencies first. */
  readonly ids: ReadonlyArray<number>;
  /** id → ids of closure rules that depend on it. */
  readonly dependents: ReadonlyMap<number, ReadonlyArray<number>>;
}

/**
 * The transitive closure of the seed ids with reverse-dependency edges.
 *
 * @throws DependencyCycleError if a rule is reachable from itself
 */
export function collectClosure(
  rules: ReadonlyArray<BuildRule>,
  seedIds: Iterable<number>,
): Closure {
  const ids = topologicalSort(rules, seedIds);
  const dependents = new Map<number, number[]>(ids.map((id) => [id, []]));
  for (const id of ids) {
    for (const dep of ruleAt(rules, id).deps) {
      dependents.get(dep)?.push(id);
    }
  }
  return { ids, dependents };
}
