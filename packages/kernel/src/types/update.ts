/**
 * Kiln Kernel: Staleness Verdicts
 *
 * The result of Rule.checkUpdate(). Exactly one verdict per check.
 *
 * PossiblyNecessary is produced only by dry runs: a dependency would have
 * been rebuilt, so this rule might need rebuilding too, but an actual run
 * could still find its inputs unchanged.
 */

export enum UpdateKind {
  UpToDate = 'UpToDate',
  Necessary = 'Necessary',
  PossiblyNecessary = 'PossiblyNecessary',
  Infeasible = 'Infeasible',
}

export type UpdateResult =
  | { readonly kind: UpdateKind.UpToDate }
  | { readonly kind: UpdateKind.Necessary }
  | { readonly kind: UpdateKind.PossiblyNecessary }
  | { readonly kind: UpdateKind.Infeasible; readonly reason: string };

export const UpToDate: UpdateResult = { kind: UpdateKind.UpToDate };
export const Necessary: UpdateResult = { kind: UpdateKind.Necessary };
export const PossiblyNecessary: UpdateResult = { kind: UpdateKind.PossiblyNecessary };

export function infeasible(reason: string): UpdateResult {
  return { kind: UpdateKind.Infeasible, reason };
}
