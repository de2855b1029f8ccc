/**
 * Kiln Kernel: Atoms
 *
 * An Atom separates what an action receives from what the memo records.
 * Use it for arguments that cannot be memoized directly (functions, class
 * instances, large objects) or whose identity is better captured by a
 * smaller value.
 *
 *   atom(real, memo):  action receives `real`, memo records `memo`
 *   memstr(real):      memo records String(real)
 *   nomem(real):       memo records null (changes never trigger a rebuild)
 *
 * The memo value itself must be made only of scalars and containers.
 */

export class Atom<T = unknown> {
  constructor(
    readonly real: T,
    readonly memo: unknown,
  ) {}
}

export function atom<T>(real: T, memo: unknown): Atom<T> {
  return new Atom(real, memo);
}

export function memstr<T>(real: T): Atom<T> {
  return new Atom(real, String(real));
}

export function nomem<T>(real: T): Atom<T> {
  return new Atom(real, null);
}
