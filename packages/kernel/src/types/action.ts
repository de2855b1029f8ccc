/**
 * Kiln Kernel: Rule Actions
 *
 * An action is the work a rule performs. Two shapes exist:
 *
 *   inline: a function value. Runs in the orchestrating process. Never
 *            transferable to a worker process because functions do not
 *            survive serialization.
 *   module: a reference to an exported function of an importable module.
 *            A candidate for process isolation in parallel builds: if its
 *            arguments serialize and the export resolves in a helper
 *            process, it runs in a worker process.
 *
 * Module specifiers should be absolute (file URLs or package names); relative
 * specifiers would be resolved against the kernel's own location.
 */

/**
 * Any function. Parameters are typed `never` so that functions with concrete
 * parameter lists are assignable; the engine calls it through Reflect.apply.
 */
export type ActionFunction = (...args: never[]) => unknown;

export interface InlineAction {
  readonly kind: 'inline';
  readonly fn: ActionFunction;
}

export interface ModuleAction {
  readonly kind: 'module';
  readonly specifier: string;
  readonly exportName: string;
}

export type RuleAction = InlineAction | ModuleAction;

export function inline(fn: ActionFunction): InlineAction {
  return { kind: 'inline', fn };
}

export function moduleAction(specifier: string | URL, exportName = 'default'): ModuleAction {
  return {
    kind: 'module',
    specifier: typeof specifier === 'string' ? specifier : specifier.href,
    exportName,
  };
}

/** Accepts either a bare function or an action descriptor. */
export function toRuleAction(action: ActionFunction | RuleAction): RuleAction {
  return typeof action === 'function' ? inline(action) : action;
}

export function describeAction(action: RuleAction): string {
  return action.kind === 'inline'
    ? `inline ${action.fn.name === '' ? '<anonymous>' : action.fn.name}`
    : `${action.specifier}#${action.exportName}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

/**
 * Resolve an action to the function it runs. Module actions are loaded with
 * a dynamic import and their export looked up by name.
 *
 * @throws TypeError if the export is missing or not a function
 */
export async function loadAction(action: RuleAction): Promise<ActionFunction> {
  if (action.kind === 'inline') {
    return action.fn;
  }
  const mod: unknown = await import(action.specifier);
  const exported = isRecord(mod) ? mod[action.exportName] : undefined;
  if (typeof exported !== 'function') {
    throw new TypeError(
      `Module '${action.specifier}' has no function export named '${action.exportName}'`,
    );
  }
  return (...args: never[]) => Reflect.apply(exported, undefined, args);
}

/** Call an action with positional arguments and wait for it to settle. */
export async function callAction(fn: ActionFunction, args: ReadonlyArray<unknown>): Promise<void> {
  const result: unknown = Reflect.apply(fn, undefined, args);
  await result;
}
