/**
 * Scripted BuildRule for scheduler tests.
 *
 * Each rule returns a fixed verdict and can be told to fail at any
 * lifecycle stage. Every call is appended to a journal shared by the rules
 * of one test, so tests can assert cross-rule ordering.
 */

import {
  BuildEventType,
  inline,
  Necessary,
  type BuildEvent,
  type BuildObserver,
  type BuildRule,
  type RuleAction,
  type UpdateResult,
} from '../../src/index.js';

export interface MockScript {
  readonly verdict?: UpdateResult | ((parentUpdated: boolean, dryRun: boolean) => UpdateResult);
  /** Thrown from checkUpdate (escapes the pipeline: fatal). */
  readonly checkError?: Error;
  readonly preprocessError?: Error;
  readonly execError?: Error;
  readonly postprocessError?: Error;
  /** Extra work performed by invoke(), after journaling. */
  readonly run?: () => Promise<void>;
  readonly action?: RuleAction;
  readonly args?: ReadonlyArray<unknown>;
}

export class MockRule implements BuildRule {
  readonly deps: ReadonlySet<number>;
  readonly action: RuleAction;
  readonly name: string;

  constructor(
    readonly id: number,
    deps: ReadonlyArray<number>,
    private readonly journal: string[],
    private readonly script: MockScript = {},
  ) {
    this.deps = new Set(deps);
    this.name = `r${id}`;
    this.action = script.action ?? inline(() => undefined);
  }

  checkUpdate(parentUpdated: boolean, dryRun: boolean): UpdateResult {
    this.journal.push(`check ${this.name} parent=${String(parentUpdated)}`);
    if (this.script.checkError !== undefined) {
      throw this.script.checkError;
    }
    const { verdict } = this.script;
    if (verdict === undefined) {
      return Necessary;
    }
    return typeof verdict === 'function' ? verdict(parentUpdated, dryRun) : verdict;
  }

  preprocess(): void {
    this.journal.push(`pre ${this.name}`);
    if (this.script.preprocessError !== undefined) {
      throw this.script.preprocessError;
    }
  }

  async invoke(): Promise<void> {
    this.journal.push(`run ${this.name}`);
    if (this.script.run !== undefined) {
      await this.script.run();
    }
    if (this.script.execError !== undefined) {
      throw this.script.execError;
    }
  }

  realArgs(): ReadonlyArray<unknown> {
    return this.script.args ?? [];
  }

  postprocess(success: boolean): void {
    this.journal.push(`post ${this.name} ${success ? 'ok' : 'failed'}`);
    if (this.script.postprocessError !== undefined) {
      throw this.script.postprocessError;
    }
  }
}

/** Observer that records events as "Type name" strings. */
export function eventRecorder(): { readonly events: string[]; readonly observer: BuildObserver } {
  const events: string[] = [];
  const observer = (event: BuildEvent): void => {
    if (event.type === BuildEventType.StopOnFail) {
      events.push('StopOnFail');
    } else if (event.type === BuildEventType.Skip) {
      events.push(`Skip ${event.rule.name}${event.directTarget ? ' direct' : ''}`);
    } else {
      events.push(`${event.type} ${event.rule.name}`);
    }
  };
  return { events, observer };
}
