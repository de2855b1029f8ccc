/**
 * Kiln Runtime Host: Build Host
 *
 * Wires the kernel to this process: the Node filesystem, the memo encoding
 * from configuration, the JSONL event log, and the forked-process runner.
 * The CLI talks to a BuildHost and never constructs these pieces itself.
 */

import { pathToFileURL } from 'node:url';
import {
  assembleTargets,
  BuildEventLogger,
  createMemoFactory,
  fanOut,
  make as makeTargets,
  RuleStore,
  type BuildFs,
  type Rule,
  type BuildObserver,
  type IsolatedRunner,
  type MakeSummary,
  type MemoFactory,
  type PlacementPlan,
} from '@kiln/kernel';
import { NodeBuildFs } from './adapters/fs.js';
import type { BuildConfig } from './config/config.js';
import { ConfigError } from './errors.js';
import { FileLogSink } from './logging/file-log-sink.js';
import { ForkedProcessRunner } from './process/forked-runner.js';
import { FileStateIO, type StateIO } from './state/state-io.js';

export interface BuildHostDeps {
  readonly fs?: BuildFs;
  readonly stateIO?: StateIO;
  /** null disables process isolation regardless of configuration. */
  readonly runner?: IsolatedRunner | null;
}

export interface HostMakeOptions {
  readonly dryRun?: boolean | undefined;
  readonly keepGoing?: boolean | undefined;
  readonly jobs?: number | undefined;
  readonly observer?: BuildObserver | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly onPlacement?: ((plan: PlacementPlan) => void) | undefined;
  readonly onProbeError?: ((error: unknown) => void) | undefined;
}

export interface BuildHost {
  readonly config: BuildConfig;
  readonly store: RuleStore;
  readonly stateIO: StateIO;
  readonly logger: BuildEventLogger;
  /** Import the build file and let it register its rules. */
  loadBuildFile(): Promise<void>;
  /**
   * The rules the target names select (all rules when empty), without
   * their dependencies, in first-named order.
   */
  targetRules(targets: ReadonlyArray<string>): ReadonlyArray<Rule>;
  /** Build the named targets (all rules when empty). */
  make(targets: ReadonlyArray<string>, options?: HostMakeOptions): Promise<MakeSummary>;
}

function memoFactoryFor(config: BuildConfig): MemoFactory {
  return config.memoKey === undefined
    ? createMemoFactory({ encoding: config.memoEncoding })
    : createMemoFactory({ encoding: config.memoEncoding, key: config.memoKey });
}

/**
 * @throws MemoConfigError if the authenticated encoding is configured
 *   without a usable key
 */
export function createBuildHost(config: BuildConfig, deps: BuildHostDeps = {}): BuildHost {
  const fs = deps.fs ?? new NodeBuildFs();
  const stateIO = deps.stateIO ?? new FileStateIO(config.stateDir);
  const store = new RuleStore({ root: config.cwd, fs, memoFactory: memoFactoryFor(config) });
  const logger = new BuildEventLogger(new FileLogSink(stateIO));
  const runner =
    deps.runner === null || !config.isolate
      ? undefined
      : (deps.runner ?? new ForkedProcessRunner());

  return {
    config,
    store,
    stateIO,
    logger,

    async loadBuildFile(): Promise<void> {
      const mod: unknown = await import(pathToFileURL(config.buildFile).href);
      const definition =
        typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
      if (typeof definition !== 'function') {
        throw new ConfigError(
          config.buildFile,
          'the build file must default-export defineBuild((store) => { ... })',
        );
      }
      const result: unknown = Reflect.apply(definition, undefined, [store]);
      await result;
    },

    targetRules(targets): ReadonlyArray<Rule> {
      const { ids } = assembleTargets(store.resolveTargets(targets));
      return ids.flatMap((id) => {
        const rule = store.rules[id];
        return rule === undefined ? [] : [rule];
      });
    },

    async make(targets, options = {}): Promise<MakeSummary> {
      const observer =
        options.observer === undefined ? logger.observer : fanOut(logger.observer, options.observer);
      return makeTargets(store.resolveTargets(targets), {
        jobs: options.jobs ?? config.jobs,
        keepGoing: options.keepGoing ?? config.keepGoing,
        dryRun: options.dryRun,
        observer,
        signal: options.signal,
        runner,
        onPlacement: options.onPlacement,
        onProbeError: options.onProbeError,
      });
    },
  };
}
