/**
 * @kiln/kernel
 *
 * Kiln build kernel: argument memoization, the rule model and its staleness
 * predicate, graph assembly, the sequential and parallel schedulers, the
 * build event vocabulary, and adapter interfaces.
 *
 * This package performs no I/O of its own. It contains no imports of
 * node:fs, node:child_process or node:net; every filesystem access and every
 * worker process goes through an injected adapter. node:crypto, node:v8 and
 * node:util are used for hashing and serialization (pure computation).
 *
 * Concrete adapter implementations, log persistence and configuration live
 * in @kiln/runtime-host.
 */

// Errors
export {
  BuildInterruptedError,
  CrossStoreError,
  DependencyCycleError,
  GraphConfigError,
  KilnError,
  MemoAuthenticationError,
  MemoConfigError,
  MemoFormatError,
  MemoSerializationError,
  OutputMissingError,
} from './errors.js';

// Types
export { Atom, atom, memstr, nomem } from './types/atom.js';
export { BuildFile, FileKind, file, valueFile } from './types/file.js';
export type { ActionFunction, InlineAction, ModuleAction, RuleAction } from './types/action.js';
export {
  callAction,
  describeAction,
  inline,
  loadAction,
  moduleAction,
  toRuleAction,
} from './types/action.js';
export type { UpdateResult } from './types/update.js';
export { infeasible, Necessary, PossiblyNecessary, UpdateKind, UpToDate } from './types/update.js';
export type { BuildRule } from './types/rule.js';
export type { BuildEvent, BuildObserver } from './types/events.js';
export { BuildEventType, fanOut, ignoreEvents } from './types/events.js';
export type { MakeSummary, SummaryKey } from './types/summary.js';
export { createSummary, EMPTY_SUMMARY } from './types/summary.js';

// Adapter interfaces; implementations live in runtime-host
export type { BuildFs, FileStat, IsolatedRequest, IsolatedRunner } from './adapters/index.js';

// Memoization
export type {
  ArgNode,
  LazyMemoValue,
  MapKey,
  MemoData,
  MemoProjection,
  MemoScalar,
} from './memo/args.js';
export { collectFiles, evaluateLazy, memoValue, normalizeArgs, realValue } from './memo/args.js';
export { stringify } from './memo/stringify.js';
export { ContentHashCache } from './memo/hash-cache.js';
export type {
  AuthenticatedRecord,
  MemoEncoding,
  MemoFactory,
  MemoOptions,
  MemoRecord,
  RuleMemo,
  SealedPayload,
  StrHashRecord,
} from './memo/memo.js';
export {
  createMemoFactory,
  MEMO_ENCODINGS,
  parseMemoRecord,
  serializeMemoRecord,
} from './memo/memo.js';
export { encodeText, MAX_RAW_REPRESENTATION_LEN, StrHashMemo } from './memo/str-hash-memo.js';
export { AuthenticatedMemo, normalizeKey } from './memo/authenticated-memo.js';

// Rules and stores
export type { ListArgNode, RuleContext, RuleInit, RuleInput, TouchOptions } from './rule/rule.js';
export { INVALID_MTIME, MEMO_DIR_NAME, MEMO_SUBDIR_NAME, metadataPathFor, Rule } from './rule/rule.js';
export type { BuildDefinition, RuleSource, RuleSpec, RuleStoreOptions } from './rule/store.js';
export { defineBuild, ownerOf, RuleGroup, RuleStore } from './rule/store.js';

// Graph assembly
export type { AssembledTargets, Closure } from './graph/assembly.js';
export { assembleTargets, collectClosure, topologicalSort } from './graph/assembly.js';

// Schedulers
export type { MakeOptions, Placement, PlacementPlan } from './scheduler/options.js';
export type { ProcessRuleContext, RuleExecutor } from './scheduler/process-rule.js';
export { inProcessExecutor, processRule, RuleOutcome } from './scheduler/process-rule.js';
export { ReadyQueue } from './scheduler/ready-queue.js';
export { makeSequential } from './scheduler/make-sequential.js';
export { makeParallel, planPlacement } from './scheduler/make-parallel.js';
export { make } from './scheduler/make.js';

// Logging (sink implementation lives in runtime-host)
export type { BuildLogEntry, BuildLogSink, LoggedError } from './logging/log-sink.js';
export { BuildEventLogger, toLogEntry, toLoggedError } from './logging/event-log.js';
