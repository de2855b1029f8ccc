/**
 * @kiln/runtime-host
 *
 * Side-effectful implementations of the kernel's adapter interfaces and the
 * ambient services around a build: the Node filesystem adapter, the
 * forked-process runner, the JSONL build log, configuration resolution,
 * and createBuildHost() which wires them together.
 *
 * The kernel defines interfaces; this package provides implementations.
 * No kernel code imports from this package.
 */

// Errors
export { ConfigError, IsolatedActionError } from './errors.js';

// Adapter implementations
export { NodeBuildFs } from './adapters/fs.js';
export type {
  ForkedProcessRunnerOptions,
  SpawnWorker,
  WorkerHandle,
} from './process/forked-runner.js';
export {
  defaultWorkerEntry,
  ForkedProcessRunner,
  forkWorker,
  isTransferable,
} from './process/forked-runner.js';
export type { WorkerReply, WorkerRequest } from './process/messages.js';
export { errorReply, isWorkerReply, isWorkerRequest } from './process/messages.js';
export { handleRequest } from './process/process-worker.js';

// State and logging
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { StoredBuildLogEntry } from './logging/file-log-sink.js';
export { BUILD_LOG_FILE, FileLogSink } from './logging/file-log-sink.js';
export type { BuildLogReadResult, BuildLogStats } from './logging/log-reader.js';
export { readBuildLog } from './logging/log-reader.js';
export type { UlidSource } from './logging/ulid.js';
export { createUlidGenerator, ulid } from './logging/ulid.js';

// Configuration
export type {
  BuildConfig,
  BuildConfigFlags,
  ConfigLayer,
  ResolveBuildConfigOptions,
} from './config/config.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_BUILD_FILE,
  DEFAULT_STATE_DIR,
  readConfigFile,
  resolveBuildConfig,
} from './config/config.js';

// Host wiring
export type { BuildHost, BuildHostDeps, HostMakeOptions } from './host.js';
export { createBuildHost } from './host.js';
