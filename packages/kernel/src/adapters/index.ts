/**
 * Kiln Kernel: Adapter Interfaces
 *
 * Every side effect of the engine flows through one of these ports:
 *
 *   BuildFs:        stat / read / write / timestamp operations on rule files
 *                    and memo sidecar records
 *   IsolatedRunner: execution of transferable actions in worker processes
 *
 * No implementations are provided here. Adapters are injected, not
 * constructed. The Node.js implementations live in @kiln/runtime-host; tests
 * inject in-memory stand-ins.
 */

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export interface FileStat {
  /** Modification time in milliseconds since the epoch. 0 marks an invalid output. */
  readonly mtimeMs: number;
  readonly isFile: boolean;
}

/**
 * Synchronous filesystem port used by rules.
 *
 * Paths are absolute. Methods that read report absence through their return
 * value (null) rather than by throwing; any other I/O failure throws.
 */
export interface BuildFs {
  /** Stat a path. Returns null if it does not exist. */
  stat(path: string): FileStat | null;

  /** Read a file's bytes. Returns null if it does not exist. */
  readFile(path: string): Uint8Array | null;

  /** Write a file, replacing any existing content. The parent directory must exist. */
  writeFile(path: string, content: Uint8Array | string): void;

  /** Create a directory and its missing parents. No-op if it exists. */
  mkdirp(path: string): void;

  /** Set the modification time to `mtimeMs`, keeping the access time. */
  setMtime(path: string, mtimeMs: number): void;

  /** Create an empty file if the path does not exist. */
  createEmpty(path: string): void;

  /** Remove a file. No-op if it does not exist. */
  remove(path: string): void;

  /** Resolve symlinks. Returns the input unchanged if the path does not exist. */
  realpath(path: string): string;
}

// ---------------------------------------------------------------------------
// Isolated execution
// ---------------------------------------------------------------------------

/** One action dispatch to a worker process. */
export interface IsolatedRequest {
  /** Importable module specifier (absolute file URL or package name). */
  readonly specifier: string;
  readonly exportName: string;
  /** Positional arguments, as the action receives them. */
  readonly args: ReadonlyArray<unknown>;
}

/**
 * Runs module actions in processes separate from the orchestrator, so that a
 * crashing action cannot take the build down and CPU-bound actions run in
 * parallel.
 */
export interface IsolatedRunner {
  /**
   * Test each request for cross-process transferability: its arguments must
   * serialize here and deserialize in a helper process, and its export must
   * resolve to a function there. Called once per parallel build.
   *
   * @returns One boolean per request, in order.
   */
  probe(requests: ReadonlyArray<IsolatedRequest>): Promise<ReadonlyArray<boolean>>;

  /**
   * Execute one request in a worker process and wait for it to finish.
   * Rejects if the action throws, the worker crashes, or `signal` aborts.
   */
  run(request: IsolatedRequest, signal?: AbortSignal): Promise<void>;
}
