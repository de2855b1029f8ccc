/**
 * Kiln Runtime Host: Forked Process Runner
 *
 * Implements the IsolatedRunner interface from @kiln/kernel with
 * node:child_process.fork.
 *
 *   - Every dispatch gets a new worker process, so a crashing or leaking
 *     action cannot affect later rules.
 *   - probe() first checks in this process that each request's arguments
 *     survive a structured-clone round trip, then asks a single helper
 *     worker whether the remaining exports resolve.
 *   - Aborting the signal passed to run() kills the worker.
 *
 * When the worker entry is a TypeScript source (running from src/ without a
 * build), it is started with `--import tsx`.
 */

import { fork } from 'node:child_process';
import { dirname, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isDeepStrictEqual } from 'node:util';
import { deserialize, serialize } from 'node:v8';
import type { IsolatedRequest, IsolatedRunner } from '@kiln/kernel';
import { IsolatedActionError } from '../errors.js';
import { isWorkerReply, type WorkerReply, type WorkerRequest } from './messages.js';

// ---------------------------------------------------------------------------
// Worker handle
// ---------------------------------------------------------------------------

/** The part of a child process the runner talks to. */
export interface WorkerHandle {
  send(message: WorkerRequest, callback: (error: Error | null) => void): void;
  kill(): void;
  onMessage(listener: (message: unknown) => void): void;
  onExit(listener: (code: number | null, signal: string | null) => void): void;
  onError(listener: (error: Error) => void): void;
}

export type SpawnWorker = () => WorkerHandle;

/** Location of the worker entry next to this module, and the flags it needs. */
export function defaultWorkerEntry(): { readonly entry: string; readonly execArgv: string[] } {
  const here = fileURLToPath(import.meta.url);
  const ext = extname(here);
  return {
    entry: join(dirname(here), `worker-main${ext}`),
    execArgv: ext === '.ts' ? ['--import', 'tsx'] : [],
  };
}

/** Fork the default worker entry with structured-clone IPC. */
export function forkWorker(): WorkerHandle {
  const { entry, execArgv } = defaultWorkerEntry();
  const child = fork(entry, [], { serialization: 'advanced', execArgv, stdio: 'inherit' });
  return {
    send: (message, callback) => {
      child.send(message, callback);
    },
    kill: () => {
      child.kill();
    },
    onMessage: (listener) => {
      child.on('message', listener);
    },
    onExit: (listener) => {
      child.on('exit', listener);
    },
    onError: (listener) => {
      child.on('error', listener);
    },
  };
}

/**
 * Whether a value reaches a worker unchanged. Values that serialize but come
 * back different (class instances lose their prototype) do not qualify.
 */
export function isTransferable(value: unknown): boolean {
  try {
    return isDeepStrictEqual(deserialize(serialize(value)), value);
  } catch {
    // Functions, symbols and other uncloneable values.
    return false;
  }
}

function describeRequest(request: IsolatedRequest): string {
  return `${request.specifier}#${request.exportName}`;
}

// ---------------------------------------------------------------------------
// ForkedProcessRunner
// ---------------------------------------------------------------------------

export interface ForkedProcessRunnerOptions {
  /** Starts one worker. Defaults to forking worker-main. */
  readonly spawn?: SpawnWorker;
}

export class ForkedProcessRunner implements IsolatedRunner {
  private readonly spawn: SpawnWorker;

  constructor(options: ForkedProcessRunnerOptions = {}) {
    this.spawn = options.spawn ?? forkWorker;
  }

  async probe(requests: ReadonlyArray<IsolatedRequest>): Promise<ReadonlyArray<boolean>> {
    const transferable = requests.map((request) => isTransferable(request.args));
    const candidates = requests.filter((_, i) => transferable[i] === true);
    if (candidates.length === 0) {
      return transferable.map(() => false);
    }

    const reply = await this.exchange({ type: 'probe', requests: candidates }, 'probe');
    if (reply.type !== 'probed' || reply.verdicts.length !== candidates.length) {
      throw new IsolatedActionError(`Worker probe returned an unexpected '${reply.type}' reply`);
    }
    const verdicts = reply.verdicts.values();
    return transferable.map((ok) => ok && verdicts.next().value === true);
  }

  async run(request: IsolatedRequest, signal?: AbortSignal): Promise<void> {
    const label = describeRequest(request);
    const reply = await this.exchange({ type: 'run', request }, label, signal);
    if (reply.type === 'error') {
      throw new IsolatedActionError(
        `Action ${label} failed in a worker process: ${reply.name}: ${reply.message}`,
        reply.stack,
      );
    }
    if (reply.type !== 'ok') {
      throw new IsolatedActionError(`Worker for ${label} returned an unexpected '${reply.type}' reply`);
    }
  }

  /** Start a worker, send one request and wait for its single reply. */
  private exchange(message: WorkerRequest, label: string, signal?: AbortSignal): Promise<WorkerReply> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted === true) {
        reject(new IsolatedActionError(`Worker for ${label} not started: build interrupted`));
        return;
      }

      const worker = this.spawn();
      let settled = false;
      const finish = (settle: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        settle();
      };
      const onAbort = (): void => {
        worker.kill();
        finish(() => reject(new IsolatedActionError(`Worker for ${label} killed: build interrupted`)));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      worker.onMessage((raw) => {
        if (isWorkerReply(raw)) {
          finish(() => resolve(raw));
          return;
        }
        worker.kill();
        finish(() => reject(new IsolatedActionError(`Worker for ${label} sent a malformed reply`)));
      });
      worker.onExit((code, exitSignal) => {
        finish(() =>
          reject(
            new IsolatedActionError(
              `Worker for ${label} exited before replying (code ${String(code)}, signal ${String(exitSignal)})`,
            ),
          ),
        );
      });
      worker.onError((err) => {
        finish(() => reject(err));
      });
      worker.send(message, (err) => {
        if (err !== null) {
          finish(() => reject(err));
        }
      });
    });
  }
}
