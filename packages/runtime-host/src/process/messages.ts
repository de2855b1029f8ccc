/**
 * Kiln Runtime Host: Worker Protocol
 *
 * Messages exchanged between the orchestrating process and a forked worker
 * over the IPC channel. The channel uses the 'advanced' (V8 structured
 * clone) serialization, so action arguments keep bigint, Map, Set and
 * typed-array values.
 *
 * One request per worker process; the worker replies once and exits.
 */

import type { IsolatedRequest } from '@kiln/kernel';

export type WorkerRequest =
  | { readonly type: 'probe'; readonly requests: ReadonlyArray<IsolatedRequest> }
  | { readonly type: 'run'; readonly request: IsolatedRequest };

export type WorkerReply =
  | { readonly type: 'probed'; readonly verdicts: ReadonlyArray<boolean> }
  | { readonly type: 'ok' }
  | {
      readonly type: 'error';
      readonly name: string;
      readonly message: string;
      readonly stack: string | null;
    };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isIsolatedRequest(value: unknown): value is IsolatedRequest {
  return (
    isObject(value) &&
    typeof value['specifier'] === 'string' &&
    typeof value['exportName'] === 'string' &&
    Array.isArray(value['args'])
  );
}

export function isWorkerRequest(value: unknown): value is WorkerRequest {
  if (!isObject(value)) {
    return false;
  }
  switch (value['type']) {
    case 'probe': {
      const requests = value['requests'];
      return Array.isArray(requests) && requests.every(isIsolatedRequest);
    }
    case 'run':
      return isIsolatedRequest(value['request']);
    default:
      return false;
  }
}

export function isWorkerReply(value: unknown): value is WorkerReply {
  if (!isObject(value)) {
    return false;
  }
  switch (value['type']) {
    case 'probed': {
      const verdicts = value['verdicts'];
      return Array.isArray(verdicts) && verdicts.every((v) => typeof v === 'boolean');
    }
    case 'ok':
      return true;
    case 'error': {
      const stack = value['stack'];
      return (
        typeof value['name'] === 'string' &&
        typeof value['message'] === 'string' &&
        (stack === null || typeof stack === 'string')
      );
    }
    default:
      return false;
  }
}

/** The error reply for anything a worker caught. */
export function errorReply(err: unknown): WorkerReply {
  if (err instanceof Error) {
    return { type: 'error', name: err.name, message: err.message, stack: err.stack ?? null };
  }
  return { type: 'error', name: 'NonError', message: String(err), stack: null };
}
