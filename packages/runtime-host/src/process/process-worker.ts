/**
 * Kiln Runtime Host: Worker Process Logic
 *
 * What a forked worker does with the one request it receives:
 *
 *   probe: report, per request, whether the module export resolves to a
 *           function in a fresh process
 *   run:   load the export and call it with the request's arguments
 *
 * handleRequest() is plain async code with no dependency on being inside a
 * child process; startWorker() binds it to the IPC channel.
 */

import { callAction, loadAction, moduleAction, type IsolatedRequest } from '@kiln/kernel';
import { errorReply, isWorkerRequest, type WorkerReply, type WorkerRequest } from './messages.js';

async function resolves(request: IsolatedRequest): Promise<boolean> {
  try {
    await loadAction(moduleAction(request.specifier, request.exportName));
    return true;
  } catch {
    // The rule runs in-process instead, where the same failure is reported
    // as an ExecError.
    return false;
  }
}

export async function handleRequest(message: WorkerRequest): Promise<WorkerReply> {
  switch (message.type) {
    case 'probe':
      return { type: 'probed', verdicts: await Promise.all(message.requests.map(resolves)) };
    case 'run': {
      const { request } = message;
      try {
        const fn = await loadAction(moduleAction(request.specifier, request.exportName));
        await callAction(fn, request.args);
        return { type: 'ok' };
      } catch (err: unknown) {
        return errorReply(err);
      }
    }
  }
}

async function respond(message: unknown): Promise<void> {
  const reply = isWorkerRequest(message)
    ? await handleRequest(message)
    : errorReply(new TypeError('Malformed worker request'));
  process.send?.(reply, undefined, undefined, () => process.disconnect());
}

/**
 * Serve one request from the parent process, reply, and disconnect so the
 * process exits once the reply is flushed.
 */
export function startWorker(): void {
  if (process.send === undefined) {
    throw new Error('The Kiln worker must be started with an IPC channel (child_process.fork)');
  }
  process.once('message', (message: unknown) => {
    respond(message).catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
      process.disconnect();
    });
  });
}
