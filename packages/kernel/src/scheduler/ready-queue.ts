/**
 * Kiln Kernel: Ready Queue
 *
 * FIFO queue of rule ids whose dependencies have all completed. Workers
 * block in take() until an id is available or the queue is closed.
 *
 * Closing is final: pending and future take() calls resolve to undefined,
 * and ids still queued are dropped. The parallel scheduler closes the queue
 * both when the build is finished and when it must stop early.
 */

export class ReadyQueue {
  private readonly items: number[] = [];
  private readonly waiters: Array<(id: number | undefined) => void> = [];
  private closed = false;

  push(id: number): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      waiter(id);
    } else {
      this.items.push(id);
    }
  }

  /** Next ready id, or undefined once the queue is closed. */
  take(): Promise<number | undefined> {
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    const id = this.items.shift();
    if (id !== undefined) {
      return Promise.resolve(id);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.items.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }
}
