/**
 * Kiln Kernel: Ready Queue Tests
 */

import { describe, it, expect } from 'vitest';
import { ReadyQueue } from '../src/index.js';

describe('ready-queue: FIFO hand-off', () => {
  it('returns queued ids in push order', async () => {
    const queue = new ReadyQueue();
    queue.push(3);
    queue.push(1);
    expect(queue.size).toBe(2);
    expect(await queue.take()).toBe(3);
    expect(await queue.take()).toBe(1);
  });

  it('hands a pushed id to the longest-waiting taker', async () => {
    const queue = new ReadyQueue();
    const first = queue.take();
    const second = queue.take();
    queue.push(7);
    queue.push(8);
    expect(await first).toBe(7);
    expect(await second).toBe(8);
    expect(queue.size).toBe(0);
  });

  it('releases waiters and drops queued ids on close', async () => {
    const queue = new ReadyQueue();
    const waiting = queue.take();
    queue.close();
    expect(await waiting).toBeUndefined();

    const closed = new ReadyQueue();
    closed.push(1);
    closed.close();
    closed.push(2);
    expect(closed.isClosed).toBe(true);
    expect(closed.size).toBe(0);
    expect(await closed.take()).toBeUndefined();
  });
});
