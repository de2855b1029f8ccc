/**
 * Kiln Runtime Host: StateIO Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';

describe('state/io: FileStateIO', () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = join(mkdtempSync(join(tmpdir(), 'kiln-state-')), '.kiln');
  });

  afterEach(() => {
    rmSync(stateDir, { recursive: true, force: true });
  });

  it('reads an absent log as empty without creating anything', () => {
    const io = new FileStateIO(stateDir);
    expect(io.readLogRaw('events.jsonl')).toBe('');
    expect(existsSync(stateDir)).toBe(false);
  });

  it('creates logs/ on first append and terminates each line', () => {
    const io = new FileStateIO(stateDir);
    io.appendLine('events.jsonl', 'one');
    io.appendLine('events.jsonl', 'two');

    expect(readFileSync(join(stateDir, 'logs', 'events.jsonl'), 'utf-8')).toBe('one\ntwo\n');
    expect(io.readLogRaw('events.jsonl')).toBe('one\ntwo\n');
  });
});

describe('state/io: MemoryStateIO', () => {
  it('keeps lines per log file', () => {
    const io = new MemoryStateIO();
    io.appendLine('a', 'x');
    io.appendLine('b', 'y');
    io.appendLine('a', 'z');

    expect(io.readLines('a')).toEqual(['x', 'z']);
    expect(io.readLogRaw('b')).toBe('y\n');
    expect(io.readLogRaw('c')).toBe('');
  });
});
