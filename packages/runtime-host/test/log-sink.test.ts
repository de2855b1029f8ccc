/**
 * Kiln Runtime Host: Build Log Sink Tests
 *
 * log/ulid: identifier format and ordering.
 * log/sink: FileLogSink writes one stored entry per event.
 */

import { describe, it, expect } from 'vitest';
import { BuildEventLogger, BuildEventType, type BuildLogEntry } from '@kiln/kernel';
import { BUILD_LOG_FILE, FileLogSink } from '../src/logging/file-log-sink.js';
import { createUlidGenerator, ulid } from '../src/logging/ulid.js';
import { MemoryStateIO } from '../src/state/state-io.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

function zeros(size: number): Uint8Array {
  return new Uint8Array(size);
}

function entry(event: BuildEventType, ruleId: number | null): BuildLogEntry {
  return {
    event,
    rule_id: ruleId,
    rule_name: ruleId === null ? null : `rule${ruleId}`,
    reason: null,
    error: null,
    timestamp: '2026-01-02T03:04:05.000Z',
  };
}

// ---------------------------------------------------------------------------
// log/ulid
// ---------------------------------------------------------------------------

describe('log/ulid: identifiers', () => {
  it('produces 26 Crockford base32 characters', () => {
    expect(ulid()).toMatch(ULID_PATTERN);
  });

  it('encodes the timestamp in the first ten characters', () => {
    let time = 0;
    const next = createUlidGenerator({ now: () => time, random: zeros });
    expect(next()).toBe('00000000000000000000000000');
    time = 1;
    expect(next()).toBe('00000000010000000000000000');
  });

  it('increments the random part within the same millisecond', () => {
    const next = createUlidGenerator({ now: () => 1000, random: zeros });
    const ids = [next(), next(), next()];
    expect(ids.map((id) => id.slice(10))).toEqual([
      '0000000000000000',
      '0000000000000001',
      '0000000000000002',
    ]);
  });

  it('keeps identifiers strictly increasing when the random draw is high', () => {
    const next = createUlidGenerator({ now: () => 5, random: (size) => new Uint8Array(size).fill(0xfe) });
    const first = next();
    const second = next();
    expect(second > first).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// log/sink
// ---------------------------------------------------------------------------

describe('log/sink: FileLogSink', () => {
  it('appends one JSON line per entry with its event_id first', () => {
    const io = new MemoryStateIO();
    let n = 0;
    const sink = new FileLogSink(io, () => `id-${++n}`);

    sink.append(entry(BuildEventType.Start, 0));
    sink.append(entry(BuildEventType.StopOnFail, null));

    const lines = io.readLines(BUILD_LOG_FILE);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(
      '{"event_id":"id-1","event":"Start","rule_id":0,"rule_name":"rule0","reason":null,"error":null,"timestamp":"2026-01-02T03:04:05.000Z"}',
    );
    expect(JSON.parse(lines[1] ?? '')).toEqual({ event_id: 'id-2', ...entry(BuildEventType.StopOnFail, null) });
  });

  it('receives entries from the kernel event logger', () => {
    const io = new MemoryStateIO();
    const logger = new BuildEventLogger(
      new FileLogSink(io, () => 'fixed'),
      () => new Date('2026-03-01T00:00:00.000Z'),
    );

    logger.observer({ type: BuildEventType.StopOnFail });

    expect(io.readLogRaw(BUILD_LOG_FILE)).toBe(
      '{"event_id":"fixed","event":"StopOnFail","rule_id":null,"rule_name":null,"reason":null,"error":null,"timestamp":"2026-03-01T00:00:00.000Z"}\n',
    );
  });
});
