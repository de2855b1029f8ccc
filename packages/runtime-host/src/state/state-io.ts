/**
 * Kiln Runtime Host: StateIO
 *
 * Injectable I/O for the files Kiln keeps under its state directory
 * (`.kiln` in the project by default). Only append-only logs live there.
 *
 * Two implementations are provided:
 *   - FileStateIO:   durable file I/O under a state directory
 *   - MemoryStateIO: in-memory I/O for tests and embedded use
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Append one line to a log file under `logs/`, creating the directory on
   * demand. A newline is added after the content.
   */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file under `logs/`; empty when the file does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

export class FileStateIO implements StateIO {
  constructor(readonly stateDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.stateDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), `${line}\n`, 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.stateDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

export class MemoryStateIO implements StateIO {
  private readonly logs = new Map<string, string[]>();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Not part of StateIO; for tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    // Same shape as the file: every line newline-terminated.
    return lines.map((line) => `${line}\n`).join('');
  }
}

function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
