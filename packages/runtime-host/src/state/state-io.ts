/**
 * Plainsh Runtime Host — StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading and writing JSON
 * files and for appending to and replacing JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a plainsh home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Every file-backed component (history store, session event sink, config
 * loader) injects StateIO rather than touching the file system, so a home
 * directory is the only place a component can read or write.
 */

import {
  appendFileSync,
  closeSync,
  fstatSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * All file paths are relative filenames; the implementation resolves them
 * against its home directory.
 *
 * Invariants:
 * - readJson and writeJson address the home directory itself
 * - log operations address the `logs/` subdirectory
 * - a log line is visible to readers only once its trailing newline is written
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * Returns undefined if the file does not exist. Throws SyntaxError when the
   * file is not valid JSON; callers validate the parsed value.
   */
  readJson(filename: string): unknown;

  /** Serialize a value as pretty-printed JSON, replacing any existing file. */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append `line` plus a newline to a log file, creating `logs/` on demand.
   * When the file ends in an unterminated fragment, the fragment is closed
   * with a newline first so it stays a line of its own.
   */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file; empty string if it does not exist. */
  readLogRaw(logfilename: string): string;

  /**
   * Replace the whole content of a log file atomically.
   *
   * Readers observe either the old content or the new content, never a mix.
   */
  replaceLogRaw(logfilename: string, content: string): void;

  /** Location of a JSON file, for diagnostics. */
  describeJson(filename: string): string;

  /** Location of a log file, for diagnostics. */
  describeLog(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Reads and writes JSON at  `<homeDir>/<filename>`.
 * Appends log lines to      `<homeDir>/logs/<logfilename>`.
 *
 * Directory creation is on demand (recursive mkdir). Synchronous I/O: an
 * append has reached the file before the call returns. ENOENT on read is
 * recoverable; every other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = this.describeJson(filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
    return JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    mkdirSync(this.homeDir, { recursive: true });
    const filePath = join(this.homeDir, filename);
    writeFileSync(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    const target = join(logsDir, logfilename);
    const separator = endsMidLine(target) ? '\n' : '';
    appendFileSync(target, separator + line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(this.describeLog(logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }

  replaceLogRaw(logfilename: string, content: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    const target = join(logsDir, logfilename);
    const temp = `${target}.${process.pid}.tmp`;
    try {
      writeFileSync(temp, content, 'utf-8');
      renameSync(temp, target);
    } catch (err: unknown) {
      rmSync(temp, { force: true });
      throw err;
    }
  }

  describeJson(filename: string): string {
    return join(this.homeDir, filename);
  }

  describeLog(logfilename: string): string {
    return join(this.homeDir, 'logs', logfilename);
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO implementation. No file system access.
 *
 * JSON values round-trip through serialization to match FileStateIO
 * semantics (undefined values are dropped, Dates become strings). Log
 * content is kept as raw text so a test can plant a partial trailing line
 * with `plantRaw`.
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string> = new Map();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const current = this.logs.get(logfilename) ?? '';
    const separator = current === '' || current.endsWith('\n') ? '' : '\n';
    this.logs.set(logfilename, current + separator + line + '\n');
  }

  /**
   * Complete lines appended to a log file. Specific to MemoryStateIO; use
   * it in tests to inspect log output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    const raw = this.logs.get(logfilename) ?? '';
    const lines = raw.split('\n');
    lines.pop();
    return lines;
  }

  readLogRaw(logfilename: string): string {
    return this.logs.get(logfilename) ?? '';
  }

  replaceLogRaw(logfilename: string, content: string): void {
    this.logs.set(logfilename, content);
  }

  /** Append raw text without a newline, as an interrupted writer would. */
  plantRaw(logfilename: string, text: string): void {
    this.logs.set(logfilename, (this.logs.get(logfilename) ?? '') + text);
  }

  /** Store raw text as a JSON file, including text that does not parse. */
  plantJson(filename: string, raw: string): void {
    this.store.set(filename, raw);
  }

  describeJson(filename: string): string {
    return `memory:${filename}`;
  }

  describeLog(logfilename: string): string {
    return `memory:logs/${logfilename}`;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Whether a non-empty file's last byte is something other than a newline. */
function endsMidLine(path: string): boolean {
  let fd: number;
  try {
    fd = openSync(path, 'r');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return false;
    }
    throw err;
  }
  try {
    const { size } = fstatSync(fd);
    if (size === 0) return false;
    const last = Buffer.alloc(1);
    readSync(fd, last, 0, 1, size - 1);
    return last[0] !== 0x0a;
  } finally {
    closeSync(fd);
  }
}

/** Whether `err` is a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}
