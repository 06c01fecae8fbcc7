/**
 * Plainsh Runtime Host — StateIO Contract Tests
 *
 * Verifies both implementations against the same contract:
 *
 *   - readLogRaw returns '' for a log that has never been written
 *   - appended lines come back newline-terminated, in order
 *   - replaceLogRaw swaps the whole content and leaves no temp file behind
 *   - readJson returns undefined when absent and throws on unparsable JSON
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'plainsh-sio-'));
}

const implementations: ReadonlyArray<readonly [string, () => StateIO]> = [
  ['MemoryStateIO', () => new MemoryStateIO()],
  ['FileStateIO', () => new FileStateIO(tempHome())],
];

describe.each(implementations)('%s', (_name, make) => {
  it('closes an unterminated fragment before appending', () => {
    const io = make();
    io.replaceLogRaw('history.jsonl', '{"id":"A"}\n{"id":');
    io.appendLine('history.jsonl', '{"id":"B"}');
    expect(io.readLogRaw('history.jsonl')).toBe('{"id":"A"}\n{"id":\n{"id":"B"}\n');
  });

  it('returns an empty string for a log that was never written', () => {
    const io = make();
    io.appendLine('other.jsonl', 'x');
    expect(io.readLogRaw('history.jsonl')).toBe('');
  });

  it('returns appended lines newline-terminated, in order', () => {
    const io = make();
    io.appendLine('history.jsonl', '{"id":"A"}');
    io.appendLine('history.jsonl', '{"id":"B"}');
    expect(io.readLogRaw('history.jsonl')).toBe('{"id":"A"}\n{"id":"B"}\n');
  });

  it('replaceLogRaw swaps the whole content', () => {
    const io = make();
    io.appendLine('history.jsonl', '{"id":"A"}');
    io.replaceLogRaw('history.jsonl', '');
    expect(io.readLogRaw('history.jsonl')).toBe('');
    io.appendLine('history.jsonl', '{"id":"C"}');
    expect(io.readLogRaw('history.jsonl')).toBe('{"id":"C"}\n');
  });

  it('readJson returns undefined for a missing file and the value after writeJson', () => {
    const io = make();
    expect(io.readJson('config.json')).toBeUndefined();
    io.writeJson('config.json', { llm: { model: 'test-model' }, dropped: undefined });
    expect(io.readJson('config.json')).toEqual({ llm: { model: 'test-model' } });
  });
});

describe('FileStateIO on disk', () => {
  it('writes logs under logs/ and JSON at the home root', () => {
    const home = tempHome();
    const io = new FileStateIO(home);
    io.appendLine('sessions.jsonl', '{}');
    io.writeJson('config.json', {});
    expect(readdirSync(home).sort()).toEqual(['config.json', 'logs']);
    expect(io.describeLog('sessions.jsonl')).toBe(join(home, 'logs', 'sessions.jsonl'));
  });

  it('leaves no temporary file after replaceLogRaw', () => {
    const home = tempHome();
    const io = new FileStateIO(home);
    io.appendLine('history.jsonl', '{"id":"A"}');
    io.replaceLogRaw('history.jsonl', '{"id":"B"}\n');
    expect(readdirSync(join(home, 'logs'))).toEqual(['history.jsonl']);
    expect(io.readLogRaw('history.jsonl')).toBe('{"id":"B"}\n');
  });

  it('throws SyntaxError for a config file that is not JSON', () => {
    const home = tempHome();
    writeFileSync(join(home, 'config.json'), '{ not json', 'utf-8');
    expect(() => new FileStateIO(home).readJson('config.json')).toThrow(SyntaxError);
  });
});

describe('MemoryStateIO helpers', () => {
  it('plantRaw leaves an unterminated line that readLines does not report', () => {
    const io = new MemoryStateIO();
    io.appendLine('history.jsonl', 'complete');
    io.plantRaw('history.jsonl', 'partial');
    expect(io.readLogRaw('history.jsonl')).toBe('complete\npartial');
    expect(io.readLines('history.jsonl')).toEqual(['complete']);
  });
});
