/**
 * Plainsh Runtime Host — JsonlHistoryStore Tests
 *
 *   - record/search/recent ordering and limits
 *   - stats: rates, counts, windows, top commands, seven-day activity
 *   - frequencies feed only SUCCESS entries under the requested tags
 *   - recent/search narrowed to one session
 *   - export/import round trip, duplicate and invalid-line accounting
 *   - CSV export with RFC 4180 quoting
 *   - clear is total, or bounded by age, and returns the removed count
 *   - a partially written trailing line is never observed
 *
 * Isolation: MemoryStateIO for the store; temp dirs for export/import files.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { HistoryOutcome, IOError, RiskTier, StorageError } from '@plainsh/core';
import type { HistoryEntry } from '@plainsh/core';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';
import { JsonlHistoryStore, csvCell } from '../src/history/jsonl-history-store.js';
import { historyEntrySchema } from '../src/history/entry-schema.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date('2026-03-10T12:00:00.000Z');

let counter = 0;

function entry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  counter++;
  const seq = String(counter).padStart(4, '0');
  return {
    id: `01J0000000000000000000${seq}`,
    input: 'list files',
    command: 'ls -la',
    tier: RiskTier.Safe,
    outcome: HistoryOutcome.Success,
    exit_code: 0,
    duration_ms: 10,
    working_directory: '/work',
    context_tag: 'unknown',
    created_at: `2026-03-10T10:00:${String(counter % 60).padStart(2, '0')}.000Z`,
    mode: 'natural',
    error_message: null,
    model: 'test-model',
    session_id: 'session-1',
    ...overrides,
  };
}

function store(io: StateIO = new MemoryStateIO()): JsonlHistoryStore {
  return new JsonlHistoryStore(io, { now: () => NOW });
}

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'plainsh-history-'));
}

// ---------------------------------------------------------------------------
// search / recent
// ---------------------------------------------------------------------------

describe('search and recent', () => {
  it('returns the five newest matches for "git" out of seven', () => {
    const s = store();
    const gits: HistoryEntry[] = [];
    for (let i = 0; i < 7; i++) {
      const e = entry({
        input: 'git status',
        command: 'git status',
        created_at: `2026-03-01T00:00:0${i}.000Z`,
      });
      gits.push(e);
      s.record(e);
    }
    s.record(entry({ input: 'list files', command: 'ls', created_at: '2026-03-02T00:00:00.000Z' }));
    s.record(entry({ input: 'disk usage', command: 'df -h', created_at: '2026-03-02T00:00:01.000Z' }));
    s.record(entry({ input: 'who am i', command: 'whoami', created_at: '2026-03-02T00:00:02.000Z' }));

    const found = s.search('git', 5);
    expect(found.map((e) => e.id)).toEqual(gits.slice(2).reverse().map((e) => e.id));
  });

  it('matches input or command case-insensitively', () => {
    const s = store();
    const byInput = entry({ input: 'Show Disk Usage', command: 'df -h' });
    const byCommand = entry({ input: 'what is here', command: 'LS -la' });
    const neither = entry({ input: 'hello', command: 'echo hi' });
    [byInput, byCommand, neither].forEach((e) => s.record(e));

    expect(s.search('disk', 10).map((e) => e.id)).toEqual([byInput.id]);
    expect(s.search('ls', 10).map((e) => e.id)).toEqual([byCommand.id]);
  });

  it('searches entries without a command by input only', () => {
    const s = store();
    const failed = entry({
      input: 'translate this',
      command: null,
      tier: null,
      outcome: HistoryOutcome.Error,
      exit_code: null,
    });
    s.record(failed);
    expect(s.search('translate', 10)).toEqual([failed]);
  });

  it('returns nothing for a non-positive limit', () => {
    const s = store();
    s.record(entry());
    expect(s.search('', 0)).toEqual([]);
    expect(s.recent(0)).toEqual([]);
  });

  it('recent lists newest first', () => {
    const s = store();
    const a = entry({ created_at: '2026-03-01T00:00:00.000Z' });
    const b = entry({ created_at: '2026-03-03T00:00:00.000Z' });
    const c = entry({ created_at: '2026-03-02T00:00:00.000Z' });
    [a, b, c].forEach((e) => s.record(e));
    expect(s.recent(2).map((e) => e.id)).toEqual([b.id, c.id]);
  });

  it('narrows recent and search to one session', () => {
    const s = store();
    const mine = entry({ session_id: 'session-a', command: 'git log' });
    const theirs = entry({ session_id: 'session-b', command: 'git log' });
    const older = entry({ session_id: 'session-a', command: 'ls' });
    [older, mine, theirs].forEach((e) => s.record(e));

    expect(s.recent(10, { session_id: 'session-a' }).map((e) => e.id)).toEqual([mine.id, older.id]);
    expect(s.search('git', 10, { session_id: 'session-a' }).map((e) => e.id)).toEqual([mine.id]);
    expect(s.recent(10, { session_id: 'session-c' })).toEqual([]);
    expect(s.recent(10, {})).toHaveLength(3);
  });

  it('never observes a partially written trailing entry', () => {
    const io = new MemoryStateIO();
    const s = store(io);
    const whole = entry();
    s.record(whole);
    io.plantRaw('history.jsonl', JSON.stringify(entry()).slice(0, 40));
    expect(s.recent(10)).toEqual([whole]);
  });

  it('keeps an entry recorded after an interrupted write', () => {
    const io = new MemoryStateIO();
    const s = store(io);
    io.plantRaw('history.jsonl', JSON.stringify(entry()).slice(0, 40));
    const next = entry();
    s.record(next);
    expect(s.recent(10)).toEqual([next]);
    expect(s.inspect().parseErrors).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// stats
// ---------------------------------------------------------------------------

describe('stats', () => {
  it('is all zeros for an empty store, with seven days of activity', () => {
    const stats = store().stats();
    expect(stats.total).toBe(0);
    expect(stats.success_rate).toBe(0);
    expect(stats.mean_duration_ms).toBe(0);
    expect(stats.top_commands).toEqual([]);
    expect(stats.recent_activity.map((d) => d.date)).toEqual([
      '2026-03-04',
      '2026-03-05',
      '2026-03-06',
      '2026-03-07',
      '2026-03-08',
      '2026-03-09',
      '2026-03-10',
    ]);
  });

  it('computes rates, counts and distributions', () => {
    const s = store();
    s.record(entry({ command: 'ls', duration_ms: 10 }));
    s.record(entry({ command: 'ls', duration_ms: 30 }));
    s.record(entry({ command: 'make', outcome: HistoryOutcome.Failure, exit_code: 2, duration_ms: 50, context_tag: 'cpp' }));
    s.record(
      entry({
        command: 'rm -rf /',
        tier: RiskTier.Critical,
        outcome: HistoryOutcome.Rejected,
        exit_code: null,
        duration_ms: 0,
        mode: 'direct',
      }),
    );

    const stats = s.stats();
    expect(stats.total).toBe(4);
    expect(stats.success_rate).toBe(50);
    expect(stats.mean_duration_ms).toBe(30);
    expect(stats.outcome_counts).toEqual({ SUCCESS: 2, FAILURE: 1, REJECTED: 1, ERROR: 0 });
    expect(stats.mode_counts).toEqual({ natural: 3, direct: 1 });
    expect(stats.context_distribution).toEqual({ unknown: 3, cpp: 1 });
    expect(stats.top_commands).toEqual([
      { command: 'ls', count: 2 },
      { command: 'make', count: 1 },
      { command: 'rm -rf /', count: 1 },
    ]);
  });

  it('rounds the success rate to one decimal place', () => {
    const s = store();
    s.record(entry());
    s.record(entry({ outcome: HistoryOutcome.Failure, exit_code: 1 }));
    s.record(entry({ outcome: HistoryOutcome.Failure, exit_code: 1 }));
    expect(s.stats().success_rate).toBe(33.3);
  });

  it('applies the window before aggregating', () => {
    const s = store();
    s.record(entry({ created_at: '2026-03-01T00:00:00.000Z', context_tag: 'git' }));
    s.record(entry({ created_at: '2026-03-05T00:00:00.000Z', context_tag: 'git' }));
    s.record(entry({ created_at: '2026-03-05T00:00:01.000Z', context_tag: 'python' }));
    s.record(entry({ created_at: '2026-03-09T00:00:00.000Z', context_tag: 'git' }));

    expect(s.stats({ since: '2026-03-05T00:00:00.000Z' }).total).toBe(3);
    expect(s.stats({ until: '2026-03-05T00:00:00.000Z' }).total).toBe(1);
    expect(s.stats({ since: '2026-03-02', until: '2026-03-09', context_tag: 'git' }).total).toBe(1);
  });

  it('counts activity per UTC day', () => {
    const s = store();
    s.record(entry({ created_at: '2026-03-10T01:00:00.000Z' }));
    s.record(entry({ created_at: '2026-03-10T02:00:00.000Z' }));
    s.record(entry({ created_at: '2026-03-08T23:59:59.000Z' }));
    s.record(entry({ created_at: '2026-02-01T00:00:00.000Z' }));

    const activity = s.stats().recent_activity;
    expect(activity[6]).toEqual({ date: '2026-03-10', count: 2 });
    expect(activity[4]).toEqual({ date: '2026-03-08', count: 1 });
    expect(activity.reduce((sum, d) => sum + d.count, 0)).toBe(3);
  });

  it('keeps at most ten top commands', () => {
    const s = store();
    for (let i = 0; i < 12; i++) s.record(entry({ command: `echo ${String(i).padStart(2, '0')}` }));
    expect(s.stats().top_commands).toHaveLength(10);
  });

  it('reflects a write in the next read', () => {
    const s = store();
    expect(s.stats().total).toBe(0);
    s.record(entry());
    expect(s.stats().total).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// frequencies
// ---------------------------------------------------------------------------

describe('frequencies', () => {
  it('counts SUCCESS entries under the requested tags only', () => {
    const s = store();
    s.record(entry({ command: 'git status', context_tag: 'git', created_at: '2026-03-01T00:00:00.000Z' }));
    s.record(entry({ command: 'git status', context_tag: 'git', created_at: '2026-03-02T00:00:00.000Z' }));
    s.record(entry({ command: 'git push', context_tag: 'git', outcome: HistoryOutcome.Failure, exit_code: 1 }));
    s.record(entry({ command: 'npm test', context_tag: 'nodejs' }));

    expect(s.frequencies(['git'])).toEqual([
      { command: 'git status', count: 2, last_used: '2026-03-02T00:00:00.000Z' },
    ]);
    expect(s.frequencies([])).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// export / import / clear
// ---------------------------------------------------------------------------

describe('export and import', () => {
  it('round-trips every entry in created_at order', () => {
    const source = store();
    const entries = [
      entry({ created_at: '2026-03-02T00:00:00.000Z' }),
      entry({ created_at: '2026-03-01T00:00:00.000Z', command: null, tier: null, outcome: HistoryOutcome.Error, exit_code: null, error_message: 'Translation failed: offline' }),
      entry({ created_at: '2026-03-03T00:00:00.000Z', outcome: HistoryOutcome.Rejected, exit_code: null, error_message: 'Declined by operator [SAFE]' }),
    ];
    entries.forEach((e) => source.record(e));

    const file = join(tempDir(), 'export.jsonl');
    expect(source.export(file)).toBe(3);

    const lines = readFileSync(file, 'utf-8').trimEnd().split('\n');
    expect(lines.map((l) => historyEntrySchema.parse(JSON.parse(l)).created_at)).toEqual([
      '2026-03-01T00:00:00.000Z',
      '2026-03-02T00:00:00.000Z',
      '2026-03-03T00:00:00.000Z',
    ]);

    const target = store();
    expect(target.import(file)).toEqual({ imported: 3, duplicates: 0, invalid: 0 });
    expect(target.recent(10)).toEqual(source.recent(10));
  });

  it('skips ids that already exist and counts invalid lines', () => {
    const s = store();
    const existing = entry();
    s.record(existing);
    const fresh = entry();

    const file = join(tempDir(), 'import.jsonl');
    writeFileSync(
      file,
      [JSON.stringify(existing), 'garbage', JSON.stringify({ ...fresh, outcome: 'MAYBE' }), JSON.stringify(fresh)].join('\n'),
      'utf-8',
    );

    expect(s.import(file)).toEqual({ imported: 1, duplicates: 1, invalid: 2 });
    expect(s.recent(10)).toHaveLength(2);
  });

  it('writes CSV with a header row and quoted fields', () => {
    const s = store();
    s.record(entry({
      id: '01J00000000000000000000CSV',
      created_at: '2026-03-01T00:00:00.000Z',
      input: 'say "hi", twice',
      command: 'echo hi\necho hi',
      outcome: HistoryOutcome.Rejected,
      exit_code: null,
      duration_ms: 0,
      model: null,
      error_message: 'Declined by operator [SAFE]',
    }));

    const file = join(tempDir(), 'export.csv');
    expect(s.export(file, 'csv')).toBe(1);
    expect(readFileSync(file, 'utf-8')).toBe(
      'id,created_at,session_id,mode,input,command,tier,outcome,exit_code,duration_ms,working_directory,context_tag,model,error_message\n' +
        '01J00000000000000000000CSV,2026-03-01T00:00:00.000Z,session-1,natural,"say ""hi"", twice","echo hi\necho hi",SAFE,REJECTED,,0,/work,unknown,,Declined by operator [SAFE]\n',
    );
  });

  it('quotes only cells that need it', () => {
    expect(csvCell('plain')).toBe('plain');
    expect(csvCell(null)).toBe('');
    expect(csvCell(42)).toBe('42');
    expect(csvCell('a,b')).toBe('"a,b"');
    expect(csvCell('line\r\nbreak')).toBe('"line\r\nbreak"');
  });

  it('throws IOError when the export target is not writable', () => {
    const s = store();
    const missingDir = join(tempDir(), 'missing', 'export.jsonl');
    expect(() => s.export(missingDir)).toThrow(IOError);
  });

  it('throws IOError when the import source cannot be read', () => {
    expect(() => store().import(join(tempDir(), 'absent.jsonl'))).toThrow(IOError);
  });
});

describe('clear', () => {
  it('removes every entry and returns the count', () => {
    const io = new FileStateIO(tempDir());
    const s = store(io);
    s.record(entry());
    s.record(entry());
    expect(s.clear()).toBe(2);
    expect(s.recent(10)).toEqual([]);
    expect(s.stats().total).toBe(0);
    expect(s.clear()).toBe(0);
  });

  it('removes only entries older than the given number of days', () => {
    const s = store();
    const old = entry({ created_at: '2026-03-01T00:00:00.000Z' });
    const edge = entry({ created_at: '2026-03-03T12:00:00.000Z' });
    const fresh = entry({ created_at: '2026-03-09T00:00:00.000Z' });
    [old, edge, fresh].forEach((e) => s.record(e));

    expect(s.clear({ olderThanDays: 7 })).toBe(1);
    expect(s.recent(10).map((e) => e.id)).toEqual([fresh.id, edge.id]);
    expect(s.clear({ olderThanDays: 7 })).toBe(0);
  });

  it('rejects a negative age', () => {
    const s = store();
    s.record(entry());
    expect(() => s.clear({ olderThanDays: -1 })).toThrow(RangeError);
    expect(s.recent(10)).toHaveLength(1);
  });
});

describe('storage faults', () => {
  it('wraps append failures in StorageError', () => {
    const io = new MemoryStateIO();
    io.appendLine = () => {
      throw new Error('disk full');
    };
    const e = entry();
    expect(() => store(io).record(e)).toThrow(StorageError);
    expect(() => store(io).record(e)).toThrow(`Failed to record history entry ${e.id}: disk full`);
  });
});
