/**
 * Plainsh Runtime Host — JSONL History Store
 *
 * HistoryStore over an append-only `history.jsonl` in the plainsh home,
 * accessed exclusively through StateIO.
 *
 * - record() appends one line synchronously; the entry is durable before
 *   the call returns.
 * - Every read re-reads the log through readLog(), so a partially written
 *   trailing line or a duplicated id is never observed, and statistics are
 *   always derived from the current content.
 * - clear() replaces the log atomically (temp file + rename); a partial
 *   clear rewrites the surviving entries in one replacement.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { HistoryOutcome, IOError, StorageError, errorMessage } from '@plainsh/core';
import type {
  ClearOptions,
  CommandCount,
  CommandFrequency,
  DailyCount,
  ExportFormat,
  HistoryEntry,
  HistoryFilter,
  HistoryStats,
  HistoryStore,
  HistoryWindow,
  ImportResult,
  InputMode,
} from '@plainsh/core';
import type { StateIO } from '../state/state-io.js';
import { readLog } from '../logging/log-reader.js';
import type { LogReadResult, LogReadStats } from '../logging/log-reader.js';
import { HISTORY_FORMAT, HISTORY_LOG } from './entry-schema.js';

/** Number of commands in HistoryStats.top_commands. */
export const TOP_COMMANDS = 10;

/** Number of days in HistoryStats.recent_activity. */
export const ACTIVITY_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Column order of a CSV export. */
export const CSV_COLUMNS: ReadonlyArray<keyof HistoryEntry> = [
  'id',
  'created_at',
  'session_id',
  'mode',
  'input',
  'command',
  'tier',
  'outcome',
  'exit_code',
  'duration_ms',
  'working_directory',
  'context_tag',
  'model',
  'error_message',
];

export interface JsonlHistoryStoreOptions {
  /** Evaluation time for recent_activity. Defaults to the wall clock. */
  readonly now?: () => Date;
}

export class JsonlHistoryStore implements HistoryStore {
  private readonly now: () => Date;

  constructor(
    private readonly stateIO: StateIO,
    options: JsonlHistoryStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  record(entry: HistoryEntry): void {
    try {
      this.stateIO.appendLine(HISTORY_LOG, JSON.stringify(entry));
    } catch (err) {
      throw new StorageError(`Failed to record history entry ${entry.id}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  clear(options: ClearOptions = {}): number {
    const entries = this.load();
    const { olderThanDays } = options;
    let kept: ReadonlyArray<HistoryEntry> = [];
    if (olderThanDays !== undefined) {
      if (!Number.isFinite(olderThanDays) || olderThanDays < 0) {
        throw new RangeError(`olderThanDays must be a non-negative number, got ${olderThanDays}`);
      }
      const cutoff = new Date(this.now().getTime() - olderThanDays * DAY_MS).toISOString();
      kept = entries.filter((e) => e.created_at >= cutoff);
    }
    try {
      this.stateIO.replaceLogRaw(HISTORY_LOG, kept.map((e) => JSON.stringify(e) + '\n').join(''));
    } catch (err) {
      throw new StorageError(`Failed to clear history: ${errorMessage(err)}`, { cause: err });
    }
    return entries.length - kept.length;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  search(term: string, limit: number, filter: HistoryFilter = {}): ReadonlyArray<HistoryEntry> {
    if (limit <= 0) return [];
    const needle = term.toLowerCase();
    return newestFirst(this.load())
      .filter((e) => matchesFilter(e, filter))
      .filter(
        (e) =>
          e.input.toLowerCase().includes(needle) ||
          (e.command !== null && e.command.toLowerCase().includes(needle)),
      )
      .slice(0, limit);
  }

  recent(limit: number, filter: HistoryFilter = {}): ReadonlyArray<HistoryEntry> {
    if (limit <= 0) return [];
    return newestFirst(this.load())
      .filter((e) => matchesFilter(e, filter))
      .slice(0, limit);
  }

  frequencies(contextTags: ReadonlyArray<string>): ReadonlyArray<CommandFrequency> {
    const byCommand = new Map<string, { count: number; last_used: string }>();
    for (const entry of this.load()) {
      if (entry.outcome !== HistoryOutcome.Success || entry.command === null) continue;
      if (!contextTags.includes(entry.context_tag)) continue;
      const known = byCommand.get(entry.command);
      if (known === undefined) {
        byCommand.set(entry.command, { count: 1, last_used: entry.created_at });
      } else {
        known.count++;
        if (entry.created_at > known.last_used) known.last_used = entry.created_at;
      }
    }
    return [...byCommand].map(([command, f]) => ({ command, count: f.count, last_used: f.last_used }));
  }

  stats(window: HistoryWindow = {}): HistoryStats {
    const entries = this.load().filter((e) => inWindow(e, window));

    const outcome_counts: Record<HistoryOutcome, number> = {
      [HistoryOutcome.Success]: 0,
      [HistoryOutcome.Failure]: 0,
      [HistoryOutcome.Rejected]: 0,
      [HistoryOutcome.Error]: 0,
    };
    const mode_counts: Record<InputMode, number> = { natural: 0, direct: 0 };
    const context_distribution: Record<string, number> = {};
    const commandCounts = new Map<string, number>();
    let executed = 0;
    let durationTotal = 0;

    for (const entry of entries) {
      outcome_counts[entry.outcome]++;
      mode_counts[entry.mode]++;
      context_distribution[entry.context_tag] = (context_distribution[entry.context_tag] ?? 0) + 1;
      if (entry.command !== null) {
        commandCounts.set(entry.command, (commandCounts.get(entry.command) ?? 0) + 1);
      }
      if (reachedExecutor(entry)) {
        executed++;
        durationTotal += entry.duration_ms;
      }
    }

    const total = entries.length;
    const successes = outcome_counts[HistoryOutcome.Success];

    return {
      total,
      success_rate: total === 0 ? 0 : Math.round((successes / total) * 1000) / 10,
      mean_duration_ms: executed === 0 ? 0 : Math.round(durationTotal / executed),
      outcome_counts,
      mode_counts,
      top_commands: topCommands(commandCounts),
      context_distribution,
      recent_activity: recentActivity(entries, this.now()),
    };
  }

  // -------------------------------------------------------------------------
  // Export / import
  // -------------------------------------------------------------------------

  export(path: string, format: ExportFormat = 'jsonl'): number {
    const entries = this.load();
    const content = format === 'csv' ? toCsv(entries) : entries.map((e) => JSON.stringify(e) + '\n').join('');
    try {
      writeFileSync(path, content, 'utf-8');
    } catch (err) {
      throw new IOError(`Cannot write history export to ${path}: ${errorMessage(err)}`, path, {
        cause: err,
      });
    }
    return entries.length;
  }

  import(path: string): ImportResult {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new IOError(`Cannot read history import from ${path}: ${errorMessage(err)}`, path, {
        cause: err,
      });
    }

    // A hand-edited file may lack the final newline; its last line is complete.
    const complete = raw.length === 0 || raw.endsWith('\n') ? raw : raw + '\n';
    const incoming = readLog(complete, HISTORY_FORMAT);
    const known = new Set(this.load().map((e) => e.id));

    let imported = 0;
    let duplicates = incoming.stats.duplicates;
    for (const entry of incoming.events) {
      if (known.has(entry.id)) {
        duplicates++;
        continue;
      }
      this.record(entry);
      known.add(entry.id);
      imported++;
    }

    return { imported, duplicates, invalid: incoming.stats.parseErrors };
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Read statistics of the underlying log, for `plainsh check`. */
  inspect(): LogReadStats {
    return this.read().stats;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private read(): LogReadResult<HistoryEntry> {
    let raw: string;
    try {
      raw = this.stateIO.readLogRaw(HISTORY_LOG);
    } catch (err) {
      throw new StorageError(`Failed to read history: ${errorMessage(err)}`, { cause: err });
    }
    return readLog(raw, HISTORY_FORMAT);
  }

  /** Valid entries, oldest first. */
  private load(): ReadonlyArray<HistoryEntry> {
    return this.read().events;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function newestFirst(entries: ReadonlyArray<HistoryEntry>): HistoryEntry[] {
  return [...entries].reverse();
}

function matchesFilter(entry: HistoryEntry, filter: HistoryFilter): boolean {
  return filter.session_id === undefined || entry.session_id === filter.session_id;
}

function inWindow(entry: HistoryEntry, window: HistoryWindow): boolean {
  if (window.since !== undefined && entry.created_at < window.since) return false;
  if (window.until !== undefined && entry.created_at >= window.until) return false;
  if (window.context_tag !== undefined && entry.context_tag !== window.context_tag) return false;
  return true;
}

/** SUCCESS and FAILURE always executed; ERROR only when a command existed. */
function reachedExecutor(entry: HistoryEntry): boolean {
  switch (entry.outcome) {
    case HistoryOutcome.Success:
    case HistoryOutcome.Failure:
      return true;
    case HistoryOutcome.Error:
      return entry.command !== null && entry.tier !== null;
    case HistoryOutcome.Rejected:
      return false;
  }
}

function topCommands(counts: ReadonlyMap<string, number>): CommandCount[] {
  return [...counts]
    .map(([command, count]) => ({ command, count }))
    .sort((a, b) => b.count - a.count || (a.command < b.command ? -1 : a.command > b.command ? 1 : 0))
    .slice(0, TOP_COMMANDS);
}

/** Per-day counts for the seven UTC days ending on the day of `now`, oldest first. */
function recentActivity(entries: ReadonlyArray<HistoryEntry>, now: Date): DailyCount[] {
  const days: DailyCount[] = [];
  for (let back = ACTIVITY_DAYS - 1; back >= 0; back--) {
    const date = new Date(now.getTime() - back * DAY_MS).toISOString().slice(0, 10);
    days.push({ date, count: entries.filter((e) => e.created_at.startsWith(date)).length });
  }
  return days;
}

// ---------------------------------------------------------------------------
// CSV
// ---------------------------------------------------------------------------

/** Header row plus one row per entry; null fields are empty cells. */
function toCsv(entries: ReadonlyArray<HistoryEntry>): string {
  const rows = [CSV_COLUMNS.join(',')];
  for (const entry of entries) {
    rows.push(CSV_COLUMNS.map((column) => csvCell(entry[column])).join(','));
  }
  return rows.join('\n') + '\n';
}

/** RFC 4180 quoting: fields holding a comma, quote or line break are quoted. */
export function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
