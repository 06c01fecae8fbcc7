/**
 * Plainsh Core — History Types
 *
 * The persisted HistoryEntry record and the analytics derived from the
 * HistoryEntry set. Field names are the persisted format: exports and
 * re-imports depend on them.
 */

import type { RiskTier } from './risk.js';
import type { InputMode } from './request.js';

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

/**
 * The terminal outcome of a request.
 *
 * - SUCCESS: executed, exit code 0
 * - FAILURE: executed, non-zero exit code
 * - REJECTED: never executed (declined, cancelled, timed out, or unclassifiable)
 * - ERROR: translation failed or the executor faulted
 */
export enum HistoryOutcome {
  Success = 'SUCCESS',
  Failure = 'FAILURE',
  Rejected = 'REJECTED',
  Error = 'ERROR',
}

// ---------------------------------------------------------------------------
// History Entry
// ---------------------------------------------------------------------------

/**
 * A persisted record of one request.
 *
 * Invariants:
 * - outcome REJECTED ⇒ exit_code is null
 * - outcome SUCCESS ⇒ exit_code is 0
 *
 * Append-only. Entries are never updated; they are removed only by an
 * explicit bulk clear.
 */
export interface HistoryEntry {
  /** ULID, unique per entry. */
  readonly id: string;
  /** Original user input. */
  readonly input: string;
  /** Candidate command, or null when none was produced. */
  readonly command: string | null;
  /** Tier at decision time; null when classification never happened. */
  readonly tier: RiskTier | null;
  readonly outcome: HistoryOutcome;
  readonly exit_code: number | null;
  /** Execution wall time in milliseconds; 0 when nothing executed. */
  readonly duration_ms: number;
  readonly working_directory: string;
  /** Primary context tag at the time of the run, `unknown` if none. */
  readonly context_tag: string;
  /** ISO 8601 creation timestamp. */
  readonly created_at: string;
  readonly mode: InputMode;
  /** Rejection reason, stderr summary, or fault message. */
  readonly error_message: string | null;
  /** Translation model, null for direct input. */
  readonly model: string | null;
  readonly session_id: string;
}

// ---------------------------------------------------------------------------
// Analytics
// ---------------------------------------------------------------------------

/** Optional filter applied before statistics are computed. */
export interface HistoryWindow {
  /** Inclusive lower bound on created_at (ISO 8601). */
  readonly since?: string | undefined;
  /** Exclusive upper bound on created_at (ISO 8601). */
  readonly until?: string | undefined;
  readonly context_tag?: string | undefined;
}

/** Narrows `recent` and `search` to the entries of one session. */
export interface HistoryFilter {
  readonly session_id?: string | undefined;
}

export interface ClearOptions {
  /** Remove only entries created more than this many days ago. */
  readonly olderThanDays?: number | undefined;
}

/** `jsonl` re-imports; `csv` is for spreadsheets and cannot be imported. */
export type ExportFormat = 'jsonl' | 'csv';

export interface CommandCount {
  readonly command: string;
  readonly count: number;
}

export interface DailyCount {
  /** YYYY-MM-DD (UTC). */
  readonly date: string;
  readonly count: number;
}

/**
 * Aggregate statistics. Derived, never stored; recomputed on every call so
 * a write is always reflected in the next read.
 */
export interface HistoryStats {
  readonly total: number;
  /** Percentage of SUCCESS outcomes, one decimal place. 0 for an empty set. */
  readonly success_rate: number;
  /** Mean duration over entries that reached the executor. */
  readonly mean_duration_ms: number;
  readonly outcome_counts: Readonly<Record<HistoryOutcome, number>>;
  readonly mode_counts: Readonly<Record<InputMode, number>>;
  /** Most frequent commands, highest count first, at most ten. */
  readonly top_commands: ReadonlyArray<CommandCount>;
  readonly context_distribution: Readonly<Record<string, number>>;
  /** Per-day counts for the seven days ending at the evaluation time. */
  readonly recent_activity: ReadonlyArray<DailyCount>;
}

/**
 * Frequency of one command under a set of context tags, used by the
 * SuggestionRanker.
 */
export interface CommandFrequency {
  readonly command: string;
  readonly count: number;
  /** ISO 8601 timestamp of the most recent use. */
  readonly last_used: string;
}
