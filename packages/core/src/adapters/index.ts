/**
 * Plainsh Core — Collaborator Interfaces
 *
 * The core consumes every side effect through these interfaces. No
 * implementations are provided here: concrete adapters live in the
 * runtime-host and cli packages and are injected at construction time.
 */

import type { RiskAssessment } from '../types/risk.js';
import type {
  ClearOptions,
  CommandFrequency,
  ExportFormat,
  HistoryEntry,
  HistoryFilter,
  HistoryStats,
  HistoryWindow,
} from '../types/history.js';

// ---------------------------------------------------------------------------
// Translator
// ---------------------------------------------------------------------------

/** What the translator is told about where the command will run. */
export interface ContextSnapshot {
  readonly cwd: string;
  /** Context tags, most confident first. */
  readonly tags: ReadonlyArray<string>;
}

export interface Translation {
  /** The candidate command, a single line. */
  readonly command: string;
  readonly explanation?: string | undefined;
}

/**
 * Turns free text into a candidate command.
 *
 * Rejects with TranslationError when the service is unreachable or the
 * reply is unusable. Implementations must stop work when `signal` aborts.
 */
export interface Translator {
  /** Model name recorded on history entries. */
  readonly model: string;
  translate(text: string, context: ContextSnapshot, signal: AbortSignal): Promise<Translation>;
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export interface ExecutionResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  /** Working directory after the command; set when the command changed it. */
  readonly cwd?: string | undefined;
}

/**
 * Runs a candidate command with the host interpreter.
 *
 * Rejects with ExecutorFault when the process cannot be started, is killed
 * after `timeoutMs`, or dies from a signal.
 */
export interface Executor {
  run(command: string, cwd: string, timeoutMs: number): Promise<ExecutionResult>;
}

// ---------------------------------------------------------------------------
// Context Detector
// ---------------------------------------------------------------------------

/** Read-only inspection of a directory for project markers. */
export interface ContextDetector {
  /** Tags for `cwd`, most confident first. Empty when nothing is recognised. */
  detect(cwd: string): ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Confirmer
// ---------------------------------------------------------------------------

export type ConfirmationAnswer = 'yes' | 'no' | 'cancel';

/** One question put to the operator. */
export interface ConfirmationPrompt {
  readonly command: string;
  readonly assessment: RiskAssessment;
  /** 1-based index of this confirmation. */
  readonly step: number;
  /** Number of affirmatives required in total. */
  readonly required: number;
}

/**
 * Asks the operator to approve a command.
 *
 * Anything other than an explicit affirmative is treated as a refusal by the
 * pipeline. When `signal` aborts, implementations stop waiting and resolve
 * `cancel` or reject.
 */
export interface Confirmer {
  confirm(prompt: ConfirmationPrompt, signal: AbortSignal): Promise<ConfirmationAnswer>;
}

// ---------------------------------------------------------------------------
// History Store
// ---------------------------------------------------------------------------

export interface ImportResult {
  readonly imported: number;
  /** Entries whose id was already present. */
  readonly duplicates: number;
  /** Lines that were not valid entries. */
  readonly invalid: number;
}

/** Source of per-command frequencies, consumed by the SuggestionRanker. */
export interface HistoryFrequencySource {
  /**
   * Counts of SUCCESS entries whose context tag is one of `contextTags`,
   * grouped by command.
   */
  frequencies(contextTags: ReadonlyArray<string>): ReadonlyArray<CommandFrequency>;
}

/**
 * Durable append-only log of HistoryEntry records plus derived analytics.
 *
 * The store owns its persistence medium exclusively. All operations are
 * synchronous; a write is committed before `record` returns.
 */
export interface HistoryStore extends HistoryFrequencySource {
  /** Append one entry. Throws StorageError on any storage fault. */
  record(entry: HistoryEntry): void;
  /** Case-insensitive substring match over input and command, newest first. */
  search(term: string, limit: number, filter?: HistoryFilter): ReadonlyArray<HistoryEntry>;
  /** The most recent entries, newest first. */
  recent(limit: number, filter?: HistoryFilter): ReadonlyArray<HistoryEntry>;
  stats(window?: HistoryWindow): HistoryStats;
  /** Write every entry, oldest first, as JSONL (default) or CSV. Throws IOError. */
  export(path: string, format?: ExportFormat): number;
  /** Re-import a JSONL export. Throws IOError when `path` cannot be read. */
  import(path: string): ImportResult;
  /**
   * Remove every entry, or with `olderThanDays` only the older ones, in one
   * atomic replacement. Returns the number removed.
   */
  clear(options?: ClearOptions): number;
}
