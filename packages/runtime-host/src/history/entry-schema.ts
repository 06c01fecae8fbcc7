/**
 * Plainsh Runtime Host — History Record Formats
 *
 * zod schemas for the two JSONL logs under `<home>/logs/`: history entries
 * (`history.jsonl`) and pipeline lifecycle events (`sessions.jsonl`). Every
 * record read back from disk or from an import file passes through these.
 */

import { z } from 'zod';
import { HistoryOutcome, RiskTier } from '@plainsh/core';
import type { HistoryEntry, LifecycleEvent } from '@plainsh/core';
import type { LogFormat } from '../logging/log-reader.js';

export const HISTORY_LOG = 'history.jsonl';
export const SESSION_LOG = 'sessions.jsonl';

export const historyEntrySchema: z.ZodType<HistoryEntry, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    input: z.string(),
    command: z.string().nullable(),
    tier: z.nativeEnum(RiskTier).nullable(),
    outcome: z.nativeEnum(HistoryOutcome),
    exit_code: z.number().int().nullable(),
    duration_ms: z.number().nonnegative(),
    working_directory: z.string(),
    context_tag: z.string().min(1),
    created_at: z.string().datetime(),
    mode: z.enum(['natural', 'direct']),
    error_message: z.string().nullable(),
    model: z.string().nullable(),
    session_id: z.string(),
  })
  .superRefine((entry, ctx) => {
    if (entry.outcome === HistoryOutcome.Rejected && entry.exit_code !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'a REJECTED entry has no exit code' });
    }
    if (entry.outcome === HistoryOutcome.Success && entry.exit_code !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'a SUCCESS entry has exit code 0' });
    }
  });

export const HISTORY_FORMAT: LogFormat<HistoryEntry> = {
  schema: historyEntrySchema,
  key: (entry) => entry.id,
  time: (entry) => entry.created_at,
};

// ---------------------------------------------------------------------------
// Session events
// ---------------------------------------------------------------------------

const stateKind = z.enum([
  'RECEIVED',
  'TRANSLATING',
  'CLASSIFIED',
  'AWAITING_CONFIRMATION',
  'CONFIRMED',
  'EXECUTING',
  'REJECTED',
  'RECORDED_SUCCESS',
  'RECORDED_FAILURE',
]);

const eventType = z.enum([
  'TRANSLATE',
  'CLASSIFY',
  'TRANSLATION_FAILED',
  'CLASSIFICATION_FAULT',
  'REQUEST_CONFIRMATION',
  'AFFIRM',
  'REJECT',
  'BYPASS',
  'EXECUTE',
  'EXECUTED',
  'EXECUTION_FAULT',
]);

/** A lifecycle event as persisted: the event plus its own ULID. */
export interface StoredLifecycleEvent extends LifecycleEvent {
  readonly event_id: string;
}

export const lifecycleEventSchema: z.ZodType<StoredLifecycleEvent, z.ZodTypeDef, unknown> = z.object({
  event_id: z.string().min(1),
  session_id: z.string(),
  request_id: z.string(),
  event: eventType,
  from: stateKind,
  to: stateKind,
  tier: z.nativeEnum(RiskTier).nullable(),
  detail: z.string().nullable(),
  at: z.string().datetime(),
});

export const SESSION_FORMAT: LogFormat<StoredLifecycleEvent> = {
  schema: lifecycleEventSchema,
  key: (event) => event.event_id,
  time: (event) => event.at,
};
