/**
 * Plainsh Core — Event Sink Interface
 *
 * Injection point for the pipeline lifecycle log. The core owns the
 * contract; the JSONL implementation lives in runtime-host, so the core
 * never writes to disk itself.
 */

import type { PipelineEventType, PipelineStateKind } from '../pipeline/state.js';
import type { RiskTier } from '../types/risk.js';

/** One state change of one request. */
export interface LifecycleEvent {
  readonly session_id: string;
  readonly request_id: string;
  readonly event: PipelineEventType;
  readonly from: PipelineStateKind;
  readonly to: PipelineStateKind;
  /** Tier of the request once classified, otherwise null. */
  readonly tier: RiskTier | null;
  /** Rejection reason or failure message on terminal transitions. */
  readonly detail: string | null;
  /** ISO 8601 timestamp. */
  readonly at: string;
}

/**
 * A sink that receives and persists lifecycle events.
 *
 * append() is called synchronously on every transition, in order.
 */
export interface EventSink {
  append(event: LifecycleEvent): void;
}
