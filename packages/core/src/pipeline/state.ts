/**
 * Plainsh Core — Pipeline State Machine
 *
 * The command lifecycle as an explicit finite-state machine:
 *
 *   RECEIVED → TRANSLATING → CLASSIFIED → AWAITING_CONFIRMATION
 *            ↘─────────────↗            ↘ EXECUTING (SAFE bypass)
 *   AWAITING_CONFIRMATION → CONFIRMED → EXECUTING
 *                         ↘ REJECTED
 *   EXECUTING → RECORDED_SUCCESS | RECORDED_FAILURE
 *
 * `transition` is pure: it computes the next state from the current state,
 * an event, and the session policy, and throws IllegalTransitionError for
 * any move not in the table. The only ways into EXECUTING are EXECUTE from
 * CONFIRMED and BYPASS from a SAFE CLASSIFIED state when the policy does not
 * confirm SAFE commands.
 */

import { IllegalTransitionError } from '../errors.js';
import type { ExecutionResult } from '../adapters/index.js';
import { HistoryOutcome } from '../types/history.js';
import type { CommandRequest } from '../types/request.js';
import { RiskTier } from '../types/risk.js';
import type { RiskAssessment } from '../types/risk.js';

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export type PipelineState =
  | { readonly kind: 'RECEIVED'; readonly request: CommandRequest }
  | { readonly kind: 'TRANSLATING'; readonly request: CommandRequest }
  | {
      readonly kind: 'CLASSIFIED';
      readonly request: CommandRequest;
      readonly assessment: RiskAssessment;
    }
  | {
      readonly kind: 'AWAITING_CONFIRMATION';
      readonly request: CommandRequest;
      readonly assessment: RiskAssessment;
      readonly affirmatives: number;
      readonly required: number;
    }
  | {
      readonly kind: 'CONFIRMED';
      readonly request: CommandRequest;
      readonly assessment: RiskAssessment;
      readonly affirmatives: number;
    }
  | {
      readonly kind: 'EXECUTING';
      readonly request: CommandRequest;
      readonly assessment: RiskAssessment;
      readonly affirmatives: number;
    }
  | {
      readonly kind: 'REJECTED';
      readonly request: CommandRequest;
      readonly assessment: RiskAssessment | null;
      readonly reason: string;
    }
  | {
      readonly kind: 'RECORDED_SUCCESS';
      readonly request: CommandRequest;
      readonly assessment: RiskAssessment;
      readonly result: ExecutionResult;
    }
  | {
      readonly kind: 'RECORDED_FAILURE';
      readonly request: CommandRequest;
      readonly assessment: RiskAssessment | null;
      readonly outcome: HistoryOutcome.Failure | HistoryOutcome.Error;
      readonly exit_code: number | null;
      readonly message: string;
      readonly result: ExecutionResult | null;
    };

export type PipelineStateKind = PipelineState['kind'];

export type TerminalState = Extract<
  PipelineState,
  { kind: 'REJECTED' | 'RECORDED_SUCCESS' | 'RECORDED_FAILURE' }
>;

export function isTerminal(state: PipelineState): state is TerminalState {
  return state.kind === 'REJECTED' || state.kind === 'RECORDED_SUCCESS' || state.kind === 'RECORDED_FAILURE';
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type PipelineEvent =
  | { readonly type: 'TRANSLATE' }
  | { readonly type: 'CLASSIFY'; readonly command: string; readonly assessment: RiskAssessment }
  | { readonly type: 'TRANSLATION_FAILED'; readonly message: string }
  | { readonly type: 'CLASSIFICATION_FAULT'; readonly command: string | null; readonly message: string }
  | { readonly type: 'REQUEST_CONFIRMATION' }
  | { readonly type: 'AFFIRM' }
  | { readonly type: 'REJECT'; readonly reason: string }
  | { readonly type: 'BYPASS' }
  | { readonly type: 'EXECUTE' }
  | { readonly type: 'EXECUTED'; readonly result: ExecutionResult }
  | { readonly type: 'EXECUTION_FAULT'; readonly message: string };

export type PipelineEventType = PipelineEvent['type'];

/** Session settings the transition table consults. */
export interface TransitionPolicy {
  /** When false, SAFE commands may skip confirmation. */
  readonly confirmSafe: boolean;
}

// ---------------------------------------------------------------------------
// Transition function
// ---------------------------------------------------------------------------

export function transition(
  state: PipelineState,
  event: PipelineEvent,
  policy: TransitionPolicy,
): PipelineState {
  const illegal = (): never => {
    throw new IllegalTransitionError(state.kind, event.type);
  };

  switch (event.type) {
    case 'TRANSLATE':
      if (state.kind !== 'RECEIVED' || state.request.mode !== 'natural') return illegal();
      return { kind: 'TRANSLATING', request: state.request };

    case 'CLASSIFY': {
      const fromDirect = state.kind === 'RECEIVED' && state.request.mode === 'direct';
      if (!fromDirect && state.kind !== 'TRANSLATING') return illegal();
      return {
        kind: 'CLASSIFIED',
        request: { ...state.request, command: event.command },
        assessment: event.assessment,
      };
    }

    case 'TRANSLATION_FAILED':
      if (state.kind !== 'TRANSLATING') return illegal();
      return {
        kind: 'RECORDED_FAILURE',
        request: state.request,
        assessment: null,
        outcome: HistoryOutcome.Error,
        exit_code: null,
        message: event.message,
        result: null,
      };

    case 'CLASSIFICATION_FAULT':
      if (state.kind !== 'RECEIVED' && state.kind !== 'TRANSLATING') return illegal();
      return {
        kind: 'REJECTED',
        request: { ...state.request, command: event.command },
        assessment: null,
        reason: event.message,
      };

    case 'REQUEST_CONFIRMATION':
      if (state.kind !== 'CLASSIFIED') return illegal();
      return {
        kind: 'AWAITING_CONFIRMATION',
        request: state.request,
        assessment: state.assessment,
        affirmatives: 0,
        required: requiredAffirmatives(state.assessment),
      };

    case 'AFFIRM': {
      if (state.kind !== 'AWAITING_CONFIRMATION') return illegal();
      const affirmatives = state.affirmatives + 1;
      if (affirmatives < state.required) {
        return { ...state, affirmatives };
      }
      return { kind: 'CONFIRMED', request: state.request, assessment: state.assessment, affirmatives };
    }

    case 'REJECT':
      if (isTerminal(state) || state.kind === 'CONFIRMED' || state.kind === 'EXECUTING') return illegal();
      return {
        kind: 'REJECTED',
        request: state.request,
        assessment: 'assessment' in state ? state.assessment : null,
        reason: event.reason,
      };

    case 'BYPASS':
      if (
        state.kind !== 'CLASSIFIED' ||
        policy.confirmSafe ||
        state.assessment.tier !== RiskTier.Safe ||
        state.assessment.triggers.length > 0
      ) {
        return illegal();
      }
      return { kind: 'EXECUTING', request: state.request, assessment: state.assessment, affirmatives: 0 };

    case 'EXECUTE':
      if (state.kind !== 'CONFIRMED') return illegal();
      return {
        kind: 'EXECUTING',
        request: state.request,
        assessment: state.assessment,
        affirmatives: state.affirmatives,
      };

    case 'EXECUTED':
      if (state.kind !== 'EXECUTING') return illegal();
      if (event.result.exitCode === 0) {
        return { kind: 'RECORDED_SUCCESS', request: state.request, assessment: state.assessment, result: event.result };
      }
      return {
        kind: 'RECORDED_FAILURE',
        request: state.request,
        assessment: state.assessment,
        outcome: HistoryOutcome.Failure,
        exit_code: event.result.exitCode,
        message: summarizeFailure(event.result),
        result: event.result,
      };

    case 'EXECUTION_FAULT':
      if (state.kind !== 'EXECUTING') return illegal();
      return {
        kind: 'RECORDED_FAILURE',
        request: state.request,
        assessment: state.assessment,
        outcome: HistoryOutcome.Error,
        exit_code: null,
        message: event.message,
        result: null,
      };
  }
}

/**
 * Affirmatives needed before CONFIRMED. CRITICAL always needs two, even
 * when a classifier under-reports `requires_double_confirmation`.
 */
export function requiredAffirmatives(assessment: RiskAssessment): number {
  return assessment.requires_double_confirmation || assessment.tier === RiskTier.Critical ? 2 : 1;
}

/** Maximum length of the stderr summary kept on a failed entry. */
export const FAILURE_SUMMARY_MAX = 500;

/** First part of stderr, or a plain exit-code message when stderr is empty. */
export function summarizeFailure(result: ExecutionResult): string {
  const stderr = result.stderr.trim();
  if (stderr === '') {
    return `Command exited with code ${result.exitCode}`;
  }
  return stderr.length > FAILURE_SUMMARY_MAX ? `${stderr.slice(0, FAILURE_SUMMARY_MAX)}…` : stderr;
}

/** The HistoryOutcome a terminal state records. */
export function outcomeOf(state: TerminalState): HistoryOutcome {
  switch (state.kind) {
    case 'REJECTED':
      return HistoryOutcome.Rejected;
    case 'RECORDED_SUCCESS':
      return HistoryOutcome.Success;
    case 'RECORDED_FAILURE':
      return state.outcome;
  }
}
