/**
 * Plainsh Core — Session Pipeline
 *
 * Orchestrates one request end to end: translation, classification, the
 * confirmation gate, execution, and recording. All state changes go through
 * the pure transition function in state.ts; this module only decides which
 * event happens next and performs the suspending calls between them.
 *
 * Pipeline contract:
 * - Every request ends in exactly one terminal state and produces exactly
 *   one HistoryEntry, written once, at the end.
 * - Translator, classifier, confirmer and executor faults route to REJECTED
 *   or RECORDED_FAILURE; none of them can reach EXECUTING.
 * - A StorageError from the history store is reported on the result; it
 *   never changes the command outcome.
 *
 * Sessions are configured through an explicit SessionConfig. Two pipelines
 * never share mode or timeout settings.
 */

import { errorMessage } from '../errors.js';
import type {
  ConfirmationPrompt,
  ContextDetector,
  ContextSnapshot,
  Confirmer,
  ExecutionResult,
  Executor,
  HistoryStore,
  Translation,
  Translator,
} from '../adapters/index.js';
import type { EventSink } from '../logging/event-sink.js';
import { LifecycleLogger } from '../logging/lifecycle-log.js';
import type { ClassificationContext } from '../risk/classifier.js';
import type { HistoryEntry } from '../types/history.js';
import type { CommandRequest, InputMode } from '../types/request.js';
import { RiskTier, isRiskTier, maxTier } from '../types/risk.js';
import type { RiskAssessment, RiskTrigger } from '../types/risk.js';
import { bounded } from './bounded.js';
import { detectInputMode } from './input-mode.js';
import { isTerminal, outcomeOf, transition } from './state.js';
import type {
  PipelineEvent,
  PipelineState,
  PipelineStateKind,
  TerminalState,
  TransitionPolicy,
} from './state.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface SessionConfig {
  readonly sessionId: string;
  /** `auto` applies the input-mode heuristic to every line. */
  readonly mode: InputMode | 'auto';
  /** When false, SAFE commands run without a confirmation. */
  readonly confirmSafe: boolean;
  readonly translationTimeoutMs: number;
  readonly executionTimeoutMs: number;
  readonly confirmationTimeoutMs: number;
}

export const DEFAULT_SESSION_CONFIG: Omit<SessionConfig, 'sessionId'> = {
  mode: 'auto',
  confirmSafe: true,
  translationTimeoutMs: 30_000,
  executionTimeoutMs: 30_000,
  confirmationTimeoutMs: 120_000,
};

/** Anything that can classify a command. RiskClassifier is the real one. */
export interface CommandClassifier {
  classify(command: string, context?: ClassificationContext): RiskAssessment;
}

export interface SessionDependencies {
  readonly classifier: CommandClassifier;
  readonly executor: Executor;
  readonly confirmer: Confirmer;
  readonly history: Pick<HistoryStore, 'record'>;
  /** Required for natural-language input. */
  readonly translator?: Translator | undefined;
  readonly contextDetector?: ContextDetector | undefined;
  readonly events?: EventSink | undefined;
  /** Request id generator (ULIDs in production). */
  readonly newId: () => string;
  readonly now?: (() => Date) | undefined;
}

export interface PipelineResult {
  readonly state: TerminalState;
  /** The entry built for this request, whether or not it was stored. */
  readonly entry: HistoryEntry;
  /** Every state the request passed through, in order. */
  readonly trail: ReadonlyArray<PipelineStateKind>;
  readonly history_recorded: boolean;
  /** Why the entry could not be stored, or null. */
  readonly history_error: string | null;
  /** Translator explanation for natural-language input, or null. */
  readonly explanation: string | null;
  /** Working directory after the request. Differs from the input after `cd`. */
  readonly cwd: string;
}

// ---------------------------------------------------------------------------
// Request run
// ---------------------------------------------------------------------------

/** The state of one request plus its trail. Emits each change to the logger. */
class RequestRun {
  private state: PipelineState;
  readonly trail: PipelineStateKind[] = ['RECEIVED'];

  constructor(
    request: CommandRequest,
    private readonly policy: TransitionPolicy,
    private readonly logger: LifecycleLogger,
    private readonly sessionId: string,
    private readonly now: () => Date,
  ) {
    this.state = { kind: 'RECEIVED', request };
  }

  current(): PipelineState {
    return this.state;
  }

  step(event: PipelineEvent): PipelineState {
    const from = this.state;
    const next = transition(from, event, this.policy);
    this.state = next;
    this.trail.push(next.kind);
    this.logger.record({
      session_id: this.sessionId,
      request_id: next.request.id,
      event: event.type,
      from: from.kind,
      to: next.kind,
      tier: 'assessment' in next && next.assessment !== null ? next.assessment.tier : null,
      detail: detailOf(next),
      at: this.now().toISOString(),
    });
    return next;
  }
}

function detailOf(state: PipelineState): string | null {
  switch (state.kind) {
    case 'REJECTED':
      return state.reason;
    case 'RECORDED_FAILURE':
      return state.message;
    default:
      return null;
  }
}

type TranslateOutcome =
  | { readonly status: 'ok'; readonly translation: Translation }
  | { readonly status: 'failed'; readonly message: string }
  | { readonly status: 'aborted' };

type ExecuteOutcome =
  | { readonly status: 'ok'; readonly result: ExecutionResult }
  | { readonly status: 'fault'; readonly message: string };

// ---------------------------------------------------------------------------
// SessionPipeline
// ---------------------------------------------------------------------------

export class SessionPipeline {
  private readonly logger: LifecycleLogger;
  private readonly now: () => Date;
  private active: AbortController | null = null;

  constructor(
    readonly config: SessionConfig,
    private readonly deps: SessionDependencies,
  ) {
    this.logger = new LifecycleLogger(deps.events);
    this.now = deps.now ?? (() => new Date());
  }

  /** True while a request is being processed. */
  get busy(): boolean {
    return this.active !== null;
  }

  /** Lifecycle events the sink refused during this session. */
  get droppedEvents(): number {
    return this.logger.droppedCount;
  }

  /**
   * Cancel the in-flight request. A pending translation or confirmation is
   * rejected and the request is still recorded. A command already executing
   * is not interrupted. Returns false when nothing is in flight.
   */
  cancel(): boolean {
    if (this.active === null) return false;
    this.active.abort();
    return true;
  }

  /**
   * Process one line of input run from `cwd`.
   *
   * Requests are sequential per session: calling run() while another request
   * is in flight throws.
   */
  async run(input: string, cwd: string): Promise<PipelineResult> {
    if (this.active !== null) {
      throw new Error(`Session ${this.config.sessionId} is already processing a request`);
    }
    const controller = new AbortController();
    this.active = controller;
    try {
      return await this.process(input, cwd, controller.signal);
    } finally {
      this.active = null;
    }
  }

  private async process(input: string, cwd: string, signal: AbortSignal): Promise<PipelineResult> {
    const mode = this.config.mode === 'auto' ? detectInputMode(input) : this.config.mode;
    const request: CommandRequest = {
      id: this.deps.newId(),
      input,
      command: mode === 'direct' ? input : null,
      mode,
      cwd,
      context_tags: this.detectTags(cwd),
      received_at: this.now().toISOString(),
    };
    const run = new RequestRun(
      request,
      { confirmSafe: this.config.confirmSafe },
      this.logger,
      this.config.sessionId,
      this.now,
    );

    // 1. Translation (natural-language input only)
    let command = input;
    let explanation: string | null = null;
    if (mode === 'natural') {
      run.step({ type: 'TRANSLATE' });
      const translated = await this.translate(input, { cwd, tags: request.context_tags }, signal);
      if (translated.status === 'aborted') {
        run.step({ type: 'REJECT', reason: 'Cancelled by operator during translation' });
        return this.finish(run, 0, explanation);
      }
      if (translated.status === 'failed') {
        run.step({ type: 'TRANSLATION_FAILED', message: translated.message });
        return this.finish(run, 0, explanation);
      }
      command = translated.translation.command;
      explanation = translated.translation.explanation ?? null;
    }

    // 2. Classification
    const assessment = this.classify(command, cwd);
    if (typeof assessment === 'string') {
      run.step({ type: 'CLASSIFICATION_FAULT', command, message: assessment });
      return this.finish(run, 0, explanation);
    }
    run.step({ type: 'CLASSIFY', command, assessment });

    // 3. Confirmation gate
    if (!this.config.confirmSafe && assessment.tier === RiskTier.Safe && assessment.triggers.length === 0) {
      run.step({ type: 'BYPASS' });
    } else {
      run.step({ type: 'REQUEST_CONFIRMATION' });
      await this.collectConfirmations(run, command, assessment, signal);
      if (run.current().kind !== 'CONFIRMED') {
        return this.finish(run, 0, explanation);
      }
      run.step({ type: 'EXECUTE' });
    }

    // 4. Execution
    const started = this.now().getTime();
    const executed = await this.execute(command, cwd);
    const duration = Math.max(0, this.now().getTime() - started);
    if (executed.status === 'fault') {
      run.step({ type: 'EXECUTION_FAULT', message: executed.message });
    } else {
      run.step({ type: 'EXECUTED', result: executed.result });
    }
    return this.finish(run, duration, explanation);
  }

  // -------------------------------------------------------------------------
  // Phases
  // -------------------------------------------------------------------------

  private detectTags(cwd: string): ReadonlyArray<string> {
    if (this.deps.contextDetector === undefined) return [];
    try {
      return this.deps.contextDetector.detect(cwd);
    } catch {
      // Context is advisory; an unreadable directory yields no tags.
      return [];
    }
  }

  private async translate(input: string, context: ContextSnapshot, signal: AbortSignal): Promise<TranslateOutcome> {
    const translator = this.deps.translator;
    if (translator === undefined) {
      return { status: 'failed', message: 'No translator is configured for natural-language input' };
    }
    const timeoutMs = this.config.translationTimeoutMs;
    const outcome = await bounded((s) => translator.translate(input, context, s), timeoutMs, signal);
    switch (outcome.status) {
      case 'aborted':
        return { status: 'aborted' };
      case 'timeout':
        return { status: 'failed', message: `Translation timed out after ${timeoutMs} ms` };
      case 'error':
        return { status: 'failed', message: `Translation failed: ${errorMessage(outcome.error)}` };
      case 'ok': {
        const command = typeof outcome.value.command === 'string' ? outcome.value.command.trim() : '';
        if (command === '') {
          return { status: 'failed', message: 'Translation failed: the translator returned no command' };
        }
        return { status: 'ok', translation: { command, explanation: outcome.value.explanation } };
      }
    }
  }

  /**
   * Classify, returning a fault message instead of an assessment when the
   * classifier throws or returns an assessment that breaks its invariants.
   */
  private classify(command: string, cwd: string): RiskAssessment | string {
    try {
      const produced: unknown = this.deps.classifier.classify(command, { cwd });
      const assessment = checkedAssessment(produced);
      return typeof assessment === 'string' ? `Classification fault: ${assessment}` : assessment;
    } catch (err) {
      return `Classification fault: ${errorMessage(err)}`;
    }
  }

  private async collectConfirmations(
    run: RequestRun,
    command: string,
    assessment: RiskAssessment,
    signal: AbortSignal,
  ): Promise<void> {
    const timeoutMs = this.config.confirmationTimeoutMs;
    for (;;) {
      const state = run.current();
      if (state.kind !== 'AWAITING_CONFIRMATION') return;

      const prompt: ConfirmationPrompt = {
        command,
        assessment,
        step: state.affirmatives + 1,
        required: state.required,
      };
      const answer = await bounded((s) => this.deps.confirmer.confirm(prompt, s), timeoutMs, signal);

      switch (answer.status) {
        case 'ok':
          if (answer.value === 'yes') {
            run.step({ type: 'AFFIRM' });
          } else {
            const base = answer.value === 'cancel' ? 'Cancelled by operator' : 'Declined by operator';
            run.step({ type: 'REJECT', reason: rejectionReason(base, assessment) });
          }
          break;
        case 'timeout':
          run.step({ type: 'REJECT', reason: rejectionReason(`No confirmation within ${timeoutMs} ms`, assessment) });
          break;
        case 'aborted':
          run.step({ type: 'REJECT', reason: rejectionReason('Cancelled by operator', assessment) });
          break;
        case 'error':
          run.step({
            type: 'REJECT',
            reason: rejectionReason(`Confirmation failed: ${errorMessage(answer.error)}`, assessment),
          });
          break;
      }
    }
  }

  private async execute(command: string, cwd: string): Promise<ExecuteOutcome> {
    let result: ExecutionResult;
    try {
      result = await this.deps.executor.run(command, cwd, this.config.executionTimeoutMs);
    } catch (err) {
      return { status: 'fault', message: errorMessage(err) };
    }
    if (typeof result !== 'object' || result === null || !Number.isInteger(result.exitCode)) {
      return { status: 'fault', message: 'Executor returned a result without an exit code' };
    }
    // Output streams may be missing from a foreign executor; the record must still be written.
    const stdout: unknown = result.stdout;
    const stderr: unknown = result.stderr;
    return {
      status: 'ok',
      result: {
        ...result,
        stdout: typeof stdout === 'string' ? stdout : '',
        stderr: typeof stderr === 'string' ? stderr : '',
      },
    };
  }

  // -------------------------------------------------------------------------
  // Recording
  // -------------------------------------------------------------------------

  private finish(run: RequestRun, durationMs: number, explanation: string | null): PipelineResult {
    const state = run.current();
    if (!isTerminal(state)) {
      throw new Error(`Pipeline stopped in non-terminal state ${state.kind}`);
    }
    const request = state.request;
    const entry: HistoryEntry = {
      id: request.id,
      input: request.input,
      command: request.command,
      tier: state.assessment === null ? null : state.assessment.tier,
      outcome: outcomeOf(state),
      exit_code: exitCodeOf(state),
      duration_ms: durationMs,
      working_directory: request.cwd,
      context_tag: request.context_tags[0] ?? 'unknown',
      created_at: this.now().toISOString(),
      mode: request.mode,
      error_message: detailOf(state),
      model: request.mode === 'natural' ? (this.deps.translator?.model ?? null) : null,
      session_id: this.config.sessionId,
    };

    let recorded = true;
    let historyError: string | null = null;
    try {
      this.deps.history.record(entry);
    } catch (err) {
      recorded = false;
      historyError = errorMessage(err);
    }

    const nextCwd = state.kind === 'RECORDED_SUCCESS' ? (state.result.cwd ?? request.cwd) : request.cwd;
    return {
      state,
      entry,
      trail: [...run.trail],
      history_recorded: recorded,
      history_error: historyError,
      explanation,
      cwd: nextCwd,
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function exitCodeOf(state: TerminalState): number | null {
  switch (state.kind) {
    case 'REJECTED':
      return null;
    case 'RECORDED_SUCCESS':
      return 0;
    case 'RECORDED_FAILURE':
      return state.exit_code;
  }
}

/** Append the tier and rule reasons to a rejection message. */
function rejectionReason(base: string, assessment: RiskAssessment): string {
  const reasons = [...new Set(assessment.triggers.map((t) => t.reason))];
  return reasons.length === 0
    ? `${base} [${assessment.tier}]`
    : `${base} [${assessment.tier}: ${reasons.join('; ')}]`;
}

/**
 * Rebuild a classifier result from its fields, or describe what is wrong
 * with it. The tier must be the highest tier among the triggers.
 */
function checkedAssessment(value: unknown): RiskAssessment | string {
  if (typeof value !== 'object' || value === null) {
    return 'classifier returned no assessment';
  }
  const tier: unknown = 'tier' in value ? value.tier : undefined;
  if (!isRiskTier(tier)) {
    return `unknown tier ${String(tier)}`;
  }
  const rawTriggers: unknown = 'triggers' in value ? value.triggers : undefined;
  if (!Array.isArray(rawTriggers)) {
    return 'assessment has no trigger list';
  }
  const triggers: RiskTrigger[] = [];
  for (const item of rawTriggers) {
    const trigger = checkedTrigger(item);
    if (trigger === null) {
      return 'assessment contains a malformed trigger';
    }
    triggers.push(trigger);
  }
  const double: unknown = 'requires_double_confirmation' in value ? value.requires_double_confirmation : undefined;
  if (typeof double !== 'boolean') {
    return 'assessment does not say whether double confirmation is required';
  }
  const highest = triggers.reduce<RiskTier>((acc, t) => maxTier(acc, t.tier), RiskTier.Safe);
  if (highest !== tier) {
    return `tier ${tier} does not match its triggers (${highest})`;
  }
  return { tier, triggers, requires_double_confirmation: double };
}

function checkedTrigger(value: unknown): RiskTrigger | null {
  if (typeof value !== 'object' || value === null) return null;
  const rule: unknown = 'rule' in value ? value.rule : undefined;
  const match: unknown = 'match' in value ? value.match : undefined;
  const tier: unknown = 'tier' in value ? value.tier : undefined;
  const reason: unknown = 'reason' in value ? value.reason : undefined;
  if (typeof rule !== 'string' || typeof match !== 'string' || typeof reason !== 'string' || !isRiskTier(tier)) {
    return null;
  }
  return { rule, match, tier, reason };
}
