/**
 * @plainsh/core
 *
 * Risk classifier, command lifecycle pipeline, suggestion ranker, error
 * taxonomy and collaborator interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API. Concrete
 * adapters and persistence live in @plainsh/runtime-host.
 */

// Types
export { RiskTier, RISK_TIER_ORDER, RISK_TIERS, isRiskTier, maxTier, tierAtLeast } from './types/risk.js';
export type { RiskAssessment, RiskTrigger } from './types/risk.js';

export type { CommandRequest, InputMode } from './types/request.js';

export { HistoryOutcome } from './types/history.js';
export type {
  ClearOptions,
  CommandCount,
  CommandFrequency,
  DailyCount,
  ExportFormat,
  HistoryEntry,
  HistoryFilter,
  HistoryStats,
  HistoryWindow,
} from './types/history.js';

// Errors
export {
  ClassificationFault,
  ConfigError,
  ExecutorFault,
  IllegalTransitionError,
  IOError,
  StorageError,
  TranslationError,
  errorMessage,
} from './errors.js';

// Collaborator interfaces (implementations live in runtime-host and cli)
export type {
  ConfirmationAnswer,
  ConfirmationPrompt,
  Confirmer,
  ContextDetector,
  ContextSnapshot,
  ExecutionResult,
  Executor,
  HistoryFrequencySource,
  HistoryStore,
  ImportResult,
  Translation,
  Translator,
} from './adapters/index.js';

// Event sink interface (implementation lives in runtime-host)
export type { EventSink, LifecycleEvent } from './logging/event-sink.js';
export { LifecycleLogger } from './logging/lifecycle-log.js';

// Risk classification
export { RiskClassifier } from './risk/classifier.js';
export type { ClassificationContext, RiskClassifierOptions } from './risk/classifier.js';
export { DEFAULT_RULES } from './risk/rules.js';
export type { RiskRule, RuleMatcher } from './risk/rules.js';
export { programName, splitSegments } from './risk/segments.js';
export type { SegmentDepth } from './risk/segments.js';
export { safetyTips } from './risk/tips.js';

// Pipeline
export {
  isTerminal,
  outcomeOf,
  requiredAffirmatives,
  summarizeFailure,
  transition,
} from './pipeline/state.js';
export type {
  PipelineEvent,
  PipelineEventType,
  PipelineState,
  PipelineStateKind,
  TerminalState,
  TransitionPolicy,
} from './pipeline/state.js';
export { detectInputMode } from './pipeline/input-mode.js';
export { bounded } from './pipeline/bounded.js';
export type { Bounded } from './pipeline/bounded.js';
export { DEFAULT_SESSION_CONFIG, SessionPipeline } from './pipeline/session.js';
export type {
  CommandClassifier,
  PipelineResult,
  SessionConfig,
  SessionDependencies,
} from './pipeline/session.js';

// Suggestions
export { DEFAULT_RANKER_WEIGHTS, SuggestionRanker, intentWords } from './suggest/ranker.js';
export type { RankedSuggestion, RankerWeights, SeedCatalog, SeedCommand } from './suggest/ranker.js';
