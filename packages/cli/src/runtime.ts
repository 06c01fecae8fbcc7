/**
 * runtime.ts — wires the runtime-host adapters into the core.
 *
 * Every command and the interactive shell build their collaborators here, in
 * one place, from the resolved home directory and effective configuration:
 *
 *   home      → FileStateIO → JsonlHistoryStore, FileEventSink, config.json
 *   config    → RiskClassifier, NodeShellExecutor, OllamaTranslator,
 *               SuggestionRanker weights, SessionConfig
 *
 * A SessionPipeline is created per session with an explicit SessionConfig;
 * switching mode or model in the shell creates a new pipeline.
 */

import { RiskClassifier, SessionPipeline, SuggestionRanker } from '@plainsh/core';
import type { Confirmer, InputMode } from '@plainsh/core';
import {
  FileEventSink,
  FileStateIO,
  JsonlHistoryStore,
  MarkerContextDetector,
  NodeShellExecutor,
  OllamaTranslator,
  loadConfig,
  loadSeedCatalog,
  resolvePlainshHome,
  ulid,
} from '@plainsh/runtime-host';
import type { LoadedConfig, PlainshConfig } from '@plainsh/runtime-host';

export interface RuntimeOptions {
  /** --home flag value. */
  readonly home?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export interface SessionOptions {
  readonly confirmer: Confirmer;
  /** Defaults to session.mode from the configuration. */
  readonly mode?: InputMode | 'auto' | undefined;
  /** Defaults to llm.model from the configuration. */
  readonly model?: string | undefined;
  /** Reuse an id so entries of one shell share a session. Defaults to a new ULID. */
  readonly sessionId?: string | undefined;
}

export interface Runtime {
  readonly home: string;
  readonly stateIO: FileStateIO;
  readonly loaded: LoadedConfig;
  readonly config: PlainshConfig;
  readonly history: JsonlHistoryStore;
  readonly events: FileEventSink | undefined;
  readonly classifier: RiskClassifier;
  readonly executor: NodeShellExecutor;
  readonly contextDetector: MarkerContextDetector;
  /** Translator for `model`, or for the configured model. */
  translator(model?: string): OllamaTranslator;
  /** Suggestion ranker over the bundled catalog. Loaded on first use. */
  ranker(): SuggestionRanker;
  createSession(options: SessionOptions): SessionPipeline;
}

/**
 * Build the runtime for one CLI invocation.
 *
 * Throws ConfigError when the configuration is invalid.
 */
export function buildRuntime(options: RuntimeOptions = {}): Runtime {
  const env = options.env ?? process.env;
  const home = resolvePlainshHome({ home: options.home, env });
  const stateIO = new FileStateIO(home);
  const loaded = loadConfig(stateIO, env);
  const config = loaded.config;

  const history = new JsonlHistoryStore(stateIO);
  const events = config.logging.lifecycle_events ? new FileEventSink(stateIO) : undefined;
  const classifier = new RiskClassifier({ doubleConfirmationFrom: config.execution.double_confirmation_from });
  const executor = new NodeShellExecutor({ shell: config.execution.shell });
  const contextDetector = new MarkerContextDetector();

  const translator = (model: string = config.llm.model): OllamaTranslator =>
    new OllamaTranslator({
      baseUrl: config.llm.base_url,
      model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.max_tokens ?? undefined,
    });

  let ranker: SuggestionRanker | undefined;

  return {
    home,
    stateIO,
    loaded,
    config,
    history,
    events,
    classifier,
    executor,
    contextDetector,
    translator,
    ranker() {
      ranker ??= new SuggestionRanker(loadSeedCatalog(), history, {
        static: config.suggest.static_weight,
        history: config.suggest.history_weight,
      });
      return ranker;
    },
    createSession({ confirmer, mode, model, sessionId }) {
      return new SessionPipeline(
        {
          sessionId: sessionId ?? ulid(),
          mode: mode ?? config.session.mode,
          confirmSafe: config.execution.confirm_safe,
          translationTimeoutMs: config.llm.timeout_ms,
          executionTimeoutMs: config.execution.timeout_ms,
          confirmationTimeoutMs: config.session.confirmation_timeout_ms,
        },
        {
          classifier,
          executor,
          confirmer,
          history,
          translator: translator(model),
          contextDetector,
          events,
          newId: ulid,
        },
      );
    },
  };
}
