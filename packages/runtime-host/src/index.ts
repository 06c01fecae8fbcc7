/**
 * @plainsh/runtime-host
 *
 * Side-effectful implementations of the collaborator interfaces defined in
 * @plainsh/core: persistence, the shell executor, context detection, the
 * translator client and configuration. No core code imports from this
 * package.
 */

// StateIO — home-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';

// PLAINSH_HOME resolution
export type { ResolvePlainshHomeOptions } from './home.js';
export { resolvePlainshHome } from './home.js';

// Configuration
export type { LoadedConfig, PlainshConfig } from './config/config.js';
export { CONFIG_FILE, DEFAULT_CONFIG, configSchema, initConfig, loadConfig } from './config/config.js';

// Logging
export { FileEventSink } from './logging/file-event-sink.js';
export type { UlidGenerator } from './logging/ulid.js';
export { createUlidGenerator, isUlid, ulid } from './logging/ulid.js';
export type { LogFormat, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

// History
export type { StoredLifecycleEvent } from './history/entry-schema.js';
export {
  HISTORY_FORMAT,
  HISTORY_LOG,
  SESSION_FORMAT,
  SESSION_LOG,
  historyEntrySchema,
  lifecycleEventSchema,
} from './history/entry-schema.js';
export type { JsonlHistoryStoreOptions } from './history/jsonl-history-store.js';
export { ACTIVITY_DAYS, CSV_COLUMNS, JsonlHistoryStore, TOP_COMMANDS, csvCell } from './history/jsonl-history-store.js';

// Adapters
export type { ShellExecutorOptions } from './adapters/shell-executor.js';
export { NodeShellExecutor } from './adapters/shell-executor.js';
export type { ContextReport, TagMatch } from './context/marker-detector.js';
export { MarkerContextDetector } from './context/marker-detector.js';
export type { ConnectionCheck, OllamaOptions } from './translator/ollama.js';
export { OllamaTranslator, buildPrompt, cleanReply } from './translator/ollama.js';

// Suggestions
export { BUNDLED_CATALOG_PATH, loadSeedCatalog } from './suggestions/catalog.js';
