/**
 * Plainsh Core — Error Taxonomy
 *
 * Recovery policy:
 * - TranslationError and ExecutorFault are recovered at the pipeline boundary
 *   and become a terminal state with a recorded HistoryEntry.
 * - ClassificationFault is an internal invariant violation; the pipeline
 *   treats it as a rejection.
 * - StorageError degrades to "outcome reported, logging unavailable".
 * - IllegalTransitionError is a programming error in the pipeline driver.
 * - IOError and ConfigError surface to the operator unchanged.
 */

/** The translator was unreachable, timed out, or returned an unusable reply. */
export class TranslationError extends Error {
  constructor(
    message: string,
    readonly kind: 'unreachable' | 'timeout' | 'malformed' | 'rejected' = 'unreachable',
  ) {
    super(message);
    this.name = 'TranslationError';
  }
}

/** The classifier threw or returned something that is not a RiskAssessment. */
export class ClassificationFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationFault';
  }
}

/**
 * The executor could not run the command to completion.
 *
 * - `spawn`: the process could not be started
 * - `timeout`: the process was killed after exceeding its time budget
 * - `signal`: the process died from a signal
 */
export class ExecutorFault extends Error {
  constructor(
    message: string,
    readonly kind: 'spawn' | 'timeout' | 'signal',
  ) {
    super(message);
    this.name = 'ExecutorFault';
  }
}

/** History persistence is unavailable or corrupt. */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/** An export or import target could not be read or written. */
export class IOError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IOError';
  }
}

/** The pipeline driver attempted a transition the state table does not allow. */
export class IllegalTransitionError extends Error {
  constructor(
    readonly from: string,
    readonly event: string,
  ) {
    super(`Illegal pipeline transition: ${event} in state ${from}`);
    this.name = 'IllegalTransitionError';
  }
}

/** The configuration file or an environment override is invalid. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly issues: ReadonlyArray<string> = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Render any thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
