/**
 * Plainsh Core — Command Request
 *
 * One user turn, from receipt of the raw input to the terminal state of the
 * pipeline that processes it.
 */

/**
 * How the raw input is interpreted.
 *
 * - `natural`: free text, translated into a candidate command first
 * - `direct`: the input is itself the candidate command
 */
export type InputMode = 'natural' | 'direct';

/**
 * A single request owned by the SessionPipeline run processing it.
 *
 * `command` is null until translation completes (or forever, if it fails).
 * The pipeline replaces the request object rather than mutating it, and no
 * replacement happens after the request enters EXECUTING.
 */
export interface CommandRequest {
  /** ULID assigned at receipt; reused as the HistoryEntry id. */
  readonly id: string;
  readonly input: string;
  readonly command: string | null;
  readonly mode: InputMode;
  /** Working-directory snapshot taken at receipt. */
  readonly cwd: string;
  /** Context tags detected for `cwd`, most confident first. */
  readonly context_tags: ReadonlyArray<string>;
  /** ISO 8601 timestamp of receipt. */
  readonly received_at: string;
}
