/**
 * Plainsh Core — Lifecycle Logger
 *
 * Forwards pipeline state changes to an injected EventSink. If no sink is
 * injected (e.g., in tests), record() is a no-op.
 *
 * A failing sink never changes a command's outcome. Failures are counted
 * and the first failure message is kept so the operator can be told that
 * lifecycle logging is unavailable.
 */

import { errorMessage } from '../errors.js';
import type { EventSink, LifecycleEvent } from './event-sink.js';

export class LifecycleLogger {
  private failures = 0;
  private firstFailure: string | null = null;

  constructor(private readonly sink?: EventSink) {}

  record(event: LifecycleEvent): void {
    if (this.sink === undefined) return;
    try {
      this.sink.append(event);
    } catch (err) {
      this.failures++;
      this.firstFailure ??= errorMessage(err);
    }
  }

  /** Number of events the sink refused. */
  get droppedCount(): number {
    return this.failures;
  }

  /** Message of the first refused event, or null. */
  get firstError(): string | null {
    return this.firstFailure;
  }
}
