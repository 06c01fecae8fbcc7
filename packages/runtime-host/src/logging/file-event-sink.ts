/**
 * Plainsh Runtime Host — File-backed Lifecycle Event Sink
 *
 * Implements the EventSink interface from @plainsh/core by appending one
 * JSONL line per pipeline state change to `<home>/logs/sessions.jsonl`.
 *
 * Synchronous: the line is written before append() returns, so the log
 * order is the transition order. Each line carries its own ULID `event_id`
 * for dedupe-on-read.
 */

import type { EventSink, LifecycleEvent } from '@plainsh/core';
import type { StateIO } from '../state/state-io.js';
import { SESSION_LOG } from '../history/entry-schema.js';
import { ulid } from './ulid.js';
import type { UlidGenerator } from './ulid.js';

export class FileEventSink implements EventSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newId: UlidGenerator = ulid,
  ) {}

  append(event: LifecycleEvent): void {
    this.stateIO.appendLine(SESSION_LOG, JSON.stringify({ event_id: this.newId(), ...event }));
  }
}
