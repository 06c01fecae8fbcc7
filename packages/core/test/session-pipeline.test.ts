/**
 * Plainsh Core — Session Pipeline Tests
 *
 * Drives SessionPipeline end to end with in-process fakes for every
 * collaborator. Verifies:
 * - the confirmation gate (two affirmatives for CRITICAL, cancellation, timeout)
 * - translator, classifier and executor faults never reach the executor
 *   or never crash the session
 * - exactly one HistoryEntry per request, also when storage fails
 */

import { describe, it, expect } from 'vitest';
import { SessionPipeline, DEFAULT_SESSION_CONFIG } from '../src/pipeline/session.js';
import type { SessionConfig, SessionDependencies } from '../src/pipeline/session.js';
import { RiskClassifier } from '../src/risk/classifier.js';
import { ExecutorFault, StorageError, TranslationError } from '../src/errors.js';
import { HistoryOutcome } from '../src/types/history.js';
import type { HistoryEntry } from '../src/types/history.js';
import { RiskTier } from '../src/types/risk.js';
import type {
  ConfirmationAnswer,
  ConfirmationPrompt,
  Confirmer,
  ExecutionResult,
  Executor,
  Translation,
  Translator,
} from '../src/adapters/index.js';
import type { EventSink, LifecycleEvent } from '../src/logging/event-sink.js';

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

const CWD = '/home/tester/project';
const NOW = new Date('2026-01-01T00:00:00.000Z');

class FakeExecutor implements Executor {
  readonly calls: Array<{ command: string; cwd: string; timeoutMs: number }> = [];

  constructor(private readonly behaviour: ExecutionResult | Error = { exitCode: 0, stdout: 'ok\n', stderr: '' }) {}

  run(command: string, cwd: string, timeoutMs: number): Promise<ExecutionResult> {
    this.calls.push({ command, cwd, timeoutMs });
    return this.behaviour instanceof Error ? Promise.reject(this.behaviour) : Promise.resolve(this.behaviour);
  }
}

/**
 * Answers from a script. Once the script is exhausted, waits until the
 * pipeline aborts the signal. `waiting` resolves when that happens.
 */
class ScriptedConfirmer implements Confirmer {
  readonly prompts: ConfirmationPrompt[] = [];
  private release: (() => void) | null = null;
  readonly waiting: Promise<void>;

  constructor(private readonly answers: ConfirmationAnswer[]) {
    this.waiting = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  confirm(prompt: ConfirmationPrompt, signal: AbortSignal): Promise<ConfirmationAnswer> {
    this.prompts.push(prompt);
    const next = this.answers.shift();
    if (next !== undefined) return Promise.resolve(next);
    this.release?.();
    return new Promise<ConfirmationAnswer>((resolve) => {
      signal.addEventListener('abort', () => resolve('cancel'), { once: true });
    });
  }
}

class FakeTranslator implements Translator {
  readonly model = 'test-model';
  calls = 0;

  constructor(private readonly behaviour: Translation | Error | 'hang') {}

  translate(_text: string, _context: unknown, signal: AbortSignal): Promise<Translation> {
    this.calls++;
    const behaviour = this.behaviour;
    if (behaviour === 'hang') {
      return new Promise<Translation>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new TranslationError('aborted', 'timeout')), { once: true });
      });
    }
    return behaviour instanceof Error ? Promise.reject(behaviour) : Promise.resolve(behaviour);
  }
}

class MemoryHistory {
  readonly entries: HistoryEntry[] = [];
  constructor(private readonly failWith?: Error) {}
  record(entry: HistoryEntry): void {
    if (this.failWith !== undefined) throw this.failWith;
    this.entries.push(entry);
  }
}

class MemoryEvents implements EventSink {
  readonly events: LifecycleEvent[] = [];
  append(event: LifecycleEvent): void {
    this.events.push(event);
  }
}

interface Harness {
  pipeline: SessionPipeline;
  executor: FakeExecutor;
  confirmer: ScriptedConfirmer;
  history: MemoryHistory;
  events: MemoryEvents;
}

function harness(
  options: {
    config?: Partial<SessionConfig>;
    answers?: ConfirmationAnswer[];
    executor?: FakeExecutor;
    history?: MemoryHistory;
    deps?: Partial<SessionDependencies>;
  } = {},
): Harness {
  const executor = options.executor ?? new FakeExecutor();
  const confirmer = new ScriptedConfirmer(options.answers ?? []);
  const history = options.history ?? new MemoryHistory();
  const events = new MemoryEvents();
  let counter = 0;
  const pipeline = new SessionPipeline(
    { ...DEFAULT_SESSION_CONFIG, sessionId: 'session-1', mode: 'direct', ...options.config },
    {
      classifier: new RiskClassifier(),
      executor,
      confirmer,
      history,
      events,
      newId: () => `req-${++counter}`,
      now: () => NOW,
      ...options.deps,
    },
  );
  return { pipeline, executor, confirmer, history, events };
}

const CRITICAL_REASONS =
  'CRITICAL: Recursive deletion of the root filesystem or a top-level system directory; Recursive deletion';

// ---------------------------------------------------------------------------
// Confirmation gate
// ---------------------------------------------------------------------------

describe('SessionPipeline: CRITICAL commands', () => {
  it('executes rm -rf / only after two affirmatives', async () => {
    const h = harness({ answers: ['yes', 'yes'] });
    const result = await h.pipeline.run('rm -rf /', CWD);

    expect(result.trail).toEqual([
      'RECEIVED',
      'CLASSIFIED',
      'AWAITING_CONFIRMATION',
      'AWAITING_CONFIRMATION',
      'CONFIRMED',
      'EXECUTING',
      'RECORDED_SUCCESS',
    ]);
    expect(h.confirmer.prompts.map((p) => [p.step, p.required])).toEqual([
      [1, 2],
      [2, 2],
    ]);
    expect(h.executor.calls).toEqual([{ command: 'rm -rf /', cwd: CWD, timeoutMs: 30_000 }]);
    expect(result.entry).toMatchObject({
      outcome: HistoryOutcome.Success,
      exit_code: 0,
      tier: RiskTier.Critical,
      command: 'rm -rf /',
    });
  });

  it('rejects when the second confirmation is declined', async () => {
    const h = harness({ answers: ['yes', 'no'] });
    const result = await h.pipeline.run('rm -rf /', CWD);

    expect(result.state.kind).toBe('REJECTED');
    expect(h.executor.calls).toHaveLength(0);
    expect(result.entry.outcome).toBe(HistoryOutcome.Rejected);
    expect(result.entry.exit_code).toBeNull();
    expect(result.entry.error_message).toBe(`Declined by operator [${CRITICAL_REASONS}]`);
  });

  it('stays in AWAITING_CONFIRMATION after a single affirmative', async () => {
    const h = harness({ answers: ['yes'] });
    const pending = h.pipeline.run('rm -rf /', CWD);
    await h.confirmer.waiting;

    expect(h.events.events.map((e) => e.to)).toEqual([
      'CLASSIFIED',
      'AWAITING_CONFIRMATION',
      'AWAITING_CONFIRMATION',
    ]);
    expect(h.executor.calls).toHaveLength(0);

    expect(h.pipeline.cancel()).toBe(true);
    const result = await pending;
    expect(result.state.kind).toBe('REJECTED');
    expect(result.entry.error_message).toBe(`Cancelled by operator [${CRITICAL_REASONS}]`);
    expect(h.history.entries).toHaveLength(1);
  });
});

describe('SessionPipeline: confirmation outcomes', () => {
  it('asks once for a SAFE command when SAFE confirmation is on', async () => {
    const h = harness({ answers: ['yes'], config: { mode: 'auto' } });
    const result = await h.pipeline.run('', CWD);

    expect(h.confirmer.prompts).toHaveLength(1);
    expect(h.confirmer.prompts[0]?.assessment).toEqual({
      tier: RiskTier.Safe,
      triggers: [],
      requires_double_confirmation: false,
    });
    expect(h.confirmer.prompts[0]?.required).toBe(1);
    expect(result.state.kind).toBe('RECORDED_SUCCESS');
  });

  it('bypasses confirmation for SAFE commands when configured', async () => {
    const h = harness({ config: { confirmSafe: false } });
    const result = await h.pipeline.run('ls -la', CWD);

    expect(h.confirmer.prompts).toHaveLength(0);
    expect(result.trail).toEqual(['RECEIVED', 'CLASSIFIED', 'EXECUTING', 'RECORDED_SUCCESS']);
  });

  it('still confirms risky commands when SAFE confirmation is off', async () => {
    const h = harness({ config: { confirmSafe: false }, answers: ['no'] });
    const result = await h.pipeline.run('rm notes.txt', CWD);

    expect(h.confirmer.prompts).toHaveLength(1);
    expect(result.entry.error_message).toBe('Declined by operator [LOW: Deletes files]');
  });

  it('treats an explicit cancel answer as a rejection', async () => {
    const h = harness({ answers: ['cancel'] });
    const result = await h.pipeline.run('ls', CWD);
    expect(result.entry.error_message).toBe('Cancelled by operator [SAFE]');
  });

  it('rejects when no confirmation arrives in time', async () => {
    const h = harness({ config: { confirmationTimeoutMs: 20 } });
    const result = await h.pipeline.run('ls', CWD);

    expect(result.state.kind).toBe('REJECTED');
    expect(result.entry.error_message).toBe('No confirmation within 20 ms [SAFE]');
    expect(h.executor.calls).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// Translation
// ---------------------------------------------------------------------------

describe('SessionPipeline: translation', () => {
  it('records ERROR and never executes when the translator times out', async () => {
    const translator = new FakeTranslator('hang');
    const h = harness({ config: { mode: 'natural', translationTimeoutMs: 20 }, deps: { translator } });
    const result = await h.pipeline.run('delete everything', CWD);

    expect(result.trail).toEqual(['RECEIVED', 'TRANSLATING', 'RECORDED_FAILURE']);
    expect(h.executor.calls).toHaveLength(0);
    expect(h.history.entries).toHaveLength(1);
    expect(result.entry).toMatchObject({
      outcome: HistoryOutcome.Error,
      command: null,
      tier: null,
      exit_code: null,
      mode: 'natural',
      model: 'test-model',
      error_message: 'Translation timed out after 20 ms',
    });
  });

  it('records ERROR when the translator is unreachable', async () => {
    const translator = new FakeTranslator(new TranslationError('connection refused', 'unreachable'));
    const h = harness({ config: { mode: 'natural' }, deps: { translator } });
    const result = await h.pipeline.run('list files', CWD);

    expect(result.entry.error_message).toBe('Translation failed: connection refused');
    expect(h.executor.calls).toHaveLength(0);
  });

  it('records ERROR when the translator returns an empty command', async () => {
    const translator = new FakeTranslator({ command: '   ' });
    const h = harness({ config: { mode: 'natural' }, deps: { translator } });
    const result = await h.pipeline.run('list files', CWD);

    expect(result.entry.error_message).toBe('Translation failed: the translator returned no command');
  });

  it('records ERROR when no translator is configured', async () => {
    const h = harness({ config: { mode: 'natural' } });
    const result = await h.pipeline.run('list files', CWD);

    expect(result.entry.error_message).toBe('No translator is configured for natural-language input');
  });

  it('classifies and runs the translated command', async () => {
    const translator = new FakeTranslator({ command: 'ls -la', explanation: 'Lists all files' });
    const h = harness({ config: { mode: 'natural', confirmSafe: false }, deps: { translator } });
    const result = await h.pipeline.run('show me all files', CWD);

    expect(result.trail).toEqual(['RECEIVED', 'TRANSLATING', 'CLASSIFIED', 'EXECUTING', 'RECORDED_SUCCESS']);
    expect(result.explanation).toBe('Lists all files');
    expect(h.executor.calls[0]?.command).toBe('ls -la');
    expect(result.entry).toMatchObject({ input: 'show me all files', command: 'ls -la', model: 'test-model' });
  });

  it('still gates a dangerous translation', async () => {
    const translator = new FakeTranslator({ command: 'rm -rf /' });
    const h = harness({ config: { mode: 'natural', confirmSafe: false }, answers: ['yes', 'no'], deps: { translator } });
    const result = await h.pipeline.run('clean up the disk', CWD);

    expect(result.state.kind).toBe('REJECTED');
    expect(h.executor.calls).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// Classification faults
// ---------------------------------------------------------------------------

describe('SessionPipeline: classification faults', () => {
  it('rejects when the classifier throws', async () => {
    const h = harness({
      deps: {
        classifier: {
          classify: () => {
            throw new Error('boom');
          },
        },
      },
    });
    const result = await h.pipeline.run('ls', CWD);

    expect(result.state.kind).toBe('REJECTED');
    expect(result.entry).toMatchObject({ tier: null, error_message: 'Classification fault: boom' });
    expect(h.confirmer.prompts).toHaveLength(0);
    expect(h.executor.calls).toHaveLength(0);
  });

  it('rejects an assessment whose tier contradicts its triggers', async () => {
    const h = harness({
      config: { confirmSafe: false },
      deps: {
        classifier: {
          classify: () => ({
            tier: RiskTier.Safe,
            triggers: [{ rule: 'x', match: 'x', tier: RiskTier.Critical, reason: 'x' }],
            requires_double_confirmation: false,
          }),
        },
      },
    });
    const result = await h.pipeline.run('ls', CWD);

    expect(result.entry.error_message).toBe(
      'Classification fault: tier SAFE does not match its triggers (CRITICAL)',
    );
    expect(h.executor.calls).toHaveLength(0);
  });

  // JSON.parse stands in for a classifier that returns untyped data.
  it.each([
    ['no assessment', 'null', 'Classification fault: classifier returned no assessment'],
    ['no trigger list', '{"tier":"SAFE"}', 'Classification fault: assessment has no trigger list'],
    [
      'a malformed trigger',
      '{"tier":"LOW","triggers":[{"rule":"x","tier":"LOW"}],"requires_double_confirmation":false}',
      'Classification fault: assessment contains a malformed trigger',
    ],
    [
      'no double-confirmation flag',
      '{"tier":"SAFE","triggers":[]}',
      'Classification fault: assessment does not say whether double confirmation is required',
    ],
  ])('rejects and records a classifier result with %s', async (_case, raw, message) => {
    const history = new MemoryHistory();
    const h = harness({ history, deps: { classifier: { classify: () => JSON.parse(raw) } } });
    const result = await h.pipeline.run('ls', CWD);

    expect(result.state.kind).toBe('REJECTED');
    expect(history.entries).toHaveLength(1);
    expect(history.entries[0]).toMatchObject({ outcome: HistoryOutcome.Rejected, tier: null, error_message: message });
    expect(h.executor.calls).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

describe('SessionPipeline: execution', () => {
  it('records FAILURE with the exit code and stderr summary', async () => {
    const executor = new FakeExecutor({ exitCode: 2, stdout: '', stderr: 'grep: missing.txt: No such file or directory\n' });
    const h = harness({ answers: ['yes'], executor });
    const result = await h.pipeline.run('grep todo missing.txt', CWD);

    expect(result.entry).toMatchObject({
      outcome: HistoryOutcome.Failure,
      exit_code: 2,
      error_message: 'grep: missing.txt: No such file or directory',
    });
  });

  it('records a failure whose result carries no output streams', async () => {
    const executor = new FakeExecutor(JSON.parse('{"exitCode":2,"stdout":""}'));
    const history = new MemoryHistory();
    const h = harness({ answers: ['yes'], executor, history });
    const result = await h.pipeline.run('false', CWD);

    expect(executor.calls).toHaveLength(1);
    expect(history.entries).toHaveLength(1);
    expect(result.entry).toMatchObject({
      outcome: HistoryOutcome.Failure,
      exit_code: 2,
      error_message: 'Command exited with code 2',
    });
  });

  it('records ERROR for a result without an exit code', async () => {
    const executor = new FakeExecutor(JSON.parse('{"stdout":"hi"}'));
    const history = new MemoryHistory();
    const h = harness({ answers: ['yes'], executor, history });
    const result = await h.pipeline.run('echo hi', CWD);

    expect(history.entries).toHaveLength(1);
    expect(result.entry).toMatchObject({
      outcome: HistoryOutcome.Error,
      exit_code: null,
      error_message: 'Executor returned a result without an exit code',
    });
  });

  it('records ERROR when the executor faults', async () => {
    const executor = new FakeExecutor(new ExecutorFault('Command timed out after 30000 ms', 'timeout'));
    const h = harness({ answers: ['yes'], executor });
    const result = await h.pipeline.run('sleep 60', CWD);

    expect(result.trail.at(-1)).toBe('RECORDED_FAILURE');
    expect(result.entry).toMatchObject({
      outcome: HistoryOutcome.Error,
      exit_code: null,
      error_message: 'Command timed out after 30000 ms',
    });
  });

  it('reports the working directory a command moved to', async () => {
    const executor = new FakeExecutor({ exitCode: 0, stdout: '', stderr: '', cwd: '/tmp' });
    const h = harness({ answers: ['yes'], executor });
    const result = await h.pipeline.run('cd /tmp', CWD);

    expect(result.cwd).toBe('/tmp');
    expect(result.entry.working_directory).toBe(CWD);
  });
});

// ---------------------------------------------------------------------------
// Recording
// ---------------------------------------------------------------------------

describe('SessionPipeline: recording', () => {
  it('writes exactly one entry per request', async () => {
    const h = harness({ answers: ['yes', 'no', 'yes', 'yes'] });
    await h.pipeline.run('ls', CWD);
    await h.pipeline.run('rm notes.txt', CWD);
    await h.pipeline.run('rm -rf /', CWD);

    expect(h.history.entries.map((e) => [e.id, e.outcome])).toEqual([
      ['req-1', HistoryOutcome.Success],
      ['req-2', HistoryOutcome.Rejected],
      ['req-3', HistoryOutcome.Success],
    ]);
  });

  it('fills the entry from the request', async () => {
    const h = harness({
      answers: ['yes'],
      deps: { contextDetector: { detect: () => ['nodejs', 'git'] } },
    });
    const result = await h.pipeline.run('npm test', CWD);

    expect(result.entry).toEqual({
      id: 'req-1',
      input: 'npm test',
      command: 'npm test',
      tier: RiskTier.Safe,
      outcome: HistoryOutcome.Success,
      exit_code: 0,
      duration_ms: 0,
      working_directory: CWD,
      context_tag: 'nodejs',
      created_at: '2026-01-01T00:00:00.000Z',
      mode: 'direct',
      error_message: null,
      model: null,
      session_id: 'session-1',
    });
  });

  it('reports a storage failure without changing the outcome', async () => {
    const h = harness({ answers: ['yes'], history: new MemoryHistory(new StorageError('disk full')) });
    const result = await h.pipeline.run('ls', CWD);

    expect(result.state.kind).toBe('RECORDED_SUCCESS');
    expect(result.history_recorded).toBe(false);
    expect(result.history_error).toBe('disk full');
    expect(h.executor.calls).toHaveLength(1);
  });

  it('tags entries unknown when the context detector fails', async () => {
    const h = harness({
      answers: ['yes'],
      deps: {
        contextDetector: {
          detect: () => {
            throw new Error('EACCES');
          },
        },
      },
    });
    const result = await h.pipeline.run('ls', CWD);
    expect(result.entry.context_tag).toBe('unknown');
  });

  it('keeps running when the event sink fails', async () => {
    const h = harness({
      answers: ['yes'],
      deps: {
        events: {
          append: () => {
            throw new Error('read-only filesystem');
          },
        },
      },
    });
    const result = await h.pipeline.run('ls', CWD);

    expect(result.state.kind).toBe('RECORDED_SUCCESS');
    expect(h.pipeline.droppedEvents).toBe(5);
  });
});

// ---------------------------------------------------------------------------
// Session discipline
// ---------------------------------------------------------------------------

describe('SessionPipeline: session discipline', () => {
  it('refuses a second request while one is in flight', async () => {
    const h = harness();
    const pending = h.pipeline.run('ls', CWD);
    await h.confirmer.waiting;

    await expect(h.pipeline.run('pwd', CWD)).rejects.toThrow('Session session-1 is already processing a request');
    h.pipeline.cancel();
    await pending;
    expect(h.pipeline.busy).toBe(false);
  });

  it('returns false from cancel when idle', () => {
    expect(harness().pipeline.cancel()).toBe(false);
  });
});
