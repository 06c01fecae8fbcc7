/**
 * Plainsh CLI — Runtime Wiring Tests
 *
 * buildRuntime against a temporary home, driving a real SessionPipeline
 * through the host shell. POSIX only.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { HistoryOutcome, RiskTier } from '@plainsh/core';
import type { ConfirmationAnswer, ConfirmationPrompt, Confirmer } from '@plainsh/core';
import { buildRuntime } from '../src/runtime.js';

class AnsweringConfirmer implements Confirmer {
  readonly prompts: ConfirmationPrompt[] = [];
  constructor(private readonly answer: ConfirmationAnswer) {}

  async confirm(prompt: ConfirmationPrompt): Promise<ConfirmationAnswer> {
    this.prompts.push(prompt);
    return this.answer;
  }
}

function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `plainsh-${prefix}-`));
}

describe.skipIf(process.platform === 'win32')('buildRuntime', () => {
  it('runs a confirmed command and records it', async () => {
    const home = tempDir('home');
    const cwd = tempDir('cwd');
    const runtime = buildRuntime({ home, env: {} });
    const confirmer = new AnsweringConfirmer('yes');
    const session = runtime.createSession({ confirmer, mode: 'direct' });

    const result = await session.run('echo hi', cwd);

    expect(result.trail).toEqual([
      'RECEIVED',
      'CLASSIFIED',
      'AWAITING_CONFIRMATION',
      'CONFIRMED',
      'EXECUTING',
      'RECORDED_SUCCESS',
    ]);
    expect(confirmer.prompts).toHaveLength(1);
    expect(confirmer.prompts[0]?.assessment.tier).toBe(RiskTier.Safe);
    expect(result.history_recorded).toBe(true);

    const [stored] = runtime.history.recent(1);
    expect(stored).toMatchObject({
      input: 'echo hi',
      command: 'echo hi',
      outcome: HistoryOutcome.Success,
      exit_code: 0,
      working_directory: cwd,
      mode: 'direct',
      model: null,
    });

    const events = readFileSync(join(home, 'logs', 'sessions.jsonl'), 'utf-8').trim().split('\n');
    expect(events).toHaveLength(5);
  });

  it('records a declined command without running it', async () => {
    const home = tempDir('home');
    const cwd = tempDir('cwd');
    const runtime = buildRuntime({ home, env: {} });
    const session = runtime.createSession({ confirmer: new AnsweringConfirmer('no'), mode: 'direct' });

    const result = await session.run('touch created', cwd);

    expect(result.state.kind).toBe('REJECTED');
    expect(existsSync(join(cwd, 'created'))).toBe(false);
    expect(runtime.history.recent(1).map((e) => e.outcome)).toEqual([HistoryOutcome.Rejected]);
  });

  it('records entries of sessions created with one id under that id', async () => {
    const home = tempDir('home');
    const runtime = buildRuntime({ home, env: { PLAINSH_LOGGING__LIFECYCLE_EVENTS: 'false' } });
    const confirmer = new AnsweringConfirmer('yes');
    const first = runtime.createSession({ confirmer, mode: 'direct', sessionId: 'shell-1' });
    const second = runtime.createSession({ confirmer, mode: 'direct', sessionId: 'shell-1' });

    await first.run('true', tempDir('cwd'));
    await second.run('true', tempDir('cwd'));
    await runtime.createSession({ confirmer, mode: 'direct' }).run('true', tempDir('cwd'));

    expect(runtime.history.recent(10, { session_id: 'shell-1' })).toHaveLength(2);
    expect(runtime.history.recent(10)).toHaveLength(3);
  });

  it('writes no lifecycle events when they are disabled', async () => {
    const home = tempDir('home');
    const runtime = buildRuntime({ home, env: { PLAINSH_LOGGING__LIFECYCLE_EVENTS: 'false' } });
    const session = runtime.createSession({ confirmer: new AnsweringConfirmer('yes'), mode: 'direct' });

    await session.run('true', tempDir('cwd'));

    expect(runtime.events).toBeUndefined();
    expect(existsSync(join(home, 'logs', 'sessions.jsonl'))).toBe(false);
    expect(runtime.history.recent(1)).toHaveLength(1);
  });

  it('applies environment overrides to the configuration', () => {
    const runtime = buildRuntime({ home: tempDir('home'), env: { PLAINSH_LLM__MODEL: 'test-model' } });
    expect(runtime.config.llm.model).toBe('test-model');
    expect(runtime.loaded.overrides).toEqual(['PLAINSH_LLM__MODEL']);
  });
});
