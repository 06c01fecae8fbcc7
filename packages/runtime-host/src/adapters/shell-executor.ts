/**
 * Plainsh Runtime Host — Shell Executor
 *
 * Implements the Executor interface from @plainsh/core. Runs a candidate
 * command with the host shell (`<shell> -c <command>`) through
 * node:child_process.spawn and collects stdout and stderr.
 *
 * A bare `cd` is handled here rather than in a child process, where it
 * would have no effect: the result reports the new working directory and
 * the caller decides whether to adopt it.
 *
 * Faults reject with ExecutorFault:
 *   - spawn:   the shell could not be started (missing shell, bad cwd)
 *   - timeout: the process was killed after exceeding its budget
 *   - signal:  the process died from a signal it did not catch
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { statSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, resolve } from 'node:path';
import { ExecutorFault } from '@plainsh/core';
import type { ExecutionResult, Executor } from '@plainsh/core';

export interface ShellExecutorOptions {
  /** Shell binary. Defaults to /bin/sh. */
  readonly shell?: string | undefined;
  /** Environment for the child. Defaults to the parent's. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Grace period between SIGTERM and SIGKILL after a timeout. */
  readonly killGraceMs?: number | undefined;
}

/** `cd` alone, or `cd <one target>`, with no shell operators. */
const CD_BUILTIN = /^cd(?:\s+([^;&|<>`$()]+?))?\s*$/;

export class NodeShellExecutor implements Executor {
  private readonly shell: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly killGraceMs: number;

  constructor(options: ShellExecutorOptions = {}) {
    this.shell = options.shell ?? '/bin/sh';
    this.env = options.env ?? process.env;
    this.killGraceMs = options.killGraceMs ?? 2000;
  }

  run(command: string, cwd: string, timeoutMs: number): Promise<ExecutionResult> {
    const cd = CD_BUILTIN.exec(command.trim());
    if (cd !== null) {
      return Promise.resolve(changeDirectory(cd[1], cwd, this.env));
    }
    return this.spawnShell(command, cwd, timeoutMs);
  }

  private spawnShell(command: string, cwd: string, timeoutMs: number): Promise<ExecutionResult> {
    return new Promise((resolvePromise, reject) => {
      const child = spawn(this.shell, ['-c', command], {
        cwd,
        env: this.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        // Own process group, so a timeout reaches the command's children too.
        detached: true,
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timedOut = false;
      let killTimer: ReturnType<typeof setTimeout> | undefined;

      const timer =
        Number.isFinite(timeoutMs) && timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              killGroup(child, 'SIGTERM');
              killTimer = setTimeout(() => killGroup(child, 'SIGKILL'), this.killGraceMs);
            }, timeoutMs)
          : undefined;

      const settle = (): void => {
        if (timer !== undefined) clearTimeout(timer);
        if (killTimer !== undefined) clearTimeout(killTimer);
      };

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      child.on('error', (err: Error) => {
        settle();
        reject(new ExecutorFault(`Failed to start ${this.shell} in ${cwd}: ${err.message}`, 'spawn'));
      });

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        settle();
        if (timedOut) {
          reject(new ExecutorFault(`Command timed out after ${timeoutMs} ms`, 'timeout'));
          return;
        }
        if (exitCode === null) {
          reject(new ExecutorFault(`Command terminated by signal ${signal ?? 'unknown'}`, 'signal'));
          return;
        }
        resolvePromise({
          exitCode,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        });
      });
    });
  }
}

function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch {
    child.kill(signal);
  }
}

// ---------------------------------------------------------------------------
// cd
// ---------------------------------------------------------------------------

function changeDirectory(target: string | undefined, cwd: string, env: NodeJS.ProcessEnv): ExecutionResult {
  const home = env['HOME'] ?? homedir();
  const raw = unquote((target ?? '').trim());

  let next: string;
  if (raw === '' || raw === '~') {
    next = home;
  } else if (raw.startsWith('~/')) {
    next = resolve(home, raw.slice(2));
  } else {
    next = isAbsolute(raw) ? resolve(raw) : resolve(cwd, raw);
  }

  const stats = statSync(next, { throwIfNoEntry: false });
  if (stats === undefined || !stats.isDirectory()) {
    return { exitCode: 1, stdout: '', stderr: `cd: no such directory: ${raw}\n` };
  }
  return { exitCode: 0, stdout: '', stderr: '', cwd: next };
}

function unquote(value: string): string {
  const quoted = /^(['"])(.*)\1$/.exec(value);
  return quoted?.[2] ?? value;
}
