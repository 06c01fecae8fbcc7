/**
 * plainsh check — Verify the installation
 *
 * Checks, in order:
 *   1. the configuration loads and validates
 *   2. the history log is readable, and reports damaged or duplicate lines
 *   3. the Ollama server answers and has the configured model
 *   4. the suggestion catalog loads
 *
 * Exits non-zero when any check fails. Damaged history lines are reported
 * but do not fail the check: they are skipped on read.
 */

import { Command } from 'commander';
import { errorMessage } from '@plainsh/core';
import { HISTORY_LOG } from '@plainsh/runtime-host';
import { t } from '../tui/theme.js';
import { runtimeFor } from './common.js';
import type { Runtime } from '../runtime.js';

const CONNECTION_CHECK_MS = 3_000;

type CheckStatus = 'ok' | 'warn' | 'fail';

interface CheckLine {
  readonly status: CheckStatus;
  readonly label: string;
  readonly detail: string;
}

function line({ status, label, detail }: CheckLine): string {
  const mark = status === 'ok' ? t.green('✓') : status === 'warn' ? t.amber('!') : t.red('✗');
  return `  ${mark} ${label.padEnd(12)} ${t.muted(detail)}\n`;
}

function historyCheck(runtime: Runtime): CheckLine {
  try {
    const stats = runtime.history.inspect();
    const problems: string[] = [];
    if (stats.parseErrors > 0) problems.push(`${stats.parseErrors} unreadable`);
    if (stats.duplicates > 0) problems.push(`${stats.duplicates} duplicate`);
    if (stats.partialTrailingLine) problems.push('partial last line');
    const detail = `${stats.parsedEvents} entries in ${runtime.stateIO.describeLog(HISTORY_LOG)}`;
    return problems.length === 0
      ? { status: 'ok', label: 'history', detail }
      : { status: 'warn', label: 'history', detail: `${detail} (${problems.join(', ')} skipped)` };
  } catch (err) {
    return { status: 'fail', label: 'history', detail: errorMessage(err) };
  }
}

async function translatorCheck(runtime: Runtime): Promise<CheckLine> {
  const { base_url, model } = runtime.config.llm;
  const connection = await runtime.translator().checkConnection(CONNECTION_CHECK_MS);
  if (!connection.ok) {
    return { status: 'fail', label: 'ollama', detail: connection.message };
  }
  if (!connection.models.includes(model)) {
    const installed = connection.models.length === 0 ? 'none' : connection.models.join(', ');
    return { status: 'fail', label: 'model', detail: `${model} is not installed (installed: ${installed})` };
  }
  return { status: 'ok', label: 'ollama', detail: `${base_url} · ${model}` };
}

function catalogCheck(runtime: Runtime): CheckLine {
  try {
    runtime.ranker();
    return { status: 'ok', label: 'suggestions', detail: 'catalog loaded' };
  } catch (err) {
    return { status: 'fail', label: 'suggestions', detail: errorMessage(err) };
  }
}

export function checkCommand(): Command {
  return new Command('check')
    .description('Verify configuration, history, the Ollama server and the suggestion catalog')
    .action(async (_options: unknown, command: Command) => {
      const lines: CheckLine[] = [];
      let runtime: Runtime | undefined;
      try {
        runtime = runtimeFor(command);
        const overrides = runtime.loaded.overrides.length === 0 ? '' : ` + ${runtime.loaded.overrides.join(', ')}`;
        lines.push({
          status: 'ok',
          label: 'config',
          detail: (runtime.loaded.fileFound ? runtime.loaded.path : 'defaults') + overrides,
        });
      } catch (err) {
        lines.push({ status: 'fail', label: 'config', detail: errorMessage(err) });
      }

      if (runtime !== undefined) {
        lines.push(historyCheck(runtime));
        lines.push(await translatorCheck(runtime));
        lines.push(catalogCheck(runtime));
      }

      process.stdout.write('\n' + lines.map(line).join('') + '\n');
      if (lines.some((l) => l.status === 'fail')) {
        process.exitCode = 1;
      }
    });
}
