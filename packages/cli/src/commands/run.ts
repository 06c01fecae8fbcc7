/**
 * plainsh run — Process one request through the confirmation pipeline
 *
 * Usage:
 *   plainsh run list the ten largest files here
 *   plainsh run --mode direct -- ls -la
 *
 * The request is translated (natural-language input), classified, shown
 * with its risk tier, and run only after confirmation on stdin. The entry
 * is recorded in the history whether it ran or not.
 *
 * Exit code: the command's exit code when it ran, 1 when it was rejected
 * or could not run.
 */

import { Command } from 'commander';
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { HistoryOutcome } from '@plainsh/core';
import type { InputMode } from '@plainsh/core';
import { ReadlineConfirmer } from '../tui/confirmer.js';
import { formatResult } from '../tui/output/result.js';
import { fail, printJson, runtimeFor } from './common.js';

function parseMode(raw: string | undefined): InputMode | 'auto' | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'auto' || raw === 'natural' || raw === 'direct') return raw;
  throw new Error(`--mode must be auto, natural or direct, got "${raw}"`);
}

export function runCommand(): Command {
  return new Command('run')
    .description('Translate or run one request, with risk classification and confirmation')
    .argument('<input...>', 'Free text or a shell command')
    .option('--mode <mode>', 'Input mode: auto, natural or direct')
    .option('--model <name>', 'Translation model for this request')
    .option('--json', 'Print the recorded history entry as JSON')
    .action(async (words: string[], options: { mode?: string; model?: string; json?: boolean }, command: Command) => {
      let rl: readline.Interface | undefined;
      try {
        const runtime = runtimeFor(command);
        rl = readline.createInterface({ input, output, terminal: input.isTTY === true });
        const session = runtime.createSession({
          confirmer: new ReadlineConfirmer(rl),
          mode: parseMode(options.mode),
          model: options.model,
        });
        // Ctrl+C or end of input withdraws a pending translation or question.
        rl.on('SIGINT', () => { session.cancel(); });
        rl.on('close', () => { session.cancel(); });

        const result = await session.run(words.join(' '), process.cwd());
        if (options.json === true) {
          printJson(result.entry);
        } else {
          process.stdout.write(formatResult(result));
        }

        const { outcome, exit_code } = result.entry;
        process.exitCode = outcome === HistoryOutcome.Success ? 0 : outcome === HistoryOutcome.Failure ? (exit_code ?? 1) : 1;
      } catch (err) {
        fail('run', err);
      } finally {
        rl?.close();
      }
    });
}
