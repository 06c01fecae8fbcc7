/**
 * plainsh history — Query and maintain the command history
 *
 * Subcommands:
 *   plainsh history list    [--limit <n>] [--session <id>] [--json]
 *   plainsh history search  <term> [--limit <n>] [--session <id>] [--json]
 *   plainsh history stats   [--since <date>] [--until <date>] [--context <tag>] [--json]
 *   plainsh history export  <file> [--format jsonl|csv]
 *   plainsh history import  <file>
 *   plainsh history clear   [--older-than <days>] [--yes]
 *
 * Every request the pipeline processes, executed or rejected, is one entry
 * in <PLAINSH_HOME>/logs/history.jsonl.
 */

import { Command } from 'commander';
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { resolve } from 'node:path';
import type { ClearOptions, ExportFormat, HistoryWindow } from '@plainsh/core';
import { clearWithConfirmation } from '../tui/clear.js';
import { formatEntries, formatImport, formatStats } from '../tui/output/history.js';
import { fail, isoTimestamp, positiveInt, printJson, runtimeFor } from './common.js';

// ---------------------------------------------------------------------------
// plainsh history list
// ---------------------------------------------------------------------------

function listCommand(): Command {
  return new Command('list')
    .description('Show the most recent entries, newest first')
    .option('--limit <n>', 'Maximum number of entries', '20')
    .option('--session <id>', 'Only entries of this session')
    .option('--json', 'Output as JSON')
    .action((options: { limit: string; session?: string; json?: boolean }, command: Command) => {
      try {
        const entries = runtimeFor(command).history.recent(positiveInt('--limit', options.limit), {
          session_id: options.session,
        });
        if (options.json === true) {
          printJson(entries);
          return;
        }
        process.stdout.write(formatEntries(entries));
      } catch (err) {
        fail('history list', err);
      }
    });
}

// ---------------------------------------------------------------------------
// plainsh history search
// ---------------------------------------------------------------------------

function searchCommand(): Command {
  return new Command('search')
    .description('Case-insensitive search over inputs and commands, newest first')
    .argument('<term>', 'Text to look for')
    .option('--limit <n>', 'Maximum number of entries', '20')
    .option('--session <id>', 'Only entries of this session')
    .option('--json', 'Output as JSON')
    .action((term: string, options: { limit: string; session?: string; json?: boolean }, command: Command) => {
      try {
        const entries = runtimeFor(command).history.search(term, positiveInt('--limit', options.limit), {
          session_id: options.session,
        });
        if (options.json === true) {
          printJson(entries);
          return;
        }
        process.stdout.write(formatEntries(entries));
      } catch (err) {
        fail('history search', err);
      }
    });
}

// ---------------------------------------------------------------------------
// plainsh history stats
// ---------------------------------------------------------------------------

function statsCommand(): Command {
  return new Command('stats')
    .description('Success rate, durations, top commands and recent activity')
    .option('--since <date>', 'Only entries created at or after this ISO 8601 date')
    .option('--until <date>', 'Only entries created before this ISO 8601 date')
    .option('--context <tag>', 'Only entries recorded in this project context')
    .option('--json', 'Output as JSON')
    .action((options: { since?: string; until?: string; context?: string; json?: boolean }, command: Command) => {
      try {
        const window: HistoryWindow = {
          since: options.since === undefined ? undefined : isoTimestamp('--since', options.since),
          until: options.until === undefined ? undefined : isoTimestamp('--until', options.until),
          context_tag: options.context,
        };
        const stats = runtimeFor(command).history.stats(window);
        if (options.json === true) {
          printJson(stats);
          return;
        }
        process.stdout.write(formatStats(stats));
      } catch (err) {
        fail('history stats', err);
      }
    });
}

// ---------------------------------------------------------------------------
// plainsh history export / import
// ---------------------------------------------------------------------------

function exportCommand(): Command {
  return new Command('export')
    .description('Write every entry to a file, oldest first')
    .argument('<file>', 'Destination path')
    .option('--format <format>', 'jsonl (re-importable) or csv', 'jsonl')
    .action((file: string, options: { format: string }, command: Command) => {
      try {
        const format = exportFormat(options.format);
        const target = resolve(file);
        const count = runtimeFor(command).history.export(target, format);
        // eslint-disable-next-line no-console
        console.log(`Exported ${count} entries to ${target}`);
      } catch (err) {
        fail('history export', err);
      }
    });
}

function exportFormat(value: string): ExportFormat {
  if (value === 'jsonl' || value === 'csv') return value;
  throw new Error(`--format must be jsonl or csv, got "${value}"`);
}

function importCommand(): Command {
  return new Command('import')
    .description('Append the entries of an export file, skipping ids already present')
    .argument('<file>', 'JSONL file written by history export')
    .action((file: string, _options: unknown, command: Command) => {
      try {
        const source = resolve(file);
        const result = runtimeFor(command).history.import(source);
        process.stdout.write(formatImport(result, source));
      } catch (err) {
        fail('history import', err);
      }
    });
}

// ---------------------------------------------------------------------------
// plainsh history clear
// ---------------------------------------------------------------------------

function clearCommand(): Command {
  return new Command('clear')
    .description('Remove every history entry, or only the older ones')
    .option('--older-than <days>', 'Only entries created more than this many days ago')
    .option('--yes', 'Do not ask for confirmation')
    .action(async (options: { olderThan?: string; yes?: boolean }, command: Command) => {
      try {
        const history = runtimeFor(command).history;
        const clear: ClearOptions = {
          olderThanDays: options.olderThan === undefined ? undefined : positiveInt('--older-than', options.olderThan),
        };
        let removed: number | null;
        if (options.yes === true) {
          removed = history.clear(clear);
        } else {
          const rl = readline.createInterface({ input, output });
          try {
            removed = await clearWithConfirmation(history, rl, clear);
          } finally {
            rl.close();
          }
        }
        // eslint-disable-next-line no-console
        console.log(removed === null ? 'History left unchanged.' : `Removed ${removed} entries.`);
      } catch (err) {
        fail('history clear', err);
      }
    });
}

export function historyCommand(): Command {
  return new Command('history')
    .description('Query and maintain the command history')
    .addCommand(listCommand(), { isDefault: true })
    .addCommand(searchCommand())
    .addCommand(statsCommand())
    .addCommand(exportCommand())
    .addCommand(importCommand())
    .addCommand(clearCommand());
}
