/**
 * plainsh suggest — Suggest commands for an intent in the current project
 *
 * Seeds come from the bundled catalog for the detected project context and
 * are ranked together with commands that succeeded here before.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { formatSuggestions } from '../tui/output/context.js';
import { fail, positiveInt, printJson, runtimeFor } from './common.js';

export function suggestCommand(): Command {
  return new Command('suggest')
    .description('Suggest commands for an intent, ranked for the current project')
    .argument('<intent...>', 'What you want to do, e.g. "run the tests"')
    .option('--top <n>', 'Number of suggestions (default: suggest.top_n)')
    .option('--cwd <dir>', 'Directory to detect the project context in')
    .option('--json', 'Output as JSON')
    .action((words: string[], options: { top?: string; cwd?: string; json?: boolean }, command: Command) => {
      try {
        const runtime = runtimeFor(command);
        const intent = words.join(' ');
        const dir = resolve(options.cwd ?? process.cwd());
        const detected = runtime.contextDetector.detect(dir);
        const tags = detected.length === 0 ? ['unknown'] : detected;
        const topN = options.top === undefined ? runtime.config.suggest.top_n : positiveInt('--top', options.top);

        const suggestions = runtime.ranker().rankDetailed(intent, tags, topN);
        if (options.json === true) {
          printJson({ intent, context: tags, suggestions });
          return;
        }
        process.stdout.write(formatSuggestions(intent, suggestions));
      } catch (err) {
        fail('suggest', err);
      }
    });
}
