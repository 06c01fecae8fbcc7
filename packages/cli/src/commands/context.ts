/**
 * plainsh context — Show the project context detected for a directory
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { MarkerContextDetector } from '@plainsh/runtime-host';
import { formatContext } from '../tui/output/context.js';
import { fail, printJson } from './common.js';

export function contextCommand(): Command {
  return new Command('context')
    .description('Show the project type tags detected from marker files')
    .argument('[dir]', 'Directory to inspect (default: current directory)')
    .option('--json', 'Output as JSON')
    .action((dir: string | undefined, options: { json?: boolean }) => {
      try {
        const report = new MarkerContextDetector().report(resolve(dir ?? process.cwd()));
        if (options.json === true) {
          printJson(report);
          return;
        }
        process.stdout.write(formatContext(report));
      } catch (err) {
        fail('context', err);
      }
    });
}
