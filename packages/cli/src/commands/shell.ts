/**
 * plainsh shell — Start the interactive shell
 *
 * Same as running `plainsh` without arguments in a terminal, but honours
 * --home and works when PLAINSH_NO_TUI is set.
 */

import { Command } from 'commander';
import { launchShell } from '../tui/shell.js';
import { fail } from './common.js';

export function shellCommand(): Command {
  return new Command('shell')
    .description('Start the interactive shell')
    .action(async (_options: unknown, command: Command) => {
      if (process.stdin.isTTY !== true || process.stdout.isTTY !== true) {
        fail('shell', new Error('the interactive shell needs a terminal; use `plainsh run` in scripts'));
        return;
      }
      try {
        const { home } = command.optsWithGlobals<{ home?: string }>();
        await launchShell({ home });
      } catch (err) {
        fail('shell', err);
      }
    });
}
