/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by:
 *   src/bin/plainsh.ts   (non-interactive / PLAINSH_NO_TUI path)
 *   test/commands.test.ts
 *
 * createProgram() builds fresh Command objects on every call, so a program
 * can be parsed once per test without option values leaking between runs.
 */

import { Command } from 'commander';
import { VERSION } from '../version.js';
import { runCommand } from './run.js';
import { historyCommand } from './history.js';
import { suggestCommand } from './suggest.js';
import { contextCommand } from './context.js';
import { configCommand } from './config.js';
import { checkCommand } from './check.js';
import { shellCommand } from './shell.js';

export function createProgram(): Command {
  return new Command('plainsh')
    .description(
      'plainsh — plain-language shell with risk-classified, confirmed execution.\n' +
      'Every command is classified by risk and runs only after confirmation.',
    )
    .version(VERSION)
    .option('--home <dir>', 'plainsh home directory (default: $PLAINSH_HOME or ~/.plainsh)')
    .addCommand(runCommand())
    .addCommand(historyCommand())
    .addCommand(suggestCommand())
    .addCommand(contextCommand())
    .addCommand(configCommand())
    .addCommand(checkCommand())
    .addCommand(shellCommand());
}
