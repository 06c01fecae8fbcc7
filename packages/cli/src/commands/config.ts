/**
 * plainsh config — Inspect and initialise the configuration
 *
 * Subcommands:
 *   plainsh config show   [--json]
 *   plainsh config init   [--force]
 *
 * Effective configuration = defaults ← <PLAINSH_HOME>/config.json ←
 * PLAINSH_<SECTION>__<KEY> environment variables.
 */

import { Command } from 'commander';
import { CONFIG_FILE, FileStateIO, initConfig, resolvePlainshHome } from '@plainsh/runtime-host';
import { fail, printJson, runtimeFor } from './common.js';

function showCommand(): Command {
  return new Command('show')
    .description('Print the effective configuration')
    .option('--json', 'Print only the configuration as JSON')
    .action((options: { json?: boolean }, command: Command) => {
      try {
        const { loaded } = runtimeFor(command);
        if (options.json === true) {
          printJson(loaded.config);
          return;
        }
        // eslint-disable-next-line no-console
        console.log(`# ${loaded.path}${loaded.fileFound ? '' : ' (not present, defaults in effect)'}`);
        for (const name of loaded.overrides) {
          // eslint-disable-next-line no-console
          console.log(`# overridden by ${name}`);
        }
        printJson(loaded.config);
      } catch (err) {
        fail('config show', err);
      }
    });
}

function initCommand(): Command {
  return new Command('init')
    .description('Write the default configuration to config.json')
    .option('--force', 'Overwrite an existing config.json')
    .action((options: { force?: boolean }, command: Command) => {
      try {
        const { home } = command.optsWithGlobals<{ home?: string }>();
        const stateIO = new FileStateIO(resolvePlainshHome({ home }));
        const path = stateIO.describeJson(CONFIG_FILE);
        if (initConfig(stateIO, options.force === true)) {
          // eslint-disable-next-line no-console
          console.log(`Wrote ${path}`);
        } else {
          process.stderr.write(`[plainsh config init] ${path} already exists; use --force to overwrite\n`);
          process.exitCode = 1;
        }
      } catch (err) {
        fail('config init', err);
      }
    });
}

export function configCommand(): Command {
  return new Command('config')
    .description('Inspect and initialise the configuration')
    .addCommand(showCommand())
    .addCommand(initCommand());
}
