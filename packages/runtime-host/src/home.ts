/**
 * Plainsh Runtime Host — PLAINSH_HOME Resolution
 *
 * Resolves the plainsh home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. PLAINSH_HOME environment variable
 *   3. Default: ~/.plainsh
 *
 * Everything plainsh persists lives under the resolved home:
 *
 *   <PLAINSH_HOME>/
 *     config.json
 *     logs/
 *       history.jsonl
 *       sessions.jsonl
 *
 * Use resolvePlainshHome() throughout the runtime host. Never build paths
 * relative to process.cwd(): the working directory belongs to the commands
 * plainsh runs.
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export interface ResolvePlainshHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Environment to consult. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Create the directory when missing. Default: true. */
  readonly create?: boolean | undefined;
}

/** Returns the absolute path of the plainsh home directory. */
export function resolvePlainshHome(opts: ResolvePlainshHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env['PLAINSH_HOME'];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.plainsh');
  }
  home = resolve(home);

  if (opts.create !== false) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}
