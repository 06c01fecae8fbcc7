/**
 * @plainsh/cli
 *
 * The `plainsh` binary lives in src/bin/plainsh.ts. This module exposes the
 * pieces other tools embed: the commander program, the runtime wiring and
 * the readline confirmer.
 */

export { createProgram } from './commands/index.js';
export { buildRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions, SessionOptions } from './runtime.js';
export { ReadlineConfirmer, parseAnswer } from './tui/confirmer.js';
export type { QuestionAsker } from './tui/confirmer.js';
export { launchShell } from './tui/shell.js';
export type { ShellOptions } from './tui/shell.js';
export { VERSION } from './version.js';
