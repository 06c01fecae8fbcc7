#!/usr/bin/env node
/**
 * bin/plainsh.ts — TTY-aware entry point for the `plainsh` command.
 *
 * In a TTY, without arguments and with PLAINSH_NO_TUI unset: launches the
 * interactive readline shell. Otherwise: delegates to Commander
 * (non-interactive / scripting mode).
 *
 * PLAINSH_NO_TUI=1 plainsh       → Commander help
 * plainsh (in TTY)               → interactive shell
 * plainsh run "list files"       → one request, confirmed on stdin
 */

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.argv.length <= 2 && process.env['PLAINSH_NO_TUI'] === undefined

if (isInteractive) {
  const { launchShell } = await import('../tui/shell.js')
  await launchShell()
} else {
  const { createProgram } = await import('../commands/index.js')
  await createProgram().parseAsync()
}
