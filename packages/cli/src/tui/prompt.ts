import { homedir } from 'node:os'
import type { ChalkInstance } from 'chalk'
import type { InputMode } from '@plainsh/core'
import { t } from './theme.js'

/**
 * buildPS1 — construct the colored prompt string.
 *
 * Format: [plainsh:~/src/app:auto] ❯
 * The home directory prefix of `cwd` is shortened to `~`.
 */
export function buildPS1(cwd: string, mode: InputMode | 'auto', home: string = homedir()): string {
  const bracket = t.blueDim
  const name    = t.blue.bold
  const arrow   = t.blueDim

  return (
    bracket('[') +
    name('plainsh') +
    bracket(':') +
    t.muted(shortenHome(cwd, home)) +
    bracket(':') +
    modeColor(mode)(mode) +
    bracket(']') +
    arrow(' ❯ ')
  )
}

export function shortenHome(cwd: string, home: string): string {
  if (home === '' || home === '/') return cwd
  if (cwd === home) return '~'
  return cwd.startsWith(home + '/') ? '~' + cwd.slice(home.length) : cwd
}

function modeColor(mode: InputMode | 'auto'): ChalkInstance {
  switch (mode) {
    case 'natural': return t.blueBright
    case 'direct':  return t.amber
    case 'auto':    return t.text
  }
}
