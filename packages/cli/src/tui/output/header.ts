import type { InputMode } from '@plainsh/core'
import type { ConnectionCheck } from '@plainsh/runtime-host'
import { t } from '../theme.js'

export interface HeaderInfo {
  readonly version: string
  readonly home: string
  readonly model: string
  readonly mode: InputMode | 'auto'
  readonly tags: ReadonlyArray<string>
  readonly connection: ConnectionCheck
}

/**
 * formatHeader — the startup banner.
 *
 * Two parts:
 *   1. Prompt mark + wordmark + tagline
 *   2. Session status: model and server reachability, mode, context tags
 */
export function formatHeader(info: HeaderInfo): string {

  // ── Part 1: Brand block ──────────────────────────────────────────────────

  let out = '\n'
  out += '  ' + t.blueDim('┌─') + '  ' + t.blue.bold('p l a i n s h') + '  ' + t.dim(`v${info.version}`) + '\n'
  out += '  ' + t.blueDim('└▸') + '  ' + t.muted('plain language in, reviewed shell commands out') + '\n'

  // ── Part 2: Session status ───────────────────────────────────────────────

  out += '\n  ' + t.dim('─'.repeat(60)) + '\n\n'

  const reach = info.connection.ok
    ? (info.connection.models.includes(info.model) ? t.green('ready') : t.amber('model not installed'))
    : t.red('unreachable')

  out += (
    '  ' + t.muted('model') + '  ' + t.blue(info.model) + '  ' + t.dim('·') + '  ' + reach +
    '  ' + t.dim('·') + '  ' + t.muted('mode') + ' ' + t.text(info.mode) + '\n'
  )
  out += (
    '  ' + t.muted('context') + '  ' +
    (info.tags.length === 0 ? t.dim('unknown') : info.tags.map((tag) => t.text(tag)).join(t.dim(', '))) + '\n'
  )
  out += '  ' + t.dim('home ' + info.home) + '\n'

  if (!info.connection.ok) {
    out += '\n    ' + t.dim('→  ' + info.connection.message) + '\n'
    out += '    ' + t.dim('→  direct commands still work; natural-language input needs the server') + '\n'
  }

  out += '\n  ' + t.dim("type '.help' for commands") + '\n'
  return out
}
