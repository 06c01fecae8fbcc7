import type { HistoryEntry, HistoryStats, ImportResult } from '@plainsh/core'
import { t, tierColor, outcomeColor } from '../theme.js'

/**
 * formatEntries — one line per history entry, as given (newest first).
 *
 *   2026-03-10 12:00  SUCCESS   SAFE      ls -la
 *                                         ↳ list files
 */
export function formatEntries(entries: ReadonlyArray<HistoryEntry>): string {
  if (entries.length === 0) {
    return '\n  ' + t.muted('no history entries') + '\n'
  }
  let out = '\n'
  for (const e of entries) {
    const when    = e.created_at.slice(0, 16).replace('T', ' ')
    const outcome = outcomeColor(e.outcome)(e.outcome.padEnd(9))
    const tier    = tierColor(e.tier)((e.tier ?? '—').padEnd(9))
    const shown   = e.command ?? e.input
    out += '  ' + t.dim(when) + '  ' + outcome + ' ' + tier + ' ' + t.white(shown) + '\n'
    if (e.mode === 'natural' && e.command !== null) {
      out += ' '.repeat(42) + t.muted('↳ ' + e.input) + '\n'
    }
  }
  return out
}

/**
 * formatStats — summary block for `history stats` and `.history stats`.
 */
export function formatStats(stats: HistoryStats): string {
  const labelW = 18
  const label = (s: string): string => t.muted(s + ' '.repeat(Math.max(1, labelW - s.length)))

  let out = '\n'
  out += '  ' + label('commands') + t.white(String(stats.total)) + '\n'
  out += '  ' + label('success rate') + t.white(`${stats.success_rate}%`) + '\n'
  out += '  ' + label('mean duration') + t.white(`${stats.mean_duration_ms} ms`) + '\n'
  out += (
    '  ' + label('outcomes') +
    Object.entries(stats.outcome_counts)
      .map(([outcome, count]) => t.text(String(count)) + ' ' + t.muted(outcome.toLowerCase()))
      .join(t.dim('  ')) +
    '\n'
  )
  out += (
    '  ' + label('modes') +
    t.text(String(stats.mode_counts.natural)) + ' ' + t.muted('natural') + t.dim('  ') +
    t.text(String(stats.mode_counts.direct)) + ' ' + t.muted('direct') + '\n'
  )

  const contexts = Object.entries(stats.context_distribution).sort((a, b) => b[1] - a[1])
  if (contexts.length > 0) {
    out += '  ' + label('contexts') + contexts.map(([tag, n]) => t.text(tag) + t.dim(` ${n}`)).join('  ') + '\n'
  }

  if (stats.top_commands.length > 0) {
    out += '\n  ' + t.muted('top commands') + '\n'
    for (const { command, count } of stats.top_commands) {
      out += '    ' + t.blue(String(count).padStart(4)) + '  ' + t.white(command) + '\n'
    }
  }

  out += '\n  ' + t.muted('last 7 days') + '\n'
  for (const day of stats.recent_activity) {
    out += '    ' + t.dim(day.date) + '  ' + t.blue('▇'.repeat(Math.min(day.count, 40))) + ' ' + t.muted(String(day.count)) + '\n'
  }
  return out
}

export function formatImport(result: ImportResult, path: string): string {
  return (
    '  ' + t.green(`imported ${result.imported}`) + t.muted(` from ${path}`) +
    t.dim(`  (${result.duplicates} duplicate, ${result.invalid} invalid)`) + '\n'
  )
}
