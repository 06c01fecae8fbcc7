import type { RankedSuggestion } from '@plainsh/core'
import type { ContextReport } from '@plainsh/runtime-host'
import { t } from '../theme.js'

/**
 * formatContext — detected project tags for a directory.
 *
 *   /home/me/app
 *     nodejs   90%  package.json
 *     git      70%  .git
 *     package manager  npm
 */
export function formatContext(report: ContextReport): string {
  let out = '\n  ' + t.white(report.cwd) + '\n'
  if (report.matches.length === 0) {
    out += '    ' + t.muted('no project markers found') + '\n'
    return out
  }
  for (const m of report.matches) {
    out += (
      '    ' + t.blue(m.tag.padEnd(13)) +
      t.text(`${Math.round(m.confidence * 100)}%`.padStart(4)) + '  ' +
      t.muted(m.evidence.join(', ')) + '\n'
    )
  }
  if (report.packageManager !== null) {
    out += '    ' + t.muted('package manager  ') + t.text(report.packageManager) + '\n'
  }
  return out
}

/**
 * formatSuggestions — ranked suggestions, best first.
 */
export function formatSuggestions(intent: string, suggestions: ReadonlyArray<RankedSuggestion>): string {
  if (suggestions.length === 0) {
    return '\n  ' + t.muted(`no suggestions for "${intent}"`) + '\n'
  }
  let out = '\n'
  suggestions.forEach((s, i) => {
    const used = s.last_used === null ? '' : t.dim(`  last used ${s.last_used.slice(0, 10)}`)
    out += '  ' + t.dim(`${i + 1}.`) + ' ' + t.white(s.command) + t.muted(`  ${s.score.toFixed(2)}`) + used + '\n'
  })
  return out
}
