import { HistoryOutcome } from '@plainsh/core'
import type { PipelineResult } from '@plainsh/core'
import { t, tierColor } from '../theme.js'

/**
 * formatResult — command output plus one status line for a finished request.
 *
 *   ✓ exit 0 · 12 ms
 *   ✗ exit 2 · ls: cannot access 'x': No such file or directory
 *   ⊘ rejected · Declined by operator [HIGH: ...]
 *   ! error · Command timed out after 60000 ms
 */
export function formatResult(result: PipelineResult): string {
  const { state, entry } = result
  let out = ''

  // Natural-language input that skipped the preview still shows its command.
  if (entry.mode === 'natural' && entry.command !== null && !result.trail.includes('AWAITING_CONFIRMATION')) {
    out += '  ' + t.blue('▸ ') + t.white.bold(entry.command) + '\n'
    if (result.explanation !== null && result.explanation !== '') {
      out += '    ' + t.muted(result.explanation) + '\n'
    }
  }

  switch (state.kind) {
    case 'RECORDED_SUCCESS':
      out += commandOutput(state.result.stdout, state.result.stderr)
      out += '  ' + t.green('✓ ') + t.muted(`exit 0 · ${entry.duration_ms} ms`) + '\n'
      break

    case 'RECORDED_FAILURE':
      if (state.result !== null) {
        out += commandOutput(state.result.stdout, state.result.stderr)
      }
      if (state.outcome === HistoryOutcome.Failure) {
        out += (
          '  ' + t.amber('✗ ') +
          t.muted(`exit ${state.exit_code ?? '?'} · `) +
          t.text(firstLine(state.message)) + '\n'
        )
      } else {
        const tier = state.assessment === null ? null : state.assessment.tier
        const tierLabel = tier === null ? '' : ' ' + tierColor(tier)(`[${tier}]`)
        out += '  ' + t.red('! error') + tierLabel + t.muted(' · ') + t.text(state.message) + '\n'
      }
      break

    case 'REJECTED': {
      const tier = state.assessment === null ? null : state.assessment.tier
      const tierLabel = tier === null ? '' : ' ' + tierColor(tier)(`[${tier}]`)
      out += '  ' + t.muted('⊘ rejected') + tierLabel + t.muted(' · ') + t.text(state.reason) + '\n'
      break
    }
  }

  if (!result.history_recorded) {
    out += '  ' + t.amber('history unavailable: ') + t.muted(result.history_error ?? 'unknown error') + '\n'
  }
  return out
}

function commandOutput(stdout: string, stderr: string): string {
  let out = ''
  if (stdout !== '') out += stdout.endsWith('\n') ? stdout : stdout + '\n'
  if (stderr !== '') out += t.red(stderr.endsWith('\n') ? stderr : stderr + '\n')
  return out
}

function firstLine(text: string): string {
  const line = text.split('\n', 1)[0] ?? ''
  return line.length < text.length ? line + ' …' : line
}
