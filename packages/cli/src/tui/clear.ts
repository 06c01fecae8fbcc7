/**
 * clear.ts — Confirmed history removal, shared by `plainsh history clear`
 * and `.history clear`.
 */

import type { ClearOptions, HistoryStore } from '@plainsh/core'
import type { QuestionAsker } from './confirmer.js'
import { parseAnswer } from './confirmer.js'

export function clearQuestion(total: number, options: ClearOptions = {}): string {
  return options.olderThanDays === undefined
    ? `Remove all ${total} history entries? [y/N] `
    : `Remove history entries older than ${options.olderThanDays} days? [y/N] `
}

/**
 * Ask before clearing. Returns the number of entries removed, or null when
 * the operator did not answer `y` or `yes`.
 */
export async function clearWithConfirmation(
  history: HistoryStore,
  asker: QuestionAsker,
  options: ClearOptions = {},
  signal: AbortSignal = new AbortController().signal,
): Promise<number | null> {
  const question = clearQuestion(history.stats().total, options)
  const answer = await asker.question(question, { signal })
  if (parseAnswer(answer, false) !== 'yes') return null
  return history.clear(options)
}
