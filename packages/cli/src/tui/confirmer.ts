/**
 * confirmer.ts — Confirmer over a readline/promises interface.
 *
 * The first confirmation of a request prints the command preview (tier,
 * banner, triggers); later ones only ask. Answers:
 *
 *   - `y` or `yes` affirm a single confirmation
 *   - only the full word `yes` affirms a CRITICAL command or a second
 *     confirmation
 *   - anything else, including an empty line, declines
 *
 * When the pipeline aborts the wait (Ctrl+C, session cancel), the pending
 * question is withdrawn and the answer is `cancel`.
 */

import type { ConfirmationAnswer, ConfirmationPrompt, Confirmer } from '@plainsh/core'
import { RiskTier } from '@plainsh/core'
import { confirmationQuestion, formatAssessment } from './output/assessment.js'

/** The part of readline/promises' Interface the confirmer uses. */
export interface QuestionAsker {
  question(query: string, options: { signal: AbortSignal }): Promise<string>
}

export class ReadlineConfirmer implements Confirmer {
  constructor(
    private readonly asker: QuestionAsker,
    private readonly write: (text: string) => void = (text) => { process.stdout.write(text) },
  ) {}

  async confirm(prompt: ConfirmationPrompt, signal: AbortSignal): Promise<ConfirmationAnswer> {
    if (prompt.step === 1) {
      this.write(formatAssessment(prompt.command, prompt.assessment))
    }
    const question = confirmationQuestion(prompt.assessment.tier, prompt.step, prompt.required)

    let answer: string
    try {
      answer = await this.asker.question(question, { signal })
    } catch (err) {
      if (signal.aborted) {
        this.write('\n')
        return 'cancel'
      }
      throw err
    }
    return parseAnswer(answer, strictAnswer(prompt))
  }
}

function strictAnswer(prompt: ConfirmationPrompt): boolean {
  return prompt.step > 1 || prompt.assessment.tier === RiskTier.Critical
}

export function parseAnswer(answer: string, strict: boolean): ConfirmationAnswer {
  const normalized = answer.trim().toLowerCase()
  if (normalized === 'yes') return 'yes'
  if (!strict && normalized === 'y') return 'yes'
  return 'no'
}
