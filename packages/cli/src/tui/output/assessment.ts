import type { RiskAssessment } from '@plainsh/core'
import { RiskTier, safetyTips } from '@plainsh/core'
import { t, tierColor } from '../theme.js'

const TIER_BANNERS: Record<RiskTier, string> = {
  [RiskTier.Safe]:     'safe',
  [RiskTier.Low]:      'low risk',
  [RiskTier.Medium]:   'moderate risk: review before running',
  [RiskTier.High]:     'high risk: this command could cause significant damage',
  [RiskTier.Critical]: 'CRITICAL: this command could cause irreversible damage',
}

/**
 * formatAssessment — the command preview shown before confirmation.
 *
 *   ▸ rm -rf /
 *     CRITICAL  CRITICAL: this command could cause irreversible damage
 *     · recursive-delete+root-path  rm -rf /  recursive delete of the filesystem root
 *     tip  Double-check the target path and consider backing up first
 */
export function formatAssessment(
  command: string,
  assessment: RiskAssessment,
  explanation: string | null = null,
): string {
  const color = tierColor(assessment.tier)
  let out = '\n'
  out += '  ' + t.blue('▸ ') + t.white.bold(command) + '\n'
  if (explanation !== null && explanation !== '') {
    out += '    ' + t.muted(explanation) + '\n'
  }
  out += '    ' + color(assessment.tier) + '  ' + color(TIER_BANNERS[assessment.tier]) + '\n'
  for (const trigger of assessment.triggers) {
    out += (
      '    ' + t.dim('· ') +
      t.text(trigger.rule) + '  ' +
      tierColor(trigger.tier)(trigger.match) + '  ' +
      t.muted(trigger.reason) + '\n'
    )
  }
  for (const tip of safetyTips(command, assessment.tier)) {
    out += '    ' + t.dim('tip  ') + t.muted(tip) + '\n'
  }
  return out
}

/** The question put to the operator for confirmation `step` of `required`. */
export function confirmationQuestion(tier: RiskTier, step: number, required: number): string {
  const counter = required > 1 ? t.dim(` (${step}/${required})`) : ''
  if (step > 1) {
    return '  ' + t.red('Are you absolutely certain? Type "yes" to run it') + counter + ' ' + t.dim('[no] ')
  }
  if (tier === RiskTier.Critical) {
    return '  ' + t.red('Type "yes" to confirm you understand the risks') + counter + ' ' + t.dim('[no] ')
  }
  return '  ' + t.text('Execute this command?') + counter + ' ' + t.dim('[y/N] ')
}
