/**
 * Plainsh Core — Safety Tips
 *
 * Advice shown with the preview of a non-SAFE command: one line for the
 * tier, then tips for the programs and redirections the command contains.
 * Tips never change the tier or the confirmation flow.
 */

import { RiskTier } from '../types/risk.js';
import { programName, splitSegments } from './segments.js';

const TIER_ADVICE: Record<RiskTier, string | null> = {
  [RiskTier.Safe]: null,
  [RiskTier.Low]: 'Review the operation carefully',
  [RiskTier.Medium]: 'Verify the operation is intended and paths are correct',
  [RiskTier.High]: 'Double-check the target path and consider backing up first',
  [RiskTier.Critical]: 'Double-check the target path and consider backing up first',
};

const DELETE_TIPS = [
  "Run 'ls' on the same paths first to see what would be removed",
  'Consider moving files to the trash instead of deleting them',
  'Double-check every path',
];

const PRIVILEGE_TIPS = [
  'Make sure you understand why elevated privileges are needed',
  'Only run privileged commands from a trusted source',
  'Check for an alternative that does not need sudo',
];

const OVERWRITE_TIPS = [
  'Back up the target file before overwriting it',
  "Use '>>' to append instead of overwriting",
];

/** A single `>` writing to a file: not `>>`, `>&`, `&>` or `/dev/null`. */
const OVERWRITE = /(?<![>&])>(?![>&])\s*(?!\/dev\/null)\S/;

/** Tips for `command` at `tier`, without duplicates. Empty for SAFE. */
export function safetyTips(command: string, tier: RiskTier): ReadonlyArray<string> {
  const advice = TIER_ADVICE[tier];
  if (advice === null) return [];

  const tips = new Set<string>([advice]);
  for (const segment of splitSegments(command, 'pipelines')) {
    if (programName(segment) === 'rm') DELETE_TIPS.forEach((tip) => tips.add(tip));
    if (/^sudo\b/i.test(segment)) PRIVILEGE_TIPS.forEach((tip) => tips.add(tip));
  }
  if (OVERWRITE.test(command)) OVERWRITE_TIPS.forEach((tip) => tips.add(tip));
  return [...tips];
}
