import chalk, { type ChalkInstance } from 'chalk'
import { HistoryOutcome, RiskTier } from '@plainsh/core'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  orange:     chalk.hex('#E0703A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _tierColors: Record<RiskTier, ChalkInstance> = {
  [RiskTier.Safe]:     t.green,
  [RiskTier.Low]:      t.text,
  [RiskTier.Medium]:   t.amber,
  [RiskTier.High]:     t.orange,
  [RiskTier.Critical]: t.red.bold,
}

export const tierColor = (tier: RiskTier | null): ChalkInstance =>
  tier === null ? t.muted : _tierColors[tier]

const _outcomeColors: Record<HistoryOutcome, ChalkInstance> = {
  [HistoryOutcome.Success]:  t.green,
  [HistoryOutcome.Failure]:  t.amber,
  [HistoryOutcome.Rejected]: t.muted,
  [HistoryOutcome.Error]:    t.red,
}

export const outcomeColor = (outcome: HistoryOutcome): ChalkInstance =>
  _outcomeColors[outcome]

/** Hex values for Ink components, which take colors as strings. */
export const hex = {
  blue:   '#4FC3F7',
  border: '#242424',
  text:   '#C8C8C0',
  dim:    '#444444',
  muted:  '#666666',
  amber:  '#D4880A',
  green:  '#81C784',
  red:    '#CF6679',
} as const
