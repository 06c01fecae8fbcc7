import React from 'react'
import { Box, Text } from 'ink'
import { HistoryOutcome } from '@plainsh/core'
import type { HistoryStats } from '@plainsh/core'
import { StatsPanel } from './StatsPanel.js'
import { hex } from '../theme.js'

interface SummaryPanelProps {
  stats: HistoryStats
  isFocused: boolean
}

function Row({ label, children }: { label: string; children: React.ReactNode }): React.ReactElement {
  return (
    <Box justifyContent="space-between">
      <Text color={hex.muted}>{label}</Text>
      {children}
    </Box>
  )
}

const OUTCOME_COLORS: Record<HistoryOutcome, string> = {
  [HistoryOutcome.Success]:  hex.green,
  [HistoryOutcome.Failure]:  hex.amber,
  [HistoryOutcome.Rejected]: hex.muted,
  [HistoryOutcome.Error]:    hex.red,
}

/**
 * SummaryPanel — totals, success rate, mean duration, outcome and mode counts.
 */
export function SummaryPanel({ stats, isFocused }: SummaryPanelProps): React.ReactElement {
  const rateColor = stats.success_rate >= 80 ? hex.green : stats.success_rate >= 50 ? hex.amber : hex.red

  return (
    <StatsPanel title="Summary" index={0} count={{ value: stats.total, unit: 'commands' }} span="half" isFocused={isFocused}>
      <Row label="success rate">
        <Text color={rateColor}>{`${stats.success_rate}%`}</Text>
      </Row>
      <Row label="mean duration">
        <Text color={hex.text}>{`${stats.mean_duration_ms} ms`}</Text>
      </Row>
      {Object.values(HistoryOutcome).map((outcome) => (
        <Row key={outcome} label={outcome.toLowerCase()}>
          <Text color={OUTCOME_COLORS[outcome]}>{String(stats.outcome_counts[outcome])}</Text>
        </Row>
      ))}
      <Row label="natural / direct">
        <Text color={hex.text}>{`${stats.mode_counts.natural} / ${stats.mode_counts.direct}`}</Text>
      </Row>
    </StatsPanel>
  )
}
