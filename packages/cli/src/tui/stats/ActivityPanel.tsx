import React from 'react'
import { Box, Text } from 'ink'
import type { DailyCount } from '@plainsh/core'
import { StatsPanel } from './StatsPanel.js'
import { activityBars } from './bars.js'
import { hex } from '../theme.js'

interface ActivityPanelProps {
  days: ReadonlyArray<DailyCount>
  context: Readonly<Record<string, number>>
  isFocused: boolean
  width: number
}

/**
 * ActivityPanel — commands per day for the last week, then the context mix.
 */
export function ActivityPanel({ days, context, isFocused, width }: ActivityPanelProps): React.ReactElement {
  const contexts = Object.entries(context).sort((a, b) => b[1] - a[1])

  return (
    <StatsPanel title="Activity" index={1} note="last 7 days" span="half" isFocused={isFocused}>
      {activityBars(days, width).map((bar) => (
        <Box key={bar.label} gap={1}>
          <Text color={hex.dim}>{bar.label}</Text>
          <Text color={hex.blue}>{'▇'.repeat(bar.cells)}</Text>
          <Text color={hex.muted}>{String(bar.count)}</Text>
        </Box>
      ))}
      <Box marginTop={1} gap={2} flexWrap="wrap">
        {contexts.map(([tag, count]) => (
          <Text key={tag} color={hex.text}>
            {tag}
            <Text color={hex.dim}>{` ${count}`}</Text>
          </Text>
        ))}
      </Box>
    </StatsPanel>
  )
}
