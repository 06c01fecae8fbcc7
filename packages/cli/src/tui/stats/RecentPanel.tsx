import React from 'react'
import { Box, Text } from 'ink'
import { HistoryOutcome } from '@plainsh/core'
import type { HistoryEntry } from '@plainsh/core'
import { StatsPanel } from './StatsPanel.js'
import { hex } from '../theme.js'

interface RecentPanelProps {
  entries: ReadonlyArray<HistoryEntry>
  isFocused: boolean
}

function outcomeSymbol(outcome: HistoryOutcome): { sym: string; color: string } {
  switch (outcome) {
    case HistoryOutcome.Success:  return { sym: '✓ success',  color: hex.green }
    case HistoryOutcome.Failure:  return { sym: '✗ failure',  color: hex.amber }
    case HistoryOutcome.Rejected: return { sym: '⊘ rejected', color: hex.muted }
    case HistoryOutcome.Error:    return { sym: '! error',    color: hex.red }
  }
}

/**
 * RecentPanel — the latest history entries, full width.
 *
 * Format: timestamp | outcome colored | command | tier dim
 */
export function RecentPanel({ entries, isFocused }: RecentPanelProps): React.ReactElement {
  return (
    <StatsPanel title="Recent" index={3} count={{ value: entries.length, unit: 'entries' }} span="full" isFocused={isFocused}>
      {entries.map((entry) => {
        const { sym, color } = outcomeSymbol(entry.outcome)
        return (
          <Box key={entry.id} gap={2}>
            <Text color={hex.dim}>{entry.created_at.slice(0, 16).replace('T', ' ')}</Text>
            <Text color={color}>{sym.padEnd(10)}</Text>
            <Box flexGrow={1}><Text color={hex.text} wrap="truncate-end">{entry.command ?? entry.input}</Text></Box>
            <Text color={hex.muted}>{entry.tier ?? '—'}</Text>
          </Box>
        )
      })}
    </StatsPanel>
  )
}
