import React from 'react'
import { Box, Text } from 'ink'
import type { CommandCount } from '@plainsh/core'
import { StatsPanel } from './StatsPanel.js'
import { hex } from '../theme.js'

interface TopCommandsPanelProps {
  commands: ReadonlyArray<CommandCount>
  isFocused: boolean
}

/**
 * TopCommandsPanel — most executed commands with their counts.
 */
export function TopCommandsPanel({ commands, isFocused }: TopCommandsPanelProps): React.ReactElement {
  return (
    <StatsPanel title="Top commands" index={2} count={{ value: commands.length, unit: 'commands' }} span="full" isFocused={isFocused}>
      {commands.length === 0 && <Text color={hex.dim}>nothing executed yet</Text>}
      {commands.map(({ command, count }) => (
        <Box key={command} gap={2}>
          <Text color={hex.blue}>{String(count).padStart(4)}</Text>
          <Text color={hex.text} wrap="truncate-end">{command}</Text>
        </Box>
      ))}
    </StatsPanel>
  )
}
