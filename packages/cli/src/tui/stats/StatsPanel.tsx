import React from 'react'
import { Box, Text } from 'ink'
import { hex } from '../theme.js'

/** How much of the terminal row a panel takes. */
export type PanelSpan = 'half' | 'full'

interface StatsPanelProps {
  title: string
  /** Tab order position, 0-based; shown 1-based before the title. */
  index: number
  /** Counted items, e.g. `{ value: 12, unit: 'commands' }`. */
  count?: { value: number; unit: string }
  /** Shown instead of a count, e.g. `last 7 days`. */
  note?: string
  span: PanelSpan
  isFocused: boolean
  children: React.ReactNode
}

/** `1 command`, `3 commands`, `1 entry`. */
export function countLabel(value: number, unit: string): string {
  if (value !== 1) return `${value} ${unit}`
  return `${value} ${unit.endsWith('ies') ? unit.slice(0, -3) + 'y' : unit.replace(/s$/, '')}`
}

/**
 * StatsPanel — one section of the statistics view.
 *
 * Half-span panels share a row; full-span panels take it alone. The focused
 * panel gets a rounded blue border and a bright title.
 */
export function StatsPanel({ title, index, count, note, span, isFocused, children }: StatsPanelProps): React.ReactElement {
  const right = count !== undefined ? countLabel(count.value, count.unit) : note

  return (
    <Box
      width={span === 'half' ? '50%' : '100%'}
      flexDirection="column"
      borderStyle={isFocused ? 'round' : 'single'}
      borderColor={isFocused ? hex.blue : hex.border}
      paddingX={1}
    >
      <Box justifyContent="space-between" marginBottom={1}>
        <Text>
          <Text color={hex.dim}>{`${index + 1} `}</Text>
          <Text color={isFocused ? hex.blue : hex.muted} bold={isFocused}>{title}</Text>
        </Text>
        {right !== undefined && <Text color={hex.muted}>{right}</Text>}
      </Box>
      {children}
    </Box>
  )
}
