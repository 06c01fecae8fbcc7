import React, { useReducer, useState, useEffect } from 'react'
import { Box, Text, useInput, useApp, useStdout } from 'ink'
import chalk from 'chalk'
import { errorMessage } from '@plainsh/core'
import type { HistoryEntry, HistoryStats } from '@plainsh/core'
import { SummaryPanel } from './SummaryPanel.js'
import { TopCommandsPanel } from './TopCommandsPanel.js'
import { ActivityPanel } from './ActivityPanel.js'
import { RecentPanel } from './RecentPanel.js'
import { hex } from '../theme.js'

// ─── State ───────────────────────────────────────────────────────────────────

export interface StatsData {
  stats: HistoryStats
  recent: ReadonlyArray<HistoryEntry>
}

type StatsState =
  | { phase: 'loading' }
  | { phase: 'ready'; data: StatsData }
  | { phase: 'error'; message: string }

type StatsAction =
  | { type: 'LOADED'; data: StatsData }
  | { type: 'ERROR'; message: string }
  | { type: 'RELOAD' }

function reducer(_prev: StatsState, action: StatsAction): StatsState {
  switch (action.type) {
    case 'LOADED': return { phase: 'ready', data: action.data }
    case 'ERROR':  return { phase: 'error', message: action.message }
    case 'RELOAD': return { phase: 'loading' }
  }
}

const PANEL_COUNT = 4

// ─── Component ───────────────────────────────────────────────────────────────

export interface StatsViewProps {
  /** Reads the history. May throw StorageError. */
  load: () => StatsData
  onExit: () => void
}

/**
 * StatsView — full-screen Ink history statistics for .stats-view.
 *
 * Mounts when the readline shell issues .stats-view or .sv.
 * Unmounts on 'q' or Escape → restores readline.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   Tab         → next panel
 *   Shift+Tab   → previous panel
 *   r           → re-read the history
 */
export function StatsView({ load, onExit }: StatsViewProps): React.ReactElement {
  const { exit: inkExit } = useApp()
  const [state, dispatch] = useReducer(reducer, { phase: 'loading' })
  const [activePanel, setActivePanel] = useState(0)
  const [refreshKey, setRefreshKey] = useState(0)
  const { stdout } = useStdout()

  useEffect(() => {
    dispatch({ type: 'RELOAD' })
    try {
      dispatch({ type: 'LOADED', data: load() })
    } catch (err) {
      dispatch({ type: 'ERROR', message: errorMessage(err) })
    }
  }, [refreshKey, load])

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      onExit()
      inkExit()
      return
    }
    if (key.tab && !key.shift) {
      setActivePanel(p => (p + 1) % PANEL_COUNT)
      return
    }
    if (key.tab && key.shift) {
      setActivePanel(p => (p - 1 + PANEL_COUNT) % PANEL_COUNT)
      return
    }
    if (input === 'r') {
      setRefreshKey(k => k + 1)
    }
  })

  // ─── Loading ─────────────────────────────────────────────────────────────

  if (state.phase === 'loading') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.blue}>▸ PLAINSH</Text>
        <Text color={hex.dim}>reading history…</Text>
      </Box>
    )
  }

  if (state.phase === 'error') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.red}>error reading history: {state.message}</Text>
        <Text color={hex.dim}>press q to exit</Text>
      </Box>
    )
  }

  const { stats, recent } = state.data
  const cols = stdout.columns ?? 80

  const slLeft  = ` ▸ plainsh · ${stats.total} commands · ${stats.success_rate}% success`
  const slRight = `q quit · r refresh · tab navigate panels `
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine  = chalk.bgHex('#0277BD').white(slLeft + slFill + slRight)

  // ─── Layout ──────────────────────────────────────────────────────────────

  return (
    <Box flexDirection="column">
      {/* Row 1: Summary | Activity */}
      <Box flexDirection="row">
        <SummaryPanel  stats={stats} isFocused={activePanel === 0} />
        <ActivityPanel
          days={stats.recent_activity}
          context={stats.context_distribution}
          isFocused={activePanel === 1}
          width={Math.max(10, Math.floor(cols / 2) - 20)}
        />
      </Box>

      {/* Row 2: Top commands */}
      <TopCommandsPanel commands={stats.top_commands} isFocused={activePanel === 2} />

      {/* Row 3: Recent entries */}
      <RecentPanel entries={recent} isFocused={activePanel === 3} />

      {/* Status bar */}
      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
