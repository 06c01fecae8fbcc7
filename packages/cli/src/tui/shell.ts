/**
 * shell.ts — plainsh interactive readline shell.
 *
 * Architecture: three strictly separated layers.
 *
 * LAYER 1 — READLINE (keystroke hot path)
 *   node:readline/promises in terminal mode. Zero render engine on this path.
 *   Handles: prompt display, line editing, history, submit on Enter,
 *   confirmation questions, Ctrl+C.
 *
 * LAYER 2 — STDOUT OUTPUT (command results)
 *   Direct process.stdout.write() with chalk coloring. Append-only.
 *   Handles: previews, command output, history, context, help, errors.
 *
 * LAYER 3 — INK FULL-SCREEN VIEW (bounded modal experience)
 *   Ink mounts ONLY for .stats-view. readline is paused.
 *   On exit, readline resumes.
 *
 * Each line is either a dot command or a request for the SessionPipeline.
 * The shell owns the working directory: it starts at process.cwd() and
 * follows the directory reported by a successful `cd`.
 */

import * as readline from 'node:readline/promises'
import { resolve } from 'node:path'
import React from 'react'
import { render } from 'ink'
import { ulid } from '@plainsh/runtime-host'
import { errorMessage } from '@plainsh/core'
import type { InputMode, SessionPipeline } from '@plainsh/core'
import { buildRuntime } from '../runtime.js'
import type { Runtime } from '../runtime.js'
import { VERSION } from '../version.js'
import { ReadlineConfirmer } from './confirmer.js'
import { clearWithConfirmation } from './clear.js'
import { formatHeader } from './output/header.js'
import { formatHelp } from './output/help.js'
import { formatResult } from './output/result.js'
import { formatEntries, formatStats } from './output/history.js'
import { formatContext, formatSuggestions } from './output/context.js'
import { buildPS1 } from './prompt.js'
import { t } from './theme.js'

const RECENT_LIMIT = 20
const CONNECTION_CHECK_MS = 2_000
const MODES: ReadonlyArray<InputMode | 'auto'> = ['auto', 'natural', 'direct']

function isMode(value: string): value is InputMode | 'auto' {
  return value === 'auto' || value === 'natural' || value === 'direct'
}

function write(text: string): void {
  process.stdout.write(text)
}

function printError(message: string): void {
  write('\n  ' + t.red(message) + '\n')
}

function printUnknown(input: string): void {
  write(
    '\n  ' + t.red('unknown command: ') + t.muted(input) +
    '\n  ' + t.dim("type '.help' for available commands") + '\n'
  )
}

// ---------------------------------------------------------------------------
// Shell state
// ---------------------------------------------------------------------------

class ShellState {
  cwd: string
  mode: InputMode | 'auto'
  model: string
  session: SessionPipeline
  readonly sessionId: string

  constructor(
    readonly runtime: Runtime,
    private readonly confirmer: ReadlineConfirmer,
  ) {
    this.cwd = process.cwd()
    this.mode = runtime.config.session.mode
    this.model = runtime.config.llm.model
    this.sessionId = ulid()
    this.session = this.newSession()
  }

  ps1(): string {
    return buildPS1(this.cwd, this.mode)
  }

  setMode(mode: InputMode | 'auto'): void {
    this.mode = mode
    this.session = this.newSession()
  }

  setModel(model: string): void {
    this.model = model
    this.session = this.newSession()
  }

  tags(): ReadonlyArray<string> {
    return this.runtime.contextDetector.detect(this.cwd)
  }

  private newSession(): SessionPipeline {
    return this.runtime.createSession({
      confirmer: this.confirmer,
      mode: this.mode,
      model: this.model,
      sessionId: this.sessionId,
    })
  }
}

// ---------------------------------------------------------------------------
// Dot commands
// ---------------------------------------------------------------------------

async function historyCommand(
  state: ShellState,
  rl: readline.Interface,
  args: ReadonlyArray<string>,
): Promise<void> {
  const history = state.runtime.history
  const sub = args[0] ?? ''
  const rest = args.slice(1).join(' ')

  switch (sub) {
    case '':
      write(formatEntries(history.recent(RECENT_LIMIT)))
      return
    case 'session':
      write(formatEntries(history.recent(RECENT_LIMIT, { session_id: state.sessionId })))
      return
    case 'stats':
      write(formatStats(history.stats()))
      return
    case 'search':
      if (rest === '') {
        printError('usage: .history search <term>')
        return
      }
      write(formatEntries(history.search(rest, RECENT_LIMIT)))
      return
    case 'export': {
      if (rest === '') {
        printError('usage: .history export <file>')
        return
      }
      const target = resolve(state.cwd, rest)
      const count = history.export(target, target.endsWith('.csv') ? 'csv' : 'jsonl')
      write('\n  ' + t.green(`exported ${count} entries`) + t.muted(` to ${target}`) + '\n')
      return
    }
    case 'clear': {
      const days = rest === '' ? undefined : Number(rest)
      if (days !== undefined && !(Number.isInteger(days) && days > 0)) {
        printError('usage: .history clear [days]')
        return
      }
      write('\n')
      const removed = await clearWithConfirmation(history, rl, { olderThanDays: days })
      write(removed === null
        ? '  ' + t.muted('history left unchanged') + '\n'
        : '  ' + t.amber(`removed ${removed} entries`) + '\n')
      return
    }
    default:
      printUnknown(`.history ${args.join(' ')}`)
  }
}

function suggestCommand(state: ShellState, intent: string): void {
  if (intent === '') {
    printError('usage: .suggest <intent>')
    return
  }
  const tags = state.tags()
  const ranked = state.runtime
    .ranker()
    .rankDetailed(intent, tags.length === 0 ? ['unknown'] : tags, state.runtime.config.suggest.top_n)
  write(formatSuggestions(intent, ranked))
}

async function modelsCommand(state: ShellState): Promise<void> {
  const models = await state.runtime.translator(state.model).listModels(AbortSignal.timeout(CONNECTION_CHECK_MS))
  if (models.length === 0) {
    write('\n  ' + t.muted('no models installed') + '\n')
    return
  }
  write('\n')
  for (const name of models) {
    const marker = name === state.model ? t.green('● ') : t.dim('○ ')
    write('  ' + marker + t.white(name) + '\n')
  }
}

function modeCommand(state: ShellState, arg: string): void {
  if (arg === '') {
    write('\n  ' + t.muted('mode ') + t.white(state.mode) + t.dim(`  (${MODES.join(' | ')})`) + '\n')
    return
  }
  if (!isMode(arg)) {
    printError(`unknown mode: ${arg} (expected ${MODES.join(', ')})`)
    return
  }
  state.setMode(arg)
  write('\n  ' + t.muted('mode ') + t.white(arg) + '\n')
}

function modelCommand(state: ShellState, arg: string): void {
  if (arg !== '') {
    state.setModel(arg)
  }
  write('\n  ' + t.muted('model ') + t.blue(state.model) + '\n')
}

/**
 * Run one dot command. Returns false when the line is not a dot command.
 */
async function dotCommand(state: ShellState, rl: readline.Interface, input: string): Promise<boolean> {
  if (!input.startsWith('.')) return false

  const parts = input.split(/\s+/)
  const cmd   = parts[0] ?? ''
  const args  = parts.slice(1)
  const rest  = args.join(' ')

  switch (cmd) {
    case '.help':
      write(formatHelp())
      break
    case '.exit':
    case '.quit':
      rl.close()
      break
    case '.clear':
      write('\x1b[2J\x1b[H')
      break
    case '.pwd':
      write('\n  ' + t.white(state.cwd) + '\n')
      break
    case '.mode':
      modeCommand(state, rest)
      break
    case '.model':
      modelCommand(state, rest)
      break
    case '.models':
      await modelsCommand(state)
      break
    case '.history':
      await historyCommand(state, rl, args)
      break
    case '.context':
      write(formatContext(state.runtime.contextDetector.report(state.cwd)))
      break
    case '.suggest':
      suggestCommand(state, rest)
      break
    default:
      printUnknown(input)
  }
  return true
}

// ---------------------------------------------------------------------------
// Ink statistics view
// ---------------------------------------------------------------------------

function mountStatsView(rl: readline.Interface, state: ShellState, showPrompt: () => void): void {
  // Pause readline so it stops consuming stdin. Ink manages raw mode itself
  // (enable in its useInput effect, disable in cleanup).
  rl.pause()

  // Ink calls stdin.unref() during cleanup, which can drain the event loop
  // before waitUntilExit() resolves. Hold a handle until readline is back.
  const keepAlive = setInterval(() => { /* keep event loop alive */ }, 60_000)

  const restore = (): void => {
    // Re-ref stdin before clearing keepAlive; rl.resume() does not re-ref it.
    process.stdin.ref()
    clearInterval(keepAlive)
    if (process.stdin.isTTY) process.stdin.setRawMode(true)
    rl.resume()
    showPrompt()
  }

  // Lazy-import the TSX module only when needed.
  import('./stats/StatsView.js')
    .then(({ StatsView }) => {
      const history = state.runtime.history
      const load = () => ({ stats: history.stats(), recent: history.recent(8) })
      const { waitUntilExit } = render(
        React.createElement(StatsView, {
          load,
          onExit: () => { /* Ink handles its own teardown */ },
        })
      )
      waitUntilExit().then(restore, restore)
    })
    .catch((err: unknown) => {
      write('\n  ' + t.red('stats view error: ' + errorMessage(err)) + '\n')
      restore()
    })
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export interface ShellOptions {
  /** --home flag value. */
  readonly home?: string | undefined
}

/**
 * launchShell — entry point for the interactive TTY shell.
 *
 * Called from src/bin/plainsh.ts when the process runs in a TTY without
 * arguments, and by `plainsh shell`.
 */
export async function launchShell(options: ShellOptions = {}): Promise<void> {
  const runtime = buildRuntime({ home: options.home })

  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    true,
    historySize: 100,
  })
  const state = new ShellState(runtime, new ReadlineConfirmer(rl))

  // 1. Startup header
  const connection = await runtime.translator(state.model).checkConnection(CONNECTION_CHECK_MS)
  write(formatHeader({
    version:    VERSION,
    home:       runtime.home,
    model:      state.model,
    mode:       state.mode,
    tags:       state.tags(),
    connection,
  }))
  if (runtime.loaded.overrides.length > 0) {
    write('  ' + t.dim('environment overrides: ' + runtime.loaded.overrides.join(', ')) + '\n')
  }

  // Write the prompt directly rather than through rl.prompt(), which
  // recomputes cursor rows from its own model of the screen.
  const showPrompt = (): void => {
    rl.setPrompt(state.ps1())
    write('\n' + state.ps1())
  }

  const runRequest = async (input: string): Promise<void> => {
    const result = await state.session.run(input, state.cwd)
    write(formatResult(result))
    state.cwd = result.cwd
  }

  // 2. Line routing
  rl.on('line', (line: string) => {
    const input = line.trim()

    if (state.session.busy) {
      write('\n  ' + t.amber('still running the previous command') + t.dim(' · Ctrl+C cancels a pending request') + '\n')
      return
    }
    if (input === '') {
      showPrompt()
      return
    }
    if (input === '.stats-view' || input === '.sv') {
      // showPrompt is NOT called here — the Ink restore path handles it.
      mountStatsView(rl, state, showPrompt)
      return
    }

    dotCommand(state, rl, input)
      .then((handled) => (handled ? undefined : runRequest(input)))
      .catch((err: unknown) => { printError(errorMessage(err)) })
      .finally(showPrompt)
  })

  // 3. Ctrl+C cancels a pending translation or confirmation, else exits
  rl.on('SIGINT', () => {
    if (state.session.cancel()) {
      write('\n  ' + t.amber('cancelled') + '\n')
      return
    }
    rl.close()
  })

  rl.on('close', () => {
    if (state.session.droppedEvents > 0) {
      process.stderr.write(`[plainsh] ${state.session.droppedEvents} lifecycle events could not be logged\n`)
    }
    write('\n')
    process.exit(0)
  })

  rl.setPrompt(state.ps1())
  write('\n' + state.ps1())
}
