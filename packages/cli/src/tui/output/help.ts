import { t } from '../theme.js'

/**
 * formatHelp — shell dot commands grouped by category.
 */
export function formatHelp(): string {
  const section = (label: string): string =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (name: string, desc: string): string => {
    const pad = ' '.repeat(Math.max(1, 28 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = '\n'

  out += section('input')
  out += cmd('<text>',                    'translate free text into a command')
  out += cmd('<command>',                 'run a shell command directly')
  out += cmd('.mode [auto|natural|direct]', 'show or switch the input mode')

  out += section('history')
  out += cmd('.history',                  'recent commands')
  out += cmd('.history session',          'recent commands of this shell')
  out += cmd('.history stats',            'success rate, top commands, activity')
  out += cmd('.history search <term>',    'search inputs and commands')
  out += cmd('.history export <file>',    'write history as JSONL, or CSV for a .csv file')
  out += cmd('.history clear [days]',     'remove every entry, or those older than days')
  out += cmd('.stats-view  .sv',          'open the full-screen statistics view')

  out += section('context')
  out += cmd('.context',                  'project type of the working directory')
  out += cmd('.suggest <intent>',         'suggested commands for this project')
  out += cmd('.pwd',                      'working directory')

  out += section('model')
  out += cmd('.models',                   'models installed on the Ollama server')
  out += cmd('.model [name]',             'show or switch the translation model')

  out += section('system')
  out += cmd('.help',                     'show this help')
  out += cmd('.clear',                    'clear the screen')
  out += cmd('.exit  .quit',              'exit')
  out += cmd('Ctrl+C',                    'cancel the pending request, or exit')

  out += '\n  ' + t.dim('every command is classified by risk and needs confirmation before it runs') + '\n'

  return out
}
