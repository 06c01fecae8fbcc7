/**
 * Plainsh Core — Input Mode Detection
 *
 * Heuristic used when a session runs in `auto` mode: decides whether a line
 * of input is already a shell command or free text to be translated.
 */

import type { InputMode } from '../types/request.js';

/** Programs whose name at the start of a line marks direct input. */
const DIRECT_PROGRAMS: ReadonlySet<string> = new Set([
  'ls', 'cd', 'pwd', 'grep', 'find', 'ps', 'df', 'du', 'free', 'chmod', 'chown',
  'mv', 'cp', 'rm', 'mkdir', 'rmdir', 'touch', 'cat', 'echo', 'git', 'npm', 'sudo',
]);

/** Phrases that only appear in prose. */
const NATURAL_PHRASES: ReadonlyArray<string> = [
  'please', 'can you', 'how to', 'how do', 'show me', 'find all', 'list all',
  'what is', 'where is', 'count', 'display', 'get', 'make',
];

/**
 * Classify `input` as `direct` or `natural`.
 *
 * Order of checks:
 * 1. empty input, a known program first, or shell operators ⇒ direct
 * 2. a prose phrase anywhere ⇒ natural
 * 3. one or two words without punctuation ⇒ direct
 * 4. otherwise ⇒ `fallback`
 */
export function detectInputMode(input: string, fallback: InputMode = 'natural'): InputMode {
  const trimmed = input.trim();
  if (trimmed === '') return 'direct';

  const words = trimmed.split(/\s+/);
  const first = words[0] ?? '';
  if (DIRECT_PROGRAMS.has(first) || first.startsWith('./') || first.startsWith('/')) {
    return 'direct';
  }
  if (/(?:^|\s)(?:\||&&|\|\||>|>>|<)(?:\s|$)/.test(trimmed)) {
    return 'direct';
  }

  const lower = trimmed.toLowerCase();
  if (NATURAL_PHRASES.some((phrase) => new RegExp(`\\b${phrase}\\b`).test(lower))) {
    return 'natural';
  }

  if (words.length <= 2 && !/[?.,;]/.test(trimmed)) {
    return 'direct';
  }
  return fallback;
}
