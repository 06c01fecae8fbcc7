/**
 * Plainsh Core — Command Segmentation
 *
 * Heuristic splitting of a compound command into the simple commands it is
 * made of. This is not a shell parser: it understands quoting, the standard
 * statement separators, pipes, and command substitution, and nothing else.
 *
 * Used by the RiskClassifier to re-evaluate each part of a compound command
 * when the whole string matched no rule.
 */

/**
 * How far segmentation descends into a compound command.
 *
 * - `none`: the whole string is the only segment
 * - `statements`: split on `;`, `&&`, `||`, `&` and newlines
 * - `pipelines`: additionally split on `|`
 * - `substitutions`: additionally classify the bodies of `$( … )` and backticks
 */
export type SegmentDepth = 'none' | 'statements' | 'pipelines' | 'substitutions';

const DEPTH_ORDER: Readonly<Record<SegmentDepth, number>> = {
  none: 0,
  statements: 1,
  pipelines: 2,
  substitutions: 3,
};

/**
 * Split `command` into trimmed, non-empty segments.
 *
 * Segments appear in source order; bodies of command substitutions (depth
 * `substitutions`) follow the top-level segments, themselves segmented.
 */
export function splitSegments(command: string, depth: SegmentDepth): ReadonlyArray<string> {
  const level = DEPTH_ORDER[depth];
  if (level === 0) {
    const trimmed = command.trim();
    return trimmed === '' ? [] : [trimmed];
  }

  const segments: string[] = [];
  const nested: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;

  const flush = (): void => {
    const trimmed = current.trim();
    if (trimmed !== '') segments.push(trimmed);
    current = '';
  };

  let i = 0;
  while (i < command.length) {
    const ch = command.charAt(i);
    const next = command.charAt(i + 1);

    if (quote === "'") {
      current += ch;
      if (ch === "'") quote = null;
      i++;
      continue;
    }

    if (ch === '\\' && i + 1 < command.length) {
      current += ch + next;
      i += 2;
      continue;
    }

    if (ch === '$' && next === '(') {
      const end = findClosingParen(command, i + 2);
      current += command.slice(i, end + 1);
      nested.push(command.slice(i + 2, end));
      i = end + 1;
      continue;
    }

    if (ch === '`') {
      const close = command.indexOf('`', i + 1);
      const end = close === -1 ? command.length : close;
      current += command.slice(i, end + 1);
      nested.push(command.slice(i + 1, end));
      i = end + 1;
      continue;
    }

    if (quote === '"') {
      current += ch;
      if (ch === '"') quote = null;
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      i++;
      continue;
    }

    if (ch === ';' || ch === '\n') {
      flush();
      i++;
      continue;
    }

    if ((ch === '&' && next === '&') || (ch === '|' && next === '|')) {
      flush();
      i += 2;
      continue;
    }

    if (ch === '&') {
      const prev = command.charAt(i - 1);
      // `2>&1`, `&>file` and `>&2` are redirections, not separators.
      if (prev === '>' || prev === '<' || next === '>') {
        current += ch;
      } else {
        flush();
      }
      i++;
      continue;
    }

    if (ch === '|' && level >= DEPTH_ORDER.pipelines) {
      flush();
      // `|&` pipes stderr as well; the `&` belongs to the operator.
      i += next === '&' ? 2 : 1;
      continue;
    }

    current += ch;
    i++;
  }
  flush();

  if (level < DEPTH_ORDER.substitutions) {
    return segments;
  }

  const result = [...segments];
  for (const body of nested) {
    result.push(...splitSegments(body, depth));
  }
  return result;
}

/**
 * Index of the `)` closing a substitution whose body starts at `start`.
 * Returns `command.length` when the substitution is unterminated.
 */
function findClosingParen(command: string, start: number): number {
  let depth = 1;
  let quote: '"' | "'" | null = null;
  for (let i = start; i < command.length; i++) {
    const ch = command.charAt(i);
    if (quote !== null) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return command.length;
}

// ---------------------------------------------------------------------------
// Program name extraction
// ---------------------------------------------------------------------------

/** Prefixes that run another program rather than being the program. */
const WRAPPERS = new Set<string>(['sudo', 'doas', 'env', 'nohup', 'time', 'command', 'exec', 'nice', 'builtin']);

/** Wrapper flags that consume the following token. */
const WRAPPER_FLAGS_WITH_ARG = new Set<string>(['-u', '-g', '-n']);

/**
 * Return the lowercase basename of the program a simple command runs,
 * skipping variable assignments and wrapper prefixes such as `sudo`.
 *
 * Returns null for an empty segment.
 */
export function programName(segment: string): string | null {
  const tokens = segment.trim().replace(/^[({]+\s*/, '').split(/\s+/).filter((t) => t !== '');
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i] ?? '';
    if (/^[A-Za-z_][A-Za-z0-9_]*=/.test(token)) {
      i++;
      continue;
    }
    if (WRAPPERS.has(token)) {
      i++;
      while (i < tokens.length && (tokens[i] ?? '').startsWith('-')) {
        i += WRAPPER_FLAGS_WITH_ARG.has(tokens[i] ?? '') ? 2 : 1;
      }
      continue;
    }
    const bare = token.replace(/^["']|["']$/g, '');
    const slash = bare.lastIndexOf('/');
    return (slash === -1 ? bare : bare.slice(slash + 1)).toLowerCase();
  }
  return null;
}
