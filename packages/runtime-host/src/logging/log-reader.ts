/**
 * Plainsh Runtime Host — LogReader
 *
 * Pure function for reading JSONL log files with dedupe-on-read. Accepts raw
 * JSONL text and a record schema, returns the validated records and
 * statistics about the file.
 *
 * Guarantees:
 *   - lines that are not JSON or fail the schema are dropped (parseErrors)
 *   - records are deduplicated by key; first-seen wins (duplicates)
 *   - content not ending with '\n' has its last line dropped: a reader never
 *     observes a record whose write was interrupted (partialTrailingLine)
 *   - more than one timestamp regression in file order is flagged (outOfOrder)
 *   - output is sorted by (time asc, key asc)
 *   - empty input returns an empty result with zero stats
 *
 * No I/O. Callers obtain raw content via StateIO.readLogRaw().
 */

import type { z } from 'zod';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** How to validate and order the records of one log file. */
export interface LogFormat<T> {
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Deduplication key. */
  readonly key: (record: T) => string;
  /** ISO 8601 timestamp used for ordering. */
  readonly time: (record: T) => string;
}

/** All counts reflect the raw file content before deduplication and sorting. */
export interface LogReadStats {
  /** Non-empty complete lines processed. */
  totalLines: number;
  /** Records included in the output (after dedup). */
  parsedEvents: number;
  /** Records dropped because their key was already seen. */
  duplicates: number;
  /** Lines dropped as invalid JSON or failing the schema. */
  parseErrors: number;
  /** The content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
  /** More than one timestamp regression in file order. A single one is clock skew. */
  outOfOrder: boolean;
}

export interface LogReadResult<T> {
  /** Deduplicated, time-sorted records. */
  events: ReadonlyArray<T>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readLog<T>(rawContent: string, format: LogFormat<T>): LogReadResult<T> {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  // Either the incomplete last line or the empty element after the final '\n'.
  rawLines.pop();
  const lineList = rawLines.filter((l) => l.trim().length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const ordered: T[] = [];

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const checked = format.schema.safeParse(parsed);
    if (!checked.success) {
      parseErrors++;
      continue;
    }

    const key = format.key(checked.data);
    if (seen.has(key)) {
      duplicates++;
      continue;
    }
    seen.add(key);
    ordered.push(checked.data);
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const record of ordered) {
    const current = format.time(record);
    if (previous !== undefined && current < previous) regressions++;
    previous = current;
  }

  const sorted = [...ordered].sort((a, b) => {
    const ta = format.time(a);
    const tb = format.time(b);
    if (ta !== tb) return ta < tb ? -1 : 1;
    const ka = format.key(a);
    const kb = format.key(b);
    if (ka === kb) return 0;
    return ka < kb ? -1 : 1;
  });

  return {
    events: sorted,
    stats: {
      totalLines: lineList.length,
      parsedEvents: ordered.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}
