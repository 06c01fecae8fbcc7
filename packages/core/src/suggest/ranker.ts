/**
 * Plainsh Core — Suggestion Ranker
 *
 * Ranks candidate commands for an intent by combining a static seed catalog
 * (per context tag) with how often the operator successfully ran a command
 * under the same tags.
 *
 *   score = staticRelevance * weights.static + historyFrequency * weights.history
 *
 * - staticRelevance: fraction of intent words found among a seed's keywords
 * - historyFrequency: the command's success count divided by the largest
 *   count among the candidates
 *
 * Ties are broken by most recent use, then by first appearance (seeds in tag
 * order first, then history). Only candidates with a positive score are
 * returned. Runs out of band; never touches the pipeline.
 */

import type { HistoryFrequencySource } from '../adapters/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One catalog command and the intent words it answers to. */
export interface SeedCommand {
  readonly command: string;
  readonly keywords: ReadonlyArray<string>;
}

/** Seed commands keyed by context tag. */
export type SeedCatalog = Readonly<Record<string, ReadonlyArray<SeedCommand>>>;

export interface RankerWeights {
  readonly static: number;
  readonly history: number;
}

export const DEFAULT_RANKER_WEIGHTS: RankerWeights = { static: 0.6, history: 0.4 };

export interface RankedSuggestion {
  readonly command: string;
  readonly score: number;
  readonly static_relevance: number;
  readonly history_frequency: number;
  /** ISO 8601 timestamp of the most recent successful use, or null. */
  readonly last_used: string | null;
}

interface Candidate {
  readonly command: string;
  readonly order: number;
  staticRelevance: number;
  count: number;
  lastUsed: string | null;
}

// ---------------------------------------------------------------------------
// SuggestionRanker
// ---------------------------------------------------------------------------

export class SuggestionRanker {
  constructor(
    private readonly catalog: SeedCatalog,
    private readonly history: HistoryFrequencySource,
    private readonly weights: RankerWeights = DEFAULT_RANKER_WEIGHTS,
  ) {}

  /** At most `topN` commands, best first. Empty when nothing matches. */
  rank(intentText: string, contextTags: ReadonlyArray<string>, topN: number): ReadonlyArray<string> {
    return this.rankDetailed(intentText, contextTags, topN).map((s) => s.command);
  }

  /** As rank(), with the score components of each suggestion. */
  rankDetailed(
    intentText: string,
    contextTags: ReadonlyArray<string>,
    topN: number,
  ): ReadonlyArray<RankedSuggestion> {
    if (topN <= 0) return [];
    const words = intentWords(intentText);
    if (words.length === 0) return [];

    const candidates = new Map<string, Candidate>();
    const add = (command: string): Candidate => {
      const existing = candidates.get(command);
      if (existing !== undefined) return existing;
      const created: Candidate = { command, order: candidates.size, staticRelevance: 0, count: 0, lastUsed: null };
      candidates.set(command, created);
      return created;
    };

    for (const tag of contextTags) {
      for (const seed of this.catalog[tag] ?? []) {
        const candidate = add(seed.command);
        candidate.staticRelevance = Math.max(candidate.staticRelevance, staticRelevance(words, seed.keywords));
      }
    }

    for (const freq of this.history.frequencies(contextTags)) {
      const text = freq.command.toLowerCase();
      const known = candidates.get(freq.command);
      if (known === undefined && !words.some((w) => text.includes(w))) continue;
      const candidate = known ?? add(freq.command);
      candidate.count += freq.count;
      if (candidate.lastUsed === null || freq.last_used > candidate.lastUsed) {
        candidate.lastUsed = freq.last_used;
      }
    }

    const maxCount = Math.max(0, ...[...candidates.values()].map((c) => c.count));

    return [...candidates.values()]
      .map((c) => {
        const historyFrequency = maxCount === 0 ? 0 : c.count / maxCount;
        return {
          candidate: c,
          suggestion: {
            command: c.command,
            score: c.staticRelevance * this.weights.static + historyFrequency * this.weights.history,
            static_relevance: c.staticRelevance,
            history_frequency: historyFrequency,
            last_used: c.lastUsed,
          },
        };
      })
      .filter(({ suggestion }) => suggestion.score > 0)
      .sort((a, b) => {
        if (b.suggestion.score !== a.suggestion.score) return b.suggestion.score - a.suggestion.score;
        const recency = compareRecency(a.candidate.lastUsed, b.candidate.lastUsed);
        return recency !== 0 ? recency : a.candidate.order - b.candidate.order;
      })
      .slice(0, topN)
      .map(({ suggestion }) => suggestion);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Lowercase words longer than two characters, first occurrence order. */
export function intentWords(text: string): string[] {
  const words = text
    .toLowerCase()
    .split(/[^a-z0-9_.-]+/)
    .map((w) => w.replace(/^[.-]+|[.-]+$/g, ''))
    .filter((w) => w.length > 2);
  return [...new Set(words)];
}

/** Fraction of `words` that start with one of `keywords`. */
function staticRelevance(words: ReadonlyArray<string>, keywords: ReadonlyArray<string>): number {
  const keys = keywords.map((k) => k.toLowerCase());
  const hits = words.filter((w) => keys.some((k) => w === k || (k.length > 2 && w.startsWith(k)))).length;
  return hits / words.length;
}

/** More recent first; never-used last. */
function compareRecency(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a > b ? -1 : 1;
}
