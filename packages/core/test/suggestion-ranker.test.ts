/**
 * Plainsh Core — Suggestion Ranker Tests
 *
 * Scoring combines the seed catalog with history frequencies. The history
 * source is an in-process fake returning fixed frequencies.
 */

import { describe, it, expect } from 'vitest';
import { SuggestionRanker, intentWords } from '../src/suggest/ranker.js';
import type { SeedCatalog } from '../src/suggest/ranker.js';
import type { HistoryFrequencySource } from '../src/adapters/index.js';
import type { CommandFrequency } from '../src/types/history.js';

const CATALOG: SeedCatalog = {
  git: [
    { command: 'git status', keywords: ['status', 'changes'] },
    { command: 'git log --oneline -10', keywords: ['log', 'history'] },
  ],
  nodejs: [
    { command: 'npm test', keywords: ['test', 'run'] },
    { command: 'npm install', keywords: ['install', 'dependency', 'package'] },
  ],
};

class FixedFrequencies implements HistoryFrequencySource {
  readonly requested: Array<ReadonlyArray<string>> = [];
  constructor(private readonly rows: CommandFrequency[] = []) {}
  frequencies(contextTags: ReadonlyArray<string>): ReadonlyArray<CommandFrequency> {
    this.requested.push(contextTags);
    return this.rows;
  }
}

describe('SuggestionRanker: seeds', () => {
  it('ranks seeds by the fraction of intent words they answer', () => {
    const ranker = new SuggestionRanker(CATALOG, new FixedFrequencies());
    expect(ranker.rank('show status', ['git'], 5)).toEqual(['git status']);
  });

  it('only uses seeds of the given context tags', () => {
    const ranker = new SuggestionRanker(CATALOG, new FixedFrequencies());
    expect(ranker.rank('install a package', ['git'], 5)).toEqual([]);
    expect(ranker.rank('install a package', ['git', 'nodejs'], 5)).toEqual(['npm install']);
  });
});

describe('SuggestionRanker: history', () => {
  const history = new FixedFrequencies([
    { command: 'npm run test:unit', count: 4, last_used: '2026-01-03T00:00:00.000Z' },
    { command: 'npm test', count: 2, last_used: '2026-01-02T00:00:00.000Z' },
  ]);

  it('combines static relevance and history frequency', () => {
    const ranker = new SuggestionRanker(CATALOG, history);
    const ranked = ranker.rankDetailed('run tests', ['nodejs'], 5);

    expect(ranked.map((s) => s.command)).toEqual(['npm test', 'npm run test:unit']);
    expect(ranked[0]?.static_relevance).toBe(1);
    expect(ranked[0]?.history_frequency).toBe(0.5);
    expect(ranked[0]?.score).toBeCloseTo(0.8);
    expect(ranked[1]?.score).toBeCloseTo(0.4);
    expect(history.requested.at(-1)).toEqual(['nodejs']);
  });

  it('honours custom weights', () => {
    const ranker = new SuggestionRanker(CATALOG, history, { static: 0, history: 1 });
    expect(ranker.rank('run tests', ['nodejs'], 5)).toEqual(['npm run test:unit', 'npm test']);
  });

  it('returns at most topN suggestions', () => {
    const ranker = new SuggestionRanker(CATALOG, history);
    expect(ranker.rank('run tests', ['nodejs'], 1)).toEqual(['npm test']);
    expect(ranker.rank('run tests', ['nodejs'], 0)).toEqual([]);
  });

  it('breaks score ties by most recent use', () => {
    const ranker = new SuggestionRanker(
      CATALOG,
      new FixedFrequencies([
        { command: 'git push origin main', count: 1, last_used: '2026-01-01T00:00:00.000Z' },
        { command: 'git push --tags', count: 1, last_used: '2026-01-05T00:00:00.000Z' },
      ]),
    );
    expect(ranker.rank('push', ['git'], 5)).toEqual(['git push --tags', 'git push origin main']);
  });

  it('ignores history commands unrelated to the intent', () => {
    const ranker = new SuggestionRanker(
      CATALOG,
      new FixedFrequencies([{ command: 'make build', count: 9, last_used: '2026-01-01T00:00:00.000Z' }]),
    );
    expect(ranker.rank('show status', ['git'], 5)).toEqual(['git status']);
  });
});

describe('SuggestionRanker: empty results', () => {
  it('returns an empty list when nothing matches', () => {
    const ranker = new SuggestionRanker(CATALOG, new FixedFrequencies());
    expect(ranker.rank('deploy', ['rust'], 5)).toEqual([]);
  });

  it('returns an empty list for an intent without usable words', () => {
    const ranker = new SuggestionRanker(CATALOG, new FixedFrequencies());
    expect(ranker.rank('ls', ['git'], 5)).toEqual([]);
  });
});

describe('intentWords', () => {
  it('keeps lowercase words longer than two characters, once', () => {
    expect(intentWords('Run the TESTS, run them now')).toEqual(['run', 'the', 'tests', 'them', 'now']);
  });
});
