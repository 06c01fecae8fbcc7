/**
 * Plainsh Runtime Host — Suggestion Catalog Tests
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { IOError } from '@plainsh/core';
import { loadSeedCatalog } from '../src/suggestions/catalog.js';

function file(content: string): string {
  const path = join(mkdtempSync(join(tmpdir(), 'plainsh-cat-')), 'catalog.json');
  writeFileSync(path, content);
  return path;
}

describe('loadSeedCatalog', () => {
  it('loads the bundled catalog with seeds for every context tag', () => {
    const catalog = loadSeedCatalog();
    for (const tag of ['python', 'nodejs', 'rust', 'go', 'git', 'docker', 'unknown']) {
      expect(catalog[tag]?.length ?? 0).toBeGreaterThan(0);
    }
    expect(catalog['python']?.[0]).toEqual({
      command: 'pip install -r requirements.txt',
      keywords: ['install', 'dependencies', 'requirements', 'packages'],
    });
  });

  it('loads an operator catalog', () => {
    const path = file(JSON.stringify({ git: [{ command: 'git status', keywords: ['status'] }] }));
    expect(loadSeedCatalog(path)).toEqual({ git: [{ command: 'git status', keywords: ['status'] }] });
  });

  it('throws IOError for a missing file', () => {
    expect(() => loadSeedCatalog(join(tmpdir(), 'plainsh-no-such-catalog.json'))).toThrow(IOError);
  });

  it('names the first malformed entry', () => {
    const path = file(JSON.stringify({ git: [{ command: '', keywords: [] }] }));
    expect(() => loadSeedCatalog(path)).toThrow(`Suggestion catalog ${path} is malformed at git.0.command:`);
  });
});
