/**
 * Plainsh Runtime Host — Marker-file Context Detector
 *
 * Implements the ContextDetector interface from @plainsh/core by listing one
 * directory (not recursively) and matching its entries against a table of
 * project markers. Each rule yields a tag with a confidence: a strong marker
 * (a manifest such as package.json or Cargo.toml) scores higher than a weak
 * one (a source file with the right extension).
 *
 * Read-only. Tags are returned most confident first; equal confidences keep
 * table order.
 */

import { readdirSync } from 'node:fs';
import { extname } from 'node:path';
import type { ContextDetector } from '@plainsh/core';
import { isNodeError } from '../state/state-io.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TagMatch {
  readonly tag: string;
  readonly confidence: number;
  /** The entries that produced the match. */
  readonly evidence: ReadonlyArray<string>;
}

export interface ContextReport {
  readonly cwd: string;
  readonly matches: ReadonlyArray<TagMatch>;
  /** Package manager implied by a lockfile, or null. */
  readonly packageManager: string | null;
}

interface Listing {
  /** Lowercased names of regular files. */
  readonly files: ReadonlyArray<string>;
  /** Lowercased names of directories. */
  readonly dirs: ReadonlyArray<string>;
}

interface MarkerRule {
  readonly tag: string;
  /** Exact (lowercase) file names; any one present is a strong match. */
  readonly files?: ReadonlyArray<string>;
  readonly strong?: number;
  /** Weak fallback, checked only when no strong marker is present. */
  readonly weak?: { readonly confidence: number; readonly test: (listing: Listing) => ReadonlyArray<string> };
}

// ---------------------------------------------------------------------------
// Marker table
// ---------------------------------------------------------------------------

const withExtension =
  (...extensions: string[]) =>
  (listing: Listing): ReadonlyArray<string> =>
    listing.files.filter((f) => extensions.includes(extname(f)));

const SCRIPT_EXTENSIONS = ['.sh', '.bash', '.zsh', '.fish', '.py', '.pl', '.rb'];

const MARKERS: ReadonlyArray<MarkerRule> = [
  {
    tag: 'python',
    files: [
      'requirements.txt',
      'pyproject.toml',
      'setup.py',
      'setup.cfg',
      'pipfile',
      'poetry.lock',
      'conda.yml',
      'environment.yml',
    ],
    strong: 0.9,
    weak: { confidence: 0.6, test: withExtension('.py') },
  },
  {
    tag: 'nodejs',
    files: ['package.json', 'yarn.lock', 'package-lock.json', 'pnpm-lock.yaml'],
    strong: 0.9,
    weak: { confidence: 0.7, test: (l) => l.dirs.filter((d) => d === 'node_modules') },
  },
  {
    tag: 'rust',
    files: ['cargo.toml'],
    strong: 0.95,
    weak: { confidence: 0.6, test: withExtension('.rs') },
  },
  {
    tag: 'go',
    files: ['go.mod', 'go.sum'],
    strong: 0.9,
    weak: { confidence: 0.6, test: withExtension('.go') },
  },
  {
    tag: 'java',
    files: ['pom.xml', 'build.gradle', 'build.gradle.kts'],
    strong: 0.9,
    weak: { confidence: 0.6, test: withExtension('.java') },
  },
  {
    tag: 'cpp',
    files: ['cmake.txt', 'makefile', 'cmakelists.txt'],
    strong: 0.8,
    weak: { confidence: 0.6, test: withExtension('.cpp', '.cc', '.cxx', '.hpp', '.h') },
  },
  { tag: 'web', files: ['index.html', 'webpack.config.js', '.babelrc', 'vite.config.js'], strong: 0.8 },
  {
    tag: 'docker',
    files: ['dockerfile', 'docker-compose.yml', 'docker-compose.yaml', '.dockerignore'],
    strong: 0.9,
  },
  {
    tag: 'git',
    weak: { confidence: 0.7, test: (l) => [...l.files, ...l.dirs].filter((n) => n === '.git') },
  },
  { tag: 'linux_config', files: ['.bashrc', '.zshrc', '.vimrc', '.tmux.conf', 'ansible.cfg'], strong: 0.7 },
  {
    tag: 'script',
    weak: {
      confidence: 0.6,
      test: (l) => {
        const scripts = withExtension(...SCRIPT_EXTENSIONS)(l);
        return scripts.length > 2 ? scripts : [];
      },
    },
  },
];

const LOCKFILES: ReadonlyArray<readonly [string, string]> = [
  ['pnpm-lock.yaml', 'pnpm'],
  ['yarn.lock', 'yarn'],
  ['package-lock.json', 'npm'],
  ['poetry.lock', 'poetry'],
  ['pipfile.lock', 'pipenv'],
  ['cargo.lock', 'cargo'],
  ['go.sum', 'go'],
];

// ---------------------------------------------------------------------------
// MarkerContextDetector
// ---------------------------------------------------------------------------

export class MarkerContextDetector implements ContextDetector {
  detect(cwd: string): ReadonlyArray<string> {
    return this.report(cwd).matches.map((m) => m.tag);
  }

  /** Tags with confidences and evidence. A directory that cannot be listed has no tags. */
  report(cwd: string): ContextReport {
    const listing = list(cwd);
    if (listing === null) {
      return { cwd, matches: [], packageManager: null };
    }

    const matches: TagMatch[] = [];
    for (const rule of MARKERS) {
      const strong = (rule.files ?? []).filter((f) => listing.files.includes(f));
      if (rule.strong !== undefined && strong.length > 0) {
        matches.push({ tag: rule.tag, confidence: rule.strong, evidence: strong });
        continue;
      }
      if (rule.weak === undefined) continue;
      const weak = rule.weak.test(listing);
      if (weak.length > 0) {
        matches.push({ tag: rule.tag, confidence: rule.weak.confidence, evidence: weak });
      }
    }
    // Array.prototype.sort is stable: ties keep table order.
    matches.sort((a, b) => b.confidence - a.confidence);

    const lock = LOCKFILES.find(([file]) => listing.files.includes(file));
    return { cwd, matches, packageManager: lock === undefined ? null : lock[1] };
  }
}

function list(cwd: string): Listing | null {
  try {
    const entries = readdirSync(cwd, { withFileTypes: true });
    return {
      files: entries.filter((e) => e.isFile()).map((e) => e.name.toLowerCase()),
      dirs: entries.filter((e) => e.isDirectory()).map((e) => e.name.toLowerCase()),
    };
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') || isNodeError(err, 'EACCES') || isNodeError(err, 'ENOTDIR')) {
      return null;
    }
    throw err;
  }
}
