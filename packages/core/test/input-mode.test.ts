/**
 * Plainsh Core — Input Mode Detection Tests
 */

import { describe, it, expect } from 'vitest';
import { detectInputMode } from '../src/pipeline/input-mode.js';

describe('detectInputMode', () => {
  it.each([
    ['', 'direct'],
    ['ls -la', 'direct'],
    ['git log --oneline', 'direct'],
    ['./build.sh --release', 'direct'],
    ['wc -l < notes.txt', 'direct'],
    ['htop', 'direct'],
    ['please list all files', 'natural'],
    ['show me the biggest files here', 'natural'],
    ['which files are large?', 'natural'],
  ] as const)('%j is %s', (input, mode) => {
    expect(detectInputMode(input)).toBe(mode);
  });

  it('uses the fallback for ambiguous prose', () => {
    expect(detectInputMode('which files are large?', 'direct')).toBe('direct');
  });
});
