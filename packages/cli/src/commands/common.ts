/**
 * Shared helpers for commander actions: runtime construction from the global
 * --home option, error reporting, and option parsing.
 */

import type { Command } from 'commander';
import { ConfigError, errorMessage } from '@plainsh/core';
import { buildRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';

/** Build the runtime using the program-level --home option. */
export function runtimeFor(command: Command): Runtime {
  const { home } = command.optsWithGlobals<{ home?: string }>();
  return buildRuntime({ home });
}

/**
 * Report a failed command on stderr and set a non-zero exit code.
 * ConfigError issues are listed one per line.
 */
export function fail(scope: string, err: unknown): void {
  process.stderr.write(`[plainsh ${scope}] ${errorMessage(err)}\n`);
  if (err instanceof ConfigError) {
    for (const issue of err.issues) {
      process.stderr.write(`  ${issue}\n`);
    }
  }
  process.exitCode = 1;
}

/** Parse a positive integer option value. */
export function positiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** Parse a date or timestamp option into the ISO form history entries use. */
export function isoTimestamp(name: string, raw: string): string {
  const time = Date.parse(raw);
  if (Number.isNaN(time)) {
    throw new Error(`${name} must be an ISO 8601 date or timestamp, got "${raw}"`);
  }
  return new Date(time).toISOString();
}

export function printJson(value: unknown): void {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
}
