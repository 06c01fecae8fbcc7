/**
 * Plainsh Runtime Host — Configuration
 *
 * Effective configuration = defaults ← `<home>/config.json` ← environment.
 *
 * - config.json is optional; every key has a default.
 * - Environment overrides are named PLAINSH_<SECTION>__<KEY>, e.g.
 *   PLAINSH_LLM__MODEL or PLAINSH_EXECUTION__TIMEOUT_MS. Values are coerced
 *   to the type of the key they override.
 * - The merged value is validated with zod; any problem is a ConfigError
 *   naming every offending key.
 */

import { z } from 'zod';
import { ConfigError, RiskTier, errorMessage } from '@plainsh/core';
import type { StateIO } from '../state/state-io.js';

export const CONFIG_FILE = 'config.json';

const ENV_OVERRIDE = /^PLAINSH_([A-Z0-9]+)__([A-Z0-9_]+)$/;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const llmSchema = z
  .object({
    base_url: z.string().url().default('http://localhost:11434'),
    model: z.string().min(1).default('llama3:latest'),
    temperature: z.number().min(0).max(2).default(0.1),
    max_tokens: z.number().int().positive().nullable().default(null),
    timeout_ms: z.number().int().positive().default(30_000),
  })
  .strict();

const executionSchema = z
  .object({
    shell: z.string().min(1).default('/bin/sh'),
    timeout_ms: z.number().int().positive().default(60_000),
    confirm_safe: z.boolean().default(true),
    double_confirmation_from: z.nativeEnum(RiskTier).default(RiskTier.Critical),
  })
  .strict();

const sessionSchema = z
  .object({
    mode: z.enum(['auto', 'natural', 'direct']).default('auto'),
    confirmation_timeout_ms: z.number().int().positive().default(120_000),
  })
  .strict();

const loggingSchema = z
  .object({
    /** Write pipeline lifecycle events to logs/sessions.jsonl. */
    lifecycle_events: z.boolean().default(true),
  })
  .strict();

const suggestSchema = z
  .object({
    top_n: z.number().int().positive().default(5),
    static_weight: z.number().min(0).default(0.6),
    history_weight: z.number().min(0).default(0.4),
  })
  .strict();

export const configSchema = z
  .object({
    llm: llmSchema.default({}),
    execution: executionSchema.default({}),
    session: sessionSchema.default({}),
    logging: loggingSchema.default({}),
    suggest: suggestSchema.default({}),
  })
  .strict();

export type PlainshConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: PlainshConfig = configSchema.parse({});

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadedConfig {
  readonly config: PlainshConfig;
  /** Where config.json is (or would be). */
  readonly path: string;
  readonly fileFound: boolean;
  /** Names of the environment variables that were applied. */
  readonly overrides: ReadonlyArray<string>;
}

export function loadConfig(stateIO: StateIO, env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const path = stateIO.describeJson(CONFIG_FILE);

  let fromFile: unknown;
  try {
    fromFile = stateIO.readJson(CONFIG_FILE);
  } catch (err) {
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`, path);
  }
  const merged: Record<string, unknown> = {};
  if (fromFile !== undefined) {
    if (!isRecord(fromFile)) {
      throw new ConfigError(`${path} must contain a JSON object`, path);
    }
    Object.assign(merged, fromFile);
  }

  const overrides: string[] = [];
  const issues: string[] = [];

  for (const name of Object.keys(env).sort()) {
    const match = ENV_OVERRIDE.exec(name);
    const value = env[name];
    if (match === null || value === undefined) continue;

    const section = (match[1] ?? '').toLowerCase();
    const key = (match[2] ?? '').toLowerCase();
    const defaults = sectionDefaults(section);
    if (defaults === undefined || !(key in defaults)) {
      issues.push(`${name}: no configuration key ${section}.${key}`);
      continue;
    }

    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), [key]: coerce(value, defaults[key]) };
    overrides.push(name);
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration override`, path, issues);
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration in ${path}`,
      path,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  return { config: parsed.data, path, fileFound: fromFile !== undefined, overrides };
}

/**
 * Write the default configuration to config.json.
 *
 * Returns false without writing when the file exists and `force` is not set.
 */
export function initConfig(stateIO: StateIO, force = false): boolean {
  let existing: unknown;
  try {
    existing = stateIO.readJson(CONFIG_FILE);
  } catch {
    // An unparsable file counts as present.
    existing = null;
  }
  if (existing !== undefined && !force) return false;
  stateIO.writeJson(CONFIG_FILE, DEFAULT_CONFIG);
  return true;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionDefaults(section: string): Record<string, unknown> | undefined {
  const defaults: Record<string, unknown> = DEFAULT_CONFIG;
  const value = defaults[section];
  return isRecord(value) ? value : undefined;
}

/** Coerce an environment string to the type of the default it overrides. */
function coerce(raw: string, template: unknown): unknown {
  const value = raw.trim();
  if (typeof template === 'boolean') {
    if (/^(?:true|1|yes|on)$/i.test(value)) return true;
    if (/^(?:false|0|no|off)$/i.test(value)) return false;
    return value;
  }
  if (typeof template === 'number' || template === null) {
    if (template === null && /^(?:|null)$/i.test(value)) return null;
    const n = Number(value);
    return value !== '' && Number.isFinite(n) ? n : value;
  }
  return value;
}
