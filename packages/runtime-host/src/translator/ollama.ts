/**
 * Plainsh Runtime Host — Ollama Translator
 *
 * Implements the Translator interface from @plainsh/core against a local
 * Ollama server:
 *
 *   POST <baseUrl>/api/generate   one non-streaming completion per request
 *   GET  <baseUrl>/api/tags       installed models (listing, connection check)
 *
 * Uses the global fetch, so the AbortSignal from the pipeline cancels the
 * HTTP request itself. Replies are validated with zod and reduced to a
 * single command line by cleanReply().
 */

import { z } from 'zod';
import { TranslationError, errorMessage } from '@plainsh/core';
import type { ContextSnapshot, Translation, Translator } from '@plainsh/core';

// ---------------------------------------------------------------------------
// Options and wire formats
// ---------------------------------------------------------------------------

export interface OllamaOptions {
  readonly baseUrl: string;
  readonly model: string;
  readonly temperature?: number | undefined;
  /** Upper bound on generated tokens (Ollama `num_predict`). */
  readonly maxTokens?: number | undefined;
}

const generateReplySchema = z.object({
  response: z.string(),
});

const tagsReplySchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

const errorReplySchema = z.object({
  error: z.string(),
});

export type ConnectionCheck =
  | { readonly ok: true; readonly models: ReadonlyArray<string> }
  | { readonly ok: false; readonly message: string };

const PROMPT_RULES = [
  'Reply with exactly one command for a POSIX shell and nothing else.',
  'Prefer portable tools (coreutils, findutils, grep, sed, awk, tar, git).',
  'When several commands would work, prefer the least destructive one.',
  'When the request is ambiguous, choose the safest reading.',
  'Do not explain the command and do not wrap it in Markdown.',
];

const PROMPT_EXAMPLES: ReadonlyArray<readonly [string, string]> = [
  ['list all files including hidden ones', 'ls -la'],
  ['find python files below here', "find . -name '*.py'"],
  ['how much disk space is free', 'df -h'],
  ['show running processes', 'ps aux'],
];

// ---------------------------------------------------------------------------
// OllamaTranslator
// ---------------------------------------------------------------------------

export class OllamaTranslator implements Translator {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly maxTokens: number | undefined;

  constructor(options: OllamaOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens;
  }

  async translate(text: string, context: ContextSnapshot, signal: AbortSignal): Promise<Translation> {
    const body = {
      model: this.model,
      prompt: buildPrompt(text, context),
      stream: false,
      options: {
        temperature: this.temperature,
        ...(this.maxTokens !== undefined ? { num_predict: this.maxTokens } : {}),
      },
    };

    const reply = await this.request('/api/generate', signal, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });

    const parsed = generateReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new TranslationError('Ollama reply has no response text', 'malformed');
    }
    const cleaned = cleanReply(parsed.data.response);
    if (cleaned.command === '') {
      throw new TranslationError('Ollama returned an empty command', 'malformed');
    }
    return cleaned;
  }

  /** Names of the models installed on the server. */
  async listModels(signal?: AbortSignal): Promise<ReadonlyArray<string>> {
    const reply = await this.request('/api/tags', signal ?? new AbortController().signal, { method: 'GET' });
    const parsed = tagsReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new TranslationError('Ollama model list is malformed', 'malformed');
    }
    return parsed.data.models.map((m) => m.name);
  }

  /** Whether the server answers within `timeoutMs`, and which models it has. */
  async checkConnection(timeoutMs: number): Promise<ConnectionCheck> {
    try {
      return { ok: true, models: await this.listModels(AbortSignal.timeout(timeoutMs)) };
    } catch (err) {
      return { ok: false, message: errorMessage(err) };
    }
  }

  private async request(path: string, signal: AbortSignal, init: RequestInit): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, { ...init, signal });
    } catch (err) {
      if (signal.aborted) {
        throw new TranslationError(`Request to Ollama was aborted`, 'timeout');
      }
      throw new TranslationError(`Cannot reach Ollama at ${this.baseUrl}: ${errorMessage(err)}`, 'unreachable');
    }

    const raw = await res.text();
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = undefined;
    }

    if (!res.ok) {
      const detail = errorReplySchema.safeParse(json);
      const reason = detail.success ? detail.data.error : raw.slice(0, 200).trim();
      throw new TranslationError(
        `Ollama returned HTTP ${res.status}${reason === '' ? '' : `: ${reason}`}`,
        'rejected',
      );
    }
    if (json === undefined) {
      throw new TranslationError('Ollama returned a reply that is not JSON', 'malformed');
    }
    return json;
  }
}

// ---------------------------------------------------------------------------
// Prompt and reply handling
// ---------------------------------------------------------------------------

export function buildPrompt(text: string, context: ContextSnapshot): string {
  const lines = [
    'You translate requests written in plain language into shell commands.',
    '',
    ...PROMPT_RULES.map((rule, i) => `${i + 1}. ${rule}`),
    '',
    'Examples:',
    ...PROMPT_EXAMPLES.map(([request, command]) => `"${request}" -> ${command}`),
    '',
    `Working directory: ${context.cwd}`,
  ];
  if (context.tags.length > 0) {
    lines.push(`Project type: ${context.tags.join(', ')}`);
  }
  lines.push('', `Request: ${text}`, 'Command:');
  return lines.join('\n');
}

/**
 * Reduce a model reply to one command line.
 *
 * - a fenced code block wins over surrounding prose, which becomes the explanation
 * - a leading `$ ` prompt and enclosing backticks are dropped
 * - lines continued with `\`, `&&`, `||` or `|` are joined; anything after
 *   the first complete command line is dropped
 */
export function cleanReply(reply: string): Translation {
  let text = reply.trim();
  let explanation: string | undefined;

  const fence = /```[^\n]*\n([\s\S]*?)```/.exec(text);
  if (fence !== null) {
    const prose = (text.slice(0, fence.index) + text.slice(fence.index + fence[0].length)).trim();
    explanation = prose === '' ? undefined : prose;
    text = (fence[1] ?? '').trim();
  }

  const lines = text
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l !== '' && !l.startsWith('#'));

  let command = '';
  for (const line of lines) {
    const piece = line.replace(/^\$\s+/, '');
    if (command === '') {
      command = piece;
    } else {
      command = `${command} ${piece}`;
    }
    if (command.endsWith('\\')) {
      command = command.slice(0, -1).trimEnd();
      continue;
    }
    if (/(?:&&|\|\||\|)$/.test(command)) continue;
    break;
  }

  const inline = /^`([^`]+)`$/.exec(command);
  if (inline !== null) command = inline[1] ?? command;

  return explanation === undefined ? { command: command.trim() } : { command: command.trim(), explanation };
}
