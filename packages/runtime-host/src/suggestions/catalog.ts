/**
 * Plainsh Runtime Host — Suggestion Seed Catalog
 *
 * Loads the per-context seed commands consumed by the SuggestionRanker from
 * a JSON file. The bundled catalog ships in `data/suggestions.json`; an
 * operator may point at another file with the same shape.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { IOError, errorMessage } from '@plainsh/core';
import type { SeedCatalog } from '@plainsh/core';

const catalogSchema = z.record(
  z.array(
    z.object({
      command: z.string().min(1),
      keywords: z.array(z.string().min(1)),
    }),
  ),
);

export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('../../data/suggestions.json', import.meta.url));

/** Read and validate a catalog. Throws IOError when the file is missing or malformed. */
export function loadSeedCatalog(path: string = BUNDLED_CATALOG_PATH): SeedCatalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new IOError(`Cannot read suggestion catalog ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
  const checked = catalogSchema.safeParse(parsed);
  if (!checked.success) {
    const first = checked.error.issues[0];
    const where = first === undefined ? '' : ` at ${first.path.join('.')}: ${first.message}`;
    throw new IOError(`Suggestion catalog ${path} is malformed${where}`, path);
  }
  return checked.data;
}
