/**
 * Alias file loader.
 * Optional JSON file beside the catalogs mapping local nicknames and
 * alternate spellings onto one default title.
 */

import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import { ConfigurationError, errorMessage } from '../shared/errors.js';
import type { AliasMap } from '../shared/types.js';
import { normalizeTitle } from '../matching/normalize.js';

const aliasEntrySchema = z.object({
  default: z.string().optional(),
  alias: z.array(z.string()).optional(),
  others: z.array(z.string()).optional(),
  'alias-en': z.array(z.string()).optional(),
});

const aliasFileSchema = z.record(z.string(), aliasEntrySchema);

export type AliasFile = z.infer<typeof aliasFileSchema>;

function aliasKey(s: string): string {
  return normalizeTitle(s).toLowerCase();
}

/** Build alias -> default lookup. Entries without a default are ignored. */
export function buildAliasMap(data: AliasFile): AliasMap {
  const map = new Map<string, string>();
  for (const entry of Object.values(data)) {
    const canonical = entry.default?.trim();
    if (!canonical) continue;

    map.set(aliasKey(canonical), canonical);
    const names = [...(entry.alias ?? []), ...(entry.others ?? []), ...(entry['alias-en'] ?? [])];
    for (const name of names) {
      const key = aliasKey(name);
      if (key) map.set(key, canonical);
    }
  }
  return map;
}

/** Load `<catalogDirectory>/<aliasFile>`; a missing file means no aliases. */
export function loadAliases(catalogDirectory: string, aliasFile: string): AliasMap {
  const filePath = path.join(catalogDirectory, aliasFile);
  if (!fs.existsSync(filePath)) return new Map();

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read alias file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = aliasFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid shape';
    throw new ConfigurationError(`Alias file ${filePath} is malformed (${where})`);
  }
  return buildAliasMap(parsed.data);
}
