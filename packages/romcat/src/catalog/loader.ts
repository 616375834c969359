/**
 * Reference catalog loader
 * Reads `<catalogDirectory>/<system>.csv` into an ordered alternate -> canonical table.
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'csv-parse/sync';

import { ConfigurationError, errorMessage } from '../shared/errors.js';
import type { AliasMap, Catalog, CatalogEntry, MalformedRow } from '../shared/types.js';
import { loadAliases } from './aliases.js';

export interface CatalogOptions {
  catalogDirectory: string;
  system: string;
  aliasFile: string;
  columns: { alternate: string; canonical: string };
}

export interface LoadedCatalog {
  catalog: Catalog;
  malformed: MalformedRow[];
}

export function catalogPath(catalogDirectory: string, system: string): string {
  return path.join(catalogDirectory, `${system}.csv`);
}

function findColumn(header: string[], name: string): number {
  const wanted = name.trim().toLowerCase();
  return header.findIndex(h => h.trim().toLowerCase() === wanted);
}

/** Parse one physical line as a CSV record; throws on a broken quote. */
function parseLine(text: string): string[] {
  const records: unknown = parse(text, {
    relax_column_count: true,
    relax_quotes: true,
  });
  if (!Array.isArray(records)) return [];
  const first: unknown = records[0];
  return Array.isArray(first)
    ? first.map(cell => (typeof cell === 'string' ? cell : String(cell ?? '')))
    : [];
}

/**
 * Parse CSV text into catalog entries.
 * Catalog rows are one line each, so every line is parsed on its own: a
 * broken row (bad quoting, missing value) is reported in `malformed` with
 * its 1-based file line and skipped. Blank lines are ignored, also before
 * the header. A repeated alternate name keeps its first position but takes
 * the later canonical name.
 */
export function parseCatalog(
  content: string,
  columns: CatalogOptions['columns'],
  source = '<inline>'
): { entries: CatalogEntry[]; malformed: MalformedRow[] } {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);

  const headerAt = lines.findIndex(l => l.trim() !== '');
  if (headerAt < 0) {
    throw new ConfigurationError(`Catalog ${source} is empty (no header row)`);
  }

  let header: string[];
  try {
    header = parseLine(lines[headerAt]);
  } catch (err) {
    throw new ConfigurationError(`Catalog ${source} has an unreadable header: ${errorMessage(err)}`, { cause: err });
  }

  const altCol = findColumn(header, columns.alternate);
  const canCol = findColumn(header, columns.canonical);
  if (altCol < 0 || canCol < 0) {
    throw new ConfigurationError(
      `Catalog ${source} needs columns "${columns.alternate}" and "${columns.canonical}", found: ${header.join(', ')}`
    );
  }

  const byAlternate = new Map<string, string>();
  const malformed: MalformedRow[] = [];

  for (let i = headerAt + 1; i < lines.length; i++) {
    const line = i + 1;
    if (lines[i].trim() === '') continue;

    let row: string[];
    try {
      row = parseLine(lines[i]);
    } catch (err) {
      malformed.push({ line, reason: `invalid CSV (${errorMessage(err)})` });
      continue;
    }
    if (row.every(cell => cell.trim() === '')) continue;

    const alternate = (row[altCol] ?? '').trim();
    const canonical = (row[canCol] ?? '').trim();
    if (!alternate || !canonical) {
      malformed.push({
        line,
        reason: !alternate && !canonical
          ? 'missing both names'
          : !alternate ? `missing "${columns.alternate}"` : `missing "${columns.canonical}"`,
      });
      continue;
    }
    byAlternate.set(alternate, canonical);
  }

  const entries = [...byAlternate].map(([alternateName, canonicalName]) => ({ alternateName, canonicalName }));
  return { entries, malformed };
}

/**
 * Load the catalog for one system. Missing directory/file or unusable
 * header is fatal; malformed rows are returned for the caller to log.
 */
export function loadCatalog(opts: CatalogOptions): LoadedCatalog {
  if (!fs.existsSync(opts.catalogDirectory) || !fs.statSync(opts.catalogDirectory).isDirectory()) {
    throw new ConfigurationError(`Catalog directory not found: ${opts.catalogDirectory}`);
  }

  const sourcePath = catalogPath(opts.catalogDirectory, opts.system);
  if (!fs.existsSync(sourcePath)) {
    throw new ConfigurationError(`Catalog not found for system "${opts.system}": ${sourcePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(sourcePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read catalog ${sourcePath}: ${errorMessage(err)}`, { cause: err });
  }

  const { entries, malformed } = parseCatalog(content, opts.columns, sourcePath);
  const aliases: AliasMap = loadAliases(opts.catalogDirectory, opts.aliasFile);

  return {
    catalog: { system: opts.system, sourcePath, entries, aliases },
    malformed,
  };
}

/** Build an in-memory catalog from plain pairs (tests, scripted use). */
export function catalogFromPairs(
  pairs: Record<string, string> | Array<[string, string]>,
  opts: { system?: string; aliases?: AliasMap } = {}
): Catalog {
  const list = Array.isArray(pairs) ? pairs : Object.entries(pairs);
  const byAlternate = new Map<string, string>();
  for (const [alternate, canonical] of list) byAlternate.set(alternate, canonical);
  return {
    system: opts.system ?? 'inline',
    sourcePath: '<inline>',
    entries: [...byAlternate].map(([alternateName, canonicalName]) => ({ alternateName, canonicalName })),
    aliases: opts.aliases ?? new Map(),
  };
}
