/**
 * gamelist.xml emitter
 * One <game> per accepted item: <path> points back at the original file so
 * scrapers run afterwards can pair existing media with it; <name> is the
 * canonical title.
 */

import fs from 'node:fs';
import path from 'node:path';

import { XMLBuilder } from 'fast-xml-parser';

import { ConfigurationError } from '../shared/errors.js';
import type { MatchResult, OutputRecord } from '../shared/types.js';

const XML_DECLARATION = '<?xml version="1.0"?>';

const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  processEntities: true,
  suppressEmptyNode: false,
});

/** "./rom.zip" for bare filenames; explicit relative or absolute paths kept. */
export function referencePath(item: string): string {
  if (item.startsWith('./') || item.startsWith('../') || path.isAbsolute(item)) return item;
  return `./${item}`;
}

/** Accepted results (auto + manual) in input order; skipped ones are dropped. */
export function toOutputRecords(results: readonly MatchResult[]): OutputRecord[] {
  const records: OutputRecord[] = [];
  for (const r of results) {
    if (!r.accepted || !r.canonicalName) continue;
    records.push({ path: referencePath(r.item), name: r.canonicalName });
  }
  return records;
}

/** Serialise records; identical input always yields identical text. */
export function buildGamelist(records: readonly OutputRecord[]): string {
  const gameList = records.length === 0
    ? ''
    : { game: records.map(r => ({ path: r.path, name: r.name })) };
  return `${XML_DECLARATION}\n${builder.build({ gameList })}`;
}

/**
 * Write the document to `outputPath` via temp file + rename.
 * An existing file is only replaced when `overwrite` is set.
 */
export function writeGamelist(outputPath: string, xml: string, opts: { overwrite?: boolean } = {}): string {
  if (fs.existsSync(outputPath) && !opts.overwrite) {
    throw new ConfigurationError(`Output already exists: ${outputPath} (use --force to overwrite)`);
  }
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const tmpPath = `${outputPath}.tmp`;
  fs.writeFileSync(tmpPath, xml, 'utf-8');
  fs.renameSync(tmpPath, outputPath);
  return outputPath;
}
