/**
 * Input item parsing.
 * Accepts one filename per line, or `ls`-style column output where
 * names are separated by two or more spaces.
 */

import fs from 'node:fs';
import path from 'node:path';

export function parseListing(text: string): string[] {
  const out: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    out.push(...line.split(/\s{2,}/).filter(Boolean));
  }
  return out;
}

/**
 * Reduce a filename to its matching query: no directory, no final extension.
 * "roms/最终幻想7.zip" -> "最终幻想7", ".hidden" -> ".hidden"
 */
export function queryFromFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  const ext = path.extname(base);
  const stem = ext ? base.slice(0, -ext.length) : base;
  return stem || base;
}

/** Read the whole listing from a file, or from stdin when `source` is "-". */
export async function readListing(source: string, stdin: NodeJS.ReadableStream = process.stdin): Promise<string[]> {
  if (source !== '-') {
    return parseListing(fs.readFileSync(source, 'utf-8'));
  }
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return parseListing(Buffer.concat(chunks).toString('utf-8'));
}
