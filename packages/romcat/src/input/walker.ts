/**
 * ROM directory walker
 * Lists ROM files directly inside a system folder (not recursive).
 * Skips hidden files and the metadata/media files front ends keep beside ROMs.
 */

import fs from 'node:fs';
import path from 'node:path';

import { ConfigurationError, errorMessage } from '../shared/errors.js';

const NON_ROM_EXTENSIONS = new Set([
  '.xml', '.txt', '.png', '.jpg', '.jpeg', '.gif', '.mp4', '.pdf', '.json',
]);

function isRomFile(filename: string): boolean {
  if (filename.startsWith('.')) return false;
  return !NON_ROM_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

export function listRomDirectory(rootPath: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(rootPath, { withFileTypes: true });
  } catch (err) {
    throw new ConfigurationError(`Cannot read ROM directory ${rootPath}: ${errorMessage(err)}`, { cause: err });
  }

  return entries
    .filter(e => e.isFile() && isRomFile(e.name))
    .map(e => e.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
