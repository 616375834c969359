#!/usr/bin/env node
/**
 * romcat - map locally-named ROM files to catalog titles and emit gamelist.xml
 */

import { Command } from 'commander';

import { makeCatalogCommand } from './cli/catalog.js';
import { makeMatchCommand } from './cli/match.js';

const program = new Command();

program
  .name('romcat')
  .description('Fuzzy-match ROM filenames to canonical titles and write gamelist.xml')
  .version('0.1.0');

program.addCommand(makeMatchCommand());
program.addCommand(makeCatalogCommand());

await program.parseAsync(process.argv);
