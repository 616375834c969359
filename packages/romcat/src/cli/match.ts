/**
 * romcat match <system>
 * Fuzzy-match ROM filenames against a catalog, review the doubtful ones,
 * write gamelist.xml.
 */

import fs from 'node:fs';
import tty from 'node:tty';

import { Command } from 'commander';

import { loadCatalog } from '../catalog/loader.js';
import { buildGamelist, toOutputRecords, writeGamelist } from '../gamelist/emitter.js';
import { readListing } from '../input/listing.js';
import { listRomDirectory } from '../input/walker.js';
import { RunLog, toLogEntry } from '../report/runLog.js';
import { printRunReport } from '../report/report.js';
import { createInquirerPrompts, InquirerOperator } from '../resolution/inquirerOperator.js';
import { resolveItems } from '../resolution/loop.js';
import { SkipAllOperator } from '../resolution/operator.js';
import type { Operator } from '../resolution/operator.js';
import { loadConfig } from '../shared/config.js';
import { ConfigurationError, errorMessage, exitCodeFor } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import type { RunConfig } from '../shared/types.js';

export interface MatchCliOptions {
  config?: string;
  catalogDir?: string;
  input: string;
  romDir?: string;
  threshold?: string;
  output?: string;
  force?: boolean;
  seq?: boolean;
  candidates?: string;
  aliasFile?: string;
  altColumn?: string;
  canonicalColumn?: string;
  review: boolean;
  logDir?: string;
  quiet?: boolean;
}

export function toOverrides(system: string, opts: MatchCliOptions) {
  return {
    system,
    catalogDirectory: opts.catalogDir,
    confidenceThreshold: opts.threshold,
    outputPath: opts.output,
    sequenceAware: opts.seq,
    candidateLimit: opts.candidates,
    aliasFile: opts.aliasFile,
    columns: { alternate: opts.altColumn, canonical: opts.canonicalColumn },
    logDirectory: opts.logDir,
  };
}

/** The listing came through stdin, so prompts need the terminal opened directly. */
function openTerminal(): tty.ReadStream {
  try {
    return new tty.ReadStream(fs.openSync('/dev/tty', 'r'));
  } catch (err) {
    throw new ConfigurationError(
      `Interactive review needs a terminal (${errorMessage(err)}); pass --input <file> or --no-review`,
      { cause: err }
    );
  }
}

async function readItems(opts: MatchCliOptions): Promise<string[]> {
  if (opts.romDir) return listRomDirectory(opts.romDir);
  return readListing(opts.input);
}

export async function runMatch(config: RunConfig, opts: MatchCliOptions, logger: Logger): Promise<void> {
  // refuse before any review work is done
  if (fs.existsSync(config.outputPath) && !opts.force) {
    throw new ConfigurationError(`Output already exists: ${config.outputPath} (use --force to overwrite)`);
  }

  logger.info(`Loading catalog for ${config.system} from ${config.catalogDirectory}`);
  const { catalog, malformed } = loadCatalog(config);
  for (const row of malformed) {
    logger.warn(`${catalog.sourcePath}:${row.line} skipped (${row.reason})`);
  }
  logger.info(`Loaded ${catalog.entries.length} catalog entries, ${catalog.aliases.size} aliases`);

  const items = await readItems(opts);
  logger.info(`${items.length} input items, threshold ${config.confidenceThreshold}`);

  let terminal: tty.ReadStream | undefined;
  let operator: Operator;
  if (!opts.review) {
    operator = new SkipAllOperator();
  } else {
    if (!opts.romDir && opts.input === '-' && !process.stdin.isTTY) terminal = openTerminal();
    operator = new InquirerOperator(createInquirerPrompts({ input: terminal }), logger);
  }

  const startedAt = new Date();
  const outcome = await resolveItems(items, catalog, config, operator, logger)
    .finally(() => terminal?.destroy());

  printRunReport(logger, outcome.results, outcome.summary, config.confidenceThreshold);

  const records = toOutputRecords(outcome.results);
  const written = writeGamelist(config.outputPath, buildGamelist(records), { overwrite: opts.force });
  logger.success(`Wrote ${records.length} games to ${written}`);

  if (config.logDirectory) {
    const logPath = new RunLog(config.logDirectory, startedAt).write({
      system: config.system,
      threshold: config.confidenceThreshold,
      summary: outcome.summary,
      entries: outcome.results.map(toLogEntry),
    });
    logger.info(`Run log: ${logPath}`);
  }
}

export function makeMatchCommand(): Command {
  return new Command('match')
    .description('Match ROM filenames to catalog titles and write gamelist.xml')
    .argument('<system>', 'System name — selects <catalog-dir>/<system>.csv')
    .option('--config <path>', 'YAML config file (default: $ROMCAT_CONFIG, ./romcat.yaml)')
    .option('-c, --catalog-dir <path>', 'Directory holding <system>.csv catalogs (default: .)')
    .option('-i, --input <file>', 'Newline-delimited filename list, - for stdin', '-')
    .option('-r, --rom-dir <path>', 'List ROM files from this directory instead of --input')
    .option('-t, --threshold <n>', 'Auto-accept score, 0-100 (default: 90)')
    .option('-o, --output <path>', 'Output gamelist path (default: ./gamelist_generated.xml)')
    .option('--force', 'Overwrite an existing output file')
    .option('--seq', 'Sequence-aware matching: numerals to digits, sequel-aware tie-breaks')
    .option('--candidates <n>', 'Candidates shown per review (default: 6)')
    .option('--alias-file <name>', 'Alias JSON inside the catalog directory (default: aliases.json)')
    .option('--alt-column <name>', 'Catalog column holding local names (default: "Name CN")')
    .option('--canonical-column <name>', 'Catalog column holding canonical names (default: "Name EN")')
    .option('--no-review', 'Skip low-confidence items instead of prompting')
    .option('--log-dir <path>', 'Write a JSON run log to this directory')
    .option('-q, --quiet', 'Only warnings and errors')
    .action(async (system: string, opts: MatchCliOptions) => {
      const logger = createLogger({ quiet: opts.quiet });
      try {
        const config = loadConfig(toOverrides(system, opts), opts.config);
        await runMatch(config, opts, logger);
      } catch (err) {
        logger.error(errorMessage(err));
        process.exit(exitCodeFor(err));
      }
    });
}
