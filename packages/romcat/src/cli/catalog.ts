/**
 * romcat catalog <system>
 * Load a catalog and report what would be matched against — no input, no output.
 */

import { Command } from 'commander';

import { loadCatalog } from '../catalog/loader.js';
import { loadConfig } from '../shared/config.js';
import { errorMessage, exitCodeFor } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

interface CatalogCliOptions {
  config?: string;
  catalogDir?: string;
  aliasFile?: string;
  altColumn?: string;
  canonicalColumn?: string;
  limit: string;
}

export function makeCatalogCommand(): Command {
  return new Command('catalog')
    .description('Check a system catalog: entry count, skipped rows, sample entries')
    .argument('<system>', 'System name — selects <catalog-dir>/<system>.csv')
    .option('--config <path>', 'YAML config file')
    .option('-c, --catalog-dir <path>', 'Directory holding <system>.csv catalogs (default: .)')
    .option('--alias-file <name>', 'Alias JSON inside the catalog directory')
    .option('--alt-column <name>', 'Catalog column holding local names')
    .option('--canonical-column <name>', 'Catalog column holding canonical names')
    .option('--limit <n>', 'Sample entries to print', '10')
    .action((system: string, opts: CatalogCliOptions) => {
      const logger = createLogger();
      try {
        const config = loadConfig({
          system,
          catalogDirectory: opts.catalogDir,
          aliasFile: opts.aliasFile,
          columns: { alternate: opts.altColumn, canonical: opts.canonicalColumn },
        }, opts.config);
        const { catalog, malformed } = loadCatalog(config);

        logger.section(`Catalog ${catalog.system}`);
        logger.line(`  File     : ${catalog.sourcePath}`);
        logger.line(`  Entries  : ${catalog.entries.length}`);
        logger.line(`  Aliases  : ${catalog.aliases.size}`);
        logger.line(`  Skipped  : ${malformed.length}`);

        for (const row of malformed) {
          logger.warn(`line ${row.line}: ${row.reason}`);
        }

        const limit = Math.max(0, parseInt(opts.limit, 10) || 0);
        if (limit > 0 && catalog.entries.length > 0) {
          logger.section('Sample');
          for (const e of catalog.entries.slice(0, limit)) {
            logger.line(`  ${e.alternateName} -> ${e.canonicalName}`);
          }
        }
        if (catalog.entries.length === 0) {
          logger.warn('Catalog has no usable entries; `romcat match` will refuse to run');
        }
      } catch (err) {
        logger.error(errorMessage(err));
        process.exit(exitCodeFor(err));
      }
    });
}
