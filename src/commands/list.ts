import { Command } from 'commander';
import { CatalogClient } from '../core/catalog-client';
import { CatalogSources } from '../core/catalog-sources';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { describeRecord, readArch, readPlatform, readVersion } from './shared';
import type { FilterCommandOptions } from './shared';

interface ListCommandOptions extends FilterCommandOptions {
  json?: boolean;
}

export function listCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List available ChromeDriver versions')
    .option('-p, --platform <platform>', 'Filter by platform (windows, linux)')
    .option('-a, --arch <arch>', 'Filter by architecture (x86, x64)')
    .option('-v, --version <version>', "Filter by version or version prefix (e.g. '114')")
    .option('-l, --latest', 'Only the latest version of each major version')
    .option('--no-legacy', 'Do not include legacy ChromeDriver versions')
    .option('-j, --json', 'Output result as JSON')
    .action(async (options: ListCommandOptions) => {
      try {
        const platform = readPlatform(options.platform, false);
        const arch = readArch(options.arch);
        const versionFilter = readVersion(options.version);

        const result = await CatalogClient.resolve(CatalogSources.defaults(), {
          platform,
          arch,
          versionFilter,
          latestOnly: options.latest,
          includeLegacy: options.legacy
        });

        if (options.json) {
          Logger.json(result.records);
          return;
        }

        Logger.title('ChromeDriver Versions');

        if (result.records.length === 0) {
          Logger.warning('No versions found with the specified filters.');
          return;
        }

        Logger.info(`Available versions (${result.records.length}):`);
        result.records.forEach((record, index) => Logger.item(index + 1, describeRecord(record)));

        if (result.skipped.length > 0) {
          Logger.debug(`${result.skipped.length} catalog entries were skipped`);
        }

      } catch (error) {
        Logger.error(`Unexpected error: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
