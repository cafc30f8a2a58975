import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import { CatalogClient } from '../core/catalog-client';
import { CatalogSources } from '../core/catalog-sources';
import { DriverDownloader } from '../core/driver-downloader';
import { ReconciliationEngine } from '../core/reconciliation-engine';
import { errorMessage } from '../utils/errors';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { readArch, readPlatform } from './shared';
import type { FilterCommandOptions } from './shared';

interface MissingCommandOptions extends FilterCommandOptions {
  dir: string;
  arch: string;
  download?: boolean;
  json?: boolean;
}

export function missingCommand(program: Command): void {
  program
    .command('missing')
    .description('Check a drivers directory for missing major versions')
    .requiredOption('-d, --dir <dir>', 'Directory containing existing drivers')
    .option('-p, --platform <platform>', 'Platform (windows, linux; default: host platform)')
    .option('-a, --arch <arch>', 'Architecture (x86, x64)', 'x64')
    .option('-l, --latest', 'Consider only the latest version of each major version')
    .option('--no-legacy', 'Do not include legacy ChromeDriver versions')
    .option('--download', 'Download the missing drivers')
    .option('-j, --json', 'Output result as JSON')
    .action(async (options: MissingCommandOptions) => {
      try {
        const platform = readPlatform(options.platform, true);
        const arch = readArch(options.arch);
        const root = path.resolve(options.dir);

        const resolved = await CatalogClient.resolve(CatalogSources.defaults(), {
          platform,
          arch,
          latestOnly: options.latest,
          includeLegacy: options.legacy
        });

        if (resolved.records.length === 0) {
          Logger.error('Could not obtain the list of available versions.');
          process.exit(1);
        }

        if (options.download) {
          await FileSystem.ensureDirectory(root);
        }

        const report = await ReconciliationEngine.reconcile({
          candidates: resolved.records,
          root,
          downloader: options.download ? DriverDownloader.download.bind(DriverDownloader) : undefined
        });

        if (options.json) {
          Logger.json(report);
          process.exit(report.downloads && report.downloads.failed > 0 ? 1 : 0);
        }

        Logger.title('Missing Drivers');

        if (report.missing.length === 0) {
          Logger.success('No missing drivers found.');
          return;
        }

        const planned = ReconciliationEngine.planDownloads(report.missing);
        Logger.info(`Found ${planned.length} missing drivers:`);
        planned.forEach(({ versionDir, record }, index) => {
          Logger.item(index + 1, `${chalk.bold(versionDir)} (Full version: ${record.version})`);
        });

        if (!report.downloads) {
          return;
        }

        Logger.subTitle('Downloads');
        for (const outcome of report.downloads.outcomes) {
          if (outcome.success) {
            console.log(`  ${chalk.green('•')} ${outcome.versionDir} (${outcome.record.version})`);
          } else {
            console.log(`  ${chalk.red('•')} ${outcome.versionDir} (${outcome.record.version}): ${outcome.error}`);
          }
        }

        console.log();
        if (report.downloads.failed > 0) {
          Logger.error(`${report.downloads.failed} of ${report.downloads.outcomes.length} downloads failed`);
          process.exit(1);
        }
        Logger.success(`Downloaded ${report.downloads.succeeded} missing drivers`);

      } catch (error) {
        Logger.error(`Unexpected error: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
