import { Command } from 'commander';
import path from 'path';
import { CatalogClient } from '../core/catalog-client';
import { CatalogSources } from '../core/catalog-sources';
import { DriverDownloader } from '../core/driver-downloader';
import type { VersionRecord } from '../types/driver';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { describeRecord, readArch, readPlatform, readVersion } from './shared';
import type { FilterCommandOptions } from './shared';

interface DownloadCommandOptions extends FilterCommandOptions {
  version: string;
  arch: string;
  output: string;
}

export function downloadCommand(program: Command): void {
  program
    .command('download')
    .description('Download a specific ChromeDriver version')
    .requiredOption('-v, --version <version>', "Version to download (e.g. '114.0.5735.90', or '114' with --latest)")
    .option('-p, --platform <platform>', 'Platform (windows, linux; default: host platform)')
    .option('-a, --arch <arch>', 'Architecture (x86, x64)', 'x64')
    .option('-o, --output <dir>', 'Output directory', './drivers')
    .option('-l, --latest', 'Download the latest version of the given major version')
    .option('--no-legacy', 'Do not include legacy ChromeDriver versions')
    .action(async (options: DownloadCommandOptions) => {
      try {
        Logger.title('ChromeDriver Download');

        const platform = readPlatform(options.platform, true);
        const arch = readArch(options.arch);
        const version = readVersion(options.version) ?? options.version;
        const byMajor = Boolean(options.latest) && Validator.isMajorVersion(version);

        const result = await CatalogClient.resolve(CatalogSources.defaults(), {
          platform,
          arch,
          versionFilter: version,
          latestOnly: byMajor,
          includeLegacy: options.legacy
        });

        const record = selectRecord(result.records, version, byMajor);
        if (!record) {
          if (byMajor) {
            Logger.error(`No version found matching: ${version}`);
          } else {
            Logger.error(`Version ${version} not found for platform ${platform} and architecture ${arch}`);
          }
          process.exit(1);
        }

        if (byMajor) {
          Logger.info(`Using latest version: ${record.version}`);
        }
        Logger.info(describeRecord(record));
        Logger.divider();

        await DriverDownloader.download({
          downloadUrl: record.downloadUrl,
          outputDirectory: path.resolve(options.output),
          version: record.version,
          platform: record.platform,
          arch: record.arch,
          isLegacy: record.source === 'legacy'
        });

      } catch (error) {
        Logger.error(`Download failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}

function selectRecord(records: VersionRecord[], version: string, byMajor: boolean): VersionRecord | undefined {
  if (byMajor) {
    return records[records.length - 1];
  }
  return records.find(record => record.version === version);
}
