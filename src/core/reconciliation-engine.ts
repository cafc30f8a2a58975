import type {
  DownloadCollaborator,
  DownloadOutcome,
  DownloadSummary,
  MissingDriver,
  ReconcileOptions,
  ReconcileReport
} from '../types/reconcile';
import type { VersionRecord } from '../types/driver';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { LocalStateScanner } from './local-state-scanner';
import { compareVersions, majorDirectoryName } from './version';

export class ReconciliationEngine {
  /**
   * Scan the drivers root, report what is missing and optionally download it
   */
  static async reconcile(options: ReconcileOptions): Promise<ReconcileReport> {
    const present = await LocalStateScanner.scan(options.root);
    const missing = this.findMissing(options.candidates, present);

    const report: ReconcileReport = {
      root: options.root,
      present: [...present].sort(compareVersions),
      missing
    };

    if (options.downloader && missing.length > 0) {
      report.downloads = await this.downloadMissing(missing, options.root, options.downloader);
    }

    return report;
  }

  /**
   * Candidates whose version directory is absent, in candidate order
   */
  static findMissing(candidates: VersionRecord[], present: ReadonlySet<string>): MissingDriver[] {
    const missing: MissingDriver[] = [];

    for (const record of candidates) {
      const versionDir = majorDirectoryName(record.major);
      if (!present.has(versionDir)) {
        missing.push({ versionDir, record });
      }
    }

    return missing;
  }

  /**
   * One download per version directory, the greatest version winning
   */
  static planDownloads(missing: MissingDriver[]): MissingDriver[] {
    const planned = new Map<string, MissingDriver>();

    for (const entry of missing) {
      const current = planned.get(entry.versionDir);
      if (!current || compareVersions(entry.record.version, current.record.version) > 0) {
        planned.set(entry.versionDir, entry);
      }
    }

    return [...planned.values()];
  }

  /**
   * Attempt every planned download; a failure is recorded and the rest still run
   */
  static async downloadMissing(
    missing: MissingDriver[],
    root: string,
    downloader: DownloadCollaborator
  ): Promise<DownloadSummary> {
    const outcomes: DownloadOutcome[] = [];

    for (const { versionDir, record } of this.planDownloads(missing)) {
      try {
        const result = await downloader({
          downloadUrl: record.downloadUrl,
          outputDirectory: root,
          version: record.version,
          platform: record.platform,
          arch: record.arch,
          isLegacy: record.source === 'legacy'
        });
        if (result === false) {
          Logger.debug(`Download of ${record.version} reported failure`);
          outcomes.push({ versionDir, record, success: false, error: 'downloader reported failure' });
          continue;
        }
        outcomes.push({ versionDir, record, success: true });
      } catch (error) {
        const message = errorMessage(error);
        Logger.debug(`Download of ${record.version} failed: ${message}`);
        outcomes.push({ versionDir, record, success: false, error: message });
      }
    }

    const succeeded = outcomes.filter(outcome => outcome.success).length;
    return { succeeded, failed: outcomes.length - succeeded, outcomes };
  }
}
