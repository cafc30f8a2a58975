import { z } from 'zod';
import type { CatalogAdapter, CatalogParseResult, SkippedEntry } from '../types/catalog';
import type { DriverTarget, VersionRecord } from '../types/driver';
import { CatalogParseError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { isWellFormedVersion, majorOf } from './version';

export const MODERN_CATALOG_URL =
  'https://googlechromelabs.github.io/chrome-for-testing/known-good-versions-with-downloads.json';

// Platform keys used by the Chrome for Testing index
const MODERN_PLATFORMS = new Map<string, DriverTarget>([
  ['win64', { platform: 'windows', arch: 'x64' }],
  ['win32', { platform: 'windows', arch: 'x86' }],
  ['linux64', { platform: 'linux', arch: 'x64' }]
]);

const CatalogRootSchema = z.union([
  z.array(z.unknown()),
  z.object({ versions: z.array(z.unknown()) })
]);

const VersionEntrySchema = z.object({
  version: z.string(),
  downloads: z.object({
    chromedriver: z.array(z.unknown()).optional()
  }).optional()
});

const DownloadSchema = z.object({
  platform: z.string(),
  url: z.string().url()
});

/**
 * Reads the JSON index of recent releases (major 115 onwards)
 */
export class ModernCatalogAdapter implements CatalogAdapter {
  readonly kind = 'modern' as const;

  parse(raw: string): CatalogParseResult {
    const entries = this.readEntries(raw);
    const records: VersionRecord[] = [];
    const skipped: SkippedEntry[] = [];

    entries.forEach((entry, index) => {
      const parsed = VersionEntrySchema.safeParse(entry);
      if (!parsed.success) {
        this.skip(skipped, `versions[${index}]`, 'invalid version entry');
        return;
      }

      const { version, downloads } = parsed.data;
      if (!isWellFormedVersion(version)) {
        this.skip(skipped, version, 'malformed version');
        return;
      }

      const major = majorOf(version);
      for (const download of downloads?.chromedriver ?? []) {
        const file = DownloadSchema.safeParse(download);
        if (!file.success) {
          this.skip(skipped, version, 'invalid chromedriver download');
          continue;
        }

        const target = MODERN_PLATFORMS.get(file.data.platform);
        if (!target) {
          this.skip(skipped, `${version}/${file.data.platform}`, 'unsupported platform');
          continue;
        }

        records.push({
          version,
          major,
          platform: target.platform,
          arch: target.arch,
          source: this.kind,
          downloadUrl: file.data.url
        });
      }
    });

    Logger.debug(`Modern catalog: ${records.length} records, ${skipped.length} skipped entries`);
    return { records, skipped };
  }

  private readEntries(raw: string): unknown[] {
    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new CatalogParseError(this.kind, `invalid JSON (${errorMessage(error)})`);
    }

    const root = CatalogRootSchema.safeParse(document);
    if (!root.success) {
      throw new CatalogParseError(this.kind, 'expected a list of version entries');
    }

    return Array.isArray(root.data) ? root.data : root.data.versions;
  }

  private skip(skipped: SkippedEntry[], entry: string, reason: string): void {
    Logger.debug(`Skipping modern catalog entry ${entry}: ${reason}`);
    skipped.push({ source: this.kind, entry, reason });
  }
}
