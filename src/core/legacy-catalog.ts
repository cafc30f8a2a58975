import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { CatalogAdapter, CatalogParseResult, SkippedEntry } from '../types/catalog';
import type { DriverTarget, VersionRecord } from '../types/driver';
import { CatalogParseError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { isWellFormedVersion, majorOf } from './version';

export const LEGACY_CATALOG_URL = 'https://chromedriver.storage.googleapis.com/';

// Archive suffixes of the legacy bucket: <version>/chromedriver_<suffix>.zip
const LEGACY_PLATFORMS = new Map<string, DriverTarget>([
  ['win32', { platform: 'windows', arch: 'x86' }],
  ['win64', { platform: 'windows', arch: 'x64' }],
  ['linux32', { platform: 'linux', arch: 'x86' }],
  ['linux64', { platform: 'linux', arch: 'x64' }]
]);

const ARCHIVE_KEY_PATTERN = /^([^/]+)\/chromedriver_([A-Za-z0-9_-]+)\.zip$/;

// Releases before 70 were numbered 2.x and do not follow Chrome majors
const CHROME_VERSION_PATTERN = /^\d+\.\d+\.\d+\.\d+$/;

const BucketSchema = z.object({
  IsTruncated: z.string().optional(),
  NextMarker: z.string().optional(),
  Contents: z.array(z.unknown()).optional()
});

const ListingSchema = z.object({
  // An empty <ListBucketResult/> parses to an empty string
  ListBucketResult: z.union([z.literal(''), BucketSchema])
});

const ObjectSchema = z.object({ Key: z.string() });

type Bucket = z.infer<typeof BucketSchema>;

/**
 * Reads the flat bucket listing of older releases (before major 115)
 */
export class LegacyCatalogAdapter implements CatalogAdapter {
  readonly kind = 'legacy' as const;
  private readonly parser = new XMLParser({
    ignoreDeclaration: true,
    parseTagValue: false,
    isArray: (name) => name === 'Contents'
  });

  constructor(private readonly baseUrl: string = LEGACY_CATALOG_URL) {}

  parse(raw: string): CatalogParseResult {
    const records: VersionRecord[] = [];
    const skipped: SkippedEntry[] = [];

    for (const key of this.readKeys(this.readBucket(raw))) {
      const match = key.match(ARCHIVE_KEY_PATTERN);
      if (!match) {
        this.skip(skipped, key, 'unrecognized key');
        continue;
      }

      const [, version, suffix] = match;
      if (!isWellFormedVersion(version)) {
        this.skip(skipped, key, 'malformed version');
        continue;
      }

      if (!CHROME_VERSION_PATTERN.test(version)) {
        this.skip(skipped, key, 'not a Chrome version');
        continue;
      }

      const target = LEGACY_PLATFORMS.get(suffix);
      if (!target) {
        this.skip(skipped, key, 'unsupported platform');
        continue;
      }

      records.push({
        version,
        major: majorOf(version),
        platform: target.platform,
        arch: target.arch,
        source: this.kind,
        downloadUrl: this.downloadUrl(key)
      });
    }

    Logger.debug(`Legacy catalog: ${records.length} records, ${skipped.length} skipped entries`);
    return { records, skipped };
  }

  nextPageMarker(raw: string): string | undefined {
    const bucket = this.readBucket(raw);
    if (bucket.IsTruncated?.trim() !== 'true') {
      return undefined;
    }

    const keys = this.readKeys(bucket);
    return bucket.NextMarker || keys[keys.length - 1];
  }

  private downloadUrl(key: string): string {
    const base = this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`;
    return `${base}${key}`;
  }

  private readBucket(raw: string): Bucket {
    const validation = XMLValidator.validate(raw);
    if (validation !== true) {
      throw new CatalogParseError(this.kind, `malformed XML (${validation.err.msg})`);
    }

    const listing = ListingSchema.safeParse(this.parser.parse(raw));
    if (!listing.success) {
      throw new CatalogParseError(this.kind, 'expected a ListBucketResult document');
    }

    const bucket = listing.data.ListBucketResult;
    return bucket === '' ? {} : bucket;
  }

  private readKeys(bucket: Bucket): string[] {
    const keys: string[] = [];
    for (const item of bucket.Contents ?? []) {
      const object = ObjectSchema.safeParse(item);
      if (object.success) {
        keys.push(object.data.Key.trim());
      }
    }
    return keys;
  }

  private skip(skipped: SkippedEntry[], entry: string, reason: string): void {
    Logger.debug(`Skipping legacy catalog entry ${entry}: ${reason}`);
    skipped.push({ source: this.kind, entry, reason });
  }
}
