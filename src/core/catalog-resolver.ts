import type {
  CatalogAdapter,
  RecordFilter,
  ResolveOptions,
  ResolveResult,
  SourceSnapshot
} from '../types/catalog';
import { CATALOG_SOURCES, DRIVER_ARCHS, DRIVER_PLATFORMS } from '../types/driver';
import type { VersionRecord } from '../types/driver';
import { CatalogParseError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { compareVersions, matchesVersionFilter } from './version';

export interface SourceInput {
  adapter: CatalogAdapter;
  raw: string;
}

export class CatalogResolver {
  /**
   * Parse raw catalog documents. A source whose document cannot be read
   * contributes its error instead of records, so the other sources still count.
   */
  static parseSources(inputs: SourceInput[]): SourceSnapshot[] {
    return inputs.map(({ adapter, raw }) => {
      try {
        return { kind: adapter.kind, ...adapter.parse(raw) };
      } catch (error) {
        if (!(error instanceof CatalogParseError)) {
          throw error;
        }
        Logger.debug(error.message);
        return { kind: adapter.kind, records: [], skipped: [], error: error.message };
      }
    });
  }

  /**
   * Merge, filter and order the records of every usable source
   */
  static resolve(snapshots: SourceSnapshot[], options: ResolveOptions = {}): ResolveResult {
    const includeLegacy = options.includeLegacy ?? true;
    const used = snapshots.filter(snapshot => includeLegacy || snapshot.kind !== 'legacy');

    const sourceErrors = used.flatMap(snapshot =>
      snapshot.error === undefined ? [] : [{ source: snapshot.kind, message: snapshot.error }]
    );

    const merged = this.merge(used.flatMap(snapshot => snapshot.records));
    const filtered = this.filter(merged, options);
    const records = options.latestOnly ? this.latestPerMajor(filtered) : filtered;

    return {
      records,
      skipped: used.flatMap(snapshot => snapshot.skipped),
      sourceErrors
    };
  }

  /**
   * Deduplicate by (version, platform, arch); the modern catalog wins
   */
  static merge(records: VersionRecord[]): VersionRecord[] {
    const byKey = new Map<string, VersionRecord>();

    for (const record of records) {
      const key = this.targetKey(record);
      const existing = byKey.get(key);
      if (!existing || this.sourceRank(record) < this.sourceRank(existing)) {
        byKey.set(key, record);
      }
    }

    return this.sort([...byKey.values()]);
  }

  static filter(records: VersionRecord[], filter: RecordFilter = {}): VersionRecord[] {
    const includeLegacy = filter.includeLegacy ?? true;
    const win32Fallback = filter.arch === 'x64' && (filter.legacyWin32Fallback ?? true);

    const matching = records.filter(record => {
      if (!includeLegacy && record.source === 'legacy') return false;
      if (filter.platform && filter.platform !== 'any' && record.platform !== filter.platform) return false;
      if (filter.versionFilter && !matchesVersionFilter(record.version, filter.versionFilter)) return false;
      if (filter.arch && filter.arch !== 'any' && record.arch !== filter.arch) {
        return win32Fallback && this.isLegacyWin32(record);
      }
      return true;
    });

    if (!win32Fallback) {
      return matching;
    }

    // The 32-bit stand-in only counts while no real x64 build of the same version exists
    const native = new Set(
      matching.filter(record => record.arch === 'x64').map(record => `${record.version}|${record.platform}`)
    );
    return matching.filter(record =>
      record.arch === 'x64' || !native.has(`${record.version}|${record.platform}`)
    );
  }

  /**
   * Keep the greatest version of every major
   */
  static latestPerMajor(records: VersionRecord[]): VersionRecord[] {
    const latest = new Map<number, VersionRecord>();

    for (const record of records) {
      const current = latest.get(record.major);
      if (!current || this.preference(record, current) < 0) {
        latest.set(record.major, record);
      }
    }

    return this.sort([...latest.values()]);
  }

  /**
   * Ascending by major, then full version; platform, arch and source break ties
   */
  static sort(records: VersionRecord[]): VersionRecord[] {
    return [...records].sort((a, b) =>
      a.major - b.major ||
      compareVersions(a.version, b.version) ||
      DRIVER_PLATFORMS.indexOf(a.platform) - DRIVER_PLATFORMS.indexOf(b.platform) ||
      DRIVER_ARCHS.indexOf(a.arch) - DRIVER_ARCHS.indexOf(b.arch) ||
      this.sourceRank(a) - this.sourceRank(b)
    );
  }

  /**
   * Negative when `a` should be kept over `b` as the latest of a major
   */
  private static preference(a: VersionRecord, b: VersionRecord): number {
    return compareVersions(b.version, a.version) ||
      this.sourceRank(a) - this.sourceRank(b) ||
      DRIVER_PLATFORMS.indexOf(a.platform) - DRIVER_PLATFORMS.indexOf(b.platform) ||
      DRIVER_ARCHS.indexOf(a.arch) - DRIVER_ARCHS.indexOf(b.arch);
  }

  private static isLegacyWin32(record: VersionRecord): boolean {
    return record.source === 'legacy' && record.platform === 'windows' && record.arch === 'x86';
  }

  private static sourceRank(record: VersionRecord): number {
    return CATALOG_SOURCES.indexOf(record.source);
  }

  private static targetKey(record: VersionRecord): string {
    return `${record.version}|${record.platform}|${record.arch}`;
  }
}
