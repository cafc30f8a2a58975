import type { CatalogSource, ResolveOptions, ResolveResult, SkippedEntry, SourceSnapshot } from '../types/catalog';
import type { VersionRecord } from '../types/driver';
import { CatalogFetchError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { CatalogResolver } from './catalog-resolver';
import { CatalogSources } from './catalog-sources';

const MAX_PAGES = 100;

export interface LoadOptions {
  includeLegacy?: boolean;
  timeoutMs?: number;
}

export class CatalogClient {
  /**
   * Fetch the catalogs and resolve them in one step
   */
  static async resolve(sources: CatalogSource[], options: ResolveOptions & LoadOptions = {}): Promise<ResolveResult> {
    const snapshots = await this.load(sources, options);
    const result = CatalogResolver.resolve(snapshots, options);

    for (const failure of result.sourceErrors) {
      Logger.warning(`Could not obtain ${failure.source} versions: ${failure.message}`);
    }

    return result;
  }

  static async load(sources: CatalogSource[], options: LoadOptions = {}): Promise<SourceSnapshot[]> {
    const includeLegacy = options.includeLegacy ?? true;
    const wanted = sources.filter(source => includeLegacy || source.kind !== 'legacy');
    return Promise.all(wanted.map(source => this.loadSource(source, options)));
  }

  /**
   * Fetch and parse one catalog, following pagination. Failures end up in the
   * snapshot's error rather than rejecting.
   */
  static async loadSource(source: CatalogSource, options: LoadOptions = {}): Promise<SourceSnapshot> {
    const timeoutMs = options.timeoutMs ?? CatalogSources.fetchTimeout();
    const records: VersionRecord[] = [];
    const skipped: SkippedEntry[] = [];

    try {
      let url: string | undefined = source.url;
      for (let page = 0; url && page < MAX_PAGES; page++) {
        Logger.debug(`Fetching ${source.kind} catalog: ${url}`);
        const raw = await this.fetchText(url, timeoutMs);
        const parsed = source.adapter.parse(raw);
        records.push(...parsed.records);
        skipped.push(...parsed.skipped);

        const marker = source.adapter.nextPageMarker?.(raw);
        url = marker ? this.withMarker(source.url, marker) : undefined;
      }

      if (url) {
        const message = `listing still truncated after ${MAX_PAGES} pages`;
        Logger.debug(`Stopped loading ${source.kind} catalog: ${message}`);
        return { kind: source.kind, records, skipped, error: message };
      }

      return { kind: source.kind, records, skipped };
    } catch (error) {
      const message = errorMessage(error);
      Logger.debug(`Failed to load ${source.kind} catalog: ${message}`);
      return { kind: source.kind, records, skipped, error: message };
    }
  }

  static async fetchText(url: string, timeoutMs: number): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new CatalogFetchError(url, `${response.status} ${response.statusText}`, response.status);
      }
      return await response.text();
    } catch (error) {
      if (error instanceof CatalogFetchError) {
        throw error;
      }
      throw new CatalogFetchError(url, errorMessage(error));
    } finally {
      clearTimeout(timeout);
    }
  }

  private static withMarker(url: string, marker: string): string {
    const next = new URL(url);
    next.searchParams.set('marker', marker);
    return next.toString();
  }
}
