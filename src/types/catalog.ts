import type { CatalogSourceKind, DriverArch, DriverPlatform, VersionRecord } from './driver';

export interface SkippedEntry {
  source: CatalogSourceKind;
  entry: string;
  reason: string;
}

export interface CatalogParseResult {
  records: VersionRecord[];
  skipped: SkippedEntry[];
}

export interface CatalogAdapter {
  readonly kind: CatalogSourceKind;
  parse(raw: string): CatalogParseResult;
  /**
   * Marker for the next page of a paginated listing, if the document is truncated
   */
  nextPageMarker?(raw: string): string | undefined;
}

export interface CatalogSource {
  kind: CatalogSourceKind;
  url: string;
  adapter: CatalogAdapter;
}

export interface SourceSnapshot {
  kind: CatalogSourceKind;
  records: VersionRecord[];
  skipped: SkippedEntry[];
  error?: string;
}

export interface RecordFilter {
  platform?: DriverPlatform | 'any';
  arch?: DriverArch | 'any';
  versionFilter?: string;
  includeLegacy?: boolean;
  legacyWin32Fallback?: boolean;
}

export interface ResolveOptions extends RecordFilter {
  latestOnly?: boolean;
}

export interface SourceError {
  source: CatalogSourceKind;
  message: string;
}

export interface ResolveResult {
  records: VersionRecord[];
  skipped: SkippedEntry[];
  sourceErrors: SourceError[];
}
