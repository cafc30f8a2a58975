import type { CatalogSourceKind } from '../types/driver';

export type DriverSyncErrorCode = 'CATALOG_PARSE' | 'CATALOG_FETCH' | 'DOWNLOAD_FAILED';

export class DriverSyncError extends Error {
  readonly code: DriverSyncErrorCode;

  constructor(code: DriverSyncErrorCode, message: string) {
    super(message);
    this.name = 'DriverSyncError';
    this.code = code;
  }
}

/**
 * Raised when a catalog document cannot be read as a whole
 */
export class CatalogParseError extends DriverSyncError {
  readonly source: CatalogSourceKind;

  constructor(source: CatalogSourceKind, message: string) {
    super('CATALOG_PARSE', `Failed to parse ${source} catalog: ${message}`);
    this.name = 'CatalogParseError';
    this.source = source;
  }
}

export class CatalogFetchError extends DriverSyncError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super('CATALOG_FETCH', `Failed to fetch ${url}: ${message}`);
    this.name = 'CatalogFetchError';
    this.url = url;
    this.status = status;
  }
}

export class DownloadError extends DriverSyncError {
  readonly url: string;

  constructor(url: string, message: string) {
    super('DOWNLOAD_FAILED', `Download of ${url} failed: ${message}`);
    this.name = 'DownloadError';
    this.url = url;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
