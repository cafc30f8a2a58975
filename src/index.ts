// API exports for programmatic usage

// Core functionality
import { ModernCatalogAdapter } from './core/modern-catalog';
import { LegacyCatalogAdapter } from './core/legacy-catalog';
import { CatalogResolver } from './core/catalog-resolver';
import { LocalStateScanner } from './core/local-state-scanner';
import { ReconciliationEngine } from './core/reconciliation-engine';
import { CatalogSources } from './core/catalog-sources';
import { CatalogClient } from './core/catalog-client';
import { DriverDownloader } from './core/driver-downloader';

// Utilities
import { Logger } from './utils/logger';
import { Validator } from './utils/validator';
import { FileSystem } from './utils/file-system';
import { Platform } from './utils/platform';

// Re-exports
export { ModernCatalogAdapter, LegacyCatalogAdapter, CatalogResolver, LocalStateScanner, ReconciliationEngine };
export { CatalogSources, CatalogClient, DriverDownloader };
export { Logger, Validator, FileSystem, Platform };
export { MODERN_CATALOG_URL } from './core/modern-catalog';
export { LEGACY_CATALOG_URL } from './core/legacy-catalog';
export { DEFAULT_FETCH_TIMEOUT_MS } from './core/catalog-sources';
export type { SourceInput } from './core/catalog-resolver';
export type { LoadOptions } from './core/catalog-client';
export * from './core/version';
export * from './utils/errors';

// Types
export * from './types/driver';
export * from './types/catalog';
export * from './types/reconcile';

// Command functions (for programmatic usage)
import { listCommand } from './commands/list';
import { downloadCommand } from './commands/download';
import { missingCommand } from './commands/missing';

export { listCommand, downloadCommand, missingCommand };

/**
 * Main API for programmatic usage
 */
export class DriverSyncAPI {
  static catalog = {
    sources: CatalogSources.defaults.bind(CatalogSources),
    load: CatalogClient.load.bind(CatalogClient),
    resolve: CatalogClient.resolve.bind(CatalogClient)
  };

  static resolver = {
    parseSources: CatalogResolver.parseSources.bind(CatalogResolver),
    resolve: CatalogResolver.resolve.bind(CatalogResolver),
    latestPerMajor: CatalogResolver.latestPerMajor.bind(CatalogResolver)
  };

  static local = {
    scan: LocalStateScanner.scan.bind(LocalStateScanner),
    reconcile: ReconciliationEngine.reconcile.bind(ReconciliationEngine),
    findMissing: ReconciliationEngine.findMissing.bind(ReconciliationEngine)
  };

  static download = DriverDownloader.download.bind(DriverDownloader);

  static utils = {
    logger: Logger,
    validator: Validator,
    fileSystem: FileSystem,
    platform: Platform
  };
}

// Default export
export default DriverSyncAPI;
