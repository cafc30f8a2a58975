import type { CatalogSource } from '../types/catalog';
import { Validator } from '../utils/validator';
import { LEGACY_CATALOG_URL, LegacyCatalogAdapter } from './legacy-catalog';
import { MODERN_CATALOG_URL, ModernCatalogAdapter } from './modern-catalog';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export class CatalogSources {
  /**
   * The modern and legacy catalogs, with URLs overridable from the environment
   */
  static defaults(env: NodeJS.ProcessEnv = process.env): CatalogSource[] {
    const legacyUrl = env.CHROMEDRIVER_LEGACY_URL || LEGACY_CATALOG_URL;

    return [
      {
        kind: 'modern',
        url: env.CHROMEDRIVER_CATALOG_URL || MODERN_CATALOG_URL,
        adapter: new ModernCatalogAdapter()
      },
      {
        kind: 'legacy',
        url: legacyUrl,
        adapter: new LegacyCatalogAdapter(legacyUrl)
      }
    ];
  }

  static fetchTimeout(env: NodeJS.ProcessEnv = process.env): number {
    const configured = env.CHROMEDRIVER_FETCH_TIMEOUT_MS;
    if (configured && Validator.isValidTimeout(configured)) {
      return Number(configured);
    }
    return DEFAULT_FETCH_TIMEOUT_MS;
  }
}
