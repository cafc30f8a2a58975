export const DRIVER_PLATFORMS = ['windows', 'linux'] as const;
export const DRIVER_ARCHS = ['x64', 'x86'] as const;
export const CATALOG_SOURCES = ['modern', 'legacy'] as const;

export type DriverPlatform = typeof DRIVER_PLATFORMS[number];
export type DriverArch = typeof DRIVER_ARCHS[number];
export type CatalogSourceKind = typeof CATALOG_SOURCES[number];

export interface VersionRecord {
  version: string; // dotted numeric, e.g. 114.0.5735.90
  major: number;
  platform: DriverPlatform;
  arch: DriverArch;
  source: CatalogSourceKind;
  downloadUrl: string;
}

export interface DriverTarget {
  platform: DriverPlatform;
  arch: DriverArch;
}
