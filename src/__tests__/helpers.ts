import fs from 'fs-extra';
import path from 'path';
import type { CatalogSourceKind, DriverArch, DriverPlatform, VersionRecord } from '../types/driver';
import { majorOf } from '../core/version';

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export function makeRecord(
  version: string,
  platform: DriverPlatform = 'windows',
  arch: DriverArch = 'x64',
  source: CatalogSourceKind = 'modern'
): VersionRecord {
  return {
    version,
    major: majorOf(version),
    platform,
    arch,
    source,
    downloadUrl: `https://downloads.example.test/${source}/${version}/${platform}-${arch}.zip`
  };
}
