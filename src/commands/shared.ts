import chalk from 'chalk';
import type { DriverArch, DriverPlatform, VersionRecord } from '../types/driver';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import { Validator } from '../utils/validator';

export interface FilterCommandOptions {
  platform?: string;
  arch?: string;
  version?: string;
  latest?: boolean;
  legacy: boolean; // --no-legacy
}

/**
 * Validate --platform; falls back to the host platform when `useHost` is set
 */
export function readPlatform(value: string | undefined, useHost: boolean): DriverPlatform | undefined {
  if (value === undefined) {
    const host = useHost ? Platform.hostPlatform() : undefined;
    if (useHost && !host) {
      Logger.error('Could not detect a supported host platform, specify one with --platform');
      Logger.info('Valid platforms: windows, linux');
      process.exit(1);
    }
    return host;
  }

  if (!Validator.isValidPlatform(value)) {
    Logger.error(`Invalid platform: ${value}`);
    Logger.info('Valid platforms: windows, linux');
    process.exit(1);
  }
  return value;
}

export function readArch(value: string | undefined): DriverArch | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (!Validator.isValidArch(value)) {
    Logger.error(`Invalid architecture: ${value}`);
    Logger.info('Valid architectures: x86, x64');
    process.exit(1);
  }
  return value;
}

export function readVersion(value: string | undefined): string | undefined {
  if (value !== undefined && !Validator.isValidVersionFilter(value)) {
    Logger.error(`Invalid version: ${value}`);
    Logger.info('Use a version such as 114 or 114.0.5735.90');
    process.exit(1);
  }
  return value?.trim();
}

export function describeRecord(record: VersionRecord): string {
  const legacy = record.source === 'legacy' ? ` ${chalk.gray('[Legacy]')}` : '';
  return `Version: ${chalk.bold(record.version)} - Platform: ${record.platform} (${record.arch})${legacy}`;
}
