import { DRIVER_ARCHS, DRIVER_PLATFORMS } from '../types/driver';
import type { DriverArch, DriverPlatform } from '../types/driver';
import { isWellFormedVersion } from '../core/version';

export class Validator {
  /**
   * Validate driver platform (windows, linux)
   */
  static isValidPlatform(platform: string): platform is DriverPlatform {
    return DRIVER_PLATFORMS.some(known => known === platform);
  }

  /**
   * Validate driver architecture (x86, x64)
   */
  static isValidArch(arch: string): arch is DriverArch {
    return DRIVER_ARCHS.some(known => known === arch);
  }

  /**
   * Validate a version or version prefix such as "114" or "114.0.5735.90"
   */
  static isValidVersionFilter(version: string): boolean {
    return isWellFormedVersion(version.trim());
  }

  /**
   * A bare major version, e.g. "114"
   */
  static isMajorVersion(version: string): boolean {
    return /^\d+$/.test(version.trim());
  }

  static isValidTimeout(value: string): boolean {
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0;
  }
}
