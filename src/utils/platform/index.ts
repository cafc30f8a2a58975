import type { DriverPlatform } from '../../types/driver';

export class Platform {
  /**
   * Check if running on Windows
   */
  static isWindows(): boolean {
    return process.platform === 'win32';
  }

  /**
   * Check if running on Linux
   */
  static isLinux(): boolean {
    return process.platform === 'linux';
  }

  /**
   * Driver platform matching the host, if the host has one
   */
  static hostPlatform(): DriverPlatform | undefined {
    if (Platform.isWindows()) return 'windows';
    if (Platform.isLinux()) return 'linux';
    return undefined;
  }

  /**
   * Name of the driver executable shipped for a platform
   */
  static driverExecutable(platform: DriverPlatform): string {
    return platform === 'windows' ? 'chromedriver.exe' : 'chromedriver';
  }
}
