import AdmZip from 'adm-zip';
import fs from 'fs-extra';
import { glob } from 'glob';
import path from 'path';
import type { DownloadRequest } from '../types/reconcile';
import { DownloadError, errorMessage } from '../utils/errors';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import { CatalogSources } from './catalog-sources';
import { majorDirectoryName, majorOf } from './version';

const TEMP_ARCHIVE = 'chromedriver_temp.zip';
const TEMP_EXTRACT_DIR = 'temp_extract';

export class DriverDownloader {
  /**
   * Download an archive and unpack the driver into <output>/<major>.0
   */
  static async download(request: DownloadRequest): Promise<string> {
    const { downloadUrl, outputDirectory, version, platform } = request;
    const versionDir = path.join(outputDirectory, majorDirectoryName(majorOf(version)));
    const archivePath = path.join(versionDir, TEMP_ARCHIVE);
    const extractDir = path.join(versionDir, TEMP_EXTRACT_DIR);

    Logger.info(`Downloading ChromeDriver ${version} (${platform} ${request.arch})...`);
    const archive = await this.fetchArchive(downloadUrl);

    const createdVersionDir = !(await fs.pathExists(versionDir));
    await FileSystem.ensureDirectory(versionDir);

    try {
      await fs.writeFile(archivePath, archive);

      try {
        new AdmZip(archivePath).extractAllTo(extractDir, true);
      } catch (error) {
        throw new DownloadError(downloadUrl, `could not extract archive (${errorMessage(error)})`);
      }

      // Legacy archives keep the driver at their root
      const sourceDir = request.isLegacy
        ? extractDir
        : await this.locateDriverDirectory(extractDir, Platform.driverExecutable(platform));
      await FileSystem.copyContents(sourceDir, versionDir);
    } catch (error) {
      // A version directory left behind would count as an installed driver
      if (createdVersionDir) {
        await fs.remove(versionDir);
      }
      throw error;
    } finally {
      await FileSystem.removeAll([archivePath, extractDir]);
    }

    Logger.success(`ChromeDriver ${version} extracted to: ${versionDir}`);
    return versionDir;
  }

  private static async fetchArchive(url: string): Promise<Buffer> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), CatalogSources.fetchTimeout());

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new DownloadError(url, `${response.status} ${response.statusText}`);
      }
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof DownloadError) {
        throw error;
      }
      throw new DownloadError(url, errorMessage(error));
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Modern archives nest the driver in a chromedriver-<platform> folder.
   * Falls back to the extraction root.
   */
  private static async locateDriverDirectory(extractDir: string, executable: string): Promise<string> {
    const matches = await glob(`**/${executable}`, { cwd: extractDir, nodir: true });
    if (matches.length === 0) {
      Logger.debug(`No ${executable} found in archive, copying it as is`);
      return extractDir;
    }

    matches.sort((a, b) => a.split(/[\\/]/).length - b.split(/[\\/]/).length);
    return path.join(extractDir, path.dirname(matches[0]));
  }
}
