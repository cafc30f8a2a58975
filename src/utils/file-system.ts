import fs from 'fs-extra';
import path from 'path';

export class FileSystem {
  /**
   * Names of the immediate subdirectories of a directory (empty if it doesn't exist)
   */
  static async listSubdirectories(dir: string): Promise<string[]> {
    if (!(await fs.pathExists(dir))) {
      return [];
    }

    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name);
  }

  /**
   * Create directory if it doesn't exist
   */
  static async ensureDirectory(dir: string): Promise<void> {
    await fs.ensureDir(dir);
  }

  /**
   * Copy every item of a directory into another, replacing existing items
   */
  static async copyContents(src: string, dest: string): Promise<string[]> {
    await fs.ensureDir(dest);

    const copied: string[] = [];
    for (const item of await fs.readdir(src)) {
      const destPath = path.join(dest, item);
      await fs.remove(destPath);
      await fs.copy(path.join(src, item), destPath);
      copied.push(destPath);
    }

    return copied;
  }

  /**
   * Remove files or directories, ignoring those that don't exist
   */
  static async removeAll(paths: string[]): Promise<void> {
    for (const target of paths) {
      await fs.remove(target);
    }
  }
}
