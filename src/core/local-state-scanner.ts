import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { isWellFormedVersion } from './version';

export class LocalStateScanner {
  /**
   * Version directories (e.g. "114.0") directly under a drivers root.
   * A root that doesn't exist yet holds nothing.
   */
  static async scan(root: string): Promise<Set<string>> {
    const directories = await FileSystem.listSubdirectories(root);
    const present = new Set(directories.filter(name => isWellFormedVersion(name)));

    Logger.debug(`Found ${present.size} version directories in ${root}`);
    return present;
  }
}
