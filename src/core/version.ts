const VERSION_PATTERN = /^\d+(\.\d+)*$/;

/**
 * Check that a version is a dotted tuple of non-negative integers
 */
export function isWellFormedVersion(version: string): boolean {
  return VERSION_PATTERN.test(version);
}

export function parseVersion(version: string): number[] {
  if (!isWellFormedVersion(version)) {
    throw new Error(`Malformed version: ${version}`);
  }
  return version.split('.').map(part => parseInt(part, 10));
}

export function majorOf(version: string): number {
  return parseVersion(version)[0];
}

/**
 * Compare two dotted versions numerically, most significant component first.
 * Missing trailing components count as 0, so "114" equals "114.0.0.0".
 */
export function compareVersions(a: string, b: string): number {
  const aParts = parseVersion(a);
  const bParts = parseVersion(b);
  const length = Math.max(aParts.length, bParts.length);

  for (let i = 0; i < length; i++) {
    const left = aParts[i] ?? 0;
    const right = bParts[i] ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }

  return 0;
}

/**
 * A filter matches when it equals the version or names its leading components
 * ("114" and "114.0" match "114.0.5735.90", "11" does not)
 */
export function matchesVersionFilter(version: string, filter: string): boolean {
  const wanted = filter.trim();
  if (wanted === version) {
    return true;
  }
  if (!isWellFormedVersion(wanted)) {
    return false;
  }

  const wantedParts = wanted.split('.');
  const versionParts = version.split('.');
  if (wantedParts.length > versionParts.length) {
    return false;
  }
  return wantedParts.every((part, index) => part === versionParts[index]);
}

/**
 * Directory that holds the driver of a major version, e.g. "114.0"
 */
export function majorDirectoryName(major: number): string {
  return `${major}.0`;
}
