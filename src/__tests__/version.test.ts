import { describe, it, expect } from 'vitest';
import {
  compareVersions,
  isWellFormedVersion,
  majorDirectoryName,
  majorOf,
  matchesVersionFilter,
  parseVersion
} from '../core/version';

describe('compareVersions', () => {
  it('orders versions by their numeric components', () => {
    expect(compareVersions('114.0.5735.90', '115.0.5790.10')).toBe(-1);
    expect(compareVersions('115.0.5790.10', '114.0.5735.90')).toBe(1);
  });

  it('compares numerically rather than lexicographically', () => {
    expect(compareVersions('9.0.0.0', '10.0.0.0')).toBe(-1);
    expect(compareVersions('114.0.5735.9', '114.0.5735.90')).toBe(-1);
  });

  it('treats missing trailing components as zero', () => {
    expect(compareVersions('114', '114.0.0.0')).toBe(0);
    expect(compareVersions('114.0.1', '114')).toBe(1);
  });

  it('sorts a list into ascending order', () => {
    const sorted = ['10.0.0.0', '114.0.5735.90', '9.0.0.0', '114.0.5735.16'].sort(compareVersions);
    expect(sorted).toEqual(['9.0.0.0', '10.0.0.0', '114.0.5735.16', '114.0.5735.90']);
  });

  it('throws on malformed input', () => {
    expect(() => compareVersions('114.x', '115')).toThrow('Malformed version: 114.x');
  });
});

describe('version helpers', () => {
  it('recognises well-formed versions', () => {
    expect(isWellFormedVersion('114.0.5735.90')).toBe(true);
    expect(isWellFormedVersion('114')).toBe(true);
    expect(isWellFormedVersion('114.')).toBe(false);
    expect(isWellFormedVersion('v114')).toBe(false);
    expect(isWellFormedVersion('')).toBe(false);
  });

  it('parses components and the major', () => {
    expect(parseVersion('85.0.4183.87')).toEqual([85, 0, 4183, 87]);
    expect(majorOf('85.0.4183.87')).toBe(85);
  });

  it('names version directories after the major', () => {
    expect(majorDirectoryName(114)).toBe('114.0');
  });
});

describe('matchesVersionFilter', () => {
  it('matches whole leading components', () => {
    expect(matchesVersionFilter('114.0.5735.90', '114')).toBe(true);
    expect(matchesVersionFilter('114.0.5735.90', '114.0')).toBe(true);
    expect(matchesVersionFilter('114.0.5735.90', '114.0.5735')).toBe(true);
  });

  it('matches an exact version', () => {
    expect(matchesVersionFilter('114.0.5735.90', '114.0.5735.90')).toBe(true);
    expect(matchesVersionFilter('114.0.5735.90', ' 114.0.5735.90 ')).toBe(true);
  });

  it('does not match partial components', () => {
    expect(matchesVersionFilter('114.0.5735.90', '11')).toBe(false);
    expect(matchesVersionFilter('114.0.5735.90', '114.0.57')).toBe(false);
  });

  it('does not match longer or malformed filters', () => {
    expect(matchesVersionFilter('114.0', '114.0.5735')).toBe(false);
    expect(matchesVersionFilter('114.0.5735.90', 'latest')).toBe(false);
  });
});
