import { describe, it, expect } from 'vitest';
import { compareVersions, formatVersion, parseFilingVersion } from '../../src/schemas/version.js';
import { version } from '../helpers.js';

describe('parseFilingVersion', () => {
  it('should read major and minor numbers', () => {
    expect(parseFilingVersion('8.3')).toEqual({ major: 8, minor: 3, raw: '8.3' });
  });

  it('should keep the raw text and read zero-padded minors', () => {
    expect(parseFilingVersion(' 3.00 ')).toEqual({ major: 3, minor: 0, raw: '3.00' });
  });

  it('should accept the paper filing prefix', () => {
    expect(parseFilingVersion('P3.00')).toEqual({ major: 3, minor: 0, raw: 'P3.00' });
  });

  it('should default a missing minor to 0', () => {
    expect(parseFilingVersion('8')).toEqual({ major: 8, minor: 0, raw: '8' });
  });

  it('should return undefined for unreadable values', () => {
    expect(parseFilingVersion('abc')).toBeUndefined();
    expect(parseFilingVersion('')).toBeUndefined();
    expect(parseFilingVersion(undefined)).toBeUndefined();
  });

  it('should return frozen versions', () => {
    expect(Object.isFrozen(parseFilingVersion('8.1'))).toBe(true);
  });
});

describe('compareVersions', () => {
  it('should compare minors numerically', () => {
    expect(compareVersions(version('8.2'), version('8.10'))).toBeLessThan(0);
    expect(compareVersions(version('9.0'), version('8.9'))).toBeGreaterThan(0);
    expect(compareVersions(version('3.00'), version('3.0'))).toBe(0);
  });
});

describe('formatVersion', () => {
  it('should print major.minor', () => {
    expect(formatVersion(version('3.00'))).toBe('3.0');
    expect(formatVersion(version('P8.3'))).toBe('8.3');
  });
});
