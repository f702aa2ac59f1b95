import { describe, it, expect } from 'vitest';
import { encodingForVersion, normalize, REPLACEMENT_CHARACTER } from '../../src/utils/encoding.js';
import { version } from '../helpers.js';

describe('normalize', () => {
  it('should return ASCII unchanged in every mode', () => {
    const bytes = Buffer.from('Smith, John');
    for (const mode of ['latin1', 'utf-8', 'auto'] as const) {
      expect(normalize(bytes, mode)).toEqual({ text: 'Smith, John', degraded: false });
    }
  });

  it('should map latin1 bytes to the same code points', () => {
    expect(normalize(Buffer.from([0x42, 0xf8, 0x72]), 'latin1')).toEqual({ text: 'Bør', degraded: false });
  });

  it('should decode valid UTF-8', () => {
    expect(normalize(Buffer.from('Børkestraße', 'utf8'), 'utf-8')).toEqual({
      text: 'Børkestraße',
      degraded: false,
    });
  });

  it('should replace invalid UTF-8 and flag the field', () => {
    expect(normalize(Buffer.from([0x41, 0xe9, 0x42]), 'utf-8')).toEqual({
      text: `A${REPLACEMENT_CHARACTER}B`,
      degraded: true,
    });
  });

  it('should read invalid UTF-8 as latin1 in auto mode', () => {
    expect(normalize(Buffer.from([0x41, 0xe9, 0x42]), 'auto')).toEqual({ text: 'AéB', degraded: false });
    expect(normalize(Buffer.from([0xc3, 0xa9]), 'auto')).toEqual({ text: 'é', degraded: false });
  });
});

describe('encodingForVersion', () => {
  it('should use latin1 before version 8 and UTF-8 from then on', () => {
    expect(encodingForVersion(version('5.0'))).toBe('latin1');
    expect(encodingForVersion(version('3.00'))).toBe('latin1');
    expect(encodingForVersion(version('8.0'))).toBe('utf-8');
    expect(encodingForVersion(version('8.3'))).toBe('utf-8');
  });

  it('should let an override win', () => {
    expect(encodingForVersion(version('8.0'), 'latin1')).toBe('latin1');
    expect(encodingForVersion(version('5.0'), 'auto')).toBe('auto');
  });
});
