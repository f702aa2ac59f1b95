import { isUtf8 } from 'node:buffer';
import type { EncodingMode, FilingVersion } from '../types.js';

/** Filings declaring this major version or later are written in UTF-8. */
export const UTF8_CUTOVER_MAJOR = 8;

export const REPLACEMENT_CHARACTER = '\uFFFD';

export interface NormalizedText {
  text: string;
  /** Set when invalid byte sequences were replaced. */
  degraded: boolean;
}

const utf8Decoder = new TextDecoder('utf-8');

function isAscii(bytes: Uint8Array): boolean {
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] > 0x7f) {
      return false;
    }
  }
  return true;
}

function latin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/**
 * Decodes one field's bytes into text.
 *
 * - `latin1` maps every byte to the code point of the same value.
 * - `utf-8` replaces invalid sequences with U+FFFD and flags the field.
 * - `auto` keeps valid UTF-8 and reads anything else as ISO-8859-1.
 */
export function normalize(bytes: Uint8Array, mode: EncodingMode): NormalizedText {
  if (isAscii(bytes)) {
    return { text: latin1(bytes), degraded: false };
  }
  switch (mode) {
    case 'latin1':
      return { text: latin1(bytes), degraded: false };
    case 'utf-8': {
      const text = utf8Decoder.decode(bytes);
      return { text, degraded: !isUtf8(bytes) };
    }
    case 'auto':
      return isUtf8(bytes)
        ? { text: utf8Decoder.decode(bytes), degraded: false }
        : { text: latin1(bytes), degraded: false };
  }
}

/**
 * Picks the encoding of a filing: an explicit override wins, otherwise
 * versions before the cutover use latin1 and later ones UTF-8.
 */
export function encodingForVersion(
  version: FilingVersion,
  override?: EncodingMode,
): EncodingMode {
  if (override) {
    return override;
  }
  return version.major >= UTF8_CUTOVER_MAJOR ? 'utf-8' : 'latin1';
}
