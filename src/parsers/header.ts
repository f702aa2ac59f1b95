import { FatalFileError, RecordError } from '../errors.js';
import { parseFilingVersion } from '../schemas/version.js';
import type { FilingVersion } from '../types.js';
import { detectFieldDelimiter, QUOTE, tokenBytes, tokenize } from './tokenizer.js';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const LEGACY_HEADER_END = /^\/\*\s*end\s*header/i;
const LEGACY_VERSION_KEY = /^fec_?ver/i;
const HDR_VERSION_POSITION = 2;

export interface HeaderOptions {
  versionOverride?: FilingVersion;
  fieldDelimiter?: number;
  quote?: number;
}

export type HeaderResult =
  | { status: 'pending' }
  | {
      status: 'detected';
      version: FilingVersion;
      source: 'hdr' | 'legacy' | 'override';
      /** False when the record was not a header and must be parsed as data. */
      consumed: boolean;
    };

export function isBlankRecord(record: Buffer): boolean {
  for (let i = 0; i < record.length; i++) {
    const byte = record[i];
    if (byte !== 0x20 && byte !== 0x09 && byte !== 0x0d && byte !== 0x0a) {
      return false;
    }
  }
  return true;
}

/**
 * Reads the leading header of a filing, one record at a time.
 *
 * Two layouts exist: an `HDR` record whose third field is the format
 * version, and the legacy block that opens with a `/*` line, lists
 * `key = value` entries and closes with `/* End Header`.
 */
export class HeaderReader {
  private recordsSeen = 0;
  private legacyEntries: Map<string, string> | null = null;

  constructor(private readonly options: HeaderOptions = {}) {}

  accept(input: Buffer): HeaderResult {
    const record = this.recordsSeen === 0 && startsWithBom(input) ? input.subarray(3) : input;
    this.recordsSeen++;
    const text = record.toString('latin1').trim();

    if (this.legacyEntries) {
      if (LEGACY_HEADER_END.test(text)) {
        return this.finishLegacy(this.legacyEntries);
      }
      const separator = text.indexOf('=');
      if (separator > 0) {
        this.legacyEntries.set(text.slice(0, separator).trim(), text.slice(separator + 1).trim());
      }
      return { status: 'pending' };
    }

    if (text === '') {
      return { status: 'pending' };
    }
    if (text.startsWith('/*')) {
      this.legacyEntries = new Map();
      return { status: 'pending' };
    }
    return this.readHdr(record);
  }

  /** Called at end of input while no header has been detected. */
  finish(): never {
    if (this.legacyEntries) {
      throw new FatalFileError(
        'Input ended inside the legacy header block.',
        'UNREADABLE_HEADER',
      );
    }
    throw new FatalFileError('No data to parse.', 'EMPTY_INPUT');
  }

  private readHdr(record: Buffer): HeaderResult {
    const quote = this.options.quote ?? QUOTE;
    const delimiter = this.options.fieldDelimiter ?? detectFieldDelimiter(record);
    const fields: string[] = [];
    try {
      for (const token of tokenize(record, delimiter, quote)) {
        fields.push(tokenBytes(record, token, quote).toString('latin1').trim());
        if (fields.length > HDR_VERSION_POSITION) {
          break;
        }
      }
    } catch (error) {
      if (error instanceof RecordError) {
        throw new FatalFileError(`Unreadable header record: ${error.message}`, 'UNREADABLE_HEADER');
      }
      throw error;
    }

    const isHdr = fields[0]?.toUpperCase() === 'HDR';
    if (this.options.versionOverride) {
      return {
        status: 'detected',
        version: this.options.versionOverride,
        source: 'override',
        consumed: isHdr,
      };
    }
    if (!isHdr) {
      throw new FatalFileError(
        `Expected an HDR header record, found "${fields[0] ?? ''}".`,
        'UNREADABLE_HEADER',
      );
    }
    return {
      status: 'detected',
      version: this.versionFrom(fields[HDR_VERSION_POSITION]),
      source: 'hdr',
      consumed: true,
    };
  }

  private finishLegacy(entries: Map<string, string>): HeaderResult {
    this.legacyEntries = null;
    if (this.options.versionOverride) {
      return {
        status: 'detected',
        version: this.options.versionOverride,
        source: 'override',
        consumed: true,
      };
    }
    const key = [...entries.keys()].find((k) => LEGACY_VERSION_KEY.test(k));
    return {
      status: 'detected',
      version: this.versionFrom(key === undefined ? undefined : entries.get(key)),
      source: 'legacy',
      consumed: true,
    };
  }

  private versionFrom(value: string | undefined): FilingVersion {
    if (value === undefined || value === '') {
      throw new FatalFileError('Header does not declare a filing version.', 'MISSING_VERSION');
    }
    const version = parseFilingVersion(value);
    if (!version) {
      throw new FatalFileError(`Unreadable filing version "${value}".`, 'UNREADABLE_HEADER');
    }
    return version;
  }
}

function startsWithBom(record: Buffer): boolean {
  return record.length >= 3 && record.subarray(0, 3).equals(UTF8_BOM);
}
