import { RecordError } from '../errors.js';

export const ASCII28 = 0x1c;
export const COMMA = 0x2c;
export const QUOTE = 0x22;

/**
 * A field cut from a record buffer. Offsets point into that buffer, so a
 * token is only meaningful while its record is being processed; use
 * `tokenBytes` to get the field's value.
 */
export interface Token {
  /** Position of the field within the record, starting at 0. */
  readonly index: number;
  /** Byte offsets of the raw field, delimiter excluded. */
  readonly start: number;
  readonly end: number;
  /** Offset of the closing quote of a quoted field, -1 for bare fields. */
  readonly closingQuote: number;
  readonly hasEscapedQuotes: boolean;
}

/**
 * Records containing ASCII 28 are split on it, all others on commas.
 */
export function detectFieldDelimiter(record: Buffer): number {
  return record.includes(ASCII28) ? ASCII28 : COMMA;
}

/**
 * Pull-based tokenizer over one record. Each `next()` scans exactly one
 * field, so a caller can stop after the fields it needs.
 *
 * A field that starts with the quote byte runs to the matching closing
 * quote; delimiters and line breaks inside it are literal and a doubled
 * quote stands for one quote. Bytes between the closing quote and the next
 * delimiter stay part of the field.
 */
export class FieldTokenizer implements IterableIterator<Token> {
  private position = 0;
  private count = 0;
  private finished = false;

  constructor(
    private readonly record: Buffer,
    private readonly delimiter: number,
    private readonly quote: number = QUOTE,
  ) {}

  get tokensRead(): number {
    return this.count;
  }

  get done(): boolean {
    return this.finished;
  }

  next(): IteratorResult<Token> {
    if (this.finished) {
      return { done: true, value: undefined };
    }
    const { record, delimiter, quote } = this;
    const start = this.position;
    let closingQuote = -1;
    let hasEscapedQuotes = false;
    let searchFrom = start;

    if (start < record.length && record[start] === quote) {
      let i = start + 1;
      for (;;) {
        const found = record.indexOf(quote, i);
        if (found === -1) {
          this.finished = true;
          throw new RecordError(
            `Unterminated quote in field ${this.count + 1} starting at byte ${start}`,
            'unterminated quote',
          );
        }
        if (record[found + 1] === quote) {
          hasEscapedQuotes = true;
          i = found + 2;
          continue;
        }
        closingQuote = found;
        break;
      }
      searchFrom = closingQuote + 1;
    }

    const delimiterAt = record.indexOf(delimiter, searchFrom);
    const end = delimiterAt === -1 ? record.length : delimiterAt;
    if (delimiterAt === -1) {
      this.finished = true;
    } else {
      this.position = delimiterAt + 1;
    }

    const token: Token = { index: this.count, start, end, closingQuote, hasEscapedQuotes };
    this.count++;
    return { done: false, value: token };
  }

  [Symbol.iterator](): IterableIterator<Token> {
    return this;
  }
}

export function tokenize(record: Buffer, delimiter: number, quote: number = QUOTE): FieldTokenizer {
  return new FieldTokenizer(record, delimiter, quote);
}

/**
 * Value bytes of a token with quoting removed. Bare fields are returned as a
 * view into the record; decode or copy them before the record goes away.
 */
export function tokenBytes(record: Buffer, token: Token, quote: number = QUOTE): Buffer {
  if (token.closingQuote === -1) {
    return record.subarray(token.start, token.end);
  }
  const inner = record.subarray(token.start + 1, token.closingQuote);
  const trailing = record.subarray(token.closingQuote + 1, token.end);
  if (!token.hasEscapedQuotes) {
    return trailing.length === 0 ? inner : Buffer.concat([inner, trailing]);
  }

  const out = Buffer.allocUnsafe(inner.length + trailing.length);
  let length = 0;
  for (let i = 0; i < inner.length; i++) {
    out[length++] = inner[i];
    if (inner[i] === quote && inner[i + 1] === quote) {
      i++;
    }
  }
  length += trailing.copy(out, length);
  return out.subarray(0, length);
}
