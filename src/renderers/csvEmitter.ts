import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { FieldValue, Schema, StructuredRecord } from '../types.js';
import { toCsvLine } from '../utils/string.js';

export const DEFAULT_BUFFER_SIZE = 64 * 1024;
export const FILING_ID_COLUMN = 'filing_id';

export interface CsvEmitterOptions {
  /** Bytes held before writing to the sink; 0 writes every line at once. */
  bufferSize?: number;
  filingId?: string;
  includeFilingId?: boolean;
}

export function formatValue(value: FieldValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}

/**
 * Writes the CSV stream of one form type: a header line of column names
 * before the first row, then one line per record in schema column order.
 *
 * Lines are collected until `bufferSize` bytes are pending and then handed
 * to the sink together; the sink only ever receives whole lines.
 */
export class CsvEmitter {
  private pending: string[] = [];
  private pendingBytes = 0;
  private headerWritten = false;
  private ended = false;
  private linesWritten = 0;
  private readonly bufferSize: number;
  private readonly filingId: string | undefined;

  constructor(
    private readonly sink: Writable,
    options: CsvEmitterOptions = {},
  ) {
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    if (options.includeFilingId) {
      this.filingId = options.filingId ?? '';
    }
  }

  get rows(): number {
    return this.linesWritten;
  }

  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  get shouldFlush(): boolean {
    return this.pendingBytes > 0 && this.pendingBytes >= this.bufferSize;
  }

  headerLine(schema: Schema): string {
    const names = schema.columns.map((c) => c.name);
    return toCsvLine(this.filingId === undefined ? names : [FILING_ID_COLUMN, ...names]);
  }

  formatRecord(record: StructuredRecord): string {
    const values = record.schema.columns.map((c) => formatValue(record.fields.get(c.name) ?? null));
    return toCsvLine(this.filingId === undefined ? values : [this.filingId, ...values]);
  }

  /**
   * Buffers the escaped line of `record`, preceded by the header line on the
   * first call, and returns the text added to the stream.
   */
  emit(record: StructuredRecord): string {
    if (this.ended) {
      throw new Error(`Cannot emit record ${record.index}: the ${record.formType} stream has ended.`);
    }
    let text = this.formatRecord(record);
    if (!this.headerWritten) {
      text = this.headerLine(record.schema) + text;
      this.headerWritten = true;
    }
    this.pending.push(text);
    this.pendingBytes += Buffer.byteLength(text);
    this.linesWritten++;
    return text;
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    const text = this.pending.join('');
    this.pending = [];
    this.pendingBytes = 0;
    if (!this.sink.write(text)) {
      await once(this.sink, 'drain');
    }
  }

  /** Flushes what is buffered and ends the sink. Safe to call twice. */
  async end(): Promise<void> {
    if (this.ended) {
      return;
    }
    this.ended = true;
    const text = this.pending.join('');
    this.pending = [];
    this.pendingBytes = 0;
    if (text) {
      this.sink.end(text);
    } else {
      this.sink.end();
    }
    await finished(this.sink, { readable: false });
  }
}
