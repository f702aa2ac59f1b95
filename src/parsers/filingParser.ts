import { Transform } from 'node:stream';
import type { TransformCallback } from 'node:stream';
import { FatalFileError, RecordError } from '../errors.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import { formatVersion, parseFilingVersion } from '../schemas/version.js';
import type {
  CoordinatorState,
  EncodingMode,
  FilingOptions,
  FilingSummary,
  FilingVersion,
  ParseOutcome,
  SkippedRecordEntry,
  StructuredRecord,
} from '../types.js';
import { createDebugLogger } from '../utils/debug.js';
import { encodingForVersion, normalize } from '../utils/encoding.js';
import { RecordClassifier } from './classifier.js';
import { HeaderReader, isBlankRecord } from './header.js';
import { RecordBuffer } from './recordBuffer.js';
import { buildRow, failureOutcome } from './rowBuilder.js';
import { detectFieldDelimiter, QUOTE, tokenBytes, tokenize } from './tokenizer.js';

const debugLog = createDebugLogger('FILING_DEBUG');

const DEFAULT_MAX_SKIP_DETAILS = 1000;
const DEFAULT_MAX_TEXT_BLOCK_BYTES = 1024 * 1024;
// A line inside a text block is only tried as a data record when its first
// field looks like a form-type code.
const FORM_CODE = /^[A-Z][A-Z0-9]*$/i;
const TEXT_BEGIN = /^\[BEGIN ?TEXT\]$/i;
const TEXT_END = /^\[END ?TEXT\]$/i;
const TEXT_COLUMN = 'text';

function emptySummary(filingId: string | null): FilingSummary {
  return {
    filingId,
    version: null,
    state: 'start',
    totalRecords: 0,
    succeeded: 0,
    skipped: { total: 0, reasons: {}, records: [] },
    fatal: [],
    degradedFields: 0,
    formTypes: {},
    unwritten: 0,
    cancelled: false,
  };
}

function toBuffer(chunk: unknown, encoding: BufferEncoding): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, encoding);
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  throw new TypeError(`FilingParser expects bytes, received ${typeof chunk}.`);
}

interface TextBlock {
  lines: string[];
  bytes: number;
  /** Index of the last data record before the block, 0 when there is none. */
  after: number;
}

function matchesMarker(record: Buffer, marker: RegExp): boolean {
  // Markers are short; skip the decode for ordinary records.
  if (record.length > 32) {
    return false;
  }
  return marker.test(record.toString('latin1').trim());
}

/**
 * Drives one filing through header detection, tokenizing, classification
 * and row building.
 *
 * Writable side takes raw bytes, readable side yields StructuredRecords.
 * A record that cannot be built is counted in `summary` and dropped; only a
 * header failure (or an unsupported version) errors the stream, with a
 * FatalFileError.
 *
 * The most recent record is held back until the next non-empty record,
 * because a `[BEGIN TEXT]` block that follows belongs in its text column.
 * A block missing its `[END TEXT]` ends at the first line that builds as a
 * data record, or once it exceeds `maxTextBlockBytes`, and is reported in the
 * summary. Records count as succeeded when they are passed on.
 */
export class FilingParser extends Transform {
  private state: CoordinatorState = 'start';
  private readonly records: RecordBuffer;
  private readonly header: HeaderReader;
  private readonly quote: number;
  private readonly maxSkipDetails: number;
  private readonly maxTextBlockBytes: number;
  private readonly result: FilingSummary;

  private version?: FilingVersion;
  private encoding: EncodingMode = 'latin1';
  private classifier?: RecordClassifier;
  private held?: StructuredRecord;
  private textBlock: TextBlock | null = null;
  private built = 0;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly options: FilingOptions = {},
  ) {
    super({ writableObjectMode: false, readableObjectMode: true });
    this.quote = options.quote ?? QUOTE;
    this.maxSkipDetails = options.maxSkipDetails ?? DEFAULT_MAX_SKIP_DETAILS;
    this.maxTextBlockBytes = options.maxTextBlockBytes ?? DEFAULT_MAX_TEXT_BLOCK_BYTES;
    this.records = new RecordBuffer(options.recordDelimiter);
    this.result = emptySummary(options.filingId ?? null);

    let versionOverride: FilingVersion | undefined;
    if (options.versionOverride !== undefined) {
      versionOverride = parseFilingVersion(options.versionOverride);
      if (!versionOverride) {
        throw new Error(`Invalid filing version override "${options.versionOverride}".`);
      }
    }
    this.header = new HeaderReader({
      versionOverride,
      fieldDelimiter: options.fieldDelimiter,
      quote: this.quote,
    });
    debugLog('FilingParser instantiated. Options:', options);
  }

  /** A snapshot of the counts so far. */
  get summary(): FilingSummary {
    return {
      ...this.result,
      state: this.state,
      skipped: {
        total: this.result.skipped.total,
        reasons: { ...this.result.skipped.reasons },
        records: [...this.result.skipped.records],
      },
      fatal: [...this.result.fatal],
      formTypes: { ...this.result.formTypes },
    };
  }

  get currentState(): CoordinatorState {
    return this.state;
  }

  get filingVersion(): FilingVersion | undefined {
    return this.version;
  }

  /** Successful records built so far, including any not yet passed on. */
  get recordsBuilt(): number {
    return this.built;
  }

  /** Records a file-level failure that happened around this parser. */
  recordFatal(error: FatalFileError): void {
    if (!this.result.fatal.some((f) => f.message === error.message)) {
      this.result.fatal.push({ code: error.fatalCode, message: error.message });
    }
    error.summary = this.summary;
  }

  _transform(chunk: unknown, encoding: BufferEncoding, callback: TransformCallback): void {
    try {
      const bytes = toBuffer(chunk, encoding);
      for (const record of this.records.push(bytes)) {
        this.handleRecord(record);
      }
      callback();
    } catch (error) {
      callback(this.toStreamError(error));
    }
  }

  _flush(callback: TransformCallback): void {
    try {
      const last = this.records.flush();
      if (last) {
        this.handleRecord(last);
      }
      if (this.state === 'start') {
        this.header.finish();
      }
      if (this.textBlock) {
        this.closeTextBlock('input ended');
      }
      this.releaseHeld();
      this.state = 'done';
      debugLog('FilingParser flush complete.', this.result.totalRecords, 'records');
      this.emit('summary', this.summary);
      callback();
    } catch (error) {
      callback(this.toStreamError(error));
    }
  }

  private toStreamError(error: unknown): Error {
    if (error instanceof FatalFileError) {
      this.recordFatal(error);
      return error;
    }
    return error instanceof Error ? error : new Error(String(error));
  }

  private handleRecord(record: Buffer): void {
    if (this.state === 'start' || this.state === 'versionDetected') {
      const header = this.header.accept(record);
      if (header.status === 'pending') {
        return;
      }
      this.startStreaming(header.version);
      if (header.consumed) {
        return;
      }
    }

    const block = this.textBlock;
    if (block) {
      if (matchesMarker(record, TEXT_END)) {
        this.closeTextBlock();
        return;
      }
      const outcome = this.looksLikeRecord(record)
        ? this.buildRecord(record, this.result.totalRecords + 1)
        : undefined;
      if (outcome?.status === 'success') {
        this.closeTextBlock(`record ${outcome.record.index} started`);
        this.result.totalRecords++;
        this.accept(outcome);
        return;
      }
      if (block.bytes + record.length <= this.maxTextBlockBytes) {
        this.appendText(block, record);
        return;
      }
      this.closeTextBlock(`it exceeded ${this.maxTextBlockBytes} bytes`);
    }

    if (isBlankRecord(record)) {
      return;
    }
    if (matchesMarker(record, TEXT_BEGIN)) {
      this.textBlock = { lines: [], bytes: 0, after: this.result.totalRecords };
      return;
    }
    this.accept(this.processRecord(record));
  }

  private startStreaming(version: FilingVersion): void {
    this.state = 'versionDetected';
    if (!this.registry.hasVersionAtOrBefore(version)) {
      throw new FatalFileError(
        `No schemas are registered for filing version ${version.raw} or earlier.`,
        'UNSUPPORTED_VERSION',
      );
    }
    this.version = version;
    this.encoding = encodingForVersion(version, this.options.encodingOverride);
    this.classifier = new RecordClassifier(this.registry, version);
    this.result.version = formatVersion(version);
    this.state = 'streaming';
    debugLog(`Detected version ${version.raw}; decoding fields as ${this.encoding}.`);
  }

  private processRecord(record: Buffer): ParseOutcome {
    return this.buildRecord(record, ++this.result.totalRecords);
  }

  private buildRecord(record: Buffer, index: number): ParseOutcome {
    const classifier = this.classifier;
    if (!classifier) {
      throw new Error('Records cannot be processed before the filing version is known.');
    }

    const delimiter = this.options.fieldDelimiter ?? detectFieldDelimiter(record);
    const tokens = tokenize(record, delimiter, this.quote);
    try {
      const first = tokens.next();
      if (first.done) {
        throw new RecordError('Record has no fields.', 'unknown form type');
      }
      const code = normalize(tokenBytes(record, first.value, this.quote), this.encoding).text;
      const { code: formType, schema } = classifier.classify(code);
      return buildRow(record, first.value, tokens, schema, {
        formType,
        index,
        encoding: this.encoding,
        quote: this.quote,
      });
    } catch (error) {
      if (error instanceof RecordError) {
        return failureOutcome(error, index);
      }
      throw error;
    }
  }

  private looksLikeRecord(record: Buffer): boolean {
    const delimiter = this.options.fieldDelimiter ?? detectFieldDelimiter(record);
    const end = record.indexOf(delimiter);
    if (end <= 0) {
      return false;
    }
    return FORM_CODE.test(record.subarray(0, end).toString('latin1').trim());
  }

  private accept(outcome: ParseOutcome): void {
    this.releaseHeld();
    this.count(outcome);
    if (outcome.status === 'success') {
      this.held = outcome.record;
    }
  }

  private count(outcome: ParseOutcome): void {
    if (outcome.status === 'success') {
      this.built++;
      this.result.degradedFields += outcome.degradedFields;
      return;
    }
    const { status, ...failure } = outcome;
    this.recordFailure({ severity: status, ...failure });
  }

  private recordFailure(entry: SkippedRecordEntry): void {
    const skipped = this.result.skipped;
    skipped.total++;
    skipped.reasons[entry.reason] = (skipped.reasons[entry.reason] ?? 0) + 1;
    if (skipped.records.length < this.maxSkipDetails) {
      skipped.records.push(entry);
    }
    debugLog(`Record ${entry.index} ${entry.severity}: ${entry.message}`);
    this.emit('skipped', entry);
  }

  private appendText(block: TextBlock, record: Buffer): void {
    const decoded = normalize(record, this.encoding);
    if (decoded.degraded) {
      this.result.degradedFields++;
    }
    block.lines.push(decoded.text);
    block.bytes += record.length;
  }

  /**
   * Stores the block in the held record's text column. `unterminatedBy`
   * names what ended a block that never reached `[END TEXT]`.
   */
  private closeTextBlock(unterminatedBy?: string): void {
    const block = this.textBlock;
    if (!block) {
      return;
    }
    this.textBlock = null;
    const lines = `${block.lines.length} line${block.lines.length === 1 ? '' : 's'}`;

    if (unterminatedBy !== undefined) {
      this.recordFailure({
        severity: 'skipped',
        reason: 'unterminated text block',
        index: block.after,
        message: `Text block after record ${block.after} has no [END TEXT]; it ended when ${unterminatedBy}, after ${lines}.`,
      });
    }

    const held = this.held;
    if (held && held.schema.columns.some((c) => c.name === TEXT_COLUMN)) {
      held.fields.set(TEXT_COLUMN, block.lines.join('\n'));
      return;
    }
    this.recordFailure({
      severity: 'skipped',
      reason: 'unattached text block',
      index: block.after,
      message: `Dropped a text block of ${lines} after record ${block.after}: no preceding record with a text column.`,
    });
  }

  private releaseHeld(): void {
    const held = this.held;
    if (!held) {
      return;
    }
    this.held = undefined;
    this.result.succeeded++;
    this.result.formTypes[held.formType] = (this.result.formTypes[held.formType] ?? 0) + 1;
    this.push(held);
  }
}
