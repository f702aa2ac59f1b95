import { describe, it, expect, beforeEach } from 'vitest';
import { CsvEmitter, formatValue } from '../../src/renderers/csvEmitter.js';
import type { StructuredRecord } from '../../src/types.js';
import { createTestRegistry, makeRecord, MemorySink, schemaOf } from '../helpers.js';

const sa = schemaOf(createTestRegistry(), '8.0', 'SA');

const header = 'form_type,filer_committee_id_number,contributor_name,contribution_date,contribution_amount,memo_code\n';
const firstLine = 'SA,C001,"Smith, John",2024-01-15,250.00,true\n';
const secondLine = 'SA,C001,Jones,,5,false\n';

const first: StructuredRecord = makeRecord(sa, {
  form_type: 'SA',
  filer_committee_id_number: 'C001',
  contributor_name: 'Smith, John',
  contribution_date: '2024-01-15',
  contribution_amount: '250.00',
  memo_code: true,
});
const second: StructuredRecord = makeRecord(
  sa,
  {
    form_type: 'SA',
    filer_committee_id_number: 'C001',
    contributor_name: 'Jones',
    contribution_date: null,
    contribution_amount: '5',
    memo_code: false,
  },
  'SA',
  2,
);

describe('CsvEmitter', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = new MemorySink();
  });

  it('should write the header line once, before the first row', async () => {
    const emitter = new CsvEmitter(sink);
    expect(emitter.emit(first)).toBe(header + firstLine);
    expect(emitter.emit(second)).toBe(secondLine);
    expect(emitter.rows).toBe(2);
    await emitter.end();
    expect(sink.text).toBe(header + firstLine + secondLine);
  });

  it('should hold lines until the buffer fills', async () => {
    const emitter = new CsvEmitter(sink);
    emitter.emit(first);
    emitter.emit(second);
    expect(sink.chunks).toEqual([]);
    expect(emitter.shouldFlush).toBe(false);
    expect(emitter.bufferedBytes).toBe(Buffer.byteLength(header + firstLine + secondLine));
    await emitter.end();
    expect(sink.chunks).toEqual([header + firstLine + secondLine]);
  });

  it('should write whole lines as soon as the buffer size is reached', async () => {
    const emitter = new CsvEmitter(sink, { bufferSize: 0 });
    emitter.emit(first);
    expect(emitter.shouldFlush).toBe(true);
    await emitter.flush();
    expect(sink.chunks).toEqual([header + firstLine]);
    expect(emitter.shouldFlush).toBe(false);
    expect(emitter.bufferedBytes).toBe(0);
  });

  it('should lead every line with the filing id when asked', () => {
    const emitter = new CsvEmitter(sink, { filingId: 'FIL123', includeFilingId: true });
    expect(emitter.emit(first)).toBe(`filing_id,${header}FIL123,${firstLine}`);
  });

  it('should leave the filing id out by default', () => {
    const emitter = new CsvEmitter(sink, { filingId: 'FIL123' });
    expect(emitter.headerLine(sa)).toBe(header);
  });

  it('should write an empty value for fields the record lacks', () => {
    const partial = makeRecord(sa, { form_type: 'SA', contribution_amount: '1' });
    expect(new CsvEmitter(sink).formatRecord(partial)).toBe('SA,,,,1,\n');
  });

  it('should refuse records after it has ended', async () => {
    const emitter = new CsvEmitter(sink);
    await emitter.end();
    expect(() => emitter.emit(first)).toThrow('Cannot emit record 1: the SA stream has ended.');
  });

  it('should end the sink once even when called twice', async () => {
    const emitter = new CsvEmitter(sink);
    emitter.emit(first);
    await emitter.end();
    await emitter.end();
    expect(sink.writableFinished).toBe(true);
    expect(sink.chunks).toEqual([header + firstLine]);
  });
});

describe('formatValue', () => {
  it('should render every field value as text', () => {
    expect(formatValue(null)).toBe('');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(false)).toBe('false');
    expect(formatValue(42)).toBe('42');
    expect(formatValue('0.00')).toBe('0.00');
  });
});
