import { describe, it, expect } from 'vitest';
import { RecordError } from '../../src/errors.js';
import { buildRow, failureOutcome } from '../../src/parsers/rowBuilder.js';
import { COMMA, QUOTE, tokenize } from '../../src/parsers/tokenizer.js';
import type { EncodingMode, ParseOutcome, Schema } from '../../src/types.js';
import { REPLACEMENT_CHARACTER } from '../../src/utils/encoding.js';
import { createTestRegistry, fieldsOf, schemaOf } from '../helpers.js';

const registry = createTestRegistry();
const sa = schemaOf(registry, '8.0', 'SA');

function build(input: string | Buffer, schema: Schema = sa, encoding: EncodingMode = 'utf-8'): ParseOutcome {
  const record = typeof input === 'string' ? Buffer.from(input, 'latin1') : input;
  const tokens = tokenize(record, COMMA);
  const first = tokens.next();
  if (first.done) {
    throw new Error('record has no fields');
  }
  return buildRow(record, first.value, tokens, schema, { formType: 'SA', index: 4, encoding, quote: QUOTE });
}

describe('buildRow', () => {
  it('should convert every column of a complete record', () => {
    const outcome = build('SA,C001,"Smith, John",20240115,250.00,X');
    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.degradedFields).toBe(0);
    expect(outcome.record.index).toBe(4);
    expect(outcome.record.schema).toBe(sa);
    expect(fieldsOf(outcome.record)).toEqual({
      form_type: 'SA',
      filer_committee_id_number: 'C001',
      contributor_name: 'Smith, John',
      contribution_date: '2024-01-15',
      contribution_amount: '250.00',
      memo_code: true,
    });
  });

  it('should ignore fields past the last column', () => {
    const outcome = build('SA,C001,Smith,20240115,250.00,X,extra1,extra2');
    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect([...outcome.record.fields.keys()]).toHaveLength(6);
  });

  it('should never scan fields past the last column', () => {
    expect(build('SA,C001,Smith,20240115,250.00,X,"never closed').status).toBe('success');
  });

  it('should default optional columns the record is too short for', () => {
    const outcome = build('SA,C001,Smith,20240115,250.00');
    if (outcome.status !== 'success') throw new Error(outcome.message);
    expect(outcome.record.fields.get('memo_code')).toBe(false);
  });

  it('should store empty non-text fields as null', () => {
    const outcome = build('SA,C001,Smith,,250.00,');
    if (outcome.status !== 'success') throw new Error(outcome.message);
    expect(outcome.record.fields.get('contribution_date')).toBeNull();
    expect(outcome.record.fields.get('memo_code')).toBeNull();
  });

  it('should skip records missing a required column', () => {
    expect(build('SA,C001,Smith')).toEqual({
      status: 'skipped',
      reason: 'missing required field',
      index: 4,
      formType: 'SA',
      column: 'contribution_amount',
      message: 'Missing required field "contribution_amount" (record has 3 fields).',
    });
  });

  it('should skip records with an unreadable value', () => {
    expect(build('SA,C001,Smith,20240115,abc,X')).toMatchObject({
      status: 'skipped',
      reason: 'invalid field value',
      column: 'contribution_amount',
      value: 'abc',
    });
  });

  it('should report an unterminated quote as fatal for the record', () => {
    expect(build('SA,C001,"Smith,20240115')).toMatchObject({ status: 'fatal', reason: 'unterminated quote', index: 4 });
  });

  it('should count fields that needed replacement characters', () => {
    const record = Buffer.concat([Buffer.from('SA,C001,'), Buffer.from([0xe9]), Buffer.from(',20240115,1')]);
    const utf8 = build(record);
    if (utf8.status !== 'success') throw new Error(utf8.message);
    expect(utf8.degradedFields).toBe(1);
    expect(utf8.record.fields.get('contributor_name')).toBe(REPLACEMENT_CHARACTER);

    const latin1 = build(record, sa, 'latin1');
    if (latin1.status !== 'success') throw new Error(latin1.message);
    expect(latin1.degradedFields).toBe(0);
    expect(latin1.record.fields.get('contributor_name')).toBe('é');
  });
});

describe('failureOutcome', () => {
  it('should mark classification failures as fatal', () => {
    const outcome = failureOutcome(new RecordError('Unknown form type "ZZ".', 'unknown form type', undefined, 'ZZ'), 2);
    expect(outcome).toEqual({
      status: 'fatal',
      reason: 'unknown form type',
      index: 2,
      value: 'ZZ',
      message: 'Unknown form type "ZZ".',
    });
  });

  it('should mark field failures as skipped', () => {
    const outcome = failureOutcome(new RecordError('bad', 'invalid field value', 'amount', 'x'), 3, 'SB');
    expect(outcome.status).toBe('skipped');
  });
});
