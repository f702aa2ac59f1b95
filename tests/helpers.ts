import { Writable } from 'node:stream';
import type { FilingParser } from '../src/parsers/filingParser.js';
import { registerSchemaFile } from '../src/schemas/loadSchemas.js';
import type { SchemaFile } from '../src/schemas/loadSchemas.js';
import { SchemaRegistry } from '../src/schemas/registry.js';
import { parseFilingVersion } from '../src/schemas/version.js';
import type { FieldValue, FilingVersion, Schema, StructuredRecord } from '../src/types.js';

export const testSchemaFile: SchemaFile = {
  versions: [
    {
      version: '5.0',
      forms: {
        SA: [
          { name: 'form_type', kind: 'text', required: true },
          { name: 'filer_committee_id_number', kind: 'text', required: true },
          { name: 'contributor_name', kind: 'text' },
          { name: 'contribution_amount', kind: 'decimal', required: true },
        ],
      },
    },
    {
      version: '8.0',
      forms: {
        SA: [
          { name: 'form_type', kind: 'text', required: true },
          { name: 'filer_committee_id_number', kind: 'text', required: true },
          { name: 'contributor_name', kind: 'text' },
          { name: 'contribution_date', kind: 'date' },
          { name: 'contribution_amount', kind: 'decimal', required: true },
          { name: 'memo_code', kind: 'boolean' },
        ],
        SB: [
          { name: 'form_type', kind: 'text', required: true },
          { name: 'filer_committee_id_number', kind: 'text', required: true },
          { name: 'payee_name', kind: 'text' },
          { name: 'expenditure_amount', kind: 'decimal' },
          { name: 'election_code', kind: 'enumerated', values: ['P', 'G'] },
        ],
        F3: [
          { name: 'form_type', kind: 'text', required: true },
          { name: 'filer_committee_id_number', kind: 'text', required: true },
          { name: 'committee_name', kind: 'text' },
          { name: 'report_code', kind: 'enumerated', values: ['Q1', 'Q2'] },
          { name: 'total_receipts', kind: 'decimal' },
          { name: 'count_of_items', kind: 'integer' },
        ],
        F3X: [
          { name: 'form_type', kind: 'text', required: true },
          { name: 'filer_committee_id_number', kind: 'text', required: true },
          { name: 'committee_name', kind: 'text' },
        ],
        F99: [
          { name: 'form_type', kind: 'text', required: true },
          { name: 'filer_committee_id_number', kind: 'text', required: true },
          { name: 'text_code', kind: 'text' },
          { name: 'text', kind: 'text' },
        ],
      },
    },
    {
      version: '8.3',
      forms: {
        F3: [
          { name: 'form_type', kind: 'text', required: true },
          { name: 'filer_committee_id_number', kind: 'text', required: true },
          { name: 'committee_name', kind: 'text' },
          { name: 'report_code', kind: 'enumerated', values: ['Q1', 'Q2'] },
          { name: 'total_receipts', kind: 'decimal' },
          { name: 'count_of_items', kind: 'integer' },
          { name: 'cash_on_hand', kind: 'decimal' },
        ],
      },
    },
  ],
};

export function createTestRegistry(): SchemaRegistry {
  return registerSchemaFile(new SchemaRegistry(), testSchemaFile).freeze();
}

export function version(value: string): FilingVersion {
  const parsed = parseFilingVersion(value);
  if (!parsed) {
    throw new Error(`Bad test version ${value}`);
  }
  return parsed;
}

export function schemaOf(registry: SchemaRegistry, at: string, formType: string): Schema {
  const schema = registry.resolve(version(at), formType);
  if (!schema) {
    throw new Error(`No test schema ${formType} at ${at}`);
  }
  return schema;
}

export function makeRecord(
  schema: Schema,
  values: Record<string, FieldValue>,
  formType: string = schema.formType,
  index = 1,
): StructuredRecord {
  return { formType, schema, index, fields: new Map(Object.entries(values)) };
}

/** Collects everything written to it as text. */
export class MemorySink extends Writable {
  readonly chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/** A sink that fails while opening, like a file in a read-only directory. */
export class UnopenableSink extends Writable {
  constructor(private readonly reason = 'EACCES: open failed') {
    super();
  }

  _construct(callback: (error?: Error | null) => void): void {
    callback(new Error(this.reason));
  }

  _write(_chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback();
  }
}

// Helper function to stream bytes into a FilingParser and collect the output
export async function collectRecords(
  parser: FilingParser,
  input: string | Buffer | (string | Buffer)[],
): Promise<{ records: StructuredRecord[]; error?: Error }> {
  const records: StructuredRecord[] = [];
  return new Promise((resolve) => {
    parser.on('data', (record: StructuredRecord) => records.push(record));
    parser.on('error', (error: Error) => resolve({ records, error }));
    parser.on('end', () => resolve({ records }));

    const chunks = Array.isArray(input) ? input : [input];
    for (const chunk of chunks) {
      parser.write(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk);
    }
    parser.end();
  });
}

export function fieldsOf(record: StructuredRecord | undefined): Record<string, FieldValue> {
  return record ? Object.fromEntries(record.fields) : {};
}
