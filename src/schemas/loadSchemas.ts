import { readFileSync } from 'node:fs';
import { Ajv } from 'ajv';
import { COLUMN_KINDS } from '../types.js';
import type { ColumnKind, ColumnSpec } from '../types.js';
import { SchemaRegistry } from './registry.js';
import { parseFilingVersion } from './version.js';

export interface SchemaFileColumn {
  name: string;
  kind: ColumnKind;
  required?: boolean;
  values?: string[];
}

export interface SchemaFileVersion {
  version: string;
  forms: Record<string, SchemaFileColumn[]>;
}

export interface SchemaFile {
  versions: SchemaFileVersion[];
}

export const DEFAULT_SCHEMA_FILE = new URL('../../data/filingSchemas.json', import.meta.url);

const schemaFileSchema = {
  type: 'object',
  required: ['versions'],
  additionalProperties: false,
  properties: {
    versions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['version', 'forms'],
        additionalProperties: false,
        properties: {
          version: { type: 'string', pattern: '^\\d+(\\.\\d+)?$' },
          forms: {
            type: 'object',
            additionalProperties: {
              type: 'array',
              minItems: 1,
              items: {
                type: 'object',
                required: ['name', 'kind'],
                additionalProperties: false,
                properties: {
                  name: { type: 'string', minLength: 1 },
                  kind: { enum: [...COLUMN_KINDS] },
                  required: { type: 'boolean' },
                  values: { type: 'array', items: { type: 'string' }, minItems: 1 },
                },
              },
            },
          },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateSchemaFile = ajv.compile<SchemaFile>(schemaFileSchema);

/**
 * Checks raw JSON against the schema-file layout and registers every
 * (version, form type) layout it declares.
 */
export function registerSchemaFile(registry: SchemaRegistry, data: unknown): SchemaRegistry {
  if (!validateSchemaFile(data)) {
    throw new Error(`Invalid schema file: ${ajv.errorsText(validateSchemaFile.errors)}`);
  }
  for (const entry of data.versions) {
    const version = parseFilingVersion(entry.version);
    if (!version) {
      throw new Error(`Invalid schema file: unreadable version "${entry.version}".`);
    }
    for (const [formType, columns] of Object.entries(entry.forms)) {
      registry.register(version, formType, columns.map(toColumnSpec));
    }
  }
  return registry;
}

export function loadSchemaFile(path: string | URL = DEFAULT_SCHEMA_FILE): SchemaRegistry {
  const data: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return registerSchemaFile(new SchemaRegistry(), data).freeze();
}

let defaultRegistry: SchemaRegistry | undefined;

/** The bundled schema set, loaded once per process and frozen. */
export function createDefaultRegistry(): SchemaRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadSchemaFile();
  }
  return defaultRegistry;
}

function toColumnSpec(column: SchemaFileColumn, position: number): ColumnSpec {
  return {
    name: column.name,
    position,
    kind: column.kind,
    required: column.required ?? false,
    ...(column.values ? { values: column.values.map((v) => v.toUpperCase()) } : {}),
  };
}
