import { RecordError } from '../errors.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import type { FilingVersion, FormType, Schema } from '../types.js';

export interface Classification {
  /** The code as written in the record, trimmed and upper-cased. */
  code: FormType;
  schema: Schema;
}

/**
 * Maps form-type codes to schemas for one filing version.
 *
 * Sub-type codes resolve to the longest registered form type they start
 * with, e.g. "SA11AI" to SA and "F3N" to F3. Schemas are cached per
 * registered form type, so the cache never outgrows the registry.
 */
export class RecordClassifier {
  private readonly formTypes: FormType[];
  private readonly schemas = new Map<FormType, Schema>();

  constructor(
    private readonly registry: SchemaRegistry,
    readonly version: FilingVersion,
  ) {
    this.formTypes = registry.formTypes(version).sort((a, b) => b.length - a.length);
  }

  get cacheSize(): number {
    return this.schemas.size;
  }

  classify(rawCode: string): Classification {
    const code = rawCode.trim().toUpperCase();
    if (code === '') {
      throw new RecordError('Record has an empty form type.', 'unknown form type');
    }
    const formType = this.formTypes.find((ft) => code.startsWith(ft));
    if (formType === undefined) {
      throw new RecordError(`Unknown form type "${code}".`, 'unknown form type', undefined, code);
    }
    return { code, schema: this.schemaFor(formType, code) };
  }

  private schemaFor(formType: FormType, code: FormType): Schema {
    let schema = this.schemas.get(formType);
    if (!schema) {
      schema = this.registry.resolve(this.version, formType);
      if (!schema) {
        throw new RecordError(
          `No schema for form type "${formType}" at version ${this.version.raw}.`,
          'schema not found',
          undefined,
          code,
        );
      }
      this.schemas.set(formType, schema);
    }
    return schema;
  }
}

/**
 * One-off classification of a record's first field.
 */
export function classify(
  firstField: string,
  version: FilingVersion,
  registry: SchemaRegistry,
): Classification {
  return new RecordClassifier(registry, version).classify(firstField);
}
