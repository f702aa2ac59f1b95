import { RecordError } from '../errors.js';
import { normalize } from '../utils/encoding.js';
import { convertValue, defaultValueFor } from '../utils/normalization.js';
import type {
  EncodingMode,
  FieldValue,
  FormType,
  ParseOutcome,
  RecordFailure,
  RecordFailureReason,
  Schema,
} from '../types.js';
import { tokenBytes } from './tokenizer.js';
import type { Token } from './tokenizer.js';

export interface RowContext {
  /** Raw form-type code the record is classified under. */
  formType: FormType;
  /** 1-based data record index. */
  index: number;
  encoding: EncodingMode;
  quote: number;
}

const FATAL_REASONS: ReadonlySet<RecordFailureReason> = new Set([
  'unterminated quote',
  'unknown form type',
  'schema not found',
]);

/**
 * Turns a RecordError into the outcome of the record it was raised for.
 */
export function failureOutcome(
  error: RecordError,
  index: number,
  formType?: FormType,
): ParseOutcome {
  const failure: RecordFailure = {
    reason: error.reason,
    index,
    message: error.message,
    ...(formType !== undefined ? { formType } : {}),
    ...(error.column !== undefined ? { column: error.column } : {}),
    ...(error.value !== undefined ? { value: error.value } : {}),
  };
  return FATAL_REASONS.has(error.reason)
    ? { status: 'fatal', ...failure }
    : { status: 'skipped', ...failure };
}

/**
 * Zips the tokens of one record with the columns of its schema.
 *
 * `tokens` continues after `first`, which the classifier already read.
 * Columns past the end of the record get their kind's default unless they
 * are required; tokens past the last column are never scanned.
 */
export function buildRow(
  record: Buffer,
  first: Token,
  tokens: Iterator<Token>,
  schema: Schema,
  context: RowContext,
): ParseOutcome {
  const fields = new Map<string, FieldValue>();
  let degradedFields = 0;
  let fieldCount = 1;
  let exhausted = false;

  try {
    for (const column of schema.columns) {
      let token: Token | undefined;
      if (column.position === 0) {
        token = first;
      } else if (!exhausted) {
        const next = tokens.next();
        if (next.done) {
          exhausted = true;
        } else {
          token = next.value;
          fieldCount++;
        }
      }

      if (token === undefined) {
        if (column.required) {
          throw new RecordError(
            `Missing required field "${column.name}" (record has ${fieldCount} fields).`,
            'missing required field',
            column.name,
          );
        }
        fields.set(column.name, defaultValueFor(column.kind));
        continue;
      }

      // Decoding copies the bytes out of the record buffer.
      const decoded = normalize(tokenBytes(record, token, context.quote), context.encoding);
      if (decoded.degraded) {
        degradedFields++;
      }
      fields.set(column.name, convertValue(column, decoded.text));
    }
  } catch (error) {
    if (error instanceof RecordError) {
      return failureOutcome(error, context.index, context.formType);
    }
    throw error;
  }

  return {
    status: 'success',
    record: { formType: context.formType, schema, index: context.index, fields },
    degradedFields,
  };
}
