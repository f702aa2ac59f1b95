// src/utils/normalization.ts
import { RecordError } from '../errors.js';
import type { ColumnKind, ColumnSpec, FieldValue } from '../types.js';

const TRUE_VALUES = new Set(['X', 'Y', 'YES', 'T', 'TRUE', '1']);
const FALSE_VALUES = new Set(['N', 'NO', 'F', 'FALSE', '0']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Value stored for a column the record is too short to contain.
 */
export function defaultValueFor(kind: ColumnKind): FieldValue {
  switch (kind) {
    case 'integer':
      return 0;
    case 'decimal':
      return '0.00';
    case 'boolean':
      return false;
    case 'text':
    case 'date':
    case 'enumerated':
      return '';
  }
}

function invalid(column: ColumnSpec, raw: string): RecordError {
  return new RecordError(
    `Invalid ${column.kind} value for column "${column.name}": "${raw}"`,
    'invalid field value',
    column.name,
    raw,
  );
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * Normalizes dates to YYYY-MM-DD.
 * Accepts YYYYMMDD, MM/DD/YYYY and YYYY-MM-DD. Returns undefined otherwise.
 */
export function normalizeDate(value: string): string | undefined {
  let year: string;
  let month: string;
  let day: string;

  // YYYYMMDD
  let parts = value.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (parts) {
    [, year, month, day] = parts;
  } else {
    // MM/DD/YYYY
    parts = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (parts) {
      [, month, day, year] = parts;
    } else {
      // YYYY-MM-DD (already normalized)
      parts = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
      if (!parts) {
        return undefined;
      }
      [, year, month, day] = parts;
    }
  }

  if (!isValidDate(Number(year), Number(month), Number(day))) {
    return undefined;
  }
  return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
}

/**
 * Converts the decoded text of a non-text column to its stored value.
 * An empty value stays empty (`null`); anything unreadable throws a
 * RecordError naming the column and the raw value.
 */
export function convertValue(column: ColumnSpec, raw: string): FieldValue {
  if (column.kind === 'text') {
    return raw;
  }
  const value = raw.trim();
  if (value === '') {
    return null;
  }

  switch (column.kind) {
    case 'integer': {
      if (!INTEGER_PATTERN.test(value)) {
        throw invalid(column, raw);
      }
      const parsed = Number.parseInt(value, 10);
      if (!Number.isSafeInteger(parsed)) {
        throw invalid(column, raw);
      }
      return parsed;
    }
    case 'decimal':
      // Kept as text so amounts are written back without float rounding.
      if (!DECIMAL_PATTERN.test(value)) {
        throw invalid(column, raw);
      }
      return value;
    case 'date': {
      const date = normalizeDate(value);
      if (date === undefined) {
        throw invalid(column, raw);
      }
      return date;
    }
    case 'boolean': {
      const upper = value.toUpperCase();
      if (TRUE_VALUES.has(upper)) return true;
      if (FALSE_VALUES.has(upper)) return false;
      throw invalid(column, raw);
    }
    case 'enumerated': {
      const upper = value.toUpperCase();
      if (!column.values?.includes(upper)) {
        throw invalid(column, raw);
      }
      return upper;
    }
  }
}
