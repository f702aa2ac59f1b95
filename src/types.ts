export const COLUMN_KINDS = [
  'text',
  'integer',
  'decimal',
  'date',
  'boolean',
  'enumerated',
] as const; // Keep this as a source of truth
export type ColumnKind = (typeof COLUMN_KINDS)[number];

export const ENCODING_MODES = ['latin1', 'utf-8', 'auto'] as const;
export type EncodingMode = (typeof ENCODING_MODES)[number];

export interface FilingVersion {
  readonly major: number;
  readonly minor: number;
  /** The version exactly as written in the header, e.g. "3.00". */
  readonly raw: string;
}

export type FormType = string;

export interface ColumnSpec {
  readonly name: string;
  readonly position: number;
  readonly kind: ColumnKind;
  readonly required: boolean;
  /** Allowed codes of an enumerated column. */
  readonly values?: readonly string[];
}

export interface Schema {
  readonly version: FilingVersion;
  readonly formType: FormType;
  readonly columns: readonly ColumnSpec[];
}

export type FieldValue = string | number | boolean | null;

export interface StructuredRecord {
  /** Raw form-type code of the record, e.g. "SA11AI". Output streams are keyed by it. */
  formType: FormType;
  schema: Schema;
  /** 1-based position among the data records of the filing. */
  index: number;
  fields: Map<string, FieldValue>;
}

export type RecordFailureReason =
  | 'unterminated quote'
  | 'unknown form type'
  | 'schema not found'
  | 'missing required field'
  | 'invalid field value'
  | 'unterminated text block'
  | 'unattached text block';

export interface RecordFailure {
  reason: RecordFailureReason;
  index: number;
  formType?: FormType;
  column?: string;
  value?: string;
  message: string;
}

export type ParseOutcome =
  | { status: 'success'; record: StructuredRecord; degradedFields: number }
  | ({ status: 'skipped' } & RecordFailure)
  | ({ status: 'fatal' } & RecordFailure);

export type CoordinatorState = 'start' | 'versionDetected' | 'streaming' | 'done';

export interface SkippedRecordEntry extends RecordFailure {
  severity: 'skipped' | 'fatal';
}

export interface FatalFileEntry {
  code: string;
  message: string;
}

export interface FilingSummary {
  filingId: string | null;
  version: string | null;
  state: CoordinatorState;
  totalRecords: number;
  succeeded: number;
  skipped: {
    total: number;
    reasons: Partial<Record<RecordFailureReason, number>>;
    /** Details of the first `maxSkipDetails` failures. */
    records: SkippedRecordEntry[];
  };
  fatal: FatalFileEntry[];
  degradedFields: number;
  /** Successful records per raw form type. */
  formTypes: Record<string, number>;
  /** Records built but never written because the run was cancelled. */
  unwritten: number;
  cancelled: boolean;
}

export interface FilingOptions {
  versionOverride?: string;
  encodingOverride?: EncodingMode;
  /** Field delimiter byte; auto-detected per record when absent. */
  fieldDelimiter?: number;
  /** Record delimiter byte, "\n" when absent. */
  recordDelimiter?: number;
  quote?: number;
  filingId?: string;
  /** Adds a leading filing_id column to every output stream. */
  includeFilingId?: boolean;
  /** Bytes each output stream buffers before writing to its sink. */
  bufferSize?: number;
  maxSkipDetails?: number;
  /** Bytes a text block may hold before it is closed as unterminated. */
  maxTextBlockBytes?: number;
}
