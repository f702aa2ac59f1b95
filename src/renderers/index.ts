import type { FilingOptions } from '../types.js';
import { FormTypeWriter } from './formTypeWriter.js';
import type { OutputSinkFactory } from './renderer.types.js';

export function createFormTypeWriter(
  createSink: OutputSinkFactory,
  options: FilingOptions = {},
): FormTypeWriter {
  return new FormTypeWriter(createSink, {
    bufferSize: options.bufferSize,
    filingId: options.filingId,
    includeFilingId: options.includeFilingId,
  });
}

export { CsvEmitter, formatValue, DEFAULT_BUFFER_SIZE, FILING_ID_COLUMN } from './csvEmitter.js';
export { FormTypeWriter } from './formTypeWriter.js';
export type { OutputFailure } from './formTypeWriter.js';
export { createDirectorySinkFactory, CSV_EXTENSION } from './fileSinks.js';
export type { OutputSinkFactory } from './renderer.types.js';
