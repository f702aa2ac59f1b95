#!/usr/bin/env node
import { createReadStream, realpathSync } from 'node:fs';
import { basename, extname } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline as streamPipeline } from 'node:stream/promises';
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { errorMessage, FatalFileError } from './errors.js';
import { createFilingParser } from './parsers/index.js';
import { ASCII28 } from './parsers/tokenizer.js';
import { createDirectorySinkFactory, createFormTypeWriter, DEFAULT_BUFFER_SIZE } from './renderers/index.js';
import type { OutputSinkFactory } from './renderers/index.js';
import { createDefaultRegistry } from './schemas/loadSchemas.js';
import type { SchemaRegistry } from './schemas/registry.js';
import { parseFilingVersion } from './schemas/version.js';
import type { EncodingMode, FilingOptions, FilingSummary, SkippedRecordEntry } from './types.js';
import { ENCODING_MODES } from './types.js';
import { createDebugLogger, isDebugMode } from './utils/debug.js';

const debugLog = createDebugLogger('DEBUG');

const NAMED_DELIMITERS: Record<string, number> = {
  ascii28: ASCII28,
  fs: ASCII28,
  '\\x1c': ASCII28,
  '\\t': 0x09,
  tab: 0x09,
  '\\n': 0x0a,
  '\\r': 0x0d,
};

export function validateEncoding(value: string): EncodingMode {
  const lowerValue = value.toLowerCase() === 'utf8' ? 'utf-8' : value.toLowerCase();
  const mode = ENCODING_MODES.find((m) => m === lowerValue);
  if (mode) {
    return mode;
  }
  throw new InvalidArgumentError(`Encoding must be one of: ${ENCODING_MODES.join(', ')}.`);
}

export function validateFilingVersion(value: string): string {
  if (/^\d+(\.\d+)?$/.test(value.trim()) && parseFilingVersion(value)) {
    return value.trim();
  }
  throw new InvalidArgumentError('Filing version must look like 8.3.');
}

export function validateDelimiter(value: string): number {
  const named = NAMED_DELIMITERS[value.toLowerCase()];
  if (named !== undefined) {
    return named;
  }
  if (value.length === 1 && value.charCodeAt(0) < 0x80) {
    return value.charCodeAt(0);
  }
  throw new InvalidArgumentError(
    'Delimiter must be a single ASCII character, or one of: ascii28, tab, \\t, \\n, \\r.',
  );
}

export function validateBufferSize(value: string): number {
  const size = Number(value);
  if (Number.isSafeInteger(size) && size >= 0) {
    return size;
  }
  throw new InvalidArgumentError('Buffer size must be a non-negative whole number of bytes.');
}

export interface RunFilingOptions extends FilingOptions {
  registry?: SchemaRegistry;
  signal?: AbortSignal;
  onSkipped?: (entry: SkippedRecordEntry) => void;
}

/**
 * Streams one filing from `source` into one CSV stream per form type.
 *
 * Resolves with the summary, also when `signal` aborts the run (then with
 * `cancelled: true`; `succeeded` then counts the rows actually written).
 * Rejects with a FatalFileError, carrying the summary so far, when the header
 * is unusable, the source fails (IO_FAILURE) or a sink fails (OUTPUT_FAILURE).
 */
export async function runFiling(
  source: Readable,
  createSink: OutputSinkFactory,
  options: RunFilingOptions = {},
  pipelineFn: typeof streamPipeline = streamPipeline,
): Promise<FilingSummary> {
  const { registry, signal, onSkipped, ...filingOptions } = options;
  const parser = createFilingParser(filingOptions, registry);
  const writer = createFormTypeWriter(createSink, filingOptions);
  if (onSkipped) {
    parser.on('skipped', onSkipped);
  }

  try {
    debugLog('Before pipelineFn call. Options:', filingOptions);
    await pipelineFn(source, parser, writer, { signal });
    debugLog('After pipelineFn call - SUCCESSFUL.');
    return parser.summary;
  } catch (error) {
    if (signal?.aborted) {
      debugLog('Run cancelled after', parser.summary.totalRecords, 'records.');
      const written = writer.rowsWritten;
      return {
        ...parser.summary,
        succeeded: written,
        formTypes: writer.rowCounts(),
        unwritten: parser.recordsBuilt - written,
        cancelled: true,
      };
    }
    if (error instanceof FatalFileError) {
      parser.recordFatal(error);
      throw error;
    }
    const output = writer.outputFailure;
    const fatal = output
      ? new FatalFileError(
          `Failed to write ${output.formType} output: ${errorMessage(output.error)}`,
          'OUTPUT_FAILURE',
        )
      : new FatalFileError(`Failed to read filing: ${errorMessage(error)}`, 'IO_FAILURE');
    fatal.cause = output?.error ?? error;
    parser.recordFatal(fatal);
    throw fatal;
  }
}

interface CliOptions {
  outputDirectory: string;
  includeFilingId?: boolean;
  silent?: boolean;
  warn?: boolean;
  filingVersion?: string;
  encoding?: EncodingMode;
  fieldDelimiter?: number;
  recordDelimiter?: number;
  bufferSize: number;
}

export function filingIdFor(file: string | undefined): string {
  if (file === undefined) {
    return 'stdin';
  }
  const name = basename(file);
  return name.slice(0, name.length - extname(name).length) || name;
}

export function describeSummary(label: string, summary: FilingSummary): string {
  const reasons = Object.entries(summary.skipped.reasons)
    .map(([reason, count]) => `${reason}: ${count}`)
    .join(', ');
  return (
    `${label}: version ${summary.version ?? 'unknown'}, ${summary.totalRecords} records, ` +
    `${summary.succeeded} written, ${summary.skipped.total} skipped` +
    (reasons ? ` (${reasons})` : '') +
    (summary.degradedFields > 0 ? `, ${summary.degradedFields} fields re-encoded` : '') +
    (summary.unwritten > 0 ? `, ${summary.unwritten} not written` : '') +
    (summary.cancelled ? ', cancelled' : '')
  );
}

async function processInput(
  file: string | undefined,
  cmdOptions: CliOptions,
  registry: SchemaRegistry,
  signal: AbortSignal,
): Promise<boolean> {
  const filingId = filingIdFor(file);
  const label = file ?? 'stdin';
  const source: Readable = file === undefined ? process.stdin : createReadStream(file);
  const options: RunFilingOptions = {
    registry,
    signal,
    filingId,
    includeFilingId: cmdOptions.includeFilingId,
    versionOverride: cmdOptions.filingVersion,
    encodingOverride: cmdOptions.encoding,
    fieldDelimiter: cmdOptions.fieldDelimiter,
    recordDelimiter: cmdOptions.recordDelimiter,
    bufferSize: cmdOptions.bufferSize,
  };
  if (cmdOptions.warn && !cmdOptions.silent) {
    options.onSkipped = (entry) =>
      console.error(`(Warn) ${label} record ${entry.index}: ${entry.message}`);
  }

  if (!cmdOptions.silent) {
    console.error(`Processing ${label}...`);
  }
  try {
    const summary = await runFiling(
      source,
      createDirectorySinkFactory(cmdOptions.outputDirectory, filingId),
      options,
    );
    if (!cmdOptions.silent) {
      console.error(describeSummary(label, summary));
    }
    return true;
  } catch (error) {
    console.error(`\nAn error occurred while processing ${label}:`);
    console.error(errorMessage(error));
    if (isDebugMode() && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return false;
  }
}

export async function mainCli(argv?: readonly string[]): Promise<void> {
  debugLog('mainCli started.');
  const program = new Command();

  program
    .name('filing-csv')
    .version('1.0.0')
    .description(
      'Parse campaign-finance filings into one CSV file per form type. Reads stdin when no file is given.',
    )
    .argument('[files...]', 'Filing files to parse')
    .option('-o, --output-directory <dir>', 'Directory for output files', 'output')
    .option('-f, --include-filing-id', 'Add a filing_id column to every output file')
    .option('-s, --silent', 'Suppress progress messages')
    .option('-w, --warn', 'Print every skipped record')
    .option('--filing-version <version>', 'Use this filing version instead of the header', validateFilingVersion)
    .option('--encoding <mode>', `Field encoding (${ENCODING_MODES.join(', ')})`, validateEncoding)
    .option('--field-delimiter <char>', 'Field delimiter; detected per record by default', validateDelimiter)
    .option('--record-delimiter <char>', 'Record delimiter; newline by default', validateDelimiter)
    .option('--buffer-size <bytes>', 'Output buffer size per form type', validateBufferSize, DEFAULT_BUFFER_SIZE)
    .action(async (files: string[], cmdOptions: CliOptions) => {
      const registry = createDefaultRegistry();
      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        const inputs: (string | undefined)[] = files.length > 0 ? files : [undefined];
        const results = await Promise.all(
          inputs.map((file) => processInput(file, cmdOptions, registry, controller.signal)),
        );
        if (results.includes(false)) {
          process.exitCode = 1;
        }
      } finally {
        process.off('SIGINT', onSigint);
      }
    });

  await program.parseAsync(argv ?? process.argv);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch (error) {
    debugLog('Could not resolve entry script:', errorMessage(error));
    return false;
  }
}

if (isMainModule()) {
  mainCli().catch((e: unknown) => {
    console.error(errorMessage(e));
    process.exit(1);
  });
}

export { FatalFileError, FilingError, RecordError } from './errors.js';
export { createFilingParser, FilingParser } from './parsers/index.js';
export { createFormTypeWriter, createDirectorySinkFactory, CsvEmitter, FormTypeWriter } from './renderers/index.js';
export type { OutputSinkFactory } from './renderers/index.js';
export { SchemaRegistry } from './schemas/registry.js';
export { createDefaultRegistry, loadSchemaFile, registerSchemaFile } from './schemas/loadSchemas.js';
export { parseFilingVersion, compareVersions } from './schemas/version.js';
export type * from './types.js';
