import { Writable } from 'node:stream';
import type { FormType, StructuredRecord } from '../types.js';
import { createDebugLogger } from '../utils/debug.js';
import { CsvEmitter } from './csvEmitter.js';
import type { CsvEmitterOptions } from './csvEmitter.js';
import type { OutputSinkFactory } from './renderer.types.js';

const debugLog = createDebugLogger('WRITER_DEBUG');

export interface OutputFailure {
  formType: FormType;
  error: Error;
}

/**
 * Routes StructuredRecords to one CSV stream per form type, opening each
 * sink the first time its form type shows up.
 *
 * When the writer finishes or is destroyed (e.g. on cancellation) every
 * sink is ended after the lines already emitted have been written. A sink
 * that fails destroys the writer with its error; `outputFailure` names it.
 */
export class FormTypeWriter extends Writable {
  private readonly emitters = new Map<FormType, CsvEmitter>();
  private closing?: Promise<void>;
  private failure?: OutputFailure;

  constructor(
    private readonly createSink: OutputSinkFactory,
    private readonly emitterOptions: CsvEmitterOptions = {},
  ) {
    super({ objectMode: true });
  }

  get formTypes(): FormType[] {
    return [...this.emitters.keys()];
  }

  /** The first sink failure, if any. */
  get outputFailure(): OutputFailure | undefined {
    return this.failure;
  }

  /** Rows handed to each form type's stream. */
  rowCounts(): Record<FormType, number> {
    const counts: Record<FormType, number> = {};
    for (const [formType, emitter] of this.emitters) {
      counts[formType] = emitter.rows;
    }
    return counts;
  }

  get rowsWritten(): number {
    let rows = 0;
    for (const emitter of this.emitters.values()) {
      rows += emitter.rows;
    }
    return rows;
  }

  _write(record: StructuredRecord, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    let emitter: CsvEmitter;
    try {
      emitter = this.emitterFor(record.formType);
      emitter.emit(record);
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    if (!emitter.shouldFlush) {
      callback();
      return;
    }
    emitter.flush().then(() => callback(), callback);
  }

  _final(callback: (error?: Error | null) => void): void {
    this.closeAll().then(() => callback(), callback);
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.closeAll().then(
      () => callback(error),
      (closeError: unknown) =>
        callback(error ?? (closeError instanceof Error ? closeError : new Error(String(closeError)))),
    );
  }

  private emitterFor(formType: FormType): CsvEmitter {
    let emitter = this.emitters.get(formType);
    if (!emitter) {
      debugLog(`Opening output stream for ${formType}.`);
      const sink = this.createSink(formType);
      sink.on('error', (error: Error) => {
        debugLog(`Output stream for ${formType} failed:`, error.message);
        this.failure ??= { formType, error };
        this.destroy(error);
      });
      emitter = new CsvEmitter(sink, this.emitterOptions);
      this.emitters.set(formType, emitter);
    }
    return emitter;
  }

  private closeAll(): Promise<void> {
    if (!this.closing) {
      this.closing = Promise.all([...this.emitters.values()].map((e) => e.end())).then(() => {
        debugLog(`Closed ${this.emitters.size} output streams.`);
      });
    }
    return this.closing;
  }
}
