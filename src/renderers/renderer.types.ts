import type { Writable } from 'node:stream';
import type { FormType } from '../types.js';

/** Opens the destination of one form type's CSV stream. */
export type OutputSinkFactory = (formType: FormType) => Writable;
