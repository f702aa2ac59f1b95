import { createWriteStream, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { safeFileName } from '../utils/string.js';
import type { OutputSinkFactory } from './renderer.types.js';

export const CSV_EXTENSION = '.csv';

/**
 * Writes each form type to `<outputDirectory>/<filingId>/<formType>.csv`,
 * replacing existing files so a re-run produces the same output.
 */
export function createDirectorySinkFactory(
  outputDirectory: string,
  filingId: string,
): OutputSinkFactory {
  const directory = join(outputDirectory, safeFileName(filingId));
  return (formType) => {
    mkdirSync(directory, { recursive: true });
    return createWriteStream(join(directory, `${safeFileName(formType)}${CSV_EXTENSION}`));
  };
}
