// src/parsers/index.ts
import { createDefaultRegistry } from '../schemas/loadSchemas.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import type { FilingOptions } from '../types.js';
import { FilingParser } from './filingParser.js';

export function createFilingParser(
  options: FilingOptions = {},
  registry: SchemaRegistry = createDefaultRegistry(),
): FilingParser {
  if (!registry.isFrozen) {
    // Parsers share the registry; it must not change under them.
    registry.freeze();
  }
  return new FilingParser(registry, options);
}

export { FilingParser } from './filingParser.js';
export { RecordClassifier, classify } from './classifier.js';
export { HeaderReader } from './header.js';
export { RecordBuffer } from './recordBuffer.js';
export { buildRow } from './rowBuilder.js';
export { FieldTokenizer, detectFieldDelimiter, tokenBytes, tokenize, ASCII28, COMMA, QUOTE } from './tokenizer.js';
export type { Token } from './tokenizer.js';
