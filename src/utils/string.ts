const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quotes a CSV field when it contains a comma, a quote or a line break,
 * doubling the quotes inside. Other values are returned unchanged.
 */
export const escapeCsvField = (value: string): string => {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
};

export const toCsvLine = (values: readonly string[]): string =>
  `${values.map(escapeCsvField).join(',')}\n`;

/** Output file names may not contain path separators. */
export const safeFileName = (name: string): string => name.replace(/[/\\]/g, '-');
