/**
 * Output format registration: table and JSON.
 */

import { InvalidArgumentError } from 'commander';

import { formatJson } from './json.js';
import { formatTable } from './table.js';

export const OUTPUT_FORMATS = ['table', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Format data for output in the specified format.
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'table':
    default:
      return formatTable(data);
  }
}

/**
 * Commander argument parser for `--format`
 */
export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

export { formatTable } from './table.js';
export { formatJson } from './json.js';
