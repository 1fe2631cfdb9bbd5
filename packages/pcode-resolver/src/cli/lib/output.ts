/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json formats
 *
 * @module cli/lib/output
 */

import type { OutputFormat } from './config.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function formatCell(column: TableColumn, value: unknown): string {
  if (column.formatter) return column.formatter(value);
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => formatCell(col, row[col.key]).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const formatted = formatCell(col, row[col.key]);
        return padCell(formatted, widths[i] ?? formatted.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data in the specified format
 */
export function formatOutput<T extends Record<string, unknown>>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  return format === 'json' ? formatJson(data) : formatTable(data, columns);
}

export const formatters = {
  /** "-" for an absent value */
  optional: (value: unknown): string =>
    value === undefined || value === null ? '-' : String(value),

  yesNo: (value: unknown): string => (value ? 'yes' : 'no'),
};
