/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json, csv formats
 *
 * @module cli/lib/output
 */

export type OutputFormat = 'table' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'csv'];

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'table' || value === 'json' || value === 'csv';
}

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  /** Fixed width; longer values are truncated with `~` */
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

type Record_ = Readonly<Record<string, unknown>>;

function cellString(row: Record_, col: TableColumn): string {
  const value = row[col.key];
  return col.formatter ? col.formatter(value) : String(value ?? '');
}

/**
 * Format data as an aligned text table
 */
export function formatTable(data: readonly Record_[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cellString(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const formatted = cellString(row, col);
        return padCell(formatted, widths[i] ?? formatted.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as CSV (comma separated, RFC 4180 quoting)
 */
export function formatCsv(data: readonly Record_[], columns: readonly TableColumn[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(cellString(row, col))).join(',')
  );
  return [headerRow, ...dataRows].join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatOutput(
  data: readonly Record_[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /** Number without decimals noise; null shows as `-` */
  number: (value: unknown): string => {
    if (value === null || value === undefined || value === '') return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : String(num);
  },

  truncate:
    (maxLength: number) =>
    (value: unknown): string => {
      const str = String(value ?? '');
      return str.length > maxLength ? str.slice(0, maxLength - 3) + '...' : str;
    },

  /** Host name of a URL */
  urlDomain: (value: unknown): string => {
    if (!value) return '-';
    try {
      return new URL(String(value)).hostname;
    } catch {
      return String(value);
    }
  },

  yesNo: (value: unknown): string => {
    if (value === null || value === undefined || value === '') return '-';
    return value === true ? 'yes' : 'no';
  },

  /** Empty cells as `-` */
  text: (value: unknown): string => {
    if (value === null || value === undefined || value === '') return '-';
    return String(value);
  },
};

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
