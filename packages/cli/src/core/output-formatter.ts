/**
 * Output Formatter - JSON, table, CSV formats
 */

import type { OutputFormat, OutputRow } from '../types/index.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function valueToString(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}

function columnsOf(rows: OutputRow[], columns?: string[]): string[] {
  return columns ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
}

/**
 * Format output as a simple table
 */
export function formatTable(rows: OutputRow[], columns?: string[]): string {
  const detectedColumns = columnsOf(rows, columns);
  if (rows.length === 0 || detectedColumns.length === 0) {
    return 'No data to display';
  }

  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, k) => col.padEnd(widths[k])).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));

  for (const row of rows) {
    lines.push(detectedColumns.map((col, k) => valueToString(row[col]).padEnd(widths[k])).join(' | '));
  }

  return lines.join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format output as CSV
 */
export function formatCSV(rows: OutputRow[], columns?: string[]): string {
  const detectedColumns = columnsOf(rows, columns);
  if (rows.length === 0 || detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [];
  lines.push(detectedColumns.map(escapeCSV).join(','));
  for (const row of rows) {
    lines.push(detectedColumns.map((col) => escapeCSV(valueToString(row[col]))).join(','));
  }

  return lines.join('\n');
}

/**
 * Format a command result. Table and CSV output take the rows the command
 * derives from its result; JSON prints the whole result.
 */
export function formatOutput<R>(result: R, format: OutputFormat, toRows: (result: R) => OutputRow[]): string {
  switch (format) {
    case 'json':
      return formatJSON(result);
    case 'csv':
      return formatCSV(toRows(result));
    case 'table':
      return formatTable(toRows(result));
  }
}
