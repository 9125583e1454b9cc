/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple table
 */
export function formatTable(data: Array<Record<string, unknown>>, columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = columns ?? Object.keys(data[0] ?? {});
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...data.map((row) => valueToString(row[col]).length))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));

  for (const row of data) {
    lines.push(
      detectedColumns.map((col, i) => valueToString(row[col]).padEnd(widths[i] ?? 0)).join(' | ')
    );
  }

  // No trailing padding after the last column
  return lines.map((line) => line.trimEnd()).join('\n');
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (format === 'json') {
    return formatJSON(data);
  }

  if (Array.isArray(data)) {
    return formatTable(data.filter(isRecord));
  }
  if (isRecord(data)) {
    return formatTable([data]);
  }
  return String(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
