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

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
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
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const rows = data.filter(isRecord);
  const first = rows[0];
  const detectedColumns = columns ?? (first ? Object.keys(first) : []);

  if (detectedColumns.length === 0 || rows.length !== data.length) {
    return formatJSON(data);
  }

  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(col, Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length)));
  }
  const width = (col: string) => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => col.padEnd(width(col))).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(width(col))).join('-|-'));
  for (const row of rows) {
    lines.push(detectedColumns.map((col) => valueToString(row[col]).padEnd(width(col))).join(' | '));
  }

  return lines.map((line) => line.trimEnd()).join('\n');
}

/**
 * Format a single object as a two-column field/value table
 */
export function formatRecord(data: Record<string, unknown>): string {
  return formatTable(
    Object.entries(data).map(([field, value]) => ({ field, value })),
    ['field', 'value']
  );
}

/**
 * Format output according to format
 */
export function formatOutput(data: unknown, format: OutputFormat, columns?: string[]): string {
  if (format === 'json') {
    return formatJSON(data);
  }
  if (Array.isArray(data)) {
    return formatTable(data, columns);
  }
  if (isRecord(data)) {
    return formatRecord(data);
  }
  return valueToString(data);
}
