/**
 * QKD Telemetry - CSV I/O
 *
 * Header-first CSV read/write over csv-parse and csv-stringify. Columns
 * are written in the order given.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

/** One parsed row, keyed by header name */
export type CsvRow = Record<string, string>;

/**
 * Serialize rows with a header line. Missing values become empty cells.
 */
export function toCsv<T extends object>(rows: readonly T[], columns: readonly (keyof T & string)[]): string {
  return stringify([...rows], {
    header: true,
    columns: [...columns],
  });
}

/** Write rows to `path`, creating parent directories */
export function writeCsv<T extends object>(
  path: string,
  rows: readonly T[],
  columns: readonly (keyof T & string)[]
): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, toCsv(rows, columns), 'utf8');
}

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every(cell => typeof cell === 'string')
  );
}

/** Parse CSV text whose first line is the header */
export function parseCsv(text: string): CsvRow[] {
  const parsed: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isCsvRow);
}

/** Read and parse a CSV file */
export function readCsv(path: string): CsvRow[] {
  return parseCsv(readFileSync(path, 'utf8'));
}
