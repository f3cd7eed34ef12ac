/**
 * Flat Table I/O
 *
 * Whole-file CSV reads and writes for the canonical and output tables.
 * Writes go to a temporary sibling and are renamed into place, so a failed
 * stage never leaves a half-written table behind.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { MissingInputError, SchemaError } from '../errors';

export type TableRecord = Record<string, string>;

export interface RawTable {
  columns: string[];
  records: TableRecord[];
}

export interface ReadTableOptions {
  /** Throw MissingInputError instead of returning an empty table */
  required?: boolean;
  description?: string;
}

/**
 * Describes how one typed row maps onto a fixed, ordered set of columns
 */
export interface TableSpec<T> {
  name: string;
  columns: readonly string[];
  toRecord(row: T): TableRecord;
  fromRecord(record: TableRecord): T;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'))
  );
}

/**
 * Read a CSV file as rows of cells, with no header handling
 */
export function readRows(filePath: string, options: ReadTableOptions = {}): string[][] | null {
  if (!fs.existsSync(filePath)) {
    if (options.required) {
      throw new MissingInputError(filePath, options.description);
    }
    return null;
  }

  const content = fs.readFileSync(filePath, 'utf8');
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!isStringMatrix(parsed)) {
    throw new Error(`Unexpected CSV structure in ${filePath}`);
  }
  return parsed;
}

/**
 * Read a CSV file with a header row. Header names are trimmed; short rows are
 * padded with empty strings.
 */
export function readTable(filePath: string, options: ReadTableOptions = {}): RawTable {
  const rows = readRows(filePath, options);
  if (!rows || rows.length === 0) {
    return { columns: [], records: [] };
  }

  const columns = rows[0].map(c => c.trim());
  const records = rows.slice(1).map(row => {
    const record: TableRecord = {};
    columns.forEach((column, i) => {
      record[column] = row[i] ?? '';
    });
    return record;
  });

  return { columns, records };
}

/**
 * Fail fast when a table lacks any of the required columns
 */
export function requireColumns(table: string, columns: readonly string[], required: readonly string[]): void {
  const present = new Set(columns);
  const missing = required.filter(c => !present.has(c));
  if (missing.length) {
    throw new SchemaError(table, missing);
  }
}

/**
 * Escape a CSV field value (handles commas, quotes, and newlines)
 */
export function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize records under a fixed header. Always ends with a newline.
 */
export function recordsToCsv(columns: readonly string[], records: readonly TableRecord[]): string {
  const lines = [
    columns.map(escapeCsvField).join(','),
    ...records.map(record => columns.map(column => escapeCsvField(record[column] ?? '')).join(',')),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Write a file atomically: tmp sibling first, then rename. A failed write
 * removes its tmp file.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  try {
    fs.writeFileSync(tmp, content, 'utf8');
    fs.renameSync(tmp, filePath);
  } catch (error) {
    if (fs.existsSync(tmp) && fs.statSync(tmp).isFile()) {
      fs.unlinkSync(tmp);
    }
    throw error;
  }
}

export function writeTable(filePath: string, columns: readonly string[], records: readonly TableRecord[]): void {
  writeFileAtomic(filePath, recordsToCsv(columns, records));
}

export function readTyped<T>(filePath: string, spec: TableSpec<T>, options: ReadTableOptions = {}): T[] {
  const table = readTable(filePath, { description: spec.name, ...options });
  if (table.columns.length === 0) {
    return [];
  }
  requireColumns(spec.name, table.columns, spec.columns);
  return table.records.map(record => spec.fromRecord(record));
}

export function writeTyped<T>(filePath: string, spec: TableSpec<T>, rows: readonly T[]): void {
  writeTable(filePath, spec.columns, rows.map(row => spec.toRecord(row)));
}

/**
 * Parse an integer-valued cell. Blank or non-numeric cells are null;
 * fractional values are truncated ("4.0" → 4).
 */
export function parseScore(raw: string | undefined): number | null {
  const text = (raw ?? '').trim();
  if (!text) return null;
  const value = Number(text);
  return Number.isFinite(value) ? Math.trunc(value) : null;
}

export function formatNumber(value: number | null): string {
  return value === null ? '' : String(value);
}
