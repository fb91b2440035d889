// core/datasource.ts
// Request data inputs: JSON data files and CSV tables as arrays of row objects

import { parse } from 'csv-parse/sync';
import type { CsvOptions, DataTree } from '../types/index.js';
import { JobBundleError } from '../types/index.js';
import { isRecord } from './data-path.js';

const DEFAULT_CSV_OPTIONS: Required<CsvOptions> = {
  delimiter: ',',
  quote: '"',
};

/**
 * Parse a CSV table with a header row into row objects
 */
export function parseCsvTable(
  content: string | Buffer,
  source: string,
  options: CsvOptions = {}
): Record<string, string>[] {
  const { delimiter, quote } = { ...DEFAULT_CSV_OPTIONS, ...options };

  let records: unknown;
  try {
    records = parse(content, {
      delimiter,
      quote,
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new JobBundleError(
      `Failed to parse CSV: ${source}`,
      source,
      error instanceof Error ? error.message : String(error)
    );
  }

  if (!Array.isArray(records)) {
    return [];
  }

  // With columns: true, csv-parse returns objects
  const rows: Record<string, string>[] = [];
  for (const record of records) {
    if (!isRecord(record)) continue;

    const row: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = typeof value === 'string' ? value : String(value ?? '');
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Parse a JSON data file; the top level must be an object
 */
export function parseJsonData(content: string | Buffer, source: string): DataTree {
  let json: unknown;
  try {
    json = JSON.parse(content.toString());
  } catch (error) {
    throw new JobBundleError(
      `Invalid JSON in data file: ${source}`,
      source,
      error instanceof Error ? error.message : 'Parse error'
    );
  }

  if (!isRecord(json)) {
    throw new JobBundleError('Invalid data file', source, 'Expected a JSON object at the top level');
  }
  return json;
}

/**
 * Add CSV tables under their names; a table replaces a data key of the same name
 */
export function mergeTables(data: DataTree, tables: ReadonlyMap<string, Record<string, string>[]>): DataTree {
  const merged: DataTree = { ...data };
  for (const [name, rows] of tables) {
    merged[name] = rows;
  }
  return merged;
}
