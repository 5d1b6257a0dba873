import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import type { RatingTable, Scalar } from '../types.js';
import { ConfigurationError } from '../library/errors.js';
import { DEFAULT_FACTOR_COLUMN, KEY_SEPARATOR } from '../library/constants.js';
import { isUnsafeInteger, parseNumericText } from '../loader/loader.js';

export interface RatingTableSpec {
  name: string;
  keyColumns: readonly string[];
  valueColumn?: string;
}

/**
 * Lookup key for a tuple of key values. Numeric text compares by value, so a
 * table cell `2.50` matches a record value of `2.5` or `"2.5"`. Parts are
 * JSON-encoded so separators inside values cannot collide.
 */
export function tableKey(values: readonly Scalar[]): string {
  return JSON.stringify(values.map(keyPart));
}

/** Readable form of a key tuple for messages: `A|Diesel`. */
export function displayKey(values: readonly Scalar[]): string {
  return values.map((v) => (v === null ? '' : String(v))).join(KEY_SEPARATOR);
}

function keyPart(value: Scalar): string | null {
  if (value === null) return null;
  if (typeof value !== 'string') return String(value);
  const num = parseNumericText(value);
  return num === undefined || isUnsafeInteger(num) ? value : String(num);
}

/**
 * Build a rating table from CSV text: one header row, key columns plus a
 * numeric value column.
 *
 * @example
 * ```ts
 * const table = parseRatingTable('Area,Base\nA,200\nB,220\n', {
 *   name: 'base_values',
 *   keyColumns: ['Area'],
 *   valueColumn: 'Base',
 * });
 * table.entries.get(tableKey(['A'])); // 200
 * ```
 */
export function parseRatingTable(content: string, spec: RatingTableSpec, file?: string): RatingTable {
  const valueColumn = spec.valueColumn ?? DEFAULT_FACTOR_COLUMN;
  const where = file ?? spec.name;

  if (spec.keyColumns.length === 0) {
    throw new ConfigurationError(`Rating table "${spec.name}" needs at least one key column`, where);
  }

  let rows: unknown;
  try {
    rows = parse(content, { bom: true, columns: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new ConfigurationError(
      `Invalid CSV: ${error instanceof Error ? error.message : String(error)}`,
      where
    );
  }
  if (!Array.isArray(rows) || rows.length === 0) {
    throw new ConfigurationError(`Rating table "${spec.name}" has no rows`, where);
  }

  const entries = new Map<string, number>();
  rows.forEach((row: unknown, i) => {
    const line = i + 2; // header is line 1
    if (row === null || typeof row !== 'object') {
      throw new ConfigurationError(`Row ${line} is not a record`, where);
    }
    const cells = new Map<string, unknown>(Object.entries(row));

    for (const column of [...spec.keyColumns, valueColumn]) {
      if (!cells.has(column)) {
        throw new ConfigurationError(`Missing column "${column}" in rating table "${spec.name}"`, where);
      }
    }

    const rawValue = String(cells.get(valueColumn));
    const value = Number(rawValue);
    if (rawValue === '' || !Number.isFinite(value)) {
      throw new ConfigurationError(`Row ${line}: "${valueColumn}" is not a number (${JSON.stringify(rawValue)})`, where);
    }

    const keyValues = spec.keyColumns.map((column) => String(cells.get(column)));
    const key = tableKey(keyValues);
    if (entries.has(key)) {
      throw new ConfigurationError(
        `Row ${line}: duplicate key "${displayKey(keyValues)}" in rating table "${spec.name}"`,
        where
      );
    }
    entries.set(key, value);
  });

  return {
    name: spec.name,
    keyColumns: Object.freeze([...spec.keyColumns]),
    valueColumn,
    entries,
  };
}

/**
 * Read and parse a rating table CSV. A missing or unreadable file is a
 * ConfigurationError.
 */
export async function loadRatingTable(file: string, spec: RatingTableSpec): Promise<RatingTable> {
  let content: string;
  try {
    content = await fs.promises.readFile(file, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read rating table "${spec.name}": ${error instanceof Error ? error.message : String(error)}`,
      path.basename(file)
    );
  }
  return parseRatingTable(content, spec, path.basename(file));
}
