import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import type { RawQuoteRecord, Scalar, Table } from '../types.js';
import { SchemaError } from '../library/errors.js';
import { SUPPORTED_RECORD_EXTENSIONS } from '../library/constants.js';
import { getSettings } from '../library/settings.js';

export interface LoadOptions {
  /** Field every record must carry. Default: settings primary key (`IDpol`). */
  primaryKey?: string;
  /** Extensions picked up when the source is a directory. */
  extensions?: string[];
}

const NUMERIC_CELL = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const LEADING_ZERO = /^-?0\d/;

/**
 * Load quotes from a single record file, a directory of record files, or a
 * columnar batch file, and merge them into one table.
 *
 * @example
 * ```ts
 * const table = await loadQuotes('./data/individual', { primaryKey: 'IDpol' });
 * console.log(table.columns, table.rows.length);
 * ```
 */
export async function loadQuotes(source: string, options: LoadOptions = {}): Promise<Table> {
  const primaryKey = options.primaryKey ?? getSettings().primaryKey;
  const extensions = options.extensions ?? SUPPORTED_RECORD_EXTENSIONS;

  const stat = await fs.promises.stat(source);
  const files = stat.isDirectory() ? await findRecordFiles(source, extensions) : [source];

  const records: Record<string, Scalar>[] = [];
  for (const file of files) {
    records.push(...(await readRecordFile(file)));
  }

  validatePrimaryKeys(records, primaryKey);
  return mergeRecords(records);
}

/**
 * Read one file into records. Format follows the extension:
 * `.json` (one record or an array), `.jsonl`/`.ndjson`, `.csv`.
 */
export async function readRecordFile(file: string): Promise<Record<string, Scalar>[]> {
  const content = await fs.promises.readFile(file, 'utf-8');
  const extension = path.extname(file).toLowerCase();
  const source = path.basename(file);

  switch (extension) {
    case '.json': {
      const data = parseJson(content, source);
      const items = Array.isArray(data) ? data : [data];
      return items.map((item, i) => toRecord(item, `${source}[${i}]`));
    }
    case '.jsonl':
    case '.ndjson':
      return content
        .split(/\r?\n/)
        .map((line, lineNo) => ({ line: line.trim(), lineNo }))
        .filter(({ line }) => line.length > 0)
        .map(({ line, lineNo }) => toRecord(parseJson(line, `${source}:${lineNo + 1}`), `${source}:${lineNo + 1}`));
    case '.csv':
      return parseCsv(content, source);
    default:
      throw new SchemaError({ message: `Unsupported record file format "${extension}" (${source})` });
  }
}

/**
 * Union of all fields in first-seen order; absent fields become `null`.
 */
export function mergeRecords(records: readonly Readonly<Record<string, Scalar>>[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const field of Object.keys(record)) {
      if (!seen.has(field)) {
        seen.add(field);
        columns.push(field);
      }
    }
  }

  const rows: RawQuoteRecord[] = records.map((record) => {
    const row: Record<string, Scalar> = {};
    for (const column of columns) {
      row[column] = record[column] ?? null;
    }
    return Object.freeze(row);
  });

  return { columns, rows };
}

/**
 * Throws SchemaError when a record lacks the primary key or repeats one.
 */
export function validatePrimaryKeys(
  records: readonly Readonly<Record<string, Scalar>>[],
  primaryKey: string
): void {
  const seen = new Set<string>();
  records.forEach((record, i) => {
    const id = record[primaryKey];
    if (id === undefined || id === null || id === '') {
      throw new SchemaError({
        message: `Record ${i} is missing primary key field "${primaryKey}"`,
        field: primaryKey,
      });
    }
    const key = String(id);
    if (seen.has(key)) {
      throw new SchemaError({
        message: `Duplicate primary key ${JSON.stringify(id)}`,
        field: primaryKey,
        value: id,
        recordId: id,
      });
    }
    seen.add(key);
  });
}

async function findRecordFiles(dir: string, extensions: string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  const files: string[] = [];

  const walk = async (current: string) => {
    const entries = await fs.promises.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }
  };

  await walk(dir);
  return files.sort();
}

function parseJson(content: string, source: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new SchemaError({
      message: `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

function parseCsv(content: string, source: string): Record<string, Scalar>[] {
  let rows: unknown;
  try {
    rows = parse(content, { bom: true, columns: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new SchemaError({
      message: `Invalid CSV in ${source}: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
  if (!Array.isArray(rows)) {
    throw new SchemaError({ message: `Invalid CSV in ${source}` });
  }

  return rows.map((row, i) => {
    if (!isPlainObject(row)) {
      throw new SchemaError({ message: `Invalid CSV row ${i + 1} in ${source}` });
    }
    const record: Record<string, Scalar> = {};
    for (const [field, cell] of Object.entries(row)) {
      record[field] = parseCell(String(cell));
    }
    return record;
  });
}

/**
 * Empty cells are missing; numeric-looking cells become numbers, except
 * codes with a leading zero (`01`) and integers past the safe range, which
 * stay text so they compare the same as when read from JSON.
 */
export function parseCell(cell: string): Scalar {
  if (cell === '') return null;
  const num = parseNumericText(cell);
  if (num === undefined || LEADING_ZERO.test(cell) || isUnsafeInteger(num)) {
    return cell;
  }
  return num;
}

/**
 * Value of plain decimal or exponent notation; `undefined` for anything else
 * (hex, `Infinity`, units, blanks).
 */
export function parseNumericText(text: string): number | undefined {
  if (!NUMERIC_CELL.test(text)) return undefined;
  const num = Number(text);
  return Number.isFinite(num) ? num : undefined;
}

export function isUnsafeInteger(num: number): boolean {
  return Number.isInteger(num) && !Number.isSafeInteger(num);
}

function toRecord(value: unknown, source: string): Record<string, Scalar> {
  if (!isPlainObject(value)) {
    throw new SchemaError({ message: `Expected a quote object in ${source}` });
  }
  const record: Record<string, Scalar> = {};
  for (const [field, fieldValue] of Object.entries(value)) {
    if (!isScalar(fieldValue)) {
      throw new SchemaError({
        message: `Field "${field}" in ${source} must be a string, number, boolean or null`,
        field,
        value: fieldValue,
      });
    }
    record[field] = fieldValue;
  }
  return record;
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
