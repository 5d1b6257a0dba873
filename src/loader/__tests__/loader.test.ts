import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadQuotes, mergeRecords, parseCell, readRecordFile, validatePrimaryKeys } from '../loader.js';
import { SchemaError } from '../../library/errors.js';

let dir: string;

function write(relative: string, content: string): string {
  const file = path.join(dir, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pricer-loader-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('readRecordFile', () => {
  it('reads a single-record JSON file', async () => {
    const file = write('1.json', JSON.stringify({ IDpol: 1, Area: 'A' }));
    expect(await readRecordFile(file)).toEqual([{ IDpol: 1, Area: 'A' }]);
  });

  it('reads a JSON array of records', async () => {
    const file = write('many.json', JSON.stringify([{ IDpol: 1 }, { IDpol: 2 }]));
    expect(await readRecordFile(file)).toEqual([{ IDpol: 1 }, { IDpol: 2 }]);
  });

  it('reads line-delimited JSON, skipping blank lines', async () => {
    const file = write('quotes.jsonl', '{"IDpol":1}\n\n{"IDpol":2}\n');
    expect(await readRecordFile(file)).toEqual([{ IDpol: 1 }, { IDpol: 2 }]);
  });

  it('reads CSV with numeric cells as numbers and empty cells as null', async () => {
    const file = write('batch.csv', 'IDpol,Area,DrivAge,Density\n1,A,30,\n2,B,45.5,800\n');
    expect(await readRecordFile(file)).toEqual([
      { IDpol: 1, Area: 'A', DrivAge: 30, Density: null },
      { IDpol: 2, Area: 'B', DrivAge: 45.5, Density: 800 },
    ]);
  });

  it('reads the same values from CSV and JSON for leading-zero codes', async () => {
    const csv = write('batch.csv', 'IDpol,Region\n1,01\n');
    const json = write('1.json', JSON.stringify({ IDpol: 1, Region: '01' }));
    expect(await readRecordFile(csv)).toEqual(await readRecordFile(json));
  });

  it('strips a byte order mark from the CSV header', async () => {
    const file = write('excel.csv', '\uFEFFIDpol,Area\n1,A\n');
    expect(await readRecordFile(file)).toEqual([{ IDpol: 1, Area: 'A' }]);
  });

  it('rejects nested values', async () => {
    const file = write('bad.json', JSON.stringify({ IDpol: 1, Driver: { age: 30 } }));
    await expect(readRecordFile(file)).rejects.toThrow('Field "Driver" in bad.json[0] must be a string, number, boolean or null');
  });

  it('rejects malformed JSON', async () => {
    const file = write('broken.json', '{"IDpol":');
    await expect(readRecordFile(file)).rejects.toThrow(SchemaError);
  });

  it('rejects unsupported extensions', async () => {
    const file = write('quotes.xml', '<quotes/>');
    await expect(readRecordFile(file)).rejects.toThrow('Unsupported record file format ".xml" (quotes.xml)');
  });
});

describe('loadQuotes', () => {
  it('merges a directory of records into one table, filling absent fields', async () => {
    write('individual/1.json', JSON.stringify({ IDpol: 1, Area: 'A', DrivAge: 30 }));
    write('individual/2.json', JSON.stringify({ IDpol: 2, Area: 'B', Exposure: 0.5 }));
    write('individual/notes.txt', 'ignored');

    const table = await loadQuotes(path.join(dir, 'individual'), { primaryKey: 'IDpol' });

    expect(table.columns).toEqual(['IDpol', 'Area', 'DrivAge', 'Exposure']);
    expect(table.rows).toEqual([
      { IDpol: 1, Area: 'A', DrivAge: 30, Exposure: null },
      { IDpol: 2, Area: 'B', DrivAge: null, Exposure: 0.5 },
    ]);
  });

  it('walks nested directories in path order', async () => {
    write('data/b/2.json', JSON.stringify({ IDpol: 2 }));
    write('data/a/1.json', JSON.stringify({ IDpol: 1 }));
    const table = await loadQuotes(path.join(dir, 'data'), { primaryKey: 'IDpol' });
    expect(table.rows.map((r) => r.IDpol)).toEqual([1, 2]);
  });

  it('loads a columnar CSV batch file', async () => {
    const file = write('batch.csv', 'IDpol,Area\n10,A\n11,B\n');
    const table = await loadQuotes(file, { primaryKey: 'IDpol' });
    expect(table.columns).toEqual(['IDpol', 'Area']);
    expect(table.rows).toHaveLength(2);
  });

  it('throws SchemaError when the primary key is absent', async () => {
    const file = write('1.json', JSON.stringify({ Area: 'A' }));
    await expect(loadQuotes(file, { primaryKey: 'IDpol' })).rejects.toThrow(
      'Record 0 is missing primary key field "IDpol"'
    );
  });

  it('keeps distinct large policy IDs distinct', async () => {
    const file = write('batch.csv', 'IDpol,Area\n9007199254740993,A\n9007199254740992,B\n');
    const table = await loadQuotes(file, { primaryKey: 'IDpol' });
    expect(table.rows.map((r) => r.IDpol)).toEqual(['9007199254740993', '9007199254740992']);
  });

  it('returns frozen rows', async () => {
    const file = write('1.json', JSON.stringify({ IDpol: 1 }));
    const table = await loadQuotes(file, { primaryKey: 'IDpol' });
    expect(Object.isFrozen(table.rows[0])).toBe(true);
  });
});

describe('mergeRecords', () => {
  it('returns an empty table for no records', () => {
    expect(mergeRecords([])).toEqual({ columns: [], rows: [] });
  });
});

describe('validatePrimaryKeys', () => {
  it('rejects empty and duplicate keys', () => {
    expect(() => validatePrimaryKeys([{ IDpol: '' }], 'IDpol')).toThrow(SchemaError);
    expect(() => validatePrimaryKeys([{ IDpol: 1 }, { IDpol: 1 }], 'IDpol')).toThrow('Duplicate primary key 1');
  });

  it('accepts unique keys', () => {
    expect(() => validatePrimaryKeys([{ IDpol: 1 }, { IDpol: 2 }], 'IDpol')).not.toThrow();
  });
});

describe('parseCell', () => {
  it('converts numeric-looking cells only', () => {
    expect(parseCell('42')).toBe(42);
    expect(parseCell('-0.5')).toBe(-0.5);
    expect(parseCell('1e3')).toBe(1000);
    expect(parseCell('2.50')).toBe(2.5);
    expect(parseCell('0.5')).toBe(0.5);
    expect(parseCell('R11')).toBe('R11');
    expect(parseCell('0x10')).toBe('0x10');
    expect(parseCell('')).toBeNull();
  });

  it('keeps codes with leading zeros as text', () => {
    expect(parseCell('01')).toBe('01');
    expect(parseCell('-007')).toBe('-007');
    expect(parseCell('0')).toBe(0);
  });

  it('keeps integers past the safe range as text', () => {
    expect(parseCell('9007199254740993')).toBe('9007199254740993');
    expect(parseCell('9007199254740991')).toBe(9007199254740991);
  });
});
