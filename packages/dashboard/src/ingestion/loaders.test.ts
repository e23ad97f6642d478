import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { utimes } from 'node:fs/promises';
import { join } from 'node:path';
import {
  createSupportLoader,
  parseAmount,
  parseFlag,
  readContactTable,
  readSupportTable,
  toSupportRecord,
} from './loaders.js';
import { DatasetReadError } from '../core/errors.js';
import { CONTACT_COLUMNS, SUPPORT_COLUMNS } from '../core/types.js';
import {
  SUPPORT_CSV,
  SUPPORT_HEADER,
  makeTempDir,
  removeTempDir,
  writeFixture,
} from '../__tests__/fixtures/csv-fixtures.js';

describe('parseFlag', () => {
  it.each([
    ['ja', true],
    [' YES ', true],
    ['1', true],
    ['t', true],
    ['nei', false],
    ['0', false],
    ['No', false],
  ])('maps %j to %s', (input, expected) => {
    expect(parseFlag(input)).toBe(expected);
  });

  it('leaves blank and unknown values unmapped', () => {
    expect(parseFlag('')).toBeUndefined();
    expect(parseFlag(null)).toBeUndefined();
    expect(parseFlag('kanskje')).toBeUndefined();
  });
});

describe('parseAmount', () => {
  it('accepts dot and comma decimals and spaced thousands', () => {
    expect(parseAmount('150')).toBe(150);
    expect(parseAmount('150.5')).toBe(150.5);
    expect(parseAmount('150,5')).toBe(150.5);
    expect(parseAmount('1 500')).toBe(1500);
    expect(parseAmount('-3')).toBe(-3);
  });

  it('accepts exponent forms', () => {
    expect(parseAmount('1e3')).toBe(1000);
    expect(parseAmount('1,5E2')).toBe(150);
  });

  it('always reads a single comma as the decimal mark', () => {
    expect(parseAmount('1,000')).toBe(1);
  });

  it('treats blank cells as null', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('  ')).toBeNull();
    expect(parseAmount(null)).toBeNull();
  });

  it('rejects text that is not a single number', () => {
    expect(parseAmount('abc')).toBeUndefined();
    expect(parseAmount('1.000,50')).toBeUndefined();
    expect(parseAmount('150 NOK')).toBeUndefined();
  });
});

describe('toSupportRecord', () => {
  it('keeps columns outside the contract', () => {
    const record = toSupportRecord(
      { municipality: 'Oslo', has_support: 'ja', notes: 'pilot' },
      0,
      'support.csv'
    )._unsafeUnwrap();

    expect(record.notes).toBe('pilot');
    expect(record.has_support).toBe(true);
    expect(record.payment_per_tire).toBeNull();
  });

  it('rejects an empty municipality', () => {
    const failure = toSupportRecord(
      { municipality: null, has_support: 'ja' },
      3,
      'support.csv'
    )._unsafeUnwrapErr();

    expect(failure.column).toBe('municipality');
    expect(failure.message).toBe('Invalid municipality value (empty) in support.csv at data row 4');
  });
});

describe('readSupportTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('coerces every row', async () => {
    const path = await writeFixture(dir, 'support.csv', SUPPORT_CSV);

    const table = await readSupportTable(path);

    expect(table.rows.map((row) => row.municipality)).toEqual([
      'Oslo',
      'Bergen',
      'Voss',
      'Askøy',
      'Tromsø',
    ]);
    expect(table.rows.map((row) => row.has_support)).toEqual([true, true, false, true, false]);
    expect(table.rows[0]).toMatchObject({
      county: 'Oslo',
      payment_per_tire: 150,
      max_tires: 4,
      max_total_nok: 600,
      lat: 59.91,
      lon: 10.75,
      period_start: '2025-05-01',
    });
    expect(table.rows[3]).toMatchObject({ lat: null, lon: null, payment_per_tire: 250 });
  });

  it('fails the load on an uncoercible has_support value', async () => {
    const path = await writeFixture(
      dir,
      'support.csv',
      [SUPPORT_HEADER, 'Oslo,Oslo,ja,,,,,,,,', 'Bergen,Vestland,kanskje,,,,,,,,'].join('\n')
    );

    const error = await readSupportTable(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatasetReadError);
    if (!(error instanceof DatasetReadError)) return;
    expect(error.dataset).toBe('support');
    expect(error.failure.kind).toBe('coercion');
    expect(error.message).toBe('Invalid has_support value "kanskje" in support.csv at data row 2');
  });

  it('fails the load on a non-numeric payment', async () => {
    const path = await writeFixture(
      dir,
      'support.csv',
      [SUPPORT_HEADER, 'Oslo,Oslo,ja,mye,,,,,,,'].join('\n')
    );

    await expect(readSupportTable(path)).rejects.toThrow(
      'Invalid payment_per_tire value "mye" in support.csv at data row 1'
    );
  });

  it.each(SUPPORT_COLUMNS.map((column) => [column]))(
    'reports exactly %s when only that column is missing',
    async (column) => {
      const header = SUPPORT_COLUMNS.filter((c) => c !== column).join(',');
      const path = await writeFixture(dir, 'support.csv', `${header}\n`);

      const error = await readSupportTable(path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatasetReadError);
      if (!(error instanceof DatasetReadError)) return;
      expect(error.failure.kind).toBe('schema');
      expect(error.failure).toMatchObject({ missing: [column] });
      expect(error.message).toMatch(new RegExp(`^Missing columns \\[${column}\\] in file support\\.csv\\.`));
    }
  );

  it('loads a header-only file as an empty table', async () => {
    const path = await writeFixture(dir, 'support.csv', `${SUPPORT_HEADER}\n`);

    const table = await readSupportTable(path);

    expect(table.columns).toEqual([...SUPPORT_COLUMNS]);
    expect(table.rows).toEqual([]);
  });

  it('reads the required columns in any order', async () => {
    const reversed = [...SUPPORT_COLUMNS].reverse();
    const path = await writeFixture(
      dir,
      'support.csv',
      [
        reversed.join(';'),
        'https://example.org/oslo;10.75;59.91;2025-10-31;2025-05-01;600;4;150;ja;Oslo;Oslo',
      ].join('\n')
    );

    const table = await readSupportTable(path);

    expect(table.columns).toEqual(reversed);
    expect(table.rows).toHaveLength(1);
    expect(table.rows[0]).toMatchObject({
      municipality: 'Oslo',
      county: 'Oslo',
      has_support: true,
      payment_per_tire: 150,
      max_tires: 4,
      max_total_nok: 600,
      period_start: '2025-05-01',
      period_end: '2025-10-31',
      lat: 59.91,
      lon: 10.75,
      info_url: 'https://example.org/oslo',
    });
  });

  it('skips the delimiter-only rows a spreadsheet export leaves at the end', async () => {
    const path = await writeFixture(
      dir,
      'support.csv',
      [
        SUPPORT_COLUMNS.join(';'),
        'Oslo;Oslo;ja;150;4;600;2025-05-01;2025-10-31;59.91;10.75;https://example.org/oslo',
        ';;;;;;;;;;',
        ';;;;;;;;;;',
      ].join('\n')
    );

    const table = await readSupportTable(path);

    expect(table.rows.map((row) => row.municipality)).toEqual(['Oslo']);
  });

  it('names every missing column', async () => {
    const path = await writeFixture(dir, 'support.csv', 'municipality,county\nOslo,Oslo\n');

    const error = await readSupportTable(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatasetReadError);
    if (!(error instanceof DatasetReadError)) return;
    expect(error.failure.kind).toBe('schema');
    expect(error.message).toContain('Missing columns [has_support, payment_per_tire,');
  });
});

describe('readContactTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('returns an empty table with the contact columns when the file is absent', async () => {
    const table = await readContactTable(join(dir, 'municipality_contacts.csv'));

    expect(table.columns).toEqual([...CONTACT_COLUMNS]);
    expect(table.rows).toEqual([]);
  });

  it('fails when the file lacks a contact column', async () => {
    const path = await writeFixture(dir, 'contacts.csv', 'municipality;phone\nOslo;+47 000 00 001\n');

    const error = await readContactTable(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatasetReadError);
    if (!(error instanceof DatasetReadError)) return;
    expect(error.dataset).toBe('contacts');
    expect(error.failure.kind).toBe('schema');
  });
});

describe('createSupportLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('serves the cached table until the file changes', async () => {
    const path = await writeFixture(dir, 'support.csv', SUPPORT_CSV);
    const loader = createSupportLoader(path);

    const first = await loader.load();
    expect(await loader.load()).toBe(first);

    await writeFixture(dir, 'support.csv', [SUPPORT_HEADER, 'Oslo,Oslo,ja,,,,,,,,'].join('\n'));
    const later = new Date(Date.now() + 60_000);
    await utimes(path, later, later);

    const reloaded = await loader.load();
    expect(reloaded).not.toBe(first);
    expect(reloaded.rows).toHaveLength(1);
  });

  it('reads again after invalidate', async () => {
    const path = await writeFixture(dir, 'support.csv', SUPPORT_CSV);
    const loader = createSupportLoader(path);

    const first = await loader.load();
    loader.invalidate();

    const second = await loader.load();
    expect(second).not.toBe(first);
    expect(second).toEqual(first);
  });
});
