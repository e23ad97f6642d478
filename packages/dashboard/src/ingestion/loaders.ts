/**
 * Dataset Loaders
 *
 * Typed access to the two input files. Each loader pins a required-column
 * contract on the flexible reader, coerces cells to the record type and
 * memoizes its table per file modification time.
 *
 * USAGE:
 * ```typescript
 * const support = createSupportLoader('data/piggdekk_support.csv');
 * const table = await support.load();   // reads and coerces
 * await support.load();                 // cached until the file changes
 * support.invalidate();                 // next load() reads again
 * ```
 *
 * @module ingestion/loaders
 */

import { Result, err, ok } from 'neverthrow';
import {
  CONTACT_COLUMNS,
  SUPPORT_COLUMNS,
  emptyTable,
  type CellValue,
  type ContactRecord,
  type DataTable,
  type Row,
  type SupportRecord,
} from '../core/types.js';
import { CoercionFailure, DatasetReadError } from '../core/errors.js';
import { FileMemo, fileStamp } from '../core/file-memo.js';
import { createLogger } from '../core/utils/logger.js';
import { readDelimitedFile } from './flexible-reader.js';

const log = createLogger({ module: 'loaders' });

export interface DatasetLoader<R extends Row> {
  readonly path: string;
  load(): Promise<DataTable<R>>;
  invalidate(): void;
}

// ============================================================================
// Cell coercion
// ============================================================================

const TRUE_WORDS = new Set(['true', '1', 'yes', 'y', 'ja', 'j', 't']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'n', 'nei', 'f']);

const NUMBER_PATTERN = /^[+-]?\d+(?:[.,]\d+)?(?:e[+-]?\d+)?$/i;

/**
 * Cell as text; null stays null
 */
export function cellText(value: CellValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  return typeof value === 'string' ? value : String(value);
}

/**
 * Strict boolean mapping. Returns undefined for values outside the mapping
 * (including an empty cell).
 */
export function parseFlag(value: CellValue | undefined): boolean | undefined {
  if (typeof value === 'boolean') return value;
  const text = cellText(value)?.trim().toLowerCase();
  if (text === undefined) return undefined;
  if (TRUE_WORDS.has(text)) return true;
  if (FALSE_WORDS.has(text)) return false;
  return undefined;
}

/**
 * Numeric cell: blank is null, `150`, `150.5`, `150,5` and `1.5e2` are
 * numbers, and anything else is undefined. A single `,` is always the
 * decimal mark, so `1,000` is 1; thousands may only be grouped with spaces
 * (`1 000`).
 */
export function parseAmount(value: CellValue | undefined): number | null | undefined {
  if (typeof value === 'number') return value;
  const text = cellText(value)?.replace(/\s/g, '');
  if (text === undefined || text === '') return null;
  if (!NUMBER_PATTERN.test(text)) return undefined;
  return Number(text.replace(',', '.'));
}

// ============================================================================
// Support dataset
// ============================================================================

const NUMERIC_SUPPORT_COLUMNS = [
  'payment_per_tire',
  'max_tires',
  'max_total_nok',
  'lat',
  'lon',
] as const;

type NumericSupportColumn = (typeof NUMERIC_SUPPORT_COLUMNS)[number];

/**
 * Coerce one raw support row. `index` is the zero-based data row.
 */
export function toSupportRecord(
  row: Row,
  index: number,
  file: string
): Result<SupportRecord, CoercionFailure> {
  const municipality = cellText(row.municipality);
  if (municipality === null || municipality === '') {
    return err(new CoercionFailure(file, index, 'municipality', municipality));
  }

  const hasSupport = parseFlag(row.has_support);
  if (hasSupport === undefined) {
    return err(new CoercionFailure(file, index, 'has_support', cellText(row.has_support)));
  }

  const amounts = new Map<NumericSupportColumn, number | null>();
  for (const column of NUMERIC_SUPPORT_COLUMNS) {
    const amount = parseAmount(row[column]);
    if (amount === undefined) {
      return err(new CoercionFailure(file, index, column, cellText(row[column])));
    }
    amounts.set(column, amount);
  }

  return ok({
    ...row,
    municipality,
    county: cellText(row.county),
    has_support: hasSupport,
    payment_per_tire: amounts.get('payment_per_tire') ?? null,
    max_tires: amounts.get('max_tires') ?? null,
    max_total_nok: amounts.get('max_total_nok') ?? null,
    period_start: cellText(row.period_start),
    period_end: cellText(row.period_end),
    lat: amounts.get('lat') ?? null,
    lon: amounts.get('lon') ?? null,
    info_url: cellText(row.info_url),
  });
}

/**
 * Read and coerce the support file.
 *
 * @throws {DatasetReadError} On decode, schema, parse or coercion failure
 */
export async function readSupportTable(path: string): Promise<DataTable<SupportRecord>> {
  const result = await readDelimitedFile(path, SUPPORT_COLUMNS).andThen((table) =>
    Result.combine(table.rows.map((row, index) => toSupportRecord(row, index, path))).map(
      (rows): DataTable<SupportRecord> => ({ columns: table.columns, rows })
    )
  );

  if (result.isErr()) {
    throw new DatasetReadError('support', result.error);
  }

  log.info('Loaded support dataset', { path, rows: result.value.rows.length });
  return result.value;
}

// ============================================================================
// Contacts dataset
// ============================================================================

export function toContactRecord(row: Row): ContactRecord {
  return {
    ...row,
    municipality: cellText(row.municipality),
    service_name: cellText(row.service_name),
    phone: cellText(row.phone),
    website: cellText(row.website),
  };
}

/**
 * Read the contacts file. An absent file is an empty table with the
 * four contact columns.
 *
 * @throws {DatasetReadError} On decode, schema or parse failure
 */
export async function readContactTable(path: string): Promise<DataTable<ContactRecord>> {
  if ((await fileStamp(path)) === 'absent') {
    log.info('Contacts file not found, continuing without contacts', { path });
    return emptyTable<ContactRecord>(CONTACT_COLUMNS);
  }

  const result = await readDelimitedFile(path, CONTACT_COLUMNS);
  if (result.isErr()) {
    throw new DatasetReadError('contacts', result.error);
  }

  log.info('Loaded contacts dataset', { path, rows: result.value.rows.length });
  return {
    columns: result.value.columns,
    rows: result.value.rows.map(toContactRecord),
  };
}

// ============================================================================
// Memoized loaders
// ============================================================================

function memoizedLoader<R extends Row>(
  path: string,
  read: (path: string) => Promise<DataTable<R>>
): DatasetLoader<R> {
  const memo = new FileMemo(path, read);
  return {
    path,
    load: () => memo.get(),
    invalidate: () => memo.clear(),
  };
}

export function createSupportLoader(path: string): DatasetLoader<SupportRecord> {
  return memoizedLoader(path, readSupportTable);
}

export function createContactLoader(path: string): DatasetLoader<ContactRecord> {
  return memoizedLoader(path, readContactTable);
}
