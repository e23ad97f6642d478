/**
 * Flexible Delimited-Text Reader
 *
 * Spreadsheet exports of unknown provenance arrive in mixed encodings and
 * with comma, semicolon or tab separators. The reader tries an ordered chain
 * of decode strategies, sniffs the delimiter of each decoded text, and checks
 * the header against a required-column contract. The first attempt that
 * decodes and satisfies the contract wins; otherwise the last failure is
 * returned.
 *
 * USAGE:
 * ```typescript
 * const result = await readDelimitedFile('data/piggdekk_support.csv', ['municipality']);
 * if (result.isErr()) {
 *   console.error(result.error.message);
 * }
 * ```
 *
 * @module ingestion/flexible-reader
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { Result, ResultAsync, err, ok } from 'neverthrow';
import type { CellValue, DataTable, Row } from '../core/types.js';
import {
  DecodeFailure,
  ParseFailure,
  IoFailure,
  SchemaFailure,
  type EncodingName,
  type ReadFailure,
} from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'reader' });

// ============================================================================
// Decode strategies
// ============================================================================

export interface DecodeStrategy {
  readonly name: EncodingName;
  /** Throws when the bytes are not valid in this encoding */
  readonly decode: (bytes: Uint8Array) => string;
}

/**
 * Priority order: BOM-tolerant UTF-8, strict UTF-8, then Latin-1 (which
 * accepts any byte sequence and therefore always decodes).
 */
export const DECODE_STRATEGIES: readonly DecodeStrategy[] = [
  {
    name: 'utf-8-sig',
    decode: (bytes) => new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(bytes),
  },
  {
    name: 'utf-8',
    decode: (bytes) => new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes),
  },
  {
    name: 'latin-1',
    decode: (bytes) => Buffer.from(bytes).toString('latin1'),
  },
];

/** Separators the sniffer chooses between */
export const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;

// ============================================================================
// Parsing
// ============================================================================

export interface ParsedText {
  readonly table: DataTable;
  readonly delimiter: string;
}

/**
 * Parse decoded text into a table, sniffing the delimiter.
 *
 * The first non-blank line is the header. Lines whose cells are all blank
 * (`;;;;` at the end of a spreadsheet export) are skipped. Empty cells
 * become null; rows shorter than the header are padded with null, rows
 * wider than it are a `ParseFailure`. Text with no lines yields a table
 * without columns.
 */
export function parseDelimitedText(text: string, file: string): Result<ParsedText, ParseFailure> {
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    delimiter: '',
    delimitersToGuess: [...CANDIDATE_DELIMITERS],
    skipEmptyLines: 'greedy',
  });

  // A single-column file has nothing to sniff; papaparse falls back to comma
  const fatal = parsed.errors.find((e) => e.type !== 'Delimiter');
  if (fatal) {
    return err(new ParseFailure(file, dataRowIndex(fatal.row), fatal.message));
  }

  const [headerRow, ...dataRows] = parsed.data;
  if (!headerRow) {
    return ok({ table: { columns: [], rows: [] }, delimiter: parsed.meta.delimiter });
  }

  const columns = dedupeColumns(headerRow);
  const rows: Row[] = [];

  for (const [index, cells] of dataRows.entries()) {
    if (cells.length > columns.length) {
      return err(
        new ParseFailure(
          file,
          index,
          `expected ${columns.length} fields, saw ${cells.length}`
        )
      );
    }

    const row: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      const cell = cells[i];
      row[column] = cell === undefined || cell === '' ? null : cell;
    });
    rows.push(row);
  }

  return ok({ table: { columns, rows }, delimiter: parsed.meta.delimiter });
}

/**
 * papaparse counts rows from the header line; data rows start one later
 */
function dataRowIndex(row: number | undefined): number | undefined {
  return row === undefined ? undefined : Math.max(0, row - 1);
}

/**
 * Repeated header names get a `.N` suffix so every column stays addressable
 */
function dedupeColumns(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((name) => {
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return count === 0 ? name : `${name}.${count}`;
  });
}

// ============================================================================
// Column contract
// ============================================================================

export function checkRequiredColumns(
  table: DataTable,
  required: readonly string[],
  file: string,
  encoding: EncodingName
): Result<DataTable, SchemaFailure> {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    return err(new SchemaFailure(file, encoding, missing, table.columns));
  }
  return ok(table);
}

// ============================================================================
// Fallback chain
// ============================================================================

/**
 * Run the decode → parse → contract chain over already-read bytes
 */
export function readDelimitedBytes(
  bytes: Uint8Array,
  file: string,
  requiredColumns: readonly string[] = [],
  strategies: readonly DecodeStrategy[] = DECODE_STRATEGIES
): Result<DataTable, ReadFailure> {
  let lastFailure: ReadFailure | null = null;

  for (const strategy of strategies) {
    const decode = Result.fromThrowable(
      strategy.decode,
      (cause) => new DecodeFailure(file, strategy.name, cause)
    );

    const attempt = decode(bytes)
      .andThen((text): Result<ParsedText, ReadFailure> => parseDelimitedText(text, file))
      .andThen(({ table, delimiter }): Result<DataTable, ReadFailure> => {
        log.debug('Parsed delimited file', {
          file,
          encoding: strategy.name,
          delimiter,
          columns: table.columns.length,
          rows: table.rows.length,
        });
        return checkRequiredColumns(table, requiredColumns, file, strategy.name);
      });

    if (attempt.isOk()) {
      return attempt;
    }

    if (attempt.error.kind === 'parse') {
      return attempt;
    }

    log.debug('Read attempt failed, trying next encoding', {
      file,
      encoding: strategy.name,
      reason: attempt.error.message,
    });
    lastFailure = attempt.error;
  }

  return err(lastFailure ?? new DecodeFailure(file, 'utf-8'));
}

/**
 * Read a delimited text file of unknown encoding and delimiter.
 *
 * @param path - File to read
 * @param requiredColumns - Header names that must all be present
 */
export function readDelimitedFile(
  path: string,
  requiredColumns: readonly string[] = []
): ResultAsync<DataTable, ReadFailure> {
  return ResultAsync.fromPromise(readFile(path), (cause) => new IoFailure(path, cause)).andThen(
    (bytes) => readDelimitedBytes(bytes, path, requiredColumns)
  );
}

/**
 * Throwing variant for callers that do not branch on the failure kind
 */
export async function readDelimitedFileOrThrow(
  path: string,
  requiredColumns: readonly string[] = []
): Promise<DataTable> {
  const result = await readDelimitedFile(path, requiredColumns);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}
