/**
 * Dashboard Error Types
 *
 * Read failures are returned as values by the flexible reader and only
 * become thrown errors at the loader boundary. `DatasetLoadError` is the one
 * diagnostic a user ever sees for a broken input file.
 */

import { basename } from 'node:path';

/**
 * Text encodings the flexible reader knows how to try
 */
export type EncodingName = 'utf-8-sig' | 'utf-8' | 'latin-1';

/**
 * No tried encoding could turn the file bytes into text
 */
export class DecodeFailure extends Error {
  readonly kind = 'decode' as const;

  constructor(
    public readonly file: string,
    public readonly encoding: EncodingName,
    cause?: unknown
  ) {
    super(`Cannot decode ${basename(file)} as ${encoding}`, { cause });
    this.name = 'DecodeFailure';
  }
}

/**
 * File parsed, but required columns are absent from its header
 */
export class SchemaFailure extends Error {
  readonly kind = 'schema' as const;

  constructor(
    public readonly file: string,
    public readonly encoding: EncodingName,
    public readonly missing: readonly string[],
    public readonly found: readonly string[]
  ) {
    super(
      `Missing columns [${missing.join(', ')}] in file ${basename(file)}. ` +
        `Current columns are: [${found.join(', ')}]`
    );
    this.name = 'SchemaFailure';
  }
}

/**
 * Structural defect in the delimited text (e.g. a row wider than the header).
 * Not retried: another encoding does not change the row structure.
 */
export class ParseFailure extends Error {
  readonly kind = 'parse' as const;

  constructor(
    public readonly file: string,
    public readonly row: number | undefined,
    detail: string
  ) {
    super(
      `Malformed delimited text in ${basename(file)}` +
        (row !== undefined ? ` at data row ${row + 1}` : '') +
        `: ${detail}`
    );
    this.name = 'ParseFailure';
  }
}

/**
 * File could not be read at all
 */
export class IoFailure extends Error {
  readonly kind = 'io' as const;

  constructor(
    public readonly file: string,
    cause: unknown
  ) {
    super(
      `Cannot read ${file}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'IoFailure';
  }
}

export type ReadFailure = DecodeFailure | SchemaFailure | ParseFailure | IoFailure;

/**
 * A cell that cannot be interpreted as its column's type
 */
export class CoercionFailure extends Error {
  readonly kind = 'coercion' as const;

  constructor(
    public readonly file: string,
    public readonly row: number,
    public readonly column: string,
    public readonly value: string | null
  ) {
    super(
      `Invalid ${column} value ${value === null ? '(empty)' : JSON.stringify(value)} ` +
        `in ${basename(file)} at data row ${row + 1}`
    );
    this.name = 'CoercionFailure';
  }
}

export type DatasetFailure = ReadFailure | CoercionFailure;

/**
 * Thrown by a loader when its dataset cannot be produced
 */
export class DatasetReadError extends Error {
  constructor(
    public readonly dataset: 'support' | 'contacts',
    public readonly failure: DatasetFailure
  ) {
    super(failure.message, { cause: failure });
    this.name = 'DatasetReadError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetReadError);
    }
  }
}

/**
 * Right-hand column cannot be renamed out of a collision
 */
export class MergeError extends Error {
  constructor(public readonly column: string) {
    super(`Column "${column}" exists on both sides of the join even after suffixing`);
    this.name = 'MergeError';
  }
}

/**
 * Merged dataset could not be built. Rendering stops on this error.
 *
 * RECOVERY:
 * - Check that both CSV files are in the configured data directory
 * - Check that the first row of each file holds the column names
 * - Check that the column `municipality` exists and is spelled exactly so
 */
export class DatasetLoadError extends Error {
  constructor(
    public readonly dataDir: string,
    public readonly fileNames: readonly string[],
    cause: unknown
  ) {
    super(
      `There was an error loading the CSV files: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'DatasetLoadError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetLoadError);
    }
  }

  /**
   * Multi-line diagnostic with the cause and what to check
   */
  getSummary(): string {
    const details = this.cause instanceof Error ? this.cause.message : String(this.cause);
    const files = this.fileNames.map((name) => `'${name}'`).join(' and ');

    return [
      'There was an error loading the CSV files.',
      '',
      `Details: ${details}`,
      '',
      'Please check that:',
      `- ${files} are in the '${this.dataDir}' folder`,
      '- The first row in each file contains the column names.',
      "- The column 'municipality' exists and is spelled exactly like this.",
    ].join('\n');
  }
}
