/**
 * Core data model
 *
 * Tables are column-ordered collections of row records. Rows are keyed by
 * column name so extra columns found in a file travel through the pipeline
 * untouched next to the typed fields.
 *
 * @module core/types
 */

/**
 * A single scalar cell. `null` marks an empty or absent value.
 */
export type CellValue = string | number | boolean | null;

export type Row = { readonly [column: string]: CellValue };

export interface DataTable<R extends Row = Row> {
  /** Column names in file (or join) order */
  readonly columns: readonly string[];
  readonly rows: readonly R[];
}

// ============================================================================
// Column contracts
// ============================================================================

export const JOIN_KEY = 'municipality';

export const SUPPORT_COLUMNS = [
  'municipality',
  'county',
  'has_support',
  'payment_per_tire',
  'max_tires',
  'max_total_nok',
  'period_start',
  'period_end',
  'lat',
  'lon',
  'info_url',
] as const;

export const CONTACT_COLUMNS = ['municipality', 'service_name', 'phone', 'website'] as const;

export type SupportColumn = (typeof SUPPORT_COLUMNS)[number];

// ============================================================================
// Records
// ============================================================================

/**
 * One municipality's support scheme. `municipality` is assumed unique
 * within the support file; the join relies on it but nothing enforces it.
 */
export interface SupportRecord extends Row {
  readonly municipality: string;
  readonly county: string | null;
  readonly has_support: boolean;
  /** NOK paid per studded tire handed in */
  readonly payment_per_tire: number | null;
  readonly max_tires: number | null;
  readonly max_total_nok: number | null;
  readonly period_start: string | null;
  readonly period_end: string | null;
  readonly lat: number | null;
  readonly lon: number | null;
  readonly info_url: string | null;
}

export interface ContactRecord extends Row {
  readonly municipality: string | null;
  readonly service_name: string | null;
  readonly phone: string | null;
  readonly website: string | null;
}

/**
 * Support record joined with its contact row. Contact fields are null
 * when no contact row matched.
 */
export interface MergedRecord extends SupportRecord {
  readonly service_name: string | null;
  readonly phone: string | null;
  readonly website: string | null;
}

export function emptyTable<R extends Row = Row>(columns: readonly string[] = []): DataTable<R> {
  return { columns: [...columns], rows: [] };
}
