/**
 * Dashboard metrics
 *
 * Everything the presentation layer renders from a filtered view: the KPI
 * scalars, the county selection list, the map points and the detail table.
 *
 * @module pipeline/metrics
 */

import type { Feature, FeatureCollection, Point } from 'geojson';
import type { DataTable, MergedRecord, Row } from '../core/types.js';
import { ALL_LABEL } from './filter.js';

export interface DashboardKpis {
  /** Rows in the view */
  readonly municipalityCount: number;
  /** Rows in the view with a support scheme */
  readonly supportedCount: number;
  /** Highest payment per tire among supported rows; null when none is known */
  readonly maxPaymentPerTire: number | null;
}

export interface MapPointProperties {
  readonly municipality: string;
}

/** Placeholder shown for a KPI without data */
export const NO_DATA = '-';

export const DISPLAY_COLUMNS = [
  'municipality',
  'county',
  'has_support',
  'payment_per_tire',
  'max_tires',
  'max_total_nok',
  'period_start',
  'period_end',
  'service_name',
  'phone',
  'website',
  'info_url',
] as const;

/**
 * `All` followed by the distinct non-null counties, sorted
 */
export function countyOptions(table: DataTable<MergedRecord>): string[] {
  const counties = new Set<string>();
  for (const row of table.rows) {
    if (row.county !== null) counties.add(row.county);
  }
  return [ALL_LABEL, ...[...counties].sort()];
}

export function supportedRows(view: DataTable<MergedRecord>): MergedRecord[] {
  return view.rows.filter((row) => row.has_support === true);
}

export function maxPayment(rows: readonly MergedRecord[]): number | null {
  let max: number | null = null;
  for (const row of rows) {
    const payment = row.payment_per_tire;
    if (payment === null || Number.isNaN(payment)) continue;
    if (max === null || payment > max) max = payment;
  }
  return max;
}

export function computeKpis(view: DataTable<MergedRecord>): DashboardKpis {
  const supported = supportedRows(view);
  return {
    municipalityCount: view.rows.length,
    supportedCount: supported.length,
    maxPaymentPerTire: maxPayment(supported),
  };
}

/**
 * `250 NOK`, truncated to whole kroner, or the no-data placeholder
 */
export function formatMaxPayment(value: number | null): string {
  return value === null ? NO_DATA : `${Math.trunc(value)} NOK`;
}

/**
 * Supported municipalities with both coordinates, as GeoJSON points
 */
export function mapPoints(
  view: DataTable<MergedRecord>
): FeatureCollection<Point, MapPointProperties> {
  const features: Feature<Point, MapPointProperties>[] = [];

  for (const row of supportedRows(view)) {
    if (row.lat === null || row.lon === null) continue;
    features.push({
      type: 'Feature',
      geometry: { type: 'Point', coordinates: [row.lon, row.lat] },
      properties: { municipality: row.municipality },
    });
  }

  return { type: 'FeatureCollection', features };
}

/**
 * Project the view onto the display columns; absent columns are filled
 * with an empty string
 */
export function displayTable(view: DataTable<MergedRecord>): Row[] {
  const present = DISPLAY_COLUMNS.map((column) => [column, view.columns.includes(column)] as const);
  return view.rows.map((row) =>
    Object.fromEntries(
      present.map(([column, isPresent]) => [column, isPresent ? (row[column] ?? null) : ''] as const)
    )
  );
}
