/**
 * Filter Engine
 *
 * Applies the user's discrete selections to the merged table. Predicates are
 * ANDed; an inactive selection passes every row. The source table is never
 * mutated.
 *
 * @module pipeline/filter
 */

import type { DataTable, MergedRecord } from '../core/types.js';

export type SupportFilter = 'all' | 'with' | 'without';

export interface FilterSelection {
  /** Exact county name, or null for every county */
  readonly county: string | null;
  readonly support: SupportFilter;
}

export const NO_FILTER: FilterSelection = { county: null, support: 'all' };

/** Label for the "no filter" option in selection lists */
export const ALL_LABEL = 'All';

export const SUPPORT_FILTER_LABELS: Record<SupportFilter, string> = {
  all: 'All',
  with: 'With support',
  without: 'Without support',
};

/**
 * Map a user-facing support label onto a filter value.
 * Accepts the labels above and the bare keys, case-insensitively.
 *
 * @returns null when the label is not recognised
 */
export function parseSupportFilter(label: string): SupportFilter | null {
  const normalized = label.trim().toLowerCase();
  for (const [key, text] of Object.entries(SUPPORT_FILTER_LABELS)) {
    if (normalized === key || normalized === text.toLowerCase()) {
      return isSupportFilter(key) ? key : null;
    }
  }
  return null;
}

function isSupportFilter(value: string): value is SupportFilter {
  return value === 'all' || value === 'with' || value === 'without';
}

/**
 * County option value → selection value (`All` means no filter)
 */
export function parseCountySelection(option: string | undefined): string | null {
  if (option === undefined || option === ALL_LABEL) return null;
  return option;
}

export function matchesSelection(row: MergedRecord, selection: FilterSelection): boolean {
  if (selection.county !== null && row.county !== selection.county) {
    return false;
  }

  switch (selection.support) {
    case 'with':
      return row.has_support === true;
    case 'without':
      return row.has_support === false;
    case 'all':
      return true;
  }
}

export function applyFilters<R extends MergedRecord>(
  table: DataTable<R>,
  selection: FilterSelection
): DataTable<R> {
  return {
    columns: table.columns,
    rows: table.rows.filter((row) => matchesSelection(row, selection)),
  };
}
