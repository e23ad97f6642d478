import { describe, expect, it } from 'vitest';
import {
  NO_FILTER,
  applyFilters,
  parseCountySelection,
  parseSupportFilter,
} from './filter.js';
import { mergeSupportWithContacts } from './merge.js';
import { CONTACT_COLUMNS, emptyTable, type ContactRecord } from '../core/types.js';
import { supportRecord, supportTable } from '../__tests__/fixtures/csv-fixtures.js';

const merged = mergeSupportWithContacts(
  supportTable([
    supportRecord({ municipality: 'Oslo', county: 'Oslo', has_support: true }),
    supportRecord({ municipality: 'Bergen', county: 'Vestland', has_support: true }),
    supportRecord({ municipality: 'Voss', county: 'Vestland', has_support: false }),
    supportRecord({ municipality: 'Askøy', county: 'Vestland', has_support: true }),
    supportRecord({ municipality: 'Tromsø', county: 'Troms', has_support: false }),
  ]),
  emptyTable<ContactRecord>(CONTACT_COLUMNS)
);

const names = (rows: ReadonlyArray<{ municipality: string }>): string[] =>
  rows.map((row) => row.municipality);

describe('applyFilters', () => {
  it('returns every row for All/All', () => {
    const view = applyFilters(merged, NO_FILTER);

    expect(view.rows).toEqual(merged.rows);
    expect(view.columns).toEqual(merged.columns);
    expect(applyFilters(view, NO_FILTER).rows).toEqual(view.rows);
  });

  it('keeps rows without support', () => {
    const view = applyFilters(merged, { county: null, support: 'without' });

    expect(names(view.rows)).toEqual(['Voss', 'Tromsø']);
  });

  it('keeps rows with support', () => {
    const view = applyFilters(merged, { county: null, support: 'with' });

    expect(names(view.rows)).toEqual(['Oslo', 'Bergen', 'Askøy']);
  });

  it('combines county and support selections', () => {
    const view = applyFilters(merged, { county: 'Vestland', support: 'with' });

    expect(names(view.rows)).toEqual(['Bergen', 'Askøy']);
  });

  it('matches the county exactly', () => {
    expect(applyFilters(merged, { county: 'vestland', support: 'all' }).rows).toEqual([]);
  });

  it('leaves the source table untouched', () => {
    const before = merged.rows.length;
    applyFilters(merged, { county: 'Troms', support: 'all' });

    expect(merged.rows).toHaveLength(before);
  });
});

describe('parseSupportFilter', () => {
  it('accepts labels and keys in any case', () => {
    expect(parseSupportFilter('All')).toBe('all');
    expect(parseSupportFilter('With support')).toBe('with');
    expect(parseSupportFilter('WITHOUT SUPPORT')).toBe('without');
    expect(parseSupportFilter(' without ')).toBe('without');
  });

  it('returns null for an unknown label', () => {
    expect(parseSupportFilter('some')).toBeNull();
  });
});

describe('parseCountySelection', () => {
  it('maps All and no option to no filter', () => {
    expect(parseCountySelection('All')).toBeNull();
    expect(parseCountySelection(undefined)).toBeNull();
    expect(parseCountySelection('Vestland')).toBe('Vestland');
  });
});
