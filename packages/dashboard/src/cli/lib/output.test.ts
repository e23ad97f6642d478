import { describe, expect, it } from 'vitest';
import { formatCsv, formatOutput, formatTable, formatters, isOutputFormat, type TableColumn } from './output.js';

const columns: TableColumn[] = [
  { key: 'name', header: 'Name' },
  { key: 'count', header: 'N', align: 'right' },
];

describe('formatTable', () => {
  it('aligns cells under their headers', () => {
    const table = formatTable(
      [
        { name: 'Oslo', count: 5 },
        { name: 'Ås', count: 12 },
      ],
      columns
    );

    expect(table.split('\n')).toEqual(['Name |  N', '-----+---', 'Oslo |  5', 'Ås   | 12']);
  });

  it('truncates values wider than a fixed width', () => {
    const table = formatTable([{ name: 'Trondheim' }], [{ key: 'name', header: 'Name', width: 5 }]);

    expect(table.split('\n')[2]).toBe('Tron~');
  });

  it('says so when there are no rows', () => {
    expect(formatTable([], columns)).toBe('No entries found.');
  });
});

describe('formatCsv', () => {
  it('quotes cells with separators, quotes or newlines', () => {
    const csv = formatCsv(
      [
        { name: 'Oslo, sentrum', count: 1 },
        { name: 'Kalt "Byen"', count: null },
      ],
      columns
    );

    expect(csv).toBe(['Name,N', '"Oslo, sentrum",1', '"Kalt ""Byen""",'].join('\n'));
  });
});

describe('formatOutput', () => {
  it('serializes rows as JSON', () => {
    expect(JSON.parse(formatOutput([{ name: 'Oslo' }], 'json', columns))).toEqual([{ name: 'Oslo' }]);
  });
});

describe('isOutputFormat', () => {
  it('knows the three formats', () => {
    expect(isOutputFormat('csv')).toBe(true);
    expect(isOutputFormat('ndjson')).toBe(false);
  });
});

describe('formatters', () => {
  it('renders booleans and blanks', () => {
    expect(formatters.yesNo(true)).toBe('yes');
    expect(formatters.yesNo(false)).toBe('no');
    expect(formatters.yesNo(null)).toBe('-');
    expect(formatters.text('')).toBe('-');
  });

  it('renders numbers', () => {
    expect(formatters.number(150)).toBe('150');
    expect(formatters.number(null)).toBe('-');
  });

  it('shortens URLs and long text', () => {
    expect(formatters.urlDomain('https://example.org/oslo/piggdekk')).toBe('example.org');
    expect(formatters.urlDomain('not a url')).toBe('not a url');
    expect(formatters.truncate(6)('abcdefgh')).toBe('abc...');
  });
});
