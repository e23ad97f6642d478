/**
 * Left join of the support table onto the contacts table
 *
 * Exact, case-sensitive key match. Every left row survives; a left row with
 * several matching right rows fans out into one row per match, in right-hand
 * order. Right rows without a partner are dropped. Callers that need one row
 * per municipality must deduplicate the contacts first.
 *
 * @module pipeline/merge
 */

import {
  JOIN_KEY,
  type CellValue,
  type ContactRecord,
  type DataTable,
  type MergedRecord,
  type Row,
  type SupportRecord,
} from '../core/types.js';
import { MergeError } from '../core/errors.js';
import { cellText } from '../ingestion/loaders.js';

export const CONTACT_SUFFIX = '_contact';

export interface JoinOptions {
  /** Column present in both tables */
  readonly on: string;
  /** Appended to right-hand columns whose name the left table already uses */
  readonly suffix: string;
}

/**
 * Right-hand column name → name in the joined table
 */
function resolveRightColumns(
  leftColumns: readonly string[],
  rightColumns: readonly string[],
  options: JoinOptions
): Array<readonly [string, string]> {
  const taken = new Set(leftColumns);
  const resolved: Array<readonly [string, string]> = [];

  for (const column of rightColumns) {
    if (column === options.on) continue;

    const target = taken.has(column) ? `${column}${options.suffix}` : column;
    if (taken.has(target)) {
      throw new MergeError(target);
    }
    taken.add(target);
    resolved.push([column, target]);
  }

  return resolved;
}

/**
 * Generic left join.
 *
 * @throws {MergeError} When a suffixed right-hand column still collides
 */
export function leftJoin<L extends Row, R extends Row>(
  left: DataTable<L>,
  right: DataTable<R>,
  options: JoinOptions
): DataTable<L> {
  const rightColumns = resolveRightColumns(left.columns, right.columns, options);

  const index = new Map<CellValue, R[]>();
  for (const row of right.rows) {
    const key = row[options.on] ?? null;
    if (key === null) continue;
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }

  const rows: L[] = [];
  for (const leftRow of left.rows) {
    const key = leftRow[options.on] ?? null;
    const matches: Array<R | null> = (key !== null && index.get(key)) || [null];

    for (const match of matches) {
      const rightPart: Record<string, CellValue> = {};
      for (const [source, target] of rightColumns) {
        rightPart[target] = match ? (match[source] ?? null) : null;
      }
      rows.push({ ...rightPart, ...leftRow });
    }
  }

  return {
    columns: [...left.columns, ...rightColumns.map(([, target]) => target)],
    rows,
  };
}

/**
 * Join contacts onto support records by municipality name
 */
export function mergeSupportWithContacts(
  support: DataTable<SupportRecord>,
  contacts: DataTable<ContactRecord>
): DataTable<MergedRecord> {
  const joined = leftJoin(support, contacts, { on: JOIN_KEY, suffix: CONTACT_SUFFIX });

  return {
    columns: joined.columns,
    rows: joined.rows.map(
      (row): MergedRecord => ({
        ...row,
        service_name: cellText(row.service_name),
        phone: cellText(row.phone),
        website: cellText(row.website),
      })
    ),
  };
}
