/**
 * Municipality registry client (Kartverket kommuneinfo)
 *
 * Optional enrichment source: the list of Norwegian municipalities from the
 * public registry, normalized into a flat table. Nothing in the rendered
 * dashboard depends on it, so every failure degrades to an empty table.
 *
 * @module registry/municipality-registry
 */

import { z } from 'zod';
import { HTTPClient } from '../core/http-client.js';
import { emptyTable, type CellValue, type DataTable, type Row } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'registry' });

export const DEFAULT_REGISTRY_URL = 'https://ws.geonorge.no/kommuneinfo/v1/kommuner';
export const DEFAULT_REGISTRY_TIMEOUT_MS = 10_000;

/**
 * Registry answers with an array of municipality objects, e.g.
 * `{ "kommunenavn": "Oslo", "kommunenavnNorsk": "Oslo", "kommunenummer": "0301" }`
 */
export const RegistryResponseSchema = z.array(z.record(z.unknown()));

export interface RegistryOptions {
  readonly url?: string;
  readonly timeoutMs?: number;
  readonly client?: HTTPClient;
}

/**
 * Flatten nested objects into dotted column names.
 * Arrays and other non-scalar leaves are kept as their JSON text.
 */
export function flattenRecord(
  record: Readonly<Record<string, unknown>>,
  prefix = ''
): Record<string, CellValue> {
  const flat: Record<string, CellValue> = {};

  for (const [key, value] of Object.entries(record)) {
    const column = prefix ? `${prefix}.${key}` : key;

    if (value === null || value === undefined) {
      flat[column] = null;
    } else if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      flat[column] = value;
    } else if (isPlainObject(value)) {
      Object.assign(flat, flattenRecord(value, column));
    } else {
      flat[column] = JSON.stringify(value);
    }
  }

  return flat;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Table over the flattened records. Columns are the union of keys in
 * first-seen order; a record without a column gets null there.
 */
export function normalizeRecords(records: ReadonlyArray<Readonly<Record<string, unknown>>>): DataTable {
  const flattened = records.map((record) => flattenRecord(record));

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of flattened) {
    for (const column of Object.keys(record)) {
      if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
  }

  const rows: Row[] = flattened.map((record) =>
    Object.fromEntries(columns.map((column) => [column, record[column] ?? null] as const))
  );

  return { columns, rows };
}

/**
 * Fetch the municipality registry.
 *
 * Never rejects: connection errors, timeouts, non-2xx responses and
 * unexpected payloads all yield an empty table.
 */
export async function fetchMunicipalityRegistry(options: RegistryOptions = {}): Promise<DataTable> {
  const url = options.url ?? DEFAULT_REGISTRY_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REGISTRY_TIMEOUT_MS;
  const client = options.client ?? new HTTPClient({ timeoutMs });

  try {
    const payload = await client.fetchJSON(url, { timeoutMs });
    const parsed = RegistryResponseSchema.safeParse(payload);
    if (!parsed.success) {
      log.warn('Registry response has an unexpected shape', {
        url,
        issues: parsed.error.issues.length,
      });
      return emptyTable();
    }

    const table = normalizeRecords(parsed.data);
    log.debug('Fetched municipality registry', { url, rows: table.rows.length });
    return table;
  } catch (error) {
    log.warn('Municipality registry unavailable', {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return emptyTable();
  }
}
