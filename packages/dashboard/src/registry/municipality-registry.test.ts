/**
 * Municipality registry tests
 *
 * The HTTP client gets a stubbed fetch; nothing leaves the process.
 */

import { describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_REGISTRY_URL,
  fetchMunicipalityRegistry,
  flattenRecord,
  normalizeRecords,
} from './municipality-registry.js';
import { HTTPClient, HTTPError } from '../core/http-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function clientWith(fetchImpl: typeof fetch, timeoutMs = 1_000): HTTPClient {
  return new HTTPClient({ fetchImpl, timeoutMs });
}

describe('flattenRecord', () => {
  it('joins nested keys with dots and keeps arrays as JSON text', () => {
    expect(
      flattenRecord({
        kommunenavn: 'Oslo',
        fylke: { navn: 'Oslo', nummer: '03' },
        nabokommuner: ['Bærum', 'Lørenskog'],
        areal: 454,
        sammenslatt: null,
      })
    ).toEqual({
      kommunenavn: 'Oslo',
      'fylke.navn': 'Oslo',
      'fylke.nummer': '03',
      nabokommuner: '["Bærum","Lørenskog"]',
      areal: 454,
      sammenslatt: null,
    });
  });
});

describe('normalizeRecords', () => {
  it('uses the union of keys in first-seen order', () => {
    const table = normalizeRecords([
      { kommunenummer: '0301', kommunenavn: 'Oslo' },
      { kommunenummer: '4601', kommunenavnNorsk: 'Bergen' },
    ]);

    expect(table.columns).toEqual(['kommunenummer', 'kommunenavn', 'kommunenavnNorsk']);
    expect(table.rows).toEqual([
      { kommunenummer: '0301', kommunenavn: 'Oslo', kommunenavnNorsk: null },
      { kommunenummer: '4601', kommunenavn: null, kommunenavnNorsk: 'Bergen' },
    ]);
  });
});

describe('fetchMunicipalityRegistry', () => {
  it('returns the normalized registry', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([
        { kommunenavn: 'Oslo', kommunenummer: '0301' },
        { kommunenavn: 'Bergen', kommunenummer: '4601' },
      ])
    );

    const table = await fetchMunicipalityRegistry({ client: clientWith(fetchImpl) });

    expect(fetchImpl).toHaveBeenCalledWith(
      DEFAULT_REGISTRY_URL,
      expect.objectContaining({ method: 'GET' })
    );
    expect(table.columns).toEqual(['kommunenavn', 'kommunenummer']);
    expect(table.rows).toHaveLength(2);
  });

  it('returns an empty table on a non-2xx response', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'down' }, 503));

    const table = await fetchMunicipalityRegistry({ client: clientWith(fetchImpl) });

    expect(table).toEqual({ columns: [], rows: [] });
  });

  it('returns an empty table on a connection error', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const table = await fetchMunicipalityRegistry({ client: clientWith(fetchImpl) });

    expect(table).toEqual({ columns: [], rows: [] });
  });

  it('returns an empty table when the payload is not a list of objects', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ kommuner: [] }));

    const table = await fetchMunicipalityRegistry({ client: clientWith(fetchImpl) });

    expect(table).toEqual({ columns: [], rows: [] });
  });

  it('returns an empty table on a body that is not JSON', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html></html>'));

    const table = await fetchMunicipalityRegistry({ client: clientWith(fetchImpl) });

    expect(table).toEqual({ columns: [], rows: [] });
  });

  it('gives up after the timeout', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const table = await fetchMunicipalityRegistry({
      client: clientWith(fetchImpl, 20),
      timeoutMs: 20,
    });

    expect(table).toEqual({ columns: [], rows: [] });
  });

  it('gives up when the body stalls after the headers arrive', async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('['));
      },
    });
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(stalled, { status: 200 }));

    const table = await fetchMunicipalityRegistry({
      client: clientWith(fetchImpl, 20),
      timeoutMs: 20,
    });

    expect(table).toEqual({ columns: [], rows: [] });
  });
});

describe('HTTPClient', () => {
  it('reports a stalled body as a timeout', async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('[{"kommunenavn":'));
      },
    });
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(stalled));

    await expect(clientWith(fetchImpl, 20).fetchJSON('https://registry.test/kommuner')).rejects.toThrow(
      'Request timeout after 20ms: https://registry.test/kommuner'
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('makes a single request on a server error', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'down' }, 503));

    await expect(clientWith(fetchImpl).fetchJSON('https://registry.test/kommuner')).rejects.toBeInstanceOf(
      HTTPError
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
