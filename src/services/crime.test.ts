import { describe, expect, it, vi } from 'vitest';

import { MANCHESTER } from '@/src/config/region';
import {
  buildCrimesUrl,
  createPoliceIncidentSource,
  describeSourceFailure,
  tileToPolygonParam,
} from '@/src/services/crime';
import type { Tile } from '@/src/types/geo';
import { RateLimiter } from '@/src/utils/rateLimiter';

const BASE_URL = 'https://police.test/api';

const tile: Tile = {
  id: 'nw',
  name: 'North West',
  ring: [
    { latitude: 53.55, longitude: -2.35 },
    { latitude: 53.55, longitude: -2.245 },
    { latitude: 53.48, longitude: -2.245 },
    { latitude: 53.48, longitude: -2.35 },
  ],
};

const createSource = (fetchImpl: typeof fetch) =>
  createPoliceIncidentSource({
    baseUrl: BASE_URL,
    fetchImpl,
    timeoutMs: 1_000,
    rateLimiter: new RateLimiter({ calls: 100, perMs: 1_000 }),
  });

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('tileToPolygonParam', () => {
  it('renders lat,lng pairs joined by colons', () => {
    expect(tileToPolygonParam(tile)).toBe(
      '53.550000,-2.350000:53.550000,-2.245000:53.480000,-2.245000:53.480000,-2.350000'
    );
  });

  it('drops a closing point that repeats the first corner', () => {
    const closed: Tile = { ...tile, ring: [...tile.ring, tile.ring[0]] };

    expect(tileToPolygonParam(closed)).toBe(tileToPolygonParam(tile));
  });

  it('rejects a ring with fewer than three corners', () => {
    const line: Tile = { ...tile, ring: tile.ring.slice(0, 2) };

    expect(() => tileToPolygonParam(line)).toThrowError('Tile "nw" needs at least three corners');
  });

  it('down-samples very long rings', () => {
    const ring = Array.from({ length: 450 }, (_, index) => ({
      latitude: 53.4 + index / 10_000,
      longitude: -2.3,
    }));

    // step = ceil(450 / 200) = 3 → indices 0, 3, ..., 447
    expect(tileToPolygonParam({ ...tile, ring }).split(':')).toHaveLength(150);
  });
});

describe('buildCrimesUrl', () => {
  it('queries a tile by polygon and month', () => {
    const url = new URL(buildCrimesUrl(BASE_URL, { month: '2025-06', tile }));

    expect(url.origin + url.pathname).toBe('https://police.test/api/crimes-street/all-crime');
    expect(url.searchParams.get('date')).toBe('2025-06');
    expect(url.searchParams.get('poly')).toBe(tileToPolygonParam(tile));
    expect(url.searchParams.has('lat')).toBe(false);
  });

  it('queries a point by lat/lng', () => {
    const url = new URL(
      buildCrimesUrl(BASE_URL, { month: '2025-05', point: { latitude: 53.4794, longitude: -2.2453 } })
    );

    expect(url.searchParams.get('lat')).toBe('53.4794');
    expect(url.searchParams.get('lng')).toBe('-2.2453');
    expect(url.searchParams.has('poly')).toBe(false);
  });

  it('uses the tile when both a tile and a point are given', () => {
    const url = new URL(
      buildCrimesUrl(BASE_URL, { month: '2025-05', tile, point: { latitude: 1, longitude: 2 } })
    );

    expect(url.searchParams.has('poly')).toBe(true);
    expect(url.searchParams.has('lat')).toBe(false);
    expect(url.searchParams.has('lng')).toBe(false);
  });
});

describe('createPoliceIncidentSource', () => {
  it('returns parsed records for a 200 list', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([
        {
          category: 'anti-social-behaviour',
          persistent_id: '',
          id: 116208998,
          month: '2025-06',
          location: { latitude: '53.480000', longitude: '-2.240000', street: { id: 5, name: 'On or near Deansgate' } },
        },
      ])
    );

    const result = await createSource(fetchImpl).fetchMonth({ month: '2025-06', tile });

    expect(result).toEqual({
      ok: true,
      records: [
        {
          id: '116208998',
          category: 'anti-social-behaviour',
          month: '2025-06',
          location: { latitude: 53.48, longitude: -2.24 },
          street: { id: 5, name: 'On or near Deansgate' },
        },
      ],
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe(buildCrimesUrl(BASE_URL, { month: '2025-06', tile }));
  });

  it('returns an empty list for a 200 with no incidents', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([]));

    await expect(createSource(fetchImpl).fetchMonth({ month: '2025-06', tile })).resolves.toEqual({
      ok: true,
      records: [],
    });
  });

  it('reports a 404 as no data for the month', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('', { status: 404 }));

    await expect(createSource(fetchImpl).fetchMonth({ month: '2030-01', tile })).resolves.toEqual({
      ok: false,
      failure: { kind: 'no_data_for_month' },
    });
  });

  it.each([400, 429, 500, 503])('reports status %i as an HTTP error', async (status) => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('', { status }));

    await expect(createSource(fetchImpl).fetchMonth({ month: '2025-06', tile })).resolves.toEqual({
      ok: false,
      failure: { kind: 'http_error', status },
    });
  });

  it('reports a non-JSON body with a 200 character excerpt', async () => {
    const body = `<html>${'x'.repeat(300)}</html>`;
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(body, { status: 200 }));

    const result = await createSource(fetchImpl).fetchMonth({ month: '2025-06', tile });

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'malformed_body', excerpt: body.slice(0, 200) },
    });
  });

  it('reports JSON that is not a list as malformed', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'bad poly' }));

    await expect(createSource(fetchImpl).fetchMonth({ month: '2025-06', tile })).resolves.toEqual({
      ok: false,
      failure: { kind: 'malformed_body', excerpt: '{"error":"bad poly"}' },
    });
  });

  it('reports a rejected fetch as a network error', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    await expect(createSource(fetchImpl).fetchMonth({ month: '2025-06', tile })).resolves.toEqual({
      ok: false,
      failure: { kind: 'network_error', message: 'fetch failed' },
    });
  });

  it('reports an aborted request as a timeout', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(abort);

    await expect(createSource(fetchImpl).fetchMonth({ month: '2025-06', tile })).resolves.toEqual({
      ok: false,
      failure: { kind: 'network_error', message: 'timed out after 1000ms' },
    });
  });

  it('rejects a query with neither a tile nor a point without calling the API', async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    await expect(createSource(fetchImpl).fetchMonth({ month: '2025-06' })).rejects.toMatchObject({
      code: 'crime_query_error',
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('works with the configured region tiles', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse([]));
    const source = createSource(fetchImpl);

    for (const regionTile of MANCHESTER.tiles) {
      await source.fetchMonth({ month: '2025-06', tile: regionTile });
    }

    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });
});

describe('describeSourceFailure', () => {
  it('renders each failure kind', () => {
    expect(describeSourceFailure({ kind: 'no_data_for_month' })).toBe('no data published for this month (404)');
    expect(describeSourceFailure({ kind: 'http_error', status: 503 })).toBe('HTTP 503');
    expect(describeSourceFailure({ kind: 'malformed_body', excerpt: '<html>' })).toBe('unexpected body: <html>');
    expect(describeSourceFailure({ kind: 'network_error', message: 'fetch failed' })).toBe(
      'network error: fetch failed'
    );
  });
});
