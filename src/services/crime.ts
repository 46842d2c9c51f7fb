import { randomUUID } from 'node:crypto';

import { env } from '@/src/config/env';
import { parseIncidentList } from '@/src/services/incidentRecords';
import type { IncidentQuery, IncidentSource, SourceFailure, SourceResult } from '@/src/types/crime';
import { AppError } from '@/src/types/errors';
import type { Tile } from '@/src/types/geo';
import { createLogger } from '@/src/utils/logger';
import { policeApiRateLimiter, RateLimiter } from '@/src/utils/rateLimiter';
import { openRing } from '@/src/utils/tiles';

const log = createLogger('PoliceAPI');

const STREET_CRIMES_PATH = '/crimes-street/all-crime';
const MAX_POLYGON_POINTS = 200;
const BODY_EXCERPT_LENGTH = 200;

const toFixedCoord = (value: number): string => value.toFixed(6);

/**
 * Render a tile as the police.uk `poly` parameter: `lat,lng:lat,lng:...`.
 * The API closes the ring itself, so a repeated closing point is dropped.
 */
export const tileToPolygonParam = (tile: Tile): string => {
  const ring = openRing(tile.ring);

  if (ring.length < 3) {
    throw new AppError('crime_polygon_error', `Tile "${tile.id}" needs at least three corners`);
  }

  // Long rings push the URL past what the API accepts
  const step = Math.max(1, Math.ceil(ring.length / MAX_POLYGON_POINTS));
  const sampled = ring.filter((_, index) => index % step === 0);

  return sampled
    .map((corner) => `${toFixedCoord(corner.latitude)},${toFixedCoord(corner.longitude)}`)
    .join(':');
};

/** Exactly one spatial selector is sent; the tile wins over the point. */
export const buildCrimesUrl = (baseUrl: string, query: IncidentQuery): string => {
  const params = new URLSearchParams({ date: query.month });

  if (query.tile) {
    params.set('poly', tileToPolygonParam(query.tile));
  } else if (query.point) {
    params.set('lat', String(query.point.latitude));
    params.set('lng', String(query.point.longitude));
  } else {
    throw new AppError('crime_query_error', 'Crime query needs a tile or a point', undefined, {
      month: query.month,
    });
  }

  return `${baseUrl}${STREET_CRIMES_PATH}?${params.toString()}`;
};

export const describeQuery = (query: IncidentQuery): string => {
  if (query.tile) return `${query.month} tile=${query.tile.id}`;
  if (query.point) return `${query.month} point=${query.point.latitude},${query.point.longitude}`;
  return `${query.month} (no selector)`;
};

export const describeSourceFailure = (failure: SourceFailure): string => {
  switch (failure.kind) {
    case 'no_data_for_month':
      return 'no data published for this month (404)';
    case 'http_error':
      return `HTTP ${failure.status}`;
    case 'malformed_body':
      return `unexpected body: ${failure.excerpt}`;
    case 'network_error':
      return `network error: ${failure.message}`;
  }
};

const excerpt = (text: string): string => text.slice(0, BODY_EXCERPT_LENGTH);

const fail = (failure: SourceFailure): SourceResult => ({ ok: false, failure });

export type PoliceIncidentSourceOptions = {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
  generateId?: () => string;
};

/**
 * Client for data.police.uk street-level crimes. One call = one spatial
 * selector and one month. Expected outcomes (404, bad status, bad body,
 * network trouble) come back as a failed SourceResult, never as a throw;
 * nothing here retries.
 */
export const createPoliceIncidentSource = (
  options: PoliceIncidentSourceOptions = {}
): IncidentSource => {
  const baseUrl = (options.baseUrl ?? env.policeApiBaseUrl).replace(/\/+$/, '');
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? env.httpTimeoutMs;
  const rateLimiter = options.rateLimiter ?? policeApiRateLimiter;
  const generateId = options.generateId ?? randomUUID;

  const timedFetch = (url: string): Promise<Response> =>
    rateLimiter.execute(async () => {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        return await fetchImpl(url, {
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        });
      } finally {
        clearTimeout(timer);
      }
    });

  const fetchMonth = async (query: IncidentQuery): Promise<SourceResult> => {
    const url = buildCrimesUrl(baseUrl, query);
    const label = describeQuery(query);

    log.debug(`🌐 GET ${label}`);

    try {
      const response = await timedFetch(url);

      if (response.status === 404) {
        return fail({ kind: 'no_data_for_month' });
      }

      if (!response.ok) {
        return fail({ kind: 'http_error', status: response.status });
      }

      const text = await response.text();

      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        return fail({ kind: 'malformed_body', excerpt: excerpt(text) });
      }

      const records = parseIncidentList(body, generateId);
      if (!records) {
        return fail({ kind: 'malformed_body', excerpt: excerpt(text) });
      }

      log.debug(`${label} → ${records.length} records`);
      return { ok: true, records };
    } catch (error) {
      if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        return fail({ kind: 'network_error', message: `timed out after ${timeoutMs}ms` });
      }

      return fail({
        kind: 'network_error',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  };

  return { fetchMonth };
};

export const policeIncidentSource = createPoliceIncidentSource();

export const fetchMonth = (query: IncidentQuery): Promise<SourceResult> =>
  policeIncidentSource.fetchMonth(query);
