import { z } from 'zod';

import { env, requireOsmUserAgent } from '@/src/config/env';
import { DEFAULT_REGION } from '@/src/config/region';
import { AppError, describeError } from '@/src/types/errors';
import type { LatLng } from '@/src/types/geo';
import { createLogger } from '@/src/utils/logger';
import { nominatimRateLimiter, RateLimiter } from '@/src/utils/rateLimiter';

const log = createLogger('Places');

/** One reverse-geocoding candidate, most specific name first. */
export type Placemark = {
  locality?: string;
  subRegion?: string;
  administrativeArea?: string;
};

export type ReverseGeocoder = (coordinate: LatLng) => Promise<Placemark[]>;

const nominatimReverseSchema = z.object({
  error: z.string().optional(),
  address: z
    .object({
      city: z.string().optional(),
      town: z.string().optional(),
      village: z.string().optional(),
      suburb: z.string().optional(),
      county: z.string().optional(),
      state_district: z.string().optional(),
      state: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

const buildHeaders = (): Record<string, string> => {
  const headers: Record<string, string> = {
    'User-Agent': requireOsmUserAgent(),
    Accept: 'application/json',
  };

  if (env.osmEmail) {
    headers.From = env.osmEmail;
  }

  return headers;
};

export type NominatimGeocoderOptions = {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
};

/** Reverse geocoding against Nominatim's `/reverse` endpoint. Rejects on any failure. */
export const createNominatimReverseGeocoder = (options: NominatimGeocoderOptions = {}): ReverseGeocoder => {
  const baseUrl = (options.baseUrl ?? env.osmBaseUrl).replace(/\/+$/, '');
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? env.httpTimeoutMs;
  const rateLimiter = options.rateLimiter ?? nominatimRateLimiter;

  return async (coordinate) => {
    const params = new URLSearchParams({
      format: 'jsonv2',
      lat: String(coordinate.latitude),
      lon: String(coordinate.longitude),
      addressdetails: '1',
      zoom: '14',
    });

    if (env.osmEmail) {
      params.set('email', env.osmEmail);
    }

    const url = `${baseUrl}/reverse?${params.toString()}`;

    const response = await rateLimiter.execute(async () => {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        return await fetchImpl(url, { headers: buildHeaders(), signal: controller.signal });
      } finally {
        clearTimeout(timer);
      }
    });

    if (!response.ok) {
      throw new AppError('osm_http_error', `Nominatim reverse failed with status ${response.status}`);
    }

    const parsed = nominatimReverseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AppError('osm_body_error', 'Unexpected Nominatim reverse response', parsed.error);
    }

    const { address, error } = parsed.data;
    if (error || !address) {
      return [];
    }

    return [
      {
        locality: address.city ?? address.town ?? address.village ?? address.suburb,
        subRegion: address.county ?? address.state_district,
        administrativeArea: address.state,
      },
    ];
  };
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export type PlaceResolverOptions = {
  reverseGeocode?: ReverseGeocoder;
  fallbackName?: string;
};

export type PlaceResolver = {
  resolve: (coordinate: LatLng) => Promise<string>;
};

/**
 * Turns a coordinate into a display name: the first placemark's locality,
 * else its sub-region, else its administrative area. Any failure or empty
 * answer resolves to the fallback name; `resolve` never rejects.
 */
export const createPlaceResolver = (options: PlaceResolverOptions = {}): PlaceResolver => {
  const fallbackName = options.fallbackName ?? DEFAULT_REGION.fallbackPlaceName;
  const reverseGeocode = options.reverseGeocode ?? createNominatimReverseGeocoder();

  const resolve = async (coordinate: LatLng): Promise<string> => {
    try {
      const [first] = await reverseGeocode(coordinate);
      if (first) {
        const name =
          nonEmpty(first.locality) ?? nonEmpty(first.subRegion) ?? nonEmpty(first.administrativeArea);
        if (name) return name;
      }
      log.debug(`No place name for ${coordinate.latitude},${coordinate.longitude}`);
    } catch (error) {
      log.warn(`Reverse geocode failed: ${describeError(error)}`);
    }

    return fallbackName;
  };

  return { resolve };
};
