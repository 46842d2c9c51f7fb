/**
 * incidentRecords.ts
 *
 * Parsing of police.uk street-level crime entries. The API is loose about
 * field types (ids arrive as strings, numbers or not at all; coordinates are
 * strings), so each field is validated on its own and repaired with a fallback
 * instead of rejecting the entry. Only a body that is not a list of objects is
 * treated as malformed.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import type { IncidentRecord, IncidentStreet } from '@/src/types/crime';
import type { LatLng } from '@/src/types/geo';

export const UNKNOWN_CATEGORY = 'unknown';
export const UNKNOWN_MONTH = '----';

const coordinateText = z.union([z.string(), z.number()]);

const streetSchema = z.object({
  id: z.number().int().optional().catch(undefined),
  name: z.string().optional().catch(undefined),
});

const locationSchema = z.object({
  latitude: coordinateText,
  longitude: coordinateText,
  street: streetSchema.nullish().catch(undefined),
});

export const policeCrimeItemSchema = z
  .object({
    id: z.union([z.string(), z.number().int()]).nullish().catch(undefined),
    persistent_id: z.string().nullish().catch(undefined),
    category: z.string().nullish().catch(undefined),
    month: z.string().nullish().catch(undefined),
    location: locationSchema.nullish().catch(undefined),
  })
  .passthrough();

export const policeCrimeListSchema = z.array(policeCrimeItemSchema);

export type PoliceCrimeItem = z.infer<typeof policeCrimeItemSchema>;

const ORIGIN: LatLng = Object.freeze({ latitude: 0, longitude: 0 });

const parseDegrees = (value: string | number): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

/** A pair with either axis unparsable is treated as no location at all: (0,0). */
const parseLocation = (location: z.infer<typeof locationSchema> | null | undefined): LatLng => {
  if (!location) return ORIGIN;

  const latitude = parseDegrees(location.latitude);
  const longitude = parseDegrees(location.longitude);
  if (latitude === null || longitude === null) return ORIGIN;

  return Object.freeze({ latitude, longitude });
};

const pickIdentifier = (item: PoliceCrimeItem, generateId: () => string): string => {
  if (typeof item.id === 'string' && item.id.length > 0) return item.id;
  if (typeof item.id === 'number') return String(item.id);
  if (item.persistent_id) return item.persistent_id;
  return generateId();
};

const toStreet = (street: z.infer<typeof streetSchema> | null | undefined): IncidentStreet | undefined => {
  if (!street) return undefined;

  const result: IncidentStreet = {};
  if (street.id !== undefined) result.id = street.id;
  if (street.name !== undefined) result.name = street.name;
  return Object.freeze(result);
};

export const toIncidentRecord = (
  item: PoliceCrimeItem,
  generateId: () => string = randomUUID
): IncidentRecord => {
  const record: IncidentRecord = {
    id: pickIdentifier(item, generateId),
    category: item.category ?? UNKNOWN_CATEGORY,
    month: item.month ?? UNKNOWN_MONTH,
    location: parseLocation(item.location),
  };

  const street = toStreet(item.location?.street);
  if (street) record.street = street;

  return Object.freeze(record);
};

/**
 * Validate a decoded JSON body and convert every entry.
 * Returns null when the body is not a list of objects.
 */
export const parseIncidentList = (
  body: unknown,
  generateId: () => string = randomUUID
): IncidentRecord[] | null => {
  const parsed = policeCrimeListSchema.safeParse(body);
  if (!parsed.success) return null;

  return parsed.data.map((item) => toIncidentRecord(item, generateId));
};
