import { DEFAULT_REGION } from '@/src/config/region';
import type { BoundingBox, LatLng, Region } from '@/src/types/geo';

/** Inclusive on every edge. Non-finite coordinates are never inside. */
export const isWithinBoundingBox = (coordinate: LatLng, box: BoundingBox): boolean => {
  const { latitude, longitude } = coordinate;

  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return false;
  }

  return (
    latitude >= box.minLat &&
    latitude <= box.maxLat &&
    longitude >= box.minLng &&
    longitude <= box.maxLng
  );
};

/**
 * Keep a coordinate inside the supported region.
 *
 * Returns the input unchanged when it falls inside the region's bounding box,
 * otherwise (or when there is no coordinate at all) the region's fallback
 * centre. Never throws.
 */
export const validateCoordinate = (
  coordinate: LatLng | null | undefined,
  region: Region = DEFAULT_REGION
): LatLng => {
  if (!coordinate || !isWithinBoundingBox(coordinate, region.boundingBox)) {
    return region.fallbackCenter;
  }

  return coordinate;
};
