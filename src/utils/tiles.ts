/**
 * tiles.ts — geometry helpers for query tiles.
 *
 * Tiles are stored as plain corner rings; turf does the polygon work so the
 * cache cell agrees with the GeoJSON polygon the ring describes.
 */

import { centroid, polygon } from '@turf/turf';
import type { Feature, Polygon } from 'geojson';

import { AppError } from '@/src/types/errors';
import type { LatLng, Tile } from '@/src/types/geo';

const samePoint = (a: LatLng, b: LatLng): boolean =>
  a.latitude === b.latitude && a.longitude === b.longitude;

/** Ring without a repeated closing point. */
export const openRing = (ring: readonly LatLng[]): LatLng[] => {
  if (ring.length > 1 && samePoint(ring[0], ring[ring.length - 1])) {
    return ring.slice(0, -1);
  }
  return [...ring];
};

export const tileToPolygon = (tile: Tile): Feature<Polygon> => {
  const ring = openRing(tile.ring);

  if (ring.length < 3) {
    throw new AppError('region_config_error', `Tile "${tile.id}" needs at least three corners`, undefined, {
      tileId: tile.id,
    });
  }

  // GeoJSON positions are [lng, lat] and the ring must close.
  const positions = [...ring, ring[0]].map((corner) => [corner.longitude, corner.latitude]);
  return polygon([positions], { id: tile.id });
};

/** Representative point of a tile; the cache keys tile queries by it. */
export const tileCell = (tile: Tile): LatLng => {
  const [longitude, latitude] = centroid(tileToPolygon(tile)).geometry.coordinates;
  return { latitude, longitude };
};
