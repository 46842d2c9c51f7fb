import type { LatLng, Region, Tile } from '@/src/types/geo';

const corners = (north: number, south: number, west: number, east: number): LatLng[] => [
  { latitude: north, longitude: west },
  { latitude: north, longitude: east },
  { latitude: south, longitude: east },
  { latitude: south, longitude: west },
];

// Four tiles covering the Manchester council area. They share edges, so a
// record exactly on a boundary can come back from both neighbours.
const MANCHESTER_TILES: Tile[] = [
  { id: 'nw', name: 'North West', ring: corners(53.55, 53.48, -2.35, -2.245) },
  { id: 'ne', name: 'North East', ring: corners(53.55, 53.48, -2.245, -2.14) },
  { id: 'sw', name: 'South West', ring: corners(53.48, 53.41, -2.35, -2.245) },
  { id: 'se', name: 'South East', ring: corners(53.48, 53.41, -2.245, -2.14) },
];

const freezeTile = (tile: Tile): Tile =>
  Object.freeze({
    ...tile,
    ring: Object.freeze(tile.ring.map((point) => Object.freeze({ ...point }))),
  });

export const MANCHESTER: Region = Object.freeze({
  name: 'Manchester',
  boundingBox: Object.freeze({ minLat: 53.35, maxLat: 53.6, minLng: -2.4, maxLng: -2.1 }),
  fallbackCenter: Object.freeze({ latitude: 53.4794, longitude: -2.2453 }),
  fallbackPlaceName: 'Manchester',
  defaultRadiusMeters: 1609,
  tiles: Object.freeze(MANCHESTER_TILES.map(freezeTile)),
});

export const DEFAULT_REGION = MANCHESTER;

/** How many months the nearby summary covers by default. */
export const DEFAULT_MONTHS_BACK = 6;
