export type LatLng = {
  latitude: number;
  longitude: number;
};

export type BoundingBox = {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
};

/**
 * One query tile of a region. The ring is an ordered list of corners and does
 * not need to repeat its first point.
 */
export type Tile = {
  id: string;
  name: string;
  ring: readonly LatLng[];
};

export type Region = {
  name: string;
  boundingBox: BoundingBox;
  fallbackCenter: LatLng;
  fallbackPlaceName: string;
  /** Used by map views to size the visible region; the pipeline only passes it through. */
  defaultRadiusMeters: number;
  tiles: readonly Tile[];
};
