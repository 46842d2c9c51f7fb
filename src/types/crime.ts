import type { LatLng, Tile } from '@/src/types/geo';

export type IncidentStreet = {
  id?: number;
  name?: string;
};

export type IncidentRecord = {
  id: string;
  /** Raw police.uk category, e.g. "violent-crime". "unknown" when the source omits it. */
  category: string;
  /** YYYY-MM, or "----" when the source omits it. */
  month: string;
  location: LatLng;
  street?: IncidentStreet;
};

export type CategoryGroupSpec = {
  name: string;
  isSerious: boolean;
};

export type CategoryCount = {
  category: string;
  count: number;
};

export type Totals = {
  total: number;
  serious: number;
};

export type AggregationResult = {
  /** Months attempted, newest first. A month with no data is still listed. */
  monthsUsed: string[];
  records: IncidentRecord[];
};

export type IncidentQuery = {
  month: string;
  tile?: Tile;
  point?: LatLng;
};

export type SourceFailure =
  | { kind: 'no_data_for_month' }
  | { kind: 'http_error'; status: number }
  | { kind: 'malformed_body'; excerpt: string }
  | { kind: 'network_error'; message: string };

export type SourceResult =
  | { ok: true; records: IncidentRecord[] }
  | { ok: false; failure: SourceFailure };

export interface IncidentSource {
  fetchMonth(query: IncidentQuery): Promise<SourceResult>;
}

export type NearbyIncidents = {
  aggregation: AggregationResult;
  totals: Totals;
  categories: CategoryCount[];
  placeName: string;
  /** The geofenced coordinate the data was fetched for. */
  coordinate: LatLng;
  /** Newest month in the window, used as the headline month. */
  latestMonth: string;
};
