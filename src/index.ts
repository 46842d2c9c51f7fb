export { env } from '@/src/config/env';
export { DEFAULT_MONTHS_BACK, DEFAULT_REGION, MANCHESTER } from '@/src/config/region';

export {
  IncidentAggregator,
  type AggregatorOptions,
  type LatestMonthRequest,
  type LatestMonthResult,
  type PointWindowRequest,
  type TileConcurrency,
  type WindowRequest,
} from '@/src/services/aggregator';
export {
  CATEGORY_GROUPS,
  displayGroupFor,
  groupCounts,
  isSeriousGroup,
  totalAndSerious,
} from '@/src/services/categories';
export {
  createPoliceIncidentSource,
  describeSourceFailure,
  fetchMonth,
  policeIncidentSource,
  tileToPolygonParam,
  type PoliceIncidentSourceOptions,
} from '@/src/services/crime';
export { isWithinBoundingBox, validateCoordinate } from '@/src/services/geofence';
export { parseIncidentList, toIncidentRecord } from '@/src/services/incidentRecords';
export {
  createNearbyIncidentsService,
  fetchNearby,
  type NearbyIncidentsDeps,
  type NearbyIncidentsService,
} from '@/src/services/nearbyIncidents';
export {
  createNominatimReverseGeocoder,
  createPlaceResolver,
  type Placemark,
  type PlaceResolver,
  type ReverseGeocoder,
} from '@/src/services/placeResolver';

export type * from '@/src/types/crime';
export type * from '@/src/types/geo';
export { AppError, describeError, isAppError } from '@/src/types/errors';

export { formatIncidentSummary } from '@/src/utils/format';
export { IncidentCache, type IncidentCacheStats } from '@/src/utils/incidentCache';
export { createLogger, type Logger } from '@/src/utils/logger';
export { humanMonth, isoMonth, monthWindow, shiftMonths } from '@/src/utils/months';
export { RateLimiter, type RateLimit } from '@/src/utils/rateLimiter';
