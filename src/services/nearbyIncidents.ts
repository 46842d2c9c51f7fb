import { DEFAULT_MONTHS_BACK, DEFAULT_REGION } from '@/src/config/region';
import { IncidentAggregator, type TileConcurrency } from '@/src/services/aggregator';
import { EMPTY_TOTALS, groupCounts, totalAndSerious } from '@/src/services/categories';
import { policeIncidentSource } from '@/src/services/crime';
import { validateCoordinate } from '@/src/services/geofence';
import { createPlaceResolver, type PlaceResolver } from '@/src/services/placeResolver';
import type { AggregationResult, IncidentSource, NearbyIncidents } from '@/src/types/crime';
import { AppError, describeError } from '@/src/types/errors';
import type { LatLng, Region } from '@/src/types/geo';
import { IncidentCache } from '@/src/utils/incidentCache';
import { createLogger } from '@/src/utils/logger';
import { isoMonth } from '@/src/utils/months';

const log = createLogger('Nearby');

export type NearbyIncidentsDeps = {
  region?: Region;
  source?: IncidentSource;
  cache?: IncidentCache;
  placeResolver?: PlaceResolver;
  concurrency?: TileConcurrency;
  /** Replaces the aggregator built from source/cache/concurrency; cannot be combined with them. */
  aggregator?: IncidentAggregator;
};

export type NearbyIncidentsService = {
  region: Region;
  fetchNearby: (
    rawCoordinate: LatLng | null | undefined,
    monthsBack?: number,
    anchorDate?: Date
  ) => Promise<NearbyIncidents>;
};

const emptyAggregation = (): AggregationResult => ({ monthsUsed: [], records: [] });

export const createNearbyIncidentsService = (deps: NearbyIncidentsDeps = {}): NearbyIncidentsService => {
  const region = deps.region ?? DEFAULT_REGION;

  if (deps.aggregator && (deps.source || deps.cache || deps.concurrency)) {
    throw new AppError(
      'nearby_config_error',
      'Pass either an aggregator or source/cache/concurrency, not both'
    );
  }

  const aggregator =
    deps.aggregator ??
    new IncidentAggregator({
      source: deps.source ?? policeIncidentSource,
      cache: deps.cache ?? new IncidentCache(),
      concurrency: deps.concurrency,
    });
  const placeResolver =
    deps.placeResolver ?? createPlaceResolver({ fallbackName: region.fallbackPlaceName });

  /**
   * Incidents around a coordinate for the `monthsBack` months ending at
   * `anchorDate`, with category breakdown, totals and a place name.
   *
   * The coordinate is first pulled into the region. Fetching and place lookup
   * run side by side. If the window as a whole fails the result is still
   * well formed: no records, zero totals, no categories. Never rejects.
   */
  const fetchNearby = async (
    rawCoordinate: LatLng | null | undefined,
    monthsBack: number = DEFAULT_MONTHS_BACK,
    anchorDate: Date = new Date()
  ): Promise<NearbyIncidents> => {
    const coordinate = validateCoordinate(rawCoordinate, region);
    log.debug(`Location resolved to ${coordinate.latitude},${coordinate.longitude}`);

    const [aggregation, placeName] = await Promise.all([
      aggregator
        .fetchWindow({ monthsBack, tiles: region.tiles, anchorDate })
        .then((result): AggregationResult | null => result)
        .catch((error: unknown) => {
          log.error(`Failed to fetch incident window: ${describeError(error)}`);
          return null;
        }),
      placeResolver.resolve(coordinate).catch((error: unknown) => {
        log.warn(`Place resolver rejected: ${describeError(error)}`);
        return region.fallbackPlaceName;
      }),
    ]);

    if (!aggregation) {
      return {
        aggregation: emptyAggregation(),
        totals: { ...EMPTY_TOTALS },
        categories: [],
        placeName,
        coordinate,
        latestMonth: isoMonth(anchorDate),
      };
    }

    log.info(`Months queried: ${aggregation.monthsUsed.join(', ')}, total incidents: ${aggregation.records.length}`);

    return {
      aggregation,
      totals: totalAndSerious(aggregation.records),
      categories: groupCounts(aggregation.records),
      placeName,
      coordinate,
      latestMonth: aggregation.monthsUsed[0] ?? isoMonth(anchorDate),
    };
  };

  return { region, fetchNearby };
};

let defaultService: NearbyIncidentsService | null = null;

/** fetchNearby on the process-wide service (live police.uk source, session cache). */
export const fetchNearby = (
  rawCoordinate: LatLng | null | undefined,
  monthsBack?: number,
  anchorDate?: Date
): Promise<NearbyIncidents> => {
  if (!defaultService) {
    defaultService = createNearbyIncidentsService();
  }
  return defaultService.fetchNearby(rawCoordinate, monthsBack, anchorDate);
};
