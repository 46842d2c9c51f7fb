/**
 * aggregator.ts
 *
 * Fans police.uk queries out over (month × tile) and merges what comes back.
 *
 * Order of work and of the merged list: months newest → oldest, tiles in
 * configured order, records in response order. Nothing is re-sorted and
 * nothing is de-duplicated, so a record on a shared tile edge may appear
 * twice. A failing tile is logged and skipped; it never stops the month or
 * the window. Only a bad window request (no tiles, malformed tile, non-numeric
 * month count, invalid anchor date) throws.
 */

import { describeQuery, describeSourceFailure } from '@/src/services/crime';
import type {
  AggregationResult,
  IncidentQuery,
  IncidentRecord,
  IncidentSource,
} from '@/src/types/crime';
import { AppError, describeError } from '@/src/types/errors';
import type { LatLng, Tile } from '@/src/types/geo';
import { type CacheScope, IncidentCache } from '@/src/utils/incidentCache';
import { createLogger } from '@/src/utils/logger';
import { monthWindow } from '@/src/utils/months';
import { tileCell } from '@/src/utils/tiles';

const log = createLogger('Aggregator');

export type TileConcurrency = 'sequential' | 'parallel';

export type AggregatorOptions = {
  source: IncidentSource;
  cache?: IncidentCache;
  /** `parallel` queries a month's tiles together; the merge order is unchanged. */
  concurrency?: TileConcurrency;
};

export type WindowRequest = {
  monthsBack: number;
  tiles: readonly Tile[];
  anchorDate: Date;
};

export type PointWindowRequest = {
  point: LatLng;
  monthsBack: number;
  anchorDate: Date;
};

export type LatestMonthRequest = {
  point: LatLng;
  anchorDate: Date;
  /** How many months to walk back before giving up. Defaults to 6. */
  window?: number;
};

export type LatestMonthResult = {
  month: string;
  records: IncidentRecord[];
};

const DEFAULT_LATEST_WINDOW = 6;

const assertMonthCount = (value: number, label: string): void => {
  if (!Number.isFinite(value)) {
    throw new AppError('aggregator_window_error', `${label} must be a number, got ${value}`);
  }
};

const assertAnchorDate = (anchorDate: Date): void => {
  if (Number.isNaN(anchorDate.getTime())) {
    throw new AppError('aggregator_window_error', 'anchorDate is not a valid date');
  }
};

export class IncidentAggregator {
  private readonly source: IncidentSource;
  private readonly cache: IncidentCache;
  private readonly concurrency: TileConcurrency;

  constructor(options: AggregatorOptions) {
    this.source = options.source;
    this.cache = options.cache ?? new IncidentCache();
    this.concurrency = options.concurrency ?? 'sequential';
  }

  /**
   * Query every tile for each of the `monthsBack` months ending at
   * `anchorDate`. `monthsUsed` lists every month attempted, newest first,
   * whether or not any tile returned data for it.
   */
  async fetchWindow({ monthsBack, tiles, anchorDate }: WindowRequest): Promise<AggregationResult> {
    assertMonthCount(monthsBack, 'monthsBack');
    assertAnchorDate(anchorDate);

    if (tiles.length === 0) {
      throw new AppError('region_config_error', 'No tiles to query');
    }

    // Resolve every cell up front so a malformed tile fails the window, not one call
    const cells = tiles.map((tile) => tileCell(tile));
    const months = monthWindow(anchorDate, monthsBack);

    const monthsUsed: string[] = [];
    const records: IncidentRecord[] = [];

    for (const month of months) {
      const chunks = await this.fetchMonthTiles(month, tiles, cells);

      let monthTotal = 0;
      for (const chunk of chunks) {
        if (!chunk) continue;
        records.push(...chunk);
        monthTotal += chunk.length;
      }

      monthsUsed.push(month);
      log.info(`${month} → ${monthTotal} records from ${tiles.length} tiles`);
    }

    return { monthsUsed, records };
  }

  /**
   * Single-point variant: one query per month at `point`. Unlike
   * fetchWindow, only months that produced records are listed.
   */
  async fetchPointWindow({ point, monthsBack, anchorDate }: PointWindowRequest): Promise<AggregationResult> {
    assertMonthCount(monthsBack, 'monthsBack');
    assertAnchorDate(anchorDate);

    const monthsUsed: string[] = [];
    const records: IncidentRecord[] = [];

    for (const month of monthWindow(anchorDate, monthsBack)) {
      const list = await this.fetchCached({ point, month }, point, 'point');
      if (list && list.length > 0) {
        monthsUsed.push(month);
        records.push(...list);
      }
    }

    return { monthsUsed, records };
  }

  /**
   * Walk back from `anchorDate` and return the first month with any records
   * at `point`. When every month is empty or fails, the oldest month tried is
   * returned with no records.
   */
  async fetchLatestNonEmptyMonth({
    point,
    anchorDate,
    window = DEFAULT_LATEST_WINDOW,
  }: LatestMonthRequest): Promise<LatestMonthResult> {
    assertMonthCount(window, 'window');
    assertAnchorDate(anchorDate);

    const months = monthWindow(anchorDate, window);

    for (const month of months) {
      const list = await this.fetchCached({ point, month }, point, 'point');
      if (list && list.length > 0) {
        return { month, records: [...list] };
      }
    }

    return {
      month: months[months.length - 1],
      records: [],
    };
  }

  private async fetchMonthTiles(
    month: string,
    tiles: readonly Tile[],
    cells: LatLng[]
  ): Promise<Array<readonly IncidentRecord[] | null>> {
    if (this.concurrency === 'parallel') {
      // Promise.all keeps results in tile order regardless of completion order
      return Promise.all(tiles.map((tile, index) => this.fetchCached({ tile, month }, cells[index], 'tile')));
    }

    const results: Array<readonly IncidentRecord[] | null> = [];
    for (const [index, tile] of tiles.entries()) {
      results.push(await this.fetchCached({ tile, month }, cells[index], 'tile'));
    }
    return results;
  }

  /** Cache-first fetch of one (cell, month). Returns null when the call failed. */
  private async fetchCached(
    query: IncidentQuery,
    cell: LatLng,
    scope: CacheScope
  ): Promise<readonly IncidentRecord[] | null> {
    const cached = this.cache.get(cell.latitude, cell.longitude, query.month, scope);
    if (cached) {
      return cached;
    }

    const label = describeQuery(query);

    try {
      const result = await this.source.fetchMonth(query);

      if (result.ok) {
        this.cache.set(cell.latitude, cell.longitude, query.month, result.records, scope);
        return result.records;
      }

      if (result.failure.kind === 'no_data_for_month') {
        log.info(`${label} → ${describeSourceFailure(result.failure)}`);
      } else {
        log.warn(`${label} → ${describeSourceFailure(result.failure)}`);
      }
      return null;
    } catch (error) {
      log.warn(`${label} → error: ${describeError(error)}`);
      return null;
    }
  }
}
