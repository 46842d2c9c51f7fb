/**
 * incidentCache.ts
 *
 * Session cache of police.uk results keyed by location cell and month.
 *
 * Key: query kind + rounded lat/lng (3 decimal places ≈ ~110m) + YYYY-MM.
 * Tile (polygon) and point (1 mile radius) answers for the same cell differ,
 * so they never share an entry.
 *
 * Empty lists are stored too, so a cell known to have no incidents for a
 * month is not asked again. There is no TTL and no eviction: the region is
 * small and fixed and the cache lives as long as the process. Callers own the
 * instance; the Aggregator takes one through its constructor options.
 */

import type { IncidentRecord } from '@/src/types/crime';
import { createLogger } from '@/src/utils/logger';

const log = createLogger('Cache');

export type IncidentCacheStats = {
  hits: number;
  misses: number;
  writes: number;
};

export type CacheScope = 'tile' | 'point';

/** Round to 3 decimals (~110m) so near-identical queries share an entry */
export const incidentCacheKey = (lat: number, lng: number, month: string, scope: CacheScope = 'tile'): string =>
  `${scope}:${lat.toFixed(3)},${lng.toFixed(3)},${month}`;

export class IncidentCache {
  private readonly store = new Map<string, readonly IncidentRecord[]>();
  private hits = 0;
  private misses = 0;
  private writes = 0;

  get(lat: number, lng: number, month: string, scope: CacheScope = 'tile'): readonly IncidentRecord[] | undefined {
    const key = incidentCacheKey(lat, lng, month, scope);
    const cached = this.store.get(key);

    if (cached) {
      this.hits++;
      log.debug(`HIT ${key} (${cached.length} records)`);
    } else {
      this.misses++;
    }

    return cached;
  }

  /** Last write wins. The stored list is a frozen copy. */
  set(lat: number, lng: number, month: string, records: readonly IncidentRecord[], scope: CacheScope = 'tile'): void {
    const key = incidentCacheKey(lat, lng, month, scope);
    this.store.set(key, Object.freeze([...records]));
    this.writes++;
  }

  has(lat: number, lng: number, month: string, scope: CacheScope = 'tile'): boolean {
    return this.store.has(incidentCacheKey(lat, lng, month, scope));
  }

  get size(): number {
    return this.store.size;
  }

  get stats(): IncidentCacheStats {
    return { hits: this.hits, misses: this.misses, writes: this.writes };
  }

  clear(): void {
    this.store.clear();
    this.hits = 0;
    this.misses = 0;
    this.writes = 0;
  }
}
