/**
 * format.ts — display strings built from pipeline results.
 */

import type { NearbyIncidents } from '@/src/types/crime';
import { humanMonth } from '@/src/utils/months';

/** "42 reports in Manchester, data from June 2025" */
export const formatIncidentSummary = (result: Pick<NearbyIncidents, 'totals' | 'placeName' | 'latestMonth'>): string =>
  `${result.totals.total} reports in ${result.placeName}, data from ${humanMonth(result.latestMonth)}`;

