/**
 * categories.ts
 *
 * Maps police.uk category ids (e.g. "violent-crime", "theft-from-the-person")
 * onto the coarser display groups shown to users, each with a severity flag.
 */

import type { CategoryCount, CategoryGroupSpec, IncidentRecord, Totals } from '@/src/types/crime';

const group = (name: string, isSerious: boolean): CategoryGroupSpec => Object.freeze({ name, isSerious });

const ROBBERY = group('Robbery', true);
const THEFT = group('Theft & Shoplifting', false);
const VEHICLE = group('Vehicle crime', false);
const VIOLENCE = group('Violence', true);
const OTHER = group('Other', false);
const PUBLIC_ORDER = group('Public order', false);
const DRUGS_WEAPONS = group('Drugs & Weapons', true);
const BURGLARY_ARSON = group('Burglary & Arson', false);

export const CATEGORY_GROUPS: Readonly<Record<string, CategoryGroupSpec>> = Object.freeze({
  robbery: ROBBERY,
  'theft-from-the-person': ROBBERY,

  'bicycle-theft': THEFT,
  shoplifting: THEFT,

  'vehicle-crime': VEHICLE,

  'violent-crime': VIOLENCE,

  'other-crime': OTHER,
  'other-theft': OTHER,

  'public-order': PUBLIC_ORDER,
  'anti-social-behaviour': PUBLIC_ORDER,

  drugs: DRUGS_WEAPONS,
  'possession-of-weapons': DRUGS_WEAPONS,

  burglary: BURGLARY_ARSON,
  'criminal-damage-arson': BURGLARY_ARSON,
});

// Severity rule for categories the table does not know
const SERIOUS_GROUPS: ReadonlySet<string> = new Set(['Robbery', 'Violence', 'Drugs & Weapons']);

export const isSeriousGroup = (displayName: string): boolean => SERIOUS_GROUPS.has(displayName);

/** "bogus-made-up" → "Bogus Made Up" */
export const titleCaseCategory = (category: string): string =>
  category
    .replace(/[-_]+/g, ' ')
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');

const lookupGroup = (category: string): CategoryGroupSpec | undefined =>
  Object.prototype.hasOwnProperty.call(CATEGORY_GROUPS, category) ? CATEGORY_GROUPS[category] : undefined;

/** Display group for a raw category, falling back to a title-cased name. */
export const displayGroupFor = (category: string): CategoryGroupSpec => {
  const mapped = lookupGroup(category);
  if (mapped) return mapped;

  const name = titleCaseCategory(category);
  return { name, isSerious: isSeriousGroup(name) };
};

/**
 * Count records per display group, highest count first.
 * Groups with equal counts keep the order they were first seen in.
 */
export const groupCounts = (records: readonly IncidentRecord[]): CategoryCount[] => {
  const buckets = new Map<string, number>();

  for (const record of records) {
    const { name } = displayGroupFor(record.category);
    buckets.set(name, (buckets.get(name) ?? 0) + 1);
  }

  return [...buckets.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => b.count - a.count);
};

export const totalAndSerious = (records: readonly IncidentRecord[]): Totals => ({
  total: records.length,
  serious: records.filter((record) => displayGroupFor(record.category).isSerious).length,
});

export const EMPTY_TOTALS: Totals = Object.freeze({ total: 0, serious: 0 });
