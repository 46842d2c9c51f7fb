/**
 * months.ts — calendar month arithmetic for the police.uk `date` parameter.
 *
 * All month maths is done in UTC on (year, month) pairs, so the day of month
 * and the host time zone never move a date across a month boundary.
 */

const ISO_MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** YYYY-MM for the UTC month containing `date`. */
export const isoMonth = (date: Date): string =>
  `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}`;

/** First instant (UTC) of the month `delta` months away from `date`'s month. */
export const shiftMonths = (date: Date, delta: number): Date => {
  const monthIndex = date.getUTCFullYear() * 12 + date.getUTCMonth() + delta;
  const year = Math.floor(monthIndex / 12);
  const month = monthIndex - year * 12;
  return new Date(Date.UTC(year, month, 1));
};

/**
 * The `count` calendar months ending at `anchor`, newest first.
 * `count` below 1 is treated as 1.
 */
export const monthWindow = (anchor: Date, count: number): string[] => {
  const size = Math.max(1, Math.floor(count));
  return Array.from({ length: size }, (_, back) => isoMonth(shiftMonths(anchor, -back)));
};

export const parseIsoMonth = (value: string): { year: number; month: number } | null => {
  const match = ISO_MONTH_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;

  return { year, month };
};

const humanMonthFormat = new Intl.DateTimeFormat('en-GB', {
  month: 'long',
  year: 'numeric',
  timeZone: 'UTC',
});

/** "2025-06" → "June 2025". Anything that is not a month comes back unchanged. */
export const humanMonth = (iso: string): string => {
  const parsed = parseIsoMonth(iso);
  if (!parsed) return iso;

  return humanMonthFormat.format(new Date(Date.UTC(parsed.year, parsed.month - 1, 1)));
};
