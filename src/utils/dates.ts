const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * Whole days from `now` until `expiry`, floored.
 *
 * An expiry 36 hours out yields 1; one expired 12 hours ago yields -1.
 */
export function remainingDays(expiry: Date, now: Date): number {
  return Math.floor((expiry.getTime() - now.getTime()) / MS_PER_DAY);
}

export function hoursBetween(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / MS_PER_HOUR;
}

/**
 * Calendar date of an instant in UTC, as `YYYY-MM-DD`.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse an ISO timestamp, returning null for absent or invalid input.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
