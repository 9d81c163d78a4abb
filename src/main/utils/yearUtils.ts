/**
 * Year Utilities
 *
 * Helpers for the numeric-string year values carried by tracks.
 */

import type { Track } from '../../shared/types';

/** Earliest year accepted as a plausible release year */
export const MIN_REASONABLE_YEAR = 1900;

/**
 * Checks whether a year value is absent. Blank strings and the host's
 * "0" placeholder both count as absent.
 * @param year - Raw year value
 * @returns true if the year carries no information
 */
export function isEmptyYear(year: string | undefined | null): boolean {
  if (year === undefined || year === null) return true;
  const trimmed = year.trim();
  return trimmed === '' || trimmed === '0';
}

/**
 * Parses a four-digit year string.
 * @param year - Raw year value
 * @returns The year as a number, or null when the value is not a year
 */
export function parseYear(year: string | undefined | null): number | null {
  if (isEmptyYear(year) || !year) return null;
  const trimmed = year.trim();
  if (!/^\d{4}$/.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}

/**
 * A year between 1900 and next year (inclusive).
 */
export function isReasonableYear(year: string, now: Date = new Date()): boolean {
  const parsed = parseYear(year);
  return parsed !== null && parsed >= MIN_REASONABLE_YEAR && parsed <= now.getFullYear() + 1;
}

/**
 * Collects the non-empty `year` values of the given tracks (trimmed).
 */
export function collectValidYears(tracks: readonly Track[]): string[] {
  const years: string[] = [];
  for (const track of tracks) {
    if (!isEmptyYear(track.year) && track.year) {
      years.push(track.year.trim());
    }
  }
  return years;
}

/**
 * Counts years and returns them ordered by count (descending).
 * Ties keep first-seen order.
 */
export function rankYears(years: readonly string[]): Array<{ year: string; count: number }> {
  const counts = new Map<string, number>();
  for (const year of years) {
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, so equal counts stay in insertion order
  return [...counts.entries()]
    .map(([year, count]) => ({ year, count }))
    .sort((a, b) => b.count - a.count);
}

/**
 * The most frequent valid year among the tracks, or null if none has one.
 */
export function getMostCommonYear(tracks: readonly Track[]): string | null {
  const ranked = rankYears(collectValidYears(tracks));
  return ranked.length > 0 ? ranked[0].year : null;
}
