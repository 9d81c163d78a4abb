/**
 * Dominant Year Calculation
 *
 * Decides whether the years already present on an album's tracks are
 * trustworthy enough to skip the external lookup, and whether the tracks'
 * release-date field agrees on a single year.
 *
 * Rule order for getDominantYear (first match wins):
 * 1. No valid year on any track → none
 * 2. One shared year but disagreeing release years → the shared year
 * 3. Leader holds ≥ 60% of ALL album tracks → the leader
 * 4. One distinct year plus tracks without a year (collaboration credits
 *    missing metadata) → that year
 * 5. Top two years within 2 tracks of each other → none (parity)
 * 6. Otherwise → none
 *
 * Rule 2 has to run before the majority check, and the parity check only
 * runs once the majority check has failed.
 */

import type { Track } from '../../shared/types';
import type { Logger } from './logger';
import { collectValidYears, isEmptyYear, isReasonableYear, rankYears } from '../utils/yearUtils';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface DominantYearOptions {
  /** Share of all album tracks the leading year needs (default 0.6) */
  dominanceShare?: number;
  /** Max count gap between the top two years that counts as parity (default 2) */
  parityWindow?: number;
  logger?: Logger;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_DOMINANCE_SHARE = 0.6;
export const DEFAULT_PARITY_WINDOW = 2;

// ─── Calculator ──────────────────────────────────────────────────────────────

export class DominantYearCalculator {
  private readonly dominanceShare: number;
  private readonly parityWindow: number;
  private readonly logger: Logger | null;
  private readonly getCurrentDate: () => Date;

  constructor(options: DominantYearOptions = {}) {
    this.dominanceShare = options.dominanceShare ?? DEFAULT_DOMINANCE_SHARE;
    this.parityWindow = options.parityWindow ?? DEFAULT_PARITY_WINDOW;
    this.logger = options.logger ?? null;
    this.getCurrentDate = options.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Returns the year the album's tracks already agree on, or null when the
   * external lookup should decide.
   *
   * @param tracks - Every track of the album, not pre-filtered
   */
  getDominantYear(tracks: readonly Track[]): string | null {
    const years = collectValidYears(tracks);
    if (years.length === 0) {
      return null;
    }

    const ranked = rankYears(years);
    const leader = ranked[0];
    const total = tracks.length;

    const inconsistentReleaseYears = this.getDistinctReleaseYears(tracks);
    if (ranked.length === 1 && inconsistentReleaseYears.length > 1) {
      this.logger?.info(
        `All tracks have year ${leader.year} but release years disagree (${inconsistentReleaseYears.join(', ')}); keeping track year`,
        { step: 'dominant_year' },
      );
      return leader.year;
    }

    if (leader.count / total >= this.dominanceShare) {
      this.logger?.info(
        `Dominant year ${leader.year} (${leader.count}/${total} tracks, ${formatPercent(leader.count, total)})`,
        { step: 'dominant_year' },
      );
      return leader.year;
    }

    const emptyCount = tracks.filter((track) => isEmptyYear(track.year)).length;
    if (ranked.length === 1 && emptyCount > 0) {
      this.logger?.info(
        `Using year ${leader.year} for ${emptyCount} tracks without a year (collaboration pattern)`,
        { step: 'dominant_year' },
      );
      return leader.year;
    }

    if (ranked.length > 1 && leader.count - ranked[1].count <= this.parityWindow) {
      this.logger?.info(
        `Year parity: ${leader.year} (${leader.count}) vs ${ranked[1].year} (${ranked[1].count}), lookup needed`,
        { step: 'dominant_year' },
      );
      return null;
    }

    this.logger?.info(
      `No dominant year: ${leader.year} has ${leader.count}/${total} tracks (${formatPercent(leader.count, total)}), lookup needed`,
      { step: 'dominant_year' },
    );
    return null;
  }

  /**
   * Returns the release year every track agrees on, if it is plausible
   * (1900 to next year). Tracks without a release year are ignored.
   */
  getConsensusReleaseYear(tracks: readonly Track[]): string | null {
    const distinct = this.getDistinctReleaseYears(tracks);
    if (distinct.length !== 1) {
      if (distinct.length > 1) {
        this.logger?.debug(`No release year consensus: ${distinct.join(', ')}`, { step: 'consensus' });
      }
      return null;
    }

    const [year] = distinct;
    if (!isReasonableYear(year, this.getCurrentDate())) {
      this.logger?.debug(`Consensus release year ${year} is out of range`, { step: 'consensus' });
      return null;
    }

    this.logger?.info(`Consensus release year ${year}`, { step: 'consensus' });
    return year;
  }

  /** Distinct non-empty release years in first-seen order */
  private getDistinctReleaseYears(tracks: readonly Track[]): string[] {
    const distinct = new Set<string>();
    for (const track of tracks) {
      if (!isEmptyYear(track.releaseYear) && track.releaseYear) {
        distinct.add(track.releaseYear.trim());
      }
    }
    return [...distinct];
  }
}

function formatPercent(count: number, total: number): string {
  return `${((count / total) * 100).toFixed(1)}%`;
}
