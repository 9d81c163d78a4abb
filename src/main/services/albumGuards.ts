/**
 * Album Guards
 *
 * Checks that run before an album's year is resolved. Each guard either
 * lets the album through or skips it; skipping guards queue the album for
 * a later re-check.
 *
 * Order:
 * 1. Only subscription tracks are editable; none → skip (prerelease when
 *    the album has prerelease tracks)
 * 2. Very short album name spread over many years → suspicious_album_name
 * 3. Any prerelease track in the album → handled per `prereleaseHandling`
 * 4. A track year too far in the future → prerelease
 */

import type { AlbumGroup, PrereleaseHandling, Track, YearEngineSettings } from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import { isPrereleaseTrack, isSubscriptionTrack } from '../utils/trackUtils';
import { collectValidYears, parseYear } from '../utils/yearUtils';
import type { Logger } from './logger';
import type { PendingVerificationStore } from './pendingVerification';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Album names up to this length are checked for year spread */
export const SUSPICIOUS_NAME_MAX_LENGTH = 3;

/** Distinct years that make a short album name suspicious */
export const SUSPICIOUS_MIN_UNIQUE_YEARS = 3;

// ─── Interfaces ──────────────────────────────────────────────────────────────

export type GuardResult =
  /** `keepPending`: the album stays queued even when its update succeeds */
  | { action: 'continue'; tracks: Track[]; keepPending: boolean }
  | { action: 'skip'; reason: string };

export interface AlbumGuardOptions {
  pendingStore: PendingVerificationStore;
  settings?: Partial<
    Pick<YearEngineSettings, 'prereleaseRecheckDays' | 'futureYearThreshold' | 'prereleaseHandling'>
  >;
  logger?: Logger;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

// ─── Guards ──────────────────────────────────────────────────────────────────

export class AlbumGuards {
  private readonly pendingStore: PendingVerificationStore;
  private readonly prereleaseRecheckDays: number;
  private readonly futureYearThreshold: number;
  private readonly prereleaseHandling: PrereleaseHandling;
  private readonly logger: Logger | null;
  private readonly getCurrentDate: () => Date;

  constructor(options: AlbumGuardOptions) {
    this.pendingStore = options.pendingStore;
    this.prereleaseRecheckDays = options.settings?.prereleaseRecheckDays ?? DEFAULT_SETTINGS.prereleaseRecheckDays;
    this.futureYearThreshold = options.settings?.futureYearThreshold ?? DEFAULT_SETTINGS.futureYearThreshold;
    this.prereleaseHandling = options.settings?.prereleaseHandling ?? DEFAULT_SETTINGS.prereleaseHandling;
    this.logger = options.logger ?? null;
    this.getCurrentDate = options.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Runs every guard in order. On `continue`, `tracks` holds the album's
   * editable (subscription) tracks.
   */
  async check(group: AlbumGroup): Promise<GuardResult> {
    const { artist, album } = group;
    const editable = group.tracks.filter(isSubscriptionTrack);
    const prereleaseCount = group.tracks.filter(isPrereleaseTrack).length;

    if (editable.length === 0) {
      if (prereleaseCount > 0) {
        return this.handleAllPrerelease(group, prereleaseCount);
      }
      this.logger?.debug('No subscription tracks, nothing to update', { artist, album, step: 'guards' });
      return { action: 'skip', reason: 'no_editable_tracks' };
    }

    const uniqueYears = new Set(collectValidYears(editable));
    if (album.length <= SUSPICIOUS_NAME_MAX_LENGTH && uniqueYears.size >= SUSPICIOUS_MIN_UNIQUE_YEARS) {
      await this.pendingStore.markForVerification(artist, album, 'suspicious_album_name', {
        unique_years: uniqueYears.size,
        album_name_length: album.length,
      });
      this.logger?.logSkippedAlbum(
        artist,
        album,
        `suspicious album name (${uniqueYears.size} distinct years, name length ${album.length})`,
      );
      return { action: 'skip', reason: 'suspicious_album_name' };
    }

    let keepPending = false;
    if (prereleaseCount > 0) {
      const result = await this.handleMixedPrerelease(group, prereleaseCount, editable.length);
      if (result) return result;
      keepPending = true;
    }

    const years = [...uniqueYears].map((year) => parseYear(year)).filter((year): year is number => year !== null);
    if (years.length > 0) {
      const maxYear = Math.max(...years);
      const currentYear = this.getCurrentDate().getFullYear();
      if (maxYear - currentYear > this.futureYearThreshold) {
        await this.pendingStore.markForVerification(
          artist,
          album,
          'prerelease',
          { expected_year: maxYear, track_count: editable.length },
          this.prereleaseRecheckDays,
        );
        this.logger?.logSkippedAlbum(artist, album, `future year ${maxYear}`);
        return { action: 'skip', reason: 'future_year' };
      }
    }

    return { action: 'continue', tracks: editable, keepPending };
  }

  // ─── Prerelease Handling ───────────────────────────────────────────────────

  /** No editable tracks: always skipped, queued unless the mode is skip_all */
  private async handleAllPrerelease(group: AlbumGroup, prereleaseCount: number): Promise<GuardResult> {
    const { artist, album, tracks } = group;
    const counts = `${prereleaseCount} of ${tracks.length} tracks are prerelease, none editable`;

    if (this.prereleaseHandling === 'skip_all') {
      this.logger?.logSkippedAlbum(artist, album, `${counts} (skip_all)`);
      return { action: 'skip', reason: 'prerelease' };
    }

    await this.pendingStore.markForVerification(
      artist,
      album,
      'prerelease',
      { track_count: tracks.length, prerelease_count: prereleaseCount, all_prerelease: true },
      this.prereleaseRecheckDays,
    );
    this.logger?.logSkippedAlbum(artist, album, counts);
    return { action: 'skip', reason: 'prerelease' };
  }

  /**
   * Album with both editable and prerelease tracks. Returns null when the
   * editable tracks should still be resolved.
   */
  private async handleMixedPrerelease(
    group: AlbumGroup,
    prereleaseCount: number,
    editableCount: number,
  ): Promise<GuardResult | null> {
    const { artist, album, tracks } = group;
    const counts = `${prereleaseCount} of ${tracks.length} tracks are prerelease`;

    switch (this.prereleaseHandling) {
      case 'skip_all':
        this.logger?.logSkippedAlbum(artist, album, `${counts} (skip_all)`);
        return { action: 'skip', reason: 'prerelease' };

      case 'mark_only':
        await this.pendingStore.markForVerification(
          artist,
          album,
          'prerelease',
          { track_count: tracks.length, prerelease_count: prereleaseCount, editable_count: editableCount },
          this.prereleaseRecheckDays,
        );
        this.logger?.logSkippedAlbum(artist, album, counts);
        return { action: 'skip', reason: 'prerelease' };

      case 'process_editable':
        await this.pendingStore.markForVerification(
          artist,
          album,
          'prerelease',
          {
            track_count: tracks.length,
            prerelease_count: prereleaseCount,
            editable_count: editableCount,
            mixed_album: true,
          },
          this.prereleaseRecheckDays,
        );
        this.logger?.info(`${counts}, resolving the ${editableCount} editable tracks`, {
          artist,
          album,
          step: 'guards',
        });
        return null;
    }
  }
}
