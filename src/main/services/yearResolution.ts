/**
 * Year Resolution Service
 *
 * Per-album pipeline and library-wide entry points of the engine.
 *
 * For one album, after the guards:
 * 0. Skip when the cached year already matches the library (unless forced)
 * 1. Dominant year already on the tracks
 * 2. Release year every track agrees on (stored in the cache)
 * 3. Cached year
 * 4. External lookup, then the fallback decision (stored in the cache
 *    when applied)
 * 5. Bulk update of the tracks whose year is absent or different
 * 6. Removal from the pending queue once the album is settled, unless a
 *    guard asked to keep it queued
 *
 * A failed lookup, a lookup without a year and a rejected proposal all
 * leave the album's tracks untouched.
 */

import type {
  AlbumGroup,
  AlbumYearCache,
  AlbumYearLookup,
  AlbumYearLookupResult,
  ChangeLogEntry,
  Track,
  TrackUpdater,
  YearDecision,
  YearEngineSettings,
  YearSource,
} from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import type { SleepFn } from '../utils/concurrency';
import { getMostCommonYear, isEmptyYear } from '../utils/yearUtils';
import { AlbumGuards } from './albumGuards';
import type { GuardResult } from './albumGuards';
import type { BatchProgress } from './batchOrchestrator';
import { BatchOrchestrator, groupTracksByAlbum, selectStrategy } from './batchOrchestrator';
import { RetryingBulkUpdater } from './bulkUpdater';
import { DominantYearCalculator } from './dominantYear';
import { wrapError } from './errors';
import { FallbackDecisionEngine } from './fallbackDecision';
import type { Logger } from './logger';
import type { PendingVerificationStore } from './pendingVerification';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface YearResolutionOptions {
  updater: TrackUpdater;
  lookup: AlbumYearLookup;
  cache: AlbumYearCache;
  pendingStore: PendingVerificationStore;
  settings?: Partial<YearEngineSettings>;
  logger?: Logger;
  /** Produce decisions and the change log without writing tracks or the cache */
  dryRun?: boolean;
  /** Custom sleep for retries and batch delays (for testing) */
  sleep?: SleepFn;
  /** Random source for retry jitter (for testing) */
  random?: () => number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
  onProgress?: (progress: BatchProgress) => void;
}

export interface ResolveOptions {
  /** Resolve the album even when its cached year already matches the library */
  force?: boolean;
}

/** Guard result of an album that passed every guard */
type GuardedTracks = Extract<GuardResult, { action: 'continue' }>;

/** What happened to one album */
export type AlbumOutcome =
  | { status: 'updated'; year: string; source: YearSource; updated: number; failed: number }
  | { status: 'unchanged'; year: string; source: YearSource }
  | { status: 'skipped'; reason: string }
  | { status: 'rejected'; decision: Exclude<YearDecision, { action: 'apply' }> }
  | { status: 'unresolved'; reason: 'lookup_failed' | 'no_year_found' };

export interface YearResolutionSummary {
  albumsTotal: number;
  albumsProcessed: number;
  albumsFailed: number;
  albumsSkipped: number;
  albumsUnresolved: number;
  tracksUpdated: number;
  tracksFailed: number;
  /** Tracks changed during this run */
  changes: ChangeLogEntry[];
}

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * True when the library's most common year is the cached one and no track
 * is missing a year.
 */
export function cacheMatchesLibrary(tracks: readonly Track[], cachedYear: string): boolean {
  return getMostCommonYear(tracks) === cachedYear.trim() && tracks.every((track) => !isEmptyYear(track.year));
}

// ─── Service ─────────────────────────────────────────────────────────────────

export class YearResolutionService {
  private readonly cache: AlbumYearCache;
  private readonly lookup: AlbumYearLookup;
  private readonly pendingStore: PendingVerificationStore;
  private readonly settings: YearEngineSettings;
  private readonly logger: Logger | null;
  private readonly dryRun: boolean;
  private readonly getCurrentDate: () => Date;

  private readonly guards: AlbumGuards;
  private readonly dominant: DominantYearCalculator;
  private readonly fallback: FallbackDecisionEngine;
  private readonly bulkUpdater: RetryingBulkUpdater;
  private readonly orchestrator: BatchOrchestrator;

  private readonly changeLog: ChangeLogEntry[] = [];

  constructor(options: YearResolutionOptions) {
    this.cache = options.cache;
    this.lookup = options.lookup;
    this.pendingStore = options.pendingStore;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.logger = options.logger ?? null;
    this.dryRun = options.dryRun ?? false;
    this.getCurrentDate = options.getCurrentDate ?? ((): Date => new Date());

    const logger = options.logger;
    const getCurrentDate = this.getCurrentDate;
    const strategy = selectStrategy(this.settings);

    this.guards = new AlbumGuards({
      pendingStore: this.pendingStore,
      settings: this.settings,
      logger,
      getCurrentDate,
    });
    this.dominant = new DominantYearCalculator({ logger, getCurrentDate });
    this.fallback = new FallbackDecisionEngine({ pendingStore: this.pendingStore, settings: this.settings, logger });
    this.bulkUpdater = new RetryingBulkUpdater({
      updater: options.updater,
      maxRetries: this.settings.maxRetries,
      retryDelaySeconds: this.settings.retryDelaySeconds,
      concurrencyLimit: strategy.kind === 'bounded' ? strategy.limit : 1,
      sleep: options.sleep,
      random: options.random,
      logger,
    });
    this.orchestrator = new BatchOrchestrator({
      settings: this.settings,
      logger,
      sleep: options.sleep,
      onProgress: options.onProgress,
    });
  }

  get isDryRun(): boolean {
    return this.dryRun;
  }

  /** Every change recorded since construction (or the last clear) */
  getChangeLog(): ChangeLogEntry[] {
    return [...this.changeLog];
  }

  clearChangeLog(): void {
    this.changeLog.length = 0;
  }

  /**
   * Stops a running `run()` after the albums already in flight.
   */
  cancel(): void {
    this.orchestrator.cancel();
  }

  // ─── Library Entry Points ──────────────────────────────────────────────────

  /**
   * Resolves the year of every album in the library.
   */
  async run(tracks: readonly Track[], options: ResolveOptions = {}): Promise<YearResolutionSummary> {
    const albums = [...groupTracksByAlbum(tracks).values()];
    return this.runAlbums(albums, options);
  }

  /**
   * Re-runs only the albums whose pending re-check is due. These are always
   * forced past the cache-match skip.
   */
  async verifyPendingAlbums(tracks: readonly Track[]): Promise<YearResolutionSummary> {
    const due = await this.pendingStore.getAlbumsDueForVerification();
    const dueKeys = new Set(due.map((entry) => entry.key));
    const albums = [...groupTracksByAlbum(tracks).values()].filter((group) =>
      dueKeys.has(this.pendingStore.makeKey(group.artist, group.album)),
    );

    this.logger?.info(`${due.length} pending albums due, ${albums.length} found in the library`, {
      step: 'pending_verify',
    });
    return this.runAlbums(albums, { force: true });
  }

  private async runAlbums(albums: readonly AlbumGroup[], options: ResolveOptions): Promise<YearResolutionSummary> {
    const summary: YearResolutionSummary = {
      albumsTotal: albums.length,
      albumsProcessed: 0,
      albumsFailed: 0,
      albumsSkipped: 0,
      albumsUnresolved: 0,
      tracksUpdated: 0,
      tracksFailed: 0,
      changes: [],
    };
    const changesBefore = this.changeLog.length;

    const result = await this.orchestrator.run(albums, async (group) => {
      const outcome = await this.resolveAlbum(group, options);
      switch (outcome.status) {
        case 'updated':
          summary.tracksUpdated += outcome.updated;
          summary.tracksFailed += outcome.failed;
          break;
        case 'skipped':
        case 'rejected':
          summary.albumsSkipped++;
          break;
        case 'unresolved':
          summary.albumsUnresolved++;
          break;
        case 'unchanged':
          break;
      }
    });

    summary.albumsProcessed = result.processed;
    summary.albumsFailed = result.failed;
    summary.changes = this.changeLog.slice(changesBefore);

    this.logger?.info(
      `Year run: ${summary.albumsProcessed} albums, ${summary.tracksUpdated} tracks updated, ${summary.tracksFailed} failed, ${summary.albumsSkipped} skipped, ${summary.albumsUnresolved} unresolved${this.dryRun ? ' (dry run)' : ''}`,
    );
    return summary;
  }

  // ─── Per-Album Pipeline ────────────────────────────────────────────────────

  async resolveAlbum(group: AlbumGroup, options: ResolveOptions = {}): Promise<AlbumOutcome> {
    const { artist, album } = group;

    const guard = await this.guards.check(group);
    if (guard.action === 'skip') {
      return { status: 'skipped', reason: guard.reason };
    }
    const tracks = guard.tracks;

    const cachedYear = await this.cache.getCachedYear(artist, album);
    if (!options.force && cachedYear !== null && cacheMatchesLibrary(tracks, cachedYear)) {
      this.logger?.debug(`Cached year ${cachedYear} matches the library`, { artist, album, step: 'cache' });
      return { status: 'skipped', reason: 'cache_matches_library' };
    }

    const dominantYear = this.dominant.getDominantYear(tracks);
    if (dominantYear !== null) {
      return this.applyYear(group, guard, dominantYear, 'dominant');
    }

    const consensusYear = this.dominant.getConsensusReleaseYear(tracks);
    if (consensusYear !== null) {
      await this.storeInCache(artist, album, consensusYear);
      return this.applyYear(group, guard, consensusYear, 'consensus');
    }

    if (cachedYear !== null) {
      this.logger?.debug(`Cached year ${cachedYear}`, { artist, album, step: 'cache' });
      return this.applyYear(group, guard, cachedYear, 'cache');
    }

    let lookupResult: AlbumYearLookupResult;
    try {
      lookupResult = await this.lookup.lookupAlbumYear(artist, album);
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'LookupError', { artist, album, step: 'api_lookup' }));
      return { status: 'unresolved', reason: 'lookup_failed' };
    }

    const { year: proposedYear, isDefinitive } = lookupResult;

    if (proposedYear === null || isEmptyYear(proposedYear)) {
      this.logger?.info('No year found by the lookup', { artist, album, step: 'api_lookup' });
      return { status: 'unresolved', reason: 'no_year_found' };
    }

    const decision = await this.fallback.decide({ proposedYear, tracks, isDefinitive, artist, album });
    if (decision.action !== 'apply') {
      this.logger?.info(`Year ${proposedYear} not applied (${decision.reason})`, { artist, album, step: 'fallback' });
      return { status: 'rejected', decision };
    }

    await this.storeInCache(artist, album, decision.year);
    return this.applyYear(group, guard, decision.year, 'api');
  }

  /**
   * Writes `year` to the tracks that need it and records the changes.
   */
  private async applyYear(
    group: AlbumGroup,
    { tracks, keepPending }: GuardedTracks,
    year: string,
    source: YearSource,
  ): Promise<AlbumOutcome> {
    const { artist, album } = group;
    const target = year.trim();
    const toUpdate = tracks.filter((track) => isEmptyYear(track.year) || track.year?.trim() !== target);

    if (toUpdate.length === 0) {
      this.logger?.debug(`All tracks already have year ${target}`, { artist, album, step: 'track_update' });
      if (!this.dryRun && !keepPending) {
        await this.pendingStore.removeFromPending(artist, album);
      }
      return { status: 'unchanged', year: target, source };
    }

    if (this.dryRun) {
      for (const track of toUpdate) {
        this.recordChange(group, track, target, source);
      }
      this.logger?.info(`[dry run] Would set year ${target} on ${toUpdate.length} tracks (${source})`, {
        artist,
        album,
        step: 'track_update',
      });
      return { status: 'updated', year: target, source, updated: toUpdate.length, failed: 0 };
    }

    const result = await this.bulkUpdater.updateAlbumTracks(
      toUpdate.map((track) => track.id),
      target,
      { artist, album },
    );

    const updatedIds = new Set(result.updatedIds);
    for (const track of toUpdate) {
      if (updatedIds.has(track.id)) {
        this.recordChange(group, track, target, source);
        track.year = target;
      }
    }

    if (result.failed === 0 && !keepPending) {
      await this.pendingStore.removeFromPending(artist, album);
    }

    this.logger?.info(`Set year ${target} on ${result.successful} tracks (${source})`, {
      artist,
      album,
      step: 'track_update',
    });
    return { status: 'updated', year: target, source, updated: result.successful, failed: result.failed };
  }

  private recordChange(group: AlbumGroup, track: Track, newYear: string, source: YearSource): void {
    this.changeLog.push({
      trackId: track.id,
      trackName: track.name ?? null,
      artist: group.artist,
      album: group.album,
      oldYear: track.year ?? '',
      newYear,
      source,
      timestamp: this.getCurrentDate().toISOString(),
    });
  }

  private async storeInCache(artist: string, album: string, year: string): Promise<void> {
    if (this.dryRun) return;
    try {
      await this.cache.storeCachedYear(artist, album, year);
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'StorageError', { artist, album, step: 'cache_store' }), undefined, 'WARN');
    }
  }
}
