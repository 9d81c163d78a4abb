/**
 * Batch Orchestrator
 *
 * Groups library tracks into albums and drives a per-album processor over
 * them, either one album at a time with a pause between batches, or with a
 * bounded number of albums in flight.
 *
 * Strategy is chosen once per run:
 *   limit = max(1, min(scriptConcurrency, concurrentApiCalls))
 *   limit 1 and no adaptive delay → sequential, otherwise bounded.
 *
 * A processor that throws is logged and counted as failed; the run always
 * finishes the remaining albums unless cancelled.
 */

import type { AlbumGroup, Track, YearEngineSettings } from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import type { SleepFn } from '../utils/concurrency';
import { Semaphore, sleep as defaultSleep } from '../utils/concurrency';
import { getAlbumArtist } from '../utils/trackUtils';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export type OrchestrationStrategy =
  | { kind: 'sequential'; delaySeconds: number }
  | { kind: 'bounded'; limit: number };

export type OrchestratorSettings = Pick<
  YearEngineSettings,
  'batchSize' | 'delayBetweenBatches' | 'adaptiveDelay' | 'scriptConcurrency' | 'concurrentApiCalls'
>;

/** Runs the year pipeline for one album */
export type AlbumProcessor = (album: AlbumGroup) => Promise<void>;

export interface BatchProgress {
  total: number;
  processed: number;
  failed: number;
}

export interface BatchRunResult extends BatchProgress {
  strategy: OrchestrationStrategy;
  cancelled: boolean;
}

export interface BatchOrchestratorOptions {
  settings?: Partial<OrchestratorSettings>;
  logger?: Logger;
  /** Custom sleep (for testing) */
  sleep?: SleepFn;
  /** Called after every finished album */
  onProgress?: (progress: BatchProgress) => void;
}

// ─── Grouping ────────────────────────────────────────────────────────────────

/** Map key for an (album artist, album) pair; case-sensitive */
export function makeAlbumGroupKey(artist: string, album: string): string {
  return `${artist}\u0000${album}`;
}

/**
 * Groups tracks by album artist (or normalized track artist) and album.
 * Groups keep first-seen order and tracks keep library order.
 */
export function groupTracksByAlbum(tracks: readonly Track[]): Map<string, AlbumGroup> {
  const groups = new Map<string, AlbumGroup>();
  for (const track of tracks) {
    const artist = getAlbumArtist(track);
    const album = track.album.trim();
    const key = makeAlbumGroupKey(artist, album);
    const group = groups.get(key);
    if (group) {
      group.tracks.push(track);
    } else {
      groups.set(key, { artist, album, tracks: [track] });
    }
  }
  return groups;
}

/**
 * Picks the run strategy from the processing settings.
 */
export function selectStrategy(settings: OrchestratorSettings): OrchestrationStrategy {
  const limit = Math.max(1, Math.min(settings.scriptConcurrency, settings.concurrentApiCalls));
  if (limit === 1 && !settings.adaptiveDelay) {
    return { kind: 'sequential', delaySeconds: settings.delayBetweenBatches };
  }
  return { kind: 'bounded', limit };
}

// ─── Orchestrator ────────────────────────────────────────────────────────────

export class BatchOrchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly logger: Logger | null;
  private readonly sleep: SleepFn;
  private readonly onProgress: ((progress: BatchProgress) => void) | null;
  private cancelled = false;

  constructor(options: BatchOrchestratorOptions = {}) {
    this.settings = {
      batchSize: Math.max(1, options.settings?.batchSize ?? DEFAULT_SETTINGS.batchSize),
      delayBetweenBatches: options.settings?.delayBetweenBatches ?? DEFAULT_SETTINGS.delayBetweenBatches,
      adaptiveDelay: options.settings?.adaptiveDelay ?? DEFAULT_SETTINGS.adaptiveDelay,
      scriptConcurrency: options.settings?.scriptConcurrency ?? DEFAULT_SETTINGS.scriptConcurrency,
      concurrentApiCalls: options.settings?.concurrentApiCalls ?? DEFAULT_SETTINGS.concurrentApiCalls,
    };
    this.logger = options.logger ?? null;
    this.sleep = options.sleep ?? defaultSleep;
    this.onProgress = options.onProgress ?? null;
  }

  get strategy(): OrchestrationStrategy {
    return selectStrategy(this.settings);
  }

  /**
   * Stops the run after the albums already in flight.
   */
  cancel(): void {
    this.cancelled = true;
    this.logger?.info('Batch run cancelled');
  }

  async run(albums: readonly AlbumGroup[], processor: AlbumProcessor): Promise<BatchRunResult> {
    this.cancelled = false;
    const strategy = this.strategy;
    const progress: BatchProgress = { total: albums.length, processed: 0, failed: 0 };

    if (albums.length === 0) {
      return { ...progress, strategy, cancelled: false };
    }

    const describe = strategy.kind === 'sequential' ? 'sequential' : `bounded, limit ${strategy.limit}`;
    this.logger?.info(`Processing ${albums.length} albums (${describe}, batch size ${this.settings.batchSize})`);

    const startTime = Date.now();
    if (strategy.kind === 'sequential') {
      await this.runSequential(albums, processor, progress, strategy.delaySeconds);
    } else {
      await this.runBounded(albums, processor, progress, strategy.limit);
    }

    const elapsed = Date.now() - startTime;
    this.logger?.info(
      `Batch run complete: ${progress.processed}/${progress.total} albums, ${progress.failed} failed in ${(elapsed / 1000).toFixed(1)}s`,
    );

    return { ...progress, strategy, cancelled: this.cancelled };
  }

  // ─── Strategies ────────────────────────────────────────────────────────────

  private async runSequential(
    albums: readonly AlbumGroup[],
    processor: AlbumProcessor,
    progress: BatchProgress,
    delaySeconds: number,
  ): Promise<void> {
    const { batchSize } = this.settings;
    for (let start = 0; start < albums.length; start += batchSize) {
      if (this.cancelled) return;

      for (const album of albums.slice(start, start + batchSize)) {
        if (this.cancelled) return;
        await this.processOne(album, processor, progress);
      }

      const isLast = start + batchSize >= albums.length;
      if (!isLast && delaySeconds > 0 && !this.cancelled) {
        this.logger?.debug(`Waiting ${delaySeconds}s before the next batch`);
        await this.sleep(delaySeconds * 1000);
      }
    }
  }

  private async runBounded(
    albums: readonly AlbumGroup[],
    processor: AlbumProcessor,
    progress: BatchProgress,
    limit: number,
  ): Promise<void> {
    const { batchSize } = this.settings;
    const semaphore = new Semaphore(limit);

    for (let start = 0; start < albums.length; start += batchSize) {
      if (this.cancelled) return;
      const batch = albums.slice(start, start + batchSize);

      await Promise.allSettled(
        batch.map(async (album) => {
          await semaphore.acquire();
          if (this.cancelled) {
            semaphore.release();
            return;
          }
          let failed = false;
          try {
            await processor(album);
          } catch (error: unknown) {
            failed = true;
            this.logger?.logError(error, { artist: album.artist, album: album.album, step: 'album' });
          } finally {
            semaphore.release();
          }
          this.record(progress, failed);
        }),
      );
    }
  }

  private async processOne(album: AlbumGroup, processor: AlbumProcessor, progress: BatchProgress): Promise<void> {
    let failed = false;
    try {
      await processor(album);
    } catch (error: unknown) {
      failed = true;
      this.logger?.logError(error, { artist: album.artist, album: album.album, step: 'album' });
    }
    this.record(progress, failed);
  }

  /**
   * Counts a finished album and logs at every tenth of the run.
   */
  private record(progress: BatchProgress, failed: boolean): void {
    progress.processed++;
    if (failed) progress.failed++;

    const interval = Math.max(1, Math.floor(progress.total / 10));
    if (progress.processed % interval === 0 || progress.processed === progress.total) {
      const percent = ((progress.processed / progress.total) * 100).toFixed(0);
      this.logger?.info(`Progress: ${progress.processed}/${progress.total} albums (${percent}%)`);
    }

    this.onProgress?.({ ...progress });
  }
}
