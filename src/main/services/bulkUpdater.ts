/**
 * Retrying Bulk Updater
 *
 * Writes one year to many tracks through the host TrackUpdater. Ids are
 * dispatched in batches of `concurrencyLimit`; each id gets up to
 * `maxRetries` attempts. Host calls from every album share one pool of
 * `concurrencyLimit` permits.
 *
 * An attempt that returns false is retried immediately. An attempt that
 * throws waits `min(retryDelaySeconds, 10) * 2^(attempt-1)` seconds with
 * ±10% jitter before the next one.
 */

import type { TrackUpdater } from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import type { SleepFn } from '../utils/concurrency';
import { Semaphore, sleep as defaultSleep } from '../utils/concurrency';
import { UpdateError, ValidationError } from './errors';
import type { Logger } from './logger';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Cap on the base backoff delay */
export const MAX_RETRY_DELAY_SECONDS = 10;

/** Jitter applied to each backoff delay (±10%) */
export const RETRY_JITTER = 0.1;

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface BulkUpdaterOptions {
  updater: TrackUpdater;
  /** Attempts per track (default 3) */
  maxRetries?: number;
  /** Base backoff delay in seconds (default 1) */
  retryDelaySeconds?: number;
  /** Host calls in flight at once, across all albums (default 1) */
  concurrencyLimit?: number;
  /** Custom sleep (for testing) */
  sleep?: SleepFn;
  /** Random source in [0, 1) used for jitter (for testing) */
  random?: () => number;
  logger?: Logger;
}

export interface BulkUpdateResult {
  successful: number;
  failed: number;
  /** Ids that were updated */
  updatedIds: string[];
}

export interface UpdateContext {
  artist?: string;
  album?: string;
}

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Backoff delay in milliseconds before retry number `attempt` (1-based),
 * jitter included.
 */
export function computeRetryDelay(attempt: number, retryDelaySeconds: number, random: () => number): number {
  const base = Math.min(retryDelaySeconds, MAX_RETRY_DELAY_SECONDS) * Math.pow(2, attempt - 1);
  const jitter = 1 + (random() * 2 - 1) * RETRY_JITTER;
  return base * jitter * 1000;
}

// ─── Updater ─────────────────────────────────────────────────────────────────

export class RetryingBulkUpdater {
  private readonly updater: TrackUpdater;
  private readonly maxRetries: number;
  private readonly retryDelaySeconds: number;
  private readonly concurrencyLimit: number;
  private readonly permits: Semaphore;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly logger: Logger | null;

  constructor(options: BulkUpdaterOptions) {
    this.updater = options.updater;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_SETTINGS.maxRetries);
    this.retryDelaySeconds = Math.max(0, options.retryDelaySeconds ?? DEFAULT_SETTINGS.retryDelaySeconds);
    this.concurrencyLimit = Math.max(1, Math.floor(options.concurrencyLimit ?? 1));
    this.permits = new Semaphore(this.concurrencyLimit);
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? null;
  }

  /**
   * Sets `year` on every track id. Empty ids are dropped with a warning and
   * counted neither as successful nor as failed.
   */
  async updateAlbumTracks(
    trackIds: readonly string[],
    year: string,
    context: UpdateContext = {},
  ): Promise<BulkUpdateResult> {
    const ids: string[] = [];
    for (const id of trackIds) {
      if (id.trim()) {
        ids.push(id);
      } else {
        this.logger?.logError(
          new ValidationError('Skipping track without an id', { ...context, step: 'track_update' }),
          undefined,
          'WARN',
        );
      }
    }

    const result: BulkUpdateResult = { successful: 0, failed: 0, updatedIds: [] };

    for (let start = 0; start < ids.length; start += this.concurrencyLimit) {
      const batch = ids.slice(start, start + this.concurrencyLimit);
      const outcomes = await Promise.allSettled(batch.map((id) => this.updateWithRetry(id, year, context)));

      outcomes.forEach((outcome, index) => {
        if (outcome.status === 'fulfilled' && outcome.value) {
          result.successful++;
          result.updatedIds.push(batch[index]);
        } else {
          result.failed++;
        }
      });
    }

    if (result.failed > 0) {
      this.logger?.warn(`Updated ${result.successful} tracks, ${result.failed} failed`, {
        ...context,
        step: 'track_update',
      });
    }

    return result;
  }

  /**
   * Resolves true once an attempt succeeds, false when every attempt failed.
   */
  private async updateWithRetry(trackId: string, year: string, context: UpdateContext): Promise<boolean> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const updated = await this.permits.run(() => this.updater.updateTrackYear(trackId, year));
        if (updated) {
          return true;
        }
        this.logger?.debug(`Update of track ${trackId} returned false (attempt ${attempt}/${this.maxRetries})`, {
          ...context,
          step: 'track_update',
        });
      } catch (error: unknown) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < this.maxRetries) {
          const delay = computeRetryDelay(attempt, this.retryDelaySeconds, this.random);
          this.logger?.debug(
            `Update of track ${trackId} failed (attempt ${attempt}/${this.maxRetries}), retrying in ${(delay / 1000).toFixed(2)}s: ${lastError.message}`,
            { ...context, step: 'track_update' },
          );
          await this.sleep(delay);
        }
      }
    }

    this.logger?.logError(
      new UpdateError(`Could not set year ${year} on track ${trackId} after ${this.maxRetries} attempts`, {
        ...context,
        trackId,
        cause: lastError ?? undefined,
      }),
    );
    return false;
  }
}
