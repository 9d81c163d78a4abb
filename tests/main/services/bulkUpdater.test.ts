/**
 * Tests for the Retrying Bulk Updater
 *
 * Sleep and jitter are injected so backoff delays can be asserted exactly.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import {
  RetryingBulkUpdater,
  computeRetryDelay,
  MAX_RETRY_DELAY_SECONDS,
} from '../../../src/main/services/bulkUpdater';
import { Logger } from '../../../src/main/services/logger';
import type { TrackUpdater } from '../../../src/shared/types';
import { OverlapTrackingUpdater, RecordingUpdater } from '../../helpers/fakes';

describe('bulkUpdater', () => {
  // ─── computeRetryDelay ─────────────────────────────────────────────────

  describe('computeRetryDelay', () => {
    const noJitter = (): number => 0.5;

    it('should double the delay per attempt', () => {
      expect(computeRetryDelay(1, 1, noJitter)).toBe(1000);
      expect(computeRetryDelay(2, 1, noJitter)).toBe(2000);
      expect(computeRetryDelay(3, 1, noJitter)).toBe(4000);
    });

    it('should cap the base delay', () => {
      expect(computeRetryDelay(1, 30, noJitter)).toBe(MAX_RETRY_DELAY_SECONDS * 1000);
    });

    it('should apply up to 10% jitter either way', () => {
      expect(computeRetryDelay(1, 1, () => 0)).toBeCloseTo(900);
      expect(computeRetryDelay(1, 1, () => 0.75)).toBeCloseTo(1050);
    });
  });

  // ─── RetryingBulkUpdater ───────────────────────────────────────────────

  describe('RetryingBulkUpdater', () => {
    let updater: RecordingUpdater;
    let logger: Logger;
    let sleep: Mock<(ms: number) => Promise<void>>;
    let bulk: RetryingBulkUpdater;

    beforeEach(() => {
      updater = new RecordingUpdater();
      logger = new Logger({ writeToFile: false });
      sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
      bulk = new RetryingBulkUpdater({
        updater,
        maxRetries: 3,
        retryDelaySeconds: 1,
        sleep,
        random: () => 0.5,
        logger,
      });
    });

    it('should update every track', async () => {
      const result = await bulk.updateAlbumTracks(['a', 'b', 'c'], '1999');

      expect(result).toEqual({ successful: 3, failed: 0, updatedIds: ['a', 'b', 'c'] });
      expect(updater.calls).toEqual([
        { trackId: 'a', year: '1999' },
        { trackId: 'b', year: '1999' },
        { trackId: 'c', year: '1999' },
      ]);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should retry a false result immediately', async () => {
      updater.refusing.add('b');
      const result = await bulk.updateAlbumTracks(['a', 'b'], '1999', { artist: 'Artist', album: 'Album' });

      expect(result).toEqual({ successful: 1, failed: 1, updatedIds: ['a'] });
      expect(updater.calls.filter((call) => call.trackId === 'b')).toHaveLength(3);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should back off between failed attempts', async () => {
      updater.failing.add('a');
      const result = await bulk.updateAlbumTracks(['a'], '1999');

      expect(result.failed).toBe(1);
      expect(updater.calls).toHaveLength(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    });

    it('should log an UpdateError once every attempt has failed', async () => {
      updater.failing.add('a');
      await bulk.updateAlbumTracks(['a'], '1999', { artist: 'Artist', album: 'Album' });

      const errors = logger.getErrors();
      expect(errors).toHaveLength(1);
      expect(errors[0].category).toBe('UpdateError');
      expect(errors[0].message).toBe('Could not set year 1999 on track a after 3 attempts');
      expect(errors[0].cause).toBe('script error for a');
      expect(errors[0].album).toBe('Album');
      expect(logger.getWarnings()[0].message).toBe('Updated 0 tracks, 1 failed');
    });

    it('should succeed after a transient failure', async () => {
      let calls = 0;
      const flaky: TrackUpdater = {
        updateTrackYear: async () => {
          calls++;
          if (calls === 1) throw new Error('busy');
          return true;
        },
      };
      const retrying = new RetryingBulkUpdater({ updater: flaky, sleep, random: () => 0.5 });

      const result = await retrying.updateAlbumTracks(['a'], '2001');

      expect(result).toEqual({ successful: 1, failed: 0, updatedIds: ['a'] });
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('should count a track as updated after two failures with three attempts', async () => {
      const update = vi.fn<(trackId: string, year: string) => Promise<boolean>>();
      update
        .mockRejectedValueOnce(new Error('busy'))
        .mockRejectedValueOnce(new Error('busy'))
        .mockResolvedValueOnce(true);
      const retrying = new RetryingBulkUpdater({
        updater: { updateTrackYear: update },
        maxRetries: 3,
        sleep,
        random: () => 0.5,
      });

      const result = await retrying.updateAlbumTracks(['a'], '2001');

      expect(result).toEqual({ successful: 1, failed: 0, updatedIds: ['a'] });
      expect(update).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    });

    it('should skip empty ids without counting them', async () => {
      const result = await bulk.updateAlbumTracks(['a', '  ', 'b'], '1999');

      expect(result).toEqual({ successful: 2, failed: 0, updatedIds: ['a', 'b'] });
      expect(logger.getWarnings()[0].category).toBe('ValidationError');
    });

    it('should make at least one attempt', async () => {
      const single = new RetryingBulkUpdater({ updater, maxRetries: 0, sleep });
      updater.refusing.add('a');
      await single.updateAlbumTracks(['a'], '1999');
      expect(updater.calls).toHaveLength(1);
    });

    it('should run at most concurrencyLimit updates at once', async () => {
      let active = 0;
      let peak = 0;
      const slow: TrackUpdater = {
        updateTrackYear: async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise<void>((resolve) => setTimeout(resolve, 5));
          active--;
          return true;
        },
      };
      const parallel = new RetryingBulkUpdater({ updater: slow, concurrencyLimit: 2, sleep });

      const result = await parallel.updateAlbumTracks(['a', 'b', 'c', 'd', 'e'], '1999');

      expect(result.successful).toBe(5);
      expect(peak).toBe(2);
    });

    it('should share the limit between albums updated at the same time', async () => {
      const tracking = new OverlapTrackingUpdater();
      const shared = new RetryingBulkUpdater({ updater: tracking, concurrencyLimit: 2, sleep });

      const results = await Promise.all([
        shared.updateAlbumTracks(['a1', 'a2', 'a3', 'a4'], '1999'),
        shared.updateAlbumTracks(['b1', 'b2', 'b3', 'b4'], '2004'),
      ]);

      expect(results.map((result) => result.successful)).toEqual([4, 4]);
      expect(tracking.calls).toBe(8);
      expect(tracking.peak).toBe(2);
    });
  });
});
