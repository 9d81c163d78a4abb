/**
 * Tests for Settings Manager Service
 *
 * Covers validation of the nested settings.json shape, serialization,
 * the SettingsManager lifecycle, file persistence and change listeners.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  SettingsManager,
  clampNumber,
  getDefaultSettingsDir,
  validateConcurrency,
  validateKeywords,
  validatePrereleaseHandling,
  validateSettings,
  serializeSettings,
  deserializeSettings,
  toRawSettings,
} from '../../../src/main/services/settingsManager';
import { DEFAULT_SETTINGS } from '../../../src/shared/types';
import { Logger } from '../../../src/main/services/logger';

// ─── Helper ──────────────────────────────────────────────────────────────────

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'settings-test-'));
}

function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('SettingsManager', () => {
  // ─── getDefaultSettingsDir ─────────────────────────────────────────────

  describe('getDefaultSettingsDir', () => {
    it('uses APPDATA if set', () => {
      const original = process.env.APPDATA;
      const fakeAppData = path.join('fake', 'appdata');
      process.env.APPDATA = fakeAppData;
      try {
        expect(getDefaultSettingsDir()).toBe(path.join(fakeAppData, 'album-year-engine'));
      } finally {
        if (original !== undefined) {
          process.env.APPDATA = original;
        } else {
          delete process.env.APPDATA;
        }
      }
    });

    it('falls back to homedir/.config if APPDATA is not set', () => {
      const original = process.env.APPDATA;
      delete process.env.APPDATA;
      try {
        expect(getDefaultSettingsDir()).toBe(path.join(os.homedir(), '.config', 'album-year-engine'));
      } finally {
        if (original !== undefined) {
          process.env.APPDATA = original;
        }
      }
    });
  });

  // ─── Validation helpers ────────────────────────────────────────────────

  describe('clampNumber', () => {
    it('returns the fallback for non-numbers and NaN', () => {
      expect(clampNumber('10', 5, 1, 100)).toBe(5);
      expect(clampNumber(NaN, 5, 1, 100)).toBe(5);
      expect(clampNumber(undefined, 5, 1, 100)).toBe(5);
    });

    it('clamps to the range and rounds integers', () => {
      expect(clampNumber(0, 5, 1, 100)).toBe(1);
      expect(clampNumber(250, 5, 1, 100)).toBe(100);
      expect(clampNumber(7.6, 5, 1, 100)).toBe(8);
    });

    it('keeps fractions when allowed', () => {
      expect(clampNumber(0.5, 1, 0, 60, true)).toBe(0.5);
    });
  });

  describe('validateConcurrency', () => {
    it('clamps to 1-10', () => {
      expect(validateConcurrency(0)).toBe(1);
      expect(validateConcurrency(25)).toBe(10);
      expect(validateConcurrency(4)).toBe(4);
    });

    it('falls back to the script concurrency default', () => {
      expect(validateConcurrency('many')).toBe(DEFAULT_SETTINGS.scriptConcurrency);
    });
  });

  describe('validatePrereleaseHandling', () => {
    it('accepts the three modes', () => {
      expect(validatePrereleaseHandling('skip_all')).toBe('skip_all');
      expect(validatePrereleaseHandling('process_editable')).toBe('process_editable');
      expect(validatePrereleaseHandling('mark_only')).toBe('mark_only');
    });

    it('falls back to mark_only', () => {
      expect(validatePrereleaseHandling('Skip_All')).toBe('mark_only');
      expect(validatePrereleaseHandling(undefined)).toBe('mark_only');
    });
  });

  describe('validateKeywords', () => {
    it('trims, lower-cases and drops non-strings', () => {
      expect(validateKeywords([' Remaster ', 42, '', 'Deluxe'])).toEqual(['remaster', 'deluxe']);
    });

    it('falls back to defaults for non-arrays and empty lists', () => {
      expect(validateKeywords('remaster')).toEqual(['remaster', 'remastered']);
      expect(validateKeywords([])).toEqual(['remaster', 'remastered']);
    });
  });

  describe('validateSettings', () => {
    it('returns defaults for non-objects', () => {
      expect(validateSettings(null)).toEqual(DEFAULT_SETTINGS);
      expect(validateSettings([1, 2])).toEqual(DEFAULT_SETTINGS);
    });

    it('returns a fresh keyword array', () => {
      const settings = validateSettings({});
      settings.remasterKeywords.push('extra');
      expect(DEFAULT_SETTINGS.remasterKeywords).toEqual(['remaster', 'remastered']);
    });

    it('reads every nested option', () => {
      const settings = validateSettings({
        year_retrieval: {
          processing: {
            batch_size: 25,
            delay_between_batches: 1.5,
            adaptive_delay: true,
            pending_verification_interval_days: 14,
            prerelease_recheck_days: 7,
            future_year_threshold: 2,
            prerelease_handling: 'process_editable',
          },
          rate_limits: { concurrent_api_calls: 3 },
          logic: { absurd_year_threshold: 1960 },
          fallback: { enabled: false, year_difference_threshold: 3 },
          remaster_keywords: ['Remaster', 'Anniversary'],
        },
        apple_script_concurrency: 4,
        max_retries: 5,
        retry_delay_seconds: 0.25,
      });

      expect(settings).toEqual({
        batchSize: 25,
        delayBetweenBatches: 1.5,
        adaptiveDelay: true,
        concurrentApiCalls: 3,
        scriptConcurrency: 4,
        absurdYearThreshold: 1960,
        fallbackEnabled: false,
        yearDifferenceThreshold: 3,
        pendingVerificationIntervalDays: 14,
        prereleaseRecheckDays: 7,
        futureYearThreshold: 2,
        prereleaseHandling: 'process_editable',
        maxRetries: 5,
        retryDelaySeconds: 0.25,
        remasterKeywords: ['remaster', 'anniversary'],
      });
    });

    it('clamps out-of-range values and ignores wrong types', () => {
      const settings = validateSettings({
        year_retrieval: {
          processing: {
            batch_size: 0,
            adaptive_delay: 'yes',
            future_year_threshold: 50,
            prerelease_handling: 'ignore',
          },
          rate_limits: { concurrent_api_calls: 500 },
          fallback: { enabled: 'no' },
        },
        max_retries: 0,
        retry_delay_seconds: 600,
      });

      expect(settings.batchSize).toBe(1);
      expect(settings.adaptiveDelay).toBe(false);
      expect(settings.futureYearThreshold).toBe(10);
      expect(settings.prereleaseHandling).toBe('mark_only');
      expect(settings.concurrentApiCalls).toBe(50);
      expect(settings.fallbackEnabled).toBe(true);
      expect(settings.maxRetries).toBe(1);
      expect(settings.retryDelaySeconds).toBe(60);
    });

    it('ignores a section that is not an object', () => {
      const settings = validateSettings({ year_retrieval: 'broken' });
      expect(settings).toEqual(DEFAULT_SETTINGS);
    });
  });

  describe('serialization', () => {
    it('writes the nested snake_case shape', () => {
      const raw = toRawSettings(DEFAULT_SETTINGS);
      expect(raw.year_retrieval.processing.batch_size).toBe(10);
      expect(raw.year_retrieval.fallback.year_difference_threshold).toBe(5);
      expect(raw.year_retrieval.processing.prerelease_handling).toBe('mark_only');
      expect(raw.apple_script_concurrency).toBe(2);
    });

    it('reads back what it writes', () => {
      const custom = { ...DEFAULT_SETTINGS, batchSize: 42, fallbackEnabled: false };
      const parsed = deserializeSettings(serializeSettings(custom));
      expect(validateSettings(parsed)).toEqual(custom);
    });

    it('returns null for invalid JSON and non-objects', () => {
      expect(deserializeSettings('{not json')).toBeNull();
      expect(deserializeSettings('[1,2,3]')).toBeNull();
      expect(deserializeSettings('"text"')).toBeNull();
    });
  });

  // ─── SettingsManager ───────────────────────────────────────────────────

  describe('SettingsManager class', () => {
    let tempDir: string;
    let manager: SettingsManager;

    beforeEach(() => {
      tempDir = createTempDir();
      manager = new SettingsManager({ settingsDir: tempDir });
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it('uses defaults when no file exists', async () => {
      await manager.initialize();
      expect(manager.isInitialized()).toBe(true);
      expect(manager.get()).toEqual(DEFAULT_SETTINGS);
    });

    it('loads settings from an existing file', async () => {
      fs.writeFileSync(
        path.join(tempDir, 'settings.json'),
        JSON.stringify({ year_retrieval: { processing: { batch_size: 33 } }, max_retries: 6 }),
      );
      await manager.initialize();
      expect(manager.get().batchSize).toBe(33);
      expect(manager.get().maxRetries).toBe(6);
    });

    it('falls back to defaults and warns on a corrupt file', async () => {
      const logger = new Logger({ writeToFile: false });
      const withLogger = new SettingsManager({ settingsDir: tempDir, logger });
      fs.writeFileSync(path.join(tempDir, 'settings.json'), '{broken');

      await withLogger.initialize();

      expect(withLogger.get()).toEqual(DEFAULT_SETTINGS);
      expect(logger.getWarnings()[0].category).toBe('ValidationError');
    });

    it('returns copies that do not mutate internal state', async () => {
      await manager.initialize();
      const settings = manager.get();
      settings.batchSize = 999;
      settings.remasterKeywords.push('mutated');
      expect(manager.get().batchSize).toBe(10);
      expect(manager.get().remasterKeywords).toEqual(['remaster', 'remastered']);
    });

    it('saves a partial update to disk', async () => {
      await manager.initialize();
      const saved = await manager.save({ batchSize: 25, adaptiveDelay: true });

      expect(saved.batchSize).toBe(25);
      const onDisk: unknown = JSON.parse(fs.readFileSync(manager.getFilePath(), 'utf-8'));
      expect(validateSettings(onDisk).batchSize).toBe(25);
      expect(validateSettings(onDisk).adaptiveDelay).toBe(true);
    });

    it('clamps values passed to save', async () => {
      await manager.initialize();
      const saved = await manager.save({ concurrentApiCalls: 0, yearDifferenceThreshold: 1000 });
      expect(saved.concurrentApiCalls).toBe(1);
      expect(saved.yearDifferenceThreshold).toBe(100);
    });

    it('resets to defaults', async () => {
      await manager.initialize();
      await manager.save({ batchSize: 50 });
      const reset = await manager.reset();
      expect(reset).toEqual(DEFAULT_SETTINGS);
    });

    it('notifies listeners and supports unsubscribe', async () => {
      await manager.initialize();
      const listener = vi.fn();
      const unsubscribe = manager.onChange(listener);

      await manager.save({ batchSize: 12 });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toMatchObject({ batchSize: 12 });

      unsubscribe();
      expect(manager.getListenerCount()).toBe(0);
      await manager.save({ batchSize: 13 });
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('creates the settings directory when saving', async () => {
      const nested = new SettingsManager({ settingsDir: path.join(tempDir, 'a', 'b') });
      await nested.initialize();
      await nested.save({ batchSize: 2 });
      expect(fs.existsSync(nested.getFilePath())).toBe(true);
    });
  });
});
