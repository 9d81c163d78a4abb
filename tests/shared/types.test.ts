import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SETTINGS,
  type PendingReason,
  type YearDecision,
  type AlbumTypeInfo,
} from '../../src/shared/types';

describe('Shared Types', () => {
  describe('DEFAULT_SETTINGS', () => {
    it('should have correct default values', () => {
      expect(DEFAULT_SETTINGS.batchSize).toBe(10);
      expect(DEFAULT_SETTINGS.delayBetweenBatches).toBe(60);
      expect(DEFAULT_SETTINGS.adaptiveDelay).toBe(false);
      expect(DEFAULT_SETTINGS.concurrentApiCalls).toBe(5);
      expect(DEFAULT_SETTINGS.scriptConcurrency).toBe(2);
      expect(DEFAULT_SETTINGS.absurdYearThreshold).toBe(1970);
      expect(DEFAULT_SETTINGS.fallbackEnabled).toBe(true);
      expect(DEFAULT_SETTINGS.yearDifferenceThreshold).toBe(5);
      expect(DEFAULT_SETTINGS.pendingVerificationIntervalDays).toBe(30);
      expect(DEFAULT_SETTINGS.prereleaseRecheckDays).toBe(30);
      expect(DEFAULT_SETTINGS.futureYearThreshold).toBe(1);
      expect(DEFAULT_SETTINGS.maxRetries).toBe(3);
      expect(DEFAULT_SETTINGS.retryDelaySeconds).toBe(1);
      expect(DEFAULT_SETTINGS.remasterKeywords).toEqual(['remaster', 'remastered']);
    });

    it('should have script concurrency between 1 and 10', () => {
      expect(DEFAULT_SETTINGS.scriptConcurrency).toBeGreaterThanOrEqual(1);
      expect(DEFAULT_SETTINGS.scriptConcurrency).toBeLessThanOrEqual(10);
    });
  });

  describe('type shapes', () => {
    it('should accept the special album reasons', () => {
      const reasons: PendingReason[] = [
        'special_album_special',
        'special_album_compilation',
        'special_album_reissue',
      ];
      expect(reasons).toHaveLength(3);
    });

    it('should narrow decisions by action', () => {
      const decision: YearDecision = { action: 'reject', reason: 'suspicious_year_change', preservedYear: '1999' };
      const preserved = decision.action === 'apply' ? null : decision.preservedYear;
      expect(preserved).toBe('1999');
    });

    it('should describe a normal album', () => {
      const info: AlbumTypeInfo = { type: 'normal', detectedPattern: null, strategy: 'normal' };
      expect(info.strategy).toBe('normal');
    });
  });
});
