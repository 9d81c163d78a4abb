/**
 * Tests for the Fallback Decision Engine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FallbackDecisionEngine } from '../../../src/main/services/fallbackDecision';
import { PendingVerificationStore } from '../../../src/main/services/pendingVerification';
import { Logger } from '../../../src/main/services/logger';
import type { Track } from '../../../src/shared/types';
import { MemoryPendingBackend, makeTrack } from '../../helpers/fakes';

function albumTracks(years: string[]): Track[] {
  return years.map((year) => makeTrack({ year }));
}

describe('FallbackDecisionEngine', () => {
  let store: PendingVerificationStore;
  let logger: Logger;
  let engine: FallbackDecisionEngine;

  beforeEach(async () => {
    store = new PendingVerificationStore({ backend: new MemoryPendingBackend() });
    await store.initialize();
    logger = new Logger({ writeToFile: false });
    engine = new FallbackDecisionEngine({ pendingStore: store, logger });
  });

  // ─── Validation ────────────────────────────────────────────────────────

  describe('invalid proposals', () => {
    it('should reject a non-year and keep the existing year', async () => {
      const decision = await engine.decide({
        proposedYear: '20x1',
        tracks: albumTracks(['1990', '1990', '1991']),
        isDefinitive: true,
        artist: 'Artist',
        album: 'Album',
      });

      expect(decision).toEqual({ action: 'reject', reason: 'invalid_proposed_year', preservedYear: '1990' });
      expect(logger.getWarnings()[0].category).toBe('ValidationError');
      expect(store.size).toBe(0);
    });
  });

  // ─── Disabled fallback ─────────────────────────────────────────────────

  describe('fallback disabled', () => {
    beforeEach(() => {
      engine = new FallbackDecisionEngine({ pendingStore: store, settings: { fallbackEnabled: false } });
    });

    it('should apply and mark non-definitive years', async () => {
      const decision = await engine.decide({
        proposedYear: '1950',
        tracks: albumTracks(['']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      });

      expect(decision).toEqual({ action: 'apply', year: '1950', reason: 'fallback_disabled' });
      const entry = await store.getEntry('Artist', 'Album');
      expect(entry?.reason).toBe('no_year_found');
      expect(entry?.metadata).toEqual({ proposed_year: '1950', source_confidence: 'low' });
    });

    it('should apply definitive years without marking', async () => {
      const decision = await engine.decide({
        proposedYear: '1950',
        tracks: albumTracks(['']),
        isDefinitive: true,
        artist: 'Artist',
        album: 'Album',
      });

      expect(decision.action).toBe('apply');
      expect(store.size).toBe(0);
    });
  });

  // ─── Decision tree ─────────────────────────────────────────────────────

  describe('decision tree', () => {
    it('should apply definitive years even when they differ a lot', async () => {
      const decision = await engine.decide({
        proposedYear: '2020',
        tracks: albumTracks(['1990']),
        isDefinitive: true,
        artist: 'Artist',
        album: 'Greatest Hits',
      });

      expect(decision).toEqual({ action: 'apply', year: '2020', reason: 'definitive' });
      expect(store.size).toBe(0);
    });

    it('should reject absurd years when nothing exists locally', async () => {
      const decision = await engine.decide({
        proposedYear: '1965',
        tracks: albumTracks(['', '']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      });

      expect(decision).toEqual({ action: 'reject', reason: 'absurd_year_no_existing', preservedYear: null });
      const entry = await store.getEntry('Artist', 'Album');
      expect(entry?.reason).toBe('absurd_year_no_existing');
      expect(entry?.metadata).toEqual({ proposed_year: '1965', absurd_threshold: 1970 });
    });

    it('should not treat old years as absurd when an existing year is close', async () => {
      const decision = await engine.decide({
        proposedYear: '1965',
        tracks: albumTracks(['1966']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      });

      expect(decision).toEqual({ action: 'apply', year: '1965', reason: 'reasonable_change' });
    });

    it('should apply when there is no existing year', async () => {
      const decision = await engine.decide({
        proposedYear: '2001',
        tracks: albumTracks(['', '0']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Greatest Hits',
      });

      expect(decision).toEqual({ action: 'apply', year: '2001', reason: 'no_existing_year' });
      expect(store.size).toBe(0);
    });

    it('should mark and skip compilations', async () => {
      const decision = await engine.decide({
        proposedYear: '2005',
        tracks: albumTracks(['1990', '1990']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Greatest Hits',
      });

      expect(decision).toEqual({
        action: 'mark_and_skip',
        reason: 'special_album_compilation',
        preservedYear: '1990',
      });
      const entry = await store.getEntry('Artist', 'Greatest Hits');
      expect(entry?.metadata).toEqual({
        existing_year: '1990',
        proposed_year: '2005',
        album_type: 'compilation',
        detected_pattern: 'greatest hits',
      });
    });

    it('should mark special albums even when the years agree', async () => {
      const decision = await engine.decide({
        proposedYear: '1990',
        tracks: albumTracks(['1990']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'B-Sides',
      });

      expect(decision.action).toBe('mark_and_skip');
      expect((await store.getEntry('Artist', 'B-Sides'))?.reason).toBe('special_album_special');
    });

    it('should mark and apply reissues', async () => {
      const decision = await engine.decide({
        proposedYear: '2010',
        tracks: albumTracks(['1990']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album (Deluxe)',
      });

      expect(decision).toEqual({ action: 'apply', year: '2010', reason: 'special_album_reissue' });
      expect((await store.getEntry('Artist', 'Album (Deluxe)'))?.reason).toBe('special_album_reissue');
    });

    it('should reject suspicious changes and keep the existing year', async () => {
      const decision = await engine.decide({
        proposedYear: '2000',
        tracks: albumTracks(['1990', '1990', '1991']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      });

      expect(decision).toEqual({ action: 'reject', reason: 'suspicious_year_change', preservedYear: '1990' });
      const entry = await store.getEntry('Artist', 'Album');
      expect(entry?.metadata).toEqual({ existing_year: '1990', proposed_year: '2000', year_difference: 10 });
    });

    it('should apply a change exactly at the threshold', async () => {
      const decision = await engine.decide({
        proposedYear: '1995',
        tracks: albumTracks(['1990']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      });

      expect(decision).toEqual({ action: 'apply', year: '1995', reason: 'reasonable_change' });
      expect(store.size).toBe(0);
    });

    it('should honour custom thresholds', async () => {
      const strict = new FallbackDecisionEngine({
        pendingStore: store,
        settings: { yearDifferenceThreshold: 0, absurdYearThreshold: 2000 },
      });

      const changed = await strict.decide({
        proposedYear: '1991',
        tracks: albumTracks(['1990']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      });
      expect(changed.action).toBe('reject');

      const absurd = await strict.decide({
        proposedYear: '1995',
        tracks: albumTracks(['']),
        isDefinitive: false,
        artist: 'Other',
        album: 'Album',
      });
      expect(absurd).toEqual({ action: 'reject', reason: 'absurd_year_no_existing', preservedYear: null });
    });
  });

  // ─── Repeated decisions ────────────────────────────────────────────────

  describe('repeated decisions', () => {
    it('should give the same decision when an applied year is proposed again', async () => {
      const input = {
        proposedYear: '2010',
        tracks: albumTracks(['2010', '2010']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      };

      const first = await engine.decide(input);
      const second = await engine.decide(input);

      expect(first).toEqual({ action: 'apply', year: '2010', reason: 'reasonable_change' });
      expect(second).toEqual(first);
      expect(store.size).toBe(0);
    });

    it('should give the same rejection and keep one pending entry', async () => {
      const input = {
        proposedYear: '2000',
        tracks: albumTracks(['1990']),
        isDefinitive: false,
        artist: 'Artist',
        album: 'Album',
      };

      const first = await engine.decide(input);
      const second = await engine.decide(input);

      expect(second).toEqual(first);
      expect(store.size).toBe(1);
      expect((await store.getEntry('Artist', 'Album'))?.attemptCount).toBe(2);
    });
  });
});
