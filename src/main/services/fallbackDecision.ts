/**
 * Fallback Decision Engine
 *
 * Decides what to do with a year proposed by the external lookup when the
 * lookup was not definitive: apply it, keep the album's existing year, or
 * queue the album for manual verification.
 *
 * Decision tree (first match wins):
 * 1. Definitive lookup → apply
 * 2. Proposed year below the absurd threshold, no existing year → mark, reject
 * 3. No existing year → apply
 * 4. Special / compilation / reissue album → mark; skip (special, compilation)
 *    or apply (reissue)
 * 5. |existing − proposed| above the difference threshold → mark, reject
 * 6. Otherwise → apply
 */

import type { Track, YearDecision, YearEngineSettings } from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import { getMostCommonYear, parseYear } from '../utils/yearUtils';
import { detectAlbumType } from './albumTypeDetector';
import { ValidationError } from './errors';
import type { Logger } from './logger';
import type { PendingVerificationStore } from './pendingVerification';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export type FallbackSettings = Pick<
  YearEngineSettings,
  'absurdYearThreshold' | 'yearDifferenceThreshold' | 'fallbackEnabled'
>;

export interface FallbackDecisionOptions {
  pendingStore: PendingVerificationStore;
  settings?: Partial<FallbackSettings>;
  logger?: Logger;
}

export interface DecisionInput {
  proposedYear: string;
  /** Tracks of the album (used for the existing year) */
  tracks: readonly Track[];
  isDefinitive: boolean;
  artist: string;
  album: string;
}

// ─── Engine ──────────────────────────────────────────────────────────────────

export class FallbackDecisionEngine {
  private readonly pendingStore: PendingVerificationStore;
  private readonly settings: FallbackSettings;
  private readonly logger: Logger | null;

  constructor(options: FallbackDecisionOptions) {
    this.pendingStore = options.pendingStore;
    this.settings = {
      absurdYearThreshold: options.settings?.absurdYearThreshold ?? DEFAULT_SETTINGS.absurdYearThreshold,
      yearDifferenceThreshold:
        options.settings?.yearDifferenceThreshold ?? DEFAULT_SETTINGS.yearDifferenceThreshold,
      fallbackEnabled: options.settings?.fallbackEnabled ?? DEFAULT_SETTINGS.fallbackEnabled,
    };
    this.logger = options.logger ?? null;
  }

  async decide(input: DecisionInput): Promise<YearDecision> {
    const { proposedYear, tracks, isDefinitive, artist, album } = input;
    const proposed = parseYear(proposedYear);
    const existingYear = getMostCommonYear(tracks);

    if (proposed === null) {
      this.logger?.logError(
        new ValidationError(`Proposed year "${proposedYear}" is not a year`, { artist, album, step: 'fallback' }),
        undefined,
        'WARN',
      );
      return { action: 'reject', reason: 'invalid_proposed_year', preservedYear: existingYear };
    }

    if (!this.settings.fallbackEnabled) {
      if (!isDefinitive) {
        await this.pendingStore.markForVerification(artist, album, 'no_year_found', {
          proposed_year: proposedYear,
          source_confidence: 'low',
        });
      }
      return { action: 'apply', year: proposedYear, reason: 'fallback_disabled' };
    }

    if (isDefinitive) {
      this.logger?.debug(`Applying ${proposedYear} (definitive lookup)`, { artist, album, step: 'fallback' });
      return { action: 'apply', year: proposedYear, reason: 'definitive' };
    }

    if (proposed < this.settings.absurdYearThreshold && existingYear === null) {
      await this.pendingStore.markForVerification(artist, album, 'absurd_year_no_existing', {
        proposed_year: proposedYear,
        absurd_threshold: this.settings.absurdYearThreshold,
      });
      this.logger?.warn(
        `Rejected year ${proposedYear}: below ${this.settings.absurdYearThreshold} with no existing year`,
        { artist, album, step: 'fallback' },
      );
      return { action: 'reject', reason: 'absurd_year_no_existing', preservedYear: null };
    }

    if (existingYear === null) {
      this.logger?.debug(`Applying ${proposedYear} (no existing year)`, { artist, album, step: 'fallback' });
      return { action: 'apply', year: proposedYear, reason: 'no_existing_year' };
    }

    const albumType = detectAlbumType(album);
    if (albumType.type !== 'normal') {
      const reason = `special_album_${albumType.type}` as const;
      await this.pendingStore.markForVerification(artist, album, reason, {
        existing_year: existingYear,
        proposed_year: proposedYear,
        album_type: albumType.type,
        detected_pattern: albumType.detectedPattern,
      });

      if (albumType.strategy === 'mark_and_skip') {
        this.logger?.warn(
          `Keeping ${existingYear}, rejected ${proposedYear} (${albumType.type} album, pattern "${albumType.detectedPattern ?? ''}")`,
          { artist, album, step: 'fallback' },
        );
        return { action: 'mark_and_skip', reason, preservedYear: existingYear };
      }

      this.logger?.info(`Applying ${proposedYear} to reissue (pattern "${albumType.detectedPattern ?? ''}")`, {
        artist,
        album,
        step: 'fallback',
      });
      return { action: 'apply', year: proposedYear, reason };
    }

    const existing = parseYear(existingYear);
    const difference = existing === null ? 0 : Math.abs(existing - proposed);
    if (difference > this.settings.yearDifferenceThreshold) {
      await this.pendingStore.markForVerification(artist, album, 'suspicious_year_change', {
        existing_year: existingYear,
        proposed_year: proposedYear,
        year_difference: difference,
      });
      this.logger?.warn(`Suspicious change ${existingYear} → ${proposedYear} (${difference} years), keeping existing`, {
        artist,
        album,
        step: 'fallback',
      });
      return { action: 'reject', reason: 'suspicious_year_change', preservedYear: existingYear };
    }

    return { action: 'apply', year: proposedYear, reason: 'reasonable_change' };
  }
}
