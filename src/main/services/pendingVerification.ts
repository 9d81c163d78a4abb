/**
 * Pending Verification Store
 *
 * Durable "re-check later" queue for albums whose year could not be settled.
 * Entries live in memory (keyed by a sha256 of artist + cleaned album name)
 * and every mutation is written through a PendingBackend.
 *
 * All public methods serialize on one AsyncMutex. Writes are queued in
 * mutation order and happen outside the lock; a failed write is logged and
 * the in-memory map stays authoritative until the next mutation writes again.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import type { PendingEntry, PendingMetadata, PendingReason } from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import { AsyncMutex } from '../utils/concurrency';
import { cleanAlbumName } from '../utils/trackUtils';
import { StorageError } from './errors';
import type { Logger } from './logger';
import type { PendingBackend, PendingRow } from './persistentCache';
import { getDefaultCacheDir } from './persistentCache';

// ─── Constants ───────────────────────────────────────────────────────────────

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Header row of the problematic albums report */
export const REPORT_HEADER = [
  'Artist',
  'Album',
  'First Attempt',
  'Last Attempt',
  'Total Attempts',
  'Days Since First Attempt',
  'Status',
] as const;

const PENDING_REASONS: readonly PendingReason[] = [
  'no_year_found',
  'prerelease',
  'absurd_year_no_existing',
  'suspicious_year_change',
  'suspicious_album_name',
  'special_album_special',
  'special_album_compilation',
  'special_album_reissue',
];

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface PendingVerificationOptions {
  backend: PendingBackend;
  /** Default re-check interval in days (default 30) */
  intervalDays?: number;
  /** Re-check interval for prerelease entries (default 30) */
  prereleaseRecheckDays?: number;
  /** Keywords stripped from album names before keying */
  remasterKeywords?: readonly string[];
  logger?: Logger;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
  /** Default path of the problematic albums CSV */
  reportPath?: string;
}

// ─── Helper Functions ────────────────────────────────────────────────────────

export function isPendingReason(value: string): value is PendingReason {
  return PENDING_REASONS.some((reason) => reason === value);
}

/**
 * Returns a positive integer day count, or null for anything else.
 */
export function normalizeRecheckDays(value: unknown): number | null {
  const candidate = typeof value === 'string' ? Number(value) : value;
  if (typeof candidate !== 'number' || !Number.isFinite(candidate)) return null;
  const days = Math.trunc(candidate);
  return days > 0 ? days : null;
}

/**
 * Parses a stored metadata string. Anything that is not a JSON object of
 * scalar values yields an empty map.
 */
export function parseMetadata(raw: string): PendingMetadata {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};

  const metadata: PendingMetadata = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean' ||
      value === null
    ) {
      metadata[key] = value;
    }
  }
  return metadata;
}

/** UTC calendar date as YYYY-MM-DD */
export function formatReportDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Quotes a CSV field when it contains a comma, quote or line break.
 */
export function escapeCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** Copy that shares no mutable state with the stored entry */
function copyEntry(entry: PendingEntry): PendingEntry {
  return { ...entry, metadata: { ...entry.metadata }, timestamp: new Date(entry.timestamp.getTime()) };
}

function toRow(entry: PendingEntry): PendingRow {
  return {
    key: entry.key,
    artist: entry.artist,
    album: entry.album,
    timestamp: entry.timestamp.toISOString(),
    reason: entry.reason,
    metadata: JSON.stringify(entry.metadata),
    attempt_count: entry.attemptCount,
  };
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class PendingVerificationStore {
  private readonly backend: PendingBackend;
  private readonly intervalDays: number;
  private readonly prereleaseRecheckDays: number;
  private readonly remasterKeywords: readonly string[];
  private readonly logger: Logger | null;
  private readonly getCurrentDate: () => Date;
  private readonly reportPath: string;

  private readonly entries = new Map<string, PendingEntry>();
  private readonly mutex = new AsyncMutex();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: PendingVerificationOptions) {
    this.backend = options.backend;
    this.intervalDays = options.intervalDays ?? DEFAULT_SETTINGS.pendingVerificationIntervalDays;
    this.prereleaseRecheckDays = options.prereleaseRecheckDays ?? DEFAULT_SETTINGS.prereleaseRecheckDays;
    this.remasterKeywords = options.remasterKeywords ?? DEFAULT_SETTINGS.remasterKeywords;
    this.logger = options.logger ?? null;
    this.getCurrentDate = options.getCurrentDate ?? ((): Date => new Date());
    this.reportPath =
      options.reportPath ?? path.join(getDefaultCacheDir(), 'reports', 'albums_without_year.csv');
  }

  /**
   * Key of an album: sha256 of `pending:<artist>|<cleaned album>`.
   */
  makeKey(artist: string, album: string): string {
    const cleaned = cleanAlbumName(album, this.remasterKeywords);
    return crypto.createHash('sha256').update(`pending:${artist.trim()}|${cleaned}`).digest('hex');
  }

  /**
   * Loads stored entries, then re-keys any entry whose stored key no longer
   * matches its artist and cleaned album. The migrated set is written once.
   *
   * @throws StorageError if the backend cannot be read
   */
  async initialize(): Promise<void> {
    let rows: PendingRow[];
    try {
      rows = await this.backend.load();
    } catch (error: unknown) {
      throw new StorageError('Cannot load pending verification entries', {
        step: 'pending_load',
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }

    const migrated = await this.mutex.runExclusive(() => {
      this.entries.clear();
      let rekeyed = 0;

      for (const row of rows) {
        const entry = this.fromRow(row);
        if (!entry) continue;

        const expectedKey = this.makeKey(entry.artist, entry.album);
        if (expectedKey !== entry.key) {
          entry.key = expectedKey;
          entry.album = cleanAlbumName(entry.album, this.remasterKeywords);
          rekeyed++;
        }

        const existing = this.entries.get(entry.key);
        if (!existing || existing.timestamp < entry.timestamp) {
          this.entries.set(entry.key, entry);
        }
      }

      if (rekeyed > 0) {
        this.logger?.info(`Normalized ${rekeyed} pending album keys`, { step: 'pending_load' });
      }
      this.logger?.info(`Loaded ${this.entries.size} pending albums`, { step: 'pending_load' });
      return rekeyed > 0 ? this.snapshot() : null;
    });

    if (migrated) {
      await this.enqueueWrite(migrated);
    }
  }

  /**
   * Queues an album for a later re-check. Re-marking replaces the entry,
   * refreshes its timestamp and increments its attempt count.
   */
  async markForVerification(
    artist: string,
    album: string,
    reason: PendingReason = 'no_year_found',
    metadata: PendingMetadata = {},
    recheckDays?: number,
  ): Promise<void> {
    let interval = normalizeRecheckDays(recheckDays);
    if (interval === null && reason === 'prerelease') {
      interval = this.prereleaseRecheckDays;
    }

    const { rows, entry } = await this.mutex.runExclusive(() => {
      const key = this.makeKey(artist, album);
      const previous = this.entries.get(key);
      const stored: PendingMetadata = { ...metadata };
      if (interval !== null) {
        stored.recheck_days = interval;
      }

      const next: PendingEntry = {
        key,
        artist: artist.trim(),
        album: album.trim(),
        reason,
        metadata: stored,
        timestamp: this.getCurrentDate(),
        attemptCount: previous ? previous.attemptCount + 1 : 1,
      };
      this.entries.set(key, next);
      return { rows: this.snapshot(), entry: next };
    });

    this.logger?.info(
      `Marked for verification in ${interval ?? this.intervalDays} days (reason: ${reason}, attempt #${entry.attemptCount})`,
      { artist, album, step: 'pending_mark' },
    );

    await this.enqueueWrite(rows);
  }

  /**
   * True when the album is pending and its re-check interval has elapsed.
   */
  async isVerificationNeeded(artist: string, album: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(this.makeKey(artist, album));
      if (!entry) return false;
      return this.isDue(entry, this.getCurrentDate());
    });
  }

  /**
   * Deletes the album's entry. Nothing is written when it was not pending.
   */
  async removeFromPending(artist: string, album: string): Promise<void> {
    const rows = await this.mutex.runExclusive(() => {
      const key = this.makeKey(artist, album);
      const entry = this.entries.get(key);
      if (!entry) {
        this.logger?.debug('Not pending, nothing to remove', { artist, album, step: 'pending_remove' });
        return null;
      }
      this.entries.delete(key);
      this.logger?.info('Removed from pending verification', {
        artist: entry.artist,
        album: entry.album,
        step: 'pending_remove',
      });
      return this.snapshot();
    });

    if (rows) {
      await this.enqueueWrite(rows);
    }
  }

  async getEntry(artist: string, album: string): Promise<PendingEntry | null> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(this.makeKey(artist, album));
      return entry ? copyEntry(entry) : null;
    });
  }

  async getAllPending(): Promise<PendingEntry[]> {
    return this.mutex.runExclusive(() => [...this.entries.values()].map(copyEntry));
  }

  async getPendingByReason(reason: PendingReason): Promise<PendingEntry[]> {
    return this.mutex.runExclusive(() =>
      [...this.entries.values()].filter((entry) => entry.reason === reason).map(copyEntry),
    );
  }

  /**
   * Entries whose re-check interval has elapsed.
   */
  async getAlbumsDueForVerification(): Promise<PendingEntry[]> {
    return this.mutex.runExclusive(() => {
      const now = this.getCurrentDate();
      return [...this.entries.values()].filter((entry) => this.isDue(entry, now)).map(copyEntry);
    });
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Writes a CSV of albums that stayed pending for at least `minAttempts`
   * verification periods, most attempts first.
   *
   * @returns Number of albums in the report (0 when the file cannot be written)
   */
  async generateProblematicReport(minAttempts = 3, reportPath?: string): Promise<number> {
    const target = reportPath ?? this.reportPath;

    const rows = await this.mutex.runExclusive(() => {
      const now = this.getCurrentDate();
      const intervalMs = this.intervalDays * MS_PER_DAY;
      const matches: Array<{ entry: PendingEntry; attempts: number; periods: number; elapsedMs: number }> = [];

      for (const entry of this.entries.values()) {
        const elapsedMs = now.getTime() - entry.timestamp.getTime();
        const periods = Math.floor(elapsedMs / intervalMs);
        if (periods >= minAttempts - 1) {
          matches.push({
            entry,
            periods,
            elapsedMs,
            attempts: Math.max(periods + 1, entry.attemptCount),
          });
        }
      }

      matches.sort((a, b) => b.attempts - a.attempts);

      return matches.map(({ entry, attempts, periods, elapsedMs }) => [
        entry.artist,
        entry.album,
        formatReportDate(entry.timestamp),
        formatReportDate(new Date(entry.timestamp.getTime() + periods * intervalMs)),
        attempts,
        Math.floor(elapsedMs / MS_PER_DAY),
        'Pending verification',
      ]);
    });

    const lines = [[...REPORT_HEADER], ...rows].map((fields) => fields.map(escapeCsvField).join(','));

    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, `${lines.join('\n')}\n`, 'utf-8');
    } catch (error: unknown) {
      this.logger?.logError(
        new StorageError(`Cannot write problematic albums report to ${target}`, {
          step: 'pending_report',
          cause: error instanceof Error ? error : new Error(String(error)),
        }),
      );
      return 0;
    }

    this.logger?.info(`Problematic albums report: ${target} (${rows.length} albums)`, { step: 'pending_report' });
    return rows.length;
  }

  /**
   * Resolves once every queued write has finished.
   */
  flush(): Promise<void> {
    return this.writeChain;
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private isDue(entry: PendingEntry, now: Date): boolean {
    return now.getTime() >= entry.timestamp.getTime() + this.getIntervalDays(entry) * MS_PER_DAY;
  }

  private getIntervalDays(entry: PendingEntry): number {
    const override = normalizeRecheckDays(entry.metadata.recheck_days);
    if (override !== null) return override;
    if (entry.reason === 'prerelease') return this.prereleaseRecheckDays;
    return this.intervalDays;
  }

  private snapshot(): PendingRow[] {
    return [...this.entries.values()].map(toRow);
  }

  /**
   * Chains a write after the previous one so rows reach the backend in
   * mutation order. The returned promise never rejects.
   */
  private enqueueWrite(rows: PendingRow[]): Promise<void> {
    this.writeChain = this.writeChain.then(async () => {
      try {
        await this.backend.save(rows);
      } catch (error: unknown) {
        this.logger?.logError(
          new StorageError('Cannot persist pending verification entries', {
            step: 'pending_save',
            cause: error instanceof Error ? error : new Error(String(error)),
          }),
        );
      }
    });
    return this.writeChain;
  }

  private fromRow(row: PendingRow): PendingEntry | null {
    const timestamp = new Date(row.timestamp);
    if (Number.isNaN(timestamp.getTime())) {
      this.logger?.warn(`Skipping pending entry with invalid timestamp "${row.timestamp}"`, {
        artist: row.artist,
        album: row.album,
        step: 'pending_load',
      });
      return null;
    }

    let reason: PendingReason = 'no_year_found';
    if (isPendingReason(row.reason)) {
      reason = row.reason;
    } else {
      this.logger?.warn(`Unknown pending reason "${row.reason}", using no_year_found`, {
        artist: row.artist,
        album: row.album,
        step: 'pending_load',
      });
    }

    return {
      key: row.key,
      artist: row.artist,
      album: row.album,
      reason,
      metadata: parseMetadata(row.metadata),
      timestamp,
      attemptCount: Number.isInteger(row.attempt_count) && row.attempt_count > 0 ? row.attempt_count : 1,
    };
  }
}
