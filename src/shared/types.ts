/**
 * Shared type definitions for the Album Year Engine.
 * These interfaces are used by every service and by the public entry point.
 */

// ─── Tracks & Albums ─────────────────────────────────────────────────────────

/** A library track as seen by the year engine */
export interface Track {
  /** Host application identifier (tracks without one are never updated) */
  id: string;
  /** Track title, used for log lines only */
  name?: string;
  /** Track artist */
  artist: string;
  /** Album artist (blank → normalized track artist) */
  albumArtist?: string;
  /** Album name */
  album: string;
  /** Year tag. "" and "0" mean absent */
  year?: string;
  /** Year from the secondary release-date field */
  releaseYear?: string;
  /** Raw host status string (subscription, prerelease, purchased, ...) */
  status?: string;
}

/** Tracks of one album, keyed by (albumArtist, album) */
export interface AlbumGroup {
  /** Album artist used for grouping and lookups */
  artist: string;
  /** Album name */
  album: string;
  /** Every track of the album, unfiltered */
  tracks: Track[];
}

// ─── Track Status ────────────────────────────────────────────────────────────

/** Normalized host statuses that this engine distinguishes */
export type TrackStatus =
  | 'subscription'
  | 'prerelease'
  | 'local only'
  | 'purchased'
  | 'matched'
  | 'uploaded'
  | 'downloaded';

// ─── Album Types ─────────────────────────────────────────────────────────────

/** Classification of an album name */
export type AlbumType = 'normal' | 'special' | 'compilation' | 'reissue';

/** How a classified album is handled when an external year disagrees */
export type YearHandlingStrategy = 'normal' | 'mark_and_skip' | 'mark_and_update';

/** Result of album type detection */
export interface AlbumTypeInfo {
  type: AlbumType;
  /** The pattern that matched, as written in the pattern list */
  detectedPattern: string | null;
  strategy: YearHandlingStrategy;
}

// ─── Pending Verification ────────────────────────────────────────────────────

/** Why an album was queued for re-verification */
export type PendingReason =
  | 'no_year_found'
  | 'prerelease'
  | 'absurd_year_no_existing'
  | 'suspicious_year_change'
  | 'suspicious_album_name'
  | `special_album_${Exclude<AlbumType, 'normal'>}`;

/** Opaque metadata stored with a pending entry */
export type PendingMetadata = Record<string, string | number | boolean | null>;

/** A durable "re-check later" record */
export interface PendingEntry {
  /** sha256 of artist + cleaned album */
  key: string;
  artist: string;
  album: string;
  reason: PendingReason;
  metadata: PendingMetadata;
  /** Last time the album was marked */
  timestamp: Date;
  /** How many times the album has been marked */
  attemptCount: number;
}

// ─── Decisions ───────────────────────────────────────────────────────────────

/** Outcome of the fallback decision engine */
export type YearDecision =
  | { action: 'apply'; year: string; reason: string }
  | { action: 'reject'; reason: string; preservedYear: string | null }
  | { action: 'mark_and_skip'; reason: string; preservedYear: string | null };

/** Where an applied year came from */
export type YearSource = 'dominant' | 'consensus' | 'cache' | 'api';

/** One track whose year was changed (or would be, in dry-run mode) */
export interface ChangeLogEntry {
  trackId: string;
  trackName: string | null;
  artist: string;
  album: string;
  oldYear: string;
  newYear: string;
  source: YearSource;
  /** ISO 8601 timestamp */
  timestamp: string;
}

// ─── Collaborators ───────────────────────────────────────────────────────────

/** Result of an external album year lookup */
export interface AlbumYearLookupResult {
  year: string | null;
  /** True when the sources agree strongly enough to bypass fallback checks */
  isDefinitive: boolean;
}

/** Writes a year to one track in the host application */
export interface TrackUpdater {
  updateTrackYear(trackId: string, year: string): Promise<boolean>;
}

/** Queries external metadata sources for an album's release year */
export interface AlbumYearLookup {
  lookupAlbumYear(artist: string, album: string): Promise<AlbumYearLookupResult>;
}

/** Read-through / write-through album year cache */
export interface AlbumYearCache {
  getCachedYear(artist: string, album: string): Promise<string | null>;
  storeCachedYear(artist: string, album: string, year: string): Promise<void>;
}

// ─── Settings ────────────────────────────────────────────────────────────────

/**
 * What happens to albums that contain prerelease tracks:
 * - `mark_only`: queue for a re-check and skip the album
 * - `process_editable`: queue for a re-check and resolve the editable tracks
 *   anyway (albums with none are skipped)
 * - `skip_all`: skip without queueing
 */
export type PrereleaseHandling = 'mark_only' | 'process_editable' | 'skip_all';

export const PRERELEASE_HANDLING_MODES: readonly PrereleaseHandling[] = ['mark_only', 'process_editable', 'skip_all'];

/** Engine settings (camelCase view of settings.json) */
export interface YearEngineSettings {
  /** Albums per batch */
  batchSize: number;
  /** Seconds between batches (sequential mode only) */
  delayBetweenBatches: number;
  /** Forces the bounded-concurrency strategy when true */
  adaptiveDelay: boolean;
  /** Concurrent external API calls */
  concurrentApiCalls: number;
  /** Concurrent host scripting calls */
  scriptConcurrency: number;
  /** Proposed years below this are suspicious when nothing exists locally */
  absurdYearThreshold: number;
  /** Whether the fallback decision tree runs at all */
  fallbackEnabled: boolean;
  /** Max |existing − proposed| accepted without verification */
  yearDifferenceThreshold: number;
  /** Days before a pending album is re-checked */
  pendingVerificationIntervalDays: number;
  /** Days before a prerelease album is re-checked */
  prereleaseRecheckDays: number;
  /** Years into the future tolerated before an album counts as prerelease */
  futureYearThreshold: number;
  prereleaseHandling: PrereleaseHandling;
  /** Attempts per track update */
  maxRetries: number;
  /** Base backoff delay in seconds */
  retryDelaySeconds: number;
  /** Keywords whose parenthesised segments are stripped from album names */
  remasterKeywords: string[];
}

/** Default engine settings */
export const DEFAULT_SETTINGS: YearEngineSettings = {
  batchSize: 10,
  delayBetweenBatches: 60,
  adaptiveDelay: false,
  concurrentApiCalls: 5,
  scriptConcurrency: 2,
  absurdYearThreshold: 1970,
  fallbackEnabled: true,
  yearDifferenceThreshold: 5,
  pendingVerificationIntervalDays: 30,
  prereleaseRecheckDays: 30,
  futureYearThreshold: 1,
  prereleaseHandling: 'mark_only',
  maxRetries: 3,
  retryDelaySeconds: 1,
  remasterKeywords: ['remaster', 'remastered'],
};
