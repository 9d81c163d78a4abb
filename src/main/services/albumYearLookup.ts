/**
 * HTTP Album Year Lookup
 *
 * Default AlbumYearLookup: asks MusicBrainz (release-group search) and the
 * iTunes Search API (album entity) for an album's release year.
 *
 * Each source contributes the earliest plausible year among its matching
 * results. The lookup is definitive when both sources return the same
 * year. When only one source answers, its year is returned as
 * non-definitive; when both fail, a LookupError is thrown.
 *
 * Both APIs are free and unauthenticated, so every request waits for a
 * slot on the source's FIFO rate limiter first.
 */

import axios from 'axios';
import type { AlbumYearCache, AlbumYearLookup, AlbumYearLookupResult } from '../../shared/types';
import type { SleepFn } from '../utils/concurrency';
import { sleep as defaultSleep } from '../utils/concurrency';
import { isReasonableYear } from '../utils/yearUtils';
import { LookupError } from './errors';
import type { Logger } from './logger';

// ─── API Shapes ──────────────────────────────────────────────────────────────

/** Release group as returned by the MusicBrainz search endpoint */
export interface MBReleaseGroup {
  id: string;
  title: string;
  score?: number;
  'first-release-date'?: string;
  'primary-type'?: string;
  'artist-credit'?: Array<{ name: string }>;
}

interface MBReleaseGroupSearchResponse {
  'release-groups'?: MBReleaseGroup[];
}

/** Album ("collection") as returned by the iTunes Search API */
export interface ItunesCollection {
  wrapperType: string;
  collectionType?: string;
  artistName: string;
  collectionName: string;
  releaseDate?: string;
}

interface ItunesSearchResponse {
  resultCount: number;
  results: ItunesCollection[];
}

// ─── Options ─────────────────────────────────────────────────────────────────

export interface AlbumYearLookupOptions {
  /** MusicBrainz API base URL (for testing) */
  musicBrainzBaseUrl?: string;
  /** iTunes search URL (for testing) */
  itunesSearchUrl?: string;
  /** User-Agent string (MusicBrainz requires a descriptive User-Agent) */
  userAgent?: string;
  /** Minimum MusicBrainz search score for a release group to count (0-100) */
  minScore?: number;
  /** Retries per request on 5xx, 429 and network errors */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff */
  baseRetryDelay?: number;
  /** HTTP timeout in ms */
  timeoutMs?: number;
  musicBrainzLimiter?: FifoRateLimiter;
  itunesLimiter?: FifoRateLimiter;
  /** Custom sleep (for testing) */
  sleep?: SleepFn;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const MUSICBRAINZ_API_URL = 'https://musicbrainz.org/ws/2';
const ITUNES_SEARCH_URL = 'https://itunes.apple.com/search';
const DEFAULT_USER_AGENT = 'AlbumYearEngine/1.0.0 ( album-year-engine@example.com )';
const DEFAULT_MIN_SCORE = 90;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_BASE_RETRY_DELAY = 1000;
const REQUEST_TIMEOUT_MS = 10_000;

/** MusicBrainz: 1 request per second for unauthenticated clients */
export const MUSICBRAINZ_RATE_LIMIT_INTERVAL = 1100;

/** iTunes throttles around 20 requests/minute */
export const ITUNES_RATE_LIMIT_INTERVAL = 3_000;

// ─── Rate Limiter ────────────────────────────────────────────────────────────

/**
 * FIFO queue-based rate limiter: one request per `intervalMs`, concurrent
 * callers released in arrival order.
 */
export class FifoRateLimiter {
  private lastRequestTime = 0;
  private readonly intervalMs: number;
  private readonly waitQueue: Array<() => void> = [];
  private isDraining = false;

  constructor(intervalMs: number) {
    this.intervalMs = intervalMs;
  }

  /** Waits until the next request slot is available (FIFO). */
  waitForSlot(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
      if (!this.isDraining) {
        void this.drain();
      }
    });
  }

  private async drain(): Promise<void> {
    this.isDraining = true;
    while (this.waitQueue.length > 0) {
      const now = Date.now();
      const remaining = this.intervalMs - (now - this.lastRequestTime);
      if (remaining > 0) {
        await new Promise<void>((r) => setTimeout(r, remaining));
      }
      this.lastRequestTime = Date.now();
      const next = this.waitQueue.shift();
      if (next) next();
    }
    this.isDraining = false;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Lowercases and strips everything but letters and digits, so that
 * "The Wall (Deluxe)" and "the wall deluxe" compare equal.
 */
export function normalizeTitle(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '');
}

/** True when the candidate title is the album, or the album plus a suffix */
export function titlesMatch(album: string, candidate: string): boolean {
  const wanted = normalizeTitle(album);
  const found = normalizeTitle(candidate);
  if (!wanted || !found) return false;
  return found === wanted || found.startsWith(wanted);
}

/**
 * Extracts the year from a date string like "1975", "1975-11" or an ISO
 * timestamp.
 */
export function extractYear(date: string | undefined): string | null {
  if (!date) return null;
  const match = /^(\d{4})/.exec(date.trim());
  return match ? match[1] : null;
}

/** Earliest year of the list, or null when empty */
export function earliestYear(years: readonly string[]): string | null {
  if (years.length === 0) return null;
  return years.reduce((earliest, year) => (year < earliest ? year : earliest));
}

/** Escapes Lucene special characters in a MusicBrainz query term */
function escapeLucene(text: string): string {
  return text.replace(/([+\-&|!(){}[\]^"~*?:\\/])/g, '\\$1');
}

// ─── Lookup ──────────────────────────────────────────────────────────────────

export class HttpAlbumYearLookup implements AlbumYearLookup {
  private readonly musicBrainzBaseUrl: string;
  private readonly itunesSearchUrl: string;
  private readonly userAgent: string;
  private readonly minScore: number;
  private readonly maxRetries: number;
  private readonly baseRetryDelay: number;
  private readonly timeoutMs: number;
  private readonly musicBrainzLimiter: FifoRateLimiter;
  private readonly itunesLimiter: FifoRateLimiter;
  private readonly sleep: SleepFn;
  private readonly getCurrentDate: () => Date;
  private readonly logger: Logger | null;

  constructor(options: AlbumYearLookupOptions = {}) {
    this.musicBrainzBaseUrl = options.musicBrainzBaseUrl || MUSICBRAINZ_API_URL;
    this.itunesSearchUrl = options.itunesSearchUrl || ITUNES_SEARCH_URL;
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    this.minScore = options.minScore ?? DEFAULT_MIN_SCORE;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseRetryDelay = options.baseRetryDelay ?? DEFAULT_BASE_RETRY_DELAY;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.musicBrainzLimiter = options.musicBrainzLimiter ?? new FifoRateLimiter(MUSICBRAINZ_RATE_LIMIT_INTERVAL);
    this.itunesLimiter = options.itunesLimiter ?? new FifoRateLimiter(ITUNES_RATE_LIMIT_INTERVAL);
    this.sleep = options.sleep ?? defaultSleep;
    this.getCurrentDate = options.getCurrentDate ?? ((): Date => new Date());
    this.logger = options.logger ?? null;
  }

  async lookupAlbumYear(artist: string, album: string): Promise<AlbumYearLookupResult> {
    const [musicBrainz, itunes] = await Promise.allSettled([
      this.searchMusicBrainz(artist, album),
      this.searchItunes(artist, album),
    ]);

    if (musicBrainz.status === 'rejected' && itunes.status === 'rejected') {
      throw new LookupError('All year sources failed', {
        artist,
        album,
        cause: musicBrainz.reason instanceof Error ? musicBrainz.reason : new Error(String(musicBrainz.reason)),
      });
    }

    for (const [service, outcome] of [
      ['MusicBrainz', musicBrainz],
      ['iTunes', itunes],
    ] as const) {
      if (outcome.status === 'rejected') {
        const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        this.logger?.warn(`${service} lookup failed, using the other source: ${message}`, {
          category: 'LookupError',
          artist,
          album,
          step: 'api_lookup',
        });
      }
    }

    const mbYear = musicBrainz.status === 'fulfilled' ? musicBrainz.value : null;
    const itunesYear = itunes.status === 'fulfilled' ? itunes.value : null;

    if (mbYear !== null && itunesYear !== null) {
      if (mbYear === itunesYear) {
        return { year: mbYear, isDefinitive: true };
      }
      this.logger?.info(`Sources disagree: MusicBrainz ${mbYear}, iTunes ${itunesYear}`, {
        artist,
        album,
        step: 'api_lookup',
      });
      return { year: earliestYear([mbYear, itunesYear]), isDefinitive: false };
    }

    return { year: mbYear ?? itunesYear, isDefinitive: false };
  }

  /**
   * Earliest plausible first-release year among matching MusicBrainz
   * release groups.
   */
  async searchMusicBrainz(artist: string, album: string): Promise<string | null> {
    const query = `releasegroup:"${escapeLucene(album)}" AND artist:"${escapeLucene(artist)}"`;
    const data = await this.request<MBReleaseGroupSearchResponse>(
      'MusicBrainz',
      this.musicBrainzLimiter,
      `${this.musicBrainzBaseUrl}/release-group`,
      { query, fmt: 'json', limit: 10 },
      { 'User-Agent': this.userAgent, Accept: 'application/json' },
    );
    if (!data) return null;

    const now = this.getCurrentDate();
    const years: string[] = [];
    for (const group of data['release-groups'] ?? []) {
      if ((group.score ?? 0) < this.minScore) continue;
      if (!titlesMatch(album, group.title)) continue;
      const year = extractYear(group['first-release-date']);
      if (year && isReasonableYear(year, now)) years.push(year);
    }
    return earliestYear(years);
  }

  /**
   * Earliest plausible release year among matching iTunes albums by the
   * same artist.
   */
  async searchItunes(artist: string, album: string): Promise<string | null> {
    const data = await this.request<ItunesSearchResponse>(
      'iTunes',
      this.itunesLimiter,
      this.itunesSearchUrl,
      { term: `${artist} ${album}`, entity: 'album', media: 'music', limit: 10 },
    );
    if (!data) return null;

    const now = this.getCurrentDate();
    const wantedArtist = normalizeTitle(artist);
    const years: string[] = [];
    for (const result of data.results) {
      if (result.wrapperType !== 'collection') continue;
      if (!normalizeTitle(result.artistName).includes(wantedArtist)) continue;
      if (!titlesMatch(album, result.collectionName)) continue;
      const year = extractYear(result.releaseDate);
      if (year && isReasonableYear(year, now)) years.push(year);
    }
    return earliestYear(years);
  }

  /**
   * GET with rate limiting and retry on 5xx, 429 and network errors.
   * Resolves null on 404; throws LookupError on other failures.
   */
  private async request<T>(
    service: string,
    limiter: FifoRateLimiter,
    url: string,
    params: Record<string, string | number>,
    headers?: Record<string, string>,
  ): Promise<T | null> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        // Exponential backoff: baseDelay * 2^(attempt-1)
        await this.sleep(this.baseRetryDelay * Math.pow(2, attempt - 1));
      }

      await limiter.waitForSlot();

      try {
        const response = await axios.get<T>(url, { params, headers, timeout: this.timeoutMs });
        return response.data;
      } catch (error: unknown) {
        if (axios.isAxiosError(error)) {
          const status = error.response?.status;
          if (status === 404) return null;
          if (status && status >= 400 && status < 500 && status !== 429) {
            throw new LookupError(`${service} API error (${status})`, { statusCode: status, service, cause: error });
          }
          lastError = error;
        } else {
          lastError = error instanceof Error ? error : new Error(String(error));
        }
      }
    }

    throw new LookupError(`${service} request failed after ${this.maxRetries + 1} attempts`, {
      service,
      cause: lastError ?? undefined,
    });
  }
}

// ─── Memory Cache ────────────────────────────────────────────────────────────

/**
 * In-memory album year cache, keyed case-insensitively by artist and album.
 */
export class MemoryAlbumYearCache implements AlbumYearCache {
  private cache: Map<string, string> = new Map();

  private static key(artist: string, album: string): string {
    return `${artist.toLowerCase().trim()}|${album.toLowerCase().trim()}`;
  }

  async getCachedYear(artist: string, album: string): Promise<string | null> {
    return this.cache.get(MemoryAlbumYearCache.key(artist, album)) ?? null;
  }

  async storeCachedYear(artist: string, album: string, year: string): Promise<void> {
    this.cache.set(MemoryAlbumYearCache.key(artist, album), year);
  }

  delete(artist: string, album: string): boolean {
    return this.cache.delete(MemoryAlbumYearCache.key(artist, album));
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
