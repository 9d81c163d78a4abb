/**
 * In-process stand-ins for the engine's collaborators.
 */

import type {
  AlbumYearCache,
  AlbumYearLookup,
  AlbumYearLookupResult,
  Track,
  TrackUpdater,
} from '../../src/shared/types';
import type { PendingBackend, PendingRow } from '../../src/main/services/persistentCache';

/** Pending backend that keeps the last saved rows in memory */
export class MemoryPendingBackend implements PendingBackend {
  rows: PendingRow[];
  saveCount = 0;
  failSaves = false;

  constructor(rows: PendingRow[] = []) {
    this.rows = rows;
  }

  async load(): Promise<PendingRow[]> {
    return this.rows.map((row) => ({ ...row }));
  }

  async save(rows: readonly PendingRow[]): Promise<void> {
    if (this.failSaves) {
      throw new Error('disk full');
    }
    this.saveCount++;
    this.rows = rows.map((row) => ({ ...row }));
  }
}

/** Records every update; ids listed in `failing` always throw, ids in `refusing` return false */
export class RecordingUpdater implements TrackUpdater {
  readonly calls: Array<{ trackId: string; year: string }> = [];
  readonly failing = new Set<string>();
  readonly refusing = new Set<string>();

  async updateTrackYear(trackId: string, year: string): Promise<boolean> {
    this.calls.push({ trackId, year });
    if (this.failing.has(trackId)) {
      throw new Error(`script error for ${trackId}`);
    }
    return !this.refusing.has(trackId);
  }
}

/** Updater that holds each call for `delayMs` and tracks how many overlap */
export class OverlapTrackingUpdater implements TrackUpdater {
  active = 0;
  peak = 0;
  calls = 0;

  constructor(private readonly delayMs = 5) {}

  async updateTrackYear(): Promise<boolean> {
    this.calls++;
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));
    this.active--;
    return true;
  }
}

/** Lookup answering from a table keyed by `artist|album` */
export class TableLookup implements AlbumYearLookup {
  readonly calls: string[] = [];
  readonly results = new Map<string, AlbumYearLookupResult>();
  readonly failures = new Set<string>();

  set(artist: string, album: string, result: AlbumYearLookupResult): void {
    this.results.set(`${artist}|${album}`, result);
  }

  async lookupAlbumYear(artist: string, album: string): Promise<AlbumYearLookupResult> {
    const key = `${artist}|${album}`;
    this.calls.push(key);
    if (this.failures.has(key)) {
      throw new Error(`lookup failed for ${key}`);
    }
    return this.results.get(key) ?? { year: null, isDefinitive: false };
  }
}

/** Cache that records stores */
export class RecordingCache implements AlbumYearCache {
  readonly years = new Map<string, string>();
  readonly stores: Array<{ artist: string; album: string; year: string }> = [];

  async getCachedYear(artist: string, album: string): Promise<string | null> {
    return this.years.get(`${artist}|${album}`) ?? null;
  }

  async storeCachedYear(artist: string, album: string, year: string): Promise<void> {
    this.stores.push({ artist, album, year });
    this.years.set(`${artist}|${album}`, year);
  }
}

let trackCounter = 0;

/** Subscription track with a unique id unless one is given */
export function makeTrack(overrides: Partial<Track> = {}): Track {
  trackCounter++;
  return {
    id: `track-${trackCounter}`,
    name: `Song ${trackCounter}`,
    artist: 'Artist',
    album: 'Album',
    year: '',
    status: 'subscription',
    ...overrides,
  };
}
