/**
 * Persistent Cache Service (SQLite)
 *
 * SQLite storage for the year engine. Holds two tables:
 * 1. album_years: artist+album → resolved year (read-through/write-through cache)
 * 2. pending_verification: albums waiting to be re-checked
 *
 * The adapters at the bottom expose the tables through the interfaces the
 * engine consumes (AlbumYearCache, PendingBackend), so in-memory versions
 * can be used instead in tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { AlbumYearCache } from '../../shared/types';
import { StorageError } from './errors';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Current schema version for migration support */
const SCHEMA_VERSION = 1;

// ─── Row Types ───────────────────────────────────────────────────────────────

/** One row of the pending_verification table */
export interface PendingRow {
  key: string;
  artist: string;
  album: string;
  /** ISO 8601 timestamp of the last mark */
  timestamp: string;
  reason: string;
  /** JSON-serialized metadata map */
  metadata: string;
  attempt_count: number;
}

interface AlbumYearRow {
  year: string;
}

interface CountRow {
  count: number;
}

/** Durable storage for the pending-verification map */
export interface PendingBackend {
  load(): Promise<PendingRow[]>;
  /** Replaces the stored set with the given rows */
  save(rows: readonly PendingRow[]): Promise<void>;
}

// ─── Database Default Path ───────────────────────────────────────────────────

/**
 * Returns the default directory for the database file.
 * Platform-specific: %APPDATA%/album-year-engine/ on Windows,
 * ~/.config/album-year-engine/ on other platforms.
 */
export function getDefaultCacheDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'album-year-engine');
  }
  return path.join(os.homedir(), '.config', 'album-year-engine');
}

/**
 * Returns the default path for the cache database file.
 */
export function getDefaultCachePath(): string {
  return path.join(getDefaultCacheDir(), 'album-years.db');
}

// ─── Persistent Cache Database ───────────────────────────────────────────────

/** Options for PersistentCacheDatabase */
export interface PersistentCacheOptions {
  /** Path to the SQLite database file. Defaults to %APPDATA%/album-year-engine/album-years.db */
  dbPath?: string;
  /** Whether to use in-memory database (for testing) */
  inMemory?: boolean;
}

/**
 * SQLite-based persistent storage for album years and pending albums.
 */
export class PersistentCacheDatabase {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly inMemory: boolean;

  constructor(options: PersistentCacheOptions = {}) {
    this.inMemory = options.inMemory ?? false;
    this.dbPath = this.inMemory ? ':memory:' : (options.dbPath ?? getDefaultCachePath());
  }

  /**
   * Opens the database and creates tables if they don't exist.
   * Must be called before any other operation.
   *
   * @throws StorageError if the database cannot be opened
   */
  initialize(): void {
    let db: Database.Database;
    try {
      if (!this.inMemory) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      db = new Database(this.dbPath);
    } catch (error: unknown) {
      throw new StorageError(`Cannot open cache database at ${this.dbPath}`, {
        step: 'cache_open',
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }

    db.pragma('journal_mode = WAL');

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS album_years (
        cache_key TEXT PRIMARY KEY,
        artist TEXT NOT NULL,
        album TEXT NOT NULL,
        year TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS pending_verification (
        key TEXT PRIMARY KEY,
        artist TEXT NOT NULL,
        album TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        reason TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        attempt_count INTEGER NOT NULL DEFAULT 1
      );
    `);

    const versionRow = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
    if (!versionRow) {
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
    }

    this.db = db;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.dbPath;
  }

  // ─── Album Year Cache ──────────────────────────────────────────────────────

  /**
   * Case-insensitive cache key for an album.
   */
  static makeAlbumKey(artist: string, album: string): string {
    return `${artist.toLowerCase().trim()}|${album.toLowerCase().trim()}`;
  }

  setAlbumYear(artist: string, album: string, year: string): void {
    const key = PersistentCacheDatabase.makeAlbumKey(artist, album);
    this.requireDb()
      .prepare(
        `INSERT OR REPLACE INTO album_years (cache_key, artist, album, year, created_at)
           VALUES (?, ?, ?, ?, datetime('now'))`,
      )
      .run(key, artist, album, year);
  }

  /**
   * Returns the cached year, or undefined if not cached.
   */
  getAlbumYear(artist: string, album: string): string | undefined {
    const key = PersistentCacheDatabase.makeAlbumKey(artist, album);
    const row = this.requireDb()
      .prepare<[string], AlbumYearRow>('SELECT year FROM album_years WHERE cache_key = ?')
      .get(key);
    return row?.year;
  }

  deleteAlbumYear(artist: string, album: string): boolean {
    const key = PersistentCacheDatabase.makeAlbumKey(artist, album);
    const result = this.requireDb().prepare('DELETE FROM album_years WHERE cache_key = ?').run(key);
    return result.changes > 0;
  }

  getAlbumYearCount(): number {
    const row = this.requireDb().prepare<[], CountRow>('SELECT COUNT(*) as count FROM album_years').get();
    return row?.count ?? 0;
  }

  clearAlbumYears(): void {
    this.requireDb().exec('DELETE FROM album_years');
  }

  // ─── Pending Verification ──────────────────────────────────────────────────

  getPendingRows(): PendingRow[] {
    return this.requireDb()
      .prepare<[], PendingRow>(
        'SELECT key, artist, album, timestamp, reason, metadata, attempt_count FROM pending_verification ORDER BY timestamp',
      )
      .all();
  }

  /**
   * Replaces the pending table with the given rows in one transaction.
   */
  replacePendingRows(rows: readonly PendingRow[]): void {
    const db = this.requireDb();
    const insert = db.prepare(
      `INSERT INTO pending_verification (key, artist, album, timestamp, reason, metadata, attempt_count)
         VALUES (@key, @artist, @album, @timestamp, @reason, @metadata, @attempt_count)`,
    );
    const replaceAll = db.transaction((snapshot: readonly PendingRow[]) => {
      db.exec('DELETE FROM pending_verification');
      for (const row of snapshot) {
        insert.run(row);
      }
    });
    replaceAll(rows);
  }

  getPendingCount(): number {
    const row = this.requireDb()
      .prepare<[], CountRow>('SELECT COUNT(*) as count FROM pending_verification')
      .get();
    return row?.count ?? 0;
  }

  // ─── Cache Management ──────────────────────────────────────────────────────

  getStats(): { albumYears: number; pending: number; totalEntries: number } {
    const albumYears = this.getAlbumYearCount();
    const pending = this.getPendingCount();
    return { albumYears, pending, totalEntries: albumYears + pending };
  }

  /**
   * Returns the database file size in bytes (0 for in-memory databases
   * and files that don't exist yet).
   */
  getDatabaseSize(): number {
    if (this.inMemory || !fs.existsSync(this.dbPath)) return 0;
    return fs.statSync(this.dbPath).size;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Returns the open database handle. Throws if not initialized.
   */
  private requireDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('PersistentCacheDatabase is not initialized. Call initialize() first.', {
        step: 'cache_access',
      });
    }
    return this.db;
  }
}

// ─── Adapter Classes ─────────────────────────────────────────────────────────
// Expose the database tables through the interfaces the engine consumes.

/**
 * Album year cache over the album_years table.
 */
export class PersistentAlbumYearCache implements AlbumYearCache {
  private readonly db: PersistentCacheDatabase;

  constructor(db: PersistentCacheDatabase) {
    this.db = db;
  }

  async getCachedYear(artist: string, album: string): Promise<string | null> {
    return this.db.getAlbumYear(artist, album) ?? null;
  }

  async storeCachedYear(artist: string, album: string, year: string): Promise<void> {
    this.db.setAlbumYear(artist, album, year);
  }

  delete(artist: string, album: string): boolean {
    return this.db.deleteAlbumYear(artist, album);
  }

  clear(): void {
    this.db.clearAlbumYears();
  }

  get size(): number {
    return this.db.getAlbumYearCount();
  }
}

/**
 * Pending-verification storage over the pending_verification table.
 */
export class PersistentPendingBackend implements PendingBackend {
  private readonly db: PersistentCacheDatabase;

  constructor(db: PersistentCacheDatabase) {
    this.db = db;
  }

  async load(): Promise<PendingRow[]> {
    return this.db.getPendingRows();
  }

  async save(rows: readonly PendingRow[]): Promise<void> {
    this.db.replacePendingRows(rows);
  }
}
