/**
 * Album Year Engine - Composition Root
 *
 * Builds a ready-to-run YearResolutionService from the on-disk settings,
 * the SQLite cache database and the default HTTP lookup. The host music
 * application only has to provide a TrackUpdater.
 */

import * as path from 'path';
import type { AlbumYearLookup, TrackUpdater, YearEngineSettings } from '../shared/types';
import type { SleepFn } from './utils/concurrency';
import { HttpAlbumYearLookup } from './services/albumYearLookup';
import type { BatchProgress } from './services/batchOrchestrator';
import { Logger } from './services/logger';
import type { LogLevel } from './services/logger';
import { PendingVerificationStore } from './services/pendingVerification';
import {
  PersistentAlbumYearCache,
  PersistentCacheDatabase,
  PersistentPendingBackend,
  getDefaultCacheDir,
} from './services/persistentCache';
import { SettingsManager } from './services/settingsManager';
import { YearResolutionService } from './services/yearResolution';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface YearEngineOptions {
  updater: TrackUpdater;
  /** Defaults to HttpAlbumYearLookup */
  lookup?: AlbumYearLookup;
  /** Directory holding settings.json */
  settingsDir?: string;
  /** Path of the SQLite database (cache and pending queue) */
  dbPath?: string;
  /** Keep the database in memory (tests, one-off runs) */
  inMemory?: boolean;
  /** Directory for log files; file logging is off when `logToFile` is false */
  logDir?: string;
  logToFile?: boolean;
  logLevel?: LogLevel;
  /** Applied on top of the settings file */
  settingsOverrides?: Partial<YearEngineSettings>;
  dryRun?: boolean;
  sleep?: SleepFn;
  getCurrentDate?: () => Date;
  onProgress?: (progress: BatchProgress) => void;
}

/** Everything a running engine owns */
export interface YearEngine {
  service: YearResolutionService;
  pendingStore: PendingVerificationStore;
  cache: PersistentAlbumYearCache;
  settings: YearEngineSettings;
  logger: Logger;
  /** Waits for pending writes and closes the database */
  close(): Promise<void>;
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Loads settings, opens the database and wires every service together.
 *
 * @throws StorageError if the database cannot be opened or read
 */
export async function createYearEngine(options: YearEngineOptions): Promise<YearEngine> {
  const logger = new Logger({
    logDir: options.logDir,
    writeToFile: options.logToFile ?? true,
    minLevel: options.logLevel,
    getCurrentDate: options.getCurrentDate,
  });
  await logger.initialize();

  const settingsManager = new SettingsManager({ settingsDir: options.settingsDir, logger });
  await settingsManager.initialize();
  const settings: YearEngineSettings = { ...settingsManager.get(), ...options.settingsOverrides };

  const database = new PersistentCacheDatabase({ dbPath: options.dbPath, inMemory: options.inMemory });
  database.initialize();

  const cache = new PersistentAlbumYearCache(database);
  const pendingStore = new PendingVerificationStore({
    backend: new PersistentPendingBackend(database),
    intervalDays: settings.pendingVerificationIntervalDays,
    prereleaseRecheckDays: settings.prereleaseRecheckDays,
    remasterKeywords: settings.remasterKeywords,
    reportPath: path.join(getDefaultCacheDir(), 'reports', 'albums_without_year.csv'),
    logger,
    getCurrentDate: options.getCurrentDate,
  });

  try {
    await pendingStore.initialize();
  } catch (error: unknown) {
    database.close();
    throw error;
  }

  const service = new YearResolutionService({
    updater: options.updater,
    lookup: options.lookup ?? new HttpAlbumYearLookup({ logger, getCurrentDate: options.getCurrentDate }),
    cache,
    pendingStore,
    settings,
    logger,
    dryRun: options.dryRun,
    sleep: options.sleep,
    getCurrentDate: options.getCurrentDate,
    onProgress: options.onProgress,
  });

  logger.info(`Album year engine ready (${pendingStore.size} albums pending)`);

  return {
    service,
    pendingStore,
    cache,
    settings,
    logger,
    async close(): Promise<void> {
      await pendingStore.flush();
      database.close();
    },
  };
}
