/**
 * Settings Manager Service for the Album Year Engine
 *
 * Persists engine settings as JSON at %APPDATA%/album-year-engine/settings.json
 * (Windows) or ~/.config/album-year-engine/settings.json (other platforms).
 *
 * The file uses the option names of the year retrieval configuration
 * (`year_retrieval.processing.batch_size`, `max_retries`, ...); in memory the
 * settings are the flat, camelCase YearEngineSettings object.
 *
 * Features:
 * - JSON-based file persistence
 * - Validation with clamping and safe defaults
 * - Settings change notification via listener pattern
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { YearEngineSettings, DEFAULT_SETTINGS, PRERELEASE_HANDLING_MODES } from '../../shared/types';
import type { PrereleaseHandling } from '../../shared/types';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Custom directory to store settings file. Defaults to platform-specific appdata */
  settingsDir?: string;
  /** Custom filename for the settings file. Defaults to 'settings.json' */
  fileName?: string;
  logger?: Logger;
}

/** Listener callback type for settings changes */
export type SettingsChangeListener = (settings: YearEngineSettings) => void;

/** On-disk shape of settings.json */
export interface RawSettingsFile {
  year_retrieval: {
    processing: {
      batch_size: number;
      delay_between_batches: number;
      adaptive_delay: boolean;
      pending_verification_interval_days: number;
      prerelease_recheck_days: number;
      future_year_threshold: number;
      prerelease_handling: PrereleaseHandling;
    };
    rate_limits: {
      concurrent_api_calls: number;
    };
    logic: {
      absurd_year_threshold: number;
    };
    fallback: {
      enabled: boolean;
      year_difference_threshold: number;
    };
    remaster_keywords: string[];
  };
  apple_script_concurrency: number;
  max_retries: number;
  retry_delay_seconds: number;
}

// ─── Constants ───────────────────────────────────────────────────────────────

/** Default app data directory name */
const APP_DIR_NAME = 'album-year-engine';

/** Default settings filename */
const DEFAULT_SETTINGS_FILENAME = 'settings.json';

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the default settings directory path based on the platform.
 * On Windows: %APPDATA%/album-year-engine/
 * On other platforms: ~/.config/album-year-engine/
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Reads a nested value, returning undefined when any segment is missing */
function readPath(raw: Record<string, unknown>, keys: string[]): unknown {
  let current: unknown = raw;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Clamps a numeric setting to [min, max]; non-numbers fall back.
 * Integers are rounded unless `allowFraction` is set.
 */
export function clampNumber(
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  allowFraction = false,
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return fallback;
  }
  const normalized = allowFraction ? value : Math.round(value);
  return Math.max(min, Math.min(max, normalized));
}

/**
 * Validates a concurrency value and clamps it to the valid range (1-10).
 */
export function validateConcurrency(value: unknown, fallback: number = DEFAULT_SETTINGS.scriptConcurrency): number {
  return clampNumber(value, fallback, 1, 10);
}

/** Unknown modes fall back to the default */
export function validatePrereleaseHandling(value: unknown): PrereleaseHandling {
  const mode = PRERELEASE_HANDLING_MODES.find((candidate) => candidate === value);
  return mode ?? DEFAULT_SETTINGS.prereleaseHandling;
}

/**
 * Validates the remaster keyword list: lower-cased, trimmed, non-empty
 * strings. Anything else falls back to the defaults.
 */
export function validateKeywords(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [...DEFAULT_SETTINGS.remasterKeywords];
  }
  const keywords = value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return keywords.length > 0 ? keywords : [...DEFAULT_SETTINGS.remasterKeywords];
}

/**
 * Validates a raw settings.json object, merging with defaults.
 * Returns a complete, valid YearEngineSettings object.
 */
export function validateSettings(partial: unknown): YearEngineSettings {
  const validated: YearEngineSettings = {
    ...DEFAULT_SETTINGS,
    remasterKeywords: [...DEFAULT_SETTINGS.remasterKeywords],
  };
  if (!isRecord(partial)) {
    return validated;
  }

  const processing = (key: string): unknown => readPath(partial, ['year_retrieval', 'processing', key]);
  const d = DEFAULT_SETTINGS;

  validated.batchSize = clampNumber(processing('batch_size'), d.batchSize, 1, 1000);
  validated.delayBetweenBatches = clampNumber(
    processing('delay_between_batches'),
    d.delayBetweenBatches,
    0,
    3600,
    true,
  );
  validated.pendingVerificationIntervalDays = clampNumber(
    processing('pending_verification_interval_days'),
    d.pendingVerificationIntervalDays,
    1,
    365,
  );
  validated.prereleaseRecheckDays = clampNumber(
    processing('prerelease_recheck_days'),
    d.prereleaseRecheckDays,
    1,
    365,
  );
  validated.futureYearThreshold = clampNumber(processing('future_year_threshold'), d.futureYearThreshold, 0, 10);
  validated.prereleaseHandling = validatePrereleaseHandling(processing('prerelease_handling'));

  const adaptiveDelay = processing('adaptive_delay');
  if (typeof adaptiveDelay === 'boolean') {
    validated.adaptiveDelay = adaptiveDelay;
  }

  validated.concurrentApiCalls = clampNumber(
    readPath(partial, ['year_retrieval', 'rate_limits', 'concurrent_api_calls']),
    d.concurrentApiCalls,
    1,
    50,
  );
  validated.absurdYearThreshold = clampNumber(
    readPath(partial, ['year_retrieval', 'logic', 'absurd_year_threshold']),
    d.absurdYearThreshold,
    1000,
    3000,
  );

  const fallbackEnabled = readPath(partial, ['year_retrieval', 'fallback', 'enabled']);
  if (typeof fallbackEnabled === 'boolean') {
    validated.fallbackEnabled = fallbackEnabled;
  }
  validated.yearDifferenceThreshold = clampNumber(
    readPath(partial, ['year_retrieval', 'fallback', 'year_difference_threshold']),
    d.yearDifferenceThreshold,
    0,
    100,
  );

  const keywords = readPath(partial, ['year_retrieval', 'remaster_keywords']);
  if (keywords !== undefined) {
    validated.remasterKeywords = validateKeywords(keywords);
  }

  validated.scriptConcurrency = validateConcurrency(partial.apple_script_concurrency);
  validated.maxRetries = clampNumber(partial.max_retries, d.maxRetries, 1, 10);
  validated.retryDelaySeconds = clampNumber(partial.retry_delay_seconds, d.retryDelaySeconds, 0, 60, true);

  return validated;
}

/**
 * Converts settings back to the on-disk option names.
 */
export function toRawSettings(settings: YearEngineSettings): RawSettingsFile {
  return {
    year_retrieval: {
      processing: {
        batch_size: settings.batchSize,
        delay_between_batches: settings.delayBetweenBatches,
        adaptive_delay: settings.adaptiveDelay,
        pending_verification_interval_days: settings.pendingVerificationIntervalDays,
        prerelease_recheck_days: settings.prereleaseRecheckDays,
        future_year_threshold: settings.futureYearThreshold,
        prerelease_handling: settings.prereleaseHandling,
      },
      rate_limits: {
        concurrent_api_calls: settings.concurrentApiCalls,
      },
      logic: {
        absurd_year_threshold: settings.absurdYearThreshold,
      },
      fallback: {
        enabled: settings.fallbackEnabled,
        year_difference_threshold: settings.yearDifferenceThreshold,
      },
      remaster_keywords: [...settings.remasterKeywords],
    },
    apple_script_concurrency: settings.scriptConcurrency,
    max_retries: settings.maxRetries,
    retry_delay_seconds: settings.retryDelaySeconds,
  };
}

/**
 * Serializes settings to a JSON string for file storage.
 */
export function serializeSettings(settings: YearEngineSettings): string {
  return JSON.stringify(toRawSettings(settings), null, 2);
}

/**
 * Deserializes a JSON string to a raw settings object.
 * Returns null if the JSON is invalid or not an object.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function cloneSettings(settings: YearEngineSettings): YearEngineSettings {
  return { ...settings, remasterKeywords: [...settings.remasterKeywords] };
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Manages engine settings with file-based persistence.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize(); // Load settings from file (or use defaults)
 *
 * const settings = manager.get();
 * await manager.save({ batchSize: 25 }); // Partial update + persist
 * await manager.reset();
 * ```
 */
export class SettingsManager {
  private settings: YearEngineSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private readonly logger: Logger | null;
  private readonly listeners: SettingsChangeListener[] = [];
  private initialized = false;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.logger = options?.logger ?? null;
    this.settings = cloneSettings(DEFAULT_SETTINGS);
  }

  /**
   * Loads settings from file. A missing file means defaults; an unreadable
   * or corrupt file is logged and also means defaults.
   */
  async initialize(): Promise<void> {
    const filePath = this.getFilePath();

    if (fs.existsSync(filePath)) {
      try {
        const content = await fs.promises.readFile(filePath, 'utf-8');
        const parsed = deserializeSettings(content);
        if (parsed) {
          this.settings = validateSettings(parsed);
        } else {
          this.logger?.warn(`Settings file is not valid JSON, using defaults: ${filePath}`, {
            category: 'ValidationError',
            step: 'settings',
          });
        }
      } catch (error: unknown) {
        this.logger?.logError(error, { category: 'StorageError', step: 'settings' }, 'WARN');
      }
    }

    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Gets the current settings (copy to prevent mutation).
   */
  get(): YearEngineSettings {
    return cloneSettings(this.settings);
  }

  /**
   * Merges a partial update, validates, persists and notifies listeners.
   */
  async save(updates: Partial<YearEngineSettings>): Promise<YearEngineSettings> {
    const merged: YearEngineSettings = { ...this.settings, ...updates };
    this.settings = validateSettings(toRawSettings(merged));

    await this.writeToFile();
    this.notifyListeners();

    return cloneSettings(this.settings);
  }

  /**
   * Resets all settings to defaults and persists.
   */
  async reset(): Promise<YearEngineSettings> {
    this.settings = cloneSettings(DEFAULT_SETTINGS);

    await this.writeToFile();
    this.notifyListeners();

    return cloneSettings(this.settings);
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }

  getSettingsDir(): string {
    return this.settingsDir;
  }

  /**
   * Registers a listener for settings changes.
   *
   * @returns Unsubscribe function
   */
  onChange(listener: SettingsChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  getListenerCount(): number {
    return this.listeners.length;
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  /**
   * Writes the current settings file. Failure is logged; settings remain
   * in memory.
   */
  private async writeToFile(): Promise<void> {
    try {
      await fs.promises.mkdir(this.settingsDir, { recursive: true });
      await fs.promises.writeFile(this.getFilePath(), serializeSettings(this.settings), 'utf-8');
    } catch (error: unknown) {
      this.logger?.logError(error, { category: 'StorageError', step: 'settings' }, 'WARN');
    }
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      try {
        listener(cloneSettings(this.settings));
      } catch (error: unknown) {
        this.logger?.logError(error, { step: 'settings_listener' }, 'WARN');
      }
    }
  }
}
