/**
 * Logger Service for the Album Year Engine
 *
 * Structured logging with file output, log levels, error categorization and
 * PipelineError integration. Supports daily log file rotation, a configurable
 * log directory, and in-memory retrieval for run summaries.
 *
 * Log levels: ERROR (failed albums/tracks), WARN (skipped or suspicious
 * albums), INFO (decisions and progress), DEBUG (per-step detail)
 *
 * Default log directory: %APPDATA%/album-year-engine/logs/
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineError, isPipelineError, ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Log severity level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** Artist of the album being processed (if applicable) */
  artist: string | null;
  /** Album being processed (if applicable) */
  album: string | null;
  /** Resolution step where the log was created (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Optional context attached to a log call */
export interface LogContext {
  category?: ErrorCategory;
  artist?: string;
  album?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to %APPDATA%/album-year-engine/logs/ */
  logDir?: string;
  /** Minimum log level to write (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Summary of log entries */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  debugCount: number;
  /** Breakdown of errors by category */
  errorsByCategory: Record<string, number>;
  /** Log file path (if file logging is enabled) */
  logFilePath: string | null;
}

/** Filter options for retrieving log entries */
export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  /** Substring match on the album name */
  album?: string;
  /** Maximum number of entries to return (most recent) */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

/** Default app data directory name */
const APP_DIR_NAME = 'album-year-engine';

/** Default log subdirectory */
const LOG_DIR_NAME = 'logs';

/** Default maximum log file size (10MB) */
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Log level numeric values for comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'LookupError',
  'UpdateError',
  'ValidationError',
  'StorageError',
];

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path based on the platform.
 * On Windows: %APPDATA%/album-year-engine/logs/
 * On other platforms: ~/.config/album-year-engine/logs/
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename from a Date object.
 * Format: YYYY-MM-DD.log
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

export function isErrorCategory(value: string): value is ErrorCategory {
  return ERROR_CATEGORIES.some((category) => category === value);
}

/**
 * Formats a LogEntry as a single-line string for file output.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | artist: ... | album: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];

  parts.push(`[${entry.timestamp}]`);
  parts.push(entry.level);

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.artist) {
    parts.push(`| artist: ${entry.artist}`);
  }

  if (entry.album) {
    parts.push(`| album: ${entry.album}`);
  }

  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }

  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * Pulls a `| name: value` field out of the remainder of a log line.
 * Returns the value (or null) and the remainder without the field.
 */
function extractField(rest: string, name: string): { value: string | null; rest: string } {
  const match = rest.match(new RegExp(`\\|\\s*${name}:\\s*(.+?)(?=\\s*\\||$)`));
  if (!match) return { value: null, rest };
  return { value: match[1].trim(), rest: rest.replace(match[0], '') };
}

/**
 * Parses a formatted log line back into a LogEntry object.
 * Best-effort parsing: returns null for lines that can't be parsed.
 */
export function parseLogLine(line: string): LogEntry | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const mainMatch = trimmed.match(/^\[([^\]]+)\]\s+(ERROR|WARN|INFO|DEBUG)\s+(?:\[([^\]]+)\]\s+)?(.*)$/);
  if (!mainMatch) return null;

  const [, timestamp, rawLevel, rawCategory, body] = mainMatch;
  if (!isLogLevel(rawLevel)) return null;

  const category = rawCategory && isErrorCategory(rawCategory) ? rawCategory : null;

  const artistField = extractField(body, 'artist');
  const albumField = extractField(artistField.rest, 'album');
  const stepField = extractField(albumField.rest, 'step');
  const causeField = extractField(stepField.rest, 'cause');

  return {
    timestamp,
    level: rawLevel,
    message: causeField.rest.trim(),
    category,
    artist: artistField.value,
    album: albumField.value,
    step: stepField.value,
    cause: causeField.value,
  };
}

/**
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a PipelineError.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    artist: error.artist,
    album: error.album,
    step: error.step,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a generic message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: context?.category ?? null,
    artist: context?.artist ?? null,
    album: context?.album ?? null,
    step: context?.step ?? null,
    cause: context?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for the Album Year Engine.
 *
 * Provides structured logging with support for:
 * - File output (daily-rotated log files)
 * - In-memory log storage for run summaries
 * - PipelineError integration
 * - Log level filtering
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.warn('Suspicious year change', { artist: 'Artist', album: 'Album', step: 'fallback' });
 * logger.logError(new LookupError('timeout', { artist: 'Artist', album: 'Album' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly maxFileSize: number;
  private readonly getCurrentDate: () => Date;
  private writeToFile: boolean;

  /** In-memory log entries for the current session */
  private entries: LogEntry[] = [];

  /** Whether the logger has been initialized (log directory created) */
  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file
   * logging is switched off and in-memory logging continues.
   */
  async initialize(): Promise<void> {
    if (!this.writeToFile) {
      this.initialized = true;
      return;
    }

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
    } catch (error: unknown) {
      this.disableFileLogging(`Failed to create log directory "${this.logDir}"`, error);
    }
    this.initialized = true;
  }

  /**
   * Returns the current log file path based on today's date.
   */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  getLogDir(): string {
    return this.logDir;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Whether entries are currently being appended to the log file */
  isWritingToFile(): boolean {
    return this.writeToFile;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  /**
   * Logs a PipelineError with its category, album and step.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any thrown value. PipelineErrors keep their own context;
   * anything else becomes a generic ERROR entry with the given context.
   */
  logError(error: unknown, context?: Omit<LogContext, 'cause'>, level: LogLevel = 'ERROR'): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error, level);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.log(level, message, {
      ...context,
      cause: error instanceof Error ? error.name : undefined,
    });
  }

  /**
   * Logs a skipped album (WARN level).
   */
  logSkippedAlbum(artist: string, album: string, reason: string): void {
    this.warn(`Album skipped: ${reason}`, { artist, album, step: 'guards' });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, context, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.writeToFile && this.initialized) {
      this.writeEntryToFile(entry);
    }
  }

  /**
   * Appends a log entry to the current log file, rotating first when the
   * file exceeds maxFileSize. A write failure turns file logging off for
   * the rest of the session.
   */
  private writeEntryToFile(entry: LogEntry): void {
    try {
      const logFilePath = this.getLogFilePath();

      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }

      fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
      fs.appendFileSync(logFilePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.disableFileLogging('Failed to write log file', error);
    }
  }

  /**
   * Rotates a log file by renaming it with a numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  private disableFileLogging(reason: string, error: unknown): void {
    this.writeToFile = false;
    const message = error instanceof Error ? error.message : String(error);
    this.entries.push(
      createLogEntry(
        'WARN',
        `${reason}: ${message}. File logging disabled.`,
        { category: 'StorageError', step: 'logging' },
        this.getCurrentDate,
      ),
    );
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /**
   * Returns in-memory log entries, optionally filtered.
   */
  getEntries(filter?: LogFilter): LogEntry[] {
    let entries = [...this.entries];

    if (filter?.level) {
      entries = entries.filter((e) => e.level === filter.level);
    }

    if (filter?.category) {
      entries = entries.filter((e) => e.category === filter.category);
    }

    if (filter?.album) {
      const search = filter.album.toLowerCase();
      entries = entries.filter((e) => e.album !== null && e.album.toLowerCase().includes(search));
    }

    if (filter?.limit && filter.limit > 0) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  getErrors(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'ERROR', limit });
  }

  getWarnings(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'WARN', limit });
  }

  /**
   * Returns counts per level and errors per category.
   */
  getSummary(): LogSummary {
    const errorsByCategory: Record<string, number> = {};
    const counts: Record<LogLevel, number> = { ERROR: 0, WARN: 0, INFO: 0, DEBUG: 0 };

    for (const entry of this.entries) {
      counts[entry.level]++;
      if (entry.level === 'ERROR' && entry.category) {
        errorsByCategory[entry.category] = (errorsByCategory[entry.category] ?? 0) + 1;
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount: counts.ERROR,
      warnCount: counts.WARN,
      infoCount: counts.INFO,
      debugCount: counts.DEBUG,
      errorsByCategory,
      logFilePath: this.writeToFile ? this.getLogFilePath() : null,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  // ─── Export Methods ────────────────────────────────────────────────

  /**
   * Writes all in-memory entries to the given path.
   * Creates parent directories if they don't exist.
   *
   * @returns true if export was successful, false otherwise
   */
  async exportLog(exportPath: string): Promise<boolean> {
    try {
      await fs.promises.mkdir(path.dirname(exportPath), { recursive: true });

      const lines = this.entries.map(formatLogEntry);
      const content = lines.join('\n') + (lines.length > 0 ? '\n' : '');

      await fs.promises.writeFile(exportPath, content, 'utf-8');
      return true;
    } catch (error: unknown) {
      this.logError(error, { category: 'StorageError', step: 'log_export' }, 'WARN');
      return false;
    }
  }

  /**
   * Reads and parses a log file (defaults to today's log).
   * A missing file reads as no entries.
   */
  async readLogFile(logFilePath?: string): Promise<LogEntry[]> {
    const filePath = logFilePath ?? this.getLogFilePath();
    if (!fs.existsSync(filePath)) return [];

    const content = await fs.promises.readFile(filePath, 'utf-8');
    const entries: LogEntry[] = [];
    for (const line of content.split('\n')) {
      const parsed = parseLogLine(line);
      if (parsed) {
        entries.push(parsed);
      }
    }
    return entries;
  }

  /**
   * Clears all in-memory log entries. Does NOT delete log files.
   */
  clear(): void {
    this.entries = [];
  }
}
