/**
 * Custom Error Classes for the Album Year Engine
 *
 * Provides categorized error types for each resolution step so that
 * failures can be logged with their album context and counted instead of
 * aborting a library pass.
 */

/**
 * Error categories matching the resolution steps.
 */
export type ErrorCategory = 'LookupError' | 'UpdateError' | 'ValidationError' | 'StorageError';

/** Context shared by every engine error */
export interface ErrorContext {
  artist?: string;
  album?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all engine errors.
 * Extends the native Error class with album context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** Artist of the album being resolved (if applicable) */
  readonly artist: string | null;
  /** Album being resolved (if applicable) */
  readonly album: string | null;
  /** The resolution step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  override readonly cause: Error | null;
  /** Timestamp when the error was created */
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: ErrorContext) {
    super(message);
    this.name = category;
    this.category = category;
    this.artist = options?.artist ?? null;
    this.album = options?.album ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** "Artist - Album" label, or null when the error is not tied to an album */
  get albumLabel(): string | null {
    if (this.artist && this.album) return `${this.artist} - ${this.album}`;
    return this.album ?? this.artist;
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    artist: string | null;
    album: string | null;
    step: string;
    timestamp: string;
    stack: string | undefined;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      artist: this.artist,
      album: this.album,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a one-line message without stack traces.
   */
  toUserMessage(): string {
    const label = this.albumLabel;
    const albumInfo = label ? ` [${label}]` : '';
    return `${this.category}${albumInfo}: ${this.message}`;
  }
}

/**
 * Error thrown when an external year lookup fails.
 * Examples: provider timeout, rate limit exceeded, malformed response.
 */
export class LookupError extends PipelineError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;
  /** Name of the provider that failed */
  readonly service: string | null;

  constructor(message: string, options?: ErrorContext & { statusCode?: number; service?: string }) {
    super(message, 'LookupError', {
      step: 'api_lookup',
      ...options,
    });
    this.statusCode = options?.statusCode ?? null;
    this.service = options?.service ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & {
    statusCode: number | null;
    service: string | null;
  } {
    return {
      ...super.toLogObject(),
      statusCode: this.statusCode,
      service: this.service,
    };
  }
}

/**
 * Error thrown when writing a year to a track fails.
 */
export class UpdateError extends PipelineError {
  /** Track that could not be updated */
  readonly trackId: string | null;

  constructor(message: string, options?: ErrorContext & { trackId?: string }) {
    super(message, 'UpdateError', {
      step: 'track_update',
      ...options,
    });
    this.trackId = options?.trackId ?? null;
  }
}

/**
 * Error raised for malformed input: non-numeric years, empty track ids.
 * Never fatal; callers log it as a warning and skip the item.
 */
export class ValidationError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'ValidationError', {
      step: 'validation',
      ...options,
    });
  }
}

/**
 * Error thrown when the pending store, cache database or report file
 * cannot be read or written.
 */
export class StorageError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'StorageError', {
      step: 'storage',
      ...options,
    });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wraps a thrown value in the given PipelineError category.
 * PipelineErrors are returned as-is.
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: Omit<ErrorContext, 'cause'>,
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'LookupError':
      return new LookupError(message, { ...options, cause });
    case 'UpdateError':
      return new UpdateError(message, { ...options, cause });
    case 'ValidationError':
      return new ValidationError(message, { ...options, cause });
    case 'StorageError':
      return new StorageError(message, { ...options, cause });
  }
}
