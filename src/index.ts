/**
 * Album Year Engine public API.
 */

export * from './shared/types';

export { createYearEngine } from './main/index';
export type { YearEngine, YearEngineOptions } from './main/index';

export { YearResolutionService, cacheMatchesLibrary } from './main/services/yearResolution';
export type {
  AlbumOutcome,
  ResolveOptions,
  YearResolutionOptions,
  YearResolutionSummary,
} from './main/services/yearResolution';

export { detectAlbumType, isSpecialAlbumType, getDetectionSummary } from './main/services/albumTypeDetector';
export { DominantYearCalculator } from './main/services/dominantYear';
export { FallbackDecisionEngine } from './main/services/fallbackDecision';
export type { DecisionInput, FallbackSettings } from './main/services/fallbackDecision';
export { PendingVerificationStore } from './main/services/pendingVerification';
export { RetryingBulkUpdater } from './main/services/bulkUpdater';
export type { BulkUpdateResult } from './main/services/bulkUpdater';
export { AlbumGuards } from './main/services/albumGuards';
export type { GuardResult } from './main/services/albumGuards';
export { BatchOrchestrator, groupTracksByAlbum, selectStrategy } from './main/services/batchOrchestrator';
export type { AlbumProcessor, BatchProgress, BatchRunResult, OrchestrationStrategy } from './main/services/batchOrchestrator';
export { HttpAlbumYearLookup, MemoryAlbumYearCache, FifoRateLimiter } from './main/services/albumYearLookup';
export {
  PersistentCacheDatabase,
  PersistentAlbumYearCache,
  PersistentPendingBackend,
} from './main/services/persistentCache';
export type { PendingBackend, PendingRow } from './main/services/persistentCache';
export { SettingsManager, validateSettings, validatePrereleaseHandling } from './main/services/settingsManager';
export { Logger } from './main/services/logger';
export type { LogEntry, LogLevel, LoggerOptions } from './main/services/logger';
export {
  PipelineError,
  LookupError,
  UpdateError,
  ValidationError,
  StorageError,
  isPipelineError,
  wrapError,
} from './main/services/errors';
