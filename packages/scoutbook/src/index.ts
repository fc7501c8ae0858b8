/**
 * Scoutbook
 *
 * Planet reconciliation, scouting report intake, best-report selection and
 * report deltas for one game universe.
 */

// Service
export {
  ScoutbookService,
  createScoutbookService,
  type ScoutbookServiceDeps,
  type AddReportOptions,
  type AddReportResult,
  type DeleteReportOptions,
  type DeleteReportResult,
  type ReportWithDelta,
  type PlayerSnapshot,
  type HighscoreSyncResult,
  type CreateServiceOptions,
} from './core/scoutbook-service.js';

// Domain types
export type {
  Coordinate,
  Player,
  Planet,
  Report,
  ShipLine,
  TechLine,
  SourceKind,
  ResourceName,
  ResourceSnapshot,
  HighscoreSnapshot,
  HighscoreScores,
  Clock,
} from './core/types.js';
export { RESOURCE_NAMES, systemClock } from './core/types.js';
export { parseCoordinate, formatCoordinate, sameCoordinate, compareCoordinates } from './core/coordinates.js';

// Errors
export {
  ScoutbookError,
  DuplicateReportError,
  RegressionError,
  NotFoundError,
  UpstreamFetchError,
  MalformedInputError,
  isScoutbookError,
  type ScoutbookErrorReason,
} from './core/errors.js';

// Configuration and logging
export { loadConfig, DEFAULT_CONFIG, type ScoutbookConfig, type LoadConfigOptions } from './core/config.js';
export { Logger, createLogger, logger, type LogLevel } from './core/utils/logger.js';

// Persistence
export { ScoutbookRepository, type DatabaseAdapter } from './persistence/repository.js';
export { SQLiteAdapter } from './persistence/adapters/sqlite.js';
export { PostgreSQLAdapter } from './persistence/adapters/postgresql.js';
export { createDatabaseAdapter, parseDatabaseUrl } from './persistence/adapters/factory.js';

// Reconciliation
export {
  PlanetReconciler,
  MERGE_RULES,
  mergeObservations,
  applyObservation,
  type PrimaryObservation,
  type SecondaryObservation,
  type ReconcileSummary,
} from './reconciliation/planet-reconciler.js';
export { isProtected } from './reconciliation/protection.js';

// Reports
export { ReportIngestor, type IngestInput, type IngestResult } from './reports/report-ingestor.js';
export { selectBestReport, type BestReportOptions } from './reports/best-report.js';
export {
  computeDelta,
  findPreviousReport,
  hasDelta,
  reportDetails,
  deltaToRecord,
  type ReportDelta,
} from './reports/delta-engine.js';
export { militaryStrength, militaryShips } from './reports/military-strength.js';

// Highscores
export {
  computeStanding,
  isSnapshotDue,
  scoreDelta,
  type PlayerStanding,
  type ScoreDelta,
} from './highscores/standing.js';

// Feeds
export type {
  FetchContext,
  RosterFeed,
  PrimaryScanFeed,
  SecondaryIntelFeed,
  ReportDetailFeed,
  TechnologyNameFeed,
  HighscoreFeed,
  HighscoreTable,
  ScoutReport,
} from './providers/types.js';
export { GameApiProvider, SCORE_CATEGORIES } from './providers/game-api-provider.js';
export { IntelHubProvider } from './providers/intel-hub-provider.js';
export { ReportDetailProvider } from './providers/report-detail-provider.js';
export { parseBattleSimString, normalizeReportKey } from './providers/battlesim-parser.js';
export { TechnologyNameCache } from './providers/technology-names.js';
export { HTTPClient } from './core/http-client.js';
