/**
 * Collaborator feed interfaces
 *
 * Each feed exposes a fetch returning normalized records. Implementations
 * raise UpstreamFetchError for transport failures and MalformedInputError
 * for payloads they cannot normalize.
 */

import type { HighscoreSnapshot, Player } from '../core/types.js';
import type { PrimaryObservation, SecondaryObservation } from '../reconciliation/planet-reconciler.js';
import type { IngestInput } from '../reports/report-ingestor.js';

export interface FetchContext {
  /** Caller-driven cancellation */
  readonly signal?: AbortSignal;
}

/**
 * Bulk player roster
 */
export interface RosterFeed {
  fetchRoster(context?: FetchContext): Promise<Player[]>;
}

/**
 * Weekly bulk scan of one player's planets
 */
export interface PrimaryScanFeed {
  fetchPlanets(playerId: number, context?: FetchContext): Promise<PrimaryObservation[]>;
}

/**
 * Supplementary intelligence about one player
 */
export interface SecondaryIntelFeed {
  fetchPositions(playerId: number, context?: FetchContext): Promise<SecondaryObservation[]>;

  /**
   * Token of the hub's top scouting report for the player, if it has one
   */
  fetchTopReportToken(playerId: number, context?: FetchContext): Promise<string | null>;
}

/**
 * Scouting report detail by token, normalized for the ingestor
 */
export type ScoutReport = Omit<IngestInput, 'allowRegression'>;

export interface ReportDetailFeed {
  fetchReport(token: string, context?: FetchContext): Promise<ScoutReport>;
}

/**
 * Technology/ship id to display name table
 */
export interface TechnologyNameFeed {
  fetchTechnologyNames(context?: FetchContext): Promise<Map<number, string>>;
}

/**
 * The published highscore table, merged across score categories
 */
export interface HighscoreTable {
  /** When the server computed the rankings */
  readonly publishedAt: Date;
  readonly snapshots: HighscoreSnapshot[];
}

export interface HighscoreFeed {
  fetchHighscores(context?: FetchContext): Promise<HighscoreTable>;
}
