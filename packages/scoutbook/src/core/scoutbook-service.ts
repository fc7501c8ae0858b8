/**
 * ScoutbookService - Unified entry point for Scoutbook operations
 *
 * Composes the entity store, the planet reconciler, the report ingestor and
 * the feed providers:
 * - roster sync and player name resolution
 * - planet reconciliation and full player refresh
 * - report intake from scouting-report tokens or battle-simulator strings
 * - best-report selection and report deltas
 * - highscore snapshots and per-player standing
 *
 * Upstream fetches always happen before the player's write boundary is
 * entered; the boundary itself lives in ScoutbookRepository.withPlayer.
 *
 * @example
 * ```typescript
 * const service = await createScoutbookService(loadConfig());
 * const playerId = await service.resolvePlayerId('Nyx');
 * const snapshot = await service.refreshPlayer(playerId);
 * await service.close();
 * ```
 */

import type { Clock, Coordinate, Planet, Player, Report, SourceKind } from './types.js';
import { systemClock } from './types.js';
import type { ScoutbookConfig } from './config.js';
import { daysToMs } from './config.js';
import { HIGHSCORE_MIN_INTERVAL_MS, SCOUT_REPORT_PREFIX } from './constants.js';
import { formatCoordinate } from './coordinates.js';
import {
  DuplicateReportError,
  MalformedInputError,
  NotFoundError,
  RegressionError,
  UpstreamFetchError,
} from './errors.js';
import { HTTPClient, type FetchFunction } from './http-client.js';
import { createLogger, type Logger } from './utils/logger.js';
import { ScoutbookRepository } from '../persistence/repository.js';
import { createDatabaseAdapter } from '../persistence/adapters/factory.js';
import {
  PlanetReconciler,
  type PrimaryObservation,
  type ReconcileSummary,
  type SecondaryObservation,
} from '../reconciliation/planet-reconciler.js';
import { isProtected } from '../reconciliation/protection.js';
import { ReportIngestor, type IngestInput, type IngestResult } from '../reports/report-ingestor.js';
import { selectBestReport } from '../reports/best-report.js';
import { computeDelta, findPreviousReport, type ReportDelta } from '../reports/delta-engine.js';
import { computeStanding, isSnapshotDue, type PlayerStanding } from '../highscores/standing.js';
import { normalizeReportKey, parseBattleSimString } from '../providers/battlesim-parser.js';
import { GameApiProvider } from '../providers/game-api-provider.js';
import { IntelHubProvider } from '../providers/intel-hub-provider.js';
import { ReportDetailProvider } from '../providers/report-detail-provider.js';
import { TechnologyNameCache } from '../providers/technology-names.js';
import type {
  FetchContext,
  HighscoreFeed,
  PrimaryScanFeed,
  ReportDetailFeed,
  RosterFeed,
  SecondaryIntelFeed,
  TechnologyNameFeed,
} from '../providers/types.js';

// ============================================================================
// Types
// ============================================================================

export interface ScoutbookServiceDeps {
  readonly repository: ScoutbookRepository;
  readonly roster: RosterFeed;
  readonly primaryScan: PrimaryScanFeed;
  readonly reportDetails: ReportDetailFeed;
  readonly highscores: HighscoreFeed;
  /** Disabled when null (no hub team key configured) */
  readonly secondaryIntel?: SecondaryIntelFeed | null;
  readonly technologyNames?: TechnologyNameFeed;
  readonly rules: ScoutbookConfig['rules'];
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export interface AddReportOptions extends FetchContext {
  /** Owner of a battle-simulator string; scouting reports carry their own */
  readonly playerId?: number;
  readonly allowRegression?: boolean;
}

export interface AddReportResult {
  readonly token: string;
  readonly sourceKind: SourceKind;
  readonly ingest: IngestResult;
}

export interface DeleteReportOptions {
  /** Also remove the planet the report asserted, while it is still protected */
  readonly detachPlanet?: boolean;
}

export interface DeleteReportResult {
  readonly token: string;
  readonly detachedCoordinate: Coordinate | null;
}

export interface ReportWithDelta {
  readonly report: Report;
  readonly previous: Report | null;
  readonly delta: ReportDelta;
}

export interface PlayerSnapshot {
  readonly player: Player;
  readonly reconcile: ReconcileSummary;
  readonly planets: Planet[];
  readonly bestReport: Report | null;
  /** Token of the hub's top report when it was stored by this refresh */
  readonly syncedReportToken: string | null;
  readonly standing: PlayerStanding;
}

export interface HighscoreSyncResult {
  readonly publishedAt: Date;
  /** Rows written; 0 when skipped */
  readonly stored: number;
  /** The table was not newer than the last snapshot by the minimum interval */
  readonly skipped: boolean;
}

// ============================================================================
// Service
// ============================================================================

export class ScoutbookService {
  readonly reconciler: PlanetReconciler;
  readonly ingestor: ReportIngestor;
  readonly technologyNames: TechnologyNameCache;

  private readonly repository: ScoutbookRepository;
  private readonly roster: RosterFeed;
  private readonly primaryScan: PrimaryScanFeed;
  private readonly reportFeed: ReportDetailFeed;
  private readonly highscoreFeed: HighscoreFeed;
  private readonly secondaryIntel: SecondaryIntelFeed | null;
  private readonly rules: ScoutbookConfig['rules'];
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(deps: ScoutbookServiceDeps) {
    this.repository = deps.repository;
    this.roster = deps.roster;
    this.primaryScan = deps.primaryScan;
    this.reportFeed = deps.reportDetails;
    this.highscoreFeed = deps.highscores;
    this.secondaryIntel = deps.secondaryIntel ?? null;
    this.rules = deps.rules;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createLogger({ module: 'service' });

    this.reconciler = new PlanetReconciler(this.repository, {
      clock: this.clock,
      trustWindowMs: daysToMs(this.rules.trustWindowDays),
      logger: this.log.child('reconciler'),
    });
    this.ingestor = new ReportIngestor(this.repository, {
      clock: this.clock,
      peacefulShipTypes: this.rules.peacefulShipTypes,
      simulatedFreshnessMs: daysToMs(this.rules.simulatedFreshnessDays),
      logger: this.log.child('ingestor'),
    });
    this.technologyNames = deps.technologyNames
      ? TechnologyNameCache.fromFeed(deps.technologyNames)
      : TechnologyNameCache.fixed(new Map());
  }

  async close(): Promise<void> {
    await this.repository.close();
  }

  // ==========================================================================
  // Players
  // ==========================================================================

  /**
   * Fetch the roster and upsert every player in one transaction
   *
   * @returns number of players written
   */
  async syncRoster(context: FetchContext = {}): Promise<number> {
    const players = await this.roster.fetchRoster(context);
    const count = await this.repository.upsertPlayers(players);
    this.log.info('Roster synced', { players: count });
    return count;
  }

  /**
   * Case-insensitive name lookup. On a miss the roster is synced once and
   * the lookup retried, unless refresh is false.
   *
   * @throws NotFoundError when no player has that name
   */
  async resolvePlayerId(
    name: string,
    options: { readonly refresh?: boolean } & FetchContext = {}
  ): Promise<number> {
    const found = await this.repository.findPlayerByName(name);
    if (found) {
      return found.id;
    }

    if (options.refresh ?? true) {
      await this.syncRoster({ signal: options.signal });
      const retried = await this.repository.findPlayerByName(name);
      if (retried) {
        return retried.id;
      }
    }
    throw new NotFoundError('player', name);
  }

  /**
   * @throws NotFoundError when the player is not stored
   */
  async getPlayer(playerId: number): Promise<Player> {
    const player = await this.repository.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('player', String(playerId));
    }
    return player;
  }

  // ==========================================================================
  // Planets
  // ==========================================================================

  async reconcile(
    playerId: number,
    primary: readonly PrimaryObservation[],
    secondary?: readonly SecondaryObservation[]
  ): Promise<ReconcileSummary> {
    return this.reconciler.reconcile(playerId, primary, secondary);
  }

  async listPlanets(playerId: number): Promise<Planet[]> {
    return this.repository.listPlanets(playerId);
  }

  /**
   * Fetch both feeds, reconcile, then try to store the hub's top report.
   * A failing secondary feed or top-report sync is logged and skipped.
   */
  async refreshPlayer(playerId: number, context: FetchContext = {}): Promise<PlayerSnapshot> {
    const player = await this.getPlayer(playerId);

    const primary = await this.primaryScan.fetchPlanets(playerId, context);
    const secondary = await this.fetchSecondaryPositions(playerId, context);
    const reconcile = await this.reconciler.reconcile(playerId, primary, secondary);
    const syncedReportToken = await this.syncTopReport(playerId, context);

    return {
      player,
      reconcile,
      planets: await this.repository.listPlanets(playerId),
      bestReport: await this.best(playerId),
      syncedReportToken,
      standing: await this.standing(playerId),
    };
  }

  private async fetchSecondaryPositions(
    playerId: number,
    context: FetchContext
  ): Promise<SecondaryObservation[] | undefined> {
    if (!this.secondaryIntel) {
      return undefined;
    }
    try {
      return await this.secondaryIntel.fetchPositions(playerId, context);
    } catch (error) {
      if (!(error instanceof UpstreamFetchError || error instanceof MalformedInputError)) throw error;
      this.log.warn('Secondary positions unavailable, reconciling without them', {
        playerId,
        error: error.getSummary(),
      });
      return undefined;
    }
  }

  private async syncTopReport(playerId: number, context: FetchContext): Promise<string | null> {
    if (!this.secondaryIntel) {
      return null;
    }
    try {
      const token = await this.secondaryIntel.fetchTopReportToken(playerId, context);
      if (token === null) {
        return null;
      }
      const added = await this.addReport(token, { signal: context.signal });
      return added.token;
    } catch (error) {
      if (
        !(
          error instanceof DuplicateReportError ||
          error instanceof RegressionError ||
          error instanceof UpstreamFetchError ||
          error instanceof MalformedInputError
        )
      ) {
        throw error;
      }
      this.log.warn('Top report not synced', { playerId, error: error.getSummary() });
      return null;
    }
  }

  // ==========================================================================
  // Reports
  // ==========================================================================

  async ingest(input: IngestInput): Promise<IngestResult> {
    return this.ingestor.ingest(input);
  }

  /**
   * Store a report given as a scouting-report token ("sr-...") or a
   * battle-simulator string
   *
   * @throws MalformedInputError for a simulator string without playerId
   */
  async addReport(key: string, options: AddReportOptions = {}): Promise<AddReportResult> {
    const token = normalizeReportKey(key);
    const allowRegression = options.allowRegression ?? false;

    if (token.startsWith(SCOUT_REPORT_PREFIX)) {
      const fetched = await this.reportFeed.fetchReport(token, { signal: options.signal });
      const ingest = await this.ingestor.ingest({ ...fetched, allowRegression });
      return { token: ingest.report.token, sourceKind: ingest.report.sourceKind, ingest };
    }

    if (options.playerId === undefined) {
      throw new MalformedInputError('battle-simulator string', ['a player id is required']);
    }
    const parsed = parseBattleSimString(token, this.rules.techShipThreshold);
    const ingest = await this.ingestor.ingest({
      token,
      playerId: options.playerId,
      ships: parsed.ships,
      techs: parsed.techs,
      sourceKind: 'user-simulated',
      createdAt: this.clock(),
      coordinate: parsed.coordinate,
      fromMoon: false,
      allowRegression,
    });
    return { token, sourceKind: 'user-simulated', ingest };
  }

  /**
   * @throws NotFoundError when the token is not stored
   */
  async getReport(token: string): Promise<Report> {
    const report = await this.repository.getReport(normalizeReportKey(token));
    if (!report) {
      throw new NotFoundError('report', token);
    }
    return report;
  }

  /**
   * Remove a report with its line items. With detachPlanet, the planet at the
   * report's coordinate goes too while it is still protected, i.e. it stands
   * on a report's assertion rather than a bulk scan.
   */
  async deleteReport(key: string, options: DeleteReportOptions = {}): Promise<DeleteReportResult> {
    const report = await this.getReport(key);

    const detachedCoordinate = await this.repository.withPlayer(report.playerId, async () => {
      let detached: Coordinate | null = null;
      if (options.detachPlanet && report.coordinate) {
        const planet = await this.repository.getPlanet(report.playerId, report.coordinate);
        if (planet && isProtected(planet, this.clock(), daysToMs(this.rules.trustWindowDays))) {
          await this.repository.deletePlanet(report.playerId, report.coordinate);
          detached = report.coordinate;
        }
      }
      if (!(await this.repository.deleteReport(report.token))) {
        throw new NotFoundError('report', report.token);
      }
      return detached;
    });

    this.log.info('Report deleted', {
      token: report.token,
      playerId: report.playerId,
      detachedPlanet: detachedCoordinate ? formatCoordinate(detachedCoordinate) : null,
    });
    return { token: report.token, detachedCoordinate };
  }

  /**
   * Current best report for a player, or null when none qualifies
   */
  async best(playerId: number): Promise<Report | null> {
    return selectBestReport(await this.repository.listReports(playerId), {
      now: this.clock(),
      simulatedFreshnessMs: daysToMs(this.rules.simulatedFreshnessDays),
      peacefulShipTypes: this.ingestor.peacefulShipTypes,
    });
  }

  delta(newReport: Report, oldReport?: Report | null): ReportDelta {
    return computeDelta(newReport, oldReport);
  }

  /**
   * A report with its delta against the previous scout report of the same
   * location
   */
  async reportWithDelta(token: string): Promise<ReportWithDelta> {
    const report = await this.getReport(token);
    const previous = findPreviousReport(
      await this.repository.listReports(report.playerId, 'primary-scout'),
      report
    );
    return { report, previous, delta: computeDelta(report, previous) };
  }

  /**
   * @throws NotFoundError when the report or its player is unknown
   */
  async getPlayerNameByReportToken(token: string): Promise<string> {
    const report = await this.getReport(token);
    const player = await this.getPlayer(report.playerId);
    return player.name;
  }

  // ==========================================================================
  // Highscores
  // ==========================================================================

  /**
   * Fetch the published highscore table and store it, unless it is not at
   * least five minutes newer than the last stored snapshot. The roster is
   * synced first so every ranked player has a name.
   */
  async snapshotHighscores(context: FetchContext = {}): Promise<HighscoreSyncResult> {
    const table = await this.highscoreFeed.fetchHighscores(context);
    const latest = await this.repository.latestHighscoreAt();

    if (!isSnapshotDue(latest, table.publishedAt, HIGHSCORE_MIN_INTERVAL_MS)) {
      this.log.info('Highscores already stored, skipping', {
        publishedAt: table.publishedAt.toISOString(),
        latest: latest?.toISOString() ?? null,
      });
      return { publishedAt: table.publishedAt, stored: 0, skipped: true };
    }

    await this.syncRoster(context);
    const stored = await this.repository.insertHighscores(table.snapshots);
    this.log.info('Highscores stored', { publishedAt: table.publishedAt.toISOString(), players: stored });
    return { publishedAt: table.publishedAt, stored, skipped: false };
  }

  /**
   * Latest snapshot of a player with its change since the one before
   */
  async standing(playerId: number): Promise<PlayerStanding> {
    return computeStanding(playerId, await this.repository.listHighscores(playerId, 2));
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateServiceOptions {
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** Replaces global fetch for every feed */
  readonly fetch?: FetchFunction;
}

/**
 * Wire a service from configuration: database adapter, HTTP client and feeds
 */
export async function createScoutbookService(
  config: ScoutbookConfig,
  options: CreateServiceOptions = {}
): Promise<ScoutbookService> {
  const logger = options.logger ?? createLogger({ module: 'service', level: config.logLevel });
  const repository = new ScoutbookRepository(await createDatabaseAdapter(config.databaseUrl));
  const client = new HTTPClient({
    timeoutMs: config.http.timeoutMs,
    userAgent: config.http.userAgent,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });

  const gameApi = new GameApiProvider(config.feeds.gameApiBaseUrl, client);
  const teamKey = config.feeds.teamKey;
  const secondaryIntel =
    teamKey === null
      ? null
      : new IntelHubProvider(
          {
            intelHubBaseUrl: config.feeds.intelHubBaseUrl,
            tool: config.feeds.tool,
            country: config.feeds.country,
            universe: config.feeds.universe,
            teamKey,
          },
          client
        );

  if (secondaryIntel === null) {
    logger.debug('Intelligence hub disabled: no team key configured');
  }

  return new ScoutbookService({
    repository,
    roster: gameApi,
    primaryScan: gameApi,
    technologyNames: gameApi,
    reportDetails: new ReportDetailProvider(config.feeds.reportDetailBaseUrl, client),
    highscores: gameApi,
    secondaryIntel,
    rules: config.rules,
    clock: options.clock,
    logger,
  });
}
