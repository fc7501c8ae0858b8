/**
 * In-process feeds for service and command tests
 */

import type { Player } from '../../core/types.js';
import { DEFAULT_CONFIG } from '../../core/config.js';
import { UpstreamFetchError } from '../../core/errors.js';
import { ScoutbookService } from '../../core/scoutbook-service.js';
import type { PrimaryObservation, SecondaryObservation } from '../../reconciliation/planet-reconciler.js';
import type {
  HighscoreFeed,
  HighscoreTable,
  PrimaryScanFeed,
  ReportDetailFeed,
  RosterFeed,
  ScoutReport,
  SecondaryIntelFeed,
  TechnologyNameFeed,
} from '../../providers/types.js';
import { createTestRepository, silentLogger, type TestClock } from './fixtures.js';

export class FakeFeeds
  implements RosterFeed, PrimaryScanFeed, SecondaryIntelFeed, ReportDetailFeed, HighscoreFeed, TechnologyNameFeed
{
  roster: Player[] = [];
  planets = new Map<number, PrimaryObservation[]>();
  positions: SecondaryObservation[] | Error = [];
  topReportToken: string | null = null;
  reports = new Map<string, ScoutReport>();
  technologyNames = new Map<number, string>();
  highscores: HighscoreTable = { publishedAt: new Date('2024-03-01T12:00:00.000Z'), snapshots: [] };
  rosterCalls = 0;

  async fetchRoster(): Promise<Player[]> {
    this.rosterCalls++;
    return this.roster;
  }

  async fetchPlanets(playerId: number): Promise<PrimaryObservation[]> {
    return this.planets.get(playerId) ?? [];
  }

  async fetchPositions(): Promise<SecondaryObservation[]> {
    if (this.positions instanceof Error) {
      throw this.positions;
    }
    return this.positions;
  }

  async fetchTopReportToken(): Promise<string | null> {
    return this.topReportToken;
  }

  async fetchReport(token: string): Promise<ScoutReport> {
    const report = this.reports.get(token);
    if (!report) {
      throw new UpstreamFetchError('report detail', `https://detail.test/v1/report/${token}`, new Error('HTTP 404: Not Found'));
    }
    return report;
  }

  async fetchHighscores(): Promise<HighscoreTable> {
    return this.highscores;
  }

  async fetchTechnologyNames(): Promise<Map<number, string>> {
    return this.technologyNames;
  }
}

export async function createTestService(
  clock: TestClock,
  feeds: FakeFeeds = new FakeFeeds()
): Promise<{ service: ScoutbookService; feeds: FakeFeeds }> {
  const { repo } = await createTestRepository();
  const service = new ScoutbookService({
    repository: repo,
    roster: feeds,
    primaryScan: feeds,
    reportDetails: feeds,
    highscores: feeds,
    secondaryIntel: feeds,
    technologyNames: feeds,
    rules: DEFAULT_CONFIG.rules,
    clock: clock.now,
    logger: silentLogger,
  });
  return { service, feeds };
}
