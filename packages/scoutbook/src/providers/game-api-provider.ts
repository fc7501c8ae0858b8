/**
 * Game API Provider
 *
 * Public game-server API: player roster, per-player planet list (the weekly
 * bulk scan), the player highscore table and the technology localization
 * table. The server publishes
 * XML; `toJson=1` asks for its JSON rendering, where element attributes sit
 * under "@attributes".
 */

import type { HighscoreScores, HighscoreSnapshot, Player } from '../core/types.js';
import { HTTPClient } from '../core/http-client.js';
import { parseCoordinate } from '../core/coordinates.js';
import type { PrimaryObservation } from '../reconciliation/planet-reconciler.js';
import {
  HighscoreResponseSchema,
  LocalizationResponseSchema,
  PlayerDataResponseSchema,
  RosterResponseSchema,
  parseOrThrow,
} from '../security/input-validator.js';
import { requestFeed } from './feed-request.js';
import type {
  FetchContext,
  HighscoreFeed,
  HighscoreTable,
  PrimaryScanFeed,
  RosterFeed,
  TechnologyNameFeed,
} from './types.js';

export interface ScoreCategory {
  /** Highscore "type" query value */
  readonly type: number;
  readonly apply: (scores: HighscoreScores, points: number, rank: number) => HighscoreScores;
}

/**
 * Player highscore categories kept per snapshot. Only the total and military
 * tables keep the rank.
 */
export const SCORE_CATEGORIES: readonly ScoreCategory[] = [
  { type: 0, apply: (scores, points, rank) => ({ ...scores, totalPoints: points, totalRank: rank }) },
  { type: 3, apply: (scores, points, rank) => ({ ...scores, militaryPoints: points, militaryRank: rank }) },
  { type: 5, apply: (scores, points) => ({ ...scores, militaryBuiltPoints: points }) },
];

const NO_SCORES: HighscoreScores = {
  totalPoints: null,
  totalRank: null,
  militaryPoints: null,
  militaryRank: null,
  militaryBuiltPoints: null,
};

export class GameApiProvider implements RosterFeed, PrimaryScanFeed, HighscoreFeed, TechnologyNameFeed {
  constructor(
    private readonly baseUrl: string,
    private readonly client: HTTPClient = new HTTPClient()
  ) {}

  async fetchRoster(context: FetchContext = {}): Promise<Player[]> {
    const body = await requestFeed(this.client, 'roster', `${this.baseUrl}/players.xml`, {
      query: { toJson: 1 },
      signal: context.signal,
    });
    const parsed = parseOrThrow(RosterResponseSchema, body, 'roster response');

    return parsed.player.map((entry) => ({
      id: entry['@attributes'].id,
      name: entry['@attributes'].name,
    }));
  }

  async fetchPlanets(playerId: number, context: FetchContext = {}): Promise<PrimaryObservation[]> {
    const body = await requestFeed(this.client, 'player data', `${this.baseUrl}/playerData.xml`, {
      query: { id: playerId, toJson: 1 },
      signal: context.signal,
    });
    const parsed = parseOrThrow(PlayerDataResponseSchema, body, 'player data response');

    return parsed.planets.planet.map((planet) => ({
      coordinate: parseCoordinate(planet['@attributes'].coords, 'player data response'),
      hasMoon: planet.moon !== undefined && planet.moon !== null,
      name: planet['@attributes'].name ?? null,
    }));
  }

  /**
   * Fetch every score category in turn and merge them per player. The table
   * is stamped with the last category's publication time.
   */
  async fetchHighscores(context: FetchContext = {}): Promise<HighscoreTable> {
    const scores = new Map<number, HighscoreScores>();
    let publishedAt = new Date(0);

    for (const category of SCORE_CATEGORIES) {
      const body = await requestFeed(this.client, 'highscore', `${this.baseUrl}/highscore.xml`, {
        query: { toJson: 1, category: 1, type: category.type },
        signal: context.signal,
      });
      const parsed = parseOrThrow(HighscoreResponseSchema, body, 'highscore response');
      publishedAt = new Date(parsed['@attributes'].timestamp * 1000);

      for (const entry of parsed.player) {
        const { id, score, position } = entry['@attributes'];
        scores.set(id, category.apply(scores.get(id) ?? NO_SCORES, score, position));
      }
    }

    const snapshots = [...scores].map(
      ([playerId, playerScores]): HighscoreSnapshot => ({ playerId, createdAt: publishedAt, ...playerScores })
    );
    return { publishedAt, snapshots };
  }

  async fetchTechnologyNames(context: FetchContext = {}): Promise<Map<number, string>> {
    const body = await requestFeed(this.client, 'localization', `${this.baseUrl}/localization.xml`, {
      query: { toJson: 1 },
      signal: context.signal,
    });
    const parsed = parseOrThrow(LocalizationResponseSchema, body, 'localization response');

    return new Map(parsed.techs.name.map((entry): [number, string] => [entry['@attributes'].id, entry['@value']]));
  }
}
