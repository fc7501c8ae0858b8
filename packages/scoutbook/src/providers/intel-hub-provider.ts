/**
 * Intelligence Hub Provider
 *
 * Community intelligence hub shared by a team (authenticated by team key):
 * galaxy positions it has seen for a player, and a link to the player's top
 * scouting report.
 */

import type { FeedConfig } from '../core/config.js';
import { HTTPClient } from '../core/http-client.js';
import { parseCoordinate } from '../core/coordinates.js';
import { MalformedInputError } from '../core/errors.js';
import { SCOUT_REPORT_PREFIX } from '../core/constants.js';
import type { SecondaryObservation } from '../reconciliation/planet-reconciler.js';
import {
  GalaxyPositionsResponseSchema,
  HubReportResponseSchema,
  PlayerInfosResponseSchema,
  parseOrThrow,
} from '../security/input-validator.js';
import { requestFeed } from './feed-request.js';
import type { FetchContext, SecondaryIntelFeed } from './types.js';

/** The hub marks "no moon" with this moon id */
const NO_MOON_ID = '-1';

export type IntelHubConfig = Pick<FeedConfig, 'intelHubBaseUrl' | 'tool' | 'country' | 'universe'> & {
  readonly teamKey: string;
};

export class IntelHubProvider implements SecondaryIntelFeed {
  constructor(
    private readonly config: IntelHubConfig,
    private readonly client: HTTPClient = new HTTPClient()
  ) {}

  async fetchPositions(playerId: number, context: FetchContext = {}): Promise<SecondaryObservation[]> {
    const body = await requestFeed(this.client, 'intel hub positions', `${this.config.intelHubBaseUrl}/api_galaxy_get_infos.php`, {
      query: {
        tool: this.config.tool,
        country: this.config.country,
        universe: this.config.universe,
        team_key: this.config.teamKey,
        player_id: playerId,
      },
      signal: context.signal,
    });
    const parsed = parseOrThrow(GalaxyPositionsResponseSchema, body, 'intel hub positions response');

    return parsed.galaxy_array.map((entry) => ({
      coordinate: parseCoordinate(`${entry.galaxy}:${entry.system}:${entry.position}`, 'intel hub positions response'),
      hasMoon: String(entry.moon.id) !== NO_MOON_ID,
      // In-game timestamps are milliseconds; keep whole seconds
      timestamp: entry.timestamp_ig === undefined ? null : new Date(Math.floor(entry.timestamp_ig / 1000) * 1000),
    }));
  }

  async fetchTopReportToken(playerId: number, context: FetchContext = {}): Promise<string | null> {
    const infos = parseOrThrow(
      PlayerInfosResponseSchema,
      await requestFeed(this.client, 'intel hub player', `${this.config.intelHubBaseUrl}/oglight_get_player_infos.php`, {
        query: {
          tool: this.config.tool,
          country: this.config.country,
          univers: this.config.universe,
          team_key: this.config.teamKey,
          player_id: playerId,
          noacti: 'yes',
        },
        signal: context.signal,
      }),
      'intel hub player response'
    );

    if (!infos.top_sr_link) {
      return null;
    }

    const iid = infos.top_sr_link.split('?iid=')[1];
    if (!iid) {
      throw new MalformedInputError('intel hub player response', [`top report link has no iid: ${infos.top_sr_link}`]);
    }

    const report = parseOrThrow(
      HubReportResponseSchema,
      await requestFeed(this.client, 'intel hub report', `${this.config.intelHubBaseUrl}/api_get_report.php`, {
        query: { iid, tool: this.config.tool, team_key: this.config.teamKey },
        signal: context.signal,
      }),
      'intel hub report response'
    );

    const srId = report.report.RESULT_DATA.generic.sr_id;
    return `${SCOUT_REPORT_PREFIX}${this.config.country}-${this.config.universe}-${srId}`;
  }
}
