/**
 * Report Detail Provider
 *
 * Resolves a scouting report token to the defender, event time, location and
 * the fleet/research/resources seen, normalized for the ingestor.
 */

import { HTTPClient } from '../core/http-client.js';
import { parseCoordinate } from '../core/coordinates.js';
import { MOON_PLANET_TYPE } from '../core/constants.js';
import { ScoutReportTokenSchema, ReportDetailResponseSchema, parseOrThrow } from '../security/input-validator.js';
import { requestFeed } from './feed-request.js';
import type { FetchContext, ReportDetailFeed, ScoutReport } from './types.js';

export class ReportDetailProvider implements ReportDetailFeed {
  constructor(
    private readonly baseUrl: string,
    private readonly client: HTTPClient = new HTTPClient()
  ) {}

  async fetchReport(token: string, context: FetchContext = {}): Promise<ScoutReport> {
    const validToken = parseOrThrow(ScoutReportTokenSchema, token, 'report token');
    const body = await requestFeed(
      this.client,
      'report detail',
      `${this.baseUrl}/report/${encodeURIComponent(validToken)}`,
      { signal: context.signal }
    );
    const { generic, details } = parseOrThrow(ReportDetailResponseSchema, body, 'report detail response').RESULT_DATA;

    const coordinateString = generic.defender_planet_coordinates ?? null;

    return {
      token: validToken,
      playerId: generic.defender_user_id,
      createdAt: new Date(generic.event_timestamp * 1000),
      sourceKind: 'primary-scout',
      coordinate: coordinateString ? parseCoordinate(coordinateString, 'report detail response') : null,
      fromMoon: generic.defender_planet_type === MOON_PLANET_TYPE,
      ships: new Map(details.ships.map((ship): [number, number] => [ship.ship_type, ship.count])),
      techs: new Map(details.research.map((tech): [number, number] => [tech.research_type, tech.level])),
      resources: details.resources
        ? {
            metal: details.resources.metal,
            crystal: details.resources.crystal,
            deuterium: details.resources.deuterium,
          }
        : null,
    };
  }
}
