/**
 * Report Ingestor
 *
 * Validates and stores a normalized report:
 *   1. a token already stored is rejected (DuplicateReportError)
 *   2. unless allowRegression, a report weaker than the player's current best
 *      report is rejected (RegressionError)
 *   3. the report is stored with military ship lines only
 *   4. a coordinate links it to a planet: a missing planet is created as a
 *      manual assertion, a newly seen moon is recorded
 *
 * All of it runs inside the player's write boundary, so a rejected report
 * leaves the store untouched.
 */

import type { Clock, Coordinate, Report, ResourceSnapshot, SourceKind } from '../core/types.js';
import { systemClock } from '../core/types.js';
import {
  DEFAULT_PEACEFUL_SHIP_TYPES,
  DEFAULT_SIMULATED_FRESHNESS_DAYS,
  MS_PER_DAY,
} from '../core/constants.js';
import { DuplicateReportError, RegressionError } from '../core/errors.js';
import { formatCoordinate } from '../core/coordinates.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ScoutbookRepository } from '../persistence/repository.js';
import { selectBestReport } from './best-report.js';
import { militaryShips, militaryStrength, type ShipCounts } from './military-strength.js';

/**
 * Normalized report as produced by the feed adapters
 */
export interface IngestInput {
  readonly token: string;
  readonly playerId: number;
  /** Ship type -> count, in feed order */
  readonly ships: ShipCounts;
  /** Technology type -> level, in feed order */
  readonly techs: ReadonlyMap<number, number>;
  readonly sourceKind: SourceKind;
  readonly createdAt: Date;
  readonly coordinate?: Coordinate | null;
  readonly fromMoon?: boolean;
  readonly resources?: ResourceSnapshot | null;
  readonly allowRegression?: boolean;
}

export interface IngestResult {
  readonly report: Report;
  readonly militaryStrength: number;
  /** Planet created for the report's coordinate */
  readonly planetCreated: boolean;
  /** Moon newly recorded on an existing planet */
  readonly moonDetected: boolean;
}

export interface ReportIngestorOptions {
  readonly clock?: Clock;
  readonly peacefulShipTypes?: readonly number[];
  readonly simulatedFreshnessMs?: number;
  readonly logger?: Logger;
}

export class ReportIngestor {
  private readonly clock: Clock;
  private readonly peaceful: ReadonlySet<number>;
  private readonly simulatedFreshnessMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly repository: ScoutbookRepository,
    options: ReportIngestorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.peaceful = new Set(options.peacefulShipTypes ?? DEFAULT_PEACEFUL_SHIP_TYPES);
    this.simulatedFreshnessMs = options.simulatedFreshnessMs ?? DEFAULT_SIMULATED_FRESHNESS_DAYS * MS_PER_DAY;
    this.logger = options.logger ?? createLogger({ module: 'ingestor' });
  }

  get peacefulShipTypes(): ReadonlySet<number> {
    return this.peaceful;
  }

  /**
   * @throws DuplicateReportError when the token is already stored
   * @throws RegressionError when weaker than the best report and allowRegression is unset
   */
  async ingest(input: IngestInput): Promise<IngestResult> {
    const military = militaryShips(input.ships, this.peaceful);
    const strength = militaryStrength(military, this.peaceful);
    const coordinate = input.coordinate ?? null;
    const fromMoon = input.fromMoon ?? false;

    const result = await this.repository.withPlayer(input.playerId, async () => {
      if (await this.repository.reportExists(input.token)) {
        throw new DuplicateReportError(input.token);
      }

      if (!input.allowRegression) {
        const best = selectBestReport(await this.repository.listReports(input.playerId), {
          now: this.clock(),
          simulatedFreshnessMs: this.simulatedFreshnessMs,
          peacefulShipTypes: this.peaceful,
        });
        if (best) {
          const bestStrength = militaryStrength(best.ships, this.peaceful);
          if (strength < bestStrength) {
            throw new RegressionError(input.token, strength, bestStrength, best.token);
          }
        }
      }

      const report: Report = {
        token: input.token,
        playerId: input.playerId,
        createdAt: input.createdAt,
        sourceKind: input.sourceKind,
        coordinate,
        fromMoon,
        ships: [...military]
          .filter(([, count]) => count !== 0)
          .map(([shipType, count]) => ({ shipType, count })),
        techs: [...input.techs].map(([techType, level]) => ({ techType, level })),
        resources: input.resources ?? null,
      };
      await this.repository.insertReport(report);

      let planetCreated = false;
      let moonDetected = false;
      if (coordinate) {
        const planet = await this.repository.getPlanet(input.playerId, coordinate);
        if (!planet) {
          await this.repository.savePlanet({
            playerId: input.playerId,
            coordinate,
            name: null,
            hasMoon: fromMoon,
            destroyed: false,
            manualEditAt: input.createdAt,
          });
          planetCreated = true;
        } else if (fromMoon && !planet.hasMoon) {
          await this.repository.savePlanet({ ...planet, hasMoon: true });
          moonDetected = true;
        }
      }

      return { report, militaryStrength: strength, planetCreated, moonDetected };
    });

    this.logger.info('Report ingested', {
      token: input.token,
      playerId: input.playerId,
      sourceKind: input.sourceKind,
      militaryStrength: strength,
      coordinate: coordinate ? formatCoordinate(coordinate) : null,
      planetCreated: result.planetCreated,
    });
    return result;
  }
}
