/**
 * Planet Reconciler
 *
 * Merges one player's observations from the weekly bulk scan (primary) and
 * the intelligence hub (secondary) into the stored planet set.
 *
 * Per coordinate the two feeds are merged by MERGE_RULES, then the merge
 * result is folded into the stored planet:
 *   - hasMoon is OR'd (a detected moon is never forgotten)
 *   - name is replaced only by a non-empty name
 *   - manualEditAt only moves forward
 *   - destroyed is cleared unless the planet is protected
 * Stored planets neither feed observed are marked destroyed unless protected.
 */

import type { Clock, Coordinate, Planet } from '../core/types.js';
import { systemClock } from '../core/types.js';
import { coordinateKey } from '../core/coordinates.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ScoutbookRepository } from '../persistence/repository.js';
import { DEFAULT_TRUST_WINDOW_MS, isProtected } from './protection.js';

// ============================================================================
// Observation Types
// ============================================================================

/**
 * Planet seen by the weekly bulk scan
 */
export interface PrimaryObservation {
  readonly coordinate: Coordinate;
  readonly hasMoon: boolean;
  readonly name?: string | null;
}

/**
 * Planet seen by the intelligence hub
 */
export interface SecondaryObservation {
  readonly coordinate: Coordinate;
  readonly hasMoon: boolean;
  readonly timestamp?: Date | null;
}

/**
 * Feed-merged view of one coordinate, before the stored planet is considered
 */
export interface MergedObservation {
  readonly coordinate: Coordinate;
  readonly hasMoon: boolean;
  readonly name: string | null;
  readonly manualEditAt: Date | null;
}

export interface ReconcileSummary {
  readonly playerId: number;
  readonly inserted: number;
  readonly updated: number;
  readonly markedDestroyed: number;
  readonly protectedSkipped: number;
}

// ============================================================================
// Merge Rules
// ============================================================================

interface MergeRule {
  readonly name: string;
  readonly applies: (primary: PrimaryObservation | undefined, secondary: SecondaryObservation | undefined) => boolean;
  readonly merge: (
    coordinate: Coordinate,
    primary: PrimaryObservation | undefined,
    secondary: SecondaryObservation | undefined
  ) => MergedObservation;
}

/**
 * Evaluated in order; the first rule that applies wins. A new feed adds a
 * branch here.
 */
export const MERGE_RULES: readonly MergeRule[] = [
  {
    name: 'primary-only',
    applies: (primary, secondary) => primary !== undefined && secondary === undefined,
    merge: (coordinate, primary) => ({
      coordinate,
      hasMoon: primary?.hasMoon ?? false,
      name: primary?.name ?? null,
      manualEditAt: null,
    }),
  },
  {
    name: 'secondary-only',
    applies: (primary, secondary) => primary === undefined && secondary !== undefined,
    merge: (coordinate, _primary, secondary) => ({
      coordinate,
      hasMoon: secondary?.hasMoon ?? false,
      name: null,
      manualEditAt: secondary?.timestamp ?? null,
    }),
  },
  {
    // Secondary corroboration counts as a fresh manual assertion
    name: 'both',
    applies: (primary, secondary) => primary !== undefined && secondary !== undefined,
    merge: (coordinate, primary, secondary) => ({
      coordinate,
      hasMoon: (primary?.hasMoon ?? false) || (secondary?.hasMoon ?? false),
      name: primary?.name ?? null,
      manualEditAt: secondary?.timestamp ?? null,
    }),
  },
];

/**
 * Merge both feeds per coordinate. Within one feed a later entry for the same
 * coordinate replaces an earlier one.
 */
export function mergeObservations(
  primary: readonly PrimaryObservation[],
  secondary: readonly SecondaryObservation[] = []
): Map<string, MergedObservation> {
  const entries = new Map<
    string,
    { coordinate: Coordinate; primary?: PrimaryObservation; secondary?: SecondaryObservation }
  >();

  for (const observation of primary) {
    const key = coordinateKey(observation.coordinate);
    const entry = entries.get(key) ?? { coordinate: observation.coordinate };
    entries.set(key, { ...entry, primary: observation });
  }
  for (const observation of secondary) {
    const key = coordinateKey(observation.coordinate);
    const entry = entries.get(key) ?? { coordinate: observation.coordinate };
    entries.set(key, { ...entry, secondary: observation });
  }

  const merged = new Map<string, MergedObservation>();
  for (const [key, entry] of entries) {
    const rule = MERGE_RULES.find((candidate) => candidate.applies(entry.primary, entry.secondary));
    if (rule) {
      merged.set(key, rule.merge(entry.coordinate, entry.primary, entry.secondary));
    }
  }
  return merged;
}

/**
 * Fold a merge result into the stored planet (pure)
 */
export function applyObservation(
  stored: Planet,
  observed: MergedObservation,
  now: Date,
  trustWindowMs: number = DEFAULT_TRUST_WINDOW_MS
): Planet {
  const manualEditAt =
    observed.manualEditAt !== null &&
    (stored.manualEditAt === null || observed.manualEditAt.getTime() > stored.manualEditAt.getTime())
      ? observed.manualEditAt
      : stored.manualEditAt;

  const next: Planet = {
    ...stored,
    hasMoon: stored.hasMoon || observed.hasMoon,
    name: observed.name ? observed.name : stored.name,
    manualEditAt,
  };

  return isProtected(next, now, trustWindowMs) ? next : { ...next, destroyed: false };
}

function samePlanetState(a: Planet, b: Planet): boolean {
  return (
    a.name === b.name &&
    a.hasMoon === b.hasMoon &&
    a.destroyed === b.destroyed &&
    (a.manualEditAt?.getTime() ?? null) === (b.manualEditAt?.getTime() ?? null)
  );
}

// ============================================================================
// Reconciler
// ============================================================================

export interface PlanetReconcilerOptions {
  readonly clock?: Clock;
  readonly trustWindowMs?: number;
  readonly logger?: Logger;
}

export class PlanetReconciler {
  private readonly clock: Clock;
  private readonly trustWindowMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly repository: ScoutbookRepository,
    options: PlanetReconcilerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.trustWindowMs = options.trustWindowMs ?? DEFAULT_TRUST_WINDOW_MS;
    this.logger = options.logger ?? createLogger({ module: 'reconciler' });
  }

  /**
   * Reconcile one player's planets against this pass's observations.
   * Runs inside the player's write boundary; all-or-nothing.
   */
  async reconcile(
    playerId: number,
    primary: readonly PrimaryObservation[],
    secondary?: readonly SecondaryObservation[]
  ): Promise<ReconcileSummary> {
    const merged = mergeObservations(primary, secondary ?? []);

    const summary = await this.repository.withPlayer(playerId, async () => {
      const now = this.clock();
      const stored = new Map<string, Planet>();
      for (const planet of await this.repository.listPlanets(playerId)) {
        stored.set(coordinateKey(planet.coordinate), planet);
      }

      let inserted = 0;
      let updated = 0;
      let markedDestroyed = 0;
      let protectedSkipped = 0;

      for (const [key, observed] of merged) {
        const existing = stored.get(key);
        if (!existing) {
          await this.repository.savePlanet({
            playerId,
            coordinate: observed.coordinate,
            name: observed.name,
            hasMoon: observed.hasMoon,
            destroyed: false,
            manualEditAt: observed.manualEditAt,
          });
          inserted++;
          continue;
        }

        const next = applyObservation(existing, observed, now, this.trustWindowMs);
        if (!samePlanetState(existing, next)) {
          await this.repository.savePlanet(next);
          updated++;
        }
      }

      for (const [key, planet] of stored) {
        if (merged.has(key)) {
          continue;
        }
        if (isProtected(planet, now, this.trustWindowMs)) {
          protectedSkipped++;
        } else if (!planet.destroyed) {
          await this.repository.savePlanet({ ...planet, destroyed: true });
          markedDestroyed++;
        }
      }

      return { playerId, inserted, updated, markedDestroyed, protectedSkipped };
    });

    this.logger.info('Planets reconciled', { ...summary });
    return summary;
  }
}
