/**
 * Scoutbook Core Types
 *
 * Domain records shared by the store, the reconciler, the ingestor and the
 * report selection/delta functions. Timestamps are `Date` in the domain and
 * ISO8601 strings in the database (see persistence/schema.types.ts).
 */

// ============================================================================
// Coordinates
// ============================================================================

/**
 * Planet location for a given player: galaxy, solar system, slot.
 */
export interface Coordinate {
  readonly galaxy: number;
  readonly system: number;
  readonly position: number;
}

// ============================================================================
// Entities
// ============================================================================

export interface Player {
  readonly id: number;
  readonly name: string;
}

/**
 * Stored planet. Unique per (playerId, coordinate).
 *
 * `manualEditAt` is set whenever a source other than the weekly bulk scan
 * asserted this planet; it drives the trust window in
 * reconciliation/protection.ts.
 */
export interface Planet {
  readonly playerId: number;
  readonly coordinate: Coordinate;
  readonly name: string | null;
  readonly hasMoon: boolean;
  readonly destroyed: boolean;
  readonly manualEditAt: Date | null;
}

/**
 * Origin of a report.
 *
 * - primary-scout: scouting report pulled from the report detail feed
 * - user-simulated: battle-simulator export submitted by a user
 */
export type SourceKind = 'primary-scout' | 'user-simulated';

export type ResourceName = 'metal' | 'crystal' | 'deuterium';

export const RESOURCE_NAMES: readonly ResourceName[] = ['metal', 'crystal', 'deuterium'];

export type ResourceSnapshot = Readonly<Record<ResourceName, number>>;

export interface ShipLine {
  readonly shipType: number;
  readonly count: number;
}

export interface TechLine {
  readonly techType: number;
  readonly level: number;
}

/**
 * Intelligence report. Immutable once stored.
 */
export interface Report {
  readonly token: string;
  readonly playerId: number;
  readonly createdAt: Date;
  readonly sourceKind: SourceKind;
  readonly coordinate: Coordinate | null;
  readonly fromMoon: boolean;
  /** Military ship types only, in feed order, zero counts omitted */
  readonly ships: readonly ShipLine[];
  readonly techs: readonly TechLine[];
  readonly resources: ResourceSnapshot | null;
}

// ============================================================================
// Highscores
// ============================================================================

/**
 * One player's ranking at one server timestamp. A field is null when the
 * player was absent from that category's table.
 */
export interface HighscoreSnapshot {
  readonly playerId: number;
  readonly createdAt: Date;
  readonly totalPoints: number | null;
  readonly totalRank: number | null;
  readonly militaryPoints: number | null;
  readonly militaryRank: number | null;
  readonly militaryBuiltPoints: number | null;
}

export type HighscoreScores = Omit<HighscoreSnapshot, 'playerId' | 'createdAt'>;

// ============================================================================
// Time
// ============================================================================

/**
 * Injectable wall clock. Every time-windowed rule takes one so tests can pin
 * "now".
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
