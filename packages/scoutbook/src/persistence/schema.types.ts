/**
 * Scoutbook Persistence Schema Types
 *
 * Row types match schema.sql exactly. Mapping to domain records happens here
 * so the repository only moves rows around.
 *
 * Design principles:
 *   1. ISO8601 timestamp strings in rows, `Date` in the domain
 *   2. 0/1 integers for booleans (portable across SQLite and PostgreSQL)
 *   3. BIGINT columns may come back as strings (pg), `DbBigInt` covers both
 *   4. Explicit null handling (not undefined)
 */

import type {
  Coordinate,
  HighscoreSnapshot,
  Planet,
  Player,
  Report,
  ResourceSnapshot,
  ShipLine,
  SourceKind,
  TechLine,
} from '../core/types.js';

// ============================================================================
// Scalar Types
// ============================================================================

/**
 * ISO8601 timestamp string in UTC, e.g. "2025-12-17T10:30:00.000Z"
 */
export type ISO8601Timestamp = string;

export type DbBoolean = 0 | 1;

export type DbBigInt = number | string;

/**
 * Values the adapters accept as statement parameters
 */
export type SqlValue = string | number | null;

// ============================================================================
// Table Row Types
// ============================================================================

export interface PlayerRow {
  readonly id: number;
  readonly name: string;
  readonly updated_at: ISO8601Timestamp;
}

export interface PlanetRow {
  readonly player_id: number;
  readonly galaxy: number;
  readonly system: number;
  readonly position: number;
  readonly name: string | null;
  readonly has_moon: DbBoolean;
  readonly destroyed: DbBoolean;
  readonly manual_edit_at: ISO8601Timestamp | null;
}

export interface ReportRow {
  readonly token: string;
  readonly player_id: number;
  readonly created_at: ISO8601Timestamp;
  readonly source_kind: SourceKind;
  readonly galaxy: number | null;
  readonly system: number | null;
  readonly position: number | null;
  readonly from_moon: DbBoolean;
}

export interface ReportShipRow {
  readonly report_token: string;
  readonly ordinal: number;
  readonly ship_type: number;
  readonly count: DbBigInt;
}

export interface ReportTechRow {
  readonly report_token: string;
  readonly ordinal: number;
  readonly tech_type: number;
  readonly level: number;
}

export interface ReportResourcesRow {
  readonly report_token: string;
  readonly metal: DbBigInt;
  readonly crystal: DbBigInt;
  readonly deuterium: DbBigInt;
}

export interface HighscoreRow {
  readonly player_id: number;
  readonly created_at: ISO8601Timestamp;
  readonly total_points: DbBigInt | null;
  readonly total_rank: number | null;
  readonly military_points: DbBigInt | null;
  readonly military_rank: number | null;
  readonly military_built_points: DbBigInt | null;
}

/**
 * Child rows of one report, grouped by the repository before mapping
 */
export interface ReportChildren {
  readonly ships: readonly ReportShipRow[];
  readonly techs: readonly ReportTechRow[];
  readonly resources: ReportResourcesRow | null;
}

// ============================================================================
// Conversions
// ============================================================================

export function toDbBoolean(value: boolean): DbBoolean {
  return value ? 1 : 0;
}

export function toTimestamp(date: Date): ISO8601Timestamp {
  return date.toISOString();
}

export function nowISO8601(): ISO8601Timestamp {
  return new Date().toISOString();
}

function fromDbBigInt(value: DbBigInt): number {
  return typeof value === 'number' ? value : Number(value);
}

function fromNullableBigInt(value: DbBigInt | null): number | null {
  return value === null ? null : fromDbBigInt(value);
}

function fromDbBoolean(value: number): boolean {
  return value === 1;
}

export function rowToPlayer(row: PlayerRow): Player {
  return { id: row.id, name: row.name };
}

export function rowToPlanet(row: PlanetRow): Planet {
  return {
    playerId: row.player_id,
    coordinate: { galaxy: row.galaxy, system: row.system, position: row.position },
    name: row.name,
    hasMoon: fromDbBoolean(row.has_moon),
    destroyed: fromDbBoolean(row.destroyed),
    manualEditAt: row.manual_edit_at === null ? null : new Date(row.manual_edit_at),
  };
}

function rowCoordinate(row: ReportRow): Coordinate | null {
  if (row.galaxy === null || row.system === null || row.position === null) {
    return null;
  }
  return { galaxy: row.galaxy, system: row.system, position: row.position };
}

export function rowToReport(row: ReportRow, children: ReportChildren): Report {
  const ships: ShipLine[] = [...children.ships]
    .sort((a, b) => a.ordinal - b.ordinal)
    .map((ship) => ({ shipType: ship.ship_type, count: fromDbBigInt(ship.count) }));

  const techs: TechLine[] = [...children.techs]
    .sort((a, b) => a.ordinal - b.ordinal)
    .map((tech) => ({ techType: tech.tech_type, level: tech.level }));

  const resources: ResourceSnapshot | null = children.resources
    ? {
        metal: fromDbBigInt(children.resources.metal),
        crystal: fromDbBigInt(children.resources.crystal),
        deuterium: fromDbBigInt(children.resources.deuterium),
      }
    : null;

  return {
    token: row.token,
    playerId: row.player_id,
    createdAt: new Date(row.created_at),
    sourceKind: row.source_kind,
    coordinate: rowCoordinate(row),
    fromMoon: fromDbBoolean(row.from_moon),
    ships,
    techs,
    resources,
  };
}

export function rowToHighscore(row: HighscoreRow): HighscoreSnapshot {
  return {
    playerId: row.player_id,
    createdAt: new Date(row.created_at),
    totalPoints: fromNullableBigInt(row.total_points),
    totalRank: row.total_rank,
    militaryPoints: fromNullableBigInt(row.military_points),
    militaryRank: row.military_rank,
    militaryBuiltPoints: fromNullableBigInt(row.military_built_points),
  };
}
