/**
 * Scoutbook Entity Store
 *
 * Type-safe storage for players, planets, reports and report line items.
 * Works with both SQLite (better-sqlite3) and PostgreSQL (pg).
 *
 * Design principles:
 *   1. All queries return domain records, mapped in schema.types.ts
 *   2. Multi-row writes run in one transaction
 *   3. Prepared statements with positional parameters
 *   4. No business policy: duplicate checks, best-report choice and deltas
 *      live with the callers
 */

import type { Coordinate, HighscoreSnapshot, Planet, Player, Report, SourceKind } from '../core/types.js';
import { DuplicateReportError } from '../core/errors.js';
import { KeyedMutex } from '../resilience/keyed-mutex.js';
import type {
  HighscoreRow,
  PlanetRow,
  PlayerRow,
  ReportChildren,
  ReportResourcesRow,
  ReportRow,
  ReportShipRow,
  ReportTechRow,
  SqlValue,
} from './schema.types.js';
import {
  nowISO8601,
  rowToHighscore,
  rowToPlanet,
  rowToPlayer,
  rowToReport,
  toDbBoolean,
  toTimestamp,
} from './schema.types.js';

// ============================================================================
// Database Adapter Interface - Supports SQLite and PostgreSQL
// ============================================================================

/**
 * Unified database interface for SQLite and PostgreSQL.
 * Implementations handle driver-specific details.
 */
export interface DatabaseAdapter {
  /**
   * Execute query returning single row or null.
   */
  queryOne<T>(sql: string, params?: ReadonlyArray<SqlValue>): Promise<T | null>;

  /**
   * Execute query returning multiple rows.
   */
  queryMany<T>(sql: string, params?: ReadonlyArray<SqlValue>): Promise<ReadonlyArray<T>>;

  /**
   * Execute statement (INSERT, UPDATE, DELETE).
   * Returns number of affected rows.
   */
  execute(sql: string, params?: ReadonlyArray<SqlValue>): Promise<number>;

  /**
   * Execute transaction with automatic rollback on error.
   * Nested calls from inside `fn` join the outer transaction via savepoints.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /**
   * Apply the schema (idempotent).
   */
  initializeSchema(schemaSQL: string): Promise<void>;

  /**
   * Close database connection.
   */
  close(): Promise<void>;
}

/**
 * Unique violation on reports.token, as raised by pg (SQLSTATE 23505) or
 * better-sqlite3
 */
export function isReportTokenConflict(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  if (error.code === '23505') {
    return 'constraint' in error && error.constraint === 'reports_pkey';
  }
  if (error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
    return error.message.includes('reports.token');
  }
  return false;
}

// ============================================================================
// Repository Implementation
// ============================================================================

export class ScoutbookRepository {
  private readonly playerLocks = new KeyedMutex();

  constructor(private readonly db: DatabaseAdapter) {}

  /**
   * Per-player write boundary: serialized against other callers for the same
   * player, and all-or-nothing.
   */
  async withPlayer<T>(playerId: number, fn: () => Promise<T>): Promise<T> {
    return this.playerLocks.runExclusive(`player:${playerId}`, () => this.db.transaction(fn));
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // ==========================================================================
  // Players
  // ==========================================================================

  /**
   * Insert or rename a player (last write wins on name)
   */
  async upsertPlayer(player: Player): Promise<Player> {
    await this.db.execute(
      `INSERT INTO players (id, name, updated_at) VALUES (?, ?, ?)
       ON CONFLICT (id) DO UPDATE SET name = excluded.name, updated_at = excluded.updated_at`,
      [player.id, player.name, nowISO8601()]
    );
    return { id: player.id, name: player.name };
  }

  /**
   * Upsert a roster batch in one transaction
   *
   * @returns number of players written
   */
  async upsertPlayers(players: readonly Player[]): Promise<number> {
    return this.db.transaction(async () => {
      for (const player of players) {
        await this.upsertPlayer(player);
      }
      return players.length;
    });
  }

  async getPlayer(id: number): Promise<Player | null> {
    const row = await this.db.queryOne<PlayerRow>('SELECT * FROM players WHERE id = ?', [id]);
    return row ? rowToPlayer(row) : null;
  }

  /**
   * Case-insensitive name lookup
   */
  async findPlayerByName(name: string): Promise<Player | null> {
    const row = await this.db.queryOne<PlayerRow>(
      'SELECT * FROM players WHERE LOWER(name) = LOWER(?) ORDER BY id LIMIT 1',
      [name]
    );
    return row ? rowToPlayer(row) : null;
  }

  // ==========================================================================
  // Planets
  // ==========================================================================

  async getPlanet(playerId: number, coordinate: Coordinate): Promise<Planet | null> {
    const row = await this.db.queryOne<PlanetRow>(
      `SELECT * FROM planets
       WHERE player_id = ? AND galaxy = ? AND system = ? AND position = ?`,
      [playerId, coordinate.galaxy, coordinate.system, coordinate.position]
    );
    return row ? rowToPlanet(row) : null;
  }

  async listPlanets(playerId: number): Promise<Planet[]> {
    const rows = await this.db.queryMany<PlanetRow>(
      'SELECT * FROM planets WHERE player_id = ? ORDER BY galaxy, system, position',
      [playerId]
    );
    return rows.map(rowToPlanet);
  }

  /**
   * Insert or fully replace the planet at its composite key
   */
  async savePlanet(planet: Planet): Promise<void> {
    await this.db.execute(
      `INSERT INTO planets (
        player_id, galaxy, system, position, name, has_moon, destroyed, manual_edit_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (player_id, galaxy, system, position) DO UPDATE SET
        name = excluded.name,
        has_moon = excluded.has_moon,
        destroyed = excluded.destroyed,
        manual_edit_at = excluded.manual_edit_at`,
      [
        planet.playerId,
        planet.coordinate.galaxy,
        planet.coordinate.system,
        planet.coordinate.position,
        planet.name,
        toDbBoolean(planet.hasMoon),
        toDbBoolean(planet.destroyed),
        planet.manualEditAt ? toTimestamp(planet.manualEditAt) : null,
      ]
    );
  }

  /**
   * @returns true when a row was removed
   */
  async deletePlanet(playerId: number, coordinate: Coordinate): Promise<boolean> {
    const changes = await this.db.execute(
      'DELETE FROM planets WHERE player_id = ? AND galaxy = ? AND system = ? AND position = ?',
      [playerId, coordinate.galaxy, coordinate.system, coordinate.position]
    );
    return changes > 0;
  }

  // ==========================================================================
  // Reports
  // ==========================================================================

  async reportExists(token: string): Promise<boolean> {
    const row = await this.db.queryOne<{ token: string }>('SELECT token FROM reports WHERE token = ?', [token]);
    return row !== null;
  }

  async getReport(token: string): Promise<Report | null> {
    const row = await this.db.queryOne<ReportRow>('SELECT * FROM reports WHERE token = ?', [token]);
    if (!row) {
      return null;
    }

    const [ships, techs, resources] = await Promise.all([
      this.db.queryMany<ReportShipRow>('SELECT * FROM report_ships WHERE report_token = ?', [token]),
      this.db.queryMany<ReportTechRow>('SELECT * FROM report_techs WHERE report_token = ?', [token]),
      this.db.queryOne<ReportResourcesRow>('SELECT * FROM report_resources WHERE report_token = ?', [token]),
    ]);

    return rowToReport(row, { ships, techs, resources });
  }

  /**
   * All reports of a player, oldest first, optionally restricted to one
   * source kind
   */
  async listReports(playerId: number, sourceKind?: SourceKind): Promise<Report[]> {
    const kindFilter = sourceKind ? ' AND r.source_kind = ?' : '';
    const params: SqlValue[] = sourceKind ? [playerId, sourceKind] : [playerId];

    const rows = await this.db.queryMany<ReportRow>(
      `SELECT r.* FROM reports r WHERE r.player_id = ?${kindFilter} ORDER BY r.created_at, r.token`,
      params
    );
    if (rows.length === 0) {
      return [];
    }

    const [ships, techs, resources] = await Promise.all([
      this.db.queryMany<ReportShipRow>(
        `SELECT s.* FROM report_ships s JOIN reports r ON r.token = s.report_token
         WHERE r.player_id = ?${kindFilter}`,
        params
      ),
      this.db.queryMany<ReportTechRow>(
        `SELECT t.* FROM report_techs t JOIN reports r ON r.token = t.report_token
         WHERE r.player_id = ?${kindFilter}`,
        params
      ),
      this.db.queryMany<ReportResourcesRow>(
        `SELECT x.* FROM report_resources x JOIN reports r ON r.token = x.report_token
         WHERE r.player_id = ?${kindFilter}`,
        params
      ),
    ]);

    const children = new Map<string, { ships: ReportShipRow[]; techs: ReportTechRow[]; resources: ReportResourcesRow | null }>();
    for (const row of rows) {
      children.set(row.token, { ships: [], techs: [], resources: null });
    }
    for (const ship of ships) {
      children.get(ship.report_token)?.ships.push(ship);
    }
    for (const tech of techs) {
      children.get(tech.report_token)?.techs.push(tech);
    }
    for (const resource of resources) {
      const entry = children.get(resource.report_token);
      if (entry) {
        entry.resources = resource;
      }
    }

    const empty: ReportChildren = { ships: [], techs: [], resources: null };
    return rows.map((row) => rowToReport(row, children.get(row.token) ?? empty));
  }

  /**
   * Insert a report with its line items and resource snapshot atomically.
   * Zero ship counts are skipped.
   *
   * @throws DuplicateReportError when another writer stored the token first
   */
  async insertReport(report: Report): Promise<void> {
    try {
      await this.writeReport(report);
    } catch (error) {
      if (isReportTokenConflict(error)) {
        throw new DuplicateReportError(report.token);
      }
      throw error;
    }
  }

  private async writeReport(report: Report): Promise<void> {
    await this.db.transaction(async () => {
      await this.db.execute(
        `INSERT INTO reports (
          token, player_id, created_at, source_kind, galaxy, system, position, from_moon
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          report.token,
          report.playerId,
          toTimestamp(report.createdAt),
          report.sourceKind,
          report.coordinate?.galaxy ?? null,
          report.coordinate?.system ?? null,
          report.coordinate?.position ?? null,
          toDbBoolean(report.fromMoon),
        ]
      );

      let ordinal = 0;
      for (const ship of report.ships) {
        if (ship.count === 0) {
          continue;
        }
        await this.db.execute(
          'INSERT INTO report_ships (report_token, ordinal, ship_type, count) VALUES (?, ?, ?, ?)',
          [report.token, ordinal++, ship.shipType, ship.count]
        );
      }

      for (const [index, tech] of report.techs.entries()) {
        await this.db.execute(
          'INSERT INTO report_techs (report_token, ordinal, tech_type, level) VALUES (?, ?, ?, ?)',
          [report.token, index, tech.techType, tech.level]
        );
      }

      if (report.resources) {
        await this.db.execute(
          'INSERT INTO report_resources (report_token, metal, crystal, deuterium) VALUES (?, ?, ?, ?)',
          [report.token, report.resources.metal, report.resources.crystal, report.resources.deuterium]
        );
      }
    });
  }

  /**
   * Remove a report; line items and resources cascade.
   *
   * @returns true when a row was removed
   */
  async deleteReport(token: string): Promise<boolean> {
    const changes = await this.db.execute('DELETE FROM reports WHERE token = ?', [token]);
    return changes > 0;
  }

  // ==========================================================================
  // Highscores
  // ==========================================================================

  /**
   * Timestamp of the newest stored highscore snapshot, null before the first
   */
  async latestHighscoreAt(): Promise<Date | null> {
    const row = await this.db.queryOne<{ latest: string | null }>(
      'SELECT MAX(created_at) AS latest FROM highscores'
    );
    return row?.latest ? new Date(row.latest) : null;
  }

  /**
   * Store one published highscore table in one transaction. Rows already
   * stored for the same player and timestamp are left as they are.
   *
   * @returns number of rows written
   */
  async insertHighscores(snapshots: readonly HighscoreSnapshot[]): Promise<number> {
    return this.db.transaction(async () => {
      let written = 0;
      for (const snapshot of snapshots) {
        written += await this.db.execute(
          `INSERT INTO highscores (player_id, created_at, total_points, total_rank,
             military_points, military_rank, military_built_points)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (player_id, created_at) DO NOTHING`,
          [
            snapshot.playerId,
            toTimestamp(snapshot.createdAt),
            snapshot.totalPoints,
            snapshot.totalRank,
            snapshot.militaryPoints,
            snapshot.militaryRank,
            snapshot.militaryBuiltPoints,
          ]
        );
      }
      return written;
    });
  }

  /**
   * A player's snapshots, newest first
   */
  async listHighscores(playerId: number, limit = 2): Promise<HighscoreSnapshot[]> {
    const rows = await this.db.queryMany<HighscoreRow>(
      'SELECT * FROM highscores WHERE player_id = ? ORDER BY created_at DESC LIMIT ?',
      [playerId, limit]
    );
    return rows.map(rowToHighscore);
  }
}
