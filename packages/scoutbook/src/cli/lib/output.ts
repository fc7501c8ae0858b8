/**
 * Output Formatting for CLI Commands
 *
 * Domain records contain Dates and Maps, so every command reply goes through
 * a serializer here before it is printed. Supports: json, table
 *
 * @module cli/lib/output
 */

import type { HighscoreSnapshot, Planet, Report } from '../../core/types.js';
import { formatCoordinate } from '../../core/coordinates.js';
import { deltaToRecord, type ReportDelta } from '../../reports/delta-engine.js';
import type { TechnologyNameCache } from '../../providers/technology-names.js';
import type { PlayerStanding, ScoreDelta } from '../../highscores/standing.js';

export type OutputFormat = 'json' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

// ============================================================================
// Serializers
// ============================================================================

export type SerializedReport = {
  readonly token: string;
  readonly playerId: number;
  readonly createdAt: string;
  readonly sourceKind: Report['sourceKind'];
  readonly coordinate: string | null;
  readonly fromMoon: boolean;
  readonly ships: Record<string, number>;
  readonly techs: Record<string, number>;
  readonly resources: Report['resources'];
};

export type SerializedPlanet = {
  readonly coordinate: string;
  readonly name: string | null;
  readonly hasMoon: boolean;
  readonly destroyed: boolean;
  readonly manualEditAt: string | null;
};

/**
 * Ship and technology lines keyed by type id, or by display name when a name
 * table is given
 */
export async function serializeReport(report: Report, names?: TechnologyNameCache): Promise<SerializedReport> {
  const ships = new Map(report.ships.map((line): [number, number] => [line.shipType, line.count]));
  const techs = new Map(report.techs.map((line): [number, number] => [line.techType, line.level]));

  return {
    token: report.token,
    playerId: report.playerId,
    createdAt: report.createdAt.toISOString(),
    sourceKind: report.sourceKind,
    coordinate: report.coordinate ? formatCoordinate(report.coordinate) : null,
    fromMoon: report.fromMoon,
    ships: names ? await names.labelAll(ships) : Object.fromEntries(ships),
    techs: names ? await names.labelAll(techs) : Object.fromEntries(techs),
    resources: report.resources,
  };
}

export async function serializeDelta(
  delta: ReportDelta,
  names?: TechnologyNameCache
): Promise<ReturnType<typeof deltaToRecord>> {
  if (!names) {
    return deltaToRecord(delta);
  }
  return {
    resources: Object.fromEntries(delta.resources),
    ships: await names.labelAll(delta.ships),
    techs: await names.labelAll(delta.techs),
  };
}

export function serializePlanet(planet: Planet): SerializedPlanet {
  return {
    coordinate: formatCoordinate(planet.coordinate),
    name: planet.name,
    hasMoon: planet.hasMoon,
    destroyed: planet.destroyed,
    manualEditAt: planet.manualEditAt ? planet.manualEditAt.toISOString() : null,
  };
}

export type SerializedHighscore = Omit<HighscoreSnapshot, 'createdAt'> & { readonly createdAt: string };

export type SerializedStanding = {
  readonly playerId: number;
  readonly latest: SerializedHighscore | null;
  readonly previous: SerializedHighscore | null;
  readonly delta: ScoreDelta | null;
};

export function serializeHighscore(snapshot: HighscoreSnapshot): SerializedHighscore {
  return { ...snapshot, createdAt: snapshot.createdAt.toISOString() };
}

export function serializeStanding(standing: PlayerStanding): SerializedStanding {
  return {
    playerId: standing.playerId,
    latest: standing.latest ? serializeHighscore(standing.latest) : null,
    previous: standing.previous ? serializeHighscore(standing.previous) : null,
    delta: standing.delta,
  };
}

// ============================================================================
// Formats
// ============================================================================

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

function formatCell(column: TableColumn, row: Readonly<Record<string, unknown>>): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

export function formatTable(data: ReadonlyArray<Readonly<Record<string, unknown>>>, columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((column) =>
    Math.max(column.header.length, ...data.map((row) => formatCell(column, row).length))
  );
  const pad = (value: string, index: number, align: TableColumn['align']): string => {
    const width = widths[index] ?? value.length;
    return align === 'right' ? value.padStart(width) : value.padEnd(width);
  };

  const headerRow = columns.map((column, i) => pad(column.header, i, column.align)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((column, i) => pad(formatCell(column, row), i, column.align)).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export const formatters = {
  flag: (value: unknown): string => (value === true ? 'yes' : '-'),
  orDash: (value: unknown): string => (value === null || value === undefined ? '-' : String(value)),
};

export const PLANET_COLUMNS: readonly TableColumn[] = [
  { key: 'coordinate', header: 'Coordinate' },
  { key: 'name', header: 'Name', formatter: formatters.orDash },
  { key: 'hasMoon', header: 'Moon', formatter: formatters.flag },
  { key: 'destroyed', header: 'Destroyed', formatter: formatters.flag },
  { key: 'manualEditAt', header: 'Manual edit', formatter: formatters.orDash },
];
