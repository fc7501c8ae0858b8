/**
 * Delta Engine
 *
 * Signed per-key differences between a report and the previous report of the
 * same location. With no previous report every category is empty and the
 * presentation layer shows absolute values instead.
 */

import type { Report, ResourceName } from '../core/types.js';
import { RESOURCE_NAMES } from '../core/types.js';
import { sameCoordinate } from '../core/coordinates.js';

export interface ReportDelta {
  readonly resources: ReadonlyMap<ResourceName, number>;
  readonly ships: ReadonlyMap<number, number>;
  readonly techs: ReadonlyMap<number, number>;
}

/**
 * Category values of one report as maps
 */
export interface ReportDetails {
  readonly resources: ReadonlyMap<ResourceName, number>;
  readonly ships: ReadonlyMap<number, number>;
  readonly techs: ReadonlyMap<number, number>;
}

/**
 * Fresh empty maps on every call, never shared between results
 */
export function emptyDelta(): ReportDelta {
  return { resources: new Map(), ships: new Map(), techs: new Map() };
}

export function reportDetails(report: Report): ReportDetails {
  const resources = new Map<ResourceName, number>();
  if (report.resources) {
    for (const name of RESOURCE_NAMES) {
      resources.set(name, report.resources[name]);
    }
  }
  return {
    resources,
    ships: new Map(report.ships.map((line): [number, number] => [line.shipType, line.count])),
    techs: new Map(report.techs.map((line): [number, number] => [line.techType, line.level])),
  };
}

function diff<K>(next: ReadonlyMap<K, number>, previous: ReadonlyMap<K, number>): Map<K, number> {
  const result = new Map<K, number>();
  for (const key of new Set([...next.keys(), ...previous.keys()])) {
    result.set(key, (next.get(key) ?? 0) - (previous.get(key) ?? 0));
  }
  return result;
}

export function computeDelta(newReport: Report, oldReport: Report | null | undefined): ReportDelta {
  if (!oldReport) {
    return emptyDelta();
  }

  const next = reportDetails(newReport);
  const previous = reportDetails(oldReport);
  return {
    resources: diff(next.resources, previous.resources),
    ships: diff(next.ships, previous.ships),
    techs: diff(next.techs, previous.techs),
  };
}

/**
 * The report `newReport` should be compared with: same player, both
 * primary-scout, same coordinate and moon flag, strictly earlier, most recent.
 */
export function findPreviousReport(reports: readonly Report[], newReport: Report): Report | null {
  if (newReport.sourceKind !== 'primary-scout' || newReport.coordinate === null) {
    return null;
  }

  let previous: Report | null = null;
  for (const candidate of reports) {
    if (
      candidate.token !== newReport.token &&
      candidate.playerId === newReport.playerId &&
      candidate.sourceKind === 'primary-scout' &&
      candidate.fromMoon === newReport.fromMoon &&
      sameCoordinate(candidate.coordinate, newReport.coordinate) &&
      candidate.createdAt.getTime() < newReport.createdAt.getTime() &&
      (previous === null || candidate.createdAt.getTime() > previous.createdAt.getTime())
    ) {
      previous = candidate;
    }
  }
  return previous;
}

export function hasDelta(delta: ReportDelta): boolean {
  return [delta.resources, delta.ships, delta.techs].some((category) =>
    [...category.values()].some((value) => value !== 0)
  );
}

/**
 * JSON-friendly form for command replies
 */
export function deltaToRecord(delta: ReportDelta): {
  resources: Record<string, number>;
  ships: Record<string, number>;
  techs: Record<string, number>;
} {
  return {
    resources: Object.fromEntries(delta.resources),
    ships: Object.fromEntries(delta.ships),
    techs: Object.fromEntries(delta.techs),
  };
}
