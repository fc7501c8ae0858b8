/**
 * scoutbook report add <key> [--player <id>] [--force]
 *
 * KEY is either a scouting-report token ("sr-...") fetched from the report
 * detail feed, or a battle-simulator string, which needs --player.
 * --force stores a report weaker than the player's current best.
 */

import type { Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { formatCoordinate } from '../../../core/coordinates.js';
import { parsePositiveInt, runWithService } from '../../lib/context.js';
import { formatJson } from '../../lib/output.js';

export interface AddOptions {
  readonly player?: number;
  readonly force?: boolean;
}

export async function executeReportAdd(
  service: ScoutbookService,
  key: string,
  options: AddOptions = {}
): Promise<string> {
  const added = await service.addReport(key, {
    playerId: options.player,
    allowRegression: options.force ?? false,
  });
  const { report } = added.ingest;

  return formatJson({
    token: added.token,
    sourceKind: added.sourceKind,
    playerId: report.playerId,
    coordinate: report.coordinate ? formatCoordinate(report.coordinate) : null,
    militaryStrength: added.ingest.militaryStrength,
    planetCreated: added.ingest.planetCreated,
    moonDetected: added.ingest.moonDetected,
  });
}

export function registerAddCommand(parent: Command): void {
  parent
    .command('add <key>')
    .description('Store a scouting report token or a battle-simulator string')
    .option('-p, --player <id>', 'Owner of a battle-simulator string', parsePositiveInt)
    .option('-f, --force', 'Store even when weaker than the current best report')
    .action(async (key: string, options: AddOptions, command: Command) => {
      await runWithService(command, (service) => executeReportAdd(service, key, options));
    });
}
