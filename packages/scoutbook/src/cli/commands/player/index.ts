/**
 * Player Commands
 *
 * Usage:
 *   scoutbook player refresh <name> [--names]
 *
 * Refresh resolves the name (syncing the roster once on a miss), fetches the
 * bulk scan and the intelligence hub, reconciles the planets and tries to
 * store the hub's top report. The reply closes with the player's highscore
 * standing.
 */

import type { Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { runWithService } from '../../lib/context.js';
import { formatJson, serializePlanet, serializeReport, serializeStanding } from '../../lib/output.js';

interface RefreshOptions {
  readonly names?: boolean;
}

export async function executePlayerRefresh(
  service: ScoutbookService,
  name: string,
  options: RefreshOptions = {}
): Promise<string> {
  const playerId = await service.resolvePlayerId(name);
  const snapshot = await service.refreshPlayer(playerId);
  const names = options.names ? service.technologyNames : undefined;

  return formatJson({
    player: snapshot.player,
    reconcile: snapshot.reconcile,
    planets: snapshot.planets.map(serializePlanet),
    bestReport: snapshot.bestReport ? await serializeReport(snapshot.bestReport, names) : null,
    syncedReportToken: snapshot.syncedReportToken,
    standing: serializeStanding(snapshot.standing),
  });
}

export function registerPlayerCommands(program: Command): void {
  const player = program.command('player').description('Player intelligence');

  player
    .command('refresh <name>')
    .description('Reconcile a player\'s planets and sync the top report')
    .option('--names', 'Label ships and technologies with their display names')
    .action(async (name: string, options: RefreshOptions, command: Command) => {
      await runWithService(command, (service) => executePlayerRefresh(service, name, options));
    });
}
