/**
 * scoutbook report best <playerId> [--names]
 */

import type { Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { parsePositiveInt, runWithService } from '../../lib/context.js';
import { formatJson, serializeReport } from '../../lib/output.js';

export interface BestOptions {
  readonly names?: boolean;
}

export async function executeReportBest(
  service: ScoutbookService,
  playerId: number,
  options: BestOptions = {}
): Promise<string> {
  const best = await service.best(playerId);
  if (!best) {
    return formatJson(null);
  }
  return formatJson(await serializeReport(best, options.names ? service.technologyNames : undefined));
}

export function registerBestCommand(parent: Command): void {
  parent
    .command('best')
    .description('Show the report currently treated as a player\'s truth')
    .argument('<playerId>', 'Player id', parsePositiveInt)
    .option('--names', 'Label ships and technologies with their display names')
    .action(async (playerId: number, options: BestOptions, command: Command) => {
      await runWithService(command, (service) => executeReportBest(service, playerId, options));
    });
}
