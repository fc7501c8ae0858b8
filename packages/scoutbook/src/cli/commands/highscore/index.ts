/**
 * Highscore Commands
 *
 * Usage:
 *   scoutbook highscore sync
 *   scoutbook highscore standing <name>
 */

import type { Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { runWithService } from '../../lib/context.js';
import { formatJson, serializeStanding } from '../../lib/output.js';

export async function executeHighscoreSync(service: ScoutbookService): Promise<string> {
  const result = await service.snapshotHighscores();
  return formatJson({
    publishedAt: result.publishedAt.toISOString(),
    stored: result.stored,
    skipped: result.skipped,
  });
}

export async function executeHighscoreStanding(service: ScoutbookService, name: string): Promise<string> {
  const playerId = await service.resolvePlayerId(name);
  return formatJson(serializeStanding(await service.standing(playerId)));
}

export function registerHighscoreCommands(program: Command): void {
  const highscore = program.command('highscore').description('Player highscore snapshots');

  highscore
    .command('sync')
    .description('Store the published highscore table unless it is already stored')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      await runWithService(command, (service) => executeHighscoreSync(service));
    });

  highscore
    .command('standing <name>')
    .description('Latest highscore snapshot of a player and its change since the previous one')
    .action(async (name: string, _options: Record<string, unknown>, command: Command) => {
      await runWithService(command, (service) => executeHighscoreStanding(service, name));
    });
}
