/**
 * Roster Commands
 *
 * Usage:
 *   scoutbook roster sync
 */

import type { Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { runWithService } from '../../lib/context.js';
import { formatJson } from '../../lib/output.js';

export async function executeRosterSync(service: ScoutbookService): Promise<string> {
  const synced = await service.syncRoster();
  return formatJson({ synced });
}

export function registerRosterCommands(program: Command): void {
  const roster = program.command('roster').description('Player roster');

  roster
    .command('sync')
    .description('Fetch the game roster and upsert every player')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      await runWithService(command, (service) => executeRosterSync(service));
    });
}
