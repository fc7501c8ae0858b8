/**
 * scoutbook report delete <token> [--detach-planet]
 */

import type { Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { formatCoordinate } from '../../../core/coordinates.js';
import { runWithService } from '../../lib/context.js';
import { formatJson } from '../../lib/output.js';

export interface DeleteOptions {
  readonly detachPlanet?: boolean;
}

export async function executeReportDelete(
  service: ScoutbookService,
  token: string,
  options: DeleteOptions = {}
): Promise<string> {
  const result = await service.deleteReport(token, { detachPlanet: options.detachPlanet ?? false });
  return formatJson({
    deleted: result.token,
    detachedPlanet: result.detachedCoordinate ? formatCoordinate(result.detachedCoordinate) : null,
  });
}

export function registerDeleteCommand(parent: Command): void {
  parent
    .command('delete <token>')
    .description('Delete a report with its line items')
    .option('--detach-planet', 'Also remove the planet the report asserted, if still protected')
    .action(async (token: string, options: DeleteOptions, command: Command) => {
      await runWithService(command, (service) => executeReportDelete(service, token, options));
    });
}
