/**
 * scoutbook report show <token> [--names]
 *
 * Prints the report and its delta against the previous scout report of the
 * same location. Without a previous report the delta is empty.
 */

import type { Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { hasDelta } from '../../../reports/delta-engine.js';
import { runWithService } from '../../lib/context.js';
import { formatJson, serializeDelta, serializeReport } from '../../lib/output.js';

export interface ShowOptions {
  readonly names?: boolean;
}

export async function executeReportShow(
  service: ScoutbookService,
  token: string,
  options: ShowOptions = {}
): Promise<string> {
  const { report, previous, delta } = await service.reportWithDelta(token);
  const names = options.names ? service.technologyNames : undefined;

  return formatJson({
    report: await serializeReport(report, names),
    previousToken: previous ? previous.token : null,
    changed: hasDelta(delta),
    delta: await serializeDelta(delta, names),
  });
}

export function registerShowCommand(parent: Command): void {
  parent
    .command('show <token>')
    .description('Show a report with its delta against the previous one')
    .option('--names', 'Label ships and technologies with their display names')
    .action(async (token: string, options: ShowOptions, command: Command) => {
      await runWithService(command, (service) => executeReportShow(service, token, options));
    });
}
