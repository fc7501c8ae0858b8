/**
 * Planets Command
 *
 * Usage:
 *   scoutbook planets <playerId> [--format json|table]
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { ScoutbookService } from '../../../core/scoutbook-service.js';
import { parsePositiveInt, runWithService } from '../../lib/context.js';
import {
  formatJson,
  formatTable,
  isOutputFormat,
  OUTPUT_FORMATS,
  PLANET_COLUMNS,
  serializePlanet,
  type OutputFormat,
} from '../../lib/output.js';

export async function executePlanets(
  service: ScoutbookService,
  playerId: number,
  format: OutputFormat = 'json'
): Promise<string> {
  const planets = (await service.listPlanets(playerId)).map(serializePlanet);
  return format === 'table' ? formatTable(planets, PLANET_COLUMNS) : formatJson(planets);
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`expected one of ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

export function registerPlanetsCommand(program: Command): void {
  program
    .command('planets')
    .description('List the stored planets of a player')
    .argument('<playerId>', 'Player id', parsePositiveInt)
    .option('--format <fmt>', 'Output format: json|table', parseFormat, 'json')
    .action(async (playerId: number, options: { readonly format: OutputFormat }, command: Command) => {
      await runWithService(command, (service) => executePlanets(service, playerId, options.format));
    });
}
