/**
 * Report Commands Index
 *
 * Registers all report subcommands:
 * - add: store a scouting report token or battle-simulator string
 * - show: report with delta against the previous one
 * - delete: remove a report, optionally with the planet it asserted
 * - best: the player's current best report
 */

import type { Command } from 'commander';
import { registerAddCommand } from './add.js';
import { registerShowCommand } from './show.js';
import { registerDeleteCommand } from './delete.js';
import { registerBestCommand } from './best.js';

export function registerReportCommands(program: Command): void {
  const report = program.command('report').description('Scouting reports');

  registerAddCommand(report);
  registerShowCommand(report);
  registerDeleteCommand(report);
  registerBestCommand(report);
}
