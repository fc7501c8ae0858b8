/**
 * CLI command registration
 */

import type { Command } from 'commander';
import { registerRosterCommands } from './roster/index.js';
import { registerPlayerCommands } from './player/index.js';
import { registerReportCommands } from './report/index.js';
import { registerPlanetsCommand } from './planets/index.js';
import { registerHighscoreCommands } from './highscore/index.js';

export function registerCommands(program: Command): void {
  registerRosterCommands(program);
  registerPlayerCommands(program);
  registerReportCommands(program);
  registerPlanetsCommand(program);
  registerHighscoreCommands(program);
}
