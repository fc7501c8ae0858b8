#!/usr/bin/env tsx
/**
 * Scoutbook CLI Entry Point
 *
 * Roster sync, player refresh, report intake and inspection.
 *
 * @module scoutbook-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { parsePositiveInt } from '../src/cli/lib/context.js';
import { describeError, EXIT_CODES } from '../src/cli/lib/exit-codes.js';

export { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('scoutbook')
    .description('Scoutbook CLI - planet reconciliation and scouting report intake')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--config <path>', 'Path to config file (default: .scoutbookrc)')
    .option('--database <url>', 'Database URL (sqlite:<path> or postgres://...)')
    .option('--timeout <ms>', 'Upstream request timeout in milliseconds', parsePositiveInt);

  registerCommands(program);
  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exit(EXIT_CODES.UNEXPECTED);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.UNEXPECTED);
});
