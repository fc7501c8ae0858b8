/**
 * Scoutbook Configuration
 *
 * Loads configuration from .scoutbookrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Explicit overrides (CLI flags)
 * 2. Environment variables (SCOUTBOOK_*)
 * 3. Config file (.scoutbookrc or explicit path)
 * 4. Default values
 *
 * @module core/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_PEACEFUL_SHIP_TYPES,
  DEFAULT_SIMULATED_FRESHNESS_DAYS,
  DEFAULT_TECH_SHIP_THRESHOLD,
  DEFAULT_TRUST_WINDOW_DAYS,
  MS_PER_DAY,
} from './constants.js';
import { MalformedInputError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface FeedConfig {
  /** Game server public API (roster, player data, localization) */
  readonly gameApiBaseUrl: string;
  /** Community intelligence hub (galaxy positions, top reports) */
  readonly intelHubBaseUrl: string;
  /** Scouting report detail API */
  readonly reportDetailBaseUrl: string;
  /** Tool name sent to the intelligence hub */
  readonly tool: string;
  readonly country: string;
  readonly universe: string;
  /** Intelligence hub team key; the secondary feed is disabled without one */
  readonly teamKey: string | null;
}

export interface RulesConfig {
  readonly trustWindowDays: number;
  readonly simulatedFreshnessDays: number;
  readonly techShipThreshold: number;
  readonly peacefulShipTypes: readonly number[];
}

export interface ScoutbookConfig {
  /** sqlite:<path>, sqlite::memory:, or postgres://... */
  readonly databaseUrl: string;
  readonly logLevel: LogLevel;
  readonly http: {
    readonly timeoutMs: number;
    readonly userAgent: string;
  };
  readonly feeds: FeedConfig;
  readonly rules: RulesConfig;
}

export const DEFAULT_CONFIG: ScoutbookConfig = {
  databaseUrl: 'sqlite:.scoutbook/scoutbook.db',
  logLevel: 'info',
  http: {
    timeoutMs: 10_000,
    userAgent: 'Scoutbook/0.1',
  },
  feeds: {
    gameApiBaseUrl: 'https://s256-us.ogame.gameforge.com/api',
    intelHubBaseUrl: 'https://ptre.chez.gg/scripts',
    reportDetailBaseUrl: 'https://ogapi.faw-kes.de/v1',
    tool: 'scoutbook',
    country: 'us',
    universe: '256',
    teamKey: null,
  },
  rules: {
    trustWindowDays: DEFAULT_TRUST_WINDOW_DAYS,
    simulatedFreshnessDays: DEFAULT_SIMULATED_FRESHNESS_DAYS,
    techShipThreshold: DEFAULT_TECH_SHIP_THRESHOLD,
    peacefulShipTypes: DEFAULT_PEACEFUL_SHIP_TYPES,
  },
};

// ============================================================================
// File Schema
// ============================================================================

const ConfigFileSchema = z
  .object({
    database_url: z.string().min(1),
    log_level: z.enum(['debug', 'info', 'warn', 'error']),
    http: z
      .object({
        timeout_ms: z.number().int().positive(),
        user_agent: z.string().min(1),
      })
      .partial(),
    feeds: z
      .object({
        game_api_base_url: z.string().url(),
        intel_hub_base_url: z.string().url(),
        report_detail_base_url: z.string().url(),
        tool: z.string().min(1),
        country: z.string().min(1),
        universe: z.string().min(1),
        team_key: z.string().min(1),
      })
      .partial(),
    rules: z
      .object({
        trust_window_days: z.number().positive(),
        simulated_freshness_days: z.number().positive(),
        tech_ship_threshold: z.number().int().positive(),
        peaceful_ship_types: z.array(z.number().int().positive()),
      })
      .partial(),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.scoutbookrc',
  '.scoutbookrc.yaml',
  '.scoutbookrc.yml',
  '.scoutbookrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML also covers plain JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new MalformedInputError(`config file ${filePath}`, [error instanceof Error ? error.message : String(error)], {
      cause: error,
    });
  }
  const result = ConfigFileSchema.safeParse(raw ?? {});

  if (!result.success) {
    throw new MalformedInputError(
      `config file ${filePath}`,
      result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

// ============================================================================
// Environment
// ============================================================================

export type Environment = Readonly<Record<string, string | undefined>>;

class EnvReader {
  constructor(private readonly env: Environment) {}

  string(name: string): string | undefined {
    const value = this.env[`SCOUTBOOK_${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  /**
   * Same constraint as the file schema: finite and greater than zero
   */
  positiveNumber(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (!Number.isFinite(num) || num <= 0) {
      throw new MalformedInputError('environment', [`SCOUTBOOK_${name} must be a positive number, got "${value}"`]);
    }
    return num;
  }

  numberList(name: string): number[] | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.split(',').map((part) => {
      const num = Number.parseInt(part.trim(), 10);
      if (Number.isNaN(num)) {
        throw new MalformedInputError('environment', [`SCOUTBOOK_${name} must be a comma-separated id list, got "${value}"`]);
      }
      return num;
    });
  }

  logLevel(): LogLevel | undefined {
    const value = this.string('LOG_LEVEL')?.toLowerCase();
    if (value === undefined) return undefined;
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
      throw new MalformedInputError('environment', [`SCOUTBOOK_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`]);
    }
    return level;
  }
}

// ============================================================================
// Configuration Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  readonly searchFrom?: string;
  /** Environment to read SCOUTBOOK_* variables from (default: process.env) */
  readonly env?: Environment;
  /** Flag overrides */
  readonly overrides?: {
    readonly databaseUrl?: string;
    readonly timeoutMs?: number;
    readonly verbose?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws MalformedInputError for invalid files or environment values
 */
export function loadConfig(options: LoadConfigOptions = {}): ScoutbookConfig {
  const env = new EnvReader(options.env ?? process.env);

  let fileConfig: ConfigFile = {};
  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath !== undefined) {
    const configPath = resolve(explicitPath);
    if (!existsSync(configPath)) {
      throw new MalformedInputError('config', [`config file not found: ${configPath}`]);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const found = findConfigFile(options.searchFrom ?? process.cwd());
    if (found) {
      fileConfig = parseConfigFile(found);
    }
  }

  const defaults = DEFAULT_CONFIG;

  return {
    databaseUrl:
      options.overrides?.databaseUrl ??
      env.string('DATABASE_URL') ??
      fileConfig.database_url ??
      defaults.databaseUrl,

    logLevel: options.overrides?.verbose
      ? 'debug'
      : env.logLevel() ?? fileConfig.log_level ?? defaults.logLevel,

    http: {
      timeoutMs:
        options.overrides?.timeoutMs ??
        env.positiveNumber('HTTP_TIMEOUT_MS') ??
        fileConfig.http?.timeout_ms ??
        defaults.http.timeoutMs,
      userAgent: fileConfig.http?.user_agent ?? defaults.http.userAgent,
    },

    feeds: {
      gameApiBaseUrl:
        env.string('GAME_API_URL') ?? fileConfig.feeds?.game_api_base_url ?? defaults.feeds.gameApiBaseUrl,
      intelHubBaseUrl:
        env.string('INTEL_HUB_URL') ?? fileConfig.feeds?.intel_hub_base_url ?? defaults.feeds.intelHubBaseUrl,
      reportDetailBaseUrl:
        env.string('REPORT_DETAIL_URL') ??
        fileConfig.feeds?.report_detail_base_url ??
        defaults.feeds.reportDetailBaseUrl,
      tool: fileConfig.feeds?.tool ?? defaults.feeds.tool,
      country: env.string('COUNTRY') ?? fileConfig.feeds?.country ?? defaults.feeds.country,
      universe: env.string('UNIVERSE') ?? fileConfig.feeds?.universe ?? defaults.feeds.universe,
      teamKey: env.string('TEAM_KEY') ?? fileConfig.feeds?.team_key ?? defaults.feeds.teamKey,
    },

    rules: {
      trustWindowDays:
        env.positiveNumber('TRUST_WINDOW_DAYS') ??
        fileConfig.rules?.trust_window_days ??
        defaults.rules.trustWindowDays,
      simulatedFreshnessDays:
        env.positiveNumber('SIMULATED_FRESHNESS_DAYS') ??
        fileConfig.rules?.simulated_freshness_days ??
        defaults.rules.simulatedFreshnessDays,
      techShipThreshold: fileConfig.rules?.tech_ship_threshold ?? defaults.rules.techShipThreshold,
      peacefulShipTypes:
        env.numberList('PEACEFUL_SHIP_TYPES') ??
        fileConfig.rules?.peaceful_ship_types ??
        defaults.rules.peacefulShipTypes,
    },
  };
}

export function daysToMs(days: number): number {
  return days * MS_PER_DAY;
}
