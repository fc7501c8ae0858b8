/**
 * Input Validation Module
 *
 * Zod schemas for every payload that crosses into Scoutbook: feed responses,
 * report tokens, simulator strings. Invalid input is rejected with
 * MalformedInputError before it reaches the ingestor or the reconciler.
 */

import { z } from 'zod';
import { MalformedInputError } from '../core/errors.js';

// ============================================================================
// Scalars
// ============================================================================

/**
 * Integer that feeds send either as a number or as a numeric string
 */
export const IntegerLikeSchema = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/, 'must be an integer').transform((value) => Number.parseInt(value, 10)),
]);

export const CoordinateStringSchema = z
  .string()
  .trim()
  .regex(/^[1-9]\d*:[1-9]\d*:[1-9]\d*$/, 'coordinate must be "galaxy:system:position"');

/**
 * Scouting report tokens, e.g. "sr-us-256-0123abcd"
 */
export const ScoutReportTokenSchema = z
  .string()
  .min(4)
  .max(128)
  .regex(/^sr-[A-Za-z0-9-]+$/, 'report token must look like "sr-..."');

export const BattleSimStringSchema = z
  .string()
  .min(1, 'battle-simulator string is empty')
  .max(4096, 'battle-simulator string too long');

/**
 * XML-to-JSON conversions emit a single object where a list has one element
 */
export function listOrSingle<T extends z.ZodTypeAny>(schema: T) {
  return z.union([z.array(schema), schema.transform((value: z.output<T>) => [value])]);
}

// ============================================================================
// Game API payloads
// ============================================================================

export const RosterResponseSchema = z.object({
  player: listOrSingle(
    z.object({
      '@attributes': z.object({
        id: IntegerLikeSchema,
        name: z.string(),
      }).passthrough(),
    }).passthrough()
  ).default([]),
}).passthrough();

export const PlayerDataResponseSchema = z.object({
  planets: z.object({
    planet: listOrSingle(
      z.object({
        '@attributes': z.object({
          coords: CoordinateStringSchema,
          name: z.string().optional(),
        }).passthrough(),
        moon: z.unknown().optional(),
      }).passthrough()
    ).default([]),
  }).passthrough(),
}).passthrough();

export const LocalizationResponseSchema = z.object({
  techs: z.object({
    name: listOrSingle(
      z.object({
        '@attributes': z.object({ id: IntegerLikeSchema }).passthrough(),
        '@value': z.string(),
      }).passthrough()
    ),
  }).passthrough(),
}).passthrough();

/**
 * One category of the highscore table; "timestamp" is when the server
 * computed it, in seconds since the epoch
 */
export const HighscoreResponseSchema = z.object({
  '@attributes': z.object({
    timestamp: IntegerLikeSchema,
  }).passthrough(),
  player: listOrSingle(
    z.object({
      '@attributes': z.object({
        id: IntegerLikeSchema,
        score: IntegerLikeSchema,
        position: IntegerLikeSchema,
      }).passthrough(),
    }).passthrough()
  ).default([]),
}).passthrough();

// ============================================================================
// Intelligence hub payloads
// ============================================================================

export const GalaxyPositionsResponseSchema = z.object({
  galaxy_array: z.array(
    z.object({
      galaxy: IntegerLikeSchema,
      system: IntegerLikeSchema,
      position: IntegerLikeSchema,
      moon: z.object({ id: z.union([z.string(), z.number()]) }).passthrough(),
      timestamp_ig: IntegerLikeSchema.optional(),
    }).passthrough()
  ).default([]),
}).passthrough();

export const PlayerInfosResponseSchema = z.object({
  top_sr_link: z.string().nullish(),
}).passthrough();

export const HubReportResponseSchema = z.object({
  report: z.object({
    RESULT_DATA: z.object({
      generic: z.object({ sr_id: z.union([z.string().min(1), z.number()]) }).passthrough(),
    }).passthrough(),
  }).passthrough(),
}).passthrough();

// ============================================================================
// Report detail payloads
// ============================================================================

export const ReportDetailResponseSchema = z.object({
  RESULT_DATA: z.object({
    generic: z.object({
      defender_user_id: IntegerLikeSchema,
      event_timestamp: IntegerLikeSchema,
      defender_planet_coordinates: CoordinateStringSchema.nullish(),
      defender_planet_type: IntegerLikeSchema.nullish(),
    }).passthrough(),
    details: z.object({
      ships: z.array(z.object({ ship_type: IntegerLikeSchema, count: IntegerLikeSchema }).passthrough()).default([]),
      research: z.array(z.object({ research_type: IntegerLikeSchema, level: IntegerLikeSchema }).passthrough()).default([]),
      resources: z.object({
        metal: IntegerLikeSchema.default(0),
        crystal: IntegerLikeSchema.default(0),
        deuterium: IntegerLikeSchema.default(0),
      }).passthrough().nullish(),
    }).passthrough(),
  }).passthrough(),
}).passthrough();

// ============================================================================
// Parsing helper
// ============================================================================

/**
 * Validate `input` or throw MalformedInputError naming each failing path
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, source: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new MalformedInputError(
      source,
      result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
