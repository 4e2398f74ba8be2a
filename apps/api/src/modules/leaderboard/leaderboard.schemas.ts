// =====================================================
// Leaderboard Validation Schemas
// =====================================================
// Zod schemas for leaderboard and admin endpoints. Size parameters are
// clamped to the configured maximum rather than rejected.

import { z } from 'zod';
import { PLAYER_ID_MAX_LENGTH } from '@rankline/shared-types';
import { PLAYER_NAME_MAX_LENGTH, REASON_MAX_LENGTH } from './leaderboard.service';

// ===========================================
// Constants
// ===========================================

export const DEFAULT_RANGE_WINDOW = 10;
export const DEFAULT_HISTORY_LIMIT = 20;
export const MAX_HISTORY_LIMIT = 100;

// ===========================================
// Field Schemas
// ===========================================

const codePoints = (value: string) => Array.from(value).length;

export const playerIdSchema = z
  .string()
  .min(1, 'playerId is required')
  .refine((val) => codePoints(val) <= PLAYER_ID_MAX_LENGTH, {
    message: `playerId must be at most ${PLAYER_ID_MAX_LENGTH} characters`,
  });

const scoreDeltaSchema = z
  .number()
  .int('delta must be an integer')
  .refine((val) => Number.isSafeInteger(val), { message: 'delta is out of range' })
  .refine((val) => val !== 0, { message: 'delta must not be zero' });

/**
 * Positive integer from a path or query string, clamped to `max`.
 */
const clampedCount = (field: string, max: number) =>
  z
    .string()
    .regex(/^\d+$/, `${field} must be a positive integer`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= 1, { message: `${field} must be at least 1` })
    .transform((val) => Math.min(val, max));

// ===========================================
// POST /api/v1/leaderboard/scores
// ===========================================

export const updateScoreSchema = z
  .object({
    playerId: playerIdSchema,
    delta: scoreDeltaSchema.optional(),
    // Older clients send the delta as incrScore
    incrScore: scoreDeltaSchema.optional(),
    name: z
      .string()
      .trim()
      .refine((val) => codePoints(val) <= PLAYER_NAME_MAX_LENGTH, {
        message: `name must be at most ${PLAYER_NAME_MAX_LENGTH} characters`,
      })
      .optional(),
    reason: z
      .string()
      .refine((val) => codePoints(val) <= REASON_MAX_LENGTH, {
        message: `reason must be at most ${REASON_MAX_LENGTH} characters`,
      })
      .optional(),
  })
  .transform((val, ctx) => {
    const delta = val.delta ?? val.incrScore;
    if (delta === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['delta'], message: 'delta is required' });
      return z.NEVER;
    }
    return { playerId: val.playerId, delta, name: val.name, reason: val.reason };
  });

export type UpdateScoreBody = z.infer<typeof updateScoreSchema>;

// ===========================================
// Path / Query Schemas
// ===========================================

export const playerParamsSchema = z.object({
  playerId: playerIdSchema,
});

export const createTopNParamsSchema = (maxTopN: number) =>
  z.object({
    n: clampedCount('n', maxTopN),
  });

export const createRangeQuerySchema = (maxWindow: number) =>
  z.object({
    window: clampedCount('window', maxWindow)
      .optional()
      .transform((val) => val ?? Math.min(DEFAULT_RANGE_WINDOW, maxWindow)),
  });

export const historyQuerySchema = z.object({
  limit: clampedCount('limit', MAX_HISTORY_LIMIT)
    .optional()
    .transform((val) => val ?? DEFAULT_HISTORY_LIMIT),
});

export const rebuildQuerySchema = z.object({
  clearCache: z
    .enum(['true', 'false'])
    .optional()
    .transform((val) => val === 'true'),
});
