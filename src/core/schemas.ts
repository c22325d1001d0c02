/**
 * Rainflow Engine - Validation Schemas
 * ====================================
 * zod schemas for counting options, configuration files and API payloads
 */

import { z } from 'zod';
import { MAX_CLASS_COUNT } from '../types';

// ============================================================================
// SELECTORS
// ============================================================================

export const CountingMethodZ = z.enum(['none', '4ptm', 'hcm', 'astm']);

export const ResidualMethodZ = z.enum([
  'none',
  'ignore',
  'no_finalize',
  'discard',
  'half_cycles',
  'full_cycles',
  'clormann_seeger',
  'repeated',
  'rp_din45667',
]);

export const SpreadDamageMethodZ = z.enum(['none', 'half_23', 'full_p2', 'full_p3']);

export const LogLevelZ = z.enum(['debug', 'info', 'warn', 'error']);

// ============================================================================
// COUNTING
// ============================================================================

export const CountFlagsZ = z
  .object({
    matrix: z.boolean(),
    damage: z.boolean(),
    rangePair: z.boolean(),
    levelCrossingUp: z.boolean(),
    levelCrossingDown: z.boolean(),
    damageHistory: z.boolean(),
    enforceMargin: z.boolean(),
  })
  .strict();

/** Class discretization and hysteresis, width only matters when classes are counted */
export const ClassOptionsZ = z
  .object({
    classCount: z.number().int().min(0).max(MAX_CLASS_COUNT),
    classWidth: z.number().finite(),
    classOffset: z.number().finite(),
    hysteresis: z.number().finite().min(0),
  })
  .superRefine((value, ctx) => {
    if (value.classCount > 0 && !(value.classWidth > 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['classWidth'],
        message: 'classWidth must be positive when classes are counted',
      });
    }
  });

export const WoehlerZ = z
  .object({
    sx: z.number().finite().positive(),
    nx: z.number().finite().positive(),
    k: z.number().finite().refine((k) => k !== 0, 'k must not be zero'),
    sd: z.number().finite().min(0).optional(),
    nd: z.number().positive().optional(),
    k2: z.number().finite().optional(),
    omission: z.number().finite().min(0).optional(),
    q: z.number().finite().optional(),
    q2: z.number().finite().optional(),
  })
  .strict();

export const CountingConfigZ = z
  .object({
    classCount: z.number().int().min(0).max(MAX_CLASS_COUNT),
    classWidth: z.number().finite(),
    classOffset: z.number().finite(),
    hysteresis: z.number().finite().min(0),
    countingMethod: CountingMethodZ,
    residualMethod: ResidualMethodZ,
    spreadDamage: SpreadDamageMethodZ,
    flags: CountFlagsZ,
  })
  .strict();

// ============================================================================
// CONFIG FILE
// ============================================================================

export const LoggingConfigZ = z
  .object({
    level: LogLevelZ,
    console: z.boolean(),
    file: z.boolean(),
    filePath: z.string().min(1),
  })
  .strict();

export const ServerConfigZ = z
  .object({
    port: z.number().int().min(0).max(65535),
    maxSessions: z.number().int().positive(),
    maxFeedValues: z.number().int().positive(),
  })
  .strict();

export const FullConfigZ = z
  .object({
    version: z.string().min(1),
    description: z.string(),
    counting: CountingConfigZ,
    woehler: WoehlerZ,
    logging: LoggingConfigZ,
    server: ServerConfigZ,
  })
  .strict();

// ============================================================================
// API PAYLOADS
// ============================================================================

export const FeedPayloadZ = z
  .object({
    values: z.array(z.number().finite()),
    scale: z.number().finite().optional(),
  })
  .strict();

export const FinalizePayloadZ = z
  .object({
    residualMethod: ResidualMethodZ.optional(),
  })
  .strict();

export const CreateSessionPayloadZ = z
  .object({
    name: z.string().min(1).max(200).optional(),
    counting: CountingConfigZ.partial()
      .extend({ flags: CountFlagsZ.partial().optional() })
      .optional(),
    woehler: WoehlerZ.optional(),
  })
  .strict();

export type CreateSessionPayload = z.infer<typeof CreateSessionPayloadZ>;
export type FeedPayload = z.infer<typeof FeedPayloadZ>;
export type FinalizePayload = z.infer<typeof FinalizePayloadZ>;

/** Flatten zod issues into `path: message` lines */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
