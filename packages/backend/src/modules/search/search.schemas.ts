import { z } from 'zod';

// --- Job record ---

export const RUN_MODES = ['BATCH', 'STREAM'] as const;

export const runModeSchema = z.enum(RUN_MODES);

export type RunMode = z.infer<typeof runModeSchema>;

export const jobStatusSchema = z.enum(['STARTING', 'ACTIVE', 'ACTIVEWITHERROR']);

export type JobStatus = z.infer<typeof jobStatusSchema>;

export const failureDetailsSchema = z.object({
  context: z.string(),
  lastFailedAt: z.number().int(),
  lastFailedReason: z.string(),
});

export type FailureDetails = z.infer<typeof failureDetailsSchema>;

export const jobStatsSchema = z.object({
  total: z.number().int().nonnegative(),
  success: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});

export type JobStats = z.infer<typeof jobStatsSchema>;

/** Stored JSON of a reindex job record; `timestamp` doubles as the CAS token. */
export const jobRecordSchema = z.object({
  runMode: runModeSchema,
  status: jobStatusSchema,
  timestamp: z.number().int(),
  startTime: z.number().int().nullable(),
  endTime: z.number().int().nullable(),
  entities: z.array(z.string()),
  stats: jobStatsSchema,
  failureDetails: failureDetailsSchema.nullable(),
  startedBy: z.string().nullable(),
  batchSize: z.number().int().positive(),
  flushIntervalSeconds: z.number().int().positive(),
  recreateIndex: z.boolean(),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;

// --- Request Schemas ---

export const reindexRequestSchema = z.object({
  entities: z
    .array(z.string().trim().min(1).max(64))
    .min(1, 'At least one entity type is required')
    .max(32),
  runMode: runModeSchema.default('BATCH'),
  batchSize: z.number().int().min(1).max(10_000).default(100),
  flushIntervalSeconds: z.number().int().min(1).max(3_600).default(2),
  recreateIndex: z.boolean().default(false),
});

export type ReindexRequest = z.infer<typeof reindexRequestSchema>;

export const runModeParamsSchema = z.object({
  runMode: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(runModeSchema),
});

// --- Response Schemas ---

export const indexStatusSchema = z.enum(['NOT_CREATED', 'CREATED', 'FAILED']);

export type IndexStatus = z.infer<typeof indexStatusSchema>;
