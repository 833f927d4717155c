import { z } from 'zod';

/**
 * Pipeline Status Schema
 *
 * Validates pipeline_status.json, written next to the corpus after every
 * clean/run, whether it succeeded or not.
 */

export const CommandNameSchema = z.enum(['harvest', 'clean', 'run']);
export type CommandName = z.infer<typeof CommandNameSchema>;

/**
 * Row counts gathered along the clean stage
 */
export const CleanCountsSchema = z.object({
  /** Rows read from the intermediate tables */
  inputRows: z.number().int().min(0),

  /** Rows dropped for an empty title */
  droppedUntitled: z.number().int().min(0),

  /** Rows absorbed into another cluster */
  duplicatesRemoved: z.number().int().min(0),

  /** Rows in the persisted corpus */
  outputRows: z.number().int().min(0),

  /** Rows whose text extraction succeeded (only when enrichment ran) */
  enriched: z.number().int().min(0).optional(),
});

export type CleanCounts = z.infer<typeof CleanCountsSchema>;

export const PipelineStatusSchema = z.object({
  command: CommandNameSchema,
  success: z.boolean(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime().optional(),
  durationMs: z.number().int().min(0).optional(),

  /** Stage that was running when the run failed */
  stage: z.string().optional(),
  error: z.string().optional(),

  /** Inclusive harvest window, ISO 8601 */
  window: z.object({
    since: z.string().datetime(),
    until: z.string().datetime(),
  }),
  rawDir: z.string(),
  outPath: z.string(),
  threshold: z.number().int().min(0).max(100),
  extractText: z.boolean(),

  /** Rows written by the harvest stage */
  harvestedRows: z.number().int().min(0).optional(),
  counts: CleanCountsSchema.optional(),
});

export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;
