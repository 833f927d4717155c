import { z } from 'zod';

/**
 * Corpus Config Schema
 *
 * Validates the YAML configuration file. Every key is optional; defaults
 * are applied here, at load time, so downstream code never re-checks them.
 */

/** List of feed URLs; a bare `rss:` key in YAML parses as null */
const FeedListSchema = z
  .array(z.string().trim().min(1))
  .nullish()
  .transform((urls) => urls ?? []);

export const OpenAlexConfigSchema = z.object({
  /** Full-text search query */
  query: z.string().default(''),

  /** Page size, capped by the API at 200 */
  per_page: z.number().int().min(1).max(200).default(200),

  /** Contact address for the polite pool */
  mailto: z.string().default(''),
});

export type OpenAlexConfig = z.infer<typeof OpenAlexConfigSchema>;

export const GdeltConfigSchema = z.object({
  /** DOC 2.0 query string */
  gkg_search: z.string().default(''),

  /** Requested articles per monthly window */
  max_records: z.number().int().positive().default(5000),
});

export type GdeltConfig = z.infer<typeof GdeltConfigSchema>;

export const CorpusConfigSchema = z.object({
  sources: z
    .object({
      rss: FeedListSchema,
      ngo_rss: FeedListSchema,
      openalex: OpenAlexConfigSchema.nullish().transform((v) => v ?? undefined),
      gdelt: GdeltConfigSchema.nullish().transform((v) => v ?? undefined),
    })
    .nullish()
    .transform((v) => v ?? { rss: [], ngo_rss: [], openalex: undefined, gdelt: undefined }),

  rate_limit: z
    .object({
      /** Fixed pause after each adapter request */
      sleep_seconds: z.number().min(0).default(1.0),
    })
    .nullish()
    .transform((v) => v ?? { sleep_seconds: 1.0 }),
});

export type CorpusConfig = z.infer<typeof CorpusConfigSchema>;
