import { z } from 'zod';

/**
 * Source type tags written by the adapters into `source_type`
 */
export const SourceTagSchema = z.enum(['rss', 'openalex', 'gdelt']);
export type SourceTag = z.infer<typeof SourceTagSchema>;

/**
 * Values of `type_source` produced by the built-in adapters.
 * Other tags are accepted downstream.
 */
export const TYPE_SOURCE = {
  PRESS: 'Presse',
  ACADEMIC: 'Académique',
} as const;

/**
 * RawRecord - a source-shaped, schema-incomplete record.
 *
 * No invariant is enforced: a RawRecord may be missing any field and may
 * carry values of any type. Records loaded back from CSV batches hold
 * strings or null.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Columns written to every intermediate batch file, in order.
 */
export const BATCH_COLUMNS = [
  'date_pub',
  'type_source',
  'titre',
  'lien',
  'langue',
  'mots_cles',
  'extrait_citation',
  'source_name',
  'source_type',
  'source_country',
] as const;

export type BatchColumn = (typeof BATCH_COLUMNS)[number];

const nullableText = z.string().nullable();

/**
 * HarvestedRecord Schema - the shape every adapter yields
 */
export const HarvestedRecordSchema = z.object({
  /** Resolved publication date (ISO 8601) or null when unresolvable */
  date_pub: nullableText,
  type_source: nullableText,
  titre: nullableText,
  lien: nullableText,
  langue: nullableText,
  mots_cles: nullableText,
  extrait_citation: nullableText,
  source_name: nullableText,
  source_type: SourceTagSchema,
  source_country: nullableText,
});

export type HarvestedRecord = z.infer<typeof HarvestedRecordSchema>;
