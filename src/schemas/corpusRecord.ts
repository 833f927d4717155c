import { z } from 'zod';

/**
 * Canonical corpus schema. Column order is the persisted order.
 */
export const CORPUS_COLUMNS = [
  'id',
  'date_pub',
  'type_source',
  'titre',
  'lien',
  'langue',
  'controverse',
  'secteur',
  'territoire',
  'acteurs',
  'role_acteurs',
  'rapports_pouvoir',
  'issue',
  'mots_cles',
  'extrait_citation',
  'note_analytique',
  'source_name',
  'source_type',
  'source_country',
] as const;

export type CorpusColumn = (typeof CORPUS_COLUMNS)[number];

/** Optional trailing column, present only when enrichment ran */
export const FULLTEXT_COLUMN = 'fulltext' as const;

/**
 * Nullable text columns: every canonical column except the ones with
 * dedicated handling (id, date_pub, titre, lien).
 */
export const TEXT_COLUMNS = [
  'type_source',
  'langue',
  'controverse',
  'secteur',
  'territoire',
  'acteurs',
  'role_acteurs',
  'rapports_pouvoir',
  'issue',
  'mots_cles',
  'extrait_citation',
  'note_analytique',
  'source_name',
  'source_type',
  'source_country',
] as const satisfies readonly CorpusColumn[];

export type TextColumn = (typeof TEXT_COLUMNS)[number];

const nullableText = z.string().nullable();

const textColumnShape = {
  type_source: nullableText,
  langue: nullableText,
  controverse: nullableText,
  secteur: nullableText,
  territoire: nullableText,
  acteurs: nullableText,
  role_acteurs: nullableText,
  rapports_pouvoir: nullableText,
  issue: nullableText,
  mots_cles: nullableText,
  extrait_citation: nullableText,
  note_analytique: nullableText,
  source_name: nullableText,
  source_type: nullableText,
  source_country: nullableText,
} satisfies Record<TextColumn, z.ZodNullable<z.ZodString>>;

/**
 * NormalizedRecord Schema - output of the normalizer, input to dedup.
 *
 * `titre` and `lien` are trimmed strings ("" when absent). `domain` is
 * derived from `lien` and never persisted.
 */
export const NormalizedRecordSchema = z.object({
  date_pub: z.date().nullable(),
  titre: z.string(),
  lien: z.string(),
  ...textColumnShape,

  /** host[:port] of `lien`, null when it has none */
  domain: nullableText,
});

export type NormalizedRecord = z.infer<typeof NormalizedRecordSchema>;

/**
 * CorpusRow Schema - a finalized row of the persisted table.
 */
export const CorpusRowSchema = z.object({
  /** Dense 1-based id, assigned after deduplication */
  id: z.number().int().positive(),
  date_pub: z.date().nullable(),
  titre: z.string().min(1, 'titre cannot be empty'),
  lien: z.string(),
  ...textColumnShape,

  /** Extracted article body; only present when enrichment ran */
  fulltext: nullableText.optional(),
});

export type CorpusRow = z.infer<typeof CorpusRowSchema>;

/**
 * A persisted table cell
 */
export type TableCell = string | number | null;
