import { z } from 'zod';
import type { DocumentInput, Fragment } from '../types/fragment.js';
import type { TableStitcherConfig } from '../types/config.js';
import { createDebugLogger } from '../utils/debug.js';

const debug = createDebugLogger('ingest');

const cellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((v) => (v === null ? '' : String(v)));

export const fragmentSchema = z.object({
  data: z.array(z.array(cellSchema)),
  page: z.number().int().min(1).default(1),
  table_index: z.number().int().default(0),
  source: z.string().default('unknown')
});

export const scoreDomainSchema = z
  .object({
    name: z.string().min(1),
    min_score: z.number().finite(),
    max_score: z.number().finite(),
    description: z.string().default('')
  })
  .refine((d) => d.min_score <= d.max_score, {
    message: 'min_score must not exceed max_score'
  });

export const strategyChoiceSchema = z.enum(['auto', 'score_domain', 'header_repetition']);

export const tableStitcherConfigSchema = z
  .object({
    mode: z.enum(['hybrid', 'page_only', 'logical_only']).default('hybrid'),
    strategy: strategyChoiceSchema.default('auto'),
    scoreDomains: z.array(scoreDomainSchema).optional(),
    validationEnabled: z.boolean().default(true),
    validationTolerance: z.number().nonnegative().default(0.01),
    minProfileConfidence: z.number().min(0).max(1).default(0.5),
    thresholds: z
      .object({
        numericRatio: z.number().min(0).max(1),
        domainGap: z.number().nonnegative(),
        minHeaderRepeats: z.number().int().min(2),
        distributionKeywordMin: z.number().int().min(1)
      })
      .partial()
      .strict()
      .optional()
  })
  .strict();

/**
 * Validates raw fragments handed over by an ingestion layer. Entries that
 * do not fit the fragment shape, or that carry no rows, are dropped.
 */
export function parseFragments(input: unknown): Fragment[] {
  const list = z.array(z.unknown()).safeParse(input);
  if (!list.success) {
    debug('fragment input is not a list; nothing to ingest');
    return [];
  }

  const out: Fragment[] = [];
  list.data.forEach((raw, i) => {
    const parsed = fragmentSchema.safeParse(raw);
    if (!parsed.success) {
      debug('skipping malformed fragment', i, parsed.error.issues.map((issue) => issue.message));
      return;
    }
    if (parsed.data.data.length === 0) {
      debug('skipping empty fragment', i);
      return;
    }
    out.push(parsed.data);
  });
  return out;
}

/** Non-string entries become '' so page positions stay aligned. */
export function parsePageTexts(input: unknown): string[] {
  const list = z.array(z.unknown()).safeParse(input);
  if (!list.success) return [];
  return list.data.map((v) => (typeof v === 'string' ? v : ''));
}

/** Parses a configuration object read from JSON; throws a ZodError when it is invalid. */
export function parseTableStitcherConfig(input: unknown): TableStitcherConfig {
  return tableStitcherConfigSchema.parse(input);
}

export const extractionContextSchema = z.record(z.string(), z.unknown());

/** Whole-document payload as an ingestion layer would post it. */
export function parseDocumentInput(input: unknown): DocumentInput {
  const shape = z
    .object({
      fragments: z.unknown(),
      pageTexts: z.unknown().optional(),
      context: extractionContextSchema.optional()
    })
    .safeParse(input);

  if (!shape.success) {
    debug('document input is not an object; treating it as empty');
    return { fragments: [], pageTexts: [], context: {} };
  }

  return {
    fragments: parseFragments(shape.data.fragments),
    pageTexts: parsePageTexts(shape.data.pageTexts),
    context: shape.data.context ?? {}
  };
}
