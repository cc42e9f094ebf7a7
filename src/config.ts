import { z } from 'zod';
import type { AggregationMethod } from './ChunkAggregation';

export type LogLevel = 'error' | 'warn' | 'log' | 'verbose';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  log: 2,
  verbose: 3,
};

export const CATEGORIES = [
  'invoices',
  'contracts',
  'support',
  'knowledge',
] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * Directory below the corpus root holding each category's documents
 */
export const CATEGORY_DIRECTORIES: Record<Category, string> = {
  invoices: 'invoices',
  contracts: 'employment-contracts',
  support: 'customer-support',
  knowledge: 'knowledge-base',
};

/**
 * Resolves user input such as "Contracts" or "customer-support" to a category.
 * Returns undefined for anything outside the closed set.
 */
export function parseCategory(input: string): Category | undefined {
  const normalized = input.trim().toLowerCase();
  for (const category of CATEGORIES) {
    if (
      normalized === category ||
      normalized === CATEGORY_DIRECTORIES[category]
    ) {
      return category;
    }
  }
  return undefined;
}

export const categorySchema = z
  .string()
  .transform((value, ctx): Category => {
    const category = parseCategory(value);
    if (!category) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown category "${value}" (expected one of ${CATEGORIES.join(', ')})`,
      });
      return z.NEVER;
    }
    return category;
  });

export type ScoringMethod = 'distinct' | 'frequency' | 'idf' | 'bm25';
export type Granularity = 'chunk' | 'document';

export interface DocsiftSettings {
  // Corpus configuration
  // ====================
  corpusRoot: string; // Directory holding one sub-directory per category
  fileExtensions: string[]; // Extensions loaded from category directories

  // Chunking configuration
  // ======================
  maxChunkTokens: number; // Maximum word tokens per chunk
  chunkOverlap: number; // Overlapping tokens between windows of a long paragraph

  // Retrieval parameters
  // ====================
  defaultTopK: number; // Results returned when a request gives no k
  defaultCategory: Category; // Category used when a request gives none
  scoring: ScoringMethod; // Chunk scoring function
  granularity: Granularity; // Rank chunks, or documents by aggregated chunk scores
  aggMethod: AggregationMethod; // Chunk-to-document aggregation (document granularity)
  aggM: number; // Number of top chunks for top_m_sum/top_m_avg
  aggL: number; // Number of top chunks for weighted_top_l_sum
  aggDecay: number; // Decay factor for weighted_top_l_sum
  aggRrfK: number; // RRF k parameter for rrf_per_doc
  phraseBoost: number; // Added per exact occurrence of the whole query phrase (0 = off)
  titleTerms: boolean; // Query terms found in a file name count as matches in its first chunk

  // Cache configuration
  // ===================
  maxCacheEntries: number; // Memoized responses kept per cache (0 = unbounded)

  // Logging configuration
  // =====================
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: DocsiftSettings = {
  // Corpus configuration
  // ====================
  corpusRoot: 'data',
  fileExtensions: ['.txt', '.md'],

  // Chunking configuration
  // ======================
  maxChunkTokens: 500,
  chunkOverlap: 50,

  // Retrieval parameters
  // ====================
  defaultTopK: 5,
  defaultCategory: 'invoices',
  scoring: 'distinct',
  granularity: 'chunk',
  aggMethod: 'max_p',
  aggM: 3,
  aggL: 3,
  aggDecay: 0.95,
  aggRrfK: 60,
  phraseBoost: 0,
  titleTerms: true,

  // Cache configuration
  // ===================
  maxCacheEntries: 1000,

  // Logging configuration
  // =====================
  logLevel: 'error',
};

export const settingsSchema = z
  .object({
    corpusRoot: z.string().min(1),
    fileExtensions: z.array(z.string().regex(/^\.[^./\\]+$/)).min(1),
    maxChunkTokens: z.number().int().min(2),
    chunkOverlap: z.number().int().min(0),
    defaultTopK: z.number().int().min(0),
    defaultCategory: z.enum(CATEGORIES),
    scoring: z.enum(['distinct', 'frequency', 'idf', 'bm25']),
    granularity: z.enum(['chunk', 'document']),
    aggMethod: z.enum([
      'max_p',
      'top_m_sum',
      'top_m_avg',
      'rrf_per_doc',
      'weighted_top_l_sum',
    ]),
    aggM: z.number().int().min(1),
    aggL: z.number().int().min(1),
    aggDecay: z.number().gt(0).max(1),
    aggRrfK: z.number().min(0),
    phraseBoost: z.number().min(0),
    titleTerms: z.boolean(),
    maxCacheEntries: z.number().int().min(0),
    logLevel: z.enum(['error', 'warn', 'log', 'verbose']),
  })
  .refine(s => s.chunkOverlap * 2 < s.maxChunkTokens, {
    message: 'chunkOverlap must be less than half of maxChunkTokens',
    path: ['chunkOverlap'],
  });
