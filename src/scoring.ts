import type { ScoringMethod } from './config';
import { type Chunk, chunkKey } from './document';
import type { ChunkMatch, MatchSet } from './Matcher';
import type { TermTokenizer } from './TermTokenizer';

/**
 * Collection statistics a scorer may consult.
 * InvertedIndex satisfies this directly.
 */
export interface ScoringContext {
  documentFrequency(term: string): number;
  chunkLength(documentId: string, chunkIndex: number): number;
  getStats(): { chunkCount: number; averageChunkLength: number };
}

export type ChunkScorer = (match: ChunkMatch, context: ScoringContext) => number;

// BM25 parameters
const K1 = 1.2;
const B = 0.75;

/**
 * Number of distinct query terms in the chunk
 */
export const distinctTermScore: ChunkScorer = match => match.terms.size;

/**
 * Total occurrences of query terms in the chunk
 */
export const termFrequencyScore: ChunkScorer = match => {
  let total = 0;
  for (const frequency of match.termFrequencies.values()) {
    total += frequency;
  }
  return total;
};

/**
 * Sum of inverse document frequencies: a rare term outweighs a common one
 */
export const idfScore: ChunkScorer = (match, context) => {
  const { chunkCount } = context.getStats();
  let score = 0;
  for (const term of match.terms) {
    score += calculateIDF(context.documentFrequency(term), chunkCount);
  }
  return score;
};

export const bm25Score: ChunkScorer = (match, context) => {
  const { chunkCount, averageChunkLength } = context.getStats();
  const chunkLength = context.chunkLength(match.documentId, match.chunkIndex);
  let score = 0;
  for (const [term, frequency] of match.termFrequencies) {
    const idf = calculateIDF(context.documentFrequency(term), chunkCount);
    score += calculateBM25Score(
      idf,
      frequency,
      chunkLength,
      averageChunkLength
    );
  }
  return score;
};

const SCORERS: Record<ScoringMethod, ChunkScorer> = {
  distinct: distinctTermScore,
  frequency: termFrequencyScore,
  idf: idfScore,
  bm25: bm25Score,
};

export function getScorer(method: ScoringMethod): ChunkScorer {
  return SCORERS[method];
}

/**
 * Always positive, so every matched term adds to the score
 */
export function calculateIDF(
  documentFrequency: number,
  totalDocuments: number
): number {
  return Math.log(
    (totalDocuments - documentFrequency + 0.5) / (documentFrequency + 0.5) + 1
  );
}

export function calculateBM25Score(
  idf: number,
  termFreq: number,
  docLength: number,
  avgDocLength: number
): number {
  const numerator = termFreq * (K1 + 1);
  const lengthRatio = avgDocLength > 0 ? docLength / avgDocLength : 1;
  const denominator = termFreq + K1 * (1 - B + B * lengthRatio);
  return idf * (numerator / denominator);
}

/**
 * Statistics for chunks that were matched without an index,
 * gathered from the chunks themselves and their matches
 */
export function createTextScoringContext(
  chunks: readonly Chunk[],
  matches: MatchSet,
  tokenizer: TermTokenizer
): ScoringContext {
  const lengths = new Map<string, number>();
  let totalLength = 0;
  for (const chunk of chunks) {
    const length = tokenizer.tokenize(chunk.text).length;
    lengths.set(chunkKey(chunk.documentId, chunk.index), length);
    totalLength += length;
  }

  const documentFrequencies = new Map<string, number>();
  for (const match of matches.values()) {
    for (const term of match.terms) {
      documentFrequencies.set(term, (documentFrequencies.get(term) ?? 0) + 1);
    }
  }

  const stats = {
    chunkCount: chunks.length,
    averageChunkLength: chunks.length > 0 ? totalLength / chunks.length : 0,
  };

  return {
    documentFrequency: term => documentFrequencies.get(term) ?? 0,
    chunkLength: (documentId, chunkIndex) =>
      lengths.get(chunkKey(documentId, chunkIndex)) ?? 0,
    getStats: () => stats,
  };
}
