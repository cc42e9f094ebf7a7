import {
  type AggregationParams,
  aggregateChunkScores,
} from './ChunkAggregation';
import type { Granularity } from './config';
import type { MatchSet, PhraseCounter } from './Matcher';
import type { ChunkScorer, ScoringContext } from './scoring';
import { TopKQueue } from './TopKQueue';

export interface Rankable {
  documentId: string;
  chunkIndex: number;
  score: number;
}

export interface ScoredChunk extends Rankable {
  matchedTerms: string[];
}

export interface RankOptions {
  scorer: ChunkScorer;
  context: ScoringContext;
  granularity?: Granularity;
  aggregation?: AggregationParams;
  phraseBoost?: number;
  phraseCounter?: PhraseCounter | null;
  getChunkText?: (documentId: string, chunkIndex: number) => string | undefined;
}

/**
 * Descending score, then document id, then chunk index.
 * A total order over distinct chunks, so ranking is reproducible.
 */
export function compareRanked(a: Rankable, b: Rankable): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.documentId !== b.documentId) {
    return a.documentId < b.documentId ? -1 : 1;
  }
  return a.chunkIndex - b.chunkIndex;
}

/**
 * The k best candidates, best first.
 * Uses a bounded heap, so candidates are never fully sorted.
 */
export function rank<T extends Rankable>(candidates: Iterable<T>, k: number): T[] {
  const queue = new TopKQueue<T>(Math.max(0, Math.floor(k)), compareRanked);
  for (const candidate of candidates) {
    queue.push(candidate);
  }
  return queue.byRank();
}

/**
 * Scores every matched chunk and selects the top k.
 * With document granularity each document contributes one entry: its
 * best chunk, carrying the aggregated document score.
 */
export function rankMatches(
  matches: MatchSet,
  k: number,
  options: RankOptions
): ScoredChunk[] {
  const scored = scoreMatches(matches, options);

  if ((options.granularity ?? 'chunk') === 'chunk') {
    return rank(scored, k);
  }

  const chunksByDocument = new Map<string, ScoredChunk[]>();
  for (const chunk of scored) {
    const list = chunksByDocument.get(chunk.documentId);
    if (list) {
      list.push(chunk);
    } else {
      chunksByDocument.set(chunk.documentId, [chunk]);
    }
  }

  const documentScores = aggregateChunkScores(
    new Map(
      Array.from(chunksByDocument, ([documentId, chunks]) => [
        documentId,
        chunks.map(c => c.score),
      ])
    ),
    options.aggregation ?? { method: 'max_p' }
  );

  const documents: ScoredChunk[] = [];
  for (const [documentId, chunks] of chunksByDocument) {
    const best = chunks.reduce((a, b) => (compareRanked(a, b) <= 0 ? a : b));
    documents.push({ ...best, score: documentScores.get(documentId) ?? 0 });
  }

  return rank(documents, k);
}

function scoreMatches(matches: MatchSet, options: RankOptions): ScoredChunk[] {
  const { scorer, context, phraseCounter, getChunkText } = options;
  const phraseBoost = options.phraseBoost ?? 0;
  const scored: ScoredChunk[] = [];

  for (const match of matches.values()) {
    let score = scorer(match, context);

    if (phraseBoost > 0 && phraseCounter && getChunkText) {
      const text = getChunkText(match.documentId, match.chunkIndex);
      if (text !== undefined) {
        score += phraseBoost * phraseCounter(text);
      }
    }

    scored.push({
      documentId: match.documentId,
      chunkIndex: match.chunkIndex,
      score,
      matchedTerms: Array.from(match.terms).sort(),
    });
  }

  return scored;
}
