/**
 * Chunk aggregation methods for document-level scoring.
 *
 * Used when results are ranked per document rather than per chunk: every
 * matched chunk's score is folded into one score for its document.
 */

export type AggregationMethod =
  | 'max_p'
  | 'top_m_sum'
  | 'top_m_avg'
  | 'rrf_per_doc'
  | 'weighted_top_l_sum';

export interface AggregationParams {
  method: AggregationMethod;
  m?: number; // For top_m_sum and top_m_avg (default: 3)
  l?: number; // For weighted_top_l_sum (default: 3)
  decay?: number; // For weighted_top_l_sum (default: 0.95)
  rrfK?: number; // For rrf_per_doc (default: 60)
}

type Aggregator = (scoresDescending: number[], params: AggregationParams) => number;

function sum(scores: number[]): number {
  return scores.reduce((total, score) => total + score, 0);
}

const AGGREGATORS: Record<AggregationMethod, Aggregator> = {
  // Strongest chunk only; suits keyword matching
  max_p: scores => scores[0],

  top_m_sum: (scores, { m = 3 }) => sum(scores.slice(0, m)),

  top_m_avg: (scores, { m = 3 }) => {
    const top = scores.slice(0, m);
    return top.length > 0 ? sum(top) / top.length : 0;
  },

  // Depends only on how many chunks matched, not on their scores
  rrf_per_doc: (scores, { rrfK = 60 }) => {
    let total = 0;
    for (let rank = 1; rank <= scores.length; rank++) {
      total += 1 / (rrfK + rank);
    }
    return total;
  },

  // w_0 * score[0] + w_1 * score[1] + ... where w_i = decay^i
  weighted_top_l_sum: (scores, { l = 3, decay = 0.95 }) => {
    let weight = 1;
    let total = 0;
    for (let i = 0; i < Math.min(l, scores.length); i++) {
      total += weight * scores[i];
      weight *= decay;
    }
    return total;
  },
};

/**
 * Aggregate chunk scores to document level.
 * Documents with no chunk scores are left out.
 */
export function aggregateChunkScores(
  scoresByDocument: Map<string, number[]>,
  params: AggregationParams
): Map<string, number> {
  const aggregate = AGGREGATORS[params.method];
  const aggregated = new Map<string, number>();

  for (const [documentId, scores] of scoresByDocument) {
    if (scores.length === 0) {
      continue;
    }
    const descending = [...scores].sort((a, b) => b - a);
    aggregated.set(documentId, aggregate(descending, params));
  }

  return aggregated;
}
