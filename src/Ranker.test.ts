import { describe, it, expect } from 'vitest';
import { chunkKey } from './document';
import type { ChunkMatch, MatchSet } from './Matcher';
import { compareRanked, rank, rankMatches } from './Ranker';
import { type ScoringContext, distinctTermScore } from './scoring';

function matchSet(entries: Array<[string, number, string[]]>): MatchSet {
  const matches: MatchSet = new Map();
  for (const [documentId, chunkIndex, terms] of entries) {
    const match: ChunkMatch = {
      documentId,
      chunkIndex,
      terms: new Set(terms),
      termFrequencies: new Map(terms.map(t => [t, 1])),
    };
    matches.set(chunkKey(documentId, chunkIndex), match);
  }
  return matches;
}

const context: ScoringContext = {
  documentFrequency: () => 1,
  chunkLength: () => 10,
  getStats: () => ({ chunkCount: 10, averageChunkLength: 10 }),
};

const matches = matchSet([
  ['a.txt', 0, ['x']],
  ['a.txt', 1, ['x', 'y']],
  ['b.txt', 0, ['x', 'y', 'z']],
]);

describe('rank', () => {
  const candidates = [
    { documentId: 'c.txt', chunkIndex: 0, score: 1 },
    { documentId: 'b.txt', chunkIndex: 2, score: 3 },
    { documentId: 'a.txt', chunkIndex: 1, score: 2 },
    { documentId: 'b.txt', chunkIndex: 1, score: 3 },
    { documentId: 'a.txt', chunkIndex: 0, score: 3 },
  ];

  it('returns the top k, best first, ties by document then chunk', () => {
    expect(rank(candidates, 3)).toEqual([
      { documentId: 'a.txt', chunkIndex: 0, score: 3 },
      { documentId: 'b.txt', chunkIndex: 1, score: 3 },
      { documentId: 'b.txt', chunkIndex: 2, score: 3 },
    ]);
  });

  it('returns nothing for k = 0 and everything for k >= n', () => {
    expect(rank(candidates, 0)).toEqual([]);
    expect(rank(candidates, 50)).toHaveLength(5);
    expect(rank([], 5)).toEqual([]);
  });

  it('omits no candidate that outscores a returned one', () => {
    const top = rank(candidates, 2);
    const lowest = top[top.length - 1];
    const omitted = candidates.filter(c => !top.includes(c));
    for (const candidate of omitted) {
      expect(compareRanked(candidate, lowest)).toBeGreaterThan(0);
    }
  });
});

describe('rankMatches', () => {
  it('ranks chunks by score with sorted matched terms', () => {
    expect(
      rankMatches(matches, 2, { scorer: distinctTermScore, context })
    ).toEqual([
      {
        documentId: 'b.txt',
        chunkIndex: 0,
        score: 3,
        matchedTerms: ['x', 'y', 'z'],
      },
      {
        documentId: 'a.txt',
        chunkIndex: 1,
        score: 2,
        matchedTerms: ['x', 'y'],
      },
    ]);
  });

  it('ranks documents by their best chunk with max_p', () => {
    const ranked = rankMatches(matches, 5, {
      scorer: distinctTermScore,
      context,
      granularity: 'document',
      aggregation: { method: 'max_p' },
    });
    expect(ranked.map(r => [r.documentId, r.chunkIndex, r.score])).toEqual([
      ['b.txt', 0, 3],
      ['a.txt', 1, 2],
    ]);
  });

  it('uses the aggregated score for documents', () => {
    const ranked = rankMatches(matches, 5, {
      scorer: distinctTermScore,
      context,
      granularity: 'document',
      aggregation: { method: 'top_m_sum', m: 3 },
    });
    expect(ranked.map(r => [r.documentId, r.chunkIndex, r.score])).toEqual([
      ['a.txt', 1, 3],
      ['b.txt', 0, 3],
    ]);
  });

  it('adds the phrase boost per occurrence', () => {
    const texts: Record<string, string> = {
      'a.txt#0': 'x y x y',
      'a.txt#1': 'y x',
      'b.txt#0': 'z',
    };
    const ranked = rankMatches(matches, 3, {
      scorer: distinctTermScore,
      context,
      phraseBoost: 1.5,
      phraseCounter: text => text.split('x y').length - 1,
      getChunkText: (documentId, chunkIndex) =>
        texts[chunkKey(documentId, chunkIndex)],
    });
    expect(ranked.map(r => [r.documentId, r.chunkIndex, r.score])).toEqual([
      ['a.txt', 0, 4],
      ['b.txt', 0, 3],
      ['a.txt', 1, 2],
    ]);
  });
});
