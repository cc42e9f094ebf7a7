import { describe, it, expect } from 'vitest';
import type { Chunk } from './document';
import { InvertedIndex, buildInvertedIndex, titleOf } from './InvertedIndex';

function makeChunk(documentId: string, index: number, text: string): Chunk {
  return {
    documentId,
    category: 'invoices',
    index,
    text,
    startOffset: 0,
    endOffset: text.length,
    tokenCount: text.split(/\s+/).length,
    headings: [],
  };
}

const chunks = [
  makeChunk('invoice_1.txt', 0, 'Invoice total due: 450 due Friday'),
  makeChunk('invoice_1.txt', 1, 'Payment terms net 30'),
  makeChunk('invoice_2.txt', 0, 'Invoice paid in full'),
];

function postingSet(index: InvertedIndex): Set<string> {
  const entries = new Set<string>();
  for (const term of index.terms()) {
    for (const p of index.getPostings(term)) {
      entries.add(`${term}|${p.documentId}|${p.chunkIndex}|${p.termFrequency}`);
    }
  }
  return entries;
}

describe('InvertedIndex', () => {
  it('maps each term to the chunks containing it', () => {
    const index = InvertedIndex.build(chunks);

    expect(index.getPostings('invoice')).toEqual([
      { documentId: 'invoice_1.txt', chunkIndex: 0, termFrequency: 1 },
      { documentId: 'invoice_2.txt', chunkIndex: 0, termFrequency: 1 },
    ]);
    expect(index.getPostings('due')).toEqual([
      { documentId: 'invoice_1.txt', chunkIndex: 0, termFrequency: 2 },
    ]);
    expect(index.documentFrequency('invoice')).toBe(2);
  });

  it('does not index stop words', () => {
    const index = InvertedIndex.build(chunks);
    expect(index.hasTerm('in')).toBe(false);
    expect(index.getPostings('in')).toEqual([]);
  });

  it('never holds an empty posting list', () => {
    const index = InvertedIndex.build(chunks);
    for (const term of index.terms()) {
      expect(index.getPostings(term).length).toBeGreaterThan(0);
    }
  });

  it('lists each chunk at most once per term', () => {
    const index = InvertedIndex.build([...chunks, chunks[0]]);
    expect(index.getPostings('invoice')).toHaveLength(2);
    expect(index.getStats().chunkCount).toBe(3);
  });

  it('is idempotent', () => {
    expect(postingSet(buildInvertedIndex(chunks))).toEqual(
      postingSet(buildInvertedIndex([...chunks].reverse()))
    );
  });

  it('reports collection statistics', () => {
    const index = InvertedIndex.build(chunks);
    // 6 + 4 + 3 terms ("in" dropped)
    expect(index.getStats()).toEqual({
      chunkCount: 3,
      documentCount: 2,
      termCount: 11,
      averageChunkLength: 13 / 3,
    });
    expect(index.chunkLength('invoice_1.txt', 0)).toBe(6);
    expect(index.chunkLength('missing.txt', 0)).toBe(0);
  });

  it('returns indexed chunks by document and position', () => {
    const index = InvertedIndex.build(chunks);
    expect(index.getChunk('invoice_1.txt', 1)?.text).toBe(
      'Payment terms net 30'
    );
    expect(index.getChunk('invoice_1.txt', 5)).toBeUndefined();
    expect(index.allChunks()).toHaveLength(3);
  });

  it('indexes file-name terms against the first chunk of each document', () => {
    const index = InvertedIndex.build(chunks);
    expect(index.getTitlePostings('invoice')).toEqual([
      { documentId: 'invoice_1.txt', chunkIndex: 0, termFrequency: 1 },
      { documentId: 'invoice_2.txt', chunkIndex: 0, termFrequency: 1 },
    ]);
    expect(index.getTitlePostings('2')).toEqual([
      { documentId: 'invoice_2.txt', chunkIndex: 0, termFrequency: 1 },
    ]);
    expect(index.getTitlePostings('txt')).toEqual([]);
    expect(index.getPostings('2')).toEqual([]);
  });

  it('derives titles from file names without directories or extension', () => {
    expect(titleOf('2024/invoice_7.txt')).toBe('invoice_7');
    expect(titleOf('notes.md')).toBe('notes');
    expect(titleOf('.hidden')).toBe('.hidden');
  });

  it('builds an empty index from no chunks', () => {
    expect(InvertedIndex.build([]).getStats()).toEqual({
      chunkCount: 0,
      documentCount: 0,
      termCount: 0,
      averageChunkLength: 0,
    });
  });
});
