import { describe, it, expect } from 'vitest';
import { createChunks } from './chunker';
import type { Chunk } from './document';

function chunk(content: string, maxChunkTokens: number, chunkOverlap: number) {
  return createChunks(
    { id: 'doc.txt', category: 'knowledge', content },
    { maxChunkTokens, chunkOverlap }
  );
}

/**
 * Helper: Assert chunks cover the content without gaps
 */
function assertCoversContent(chunks: Chunk[], content: string): void {
  expect(chunks[0].startOffset).toBe(0);
  expect(chunks[chunks.length - 1].endOffset).toBe(content.length);
  chunks.forEach((c, i) => {
    expect(c.index).toBe(i);
    expect(c.text).toBe(content.slice(c.startOffset, c.endOffset));
    if (i > 0) {
      expect(c.startOffset).toBeLessThanOrEqual(chunks[i - 1].endOffset);
      expect(c.startOffset).toBeGreaterThan(chunks[i - 1].startOffset);
    }
  });
}

describe('createChunks', () => {
  describe('paragraph packing', () => {
    it('keeps a short document in one chunk', () => {
      const content = 'Hello world.\n\nSecond paragraph here.';
      const chunks = chunk(content, 500, 50);

      expect(chunks).toHaveLength(1);
      expect(chunks[0]).toEqual({
        documentId: 'doc.txt',
        category: 'knowledge',
        index: 0,
        text: content,
        startOffset: 0,
        endOffset: content.length,
        tokenCount: 5,
        headings: [],
      });
    });

    it('starts a new chunk when the next paragraph does not fit', () => {
      const content = 'one two three\n\nfour five\n\nsix';
      const chunks = chunk(content, 4, 1);

      expect(chunks.map(c => c.text)).toEqual([
        'one two three\n\n',
        'four five\n\nsix',
      ]);
      expect(chunks.map(c => c.tokenCount)).toEqual([3, 3]);
      expect(chunks.map(c => c.text).join('')).toBe(content);
    });

    it('tracks markdown headings as context', () => {
      const content =
        '# Title\n\nIntro text.\n\n## Section A\n\nBody a.\n\n## Section B\n\nBody b.';
      const chunks = chunk(content, 3, 0);

      expect(chunks.map(c => c.text)).toEqual([
        '# Title\n\nIntro text.\n\n',
        '## Section A\n\n',
        'Body a.\n\n',
        '## Section B\n\n',
        'Body b.',
      ]);
      expect(chunks.map(c => c.headings)).toEqual([
        ['Title'],
        ['Title', 'Section A'],
        ['Title', 'Section A'],
        ['Title', 'Section B'],
        ['Title', 'Section B'],
      ]);
      assertCoversContent(chunks, content);
    });
  });

  describe('long paragraphs', () => {
    it('splits into overlapping windows', () => {
      const content = 'w0 w1 w2 w3 w4 w5 w6 w7 w8 w9';
      const chunks = chunk(content, 4, 1);

      expect(chunks.map(c => c.text)).toEqual([
        'w0 w1 w2 w3 ',
        'w3 w4 w5 w6 ',
        'w6 w7 w8 w9',
      ]);
      expect(chunks.map(c => c.tokenCount)).toEqual([4, 4, 4]);
      assertCoversContent(chunks, content);
    });

    it('ends a window on a sentence boundary in its second half', () => {
      const content = 'a1 a2 a3. a4 a5 a6 a7 a8';
      const chunks = chunk(content, 4, 0);

      expect(chunks.map(c => c.text)).toEqual([
        'a1 a2 a3. ',
        'a4 a5 a6 a7 ',
        'a8',
      ]);
      expect(chunks.map(c => c.text).join('')).toBe(content);
    });

    it('never exceeds maxChunkTokens', () => {
      const words = Array.from({ length: 57 }, (_, i) => `word${i}`);
      const content = `Intro line.\n\n${words.join(' ')}\n\nOutro line.`;
      const chunks = chunk(content, 10, 3);

      for (const c of chunks) {
        expect(c.tokenCount).toBeLessThanOrEqual(10);
      }
      assertCoversContent(chunks, content);
    });
  });

  describe('edge cases', () => {
    it('returns no chunks for empty or whitespace-only content', () => {
      expect(chunk('', 500, 50)).toEqual([]);
      expect(chunk('  \n\n \t', 500, 50)).toEqual([]);
    });

    it('rejects an overlap of half the window or more', () => {
      expect(() => chunk('text', 4, 2)).toThrow(/chunkOverlap/);
    });
  });
});
