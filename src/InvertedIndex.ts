import { type Chunk, type ChunkKey, chunkKey } from './document';
import { TermTokenizer } from './TermTokenizer';

/**
 * Posting list entry for inverted index
 */
export interface Posting {
  documentId: string;
  chunkIndex: number;
  termFrequency: number;
}

interface IndexedChunk {
  chunk: Chunk;
  length: number; // Number of terms in chunk, stop words excluded
}

export interface IndexStats {
  chunkCount: number;
  documentCount: number;
  termCount: number;
  averageChunkLength: number;
}

const NO_POSTINGS: readonly Posting[] = Object.freeze([]);

/**
 * Inverted index: term -> chunks containing it.
 *
 * Built in one pass and never mutated afterwards; a reload builds a new
 * instance. Every term present has at least one posting and each
 * (document, chunk) pair appears at most once per term.
 */
export class InvertedIndex {
  private constructor(
    private readonly postings: ReadonlyMap<string, readonly Posting[]>,
    private readonly titlePostings: ReadonlyMap<string, readonly Posting[]>,
    private readonly chunks: ReadonlyMap<ChunkKey, IndexedChunk>,
    private readonly stats: IndexStats
  ) {}

  static build(
    chunks: readonly Chunk[],
    tokenizer: TermTokenizer = new TermTokenizer()
  ): InvertedIndex {
    const postings = new Map<string, Posting[]>();
    const indexed = new Map<ChunkKey, IndexedChunk>();
    const firstChunks = new Map<string, number>();
    let totalLength = 0;

    for (const chunk of chunks) {
      const key = chunkKey(chunk.documentId, chunk.index);
      if (indexed.has(key)) {
        continue;
      }

      const tokens = tokenizer.tokenize(chunk.text);
      const termFreq = tokenizer.calculateTermFrequency(tokens);

      for (const [term, frequency] of termFreq) {
        const posting: Posting = {
          documentId: chunk.documentId,
          chunkIndex: chunk.index,
          termFrequency: frequency,
        };
        const list = postings.get(term);
        if (list) {
          list.push(posting);
        } else {
          postings.set(term, [posting]);
        }
      }

      indexed.set(key, { chunk, length: tokens.length });
      const first = firstChunks.get(chunk.documentId);
      if (first === undefined || chunk.index < first) {
        firstChunks.set(chunk.documentId, chunk.index);
      }
      totalLength += tokens.length;
    }

    // File name terms, attached to each document's first chunk
    const titlePostings = new Map<string, Posting[]>();
    for (const [documentId, chunkIndex] of firstChunks) {
      for (const term of tokenizer.uniqueTerms(titleOf(documentId))) {
        const posting: Posting = { documentId, chunkIndex, termFrequency: 1 };
        const list = titlePostings.get(term);
        if (list) {
          list.push(posting);
        } else {
          titlePostings.set(term, [posting]);
        }
      }
    }

    return new InvertedIndex(postings, titlePostings, indexed, {
      chunkCount: indexed.size,
      documentCount: firstChunks.size,
      termCount: postings.size,
      averageChunkLength: indexed.size > 0 ? totalLength / indexed.size : 0,
    });
  }

  getPostings(term: string): readonly Posting[] {
    return this.postings.get(term) ?? NO_POSTINGS;
  }

  /**
   * Documents whose file name contains the term
   */
  getTitlePostings(term: string): readonly Posting[] {
    return this.titlePostings.get(term) ?? NO_POSTINGS;
  }

  hasTerm(term: string): boolean {
    return this.postings.has(term);
  }

  /**
   * Number of chunks containing the term
   */
  documentFrequency(term: string): number {
    return this.getPostings(term).length;
  }

  terms(): IterableIterator<string> {
    return this.postings.keys();
  }

  getChunk(documentId: string, chunkIndex: number): Chunk | undefined {
    return this.chunks.get(chunkKey(documentId, chunkIndex))?.chunk;
  }

  chunkLength(documentId: string, chunkIndex: number): number {
    return this.chunks.get(chunkKey(documentId, chunkIndex))?.length ?? 0;
  }

  allChunks(): Chunk[] {
    return Array.from(this.chunks.values(), entry => entry.chunk);
  }

  getStats(): IndexStats {
    return { ...this.stats };
  }
}

/**
 * File name without directories or extension: "2024/invoice_7.txt" -> "invoice_7"
 */
export function titleOf(documentId: string): string {
  const name = documentId.slice(documentId.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

export function buildInvertedIndex(
  chunks: readonly Chunk[],
  tokenizer?: TermTokenizer
): InvertedIndex {
  return InvertedIndex.build(chunks, tokenizer);
}
