/**
 * Document and chunk shapes shared by the store, chunker, index and ranker
 */

import type { Category } from './config';

/**
 * A corpus file, loaded once and immutable afterwards
 */
export interface Document {
  id: string; // Path relative to the category directory, '/'-separated
  category: Category;
  path: string; // Absolute path on disk
  content: string;
  size: number; // Bytes on disk
  loadedAt: number;
}

/**
 * A contiguous slice of a document's text.
 * `text` always equals `content.slice(startOffset, endOffset)` of the parent.
 */
export interface Chunk {
  documentId: string;
  category: Category;
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  tokenCount: number;
  headings: string[];
}

export type ChunkKey = string;

export function chunkKey(documentId: string, chunkIndex: number): ChunkKey {
  return `${documentId}#${chunkIndex}`;
}

/**
 * Final retrieval result handed to the caller
 */
export interface RetrievedChunk {
  documentId: string;
  category: Category;
  chunkIndex: number;
  chunkText: string;
  score: number;
  matchedTerms: string[];
  startOffset: number;
  endOffset: number;
  headings: string[];
}
