import { AhoCorasick } from './AhoCorasick';
import { type Chunk, type ChunkKey, chunkKey } from './document';
import type { InvertedIndex } from './InvertedIndex';
import {
  TermTokenizer,
  isWordCharAt,
  isWordCharBefore,
  phraseForm,
} from './TermTokenizer';

/**
 * Query terms found in one chunk
 */
export interface ChunkMatch {
  documentId: string;
  chunkIndex: number;
  terms: Set<string>;
  termFrequencies: Map<string, number>;
}

export type MatchSet = Map<ChunkKey, ChunkMatch>;

export type PhraseCounter = (text: string) => number;

export class Matcher {
  constructor(private readonly tokenizer: TermTokenizer = new TermTokenizer()) {}

  /**
   * Distinct query terms in order of first occurrence.
   * Empty when the query holds only stop words or no word characters.
   */
  queryTerms(query: string): string[] {
    return this.tokenizer.uniqueTerms(query);
  }

  /**
   * Looks up each query term's posting list and groups the hits by chunk
   */
  match(index: InvertedIndex, query: string): MatchSet {
    const matches: MatchSet = new Map();

    for (const term of this.queryTerms(query)) {
      for (const posting of index.getPostings(term)) {
        const entry = getOrCreate(
          matches,
          posting.documentId,
          posting.chunkIndex
        );
        entry.terms.add(term);
        entry.termFrequencies.set(term, posting.termFrequency);
      }
    }

    return matches;
  }

  /**
   * Adds query terms found in file names to the matches, as hits in each
   * such document's first chunk. Terms the chunk already matched keep their
   * body frequency.
   */
  matchTitles(
    index: InvertedIndex,
    query: string,
    matches: MatchSet
  ): MatchSet {
    for (const term of this.queryTerms(query)) {
      for (const posting of index.getTitlePostings(term)) {
        const entry = getOrCreate(
          matches,
          posting.documentId,
          posting.chunkIndex
        );
        if (!entry.terms.has(term)) {
          entry.terms.add(term);
          entry.termFrequencies.set(term, posting.termFrequency);
        }
      }
    }
    return matches;
  }

  /**
   * Same result shape as match(), for text that has no index.
   * One automaton is built from the query terms and each chunk is scanned
   * once; hits must sit on word boundaries to count as a term.
   */
  matchText(chunks: readonly Chunk[], query: string): MatchSet {
    const matches: MatchSet = new Map();
    const automaton = new AhoCorasick(this.queryTerms(query));
    if (automaton.size === 0) {
      return matches;
    }

    for (const chunk of chunks) {
      const text = chunk.text.toLowerCase();
      for (const hit of automaton.findAll(text)) {
        if (!isWholeWord(text, hit.start, hit.end)) {
          continue;
        }
        const entry = getOrCreate(matches, chunk.documentId, chunk.index);
        entry.terms.add(hit.pattern);
        entry.termFrequencies.set(
          hit.pattern,
          (entry.termFrequencies.get(hit.pattern) ?? 0) + 1
        );
      }
    }

    return matches;
  }

  /**
   * Builds a counter of exact phrase occurrences for the query.
   * Quoted segments are the phrases when present; otherwise the whole query
   * is one phrase. Returns null when there is no phrase of two or more words.
   */
  createPhraseCounter(query: string): PhraseCounter | null {
    const phrases = extractPhrases(query)
      .map(phrase => this.normalize(phrase))
      .filter(phrase => phrase.includes(' '));
    if (phrases.length === 0) {
      return null;
    }

    const automaton = new AhoCorasick(phrases);
    return text => {
      const normalized = this.normalize(text);
      return automaton
        .findAll(normalized)
        .filter(hit => isWholeWord(normalized, hit.start, hit.end)).length;
    };
  }

  private normalize(text: string): string {
    return phraseForm(this.tokenizer, text);
  }
}

export function extractPhrases(query: string): string[] {
  const quoted = Array.from(query.matchAll(/"([^"]+)"/g), m => m[1]);
  return quoted.length > 0 ? quoted : [query];
}

function isWholeWord(text: string, start: number, end: number): boolean {
  const before = !isWordCharBefore(text, start);
  const after = end >= text.length || !isWordCharAt(text, end);
  return before && after;
}

function getOrCreate(
  matches: MatchSet,
  documentId: string,
  chunkIndex: number
): ChunkMatch {
  const key = chunkKey(documentId, chunkIndex);
  let entry = matches.get(key);
  if (!entry) {
    entry = {
      documentId,
      chunkIndex,
      terms: new Set(),
      termFrequencies: new Map(),
    };
    matches.set(key, entry);
  }
  return entry;
}
