import stopWordList from './stopwords.json';

/**
 * Tokenizer for indexing and matching
 * Terms are lower-cased runs of Unicode letters and digits; everything else
 * (punctuation, symbols, whitespace) is a boundary.
 */

export interface TermSpan {
  term: string;
  start: number; // Offset of the first character in the source text
  end: number; // Offset just past the last character
}

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;
const WORD_CHAR_PATTERN = /[\p{L}\p{N}]/u;

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

export function isWordChar(char: string): boolean {
  return WORD_CHAR_PATTERN.test(char);
}

/**
 * Whether the code point starting at index is a word character
 */
export function isWordCharAt(text: string, index: number): boolean {
  const codePoint = text.codePointAt(index);
  return codePoint !== undefined && isWordChar(String.fromCodePoint(codePoint));
}

/**
 * Whether the code point ending just before index is a word character.
 * Steps over both halves of a surrogate pair.
 */
export function isWordCharBefore(text: string, index: number): boolean {
  if (index <= 0) {
    return false;
  }
  let start = index - 1;
  if (
    start > 0 &&
    isLowSurrogate(text, start) &&
    isHighSurrogate(text, start - 1)
  ) {
    start--;
  }
  return isWordCharAt(text, start);
}

function isHighSurrogate(text: string, index: number): boolean {
  const unit = text.charCodeAt(index);
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(text: string, index: number): boolean {
  const unit = text.charCodeAt(index);
  return unit >= 0xdc00 && unit <= 0xdfff;
}

export class TermTokenizer {
  constructor(
    private readonly stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS
  ) {}

  /**
   * Every word token with its offsets, stop words included.
   * Used for chunk sizing, where stop words still take up room.
   */
  spans(text: string): TermSpan[] {
    const spans: TermSpan[] = [];
    for (const match of text.matchAll(WORD_PATTERN)) {
      const start = match.index ?? 0;
      spans.push({
        term: match[0].toLowerCase(),
        start,
        end: start + match[0].length,
      });
    }
    return spans;
  }

  countWords(text: string): number {
    return text.match(WORD_PATTERN)?.length ?? 0;
  }

  /**
   * Index/query terms in text order, duplicates kept, stop words dropped
   */
  tokenize(text: string): string[] {
    const terms: string[] = [];
    for (const match of text.matchAll(WORD_PATTERN)) {
      const term = match[0].toLowerCase();
      if (!this.stopWords.has(term)) {
        terms.push(term);
      }
    }
    return terms;
  }

  /**
   * Distinct terms in order of first occurrence
   */
  uniqueTerms(text: string): string[] {
    return Array.from(new Set(this.tokenize(text)));
  }

  isStopWord(term: string): boolean {
    return this.stopWords.has(term);
  }

  /**
   * Calculates term frequency in a document
   */
  calculateTermFrequency(tokens: string[]): Map<string, number> {
    const tf = new Map<string, number>();
    for (const token of tokens) {
      tf.set(token, (tf.get(token) || 0) + 1);
    }
    return tf;
  }
}

/**
 * Cache-key form of a query: its terms, space-joined
 */
export function normalizeQuery(tokenizer: TermTokenizer, query: string): string {
  return tokenizer.tokenize(query).join(' ');
}

/**
 * Every word of the text, stop words included, space-joined.
 * The form exact phrases are compared in.
 */
export function phraseForm(tokenizer: TermTokenizer, text: string): string {
  return tokenizer
    .spans(text)
    .map(span => span.term)
    .join(' ');
}
