import type { Chunk, Document } from './document';
import { type TermSpan, TermTokenizer } from './TermTokenizer';

export interface ChunkOptions {
  maxChunkTokens: number;
  chunkOverlap: number;
  tokenizer?: TermTokenizer;
}

interface Paragraph {
  start: number;
  end: number; // Start of the next paragraph, so separators stay attached
  words: TermSpan[];
  heading?: { level: number; text: string };
}

interface ChunkSpan {
  start: number;
  end: number;
  tokenCount: number;
  headings: string[];
}

const PARAGRAPH_SEPARATOR = /\n\s*\n/g;
const SENTENCE_END = /[.!?。！？]/;

/**
 * Splits a document into chunks.
 *
 * Paragraphs (blank-line separated) are packed together while they fit in
 * maxChunkTokens. A paragraph larger than that is cut into windows that
 * overlap by chunkOverlap tokens, ending on a sentence boundary when one
 * falls in the second half of the window.
 *
 * Chunks cover the text without gaps: the first starts at 0, the last ends
 * at content.length and each starts at or before the previous one's end.
 */
export function createChunks(
  document: Pick<Document, 'id' | 'category' | 'content'>,
  options: ChunkOptions
): Chunk[] {
  const { maxChunkTokens, chunkOverlap } = options;
  if (chunkOverlap * 2 >= maxChunkTokens) {
    throw new Error(
      `chunkOverlap (${chunkOverlap}) must be less than half of maxChunkTokens (${maxChunkTokens})`
    );
  }

  const content = document.content;
  if (content.trim() === '') {
    return [];
  }

  const tokenizer = options.tokenizer ?? new TermTokenizer();
  const paragraphs = splitParagraphs(content, tokenizer);

  const spans: ChunkSpan[] = [];
  let currentHeadings: string[] = [];
  let group: ChunkSpan | null = null;

  for (const paragraph of paragraphs) {
    // Check for heading and update context
    if (paragraph.heading) {
      const { level, text } = paragraph.heading;
      currentHeadings = currentHeadings.slice(0, level - 1);
      currentHeadings.push(text);
    }

    const tokens = paragraph.words.length;

    if (tokens > maxChunkTokens) {
      if (group) {
        spans.push(group);
        group = null;
      }
      spans.push(
        ...splitLongParagraph(
          content,
          paragraph,
          maxChunkTokens,
          chunkOverlap,
          currentHeadings
        )
      );
      continue;
    }

    if (group && group.tokenCount + tokens <= maxChunkTokens) {
      group.end = paragraph.end;
      group.tokenCount += tokens;
      continue;
    }

    if (group) {
      spans.push(group);
    }
    group = {
      start: paragraph.start,
      end: paragraph.end,
      tokenCount: tokens,
      headings: [...currentHeadings],
    };
  }

  if (group) {
    spans.push(group);
  }

  return spans.map((span, index) => ({
    documentId: document.id,
    category: document.category,
    index,
    text: content.slice(span.start, span.end),
    startOffset: span.start,
    endOffset: span.end,
    tokenCount: span.tokenCount,
    headings: span.headings,
  }));
}

function splitParagraphs(
  content: string,
  tokenizer: TermTokenizer
): Paragraph[] {
  const starts = [0];
  for (const match of content.matchAll(PARAGRAPH_SEPARATOR)) {
    const next = (match.index ?? 0) + match[0].length;
    if (next > starts[starts.length - 1] && next < content.length) {
      starts.push(next);
    }
  }

  return starts.map((start, i) => {
    const end = i + 1 < starts.length ? starts[i + 1] : content.length;
    const text = content.slice(start, end);
    const words = tokenizer
      .spans(text)
      .map(span => ({ ...span, start: span.start + start, end: span.end + start }));
    return { start, end, words, heading: parseHeading(text) };
  });
}

/**
 * Markdown headings up to level 3 on the paragraph's first line
 */
function parseHeading(
  paragraphText: string
): { level: number; text: string } | undefined {
  const firstLine = paragraphText.trimStart().split('\n')[0];
  const match = /^(#{1,3})\s+(.+)$/.exec(firstLine.trimEnd());
  if (!match) {
    return undefined;
  }
  return { level: match[1].length, text: match[2].trim() };
}

function splitLongParagraph(
  content: string,
  paragraph: Paragraph,
  maxChunkTokens: number,
  chunkOverlap: number,
  headings: string[]
): ChunkSpan[] {
  const words = paragraph.words;
  const n = words.length;
  const minWindow = Math.ceil(maxChunkTokens / 2);
  const windows: ChunkSpan[] = [];

  let begin = 0;
  for (;;) {
    let end = Math.min(begin + maxChunkTokens, n);
    if (end < n) {
      end = findSentenceEnd(content, words, begin + minWindow, end) ?? end;
    }

    windows.push({
      start: begin === 0 ? paragraph.start : words[begin].start,
      end: end === n ? paragraph.end : words[end].start,
      tokenCount: end - begin,
      headings: [...headings],
    });

    if (end === n) {
      break;
    }
    begin = Math.max(end - chunkOverlap, begin + 1);
  }

  return windows;
}

/**
 * Largest window end in [lowest, highest] that falls right after a sentence
 * terminator, as an exclusive word index
 */
function findSentenceEnd(
  content: string,
  words: TermSpan[],
  lowest: number,
  highest: number
): number | undefined {
  for (let end = highest; end >= lowest && end > 0; end--) {
    const gap = content.slice(words[end - 1].end, words[end].start);
    if (SENTENCE_END.test(gap)) {
      return end;
    }
  }
  return undefined;
}
