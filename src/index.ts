export {
  CATEGORIES,
  CATEGORY_DIRECTORIES,
  DEFAULT_SETTINGS,
  parseCategory,
} from './config';
export type {
  Category,
  DocsiftSettings,
  Granularity,
  LogLevel,
  ScoringMethod,
} from './config';
export { ConfigManager } from './ConfigManager';
export {
  DocsiftError,
  IOError,
  IndexNotReadyError,
  InvalidRequestError,
  InvalidSettingsError,
} from './errors';
export type { DocsiftErrorCode } from './errors';
export type { Chunk, Document, RetrievedChunk } from './document';
export { createChunks } from './chunker';
export { InvertedIndex, buildInvertedIndex } from './InvertedIndex';
export { AhoCorasick } from './AhoCorasick';
export { Matcher } from './Matcher';
export { TopKQueue } from './TopKQueue';
export { compareRanked, rank, rankMatches } from './Ranker';
export { ResponseCache } from './ResponseCache';
export { DocumentRetriever, MAX_QUERY_CHARS } from './DocumentRetriever';
export type {
  AnswerGenerator,
  AnsweredRetrieval,
  CorpusHandle,
  RetrieveRequest,
} from './DocumentRetriever';
export { TermTokenizer } from './TermTokenizer';
