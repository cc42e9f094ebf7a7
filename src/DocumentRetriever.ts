import { z } from 'zod';
import { type Category, categorySchema } from './config';
import type { ConfigManager } from './ConfigManager';
import { createChunks } from './chunker';
import {
  type CorpusSnapshot,
  type CorpusStats,
  buildCorpusSnapshot,
  summarizeSnapshot,
} from './CorpusLoader';
import {
  type Chunk,
  type Document,
  type RetrievedChunk,
  chunkKey,
} from './document';
import { IndexNotReadyError, InvalidRequestError } from './errors';
import type { InvertedIndex } from './InvertedIndex';
import { type MatchSet, Matcher, extractPhrases } from './Matcher';
import { type RankOptions, type ScoredChunk, rankMatches } from './Ranker';
import { type CacheStats, ResponseCache } from './ResponseCache';
import {
  type ScoringContext,
  createTextScoringContext,
  getScorer,
} from './scoring';
import { TermTokenizer, normalizeQuery, phraseForm } from './TermTokenizer';
import { truncateQuery } from './utils';
import { WithLogging } from './WithLogging';

/**
 * Queries longer than this are cut before tokenizing
 */
export const MAX_QUERY_CHARS = 2000;

/**
 * Published result of a successful corpus load.
 * Each load produces a new handle; a handle keeps serving the snapshot it
 * names even after a newer one is published.
 */
export interface CorpusHandle {
  readonly version: number;
  readonly root: string;
  readonly loadedAt: number;
  readonly stats: CorpusStats;
  readonly snapshot: CorpusSnapshot;
}

export interface RetrieveRequest {
  query: string;
  category?: string;
  k?: number;
}

export interface AnsweredRetrieval {
  results: RetrievedChunk[];
  answer: string | null; // null when nothing was retrieved
}

export type AnswerGenerator = (
  results: RetrievedChunk[],
  query: string
) => Promise<string>;

const retrieveRequestSchema = z.object({
  query: z.string().transform(q => q.slice(0, MAX_QUERY_CHARS)),
  category: categorySchema.optional(),
  k: z.number().int().min(0).optional(),
});

interface ParsedRequest {
  query: string;
  category: Category;
  k: number;
}

// Settings that only take effect when the corpus is loaded again
const LOAD_TIME_SETTINGS = [
  'corpusRoot',
  'fileExtensions',
  'maxChunkTokens',
  'chunkOverlap',
] as const;

/**
 * Entry point of the engine: loads corpora and answers retrieval requests.
 *
 * Loading builds a complete snapshot off to the side and publishes it with
 * a single assignment, so a retrieval always runs against one whole
 * snapshot. Loads are serialized; a failed load leaves the published
 * snapshot in place. Retrievals are memoized per corpus version, and
 * identical concurrent retrievals share one computation.
 */
export class DocumentRetriever extends WithLogging {
  protected readonly componentName = 'DocumentRetriever';
  private current: CorpusHandle | null = null;
  private version = 0;
  private loadQueue: Promise<unknown> = Promise.resolve();
  private readonly matcher: Matcher;
  private readonly retrievalCache: ResponseCache<RetrievedChunk[]>;
  private readonly answerCache: ResponseCache<string>;
  private configSubscribers: Array<() => void> = [];

  constructor(
    protected configManager: ConfigManager,
    private readonly tokenizer: TermTokenizer = new TermTokenizer()
  ) {
    super();
    this.matcher = new Matcher(tokenizer);
    this.retrievalCache = new ResponseCache(configManager, 'RetrievalCache');
    this.answerCache = new ResponseCache(configManager, 'AnswerCache');

    for (const key of LOAD_TIME_SETTINGS) {
      this.configSubscribers.push(
        configManager.subscribe(key, () => {
          if (this.current) {
            this.log(`${key} changed; takes effect on next corpus load`);
          }
        })
      );
    }
  }

  /**
   * Builds and publishes a snapshot of the corpus below rootPath
   * (default: the corpusRoot setting). Rejects with IOError when rootPath
   * cannot be read.
   */
  loadCorpus(rootPath?: string): Promise<CorpusHandle> {
    const root = rootPath ?? this.configManager.get('corpusRoot');
    const run = this.loadQueue.then(() => this.buildAndPublish(root));
    this.loadQueue = run.catch(() => undefined);
    return run;
  }

  private async buildAndPublish(root: string): Promise<CorpusHandle> {
    let snapshot: CorpusSnapshot;
    try {
      snapshot = await buildCorpusSnapshot(
        root,
        this.configManager,
        this.tokenizer
      );
    } catch (error) {
      this.error(
        this.current
          ? `Corpus load failed, keeping v${this.current.version}: ${error}`
          : `Corpus load failed: ${error}`
      );
      throw error;
    }

    const handle: CorpusHandle = {
      version: this.version + 1,
      root: snapshot.root,
      loadedAt: Date.now(),
      stats: summarizeSnapshot(snapshot),
      snapshot,
    };

    // Publish
    this.version = handle.version;
    this.current = handle;
    this.retrievalCache.setVersion(handle.version);
    this.answerCache.setVersion(handle.version);

    this.log(
      `Published corpus v${handle.version} (${handle.stats.documents} documents, ${handle.stats.chunks} chunks)`
    );
    return handle;
  }

  isReady(): boolean {
    return this.current !== null;
  }

  /**
   * Latest published handle
   * @throws IndexNotReadyError before the first successful load
   */
  getHandle(): CorpusHandle {
    if (!this.current) {
      throw new IndexNotReadyError();
    }
    return this.current;
  }

  /**
   * Top-k chunks for a query within one category, best first.
   * An empty array means nothing matched.
   */
  async retrieve(
    request: RetrieveRequest,
    handle?: CorpusHandle
  ): Promise<RetrievedChunk[]> {
    const target = handle ?? this.getHandle();
    const parsed = this.parseRequest(request);

    const results = await this.retrievalCache.getOrCompute(
      this.cacheKey(parsed, target.version),
      () => this.computeResults(target, parsed)
    );
    // Cached arrays are shared between callers; hand out copies
    return results.map(copyResult);
  }

  /**
   * Retrieval plus a memoized downstream answer.
   * generate is not called when nothing was retrieved; callers bound its
   * run time themselves.
   */
  async retrieveWithAnswer(
    request: RetrieveRequest,
    generate: AnswerGenerator,
    handle?: CorpusHandle
  ): Promise<AnsweredRetrieval> {
    const target = handle ?? this.getHandle();
    const parsed = this.parseRequest(request);
    const results = await this.retrieve(request, target);

    if (results.length === 0) {
      return { results, answer: null };
    }

    const answer = await this.answerCache.getOrCompute(
      this.cacheKey(parsed, target.version),
      () => generate(results, parsed.query)
    );
    return { results, answer };
  }

  /**
   * Ranks text that is not part of the corpus (e.g. a freshly uploaded
   * file). Chunks are scanned directly with a multi-pattern automaton;
   * nothing is indexed or cached.
   */
  searchText(
    documents: Array<Pick<Document, 'id' | 'category' | 'content'>>,
    query: string,
    k: number = this.configManager.get('defaultTopK')
  ): RetrievedChunk[] {
    const chunkOptions = {
      maxChunkTokens: this.configManager.get('maxChunkTokens'),
      chunkOverlap: this.configManager.get('chunkOverlap'),
      tokenizer: this.tokenizer,
    };
    const chunks = documents.flatMap(document =>
      createChunks(document, chunkOptions)
    );
    const byKey = new Map(
      chunks.map(chunk => [chunkKey(chunk.documentId, chunk.index), chunk])
    );

    const matches = this.matcher.matchText(chunks, query);
    const ranked = this.rank(
      matches,
      k,
      query,
      createTextScoringContext(chunks, matches, this.tokenizer),
      (documentId, chunkIndex) =>
        byKey.get(chunkKey(documentId, chunkIndex))?.text
    );

    const results: RetrievedChunk[] = [];
    for (const entry of ranked) {
      const chunk = byKey.get(chunkKey(entry.documentId, entry.chunkIndex));
      if (chunk) {
        results.push(toRetrievedChunk(entry, chunk));
      }
    }
    return results;
  }

  getCacheStats(): { retrieval: CacheStats; answers: CacheStats } {
    return {
      retrieval: this.retrievalCache.stats(),
      answers: this.answerCache.stats(),
    };
  }

  /**
   * Stops listening to settings changes
   */
  dispose(): void {
    this.configSubscribers.forEach(unsubscribe => unsubscribe());
    this.configSubscribers = [];
  }

  private computeResults(
    handle: CorpusHandle,
    request: ParsedRequest
  ): RetrievedChunk[] {
    const entry = handle.snapshot.categories.get(request.category);
    if (!entry || request.k === 0) {
      return [];
    }

    const matches = this.matcher.match(entry.index, request.query);
    if (this.configManager.get('titleTerms')) {
      this.matcher.matchTitles(entry.index, request.query, matches);
    }
    if (matches.size === 0) {
      this.verbose(`No matches for ${truncateQuery(request.query)}`);
      return [];
    }

    const ranked = this.rank(
      matches,
      request.k,
      request.query,
      entry.index,
      (documentId, chunkIndex) =>
        entry.index.getChunk(documentId, chunkIndex)?.text
    );

    this.verbose(
      `${truncateQuery(request.query)}: ${matches.size} matching chunks, returning ${ranked.length}`
    );

    return this.toResults(ranked, entry.index);
  }

  private rank(
    matches: MatchSet,
    k: number,
    query: string,
    context: ScoringContext,
    getChunkText: RankOptions['getChunkText']
  ): ScoredChunk[] {
    const settings = this.configManager.getAll();
    return rankMatches(matches, k, {
      scorer: getScorer(settings.scoring),
      context,
      granularity: settings.granularity,
      aggregation: {
        method: settings.aggMethod,
        m: settings.aggM,
        l: settings.aggL,
        decay: settings.aggDecay,
        rrfK: settings.aggRrfK,
      },
      phraseBoost: settings.phraseBoost,
      phraseCounter:
        settings.phraseBoost > 0
          ? this.matcher.createPhraseCounter(query)
          : null,
      getChunkText,
    });
  }

  private toResults(
    ranked: ScoredChunk[],
    index: InvertedIndex
  ): RetrievedChunk[] {
    const results: RetrievedChunk[] = [];
    for (const entry of ranked) {
      const chunk = index.getChunk(entry.documentId, entry.chunkIndex);
      if (chunk) {
        results.push(toRetrievedChunk(entry, chunk));
      }
    }
    return results;
  }

  private parseRequest(request: RetrieveRequest): ParsedRequest {
    const parsed = retrieveRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw InvalidRequestError.fromZod(parsed.error);
    }
    return {
      query: parsed.data.query,
      category:
        parsed.data.category ?? this.configManager.get('defaultCategory'),
      k: parsed.data.k ?? this.configManager.get('defaultTopK'),
    };
  }

  /**
   * Everything that changes the ranked output is part of the key
   */
  private cacheKey(request: ParsedRequest, version: number) {
    const settings = this.configManager.getAll();
    const phrases =
      settings.phraseBoost > 0
        ? extractPhrases(request.query).map(phrase =>
            phraseForm(this.tokenizer, phrase)
          )
        : [];
    return {
      query: normalizeQuery(this.tokenizer, request.query),
      category: request.category,
      version,
      variant: JSON.stringify([
        request.k,
        settings.scoring,
        settings.granularity,
        settings.aggMethod,
        settings.aggM,
        settings.aggL,
        settings.aggDecay,
        settings.aggRrfK,
        settings.phraseBoost,
        settings.titleTerms,
        phrases,
      ]),
    };
  }
}

function toRetrievedChunk(entry: ScoredChunk, chunk: Chunk): RetrievedChunk {
  return {
    documentId: chunk.documentId,
    category: chunk.category,
    chunkIndex: chunk.index,
    chunkText: chunk.text,
    score: entry.score,
    matchedTerms: [...entry.matchedTerms],
    startOffset: chunk.startOffset,
    endOffset: chunk.endOffset,
    headings: [...chunk.headings],
  };
}

function copyResult(result: RetrievedChunk): RetrievedChunk {
  return {
    ...result,
    matchedTerms: [...result.matchedTerms],
    headings: [...result.headings],
  };
}
