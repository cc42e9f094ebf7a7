import fs from 'fs/promises';
import path from 'path';
import { createChunks } from './chunker';
import { type Category, CATEGORIES } from './config';
import type { ConfigManager } from './ConfigManager';
import { ContentStore } from './ContentStore';
import type { Chunk, Document } from './document';
import { IOError } from './errors';
import { InvertedIndex } from './InvertedIndex';
import type { TermTokenizer } from './TermTokenizer';
import { formatDuration } from './utils';
import { createComponentLogger } from './WithLogging';

export interface CategoryIndex {
  category: Category;
  documents: Document[];
  chunks: Chunk[];
  index: InvertedIndex;
}

/**
 * Everything one corpus load produced. Never mutated after it is built.
 */
export interface CorpusSnapshot {
  root: string;
  store: ContentStore;
  categories: ReadonlyMap<Category, CategoryIndex>;
}

export interface CategoryStats {
  documents: number;
  chunks: number;
  terms: number;
}

export interface CorpusStats {
  documents: number;
  chunks: number;
  byCategory: Record<Category, CategoryStats>;
}

/**
 * Reads, chunks and indexes every category below root.
 * Rejects with IOError when root itself cannot be read; problems with
 * single files or category directories are logged and skipped.
 */
export async function buildCorpusSnapshot(
  root: string,
  configManager: ConfigManager,
  tokenizer: TermTokenizer
): Promise<CorpusSnapshot> {
  const logger = createComponentLogger(configManager, 'CorpusLoader');
  const resolvedRoot = path.resolve(root);
  await assertReadableDirectory(resolvedRoot);

  const startTime = Date.now();
  const store = new ContentStore(configManager);
  const categories = new Map<Category, CategoryIndex>();
  const chunkOptions = {
    maxChunkTokens: configManager.get('maxChunkTokens'),
    chunkOverlap: configManager.get('chunkOverlap'),
    tokenizer,
  };

  for (const category of CATEGORIES) {
    const documents = await store.load(resolvedRoot, category);
    const chunks = documents.flatMap(document =>
      createChunks(document, chunkOptions)
    );
    const index = InvertedIndex.build(chunks, tokenizer);
    categories.set(category, { category, documents, chunks, index });

    logger.verbose(
      `${category}: ${documents.length} documents, ${chunks.length} chunks, ${index.getStats().termCount} terms`
    );
  }

  logger.log(
    `Indexed ${store.size} documents from ${resolvedRoot} in ${formatDuration(Date.now() - startTime)}`
  );

  return { root: resolvedRoot, store, categories };
}

export function summarizeSnapshot(snapshot: CorpusSnapshot): CorpusStats {
  const byCategory: Record<Category, CategoryStats> = {
    invoices: categoryStats(snapshot, 'invoices'),
    contracts: categoryStats(snapshot, 'contracts'),
    support: categoryStats(snapshot, 'support'),
    knowledge: categoryStats(snapshot, 'knowledge'),
  };

  let documents = 0;
  let chunks = 0;
  for (const stats of Object.values(byCategory)) {
    documents += stats.documents;
    chunks += stats.chunks;
  }

  return { documents, chunks, byCategory };
}

function categoryStats(
  snapshot: CorpusSnapshot,
  category: Category
): CategoryStats {
  const entry = snapshot.categories.get(category);
  return {
    documents: entry?.documents.length ?? 0,
    chunks: entry?.chunks.length ?? 0,
    terms: entry?.index.getStats().termCount ?? 0,
  };
}

async function assertReadableDirectory(dir: string): Promise<void> {
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      throw new Error('not a directory');
    }
    await fs.access(dir, fs.constants.R_OK);
  } catch (error) {
    throw new IOError(dir, error);
  }
}
