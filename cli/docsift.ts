#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import ora from 'ora';
import { CATEGORIES, CATEGORY_DIRECTORIES, DEFAULT_SETTINGS } from '../src/config';
import { ConfigManager } from '../src/ConfigManager';
import { DocumentRetriever } from '../src/DocumentRetriever';
import { DocsiftError } from '../src/errors';
import { formatBytes, previewText } from '../src/utils';
import {
  CONFIG_PATH,
  expandTilde,
  loadConfig,
  parseConfigValue,
  saveConfig,
} from './fs-utils';

interface SearchOptions {
  category?: string;
  top?: string;
  root?: string;
  granularity?: string;
  scoring?: string;
}

interface ConfigOptions {
  list?: boolean;
  set?: string;
}

/**
 * Settings from the config file plus command-line overrides.
 * Overrides are never written back.
 */
async function createConfigManager(
  overrides: Record<string, unknown> = {}
): Promise<ConfigManager> {
  const fileConfig = await loadConfig();
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return ConfigManager.initialize(
    async () => ({ ...fileConfig, ...defined }),
    async () => {},
    DEFAULT_SETTINGS
  );
}

function fail(error: unknown): never {
  if (error instanceof DocsiftError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
}

async function indexCommand(root?: string) {
  let configManager: ConfigManager;
  try {
    configManager = await createConfigManager({
      corpusRoot: root ? expandTilde(root) : undefined,
    });
  } catch (error) {
    fail(error);
  }

  console.log('🔍 Indexing corpus\n');
  console.log(`📁 Root: ${configManager.get('corpusRoot')}`);
  console.log(
    `✂️  Chunks: ${configManager.get('maxChunkTokens')} tokens, ${configManager.get('chunkOverlap')} overlap\n`
  );

  const spinner = ora({
    text: 'Loading documents...',
    spinner: 'dots',
    color: 'blue',
  }).start();

  const retriever = new DocumentRetriever(configManager);
  try {
    const startTime = Date.now();
    const handle = await retriever.loadCorpus();
    spinner.succeed(
      `Indexed ${handle.stats.chunks} chunks from ${handle.stats.documents} documents`
    );

    console.log('');
    for (const category of CATEGORIES) {
      const stats = handle.stats.byCategory[category];
      const bytes = handle.snapshot.store
        .list(category)
        .reduce((total, document) => total + document.size, 0);
      console.log(
        `   ${category.padEnd(10)} ${CATEGORY_DIRECTORIES[category].padEnd(22)} ` +
          `${stats.documents} docs, ${stats.chunks} chunks, ${stats.terms} terms, ${formatBytes(bytes)}`
      );
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`\n✅ Done in ${duration}s`);
  } catch (error) {
    spinner.fail('Indexing failed');
    fail(error);
  } finally {
    retriever.dispose();
  }
}

async function searchCommand(query: string, options: SearchOptions) {
  let configManager: ConfigManager;
  try {
    configManager = await createConfigManager({
      corpusRoot: options.root ? expandTilde(options.root) : undefined,
      granularity: options.granularity,
      scoring: options.scoring,
    });
  } catch (error) {
    fail(error);
  }

  const k = options.top
    ? Number.parseInt(options.top, 10)
    : configManager.get('defaultTopK');
  const category = options.category ?? configManager.get('defaultCategory');

  console.log('🔎 Keyword Search\n');
  console.log(`📝 Query: "${query}"`);
  console.log(`🗂️  Category: ${category}`);
  console.log(`🔝 Top K: ${k}\n`);

  const spinner = ora({ text: 'Loading corpus...', spinner: 'dots' }).start();
  const retriever = new DocumentRetriever(configManager);

  try {
    await retriever.loadCorpus();
    spinner.text = 'Searching...';
    const results = await retriever.retrieve({ query, category, k });
    spinner.succeed(`Found ${results.length} results`);

    if (results.length === 0) {
      console.log('\nNo matching chunks.');
      return;
    }

    console.log('\n📊 Results\n');
    console.log(
      '────────────────────────────────────────────────────────────\n'
    );

    const maxScore = results[0].score;
    results.forEach((result, idx) => {
      const barLength = 20;
      const filled =
        maxScore > 0 ? Math.round((result.score / maxScore) * barLength) : 0;
      const bar = '█'.repeat(filled) + '░'.repeat(barLength - filled);

      console.log(`${idx + 1}. ${result.documentId}`);
      console.log(`   📊 Score: ${bar} ${result.score.toFixed(4)}`);
      console.log(`   📄 Chunk: ${result.chunkIndex + 1}`);
      console.log(`   🔑 Terms: ${result.matchedTerms.join(', ')}`);
      if (result.headings.length > 0) {
        console.log(`   🏷️  Context: ${result.headings.join(' > ')}`);
      }
      console.log(`   📝 Preview:`);
      console.log(`      "${previewText(result.chunkText)}"\n`);
    });

    console.log('────────────────────────────────────────────────────────────');
  } catch (error) {
    spinner.fail('Search failed');
    fail(error);
  } finally {
    retriever.dispose();
  }
}

async function configCommand(options: ConfigOptions) {
  try {
    if (options.list) {
      const configManager = await createConfigManager();
      console.log('📋 Current Configuration:\n');
      console.log(JSON.stringify(configManager.getAll(), null, 2));
      return;
    }

    if (options.set) {
      const separator = options.set.indexOf('=');
      if (separator <= 0) {
        console.error('❌ Expected --set key=value');
        process.exit(1);
      }
      const key = options.set.slice(0, separator);
      const value = parseConfigValue(options.set.slice(separator + 1));
      if (!(key in DEFAULT_SETTINGS)) {
        console.error(`❌ Unknown setting: ${key}`);
        process.exit(1);
      }

      const fileConfig = await loadConfig();
      const updated = { ...fileConfig, [key]: value };
      // Rejects with InvalidSettingsError before anything is written
      await ConfigManager.initialize(
        async () => updated,
        async () => {},
        DEFAULT_SETTINGS
      );
      await saveConfig(updated);
      console.log(`✅ Updated ${key} = ${JSON.stringify(value)} in ${CONFIG_PATH}`);
      return;
    }

    console.log('Use --list to view current config, or --set key=value to update.');
  } catch (error) {
    fail(error);
  }
}

const program = new Command();

program
  .name('docsift')
  .description('Keyword retrieval over a local document corpus')
  .version('1.0.0');

program
  .command('index [root]')
  .description('Load and index the corpus, then print per-category counts')
  .action(indexCommand);

program
  .command('search <query>')
  .description('Search one category of the corpus')
  .option(
    '-c, --category <category>',
    `Category (${CATEGORIES.join(', ')})`
  )
  .option('-k, --top <n>', 'Number of results to return')
  .option('-r, --root <path>', 'Corpus root directory')
  .option('-g, --granularity <granularity>', 'Rank chunks or documents')
  .option('-s, --scoring <method>', 'distinct, frequency, idf or bm25')
  .action(searchCommand);

program
  .command('config')
  .description('Manage configuration')
  .option('-l, --list', 'List current configuration')
  .option('-s, --set <key=value>', 'Set a config value')
  .action(configCommand);

program.parseAsync().catch(fail);
