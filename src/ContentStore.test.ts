import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import fs from 'fs/promises';
import { ContentStore } from './ContentStore';
import { createMockConfigManager } from './test-helpers/mock-config-manager';
import { type TempCorpus, createTempCorpus } from './test-helpers/temp-corpus';

let corpus: TempCorpus;

beforeAll(async () => {
  corpus = await createTempCorpus({
    'invoices/invoice_2.txt': 'Invoice two',
    'invoices/invoice_1.txt': 'Invoice one',
    'invoices/notes.md': '# Notes',
    'invoices/scan.pdf': 'not text',
    'invoices/2024/invoice_0.txt': 'Archived invoice',
    'invoices/.trash/deleted.txt': 'Deleted invoice',
    'employment-contracts/contract_1.txt': 'Employment contract',
  });
});

afterAll(async () => {
  await corpus.cleanup();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ContentStore', () => {
  it('loads matching files of a category in id order', async () => {
    const store = new ContentStore(createMockConfigManager());
    const documents = await store.load(corpus.root, 'invoices');

    expect(documents.map(d => d.id)).toEqual([
      '2024/invoice_0.txt',
      'invoice_1.txt',
      'invoice_2.txt',
      'notes.md',
    ]);
    expect(documents.every(d => d.category === 'invoices')).toBe(true);
  });

  it('serves content from memory after loading', async () => {
    const store = new ContentStore(createMockConfigManager());
    await store.load(corpus.root, 'invoices');
    await corpus.write('invoices/invoice_1.txt', 'Changed on disk');

    const document = store.get('invoices', 'invoice_1.txt');
    expect(document?.content).toBe('Invoice one');
    expect(document?.size).toBe(11);

    await corpus.write('invoices/invoice_1.txt', 'Invoice one');
  });

  it('reads categories from their directories', async () => {
    const store = new ContentStore(createMockConfigManager());
    const documents = await store.load(corpus.root, 'contracts');
    expect(documents.map(d => d.content)).toEqual(['Employment contract']);
  });

  it('yields nothing for a missing category directory', async () => {
    const store = new ContentStore(createMockConfigManager());
    expect(await store.load(corpus.root, 'support')).toEqual([]);
    expect(store.list('support')).toEqual([]);
    expect(store.get('support', 'anything.txt')).toBeUndefined();
  });

  it('skips unreadable files with a warning', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(fs, 'readFile').mockRejectedValueOnce(
      new Error('permission denied')
    );
    const store = new ContentStore(
      createMockConfigManager({ logLevel: 'warn' })
    );

    const documents = await store.load(corpus.root, 'invoices');

    expect(documents).toHaveLength(3);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[Docsift\.ContentStore\] Skipping document: Cannot read .+: permission denied$/
      )
    );
  });

  it('drops files removed from disk on the next load', async () => {
    await corpus.write('invoices/draft.txt', 'Draft invoice');
    const store = new ContentStore(createMockConfigManager());
    await store.load(corpus.root, 'invoices');
    expect(store.get('invoices', 'draft.txt')?.content).toBe('Draft invoice');

    await corpus.remove('invoices/draft.txt');
    const documents = await store.load(corpus.root, 'invoices');

    expect(store.get('invoices', 'draft.txt')).toBeUndefined();
    expect(documents.map(d => d.id)).toEqual([
      '2024/invoice_0.txt',
      'invoice_1.txt',
      'invoice_2.txt',
      'notes.md',
    ]);
  });

  it('honors the fileExtensions setting', async () => {
    const store = new ContentStore(
      createMockConfigManager({ fileExtensions: ['.md'] })
    );
    const documents = await store.load(corpus.root, 'invoices');
    expect(documents.map(d => d.id)).toEqual(['notes.md']);
    expect(store.size).toBe(1);
  });
});
