import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { expandTilde, loadConfig, parseConfigValue, saveConfig } from './fs-utils';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsift-cli-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('fs-utils', () => {
  it('expands a leading tilde', () => {
    expect(expandTilde('~/corpus')).toBe(path.join(os.homedir(), 'corpus'));
    expect(expandTilde('/srv/corpus')).toBe('/srv/corpus');
  });

  it('parses JSON values and falls back to strings', () => {
    expect(parseConfigValue('10')).toBe(10);
    expect(parseConfigValue('[".txt"]')).toEqual(['.txt']);
    expect(parseConfigValue('bm25')).toBe('bm25');
  });

  it('round-trips the config file', async () => {
    const configPath = path.join(dir, 'nested', '.docsift.json');
    await saveConfig({ defaultTopK: 3 }, configPath);
    expect(await loadConfig(configPath)).toEqual({ defaultTopK: 3 });
  });

  it('treats a missing config file as empty', async () => {
    expect(await loadConfig(path.join(dir, 'none.json'))).toEqual({});
  });

  it('rejects a config file that is not an object', async () => {
    const configPath = path.join(dir, '.docsift.json');
    await fs.writeFile(configPath, '[1, 2]');
    await expect(loadConfig(configPath)).rejects.toThrow(
      'must contain a JSON object'
    );
  });
});
