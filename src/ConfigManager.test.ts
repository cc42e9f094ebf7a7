import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_SETTINGS } from './config';
import { ConfigManager } from './ConfigManager';
import { InvalidSettingsError } from './errors';

describe('ConfigManager', () => {
  it('merges loaded data over the defaults', async () => {
    const configManager = await ConfigManager.initialize(
      async () => ({ defaultTopK: 3, scoring: 'bm25' }),
      async () => {},
      DEFAULT_SETTINGS
    );
    expect(configManager.get('defaultTopK')).toBe(3);
    expect(configManager.get('scoring')).toBe('bm25');
    expect(configManager.get('maxChunkTokens')).toBe(500);
  });

  it('ignores loaded data that is not an object', async () => {
    const configManager = await ConfigManager.initialize(
      async () => null,
      async () => {},
      DEFAULT_SETTINGS
    );
    expect(configManager.getAll()).toEqual(DEFAULT_SETTINGS);
  });

  it('rejects invalid settings', async () => {
    await expect(
      ConfigManager.initialize(
        async () => ({ scoring: 'semantic' }),
        async () => {},
        DEFAULT_SETTINGS
      )
    ).rejects.toBeInstanceOf(InvalidSettingsError);

    expect(() =>
      ConfigManager.inMemory(DEFAULT_SETTINGS, {
        maxChunkTokens: 100,
        chunkOverlap: 50,
      })
    ).toThrow(/chunkOverlap/);
  });

  it('saves and notifies on set', async () => {
    const save = vi.fn(async () => {});
    const configManager = await ConfigManager.initialize(
      async () => ({}),
      save,
      DEFAULT_SETTINGS
    );
    const listener = vi.fn();
    const batchListener = vi.fn();
    configManager.subscribe('defaultTopK', listener);
    configManager.subscribeBatch(batchListener);

    await configManager.set('defaultTopK', 10);

    expect(listener).toHaveBeenCalledWith('defaultTopK', 10, 5);
    expect(batchListener).toHaveBeenCalledWith({ defaultTopK: 10 });
    expect(save).toHaveBeenCalledTimes(1);
    expect(configManager.get('defaultTopK')).toBe(10);
  });

  it('skips unchanged values', async () => {
    const configManager = ConfigManager.inMemory(DEFAULT_SETTINGS);
    const listener = vi.fn();
    configManager.subscribe('defaultTopK', listener);

    await configManager.set('defaultTopK', DEFAULT_SETTINGS.defaultTopK);
    await configManager.update({ scoring: DEFAULT_SETTINGS.scoring });

    expect(listener).not.toHaveBeenCalled();
  });

  it('keeps the previous value when an update is invalid', async () => {
    const configManager = ConfigManager.inMemory(DEFAULT_SETTINGS);
    await expect(configManager.set('defaultTopK', -1)).rejects.toBeInstanceOf(
      InvalidSettingsError
    );
    expect(configManager.get('defaultTopK')).toBe(5);
  });

  it('applies batch updates and stops notifying after unsubscribe', async () => {
    const configManager = ConfigManager.inMemory(DEFAULT_SETTINGS);
    const listener = vi.fn();
    const unsubscribe = configManager.subscribe('maxChunkTokens', listener);

    await configManager.update({ maxChunkTokens: 200, chunkOverlap: 20 });
    expect(listener).toHaveBeenCalledWith('maxChunkTokens', 200, 500);

    unsubscribe();
    await configManager.update({ maxChunkTokens: 300 });
    expect(listener).toHaveBeenCalledTimes(1);
    expect(configManager.get('maxChunkTokens')).toBe(300);
  });

  it('keeps notifying when a listener throws', async () => {
    const configManager = ConfigManager.inMemory(DEFAULT_SETTINGS, {
      logLevel: 'error',
    });
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const after = vi.fn();
    configManager.subscribe('defaultTopK', () => {
      throw new Error('listener failed');
    });
    configManager.subscribe('defaultTopK', after);

    await configManager.set('defaultTopK', 7);

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      'Error in config listener for defaultTopK: Error: listener failed'
    );
    errorSpy.mockRestore();
  });
});
