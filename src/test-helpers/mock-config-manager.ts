import { ConfigManager } from '../ConfigManager';
import { type DocsiftSettings, DEFAULT_SETTINGS } from '../config';

/**
 * In-memory ConfigManager; logging stays at 'error' unless overridden
 */
export function createMockConfigManager(
  overrides: Partial<DocsiftSettings> = {}
): ConfigManager {
  return ConfigManager.inMemory(DEFAULT_SETTINGS, overrides);
}
