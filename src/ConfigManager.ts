import { EventEmitter } from 'events';
import { type DocsiftSettings, DEFAULT_SETTINGS, settingsSchema } from './config';
import { InvalidSettingsError } from './errors';
import { Logger } from './Logger';

export type ConfigChangeListener = (
  key: keyof DocsiftSettings,
  value: unknown,
  oldValue: unknown
) => void;

export type ConfigBatchChangeListener = (
  changes: Partial<DocsiftSettings>
) => void;

export type SaveSettings = (settings: DocsiftSettings) => Promise<void>;

export class ConfigManager extends EventEmitter {
  private settings: DocsiftSettings;
  private saveCallback: SaveSettings;
  private changeListeners: Map<string, Set<ConfigChangeListener>> = new Map();
  private batchChangeListeners: Set<ConfigBatchChangeListener> = new Set();
  logger: Logger;

  private constructor(
    initialSettings: DocsiftSettings,
    saveCallback: SaveSettings
  ) {
    super();
    this.settings = { ...initialSettings };
    this.saveCallback = saveCallback;
    this.logger = new Logger(() => this.settings.logLevel);
  }

  /**
   * Static factory method to create ConfigManager instance.
   * Loaded data is merged over the defaults and validated as a whole.
   */
  static async initialize(
    loadData: () => Promise<unknown>,
    saveData: SaveSettings,
    defaultSettings: DocsiftSettings
  ): Promise<ConfigManager> {
    const loadedData = await loadData();
    const overrides =
      typeof loadedData === 'object' && loadedData !== null ? loadedData : {};
    const settings = ConfigManager.validate({
      ...defaultSettings,
      ...overrides,
    });
    return new ConfigManager(settings, saveData);
  }

  /**
   * Creates a ConfigManager that never persists, for library callers and tests
   */
  static inMemory(
    defaultSettings: DocsiftSettings,
    overrides: Partial<DocsiftSettings> = {}
  ): ConfigManager {
    const settings = ConfigManager.validate({
      ...defaultSettings,
      ...overrides,
    });
    return new ConfigManager(settings, async () => {});
  }

  private static validate(candidate: unknown): DocsiftSettings {
    const parsed = settingsSchema.safeParse(candidate);
    if (!parsed.success) {
      throw InvalidSettingsError.fromZod(parsed.error);
    }
    return parsed.data;
  }

  /**
   * Get the current value of a setting
   */
  get<K extends keyof DocsiftSettings>(key: K): DocsiftSettings[K] {
    return this.settings[key];
  }

  getAll(): DocsiftSettings {
    return { ...this.settings };
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Update a single setting
   */
  async set<K extends keyof DocsiftSettings>(
    key: K,
    value: DocsiftSettings[K]
  ): Promise<void> {
    const oldValue = this.settings[key];

    if (oldValue === value) {
      return; // No change
    }

    this.settings = ConfigManager.validate({ ...this.settings, [key]: value });

    // Notify specific key listeners
    this.notifyListeners(key, value, oldValue);

    // Notify batch listeners with single change
    this.notifyBatchListeners({ [key]: value });

    await this.saveCallback(this.settings);

    this.emit('change', key, value, oldValue);
    this.emit(`change:${String(key)}`, value, oldValue);
  }

  /**
   * Update multiple settings at once
   */
  async update(changes: Partial<DocsiftSettings>): Promise<void> {
    const previous = this.settings;
    const changedKeys = Object.keys(changes).filter(
      (key): key is keyof DocsiftSettings =>
        isSettingsKey(key) && previous[key] !== changes[key]
    );

    if (changedKeys.length === 0) {
      return; // No actual changes
    }

    this.settings = ConfigManager.validate({ ...previous, ...changes });

    for (const key of changedKeys) {
      this.notifyListeners(key, this.settings[key], previous[key]);
    }

    this.notifyBatchListeners(changes);

    await this.saveCallback(this.settings);

    this.emit('batchChange', changes, previous);
  }

  /**
   * Subscribe to changes for a specific setting key
   */
  subscribe<K extends keyof DocsiftSettings>(
    key: K,
    listener: ConfigChangeListener
  ): () => void {
    const keyStr = String(key);
    let listeners = this.changeListeners.get(keyStr);
    if (!listeners) {
      listeners = new Set();
      this.changeListeners.set(keyStr, listeners);
    }
    listeners.add(listener);

    // Return unsubscribe function
    return () => {
      const current = this.changeListeners.get(keyStr);
      if (current) {
        current.delete(listener);
        if (current.size === 0) {
          this.changeListeners.delete(keyStr);
        }
      }
    };
  }

  subscribeBatch(listener: ConfigBatchChangeListener): () => void {
    this.batchChangeListeners.add(listener);
    return () => {
      this.batchChangeListeners.delete(listener);
    };
  }

  private notifyListeners<K extends keyof DocsiftSettings>(
    key: K,
    value: DocsiftSettings[K],
    oldValue: DocsiftSettings[K]
  ): void {
    const listeners = this.changeListeners.get(String(key));
    if (listeners) {
      listeners.forEach(listener => {
        try {
          listener(key, value, oldValue);
        } catch (err) {
          this.logger.error(
            `Error in config listener for ${String(key)}: ${err}`
          );
        }
      });
    }
  }

  private notifyBatchListeners(changes: Partial<DocsiftSettings>): void {
    this.batchChangeListeners.forEach(listener => {
      try {
        listener(changes);
      } catch (err) {
        this.logger.error(`Error in batch config listener: ${err}`);
      }
    });
  }
}

function isSettingsKey(key: string): key is keyof DocsiftSettings {
  return key in DEFAULT_SETTINGS;
}
