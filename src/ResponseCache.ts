import type { Category } from './config';
import type { ConfigManager } from './ConfigManager';
import { WithLogging } from './WithLogging';

export interface ResponseCacheKey {
  query: string; // Normalized query
  category: Category;
  version: number; // Corpus version the value is computed against
  variant?: string; // Anything else that changes the value (k, scoring, ...)
}

export interface CacheStats {
  hits: number;
  misses: number;
  joins: number; // Requests that attached to a computation still in flight
  evictions: number;
  size: number;
}

interface CacheEntry<T> {
  version: number;
  promise: Promise<T>;
  settled: boolean;
}

/**
 * Memoizes per-query results for the current corpus version.
 *
 * Entries hold promises, so a request for a key whose computation is still
 * running joins it instead of starting another one. Failed computations are
 * dropped. Moving to a new corpus version purges every older entry.
 */
export class ResponseCache<T> extends WithLogging {
  protected readonly componentName: string;
  private entries: Map<string, CacheEntry<T>> = new Map();
  private version = 0;
  private counters = { hits: 0, misses: 0, joins: 0, evictions: 0 };

  constructor(
    protected configManager: ConfigManager,
    name = 'ResponseCache'
  ) {
    super();
    this.componentName = name;
  }

  async getOrCompute(
    key: ResponseCacheKey,
    compute: () => Promise<T> | T
  ): Promise<T> {
    const id = serializeKey(key);
    const existing = this.entries.get(id);

    if (existing) {
      if (existing.settled) {
        this.counters.hits++;
      } else {
        this.counters.joins++;
      }
      // Refresh recency
      this.entries.delete(id);
      this.entries.set(id, existing);
      return existing.promise;
    }

    this.counters.misses++;

    if (key.version < this.version) {
      // Computed against a superseded corpus: serve it, never store it
      this.verbose(`Serving stale-version request uncached (v${key.version})`);
      return compute();
    }

    const entry: CacheEntry<T> = {
      version: key.version,
      promise: Promise.resolve().then(compute),
      settled: false,
    };
    this.entries.set(id, entry);

    void entry.promise.then(
      () => {
        entry.settled = true;
        this.evictOverflow();
      },
      error => {
        if (this.entries.get(id) === entry) {
          this.entries.delete(id);
        }
        this.verbose(`Computation failed, not cached: ${error}`);
      }
    );

    return entry.promise;
  }

  /**
   * Switches to a corpus version and purges entries of every other version
   */
  setVersion(version: number): void {
    if (version === this.version) {
      return;
    }
    this.version = version;

    let purged = 0;
    for (const [id, entry] of this.entries) {
      if (entry.version !== version) {
        this.entries.delete(id);
        purged++;
      }
    }
    if (purged > 0) {
      this.log(`Purged ${purged} entries on move to corpus v${version}`);
    }
  }

  getVersion(): number {
    return this.version;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return { ...this.counters, size: this.entries.size };
  }

  /**
   * Drops least recently used settled entries beyond maxCacheEntries
   */
  private evictOverflow(): void {
    const maxEntries = this.configManager.get('maxCacheEntries');
    if (maxEntries <= 0) {
      return;
    }

    for (const [id, entry] of this.entries) {
      if (this.entries.size <= maxEntries) {
        break;
      }
      if (entry.settled) {
        this.entries.delete(id);
        this.counters.evictions++;
      }
    }
  }
}

function serializeKey(key: ResponseCacheKey): string {
  return JSON.stringify([
    key.version,
    key.category,
    key.variant ?? '',
    key.query,
  ]);
}
