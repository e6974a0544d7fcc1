import { createHash } from 'node:crypto';

/**
 * In-memory FIFO memo for analysis results.
 *
 * Keys are a sha256 of the full table content plus the options that shape
 * the result. Instances are owned by the caller (the web and MCP servers
 * hold one each).
 */

export const DEFAULT_CACHE_MAX = 100;

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
}

export function hashContent(value: unknown): string {
  return createHash('sha256').update(JSON.stringify(value)).digest('hex');
}

export class AnalysisCache<T> {
  private readonly entries = new Map<string, T>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries: number = DEFAULT_CACHE_MAX) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get(key: string): T | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  set(key: string, value: T): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      // Evict oldest entry
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) this.entries.delete(firstKey);
    }
    this.entries.set(key, value);
  }

  getOrCompute(key: string, compute: () => T): T {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
