/**
 * Page Cache
 *
 * Holds one parsed page for a TTL. Callers arriving while a fetch is running
 * wait on that fetch instead of starting another.
 */

import { logger } from '../utils/logger.js';

export interface CacheStats {
  name: string;
  cached: boolean;
  ageSeconds: number | null;
  hits: number;
  misses: number;
}

export class PageCache<T> {
  private value: { data: T; fetchedAt: number } | null = null;
  private fetching: Promise<T> | null = null;
  private hits = 0;
  private misses = 0;

  constructor(
    readonly name: string,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async get(load: () => Promise<T>): Promise<T> {
    if (this.value && this.value.fetchedAt + this.ttlMs > this.now()) {
      this.hits++;
      logger.debug('Cache', `Using cached ${this.name}`);
      return this.value.data;
    }

    if (this.fetching) {
      logger.debug('Cache', `Waiting for concurrent ${this.name} fetch...`);
      return this.fetching;
    }

    this.misses++;
    this.fetching = load()
      .then(data => {
        this.value = { data, fetchedAt: this.now() };
        return data;
      })
      .finally(() => {
        this.fetching = null;
      });
    return this.fetching;
  }

  clear(): void {
    this.value = null;
  }

  getStats(): CacheStats {
    return {
      name: this.name,
      cached: this.value !== null && this.value.fetchedAt + this.ttlMs > this.now(),
      ageSeconds: this.value ? Math.round((this.now() - this.value.fetchedAt) / 1000) : null,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
