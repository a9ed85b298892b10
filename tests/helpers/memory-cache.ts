/**
 * In-process CacheStore stand-in with expiry driven by an injectable clock.
 */

import type { CacheEntryOptions, CacheLookup, CachePriority, CacheStore } from '../../src/dispatch/types.js';

interface Entry {
  value: unknown;
  expiresAt: number;
  priority: CachePriority;
}

export class MemoryCacheStore implements CacheStore {
  readonly entries: Map<string, Entry> = new Map();
  private now: () => number;

  constructor(now: () => number = () => Date.now()) {
    this.now = now;
  }

  tryGet(key: string): CacheLookup {
    const entry = this.entries.get(key);
    if (!entry) return { found: false };
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return { found: false };
    }
    return { found: true, value: entry.value };
  }

  set(key: string, value: unknown, options: CacheEntryOptions): void {
    this.entries.set(key, {
      value,
      expiresAt: this.now() + options.expirationMs,
      priority: options.priority,
    });
  }
}
