/**
 * In-memory response cache with exact and semantic matching.
 *
 * Exact hits are keyed by sha256(scope + normalized text). Semantic hits
 * compare the query vector against every live entry in the same scope and
 * accept the first with cosine >= similarityThreshold. Entries expire after
 * ttlSeconds (0 disables expiry); when full, the oldest entry is evicted.
 */

import { createHash } from "node:crypto";
import type { Vector } from "../types.js";
import type { Config } from "../config.js";
import { cosineSimilarity } from "../routing/similarity.js";
import { createLogger, truncate } from "../logger.js";

const log = createLogger("cache");

export type CacheSettings = Omit<Config["cache"], "enabled">;

interface CacheEntry<T> {
  scope: string;
  vector: Vector;
  value: T;
  storedAt: number;
  hits: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

export function normalizeQueryText(text: string): string {
  return text.trim().toLowerCase();
}

export class ResponseCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    private readonly settings: CacheSettings,
    private readonly now: () => number = Date.now
  ) {}

  private key(text: string, scope: string): string {
    return createHash("sha256").update(`${scope}\n${normalizeQueryText(text)}`).digest("hex");
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.settings.ttlSeconds > 0 && this.now() - entry.storedAt > this.settings.ttlSeconds * 1000;
  }

  get(text: string, vector: Vector, scope = ""): T | undefined {
    const key = this.key(text, scope);
    const exact = this.entries.get(key);
    if (exact) {
      if (!this.isExpired(exact)) {
        exact.hits++;
        this.hits++;
        log.info("hit (exact):", truncate(text, 50));
        return exact.value;
      }
      this.entries.delete(key);
    }

    for (const [entryKey, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(entryKey);
        continue;
      }
      if (entry.scope !== scope) continue;
      const similarity = cosineSimilarity(vector, entry.vector);
      if (similarity >= this.settings.similarityThreshold) {
        entry.hits++;
        this.hits++;
        log.info(`hit (semantic, ${(similarity * 100).toFixed(1)}%):`, truncate(text, 50));
        return entry.value;
      }
    }

    this.misses++;
    log.debug("miss:", truncate(text, 50));
    return undefined;
  }

  set(text: string, vector: Vector, value: T, scope = ""): void {
    const key = this.key(text, scope);
    if (!this.entries.has(key) && this.entries.size >= this.settings.maxEntries) {
      this.evictOldest();
    }
    this.entries.set(key, { scope, vector: [...vector], value, storedAt: this.now(), hits: 0 });
    log.debug("stored:", truncate(text, 50));
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    log.info("cleared");
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  private evictOldest(): void {
    let oldestKey: string | undefined;
    let oldestAt = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.storedAt < oldestAt) {
        oldestAt = entry.storedAt;
        oldestKey = key;
      }
    }
    if (oldestKey !== undefined) {
      this.entries.delete(oldestKey);
      this.evictions++;
    }
  }
}
