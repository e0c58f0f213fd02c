import { createHash } from "node:crypto";
import type { CacheEntry, CacheStats, Logger, QueryKind } from "../types.js";

export interface CacheKeyParts {
  kind: QueryKind;
  prompt: string;
  /** SHA-256 of the image bytes, for vision queries */
  imageDigest?: string | null;
  modelId: string;
}

/**
 * Normalize prompt text so that trivially different spellings share a key
 */
export function normalizePrompt(prompt: string): string {
  return prompt
    .normalize("NFKC")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Deterministic cache key over (kind, normalized prompt, image digest, model)
 */
export function computeCacheKey(parts: CacheKeyParts): string {
  const material = JSON.stringify([
    parts.kind,
    normalizePrompt(parts.prompt),
    parts.imageDigest ?? null,
    parts.modelId,
  ]);
  return createHash("sha256").update(material).digest("hex");
}

/**
 * Bounded LRU answer cache with hit/miss accounting.
 *
 * Entries never expire by time; only capacity pressure evicts.
 * Map insertion order tracks recency: every get/put moves the key to the end,
 * so the first key is always the one with the oldest lastAccessAt
 * (ties go to the entry touched earlier).
 * Every method runs to completion without awaiting, which makes each one
 * a critical section on the event loop.
 */
export class ResponseCache {
  private entries = new Map<string, CacheEntry>();
  private readonly capacity: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(capacity: number = 100, logger?: Logger, now: () => number = Date.now) {
    this.capacity = Math.max(0, Math.floor(capacity));
    this.logger = logger || console;
    this.now = now;
  }

  /**
   * Look up an answer. Returns a snapshot of the entry, or null on a miss.
   */
  get(key: string): CacheEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return null;
    }

    entry.lastAccessAt = this.now();
    entry.hitCount++;
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    this.logger.debug(`[ResponseCache] Hit ${key.substring(0, 8)} (hits: ${entry.hitCount})`);
    return { ...entry };
  }

  /** Presence check without touching recency or counters */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Store an answer, evicting the least recently used entry when full.
   * Replacing an existing key never evicts.
   */
  put(key: string, answer: string): CacheEntry | null {
    if (this.capacity === 0) {
      return null;
    }

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictOldest();
    }

    const timestamp = this.now();
    const entry: CacheEntry = {
      key,
      answer,
      createdAt: timestamp,
      lastAccessAt: timestamp,
      hitCount: 0,
    };
    this.entries.set(key, entry);
    return { ...entry };
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) {
      return;
    }
    this.entries.delete(oldest.value);
    this.evictions++;
    this.logger.debug(`[ResponseCache] Evicted ${oldest.value.substring(0, 8)}`);
  }

  /** Empty the cache (manual invalidation, model switch). Counters are kept. */
  clear(): void {
    const size = this.entries.size;
    this.entries.clear();
    this.logger.info(`[ResponseCache] Cleared ${size} entries`);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      size: this.entries.size,
      capacity: this.capacity,
      evictions: this.evictions,
    };
  }
}
