/**
 * Tiered context cache
 *
 * Three independent partitions with their own expiry policies:
 *
 * - **static**: loaded once, TTL 0, removed only by explicit invalidation
 *   (e.g. the identity files changed on disk)
 * - **semiStatic**: refreshed occasionally, default TTL 10 minutes
 * - **retrieval**: memory search results keyed by (event type, keywords),
 *   default TTL 5 minutes
 *
 * Expiry is lazy and destructive: a read that finds an expired entry
 * deletes it and reports a miss. `stats()` sweeps every partition first.
 * All operations are synchronous map operations and never throw.
 *
 * Every invalidation or clear bumps a generation. A caller that loads
 * content asynchronously reads `generation()` before the load and stores
 * the result only if the generation is unchanged afterwards.
 */

import {
  DEFAULT_RETRIEVAL_TTL_MS,
  DEFAULT_SEMI_STATIC_TTL_MS,
  STATIC_CACHE_TTL_MS,
} from '../constants.js';
import { estimateSize } from '../budget/estimator.js';
import type { CachePartition } from '../types/index.js';

/**
 * A cached fragment
 */
export interface CacheEntry {
  content: string;
  /** Epoch ms when the entry was stored */
  createdAt: number;
  /** 0 means no time-based expiry */
  ttlMs: number;
  estimatedSize: number;
}

/**
 * Canonical identity of a retrieval result
 */
export interface RetrievalKey {
  eventType: string;
  /** Space-joined memory hints */
  keywords: string;
}

export interface PartitionStats {
  entries: number;
  estimatedSize: number;
}

export interface CacheStats {
  static: PartitionStats;
  semiStatic: PartitionStats;
  retrieval: PartitionStats;
  totalEntries: number;
  totalEstimatedSize: number;
}

interface StoredEntry extends CacheEntry {
  retrievalKey?: RetrievalKey;
}

export const CACHE_PARTITIONS: readonly CachePartition[] = [
  'static',
  'semiStatic',
  'retrieval',
];

/**
 * Whether an entry has outlived its TTL at `now`.
 * An entry aged exactly its TTL is still valid.
 */
export function isExpired(entry: CacheEntry, now: number): boolean {
  if (entry.ttlMs === 0) return false;
  return now - entry.createdAt > entry.ttlMs;
}

/**
 * Map key for a retrieval entry. The JSON tuple keeps the two fields
 * apart, so no pair of inputs can collide on the boundary.
 */
export function retrievalLookupKey(key: RetrievalKey): string {
  return JSON.stringify([key.eventType, key.keywords]);
}

function generationKey(partition: CachePartition, key: string): string {
  return JSON.stringify([partition, key]);
}

export class TieredCache {
  private readonly partitions: Record<CachePartition, Map<string, StoredEntry>> = {
    static: new Map(),
    semiStatic: new Map(),
    retrieval: new Map(),
  };

  private generationCounter = 0;
  private readonly keyGenerations = new Map<string, number>();
  private readonly partitionGenerations: Record<CachePartition, number> = {
    static: 0,
    semiStatic: 0,
    retrieval: 0,
  };

  // ─── Generic partition operations ──────────────────────────

  /**
   * Store or overwrite an entry, stamped with the current time
   */
  set(
    partition: CachePartition,
    key: string,
    content: string,
    ttlMs: number,
    estimatedSize?: number
  ): void {
    this.store(partition, key, {
      content,
      createdAt: Date.now(),
      ttlMs,
      estimatedSize: estimatedSize ?? estimateSize(content),
    });
  }

  /**
   * Read an entry. Expired entries are removed and reported as a miss.
   */
  get(partition: CachePartition, key: string): string | null {
    const entries = this.partitions[partition];
    const entry = entries.get(key);
    if (!entry) return null;

    if (isExpired(entry, Date.now())) {
      entries.delete(key);
      return null;
    }

    return entry.content;
  }

  /**
   * Remove an entry if present. Returns whether anything was removed.
   */
  invalidate(partition: CachePartition, key: string): boolean {
    this.keyGenerations.set(generationKey(partition, key), ++this.generationCounter);
    return this.partitions[partition].delete(key);
  }

  /**
   * Changes whenever `key` is invalidated or its partition cleared,
   * including invalidations of a key not currently stored
   */
  generation(partition: CachePartition, key: string): number {
    return Math.max(
      this.partitionGenerations[partition],
      this.keyGenerations.get(generationKey(partition, key)) ?? 0
    );
  }

  has(partition: CachePartition, key: string): boolean {
    return this.get(partition, key) !== null;
  }

  clearPartition(partition: CachePartition): void {
    this.partitionGenerations[partition] = ++this.generationCounter;
    this.partitions[partition].clear();
  }

  clearAll(): void {
    for (const partition of CACHE_PARTITIONS) {
      this.clearPartition(partition);
    }
  }

  /**
   * Evict every expired entry
   *
   * @returns Number of entries evicted
   */
  sweep(): number {
    const now = Date.now();
    let evicted = 0;

    for (const partition of CACHE_PARTITIONS) {
      const entries = this.partitions[partition];
      for (const [key, entry] of entries) {
        if (isExpired(entry, now)) {
          entries.delete(key);
          evicted += 1;
        }
      }
    }

    return evicted;
  }

  /**
   * Entry counts and summed estimated sizes, after a full sweep
   */
  stats(): CacheStats {
    this.sweep();

    const summarise = (partition: CachePartition): PartitionStats => {
      let estimatedSize = 0;
      for (const entry of this.partitions[partition].values()) {
        estimatedSize += entry.estimatedSize;
      }
      return { entries: this.partitions[partition].size, estimatedSize };
    };

    const staticStats = summarise('static');
    const semiStaticStats = summarise('semiStatic');
    const retrievalStats = summarise('retrieval');

    return {
      static: staticStats,
      semiStatic: semiStaticStats,
      retrieval: retrievalStats,
      totalEntries:
        staticStats.entries + semiStaticStats.entries + retrievalStats.entries,
      totalEstimatedSize:
        staticStats.estimatedSize +
        semiStaticStats.estimatedSize +
        retrievalStats.estimatedSize,
    };
  }

  // ─── Static partition ──────────────────────────────────────

  setStatic(
    key: string,
    content: string,
    ttlMs: number = STATIC_CACHE_TTL_MS,
    estimatedSize?: number
  ): void {
    this.set('static', key, content, ttlMs, estimatedSize);
  }

  getStatic(key: string): string | null {
    return this.get('static', key);
  }

  invalidateStatic(key: string): boolean {
    return this.invalidate('static', key);
  }

  // ─── Semi-static partition ─────────────────────────────────

  setSemiStatic(
    key: string,
    content: string,
    ttlMs: number = DEFAULT_SEMI_STATIC_TTL_MS,
    estimatedSize?: number
  ): void {
    this.set('semiStatic', key, content, ttlMs, estimatedSize);
  }

  getSemiStatic(key: string): string | null {
    return this.get('semiStatic', key);
  }

  invalidateSemiStatic(key: string): boolean {
    return this.invalidate('semiStatic', key);
  }

  // ─── Retrieval partition ───────────────────────────────────

  setRetrieval(
    key: RetrievalKey,
    content: string,
    ttlMs: number = DEFAULT_RETRIEVAL_TTL_MS,
    estimatedSize?: number
  ): void {
    this.store('retrieval', retrievalLookupKey(key), {
      content,
      createdAt: Date.now(),
      ttlMs,
      estimatedSize: estimatedSize ?? estimateSize(content),
      retrievalKey: { eventType: key.eventType, keywords: key.keywords },
    });
  }

  getRetrieval(key: RetrievalKey): string | null {
    return this.get('retrieval', retrievalLookupKey(key));
  }

  invalidateRetrieval(key: RetrievalKey): boolean {
    return this.invalidate('retrieval', retrievalLookupKey(key));
  }

  retrievalGeneration(key: RetrievalKey): number {
    return this.generation('retrieval', retrievalLookupKey(key));
  }

  clearRetrieval(): void {
    this.clearPartition('retrieval');
  }

  /**
   * Keys of the live retrieval entries
   */
  retrievalKeys(): RetrievalKey[] {
    const now = Date.now();
    const keys: RetrievalKey[] = [];
    for (const entry of this.partitions.retrieval.values()) {
      if (entry.retrievalKey && !isExpired(entry, now)) {
        keys.push({ ...entry.retrievalKey });
      }
    }
    return keys;
  }

  private store(partition: CachePartition, key: string, entry: StoredEntry): void {
    this.partitions[partition].set(key, entry);
  }
}
