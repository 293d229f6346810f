/**
 * Process-wide embedding cache.
 *
 * Keyed by the exact skill string (no case folding), filled lazily and never
 * evicted: the vocabulary it holds is the taxonomy plus whatever skills
 * analyses have surfaced, which stays small. Analyses run synchronously, so
 * no two calls can interleave between a lookup and its insert. Warming the
 * cache with every taxonomy skill at start-up means the common path only
 * ever reads.
 */

import { AppConfigurationError } from "@shared/errors";
import { logger } from "../config/logger";
import { HashEmbeddingProvider, type EmbeddingProvider } from "./embeddings";

export interface EmbeddingCacheStats {
  entries: number;
  hits: number;
  misses: number;
  hitRate: number;
  provider: string;
  dimensions: number;
}

export class EmbeddingCache {
  private readonly vectors = new Map<string, readonly number[]>();
  private hits = 0;
  private misses = 0;

  constructor(readonly provider: EmbeddingProvider = new HashEmbeddingProvider()) {}

  /**
   * Cached vector for `key`, computing and storing it on a miss.
   * Returned vectors are frozen and shared between callers.
   */
  get(key: string): readonly number[] {
    const cached = this.vectors.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const vector = this.provider.embed(key);
    if (vector.length !== this.provider.dimensions) {
      throw AppConfigurationError.embeddingDimensionMismatch(
        this.provider.name,
        this.provider.dimensions,
        vector.length,
      );
    }

    const frozen = Object.freeze([...vector]);
    this.vectors.set(key, frozen);
    return frozen;
  }

  /** Vector for `key` only if already cached */
  peek(key: string): readonly number[] | undefined {
    return this.vectors.get(key);
  }

  has(key: string): boolean {
    return this.vectors.has(key);
  }

  /**
   * Precompute vectors for a fixed vocabulary.
   */
  warm(keys: Iterable<string>): number {
    let computed = 0;
    for (const key of keys) {
      if (!this.vectors.has(key)) {
        this.get(key);
        computed++;
      }
    }
    logger.debug({ computed, entries: this.vectors.size }, "Embedding cache warmed");
    return computed;
  }

  get size(): number {
    return this.vectors.size;
  }

  getStats(): EmbeddingCacheStats {
    const lookups = this.hits + this.misses;
    const hitRate = lookups > 0 ? (this.hits / lookups) * 100 : 0;
    return {
      entries: this.vectors.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: Math.round(hitRate * 100) / 100,
      provider: this.provider.name,
      dimensions: this.provider.dimensions,
    };
  }
}

let sharedCache: EmbeddingCache | null = null;

export function getEmbeddingCache(): EmbeddingCache {
  if (!sharedCache) {
    sharedCache = new EmbeddingCache();
  }
  return sharedCache;
}
