/**
 * Unit Tests for Embeddings
 * Hash embedding provider, cosine similarity and the shared cache
 */

import { describe, test, expect } from '@jest/globals';
import {
  HASH_EMBEDDING_DIMENSIONS,
  HashEmbeddingProvider,
  cosineSimilarity,
  type EmbeddingProvider,
} from '../../../server/lib/embeddings';
import { EmbeddingCache, getEmbeddingCache } from '../../../server/lib/embedding-cache';
import { AppConfigurationError } from '../../../shared/errors';

describe('Embeddings', () => {
  describe('HashEmbeddingProvider', () => {
    const provider = new HashEmbeddingProvider();

    test('should produce a 384-dimensional vector of +1/-1 values', () => {
      const vector = provider.embed('Machine Learning');
      expect(vector).toHaveLength(HASH_EMBEDDING_DIMENSIONS);
      expect(vector.every((value) => value === 1 || value === -1)).toBe(true);
    });

    test('should read the digest least significant bit first', () => {
      // md5("") = d41d8cd98f00b204e9800998ecf8427e; last bytes 0x42 0x7e
      expect(provider.embed('').slice(0, 10)).toEqual([-1, 1, 1, 1, 1, 1, 1, -1, -1, 1]);
    });

    test('should leave every dimension past bit 127 at -1', () => {
      const tail = provider.embed('Python').slice(128);
      expect(tail).toHaveLength(256);
      expect(tail.every((value) => value === -1)).toBe(true);
    });

    test('should ignore case and return equal vectors for equal text', () => {
      expect(provider.embed('PYTHON')).toEqual(provider.embed('python'));
      expect(provider.embed('Python')).toEqual(new HashEmbeddingProvider().embed('Python'));
    });

    test('should differ for different text', () => {
      expect(provider.embed('Python')).not.toEqual(provider.embed('SQL'));
    });
  });

  describe('cosineSimilarity', () => {
    test('should score orthogonal, identical and opposite vectors', () => {
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
      expect(cosineSimilarity([1, 1], [1, 1])).toBeCloseTo(1, 10);
      expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 10);
    });

    test('should return 0 for empty vectors', () => {
      expect(cosineSimilarity([], [1])).toBe(0);
    });

    test('should throw on a length mismatch', () => {
      expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector length mismatch: 2 vs 3');
    });
  });

  describe('EmbeddingCache', () => {
    test('should compute once and share the frozen vector', () => {
      const cache = new EmbeddingCache();
      const first = cache.get('Python');
      const second = cache.get('Python');

      expect(second).toBe(first);
      expect(Object.isFrozen(first)).toBe(true);
      expect(cache.getStats()).toEqual({
        entries: 1,
        hits: 1,
        misses: 1,
        hitRate: 50,
        provider: 'md5-hash',
        dimensions: 384,
      });
    });

    test('should key entries by the exact string', () => {
      const cache = new EmbeddingCache();
      cache.get('Python');
      expect(cache.has('python')).toBe(false);
      expect(cache.peek('python')).toBeUndefined();
      expect(cache.peek('Python')).toEqual(new HashEmbeddingProvider().embed('Python'));
    });

    test('should warm only keys it does not hold yet', () => {
      const cache = new EmbeddingCache();
      cache.get('SQL');
      expect(cache.warm(['SQL', 'Python', 'Statistics', 'Python'])).toBe(2);
      expect(cache.size).toBe(3);
    });

    test('should reject a provider returning the wrong dimensions', () => {
      const broken: EmbeddingProvider = {
        name: 'broken',
        dimensions: 4,
        embed: () => [1, 2],
      };
      const cache = new EmbeddingCache(broken);
      expect(() => cache.get('Python')).toThrow(AppConfigurationError);
      expect(cache.size).toBe(0);
    });

    test('should hand out one process-wide cache', () => {
      expect(getEmbeddingCache()).toBe(getEmbeddingCache());
    });
  });
});
