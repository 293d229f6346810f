import crypto from "crypto";
import { logger } from "../config/logger";

/**
 * Anything that turns text into a fixed-length vector. Implementations must
 * be pure: the same text always yields the same vector.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  embed(text: string): readonly number[];
}

export const HASH_EMBEDDING_DIMENSIONS = 384;

/**
 * Deterministic stand-in for a sentence embedding model.
 *
 * The MD5 digest of the lowercased text is read as a 128-bit big-endian
 * integer; dimension i is +1 when bit i (least significant first) is set and
 * -1 otherwise. Dimensions past bit 127 are always -1. The vector carries no
 * meaning beyond identity: equal text, equal vector.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = "md5-hash";

  constructor(readonly dimensions: number = HASH_EMBEDDING_DIMENSIONS) {}

  embed(text: string): readonly number[] {
    const digest = crypto.createHash("md5").update(text.toLowerCase(), "utf8").digest();
    const bitCount = digest.length * 8;
    const vector = new Array<number>(this.dimensions);

    for (let i = 0; i < this.dimensions; i++) {
      let bit = 0;
      if (i < bitCount) {
        const byte = digest[digest.length - 1 - Math.floor(i / 8)];
        bit = (byte >> (i % 8)) & 1;
      }
      vector[i] = bit * 2 - 1;
    }

    return vector;
  }
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  // Handle empty arrays
  if (a.length === 0 || b.length === 0) {
    logger.warn(
      { aLength: a.length, bLength: b.length },
      "Cosine similarity called with empty vector(s)",
    );
    return 0;
  }

  if (a.length !== b.length) {
    logger.error(
      { aLength: a.length, bLength: b.length },
      "Cosine similarity vector length mismatch",
    );
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    // Skip NaN or infinite values
    if (!isFinite(a[i]) || !isFinite(b[i])) {
      continue;
    }
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 && normB === 0) {
    return 1.0;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  const similarity = dotProduct / (normA * normB);
  if (!isFinite(similarity)) {
    return 0;
  }

  // Clamp to [-1, 1] against rounding drift
  return Math.max(-1, Math.min(1, similarity));
}
