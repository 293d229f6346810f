/**
 * Stage 2: semantic enrichment.
 *
 * Attaches an embedding, a context score and the nearest taxonomy neighbours
 * to every scored skill.
 */

import { logger } from "../config/logger";
import type { EnrichedSkill, EnrichmentRecord, ExtractionRecord } from "../types/skill-pipeline";
import type { EmbeddingCache } from "./embedding-cache";
import { cosineSimilarity } from "./embeddings";
import { countOccurrences } from "./lexical-extraction";
import { CONTEXT_SCORE_CONFIG, CONTEXT_SCORE_WEIGHTS } from "./scoring-config";
import type { SkillTaxonomy } from "./skill-taxonomy";

export interface SemanticEnrichmentDeps {
  taxonomy: SkillTaxonomy;
  embeddings: EmbeddingCache;
  similarSkillsTopK: number;
}

/**
 * Relevance of a skill to the job description, 0-1. The semantic and
 * industry terms are fixed placeholders; only the two occurrence terms vary.
 */
export function calculateContextScore(skill: string, jobDescription: string): number {
  const occurrence = countOccurrences(jobDescription, skill);
  const jobRelevance = Math.min(occurrence / CONTEXT_SCORE_CONFIG.RELEVANCE_SATURATION, 1);
  const frequency = Math.min(occurrence / CONTEXT_SCORE_CONFIG.FREQUENCY_SATURATION, 1);

  const score =
    CONTEXT_SCORE_WEIGHTS.semantic * CONTEXT_SCORE_CONFIG.SEMANTIC_PLACEHOLDER +
    CONTEXT_SCORE_WEIGHTS.jobRelevance * jobRelevance +
    CONTEXT_SCORE_WEIGHTS.frequency * frequency +
    CONTEXT_SCORE_WEIGHTS.industry * CONTEXT_SCORE_CONFIG.INDUSTRY_WEIGHT;

  return Math.min(score, CONTEXT_SCORE_CONFIG.MAX_SCORE);
}

/**
 * Top-K taxonomy skills by cosine similarity to `skill`, excluding itself.
 * Ties keep taxonomy order.
 */
export function findSimilarSkills(
  skill: string,
  embedding: readonly number[],
  taxonomy: SkillTaxonomy,
  embeddings: EmbeddingCache,
  topK: number,
): string[] {
  if (topK <= 0) return [];

  const self = skill.toLowerCase();
  return taxonomy
    .getAllSkills()
    .filter((candidate) => candidate.toLowerCase() !== self)
    .map((candidate) => ({
      candidate,
      similarity: cosineSimilarity(embedding, embeddings.get(candidate)),
    }))
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, topK)
    .map(({ candidate }) => candidate);
}

export function runSemanticEnrichment(
  extraction: ExtractionRecord,
  jobDescription: string,
  deps: SemanticEnrichmentDeps,
): EnrichmentRecord {
  const enriched: EnrichedSkill[] = [];

  extraction.scored.forEach((scores, skill) => {
    const embedding = deps.embeddings.get(skill);
    enriched.push({
      skill,
      confidence: scores.confidence,
      tfScore: scores.tfScore,
      embedding,
      contextScore: calculateContextScore(skill, jobDescription),
      similarSkills: findSimilarSkills(
        skill,
        embedding,
        deps.taxonomy,
        deps.embeddings,
        deps.similarSkillsTopK,
      ),
    });
  });

  logger.debug({ enriched: enriched.length }, "Stage 2: semantic enrichment complete");

  return { enriched, method: "semantic" };
}
