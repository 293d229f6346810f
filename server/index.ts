// Public entry point of the skill gap engine

export {
  GapAnalysisService,
  getGapAnalysisService,
} from "./services/gap-analysis-service";
export {
  HybridSkillGapAnalyzer,
  getSkillGapAnalyzer,
  generateRecommendation,
  type SkillGapAnalyzerOptions,
} from "./lib/skill-gap-analyzer";
export { KnowledgeStore, JobRequirementStore, getKnowledgeStore } from "./lib/knowledge-store";
export { SkillTaxonomy, type TaxonomyEntry } from "./lib/skill-taxonomy";
export {
  HashEmbeddingProvider,
  HASH_EMBEDDING_DIMENSIONS,
  cosineSimilarity,
  type EmbeddingProvider,
} from "./lib/embeddings";
export { EmbeddingCache, getEmbeddingCache } from "./lib/embedding-cache";
export { buildEngineConfig, getConfig, type EngineConfig } from "./config/unified-config";
export { logger } from "./config/logger";

export * from "@shared/schema";
export * from "@shared/result-types";
export * from "@shared/errors";
