/**
 * Unified Configuration System
 *
 * Builds the engine configuration from environment variables, validated
 * through a zod schema. Missing variables fall back to defaults; invalid ones
 * raise an AppConfigurationError naming every offending variable.
 */

import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { AppConfigurationError } from "@shared/errors";
import { ROADMAP_ORDERS, type RoadmapOrder } from "@shared/schema";
import { Environment, resolveEnvironment } from "../types/environment";
import { SIMILAR_SKILLS_DEFAULT_TOP_K } from "../lib/scoring-config";

dotenv.config();

const DATA_DIR = path.resolve(__dirname, "../../data");

export const DEFAULT_JOB_REQUIREMENTS_PATH = path.join(DATA_DIR, "job_requirements.json");
export const DEFAULT_SKILL_TAXONOMY_PATH = path.join(DATA_DIR, "skill_taxonomy.json");

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const EngineEnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  JOB_REQUIREMENTS_PATH: z.string().min(1).optional(),
  SKILL_TAXONOMY_PATH: z.string().min(1).optional(),
  ROADMAP_ORDER: z.enum(ROADMAP_ORDERS).default("roi"),
  SIMILAR_SKILLS_TOP_K: z.coerce.number().int().min(0).max(20).default(SIMILAR_SKILLS_DEFAULT_TOP_K),
  PRECOMPUTE_TAXONOMY_EMBEDDINGS: booleanFlag.default("true"),
});

export interface EngineConfig {
  env: Environment;
  knowledgeStore: {
    jobRequirementsPath: string;
    skillTaxonomyPath: string;
  };
  analysis: {
    roadmapOrder: RoadmapOrder;
    similarSkillsTopK: number;
  };
  embeddings: {
    precomputeTaxonomy: boolean;
  };
}

/**
 * Parse an environment map into an EngineConfig.
 */
export function buildEngineConfig(source: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineEnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new AppConfigurationError(
      "environment",
      `Invalid engine configuration: ${issues.join("; ")}`,
      { issues },
    );
  }

  const env = parsed.data;
  return {
    env: resolveEnvironment(env.NODE_ENV),
    knowledgeStore: {
      jobRequirementsPath: env.JOB_REQUIREMENTS_PATH
        ? path.resolve(env.JOB_REQUIREMENTS_PATH)
        : DEFAULT_JOB_REQUIREMENTS_PATH,
      skillTaxonomyPath: env.SKILL_TAXONOMY_PATH
        ? path.resolve(env.SKILL_TAXONOMY_PATH)
        : DEFAULT_SKILL_TAXONOMY_PATH,
    },
    analysis: {
      roadmapOrder: env.ROADMAP_ORDER,
      similarSkillsTopK: env.SIMILAR_SKILLS_TOP_K,
    },
    embeddings: {
      precomputeTaxonomy: env.PRECOMPUTE_TAXONOMY_EMBEDDINGS,
    },
  };
}

let cachedConfig: EngineConfig | null = null;

export function getConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = buildEngineConfig();
  }
  return cachedConfig;
}
