/**
 * SKILL GAP SCORING CONFIGURATION
 *
 * Single source of truth for every weight, cap and threshold used by the
 * extraction, enrichment and quantification stages. Weight groups are
 * validated at module load.
 */

import type { SkillPriority } from "@shared/schema";

// ===== LEXICAL EXTRACTION =====

export const LEXICAL_CONFIG = {
  /** Confidence recorded for a regex hit on a canonical name or alias */
  REGEX_HIT_CONFIDENCE: 1.0,
  /** Minimum token-sort similarity (0-1) to accept a fuzzy normalization */
  FUZZY_MATCH_THRESHOLD: 0.75,
  /** findSkillByName only accepts alias similarity strictly above this */
  ALIAS_LOOKUP_THRESHOLD: 0.75,
} as const;

// ===== CONTEXT SCORE =====

/**
 * Context score blend. SEMANTIC_PLACEHOLDER and INDUSTRY_WEIGHT are fixed
 * constants, not data-derived.
 */
export const CONTEXT_SCORE_WEIGHTS = {
  semantic: 0.4,
  jobRelevance: 0.3,
  frequency: 0.2,
  industry: 0.1,
} as const;

export const CONTEXT_SCORE_CONFIG = {
  SEMANTIC_PLACEHOLDER: 0.5,
  INDUSTRY_WEIGHT: 0.8,
  /** Occurrences at which job relevance saturates */
  RELEVANCE_SATURATION: 5,
  /** Occurrences at which frequency saturates */
  FREQUENCY_SATURATION: 3,
  MAX_SCORE: 1.0,
} as const;

export const SIMILAR_SKILLS_DEFAULT_TOP_K = 2;

// ===== GRAPH MATCHING =====

export const GRAPH_MATCH_SCORES = {
  direct: 1.0,
  prerequisite_met: 0.7,
  missing: 0.0,
} as const;

export const DEFAULT_REQUIRED_LEVEL = 3;

// ===== GAP QUANTIFICATION =====

/**
 * Substituted when a missing skill's requirement detail is absent.
 */
export const GAP_DEFAULTS = {
  learningHours: 100,
  salaryImpact: 5000,
  complexity: 3,
  marketDemand: 0.5,
  importance: 0.5,
  basePriority: "medium",
} as const;

export const GAP_ITEM_CONFIG = {
  EXTRACTION_METHOD: "hybrid",
  CONFIDENCE_SCORE: 0.92,
  HOURS_PER_WEEK: 40,
  MIN_DIFFICULTY: 1,
  MAX_DIFFICULTY: 10,
  /** difficulty = complexity * COMPLEXITY_MULTIPLIER + required level */
  COMPLEXITY_MULTIPLIER: 2,
} as const;

/**
 * Priority score = effort * (10 - hourScore) + reward * salaryScore.
 * Effort outweighs reward, so short skills rank first.
 */
export const PRIORITY_WEIGHTS = {
  effort: 0.6,
  reward: 0.4,
} as const;

export const PRIORITY_NORMALIZATION = {
  /** Learning hours that map to the maximum hour score */
  HOURS_CAP: 300,
  /** Salary impact that maps to the maximum salary score */
  SALARY_CAP: 30000,
  SCALE: 10,
  /** Decimal places kept before comparing against thresholds */
  SCORE_PRECISION: 9,
} as const;

export const PRIORITY_THRESHOLDS: ReadonlyArray<{ min: number; priority: SkillPriority }> = [
  { min: 7.5, priority: "critical" },
  { min: 6.0, priority: "high" },
  { min: 4.0, priority: "medium" },
];

// ===== RECOMMENDATION =====

export const RECOMMENDATION_THRESHOLDS = {
  EXCELLENT: 80,
  GOOD: 60,
  FOUNDATION: 40,
} as const;

// Validate weight groups sum to 1.0
function assertWeightsSumToOne(name: string, weights: Record<string, number>): void {
  const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
  if (Math.abs(total - 1.0) > 0.001) {
    throw new Error(`${name} must sum to 1.0, current sum: ${total}`);
  }
}

assertWeightsSumToOne("Context score weights", CONTEXT_SCORE_WEIGHTS);
assertWeightsSumToOne("Priority weights", PRIORITY_WEIGHTS);
