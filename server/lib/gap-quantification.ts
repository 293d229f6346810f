/**
 * Stage 4: turn every missing skill into a quantified gap item and rank the
 * items by ROI (salary impact per learning hour).
 */

import type { SkillGapItem, SkillPriority } from "@shared/schema";
import { logger } from "../config/logger";
import type { GraphMatchRecord, JobRequirementMap, SkillRequirementDetail } from "../types/skill-pipeline";
import {
  GAP_DEFAULTS,
  GAP_ITEM_CONFIG,
  PRIORITY_NORMALIZATION,
  PRIORITY_THRESHOLDS,
  PRIORITY_WEIGHTS,
} from "./scoring-config";

export interface ResolvedRequirement {
  learningHours: number;
  salaryImpact: number;
  complexity: number;
  marketDemand: number;
  importance: number;
  basePriority: SkillPriority;
  /** Names of the fields filled from GAP_DEFAULTS */
  defaulted: string[];
}

export function resolveRequirement(detail: SkillRequirementDetail | undefined): ResolvedRequirement {
  const defaulted: string[] = [];
  const pick = <T>(field: string, value: T | undefined, fallback: T): T => {
    if (value === undefined) {
      defaulted.push(field);
      return fallback;
    }
    return value;
  };

  return {
    learningHours: pick("learning_hours", detail?.learningHours, GAP_DEFAULTS.learningHours),
    salaryImpact: pick("salary_impact", detail?.salaryImpact, GAP_DEFAULTS.salaryImpact),
    complexity: pick("complexity", detail?.complexity, GAP_DEFAULTS.complexity),
    marketDemand: pick("market_demand", detail?.marketDemand, GAP_DEFAULTS.marketDemand),
    importance: pick("importance", detail?.importance, GAP_DEFAULTS.importance),
    basePriority: pick("priority", detail?.basePriority, GAP_DEFAULTS.basePriority),
    defaulted,
  };
}

/**
 * 1-10; harder skills needed at a higher level score higher.
 */
export function estimateDifficulty(complexity: number, requiredLevel: number): number {
  const raw = complexity * GAP_ITEM_CONFIG.COMPLEXITY_MULTIPLIER + requiredLevel;
  return Math.max(GAP_ITEM_CONFIG.MIN_DIFFICULTY, Math.min(raw, GAP_ITEM_CONFIG.MAX_DIFFICULTY));
}

export function calculateRoi(salaryImpact: number, learningHours: number): number {
  return salaryImpact / Math.max(learningHours, 1);
}

export function priorityScore(learningHours: number, salaryImpact: number): number {
  const { HOURS_CAP, SALARY_CAP, SCALE, SCORE_PRECISION } = PRIORITY_NORMALIZATION;
  const hourScore = Math.min((learningHours / HOURS_CAP) * SCALE, SCALE);
  const salaryScore = Math.min((salaryImpact / SALARY_CAP) * SCALE, SCALE);

  const score =
    PRIORITY_WEIGHTS.effort * (SCALE - hourScore) +
    PRIORITY_WEIGHTS.reward * salaryScore;

  const factor = 10 ** SCORE_PRECISION;
  return Math.round(score * factor) / factor;
}

/**
 * Priority from effort and reward only. Thresholds are inclusive, so a score
 * sitting exactly on a boundary takes the higher bucket.
 */
export function determinePriority(learningHours: number, salaryImpact: number): SkillPriority {
  const score = priorityScore(learningHours, salaryImpact);
  for (const { min, priority } of PRIORITY_THRESHOLDS) {
    if (score >= min) return priority;
  }
  return "low";
}

export function runGapQuantification(
  graph: GraphMatchRecord,
  targetJob: string,
  requirements: JobRequirementMap,
): SkillGapItem[] {
  const gaps: SkillGapItem[] = [];

  for (const match of graph.matched) {
    if (match.type !== "missing") continue;

    const req = resolveRequirement(requirements.get(match.skill));
    if (req.defaulted.length > 0) {
      logger.warn(
        { job: targetJob, skill: match.skill, fields: req.defaulted },
        "Requirement detail missing; defaults substituted",
      );
    }

    gaps.push({
      skillName: match.skill,
      priority: determinePriority(req.learningHours, req.salaryImpact),
      learningHours: req.learningHours,
      salaryImpact: req.salaryImpact,
      difficulty: estimateDifficulty(req.complexity, match.level),
      marketDemand: req.marketDemand,
      roi: calculateRoi(req.salaryImpact, req.learningHours),
      weeksToProficiency: req.learningHours / GAP_ITEM_CONFIG.HOURS_PER_WEEK,
      jobRelevance: req.importance,
      recommendedResources: [],
      extractionMethod: GAP_ITEM_CONFIG.EXTRACTION_METHOD,
      confidenceScore: GAP_ITEM_CONFIG.CONFIDENCE_SCORE,
    });
  }

  // Array.prototype.sort is stable: equal ROI keeps graph order
  gaps.sort((a, b) => b.roi - a.roi);

  logger.debug({ gaps: gaps.length }, "Stage 4: gap quantification complete");

  return gaps;
}
