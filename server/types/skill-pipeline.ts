/**
 * Shapes passed between the four analysis stages. Each stage builds a new
 * record from the previous one; none is mutated after it is returned.
 */

import type { SkillPriority } from "@shared/schema";

// ===== KNOWLEDGE STORE =====

/** Requirement detail for one skill of one job, as loaded (defaults not applied) */
export interface SkillRequirementDetail {
  complexity?: number;
  level?: number;
  prerequisites: readonly string[];
  category: string;
  learningHours?: number;
  salaryImpact?: number;
  marketDemand?: number;
  importance?: number;
  basePriority?: SkillPriority;
}

export type JobRequirementMap = ReadonlyMap<string, SkillRequirementDetail>;

export interface SkillGraphNode {
  level: number;
  prerequisites: readonly string[];
  category: string;
}

export type JobSkillGraph = ReadonlyMap<string, SkillGraphNode>;

// ===== STAGE 1: LEXICAL EXTRACTION =====

export interface NormalizedSkill {
  original: string;
  normalized: string;
  confidence: number;
}

export interface ScoredSkill {
  confidence: number;
  tfScore: number;
  frequency: number;
}

export interface ExtractionRecord {
  /** canonical skill -> regex confidence */
  extracted: ReadonlyMap<string, number>;
  normalized: readonly NormalizedSkill[];
  scored: ReadonlyMap<string, ScoredSkill>;
  method: "ner";
}

// ===== STAGE 2: SEMANTIC ENRICHMENT =====

export interface EnrichedSkill {
  skill: string;
  confidence: number;
  tfScore: number;
  embedding: readonly number[];
  contextScore: number;
  similarSkills: readonly string[];
}

export interface EnrichmentRecord {
  enriched: readonly EnrichedSkill[];
  method: "semantic";
}

// ===== STAGE 3: GRAPH MATCHING =====

export type GraphMatchType = "direct" | "prerequisite_met" | "missing";

export interface GraphMatch {
  skill: string;
  type: GraphMatchType;
  matchScore: number;
  level: number;
}

export interface GraphMatchRecord {
  matched: readonly GraphMatch[];
  method: "graph";
}
