import { z } from "zod";

// ===== SHARED ENUMS =====

export const SKILL_PRIORITIES = ["critical", "high", "medium", "low"] as const;
export type SkillPriority = (typeof SKILL_PRIORITIES)[number];
export const skillPrioritySchema = z.enum(SKILL_PRIORITIES);

export const ROADMAP_ORDERS = ["roi", "prerequisite"] as const;
export type RoadmapOrder = (typeof ROADMAP_ORDERS)[number];

export type ExtractionMethod = "ner" | "semantic" | "graph" | "hybrid";

export type ProficiencyLevel = "beginner" | "intermediate" | "advanced" | "expert";

// ===== KNOWLEDGE STORE FILE FORMATS =====

// Per-skill requirement detail as it appears in the job requirements file.
// Numeric detail is optional; quantification substitutes defaults.
export const jobSkillRequirementSchema = z.object({
  complexity: z.number().int().min(1).max(5).optional(),
  level: z.number().int().min(1).max(5).optional(),
  prerequisites: z.array(z.string().min(1)).default([]),
  category: z.string().min(1).default("technical"),
  learning_hours: z.number().int().min(0).optional(),
  salary_impact: z.number().min(0).optional(),
  market_demand: z.number().min(0).max(1).optional(),
  importance: z.number().min(0).max(1).optional(),
  priority: skillPrioritySchema.optional(),
});

export const jobProfileSchema = z.object({
  skills: z.record(z.string().min(1), jobSkillRequirementSchema).default({}),
});

export const jobRequirementsFileSchema = z.record(z.string().min(1), jobProfileSchema);

export const skillTaxonomyEntrySchema = z.object({
  aliases: z.array(z.string().min(1)).default([]),
  category: z.string().min(1).default("technical"),
});

export const skillTaxonomyFileSchema = z.record(z.string().min(1), skillTaxonomyEntrySchema);

export type JobSkillRequirement = z.infer<typeof jobSkillRequirementSchema>;
export type JobRequirementsFile = z.infer<typeof jobRequirementsFileSchema>;

// Input shapes accepted before defaults are applied
export type JobRequirementsInput = z.input<typeof jobRequirementsFileSchema>;
export type SkillTaxonomyInput = z.input<typeof skillTaxonomyFileSchema>;

// ===== REQUEST SCHEMAS =====

export const skillGapRequestSchema = z.object({
  user_skills: z.array(z.string()),
  // Matched against store keys verbatim; only a blank title is rejected
  target_job: z.string().refine((title) => title.trim().length > 0, "target_job is required"),
  resume_text: z.string().optional(),
  job_desc: z.string().optional(),
});

export type SkillGapRequest = z.infer<typeof skillGapRequestSchema>;

// Output of the upstream resume skill extractor; only `name` is used here
export const extractedSkillSchema = z.object({
  name: z.string().min(1),
  confidence_score: z.number().min(0).max(1),
  method: z.string(),
});

export type ExtractedSkill = z.infer<typeof extractedSkillSchema>;

// ===== ANALYSIS OUTPUT =====

export interface SkillGapItem {
  skillName: string;
  priority: SkillPriority;
  learningHours: number;
  salaryImpact: number;
  /** 1-10 */
  difficulty: number;
  /** 0-1 */
  marketDemand: number;
  /** salaryImpact / learningHours */
  roi: number;
  weeksToProficiency: number;
  /** 0-1 */
  jobRelevance: number;
  recommendedResources: string[];
  extractionMethod: ExtractionMethod;
  confidenceScore: number;
}

export interface MatchedSkill {
  skillName: string;
  proficiencyLevel: ProficiencyLevel;
  requiredLevel: ProficiencyLevel;
  extractionMethod: ExtractionMethod;
}

export interface StageCounts {
  extracted: number;
  normalized: number;
  enriched: number;
  direct: number;
  prerequisiteMet: number;
  missing: number;
}

export interface AnalysisDetails {
  method: "hybrid_semantic";
  stagesUsed: number;
  processingMethod: string;
  roadmapOrder: RoadmapOrder;
  embeddingProvider: string;
  stageCounts: StageCounts;
}

export interface SkillGapAnalysisResult {
  jobTitle: string;
  /** Required skills found verbatim (case-insensitive) in the submitted skill list */
  userSkillCount: number;
  requiredSkillCount: number;
  /** Required skills classified direct or prerequisite_met by the graph stage */
  graphMatchedCount: number;
  matchPercentage: number;

  matchedSkills: MatchedSkill[];
  /** Sorted by ROI, highest first */
  skillGaps: SkillGapItem[];

  totalLearningHours: number;
  estimatedWeeks: number;
  potentialSalaryIncrease: number;

  averageDifficulty: number;
  marketDemandScore: number;
  recommendation: string;
  learningRoadmap: string[];

  analysisDetails: AnalysisDetails;
}

export interface JobCatalog {
  jobs: string[];
  count: number;
}

export interface ResolvedSkill {
  skill: string;
  confidence: number;
}
