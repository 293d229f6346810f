/**
 * Hybrid skill gap analyzer
 *
 * Runs the four stages in order and compiles the aggregate result:
 *   1. lexical extraction   (regex + fuzzy normalization + term frequency)
 *   2. semantic enrichment  (cached embeddings + context score)
 *   3. graph matching       (job prerequisite graph)
 *   4. gap quantification   (ROI-ranked gap items)
 *
 * `analyze` is synchronous and keeps no per-call state on the instance; the
 * knowledge store and embedding cache are the only shared structures.
 */

import type {
  MatchedSkill,
  ResolvedSkill,
  RoadmapOrder,
  SkillGapAnalysisResult,
  SkillGapItem,
} from "@shared/schema";
import { JobNotFoundError } from "@shared/errors";
import { logger } from "../config/logger";
import { getConfig } from "../config/unified-config";
import type { GraphMatchRecord, GraphMatchType } from "../types/skill-pipeline";
import { getEmbeddingCache, type EmbeddingCache } from "./embedding-cache";
import { runGapQuantification } from "./gap-quantification";
import { runGraphMatching } from "./graph-matching";
import { getKnowledgeStore, type KnowledgeStore } from "./knowledge-store";
import { buildLearningRoadmap } from "./learning-roadmap";
import { runLexicalExtraction } from "./lexical-extraction";
import { GAP_ITEM_CONFIG, RECOMMENDATION_THRESHOLDS, SIMILAR_SKILLS_DEFAULT_TOP_K } from "./scoring-config";
import { runSemanticEnrichment } from "./semantic-enrichment";

export interface SkillGapAnalyzerOptions {
  store: KnowledgeStore;
  embeddings?: EmbeddingCache;
  roadmapOrder?: RoadmapOrder;
  similarSkillsTopK?: number;
  /** Compute every taxonomy embedding up front (default true) */
  precomputeTaxonomyEmbeddings?: boolean;
}

/**
 * Round to `decimals` places with exact halves going to the even neighbour.
 * Ties are judged on the exact stored value, so 0.15 (held just below
 * 0.15) rounds to 0.1 while 2.25 rounds to 2.2.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  const [whole, fraction] = Math.abs(value).toFixed(100).split(".");
  const dropped = fraction.slice(decimals);
  let units = Number(whole + fraction.slice(0, decimals));

  const first = dropped.charAt(0);
  const aboveHalf = first > "5" || (first === "5" && /[1-9]/.test(dropped.slice(1)));
  const exactHalf = first === "5" && !aboveHalf;
  if (aboveHalf || (exactHalf && units % 2 === 1)) {
    units += 1;
  }

  return (Math.sign(value) * units) / 10 ** decimals;
}

/**
 * One sentence of advice, chosen by match percentage bucket.
 */
export function generateRecommendation(
  matchPercentage: number,
  estimatedWeeks: number,
  gaps: readonly SkillGapItem[],
): string {
  const weeks = roundTo(estimatedWeeks, 0);

  if (matchPercentage >= RECOMMENDATION_THRESHOLDS.EXCELLENT) {
    return `Excellent! You're well-prepared. Focus on ${gaps.length} remaining skills to master the role.`;
  }

  if (matchPercentage >= RECOMMENDATION_THRESHOLDS.GOOD) {
    const highPriority = gaps.filter((gap) => gap.priority === "high").length;
    return `Good progress! Learn ${highPriority} HIGH priority skills. ${weeks} weeks with 40hrs/week effort.`;
  }

  if (matchPercentage >= RECOMMENDATION_THRESHOLDS.FOUNDATION) {
    return `You have foundation skills. Invest ${weeks} weeks in focused learning. Start with highest ROI skills first.`;
  }

  const focus = gaps.length > 0 ? gaps[0].skillName : "core fundamentals";
  return `Consider dedicated training courses. You need ${weeks} weeks to close critical gaps. Focus on: ${focus}.`;
}

export class HybridSkillGapAnalyzer {
  private readonly store: KnowledgeStore;
  private readonly embeddings: EmbeddingCache;
  private readonly roadmapOrder: RoadmapOrder;
  private readonly similarSkillsTopK: number;

  constructor(options: SkillGapAnalyzerOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings ?? getEmbeddingCache();
    this.roadmapOrder = options.roadmapOrder ?? "roi";
    this.similarSkillsTopK = options.similarSkillsTopK ?? SIMILAR_SKILLS_DEFAULT_TOP_K;

    if (options.precomputeTaxonomyEmbeddings ?? true) {
      this.embeddings.warm(this.store.taxonomy.getAllSkills());
    }

    logger.info(
      {
        jobs: this.store.jobs.size,
        skills: this.store.taxonomy.size,
        roadmapOrder: this.roadmapOrder,
        embeddingProvider: this.embeddings.provider.name,
      },
      "Hybrid skill gap analyzer initialized",
    );
  }

  getAvailableJobs(): string[] {
    return this.store.jobs.getAvailableJobs();
  }

  resolveSkill(name: string): ResolvedSkill | null {
    return this.store.taxonomy.findSkillByName(name);
  }

  /**
   * Full four-stage analysis of `userSkills` against `targetJob`.
   *
   * @param resumeText - Free text to scan; defaults to the skills joined by spaces
   * @param jobDesc - Job description; defaults to the required skill names joined by spaces
   * @throws JobNotFoundError when the job is not in the requirement store
   */
  analyze(
    userSkills: readonly string[],
    targetJob: string,
    resumeText?: string,
    jobDesc?: string,
  ): SkillGapAnalysisResult {
    const requirements = this.store.jobs.getRequirements(targetJob);
    if (!requirements) {
      throw new JobNotFoundError(targetJob, { jobsLoaded: this.store.jobs.size });
    }

    logger.info({ targetJob, userSkills: userSkills.length }, "Starting skill gap analysis");

    const jobGraph = this.store.jobs.getSkillGraph(targetJob);
    const resume = resumeText || userSkills.join(" ");
    const description = jobDesc || Array.from(requirements.keys()).join(" ");

    const extraction = runLexicalExtraction(this.store.taxonomy, resume, description);
    const enrichment = runSemanticEnrichment(extraction, description, {
      taxonomy: this.store.taxonomy,
      embeddings: this.embeddings,
      similarSkillsTopK: this.similarSkillsTopK,
    });
    const graph = runGraphMatching(enrichment, jobGraph);
    const skillGaps = runGapQuantification(graph, targetJob, requirements);

    const result = this.compileResults(
      userSkills,
      targetJob,
      Array.from(requirements.keys()),
      skillGaps,
      graph,
      {
        extracted: extraction.extracted.size,
        normalized: extraction.normalized.length,
        enriched: enrichment.enriched.length,
      },
    );

    logger.info(
      {
        targetJob,
        matchPercentage: result.matchPercentage,
        gaps: result.skillGaps.length,
      },
      "Skill gap analysis complete",
    );

    return result;
  }

  private compileResults(
    userSkills: readonly string[],
    targetJob: string,
    requiredSkills: readonly string[],
    skillGaps: SkillGapItem[],
    graph: GraphMatchRecord,
    upstreamCounts: { extracted: number; normalized: number; enriched: number },
  ): SkillGapAnalysisResult {
    const countOf = (type: GraphMatchType) => graph.matched.filter((m) => m.type === type).length;
    const direct = countOf("direct");
    const prerequisiteMet = countOf("prerequisite_met");
    const graphMatchedCount = direct + prerequisiteMet;

    const totalRequired = requiredSkills.length;
    const matchPercentage = totalRequired === 0 ? 0 : (graphMatchedCount / totalRequired) * 100;

    const totalLearningHours = skillGaps.reduce((sum, gap) => sum + gap.learningHours, 0);
    const estimatedWeeks = totalLearningHours / GAP_ITEM_CONFIG.HOURS_PER_WEEK;
    const potentialSalaryIncrease = skillGaps.reduce((sum, gap) => sum + gap.salaryImpact, 0);
    const averageDifficulty =
      skillGaps.length > 0
        ? skillGaps.reduce((sum, gap) => sum + gap.difficulty, 0) / skillGaps.length
        : 0;
    const marketDemandScore =
      skillGaps.reduce((sum, gap) => sum + gap.marketDemand, 0) / Math.max(skillGaps.length, 1);

    // Direct membership against the raw skill list; ignores prerequisites,
    // so it can disagree with graphMatchedCount.
    const submitted = new Set(userSkills.map((skill) => skill.toLowerCase()));
    const matchedSkills: MatchedSkill[] = requiredSkills
      .filter((skill) => submitted.has(skill.toLowerCase()))
      .map((skill) => ({
        skillName: skill,
        proficiencyLevel: "intermediate",
        requiredLevel: "expert",
        extractionMethod: "hybrid",
      }));

    return {
      jobTitle: targetJob,
      userSkillCount: matchedSkills.length,
      requiredSkillCount: totalRequired,
      graphMatchedCount,
      matchPercentage: roundTo(matchPercentage, 1),
      matchedSkills,
      skillGaps,
      totalLearningHours,
      estimatedWeeks: roundTo(estimatedWeeks, 1),
      potentialSalaryIncrease,
      averageDifficulty: roundTo(averageDifficulty, 1),
      marketDemandScore,
      recommendation: generateRecommendation(matchPercentage, estimatedWeeks, skillGaps),
      learningRoadmap: buildLearningRoadmap(
        skillGaps,
        this.store.jobs.getSkillGraph(targetJob),
        this.roadmapOrder,
      ),
      analysisDetails: {
        method: "hybrid_semantic",
        stagesUsed: 4,
        processingMethod: "4-stage",
        roadmapOrder: this.roadmapOrder,
        embeddingProvider: this.embeddings.provider.name,
        stageCounts: {
          ...upstreamCounts,
          direct,
          prerequisiteMet,
          missing: countOf("missing"),
        },
      },
    };
  }
}

let analyzer: HybridSkillGapAnalyzer | null = null;

/**
 * Process-wide analyzer over the shared knowledge store and embedding cache.
 */
export function getSkillGapAnalyzer(): HybridSkillGapAnalyzer {
  if (!analyzer) {
    const config = getConfig();
    analyzer = new HybridSkillGapAnalyzer({
      store: getKnowledgeStore(),
      embeddings: getEmbeddingCache(),
      roadmapOrder: config.analysis.roadmapOrder,
      similarSkillsTopK: config.analysis.similarSkillsTopK,
      precomputeTaxonomyEmbeddings: config.embeddings.precomputeTaxonomy,
    });
  }
  return analyzer;
}
