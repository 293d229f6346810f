/**
 * Knowledge Store
 *
 * Job requirement database plus the skill taxonomy, loaded once and read-only
 * afterwards. The per-job skill graph is a projection of the requirement data
 * built at load time.
 */

import fs from "fs";
import { AppConfigurationError } from "@shared/errors";
import {
  jobRequirementsFileSchema,
  type JobRequirementsFile,
  type JobSkillRequirement,
} from "@shared/schema";
import { logger } from "../config/logger";
import { getConfig, type EngineConfig } from "../config/unified-config";
import type {
  JobRequirementMap,
  JobSkillGraph,
  SkillGraphNode,
  SkillRequirementDetail,
} from "../types/skill-pipeline";
import { DEFAULT_REQUIRED_LEVEL } from "./scoring-config";
import { SkillTaxonomy } from "./skill-taxonomy";

const EMPTY_GRAPH: JobSkillGraph = new Map();

function toDetail(raw: JobSkillRequirement): SkillRequirementDetail {
  return Object.freeze({
    complexity: raw.complexity,
    level: raw.level,
    prerequisites: Object.freeze([...raw.prerequisites]),
    category: raw.category,
    learningHours: raw.learning_hours,
    salaryImpact: raw.salary_impact,
    marketDemand: raw.market_demand,
    importance: raw.importance,
    basePriority: raw.priority,
  });
}

function toGraphNode(detail: SkillRequirementDetail): SkillGraphNode {
  return Object.freeze({
    level: detail.level ?? detail.complexity ?? DEFAULT_REQUIRED_LEVEL,
    prerequisites: detail.prerequisites,
    category: detail.category,
  });
}

export class JobRequirementStore {
  private readonly jobs = new Map<string, JobRequirementMap>();
  private readonly graphs = new Map<string, JobSkillGraph>();

  private constructor(data: JobRequirementsFile) {
    for (const [title, profile] of Object.entries(data)) {
      const requirements = new Map<string, SkillRequirementDetail>();
      const graph = new Map<string, SkillGraphNode>();
      for (const [skill, raw] of Object.entries(profile.skills)) {
        const detail = toDetail(raw);
        requirements.set(skill, detail);
        graph.set(skill, toGraphNode(detail));
      }
      this.jobs.set(title, requirements);
      this.graphs.set(title, graph);
    }
  }

  static empty(): JobRequirementStore {
    return new JobRequirementStore({});
  }

  /**
   * Validate raw requirement data (the JSON file shape) and build a store.
   * Schema violations are configuration errors, not silent drops.
   */
  static fromData(data: unknown, source = "job-requirements"): JobRequirementStore {
    const parsed = jobRequirementsFileSchema.safeParse(data);
    if (!parsed.success) {
      throw AppConfigurationError.invalidFile(
        source,
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      );
    }
    return new JobRequirementStore(parsed.data);
  }

  /**
   * Load the requirement file. A missing or unreadable file, or one that is
   * not JSON, yields an empty store: every analysis then fails with
   * JobNotFound, so the condition is logged at error level.
   */
  static load(filePath: string): JobRequirementStore {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      logger.error(
        {
          filePath,
          err: error instanceof Error ? error.message : String(error),
        },
        "Job requirements could not be loaded; continuing with an empty store, every analysis will fail with JOB_NOT_FOUND",
      );
      return JobRequirementStore.empty();
    }

    const store = JobRequirementStore.fromData(data, filePath);
    logger.info({ jobs: store.size, filePath }, "Job requirements loaded");
    return store;
  }

  get size(): number {
    return this.jobs.size;
  }

  hasJob(title: string): boolean {
    return this.jobs.has(title);
  }

  /** Job titles in file order */
  getAvailableJobs(): string[] {
    return Array.from(this.jobs.keys());
  }

  getRequirements(title: string): JobRequirementMap | undefined {
    return this.jobs.get(title);
  }

  getSkillGraph(title: string): JobSkillGraph {
    return this.graphs.get(title) ?? EMPTY_GRAPH;
  }
}

export class KnowledgeStore {
  constructor(
    readonly jobs: JobRequirementStore,
    readonly taxonomy: SkillTaxonomy,
  ) {
    this.reportUnknownSkills();
  }

  static load(config: EngineConfig["knowledgeStore"]): KnowledgeStore {
    return new KnowledgeStore(
      JobRequirementStore.load(config.jobRequirementsPath),
      SkillTaxonomy.load(config.skillTaxonomyPath),
    );
  }

  /**
   * Skills a job requires (or lists as prerequisites) that the taxonomy does
   * not know can never be extracted from text, so they can only ever be
   * classified as missing.
   */
  private reportUnknownSkills(): void {
    for (const title of this.jobs.getAvailableJobs()) {
      const unknown = new Set<string>();
      this.jobs.getSkillGraph(title).forEach((node, skill) => {
        for (const name of [skill, ...node.prerequisites]) {
          if (!this.taxonomy.has(name)) unknown.add(name);
        }
      });
      if (unknown.size > 0) {
        logger.warn(
          { job: title, skills: Array.from(unknown) },
          "Job references skills missing from the taxonomy",
        );
      }
    }
  }
}

let knowledgeStore: KnowledgeStore | null = null;

/**
 * Process-wide store, loaded on first use from the configured paths.
 */
export function getKnowledgeStore(): KnowledgeStore {
  if (!knowledgeStore) {
    knowledgeStore = KnowledgeStore.load(getConfig().knowledgeStore);
  }
  return knowledgeStore;
}
