/**
 * Stage 3: classify every skill the job requires against the user's
 * resolved skills, using the job's prerequisite graph.
 *
 *   direct            the skill itself was found                 1.0
 *   prerequisite_met  every listed prerequisite was found        0.7
 *   missing           neither                                    0.0
 *
 * Comparisons ignore case. A skill with no prerequisites can only be direct
 * or missing.
 */

import { logger } from "../config/logger";
import type {
  EnrichmentRecord,
  GraphMatch,
  GraphMatchRecord,
  GraphMatchType,
  JobSkillGraph,
  SkillGraphNode,
} from "../types/skill-pipeline";
import { GRAPH_MATCH_SCORES } from "./scoring-config";

export function classifySkill(
  skill: string,
  node: SkillGraphNode,
  userSkills: ReadonlySet<string>,
): GraphMatchType {
  if (userSkills.has(skill.toLowerCase())) {
    return "direct";
  }
  if (
    node.prerequisites.length > 0 &&
    node.prerequisites.every((prerequisite) => userSkills.has(prerequisite.toLowerCase()))
  ) {
    return "prerequisite_met";
  }
  return "missing";
}

export function runGraphMatching(
  enrichment: EnrichmentRecord,
  jobGraph: JobSkillGraph,
): GraphMatchRecord {
  const userSkills = new Set(enrichment.enriched.map((item) => item.skill.toLowerCase()));
  const matched: GraphMatch[] = [];

  jobGraph.forEach((node, skill) => {
    const type = classifySkill(skill, node, userSkills);
    matched.push({
      skill,
      type,
      matchScore: GRAPH_MATCH_SCORES[type],
      level: node.level,
    });
  });

  logger.debug(
    {
      required: matched.length,
      direct: matched.filter((m) => m.type === "direct").length,
      prerequisiteMet: matched.filter((m) => m.type === "prerequisite_met").length,
      missing: matched.filter((m) => m.type === "missing").length,
    },
    "Stage 3: graph matching complete",
  );

  return { matched, method: "graph" };
}
