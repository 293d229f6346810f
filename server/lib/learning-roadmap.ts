/**
 * Learning roadmap ordering.
 *
 * "roi" lists gaps exactly as ranked by ROI, which can put a skill ahead of
 * its own prerequisite. "prerequisite" keeps ROI as the tie-break but never
 * lists a gap before another gap it depends on.
 */

import type { RoadmapOrder, SkillGapItem } from "@shared/schema";
import { logger } from "../config/logger";
import type { JobSkillGraph } from "../types/skill-pipeline";

/**
 * Kahn's algorithm over the gap set, always taking the ready gap that ranks
 * earliest by ROI. Prerequisites that are not gaps themselves impose no
 * constraint. Gaps left on a cycle are appended in ROI order.
 */
export function orderByPrerequisites(
  gaps: readonly SkillGapItem[],
  jobGraph: JobSkillGraph,
): SkillGapItem[] {
  const rank = new Map<string, number>();
  gaps.forEach((gap, index) => rank.set(gap.skillName.toLowerCase(), index));

  const pending = new Map<string, Set<string>>();
  for (const gap of gaps) {
    const key = gap.skillName.toLowerCase();
    const prerequisites = jobGraph.get(gap.skillName)?.prerequisites ?? [];
    pending.set(
      key,
      new Set(
        prerequisites
          .map((name) => name.toLowerCase())
          .filter((name) => name !== key && rank.has(name)),
      ),
    );
  }

  const ordered: SkillGapItem[] = [];
  const placed = new Set<string>();

  while (ordered.length < gaps.length) {
    const next = gaps.find((gap) => {
      const key = gap.skillName.toLowerCase();
      if (placed.has(key)) return false;
      const waitingOn = pending.get(key);
      return !waitingOn || Array.from(waitingOn).every((name) => placed.has(name));
    });

    if (!next) {
      const remaining = gaps.filter((gap) => !placed.has(gap.skillName.toLowerCase()));
      logger.warn(
        { skills: remaining.map((gap) => gap.skillName) },
        "Prerequisite cycle among gaps; remaining skills kept in ROI order",
      );
      ordered.push(...remaining);
      break;
    }

    ordered.push(next);
    placed.add(next.skillName.toLowerCase());
  }

  return ordered;
}

export function buildLearningRoadmap(
  gaps: readonly SkillGapItem[],
  jobGraph: JobSkillGraph,
  order: RoadmapOrder,
): string[] {
  const sequence = order === "prerequisite" ? orderByPrerequisites(gaps, jobGraph) : gaps;
  return sequence.map((gap, index) => `${index + 1}. ${gap.skillName}`);
}
