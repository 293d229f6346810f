/**
 * Stage 1: lexical extraction.
 *
 * Regex scan of the resume against the taxonomy, fuzzy re-normalization of
 * each hit onto a canonical name, then term-frequency scoring against the job
 * description. Mentions outside the taxonomy are dropped without error.
 */

import { logger } from "../config/logger";
import type { ExtractionRecord, NormalizedSkill, ScoredSkill } from "../types/skill-pipeline";
import { LEXICAL_CONFIG } from "./scoring-config";
import { findBestMatch } from "./skill-normalizer";
import type { SkillTaxonomy } from "./skill-taxonomy";

/**
 * Non-overlapping, case-insensitive substring occurrences of `needle`.
 */
export function countOccurrences(text: string, needle: string): number {
  const haystack = text.toLowerCase();
  const target = needle.toLowerCase();
  if (!target) return 0;

  let count = 0;
  let index = haystack.indexOf(target);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(target, index + target.length);
  }
  return count;
}

export function regexExtractSkills(taxonomy: SkillTaxonomy, text: string): Map<string, number> {
  const skills = new Map<string, number>();

  for (const skill of taxonomy.getAllSkills()) {
    const hit = taxonomy.getPatterns(skill).some((pattern) => pattern.test(text));
    if (hit) {
      skills.set(skill, LEXICAL_CONFIG.REGEX_HIT_CONFIDENCE);
    }
  }

  return skills;
}

export function fuzzyNormalizeSkills(
  taxonomy: SkillTaxonomy,
  extracted: ReadonlyMap<string, number>,
): NormalizedSkill[] {
  const canonicalNames = taxonomy.getAllSkills();
  const normalized: NormalizedSkill[] = [];

  extracted.forEach((_confidence, skill) => {
    const match = findBestMatch(skill, canonicalNames);
    if (match && match.rating >= LEXICAL_CONFIG.FUZZY_MATCH_THRESHOLD) {
      normalized.push({
        original: skill,
        normalized: match.target,
        confidence: match.rating,
      });
    }
  });

  return normalized;
}

/**
 * Weight each skill by how often the job description mentions it, so skills
 * the job emphasises score higher.
 */
export function termFrequencyScore(
  normalized: readonly NormalizedSkill[],
  jobDescription: string,
): Map<string, ScoredSkill> {
  const scored = new Map<string, ScoredSkill>();

  for (const item of normalized) {
    const frequency = countOccurrences(jobDescription, item.normalized);
    scored.set(item.normalized, {
      confidence: item.confidence,
      tfScore: (frequency + 1) * item.confidence,
      frequency,
    });
  }

  return scored;
}

export function runLexicalExtraction(
  taxonomy: SkillTaxonomy,
  resumeText: string,
  jobDescription: string,
): ExtractionRecord {
  const extracted = regexExtractSkills(taxonomy, resumeText);
  const normalized = fuzzyNormalizeSkills(taxonomy, extracted);
  const scored = termFrequencyScore(normalized, jobDescription);

  logger.debug(
    { extracted: extracted.size, normalized: normalized.length, scored: scored.size },
    "Stage 1: lexical extraction complete",
  );

  return { extracted, normalized, scored, method: "ner" };
}
