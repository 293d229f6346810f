/**
 * Skill taxonomy: canonical skill names, their aliases and categories.
 *
 * Alias ownership is settled once, at construction:
 * - an alias that equals another entry's canonical name (ignoring case)
 *   belongs to that entry, and the other claimants drop it;
 * - any other alias claimed by more than one entry is rejected.
 * After that every alias resolves to exactly one canonical skill, so lookups
 * never depend on iteration order.
 */

import fs from "fs";
import { AppConfigurationError } from "@shared/errors";
import {
  skillTaxonomyFileSchema,
  type ResolvedSkill,
} from "@shared/schema";
import { logger } from "../config/logger";
import { LEXICAL_CONFIG } from "./scoring-config";
import { tokenSetSimilarity } from "./skill-normalizer";

export interface TaxonomyEntry {
  canonical: string;
  /** Lowercased aliases owned by this entry (never the canonical name itself) */
  aliases: readonly string[];
  category: string;
}

function fold(text: string): string {
  return text.trim().toLowerCase();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-word pattern. Lookarounds instead of \b so that
 * names ending in symbols ("C++", "C#") still match.
 */
export function wholeWordPattern(term: string): RegExp {
  return new RegExp(`(?<!\\w)${escapeRegExp(term)}(?!\\w)`, "i");
}

export class SkillTaxonomy {
  private readonly entries: readonly TaxonomyEntry[];
  private readonly byName = new Map<string, TaxonomyEntry>();
  private readonly patterns = new Map<string, readonly RegExp[]>();

  private constructor(rawEntries: ReadonlyArray<{ canonical: string; aliases: string[]; category: string }>) {
    for (const raw of rawEntries) {
      const existing = this.byName.get(fold(raw.canonical));
      if (existing) {
        throw AppConfigurationError.duplicateSkill(raw.canonical, existing.canonical);
      }
      this.byName.set(fold(raw.canonical), { canonical: raw.canonical, aliases: [], category: raw.category });
    }

    const owners = this.resolveAliasOwners(rawEntries);

    this.entries = rawEntries.map((raw) => {
      const canonicalKey = fold(raw.canonical);
      const owned: string[] = [];
      for (const alias of raw.aliases.map(fold)) {
        if (alias === canonicalKey || owned.includes(alias)) continue;
        if (owners.get(alias) === raw.canonical) {
          owned.push(alias);
        }
      }
      const entry: TaxonomyEntry = Object.freeze({
        canonical: raw.canonical,
        aliases: Object.freeze(owned),
        category: raw.category,
      });
      this.byName.set(canonicalKey, entry);
      this.patterns.set(
        raw.canonical,
        [raw.canonical, ...owned].map(wholeWordPattern),
      );
      return entry;
    });
  }

  private resolveAliasOwners(
    rawEntries: ReadonlyArray<{ canonical: string; aliases: string[] }>,
  ): Map<string, string> {
    const claims = new Map<string, string[]>();
    for (const raw of rawEntries) {
      for (const alias of new Set(raw.aliases.map(fold))) {
        const claimants = claims.get(alias) ?? [];
        claimants.push(raw.canonical);
        claims.set(alias, claimants);
      }
    }

    const owners = new Map<string, string>();
    claims.forEach((claimants, alias) => {
      const namedOwner = this.byName.get(alias);
      if (namedOwner) {
        const dropped = claimants.filter((name) => name !== namedOwner.canonical);
        if (dropped.length > 0) {
          logger.warn(
            { alias, owner: namedOwner.canonical, dropped },
            "Alias matches another skill's canonical name; dropped from other entries",
          );
        }
        owners.set(alias, namedOwner.canonical);
        return;
      }
      if (claimants.length > 1) {
        throw AppConfigurationError.ambiguousAlias(alias, claimants);
      }
      owners.set(alias, claimants[0]);
    });
    return owners;
  }

  /**
   * Validate raw taxonomy data (the JSON file shape) and build a taxonomy.
   */
  static fromData(data: unknown, source = "skill-taxonomy"): SkillTaxonomy {
    const parsed = skillTaxonomyFileSchema.safeParse(data);
    if (!parsed.success) {
      throw AppConfigurationError.invalidFile(
        source,
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      );
    }
    return new SkillTaxonomy(
      Object.entries(parsed.data).map(([canonical, info]) => ({
        canonical,
        aliases: info.aliases,
        category: info.category,
      })),
    );
  }

  /**
   * Load the taxonomy file. Unlike the job store this does not fail open:
   * without a vocabulary no skill can ever be extracted.
   */
  static load(filePath: string): SkillTaxonomy {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new AppConfigurationError(
        filePath,
        `Skill taxonomy could not be read from ${filePath}`,
        { originalError: error instanceof Error ? error.message : String(error) },
      );
    }
    const taxonomy = SkillTaxonomy.fromData(data, filePath);
    logger.info({ skills: taxonomy.size, filePath }, "Skill taxonomy loaded");
    return taxonomy;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Canonical names in file order */
  getAllSkills(): string[] {
    return this.entries.map((entry) => entry.canonical);
  }

  getSkillInfo(name: string): TaxonomyEntry | undefined {
    return this.byName.get(fold(name));
  }

  has(name: string): boolean {
    return this.byName.has(fold(name));
  }

  /** Whole-word patterns for the canonical name followed by its aliases */
  getPatterns(canonical: string): readonly RegExp[] {
    return this.patterns.get(canonical) ?? [];
  }

  /**
   * Resolve a free-form skill name. An exact canonical name (ignoring case)
   * resolves with confidence 1.0; otherwise the closest alias by token-set
   * similarity wins if it scores above the lookup threshold.
   */
  findSkillByName(name: string): ResolvedSkill | null {
    const exact = this.getSkillInfo(name);
    if (exact) {
      return { skill: exact.canonical, confidence: 1.0 };
    }

    let best: ResolvedSkill | null = null;
    for (const entry of this.entries) {
      for (const alias of entry.aliases) {
        const score = tokenSetSimilarity(name, alias);
        if (best === null || score > best.confidence) {
          best = { skill: entry.canonical, confidence: score };
        }
      }
    }

    if (best && best.confidence > LEXICAL_CONFIG.ALIAS_LOOKUP_THRESHOLD) {
      return best;
    }
    return null;
  }
}
