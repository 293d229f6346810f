/**
 * Unit Tests for the Skill Taxonomy
 * Alias ownership, whole-word patterns and name resolution
 */

import path from 'path';
import { describe, test, expect, jest } from '@jest/globals';

jest.mock('../../../server/config/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { logger } from '../../../server/config/logger';
import { SkillTaxonomy, wholeWordPattern } from '../../../server/lib/skill-taxonomy';
import { AppConfigurationError } from '../../../shared/errors';
import { testTaxonomy } from '../../fixtures/test-data';

describe('Skill Taxonomy', () => {
  describe('wholeWordPattern', () => {
    test('should match whole words only, ignoring case', () => {
      const pattern = wholeWordPattern('Git');
      expect(pattern.test('Versioned with git daily')).toBe(true);
      expect(pattern.test('Hosted on GitHub')).toBe(false);
    });

    test('should match names ending in symbols', () => {
      expect(wholeWordPattern('C++').test('Expert in C++ and Go')).toBe(true);
      expect(wholeWordPattern('C#').test('Wrote C# services')).toBe(true);
      expect(wholeWordPattern('Node.js').test('Used nodeXjs once')).toBe(false);
    });
  });

  describe('construction', () => {
    test('should expose canonical names in file order', () => {
      const taxonomy = SkillTaxonomy.fromData(testTaxonomy);
      expect(taxonomy.getAllSkills()).toEqual([
        'Python',
        'Statistics',
        'Machine Learning',
        'SQL',
        'Deep Learning',
        'Linear Algebra',
      ]);
      expect(taxonomy.size).toBe(6);
    });

    test('should apply default aliases and category', () => {
      const taxonomy = SkillTaxonomy.fromData({ Rust: {} });
      expect(taxonomy.getSkillInfo('rust')).toEqual({
        canonical: 'Rust',
        aliases: [],
        category: 'technical',
      });
    });

    test('should give an alias equal to a canonical name to that skill', () => {
      const taxonomy = SkillTaxonomy.fromData({
        Git: { aliases: ['git version control'] },
        GitHub: { aliases: ['git', 'git hub'] },
      });

      expect(taxonomy.getSkillInfo('GitHub')?.aliases).toEqual(['git hub']);
      expect(taxonomy.getSkillInfo('Git')?.aliases).toEqual(['git version control']);
      expect(logger.warn).toHaveBeenCalledWith(
        { alias: 'git', owner: 'Git', dropped: ['GitHub'] },
        "Alias matches another skill's canonical name; dropped from other entries"
      );
    });

    test('should reject an alias claimed by two skills', () => {
      expect(() =>
        SkillTaxonomy.fromData({
          Kubernetes: { aliases: ['orchestration'] },
          Airflow: { aliases: ['Orchestration'] },
        })
      ).toThrow(AppConfigurationError);
    });

    test('should reject canonical names that differ only by case', () => {
      expect(() => SkillTaxonomy.fromData({ Python: {}, python: {} })).toThrow(
        "Skill 'python' duplicates 'Python' (names must be unique ignoring case)"
      );
    });

    test('should reject data that violates the file schema', () => {
      expect(() => SkillTaxonomy.fromData({ Python: { aliases: 'py' } }, 'broken.json')).toThrow(
        AppConfigurationError
      );
    });
  });

  describe('load', () => {
    test('should load the taxonomy file', () => {
      const taxonomy = SkillTaxonomy.load(path.join(__dirname, '../../fixtures/skill-taxonomy.json'));
      expect(taxonomy.getAllSkills()).toEqual(['Python', 'SQL', 'Communication']);
      expect(taxonomy.getSkillInfo('Communication')?.category).toBe('soft');
    });

    test('should throw when the file is missing', () => {
      expect(() =>
        SkillTaxonomy.load(path.join(__dirname, '../../fixtures/no-such-taxonomy.json'))
      ).toThrow(AppConfigurationError);
    });
  });

  describe('lookups', () => {
    const taxonomy = SkillTaxonomy.fromData(testTaxonomy);

    test('should look up skills ignoring case', () => {
      expect(taxonomy.has('machine learning')).toBe(true);
      expect(taxonomy.has('Cooking')).toBe(false);
      expect(taxonomy.getSkillInfo('sql')?.canonical).toBe('SQL');
    });

    test('should build patterns for the canonical name and its aliases', () => {
      expect(taxonomy.getPatterns('Statistics')).toHaveLength(3);
      expect(taxonomy.getPatterns('Unknown')).toEqual([]);
    });

    test('should resolve an exact canonical name with full confidence', () => {
      expect(taxonomy.findSkillByName('PYTHON')).toEqual({ skill: 'Python', confidence: 1 });
    });

    test('should resolve an alias to its canonical skill', () => {
      expect(taxonomy.findSkillByName('statistical analysis')).toEqual({
        skill: 'Statistics',
        confidence: 1,
      });
      expect(taxonomy.findSkillByName('Analysis Statistical')).toEqual({
        skill: 'Statistics',
        confidence: 1,
      });
    });

    test('should resolve a name that contains every token of an alias', () => {
      expect(taxonomy.findSkillByName('neural networks engineer')).toEqual({
        skill: 'Deep Learning',
        confidence: 1,
      });

      const narrow = SkillTaxonomy.fromData({ 'Machine Learning': { aliases: ['deep learning'] } });
      expect(narrow.findSkillByName('deep learning engineer')).toEqual({
        skill: 'Machine Learning',
        confidence: 1,
      });
    });

    test('should return null when nothing is close enough', () => {
      expect(taxonomy.findSkillByName('Cooking')).toBeNull();
    });
  });
});
