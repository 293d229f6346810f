/**
 * Unit Tests for Graph Matching
 */

import { describe, test, expect } from '@jest/globals';
import { classifySkill, runGraphMatching } from '../../../server/lib/graph-matching';
import type {
  EnrichedSkill,
  EnrichmentRecord,
  JobSkillGraph,
  SkillGraphNode,
} from '../../../server/types/skill-pipeline';

const node = (prerequisites: string[], level = 3): SkillGraphNode => ({
  level,
  prerequisites,
  category: 'technical',
});

const enrichedWith = (...skills: string[]): EnrichmentRecord => ({
  enriched: skills.map(
    (skill): EnrichedSkill => ({
      skill,
      confidence: 1,
      tfScore: 1,
      embedding: [],
      contextScore: 0.28,
      similarSkills: [],
    })
  ),
  method: 'semantic',
});

describe('Graph Matching', () => {
  describe('classifySkill', () => {
    const user = new Set(['python', 'statistics']);

    test('should classify a skill the user has as direct, ignoring case', () => {
      expect(classifySkill('PYTHON', node([]), user)).toBe('direct');
    });

    test('should classify a skill whose prerequisites are all met', () => {
      expect(classifySkill('Machine Learning', node(['Python', 'Statistics']), user)).toBe(
        'prerequisite_met'
      );
    });

    test('should classify a skill with an unmet prerequisite as missing', () => {
      expect(classifySkill('Deep Learning', node(['Python', 'Linear Algebra']), user)).toBe(
        'missing'
      );
    });

    test('should never treat an empty prerequisite list as met', () => {
      expect(classifySkill('SQL', node([]), user)).toBe('missing');
    });
  });

  describe('runGraphMatching', () => {
    const jobGraph: JobSkillGraph = new Map([
      ['Python', node([], 3)],
      ['Statistics', node([], 3)],
      ['Machine Learning', node(['Python', 'Statistics'], 5)],
      ['SQL', node([], 2)],
    ]);

    test('should classify every required skill exactly once, in graph order', () => {
      const record = runGraphMatching(enrichedWith('python', 'Statistics', 'Docker'), jobGraph);

      expect(record.method).toBe('graph');
      expect(record.matched).toEqual([
        { skill: 'Python', type: 'direct', matchScore: 1, level: 3 },
        { skill: 'Statistics', type: 'direct', matchScore: 1, level: 3 },
        { skill: 'Machine Learning', type: 'prerequisite_met', matchScore: 0.7, level: 5 },
        { skill: 'SQL', type: 'missing', matchScore: 0, level: 2 },
      ]);
    });

    test('should mark everything missing when nothing was extracted', () => {
      const record = runGraphMatching(enrichedWith(), jobGraph);
      expect(record.matched.map((m) => m.type)).toEqual(['missing', 'missing', 'missing', 'missing']);
    });

    test('should return no matches for an empty graph', () => {
      expect(runGraphMatching(enrichedWith('Python'), new Map()).matched).toEqual([]);
    });
  });
});
