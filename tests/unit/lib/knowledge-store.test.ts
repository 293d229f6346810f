/**
 * Unit Tests for the Knowledge Store
 * Job requirement loading, skill graph projection and taxonomy cross-checks
 */

import path from 'path';
import { describe, test, expect, jest } from '@jest/globals';

jest.mock('../../../server/config/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { logger } from '../../../server/config/logger';
import {
  JobRequirementStore,
  KnowledgeStore,
  getKnowledgeStore,
} from '../../../server/lib/knowledge-store';
import { SkillTaxonomy } from '../../../server/lib/skill-taxonomy';
import { AppConfigurationError } from '../../../shared/errors';

const fixture = (name: string) => path.join(__dirname, '../../fixtures', name);

describe('Knowledge Store', () => {
  describe('JobRequirementStore.load', () => {
    test('should load jobs in file order', () => {
      const store = JobRequirementStore.load(fixture('job-requirements.json'));
      expect(store.getAvailableJobs()).toEqual(['Report Analyst', 'Scripting Intern']);
      expect(store.size).toBe(2);
      expect(store.hasJob('Report Analyst')).toBe(true);
      expect(store.hasJob('report analyst')).toBe(false);
    });

    test('should keep requirement detail without applying defaults', () => {
      const store = JobRequirementStore.load(fixture('job-requirements.json'));
      expect(store.getRequirements('Report Analyst')?.get('SQL')).toEqual({
        complexity: 2,
        prerequisites: [],
        category: 'technical',
        learningHours: 60,
        salaryImpact: 6000,
      });
    });

    test('should fail open with an empty store when the file is missing', () => {
      const store = JobRequirementStore.load(fixture('no-such-jobs.json'));
      expect(store.size).toBe(0);
      expect(store.getAvailableJobs()).toEqual([]);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    test('should fail open with an empty store when the file is not JSON', () => {
      const store = JobRequirementStore.load(fixture('malformed-job-requirements.json'));
      expect(store.size).toBe(0);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('JobRequirementStore.fromData', () => {
    test('should reject data that violates the schema', () => {
      expect(() =>
        JobRequirementStore.fromData({ Analyst: { skills: { SQL: { complexity: 9 } } } })
      ).toThrow(AppConfigurationError);
    });

    test('should accept a job with no skills', () => {
      const store = JobRequirementStore.fromData({ 'Empty Role': {} });
      expect(store.getRequirements('Empty Role')?.size).toBe(0);
      expect(store.getSkillGraph('Empty Role').size).toBe(0);
    });
  });

  describe('skill graph', () => {
    const store = JobRequirementStore.load(fixture('job-requirements.json'));
    const graph = store.getSkillGraph('Report Analyst');

    test('should prefer level, then complexity, then the default level', () => {
      expect(graph.get('Python')?.level).toBe(4);
      expect(graph.get('SQL')?.level).toBe(2);
      expect(graph.get('Communication')?.level).toBe(3);
    });

    test('should carry prerequisites and category', () => {
      expect(graph.get('Python')?.prerequisites).toEqual(['SQL']);
      expect(graph.get('Communication')?.category).toBe('soft');
    });

    test('should return an empty graph for an unknown job', () => {
      expect(store.getSkillGraph('Astronaut').size).toBe(0);
      expect(store.getRequirements('Astronaut')).toBeUndefined();
    });
  });

  describe('KnowledgeStore', () => {
    test('should load both files from the configured paths', () => {
      const store = KnowledgeStore.load({
        jobRequirementsPath: fixture('job-requirements.json'),
        skillTaxonomyPath: fixture('skill-taxonomy.json'),
      });
      expect(store.jobs.size).toBe(2);
      expect(store.taxonomy.size).toBe(3);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    test('should warn about job skills the taxonomy does not know', () => {
      new KnowledgeStore(
        JobRequirementStore.fromData({
          'Legacy Developer': {
            skills: { COBOL: { prerequisites: ['Mainframe'] }, Python: {} },
          },
        }),
        SkillTaxonomy.fromData({ Python: {} })
      );

      expect(logger.warn).toHaveBeenCalledWith(
        { job: 'Legacy Developer', skills: ['COBOL', 'Mainframe'] },
        'Job references skills missing from the taxonomy'
      );
    });

    test('should ship job data fully covered by the bundled taxonomy', () => {
      const store = getKnowledgeStore();
      expect(store.jobs.getAvailableJobs()).toContain('Senior Data Scientist');
      expect(logger.warn).not.toHaveBeenCalled();
      expect(getKnowledgeStore()).toBe(store);
    });
  });
});
