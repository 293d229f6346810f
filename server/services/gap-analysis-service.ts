/**
 * BUSINESS LOGIC: Gap Analysis Service Layer
 * Entry points for the API layer, wrapped in the Result pattern
 *
 * @fileoverview Validates incoming requests, runs the hybrid analyzer and
 * converts every thrown error into a typed failure. Nothing here throws.
 *
 * @example
 * ```typescript
 * const service = new GapAnalysisService();
 *
 * const result = service.analyzeSkillGap({
 *   user_skills: ['Python', 'SQL'],
 *   target_job: 'Senior Data Scientist'
 * });
 *
 * if (isSuccess(result)) {
 *   console.log(result.data.learningRoadmap);
 * }
 * ```
 */

import { logger } from '../config/logger';
import { getSkillGapAnalyzer, type HybridSkillGapAnalyzer } from '../lib/skill-gap-analyzer';
import {
  success,
  failure,
  fromThrowable,
  type GapAnalysisResult,
} from '@shared/result-types';
import { AppValidationError, toAppError } from '@shared/errors';
import {
  extractedSkillSchema,
  skillGapRequestSchema,
  type ExtractedSkill,
  type JobCatalog,
  type ResolvedSkill,
  type SkillGapAnalysisResult,
} from '@shared/schema';
import type { ZodIssue } from 'zod';

function toValidationError(issues: ZodIssue[]): AppValidationError {
  const first = issues[0];
  const field = first && first.path.length > 0 ? first.path.join('.') : undefined;
  const rules = issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return new AppValidationError(
    first ? first.message : 'Invalid request',
    field,
    rules,
    { issueCount: issues.length }
  );
}

// ===== GAP ANALYSIS SERVICE IMPLEMENTATION =====

export class GapAnalysisService {
  constructor(private analyzer?: HybridSkillGapAnalyzer) {}

  // Resolved lazily: loading the knowledge store can fail, and that failure
  // must come back as a Result.
  private getAnalyzer(): HybridSkillGapAnalyzer {
    if (!this.analyzer) {
      this.analyzer = getSkillGapAnalyzer();
    }
    return this.analyzer;
  }

  /**
   * Validate a raw request body and run the full analysis.
   */
  analyzeSkillGap(request: unknown): GapAnalysisResult<SkillGapAnalysisResult> {
    const parsed = skillGapRequestSchema.safeParse(request);
    if (!parsed.success) {
      const error = toValidationError(parsed.error.issues);
      logger.warn({ field: error.field, rules: error.validationRules }, 'Skill gap request rejected');
      return failure(error);
    }

    const { user_skills, target_job, resume_text, job_desc } = parsed.data;
    return this.runAnalysis(user_skills, target_job, resume_text, job_desc);
  }

  /**
   * Analyze output of the upstream resume extractor. Only the names are used;
   * confidence and method are validated but otherwise ignored.
   */
  analyzeExtractedSkills(
    items: unknown,
    targetJob: string,
    resumeText?: string,
    jobDesc?: string
  ): GapAnalysisResult<SkillGapAnalysisResult> {
    const parsed = extractedSkillSchema.array().safeParse(items);
    if (!parsed.success) {
      return failure(toValidationError(parsed.error.issues));
    }
    if (targetJob.trim().length === 0) {
      return failure(AppValidationError.requiredField('target_job'));
    }

    const names = parsed.data.map((item: ExtractedSkill) => item.name);
    return this.runAnalysis(names, targetJob, resumeText, jobDesc);
  }

  getAvailableJobs(): GapAnalysisResult<JobCatalog> {
    return fromThrowable(
      () => {
        const jobs = this.getAnalyzer().getAvailableJobs();
        return { jobs, count: jobs.length };
      },
      (error) => toAppError(error, 'get_available_jobs')
    );
  }

  /**
   * Resolve a free-form skill name to its canonical taxonomy entry.
   * `null` data means no entry was close enough.
   */
  resolveSkill(name: string): GapAnalysisResult<ResolvedSkill | null> {
    if (name.trim().length === 0) {
      return failure(AppValidationError.requiredField('name'));
    }
    return fromThrowable(
      () => this.getAnalyzer().resolveSkill(name),
      (error) => toAppError(error, 'resolve_skill')
    );
  }

  private runAnalysis(
    userSkills: string[],
    targetJob: string,
    resumeText?: string,
    jobDesc?: string
  ): GapAnalysisResult<SkillGapAnalysisResult> {
    try {
      return success(this.getAnalyzer().analyze(userSkills, targetJob, resumeText, jobDesc));
    } catch (error) {
      const appError = toAppError(error, 'skill_gap_analysis');
      if (appError.statusCode >= 500) {
        logger.error(
          { targetJob, code: appError.code, error: appError.message },
          'Skill gap analysis failed'
        );
      } else {
        logger.warn({ targetJob, code: appError.code }, appError.message);
      }
      return failure(appError);
    }
  }
}

let service: GapAnalysisService | null = null;

export function getGapAnalysisService(): GapAnalysisService {
  if (!service) {
    service = new GapAnalysisService();
  }
  return service;
}
