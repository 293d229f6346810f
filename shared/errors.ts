/**
 * Concrete error classes with status codes
 *
 * @fileoverview Every error the engine raises extends `BaseAppError`, so the
 * API layer can rely on a `code`, a `statusCode` and a timestamp regardless of
 * which stage failed. `toAppError` folds anything else into an internal error.
 *
 * @example
 * ```typescript
 * throw new JobNotFoundError('Senior Data Scientist');
 *
 * const appError = toAppError(unknownError, 'skill_gap_analysis');
 * console.log(appError.code);       // 'INTERNAL_ERROR'
 * console.log(appError.statusCode); // 500
 * ```
 */

import type {
  AppError,
  ValidationError,
  JobNotFound,
  ConfigurationError,
  InternalError,
} from './result-types';

// ===== BASE ERROR CLASS =====

/**
 * Base error class that all application errors extend
 */
export class BaseAppError extends Error implements AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  /** ISO timestamp when the error was created */
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.message = message;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object representation, suitable for API responses and logging
   */
  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// ===== VALIDATION ERRORS (400) =====

/**
 * Request data does not meet validation requirements
 *
 * @example
 * ```typescript
 * const error = AppValidationError.requiredField('target_job');
 * ```
 */
export class AppValidationError extends BaseAppError implements ValidationError {
  readonly code = 'VALIDATION_ERROR' as const;
  /** The field that failed validation (if applicable) */
  readonly field?: string;
  /** List of validation rules that were violated */
  readonly validationRules?: string[];

  constructor(
    message: string,
    field?: string,
    validationRules?: string[],
    details?: Record<string, unknown>
  ) {
    super('VALIDATION_ERROR', message, 400, details);
    this.field = field;
    this.validationRules = validationRules;
  }

  static requiredField(field: string): AppValidationError {
    return new AppValidationError(
      `Field '${field}' is required`,
      field,
      ['required']
    );
  }

  static invalidFormat(field: string, expectedFormat: string): AppValidationError {
    return new AppValidationError(
      `Field '${field}' has invalid format. Expected: ${expectedFormat}`,
      field,
      ['format']
    );
  }
}

// Unknown job profile (400): a caller mistake, not a missing resource
export class JobNotFoundError extends BaseAppError implements JobNotFound {
  readonly code = 'JOB_NOT_FOUND' as const;
  readonly targetJob: string;

  constructor(targetJob: string, details?: Record<string, unknown>) {
    super('JOB_NOT_FOUND', `Job profile not found: ${targetJob}`, 400, details);
    this.targetJob = targetJob;
  }
}

// ===== CONFIGURATION ERRORS (500) =====

/**
 * Malformed knowledge-store data, taxonomy conflicts or invalid environment.
 */
export class AppConfigurationError extends BaseAppError implements ConfigurationError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly source: string;

  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, 500, details);
    this.source = source;
  }

  static invalidFile(filePath: string, issues: string[]): AppConfigurationError {
    return new AppConfigurationError(
      filePath,
      `Invalid data in ${filePath}: ${issues.join('; ')}`,
      { issues }
    );
  }

  static ambiguousAlias(alias: string, claimants: string[]): AppConfigurationError {
    return new AppConfigurationError(
      'skill-taxonomy',
      `Alias '${alias}' is claimed by several skills: ${claimants.join(', ')}`,
      { alias, claimants }
    );
  }

  static duplicateSkill(name: string, existing: string): AppConfigurationError {
    return new AppConfigurationError(
      'skill-taxonomy',
      `Skill '${name}' duplicates '${existing}' (names must be unique ignoring case)`,
      { name, existing }
    );
  }

  static embeddingDimensionMismatch(provider: string, expected: number, actual: number): AppConfigurationError {
    return new AppConfigurationError(
      'embedding-provider',
      `Embedding provider '${provider}' returned ${actual} dimensions, expected ${expected}`,
      { provider, expected, actual }
    );
  }
}

// ===== INTERNAL ERRORS (500) =====

export class AppInternalError extends BaseAppError implements InternalError {
  readonly code = 'INTERNAL_ERROR' as const;
  readonly operation: string;

  constructor(operation: string, message: string, details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, 500, details);
    this.operation = operation;
  }
}

// ===== ERROR CONVERSION UTILITIES =====

/**
 * Converts unknown errors to typed application errors. Known engine errors
 * pass through unchanged; anything else becomes an internal error.
 *
 * @param context - Where the error occurred
 *
 * @example
 * ```typescript
 * try {
 *   analyzer.analyze(skills, job);
 * } catch (unknownError) {
 *   return failure(toAppError(unknownError, 'skill_gap_analysis'));
 * }
 * ```
 */
export function toAppError(
  error: unknown,
  context = 'Unknown operation'
): AppValidationError | JobNotFoundError | AppConfigurationError | AppInternalError {
  if (
    error instanceof AppValidationError ||
    error instanceof JobNotFoundError ||
    error instanceof AppConfigurationError ||
    error instanceof AppInternalError
  ) {
    return error;
  }

  if (error instanceof Error) {
    return new AppInternalError(context, error.message, { errorName: error.name });
  }

  // Fallback for non-Error objects (strings, objects, etc.)
  return new AppInternalError(
    context,
    `Unknown error in ${context}: ${String(error)}`,
    { originalError: error }
  );
}
