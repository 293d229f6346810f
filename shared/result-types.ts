/**
 * Result pattern for the engine's service boundary
 *
 * @fileoverview The analysis service never throws to its callers. Every
 * operation returns either a `Success` carrying data or a `Failure` carrying
 * a typed error, so the surrounding API layer can map outcomes to responses
 * without try/catch.
 *
 * @example
 * ```typescript
 * const result = service.analyzeSkillGap(request);
 * if (isSuccess(result)) {
 *   console.log(result.data.matchPercentage);
 * } else {
 *   console.error(result.error.code);
 * }
 * ```
 */

// ===== CORE RESULT TYPES =====

/**
 * Either success with data or failure with an error.
 *
 * @template T - The type of data returned on success
 * @template E - The type of error returned on failure (defaults to AppError)
 */
export type Result<T, E = AppError> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly success: true;
  readonly data: T;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
}

// ===== RESULT CONSTRUCTORS =====

export const success = <T>(data: T): Success<T> => ({ success: true, data });

export const failure = <E>(error: E): Failure<E> => ({ success: false, error });

// ===== ERROR SHAPES =====

// Base application error interface
export interface AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  readonly timestamp?: string;
}

export interface ValidationError extends AppError {
  readonly code: 'VALIDATION_ERROR';
  readonly field?: string;
  readonly validationRules?: string[];
}

/**
 * The requested job profile is not in the requirement store.
 * Reported as a caller mistake (400), never retried.
 */
export interface JobNotFound extends AppError {
  readonly code: 'JOB_NOT_FOUND';
  readonly targetJob: string;
}

export interface ConfigurationError extends AppError {
  readonly code: 'CONFIGURATION_ERROR';
  readonly source: string;
}

export interface InternalError extends AppError {
  readonly code: 'INTERNAL_ERROR';
  readonly operation: string;
}

// Union of all possible error types
export type ApplicationError =
  | ValidationError
  | JobNotFound
  | ConfigurationError
  | InternalError;

// Result type for every service operation
export type GapAnalysisResult<T> = Result<T, ApplicationError>;

// ===== TYPE GUARDS =====

/**
 * @example
 * ```typescript
 * if (isSuccess(result)) {
 *   console.log(result.data); // TypeScript knows this is T
 * }
 * ```
 */
export const isSuccess = <T, E>(result: Result<T, E>): result is Success<T> => {
  return result.success === true;
};

export const isFailure = <T, E>(result: Result<T, E>): result is Failure<E> => {
  return result.success === false;
};

// ===== RESULT TRANSFORMATION UTILITIES =====

/**
 * Transforms the data in a successful Result while preserving failures
 *
 * @example
 * ```typescript
 * const jobs = mapResult(service.getAvailableJobs(), (catalog) => catalog.jobs);
 * ```
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  transform: (data: T) => U
): Result<U, E> => {
  return isSuccess(result)
    ? success(transform(result.data))
    : result;
};

/**
 * Chains Results together, similar to Promise.then() but for Results
 */
export const chainResult = <T, U, E>(
  result: Result<T, E>,
  next: (data: T) => Result<U, E>
): Result<U, E> => {
  return isSuccess(result)
    ? next(result.data)
    : result;
};

/**
 * Runs a synchronous operation, capturing anything it throws as a Failure
 */
export const fromThrowable = <T, E>(
  operation: () => T,
  errorTransform: (error: unknown) => E
): Result<T, E> => {
  try {
    return success(operation());
  } catch (error) {
    return failure(errorTransform(error));
  }
};
