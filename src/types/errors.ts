/**
 * Structured Error System for the SLG Learner
 *
 * Provides machine-readable errors with codes and suggestions.
 */

/**
 * Error codes for learner operations
 */
export type LearnerErrorCode =
  | 'INPUT_ERROR'           // Missing/unreadable corpus, or no sentences
  | 'CONFIGURATION_ERROR'   // Invalid length policy or option value
  | 'RENDER_ERROR'          // Graph renderer failed to write its output
  | 'DEGENERATE_RESULT';    // Graph without edges (warning only)

/**
 * Structured error with code, message and suggestion
 */
export interface LearnerError {
  code: LearnerErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending path or option
  details?: Record<string, unknown>;
}

/**
 * Non-fatal outcome surfaced next to a result
 */
export interface LearnerWarning extends LearnerError {
  code: 'DEGENERATE_RESULT';
}

/**
 * Exception class wrapping LearnerError for throw/catch patterns
 */
export class LearnerException extends Error {
  public readonly error: LearnerError;

  constructor(error: LearnerError) {
    super(error.message);
    this.name = 'LearnerException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LearnerException);
    }
  }

  get code(): LearnerErrorCode {
    return this.error.code;
  }

  toJSON(): LearnerError {
    return this.error;
  }
}

/**
 * Create an input error (missing path, unreadable file, empty corpus)
 */
export function createInputError(
  message: string,
  context?: string,
  details?: Record<string, unknown>
): LearnerException {
  return new LearnerException({
    code: 'INPUT_ERROR',
    message,
    suggestion: 'Pass a readable corpus file or directory with --input, or use --demo',
    context,
    details,
  });
}

/**
 * Create a configuration error for an invalid option value
 */
export function createConfigurationError(
  message: string,
  context?: string,
  details?: Record<string, unknown>
): LearnerException {
  return new LearnerException({
    code: 'CONFIGURATION_ERROR',
    message,
    suggestion: 'Run with --help to list the accepted options',
    context,
    details,
  });
}

/**
 * Create a render error
 */
export function createRenderError(
  message: string,
  details?: Record<string, unknown>
): LearnerException {
  return new LearnerException({
    code: 'RENDER_ERROR',
    message: `Graph rendering failed: ${message}`,
    details,
  });
}

/**
 * Create the warning for a substitution graph with no edges.
 * Never thrown: the run still completes.
 */
export function createDegenerateResultWarning(
  substringCount: number,
  contextCount: number
): LearnerWarning {
  const message = substringCount === 0
    ? 'The corpus produced no substrings; no congruence classes can be formed'
    : `No two of the ${substringCount} substrings share a context; every class is a singleton`;
  return {
    code: 'DEGENERATE_RESULT',
    message,
    suggestion: 'Add sentences that vary in a single position, or lower --min-length',
    details: { substringCount, contextCount },
  };
}

/**
 * Serialize a LearnerError for JSON output
 */
export function serializeLearnerError(error: LearnerError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

export function isLearnerException(e: unknown): e is LearnerException {
  return e instanceof LearnerException;
}
