/**
 * Error Constants
 *
 * Centralized error codes and default messages for the orchestration
 * error taxonomy. Retryability is a property of the code.
 *
 * @module @graph-orchestrator/shared/constants/errors
 */

export enum ErrorCode {
  AUTH_ERROR = 'AUTH_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  TRANSIENT_NETWORK_ERROR = 'TRANSIENT_NETWORK_ERROR',
  ENGINE_API_ERROR = 'ENGINE_API_ERROR',
  JOB_FAILED = 'JOB_FAILED',
  TIMEOUT_EXCEEDED = 'TIMEOUT_EXCEEDED',
  CLEANUP_ERROR = 'CLEANUP_ERROR',
  CANCELLED = 'CANCELLED',
  RESULT_VALIDATION_FAILED = 'RESULT_VALIDATION_FAILED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.AUTH_ERROR]: 'Could not acquire a credential for the analytics engine',
  [ErrorCode.CONFIG_ERROR]: 'The analysis request or configuration is invalid',
  [ErrorCode.TRANSIENT_NETWORK_ERROR]: 'The analytics engine could not be reached',
  [ErrorCode.ENGINE_API_ERROR]: 'The analytics engine rejected the request',
  [ErrorCode.JOB_FAILED]: 'The engine reported the job as failed',
  [ErrorCode.TIMEOUT_EXCEEDED]: 'The job did not finish within its wait budget',
  [ErrorCode.CLEANUP_ERROR]: 'The engine could not be torn down; delete it manually',
  [ErrorCode.CANCELLED]: 'The execution was cancelled',
  [ErrorCode.RESULT_VALIDATION_FAILED]: 'The stored results failed validation',
  [ErrorCode.INTERNAL_ERROR]: 'An unexpected error occurred',
};

/**
 * Codes the retry policy may retry. Everything else is fatal on first sight.
 */
export const RETRYABLE_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.TRANSIENT_NETWORK_ERROR,
]);

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

export function isRetryableErrorCode(code: ErrorCode): boolean {
  return RETRYABLE_ERROR_CODES.has(code);
}

export function isValidErrorCode(value: string): value is ErrorCode {
  return Object.values<string>(ErrorCode).includes(value);
}
