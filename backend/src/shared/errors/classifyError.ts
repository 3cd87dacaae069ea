/**
 * Error classification helpers.
 *
 * @module shared/errors/classifyError
 */

import { ErrorCode, getErrorMessage, type ClassifiedError } from '@graph-orchestrator/shared';
import { OrchestrationError } from './orchestration.errors';

/**
 * Reduce any thrown value to a serializable `ClassifiedError`.
 * Unknown errors become non-retryable `INTERNAL_ERROR`.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof OrchestrationError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      ...(error.details ? { details: error.details } : {}),
    };
  }

  return {
    code: ErrorCode.INTERNAL_ERROR,
    message: error instanceof Error ? error.message : String(error) || getErrorMessage(ErrorCode.INTERNAL_ERROR),
    retryable: false,
  };
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof OrchestrationError && error.retryable;
}

/**
 * Best-effort message extraction for log lines.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
