/**
 * Orchestration Errors
 *
 * Error taxonomy for the orchestrator. Every error carries a stable
 * `ErrorCode`; retryability is derived from the code, never guessed from
 * the message.
 *
 * @module shared/errors/orchestration
 */

import { ErrorCode, getErrorMessage, isRetryableErrorCode } from '@graph-orchestrator/shared';

export interface OrchestrationErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
  /** Overrides the retryability derived from the code. */
  retryable?: boolean;
}

/**
 * Base class for all orchestration failures.
 */
export class OrchestrationError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message?: string, options: OrchestrationErrorOptions = {}) {
    super(message ?? getErrorMessage(code), options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'OrchestrationError';
    this.code = code;
    this.retryable = options.retryable ?? isRetryableErrorCode(code);
    this.details = options.details;
  }
}

/**
 * Credential could not be acquired, or the engine rejected it after re-authentication.
 */
export class AuthError extends OrchestrationError {
  constructor(message?: string, options?: OrchestrationErrorOptions) {
    super(ErrorCode.AUTH_ERROR, message, options);
    this.name = 'AuthError';
  }
}

/**
 * Invalid request or configuration. Raised before any remote call.
 */
export class ConfigError extends OrchestrationError {
  readonly issues: string[];

  constructor(message?: string, issues: string[] = [], options?: OrchestrationErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, {
      ...options,
      details: { ...options?.details, issues },
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Network failure, timeout, 408, 429 or 5xx. The only retryable class.
 */
export class TransientNetworkError extends OrchestrationError {
  readonly status?: number;

  constructor(message?: string, status?: number, options?: OrchestrationErrorOptions) {
    super(ErrorCode.TRANSIENT_NETWORK_ERROR, message, {
      ...options,
      details: status === undefined ? options?.details : { ...options?.details, status },
    });
    this.name = 'TransientNetworkError';
    this.status = status;
  }
}

/**
 * Non-retryable HTTP rejection from the engine or management API.
 */
export class EngineApiError extends OrchestrationError {
  readonly status: number;
  readonly notFound: boolean;

  constructor(status: number, message?: string, options?: OrchestrationErrorOptions) {
    super(ErrorCode.ENGINE_API_ERROR, message, {
      ...options,
      details: { ...options?.details, status },
    });
    this.name = 'EngineApiError';
    this.status = status;
    this.notFound = status === 404;
  }
}

export class JobFailedError extends OrchestrationError {
  readonly jobId: string;

  constructor(jobId: string, message?: string, options?: OrchestrationErrorOptions) {
    super(ErrorCode.JOB_FAILED, message, {
      ...options,
      details: { ...options?.details, jobId },
    });
    this.name = 'JobFailedError';
    this.jobId = jobId;
  }
}

export class TimeoutExceededError extends OrchestrationError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message?: string, options?: OrchestrationErrorOptions) {
    super(ErrorCode.TIMEOUT_EXCEEDED, message, {
      ...options,
      details: { ...options?.details, timeoutMs },
    });
    this.name = 'TimeoutExceededError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Teardown failed. The engine may still be running and billing.
 */
export class CleanupError extends OrchestrationError {
  readonly engineId: string;

  constructor(engineId: string, message?: string, options?: OrchestrationErrorOptions) {
    super(ErrorCode.CLEANUP_ERROR, message, {
      ...options,
      details: { ...options?.details, engineId },
    });
    this.name = 'CleanupError';
    this.engineId = engineId;
  }
}

/**
 * Stored results failed a sanity check. The algorithm itself finished.
 */
export class ResultValidationError extends OrchestrationError {
  readonly issues: string[];

  constructor(issues: string[], options?: OrchestrationErrorOptions) {
    super(ErrorCode.RESULT_VALIDATION_FAILED, `Result validation failed: ${issues.join('; ')}`, {
      ...options,
      details: { ...options?.details, issues },
    });
    this.name = 'ResultValidationError';
    this.issues = issues;
  }
}

export class CancelledError extends OrchestrationError {
  constructor(message?: string, options?: OrchestrationErrorOptions) {
    super(ErrorCode.CANCELLED, message, options);
    this.name = 'CancelledError';
  }
}
