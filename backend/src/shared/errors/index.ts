/**
 * @module shared/errors
 */

export {
  OrchestrationError,
  AuthError,
  ConfigError,
  TransientNetworkError,
  EngineApiError,
  JobFailedError,
  TimeoutExceededError,
  CleanupError,
  CancelledError,
  ResultValidationError,
} from './orchestration.errors';
export type { OrchestrationErrorOptions } from './orchestration.errors';
export { classifyError, isRetryableError, errorMessage } from './classifyError';
