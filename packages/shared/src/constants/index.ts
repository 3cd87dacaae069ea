/**
 * Constants Index
 *
 * Barrel export for all shared constants.
 *
 * @module @graph-orchestrator/shared/constants
 */

export {
  ErrorCode,
  ERROR_MESSAGES,
  RETRYABLE_ERROR_CODES,
  getErrorMessage,
  isRetryableErrorCode,
  isValidErrorCode,
} from './errors';

export {
  ALGORITHM_CATALOG,
  SUPPORTED_ALGORITHMS,
  isAlgorithmId,
  resolveAlgorithmId,
  getAlgorithmDefinition,
  type AlgorithmDefinition,
} from './algorithms';

export {
  ENGINE_SIZES,
  DEFAULT_ENGINE_SIZE,
  ENGINE_SIZE_ALIASES,
  isEngineSizeId,
  isEngineSizeAlias,
  resolveEngineSize,
  TERMINAL_JOB_STATUSES,
  isTerminalJobStatus,
} from './engine.constants';
