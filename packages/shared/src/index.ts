/**
 * @graph-orchestrator/shared
 *
 * Contract package for the graph analytics orchestrator: the canonical
 * request, handle and result shapes, error codes, the algorithm catalogue
 * and request validation schemas.
 *
 * @module @graph-orchestrator/shared
 *
 * @example
 * ```typescript
 * import type { AnalysisRequest, ExecutionResult } from '@graph-orchestrator/shared';
 * import { ErrorCode, ALGORITHM_CATALOG } from '@graph-orchestrator/shared';
 * import { analysisRequestInputSchema } from '@graph-orchestrator/shared/schemas';
 * ```
 */

// ============================================
// Types
// ============================================
export type {
  Credential,
  CredentialSourceKind,
  AlgorithmId,
  EngineSizeId,
  EngineSizeAlias,
  AlgorithmParamValue,
  AlgorithmParams,
  NamedGraphSource,
  CollectionGraphSource,
  GraphSource,
  AnalysisRequestInput,
  AnalysisRequest,
  DeploymentMode,
  EngineStatus,
  EngineHandle,
  JobKind,
  JobStatus,
  JobHandle,
  EngineSummary,
  GraphSummary,
  EngineCapabilities,
  ExecutionPhase,
  ExecutionStatus,
  ClassifiedError,
  PhaseTransition,
  ExecutionResult,
  BatchSummary,
  BatchResult,
  GraphReference,
  ExecutionRecord,
} from './types';

// ============================================
// Constants
// ============================================
export {
  ErrorCode,
  ERROR_MESSAGES,
  RETRYABLE_ERROR_CODES,
  getErrorMessage,
  isRetryableErrorCode,
  isValidErrorCode,
  ALGORITHM_CATALOG,
  SUPPORTED_ALGORITHMS,
  isAlgorithmId,
  resolveAlgorithmId,
  getAlgorithmDefinition,
  ENGINE_SIZES,
  DEFAULT_ENGINE_SIZE,
  ENGINE_SIZE_ALIASES,
  isEngineSizeId,
  isEngineSizeAlias,
  resolveEngineSize,
  TERMINAL_JOB_STATUSES,
  isTerminalJobStatus,
} from './constants';
export type { AlgorithmDefinition } from './constants';

// ============================================
// Schemas
// ============================================
export {
  analysisRequestInputSchema,
  formatSchemaIssues,
} from './schemas';
export type { AnalysisRequestInputData } from './schemas';
