/**
 * Types Index
 *
 * Barrel export for all shared type definitions.
 *
 * @module @graph-orchestrator/shared/types
 */

export type { Credential, CredentialSourceKind } from './credential.types';

export type {
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
} from './analysis.types';

export type {
  DeploymentMode,
  EngineStatus,
  EngineHandle,
  JobKind,
  JobStatus,
  JobHandle,
  EngineSummary,
  GraphSummary,
  EngineCapabilities,
} from './engine.types';

export type {
  ExecutionPhase,
  ExecutionStatus,
  ClassifiedError,
  PhaseTransition,
  ExecutionResult,
  BatchSummary,
  BatchResult,
} from './execution.types';

export type { GraphReference, ExecutionRecord } from './catalog.types';
