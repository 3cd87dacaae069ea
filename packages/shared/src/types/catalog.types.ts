/**
 * Execution Catalog Types
 *
 * Record emitted to the external execution-history catalog after every
 * terminal execution result.
 *
 * @module @graph-orchestrator/shared/types/catalog
 */

import type { AlgorithmId, AlgorithmParams, EngineSizeId } from './analysis.types';
import type { DeploymentMode } from './engine.types';
import type { ExecutionStatus } from './execution.types';

export interface GraphReference {
  graphName: string | null;
  vertexCollections: string[];
  edgeCollections: string[];
}

export interface ExecutionRecord {
  executionId: string;
  /** ISO timestamp of the terminal state */
  timestamp: string;
  requestName: string;
  algorithm: AlgorithmId;
  algorithmVersion: string;
  parameters: AlgorithmParams;
  graph: GraphReference;
  database: string | null;
  targetCollection: string;
  resultAttributes: string[];
  resultCount: number;
  elapsedMs: number;
  estimatedCostUsd: number;
  engineSize: EngineSizeId | null;
  deploymentMode: DeploymentMode;
  status: ExecutionStatus;
  errorMessage: string | null;
  metadata: Record<string, unknown>;
}
