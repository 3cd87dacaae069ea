/**
 * @module domains/catalog/buildExecutionRecord
 */

import {
  getAlgorithmDefinition,
  type AnalysisRequest,
  type DeploymentMode,
  type ExecutionRecord,
  type ExecutionResult,
  type GraphReference,
} from '@graph-orchestrator/shared';

export interface RecordContext {
  deploymentMode: DeploymentMode;
  /** Database used when the request names none */
  defaultDatabase?: string;
  metadata?: Record<string, unknown>;
}

function toGraphReference(request: AnalysisRequest): GraphReference {
  if (request.graph.kind === 'named') {
    return { graphName: request.graph.graphName, vertexCollections: [], edgeCollections: [] };
  }
  return {
    graphName: null,
    vertexCollections: [...request.graph.vertexCollections],
    edgeCollections: [...request.graph.edgeCollections],
  };
}

/**
 * Catalog record for one terminal execution result.
 */
export function buildExecutionRecord(
  result: ExecutionResult,
  request: AnalysisRequest,
  context: RecordContext
): ExecutionRecord {
  const metadata: Record<string, unknown> = {
    ...context.metadata,
    phase: result.phase,
    engineId: result.engine?.id ?? null,
    engineReused: result.engine?.reused ?? false,
    graphId: result.graphId,
    jobIds: result.jobs.map((job) => job.id),
  };
  if (result.cleanupError) {
    metadata.cleanupError = result.cleanupError.message;
  }
  if (request.description !== undefined) {
    metadata.description = request.description;
  }

  return {
    executionId: result.executionId,
    timestamp: result.finishedAt,
    requestName: result.requestName,
    algorithm: request.algorithm,
    algorithmVersion: getAlgorithmDefinition(request.algorithm).version,
    parameters: { ...request.params },
    graph: toGraphReference(request),
    database: request.database ?? context.defaultDatabase ?? null,
    targetCollection: request.targetCollection,
    resultAttributes: [...request.resultAttributes],
    resultCount: result.documentsWritten,
    elapsedMs: result.elapsedMs,
    estimatedCostUsd: result.estimatedCostUsd,
    engineSize: result.engine?.size ?? null,
    deploymentMode: context.deploymentMode,
    status: result.status,
    errorMessage: result.error?.message ?? null,
    metadata,
  };
}
