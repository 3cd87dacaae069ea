/**
 * Analysis Request Resolver
 *
 * Turns raw caller input into a validated, defaulted and frozen
 * `AnalysisRequest`. Runs before any remote call; every violation is a
 * `ConfigError` listing the offending fields.
 *
 * @module domains/execution/AnalysisRequestResolver
 */

import {
  analysisRequestInputSchema,
  formatSchemaIssues,
  getAlgorithmDefinition,
  resolveAlgorithmId,
  resolveEngineSize,
  type AnalysisRequest,
  type EngineSizeId,
  type GraphSource,
} from '@graph-orchestrator/shared';
import { ConfigError } from '@/shared/errors';

/**
 * Collection written when the caller names none.
 */
export const DEFAULT_TARGET_COLLECTION = 'graph_analysis_results';

export interface RequestDefaults {
  engineSize: EngineSizeId;
  timeoutMs: number;
  database?: string;
  targetCollection?: string;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * @throws ConfigError when the input fails validation
 */
export function resolveAnalysisRequest(input: unknown, defaults: RequestDefaults): AnalysisRequest {
  const parsed = analysisRequestInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error);
    throw new ConfigError(`Invalid analysis request: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  const algorithm = resolveAlgorithmId(data.algorithm);
  if (algorithm === null) {
    // Already rejected by the schema refinement.
    throw new ConfigError(`Unsupported algorithm: ${data.algorithm}`, [`algorithm: ${data.algorithm}`]);
  }
  const definition = getAlgorithmDefinition(algorithm);

  const graph: GraphSource =
    data.namedGraph !== undefined
      ? { kind: 'named', graphName: data.namedGraph }
      : {
          kind: 'collections',
          vertexCollections: data.vertexCollections ?? [],
          edgeCollections: data.edgeCollections ?? [],
        };

  const database = data.database ?? defaults.database;

  const request: AnalysisRequest = {
    name: data.name,
    ...(data.description !== undefined ? { description: data.description } : {}),
    algorithm,
    params: { ...definition.defaultParams, ...data.params },
    graph,
    ...(data.vertexAttributes !== undefined ? { vertexAttributes: data.vertexAttributes } : {}),
    ...(database !== undefined ? { database } : {}),
    targetCollection: data.targetCollection ?? defaults.targetCollection ?? DEFAULT_TARGET_COLLECTION,
    resultAttributes: data.resultAttributes ?? [definition.resultField],
    engineSize: resolveEngineSize(data.engineSize, defaults.engineSize),
    timeoutMs: data.timeoutMs ?? defaults.timeoutMs,
    exclusiveEngine: data.exclusiveEngine ?? false,
    validateResults: data.validateResults ?? false,
  };

  return deepFreeze(request);
}

/**
 * Resolve a whole batch, collecting issues from every invalid entry.
 *
 * @throws ConfigError naming each invalid request by position
 */
export function resolveAnalysisRequests(inputs: readonly unknown[], defaults: RequestDefaults): AnalysisRequest[] {
  const resolved: AnalysisRequest[] = [];
  const issues: string[] = [];

  inputs.forEach((input, index) => {
    try {
      resolved.push(resolveAnalysisRequest(input, defaults));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      issues.push(...error.issues.map((issue) => `requests[${index}].${issue}`));
    }
  });

  if (issues.length > 0) {
    throw new ConfigError(`Invalid batch: ${issues.length} issue(s)`, issues);
  }
  return resolved;
}
