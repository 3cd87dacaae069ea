/**
 * Result Validator
 *
 * Sanity checks over a sample of stored result documents:
 *
 * - the result attribute appears in at least one sample
 * - component algorithms did not put every vertex in its own component
 * - vertex ids only come from the requested vertex collections
 *
 * Issues fail the execution as `partial`; warnings are reported only.
 *
 * @module domains/execution/ResultValidator
 */

import type { AlgorithmId, AnalysisRequest } from '@graph-orchestrator/shared';

/** Documents sampled from the target collection */
export const RESULT_SAMPLE_SIZE = 100;

const COMPONENT_ALGORITHMS: ReadonlySet<AlgorithmId> = new Set<AlgorithmId>(['wcc', 'scc']);

// Above this many sampled vertices, a near 1:1 component ratio is worth a warning
const WEAK_CLUSTERING_MIN_VERTICES = 10;
const WEAK_CLUSTERING_RATIO = 0.9;

export interface ResultValidation {
  issues: string[];
  warnings: string[];
}

type ResultDocument = Record<string, unknown>;

function readKey(document: ResultDocument, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = document[key];
    if (typeof value === 'string' && value !== '') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return null;
}

function vertexIdOf(document: ResultDocument): string | null {
  return readKey(document, 'id', 'vertex_id');
}

function checkResultField(samples: readonly ResultDocument[], field: string): string | null {
  if (samples.some((document) => field in document)) {
    return null;
  }
  const found = new Set<string>();
  for (const document of samples) {
    for (const key of Object.keys(document)) found.add(key);
  }
  return `Results missing expected field '${field}'. Found fields: ${[...found].sort().join(', ')}`;
}

function checkComponents(samples: readonly ResultDocument[], field: string, result: ResultValidation): void {
  const vertices = new Set<string>();
  const components = new Set<string>();

  for (const document of samples) {
    const vertexId = vertexIdOf(document);
    if (vertexId) vertices.add(vertexId);
    const component = readKey(document, 'component', field);
    if (component) components.add(component);
  }

  if (components.size > 0 && components.size === vertices.size) {
    result.issues.push(
      `Every vertex is its own component (${components.size} components for ${vertices.size} vertices)`
    );
    return;
  }

  if (vertices.size > WEAK_CLUSTERING_MIN_VERTICES && components.size > vertices.size * WEAK_CLUSTERING_RATIO) {
    result.warnings.push(
      `High component count (${components.size} for ${vertices.size} sampled vertices) suggests weak clustering`
    );
  }
}

function checkVertexCollections(samples: readonly ResultDocument[], allowed: readonly string[]): string | null {
  const allowedSet = new Set(allowed);
  const excluded = new Set<string>();

  for (const document of samples) {
    const vertexId = vertexIdOf(document);
    if (!vertexId || !vertexId.includes('/')) continue;
    const collection = vertexId.slice(0, vertexId.indexOf('/'));
    if (!allowedSet.has(collection)) excluded.add(collection);
  }

  if (excluded.size === 0) {
    return null;
  }
  return `Results contain documents from excluded collections: ${[...excluded].sort().join(', ')}. Expected only: ${allowed.join(', ')}`;
}

/**
 * Check sampled result documents against the request that produced them.
 * An empty sample has nothing to check.
 */
export function validateStoredResults(
  samples: readonly ResultDocument[],
  request: AnalysisRequest
): ResultValidation {
  const result: ResultValidation = { issues: [], warnings: [] };
  if (samples.length === 0) {
    return result;
  }

  const field = request.resultAttributes[0];
  if (field !== undefined) {
    const missing = checkResultField(samples, field);
    if (missing) result.issues.push(missing);

    if (COMPONENT_ALGORITHMS.has(request.algorithm)) {
      checkComponents(samples, field, result);
    }
  }

  if (request.graph.kind === 'collections' && request.graph.vertexCollections.length > 0) {
    const excluded = checkVertexCollections(samples, request.graph.vertexCollections);
    if (excluded) result.issues.push(excluded);
  }

  return result;
}
