/**
 * Analysis Request Types
 *
 * Immutable description of one unit of work handed to the execution
 * state machine, plus the raw input shape callers build it from.
 *
 * @module @graph-orchestrator/shared/types/analysis
 */

/**
 * Algorithms the remote engine can run.
 */
export type AlgorithmId =
  | 'pagerank'
  | 'wcc'
  | 'scc'
  | 'label_propagation'
  | 'betweenness';

/**
 * Engine sizes understood by the managed platform.
 */
export type EngineSizeId = 'e4' | 'e8' | 'e16' | 'e32' | 'e64' | 'e128';

/**
 * Generic size names accepted from callers.
 */
export type EngineSizeAlias = 'xsmall' | 'small' | 'medium' | 'large' | 'xlarge';

export type AlgorithmParamValue = string | number | boolean;

export type AlgorithmParams = Record<string, AlgorithmParamValue>;

/**
 * Graph stored as a database-level named graph.
 */
export interface NamedGraphSource {
  readonly kind: 'named';
  readonly graphName: string;
}

/**
 * Graph assembled from an explicit list of collections.
 */
export interface CollectionGraphSource {
  readonly kind: 'collections';
  readonly vertexCollections: readonly string[];
  readonly edgeCollections: readonly string[];
}

export type GraphSource = NamedGraphSource | CollectionGraphSource;

/**
 * Raw request as supplied by a caller (workflow step, batch file, API).
 *
 * Exactly one of `namedGraph` or the pair of collection lists must be set.
 */
export interface AnalysisRequestInput {
  name: string;
  description?: string;
  algorithm: string;
  params?: AlgorithmParams;
  namedGraph?: string;
  vertexCollections?: string[];
  edgeCollections?: string[];
  vertexAttributes?: string[];
  database?: string;
  targetCollection?: string;
  resultAttributes?: string[];
  engineSize?: string;
  timeoutMs?: number;
  exclusiveEngine?: boolean;
  validateResults?: boolean;
}

/**
 * Validated, defaulted and frozen analysis request.
 */
export interface AnalysisRequest {
  readonly name: string;
  readonly description?: string;
  readonly algorithm: AlgorithmId;
  readonly params: Readonly<AlgorithmParams>;
  readonly graph: GraphSource;
  readonly vertexAttributes?: readonly string[];
  readonly database?: string;
  readonly targetCollection: string;
  readonly resultAttributes: readonly string[];
  readonly engineSize: EngineSizeId;
  /** Wait budget applied to each job of this request */
  readonly timeoutMs: number;
  /** When true an existing engine is never reused */
  readonly exclusiveEngine: boolean;
  /** Sample the stored documents and check them after storage */
  readonly validateResults: boolean;
}
