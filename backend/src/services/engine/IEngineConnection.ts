/**
 * Engine connection contract.
 *
 * Two implementations, chosen by deployment mode in
 * `createEngineConnection()`: the managed platform (sized, metered engines)
 * and the self-managed platform (service discovery, unmetered).
 *
 * @module services/engine/IEngineConnection
 */

import type {
  AnalysisRequest,
  DeploymentMode,
  EngineCapabilities,
  EngineHandle,
  EngineSizeId,
  EngineSummary,
  GraphSummary,
  JobHandle,
  JobKind,
} from '@graph-orchestrator/shared';

export interface DiscoverOptions {
  /** Never reuse an already-running engine */
  exclusive?: boolean;
  signal?: AbortSignal;
  /**
   * Called as soon as an engine id is known, before readiness is confirmed,
   * so the caller can tear it down if waiting fails.
   */
  onHandle?: (handle: EngineHandle) => void;
}

export interface IEngineConnection {
  readonly deploymentMode: DeploymentMode;
  readonly capabilities: EngineCapabilities;

  /**
   * Return a ready engine: reuse a running one (with a warning) unless
   * `exclusive`, otherwise provision one and wait for readiness.
   */
  discoverOrProvision(size: EngineSizeId, options?: DiscoverOptions): Promise<EngineHandle>;

  loadGraph(handle: EngineHandle, request: AnalysisRequest, signal?: AbortSignal): Promise<JobHandle>;

  runAlgorithm(
    handle: EngineHandle,
    request: AnalysisRequest,
    graphId: string,
    signal?: AbortSignal
  ): Promise<JobHandle>;

  /** Idempotent status snapshot. */
  getJob(handle: EngineHandle, jobId: string, kind: JobKind, signal?: AbortSignal): Promise<JobHandle>;

  storeResults(
    handle: EngineHandle,
    request: AnalysisRequest,
    jobIds: readonly string[],
    signal?: AbortSignal
  ): Promise<JobHandle>;

  /** Stop the engine. An engine that no longer exists counts as stopped. */
  teardown(handle: EngineHandle, signal?: AbortSignal): Promise<EngineHandle>;

  listEngines(signal?: AbortSignal): Promise<EngineSummary[]>;
  listGraphs(handle: EngineHandle, signal?: AbortSignal): Promise<GraphSummary[]>;
  listJobs(handle: EngineHandle, signal?: AbortSignal): Promise<JobHandle[]>;
  getGraph(handle: EngineHandle, graphId: string, signal?: AbortSignal): Promise<GraphSummary>;
  deleteGraph(handle: EngineHandle, graphId: string, signal?: AbortSignal): Promise<void>;

  /** Engine API version; doubles as the readiness probe. */
  getVersion(handle: EngineHandle, signal?: AbortSignal): Promise<Record<string, unknown>>;

  /** Stop an engine known only by id (cleanup audits). */
  stopEngine(engineId: string, signal?: AbortSignal): Promise<void>;
}
