/**
 * Base Engine Connection
 *
 * Engine-API operations shared by both backends. Every job submission
 * (load, any algorithm, store) goes through `submitJob`; backends only
 * differ in engine lifecycle, load payload and status adapter.
 *
 * @module services/engine/BaseEngineConnection
 */

import {
  ErrorCode,
  getAlgorithmDefinition,
  type AnalysisRequest,
  type DeploymentMode,
  type EngineCapabilities,
  type EngineHandle,
  type EngineSizeId,
  type EngineSummary,
  type GraphSummary,
  type JobHandle,
  type JobKind,
} from '@graph-orchestrator/shared';
import type { Logger } from 'pino';
import {
  AuthError,
  CancelledError,
  EngineApiError,
  OrchestrationError,
  TimeoutExceededError,
  errorMessage,
} from '@/shared/errors';
import { sleep } from '@/shared/utils/sleep';
import type { EngineHttpClient } from './EngineHttpClient';
import type { DiscoverOptions, IEngineConnection } from './IEngineConnection';
import { isRecord, readNumber, readString, type JobStatusAdapter, type RawRecord } from './JobStatusAdapter';

/**
 * Store-results tuning sent with every store job.
 */
export interface StoreSettings {
  parallelism: number;
  batchSize: number;
}

export const DEFAULT_STORE_SETTINGS: StoreSettings = {
  parallelism: 8,
  batchSize: 10000,
};

export interface EngineReadinessSettings {
  readyTimeoutMs: number;
  readyProbeIntervalMs: number;
}

export interface BaseEngineConnectionDependencies {
  http: EngineHttpClient;
  jobStatusAdapter: JobStatusAdapter;
  readiness: EngineReadinessSettings;
  /** Database used when a request names none */
  defaultDatabase: string;
  store?: StoreSettings;
  clock?: () => number;
  logger: Logger;
}

function toList(body: unknown, ...keys: string[]): unknown[] {
  if (Array.isArray(body)) return body;
  if (isRecord(body)) {
    for (const key of keys) {
      const value = body[key];
      if (Array.isArray(value)) return value;
    }
  }
  return [];
}

export function toGraphSummary(raw: unknown, fallbackId?: string): GraphSummary | null {
  const record = isRecord(raw) ? raw : {};
  const id = readString(record, 'graph_id', 'id') ?? fallbackId;
  if (!id) return null;
  const vertexCount = readNumber(record, 'vertex_count', 'vertexCount', 'vertices');
  const edgeCount = readNumber(record, 'edge_count', 'edgeCount', 'edges');
  return {
    id,
    ...(vertexCount !== undefined ? { vertexCount } : {}),
    ...(edgeCount !== undefined ? { edgeCount } : {}),
  };
}

export abstract class BaseEngineConnection implements IEngineConnection {
  abstract readonly deploymentMode: DeploymentMode;
  abstract readonly capabilities: EngineCapabilities;

  protected readonly http: EngineHttpClient;
  protected readonly jobStatusAdapter: JobStatusAdapter;
  protected readonly readiness: EngineReadinessSettings;
  protected readonly defaultDatabase: string;
  protected readonly storeSettings: StoreSettings;
  protected readonly clock: () => number;
  protected readonly log: Logger;

  protected constructor(deps: BaseEngineConnectionDependencies) {
    this.http = deps.http;
    this.jobStatusAdapter = deps.jobStatusAdapter;
    this.readiness = deps.readiness;
    this.defaultDatabase = deps.defaultDatabase;
    this.storeSettings = deps.store ?? DEFAULT_STORE_SETTINGS;
    this.clock = deps.clock ?? Date.now;
    this.log = deps.logger;
  }

  abstract discoverOrProvision(size: EngineSizeId, options?: DiscoverOptions): Promise<EngineHandle>;
  abstract teardown(handle: EngineHandle, signal?: AbortSignal): Promise<EngineHandle>;
  abstract listEngines(signal?: AbortSignal): Promise<EngineSummary[]>;
  abstract stopEngine(engineId: string, signal?: AbortSignal): Promise<void>;

  /**
   * Payload for `v1/loaddata`.
   */
  protected async buildLoadPayload(request: AnalysisRequest, _signal?: AbortSignal): Promise<RawRecord> {
    const payload: RawRecord = { database: request.database ?? this.defaultDatabase };

    if (request.graph.kind === 'named') {
      payload.graph_name = request.graph.graphName;
    } else {
      payload.vertex_collections = [...request.graph.vertexCollections];
      payload.edge_collections = [...request.graph.edgeCollections];
    }

    if (request.vertexAttributes && request.vertexAttributes.length > 0) {
      payload.vertex_attributes = [...request.vertexAttributes];
    }

    return payload;
  }

  async loadGraph(handle: EngineHandle, request: AnalysisRequest, signal?: AbortSignal): Promise<JobHandle> {
    const payload = await this.buildLoadPayload(request, signal);
    const job = await this.submitJob(handle, 'v1/loaddata', payload, 'load', signal);
    this.log.info({ engineId: handle.id, jobId: job.id, graphId: job.graphId }, 'Graph load submitted');
    return job;
  }

  async runAlgorithm(
    handle: EngineHandle,
    request: AnalysisRequest,
    graphId: string,
    signal?: AbortSignal
  ): Promise<JobHandle> {
    const definition = getAlgorithmDefinition(request.algorithm);
    const payload: RawRecord = { ...request.params, graph_id: graphId };
    const job = await this.submitJob(handle, `v1/${definition.endpoint}`, payload, 'algorithm', signal);
    this.log.info(
      { engineId: handle.id, jobId: job.id, graphId, algorithm: request.algorithm },
      'Algorithm submitted'
    );
    return job;
  }

  async storeResults(
    handle: EngineHandle,
    request: AnalysisRequest,
    jobIds: readonly string[],
    signal?: AbortSignal
  ): Promise<JobHandle> {
    const payload: RawRecord = {
      database: request.database ?? this.defaultDatabase,
      target_collection: request.targetCollection,
      job_ids: [...jobIds],
      attribute_names: [...request.resultAttributes],
      parallelism: this.storeSettings.parallelism,
      batch_size: this.storeSettings.batchSize,
    };
    const job = await this.submitJob(handle, 'v1/storeresults', payload, 'store', signal);
    this.log.info(
      { engineId: handle.id, jobId: job.id, targetCollection: request.targetCollection },
      'Store results submitted'
    );
    return job;
  }

  /**
   * Single submission primitive for every job kind.
   *
   * A load response without a job id but with a graph id, or a store
   * response without a job id, means the engine finished synchronously.
   */
  async submitJob(
    handle: EngineHandle,
    endpoint: string,
    payload: RawRecord,
    kind: JobKind,
    signal?: AbortSignal
  ): Promise<JobHandle> {
    const body = await this.http.post(this.engineApiUrl(handle, endpoint), payload, signal);
    const job = this.jobStatusAdapter.toJobHandle(body, kind);
    if (job) {
      return job;
    }

    const record = isRecord(body) ? body : {};
    const graphId = readString(record, 'graph_id');
    if (kind === 'load' && graphId) {
      return { id: graphId, kind, status: 'completed', graphId, raw: record };
    }
    if (kind === 'store') {
      return { id: `store-${this.clock()}`, kind, status: 'completed', raw: record };
    }

    throw new EngineApiError(200, `Engine response to ${endpoint} did not include a job id`, {
      details: { endpoint },
    });
  }

  async getJob(handle: EngineHandle, jobId: string, kind: JobKind, signal?: AbortSignal): Promise<JobHandle> {
    const body = await this.http.get(this.engineApiUrl(handle, `v1/jobs/${encodeURIComponent(jobId)}`), signal);
    const job = this.jobStatusAdapter.toJobHandle(body, kind, { fallbackId: jobId });
    if (!job) {
      throw new EngineApiError(200, `Job ${jobId} status response was empty`);
    }
    return job;
  }

  async listJobs(handle: EngineHandle, signal?: AbortSignal): Promise<JobHandle[]> {
    const body = await this.http.get(this.engineApiUrl(handle, 'v1/jobs'), signal);
    const jobs: JobHandle[] = [];
    for (const entry of toList(body, 'jobs', 'items')) {
      const job = this.jobStatusAdapter.toJobHandle(entry, 'algorithm');
      if (job) jobs.push(job);
    }
    return jobs;
  }

  async listGraphs(handle: EngineHandle, signal?: AbortSignal): Promise<GraphSummary[]> {
    const body = await this.http.get(this.engineApiUrl(handle, 'v1/graphs'), signal);
    const graphs: GraphSummary[] = [];
    for (const entry of toList(body, 'graphs', 'items')) {
      const graph = toGraphSummary(entry);
      if (graph) graphs.push(graph);
    }
    return graphs;
  }

  async getGraph(handle: EngineHandle, graphId: string, signal?: AbortSignal): Promise<GraphSummary> {
    const body = await this.http.get(this.engineApiUrl(handle, `v1/graphs/${encodeURIComponent(graphId)}`), signal);
    const nested = isRecord(body) ? body.graph : undefined;
    return toGraphSummary(isRecord(nested) ? nested : body, graphId) ?? { id: graphId };
  }

  async deleteGraph(handle: EngineHandle, graphId: string, signal?: AbortSignal): Promise<void> {
    await this.http.delete(this.engineApiUrl(handle, `v1/graphs/${encodeURIComponent(graphId)}`), signal);
    this.log.info({ engineId: handle.id, graphId }, 'Graph deleted');
  }

  async getVersion(handle: EngineHandle, signal?: AbortSignal): Promise<Record<string, unknown>> {
    const body = await this.http.get(this.engineApiUrl(handle, 'v1/version'), signal);
    return isRecord(body) ? body : { version: body };
  }

  protected engineApiUrl(handle: EngineHandle, path: string): string {
    if (!handle.baseUrl) {
      throw new OrchestrationError(ErrorCode.INTERNAL_ERROR, `Engine ${handle.id} has no API URL yet`);
    }
    return `${handle.baseUrl.replace(/\/+$/, '')}/${path}`;
  }

  /**
   * Probe `v1/version` until it answers, bounded by the readiness timeout.
   */
  protected async waitForEngineApi(handle: EngineHandle, signal?: AbortSignal): Promise<void> {
    const { readyTimeoutMs, readyProbeIntervalMs } = this.readiness;
    const deadline = this.clock() + readyTimeoutMs;
    let lastError = 'no response';
    let probes = 0;

    for (;;) {
      probes++;
      try {
        await this.getVersion(handle, signal);
        this.log.info({ engineId: handle.id, probes }, 'Engine API ready');
        return;
      } catch (error) {
        if (error instanceof CancelledError || error instanceof AuthError) {
          throw error;
        }
        lastError = errorMessage(error);
        this.log.debug({ engineId: handle.id, probes, error: lastError }, 'Engine API not ready yet');
      }

      if (this.clock() + readyProbeIntervalMs > deadline) {
        throw new TimeoutExceededError(
          readyTimeoutMs,
          `Engine ${handle.id} API not ready within ${readyTimeoutMs}ms (last error: ${lastError})`,
          { details: { engineId: handle.id, probes } }
        );
      }
      await sleep(readyProbeIntervalMs, signal);
    }
  }
}
