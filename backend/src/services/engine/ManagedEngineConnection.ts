/**
 * Managed Engine Connection
 *
 * Engines on the managed cloud platform: sized, billed per hour of uptime,
 * provisioned and deleted through the management API at
 * `{deploymentUrl}:{port}/graph-analytics/api/graphanalytics/v1`.
 *
 * The managed platform cannot load named graphs; they are resolved to
 * collection lists through the document store before loading.
 *
 * @module services/engine/ManagedEngineConnection
 */

import {
  isEngineSizeId,
  type AnalysisRequest,
  type EngineCapabilities,
  type EngineHandle,
  type EngineSizeId,
  type EngineStatus,
  type EngineSummary,
} from '@graph-orchestrator/shared';
import type { IDocumentStore } from '@/infrastructure/document-store';
import { ConfigError, EngineApiError, TimeoutExceededError } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { sleep } from '@/shared/utils/sleep';
import {
  BaseEngineConnection,
  type BaseEngineConnectionDependencies,
} from './BaseEngineConnection';
import type { DiscoverOptions } from './IEngineConnection';
import { isRecord, managedJobStatusAdapter, readString, type RawRecord } from './JobStatusAdapter';

export interface ManagedEngineConnectionDependencies
  extends Omit<BaseEngineConnectionDependencies, 'jobStatusAdapter' | 'logger'> {
  deploymentUrl: string;
  port: number;
  /** Needed to resolve named graphs */
  documentStore?: IDocumentStore | null;
  logger?: BaseEngineConnectionDependencies['logger'];
}

interface EngineDetail {
  id: string;
  status: EngineStatus;
  endpoint: string | null;
  size: EngineSizeId | null;
  createdAt?: number;
  type?: string;
}

function parseTimestamp(record: RawRecord, ...keys: string[]): number | undefined {
  const value = readString(record, ...keys);
  if (!value) return undefined;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Read an engine entry from the management API.
 */
export function parseEngineDetail(raw: unknown): EngineDetail | null {
  if (!isRecord(raw)) return null;
  const id = readString(raw, 'id');
  if (!id) return null;

  const statusValue = raw.status;
  const status: RawRecord = isRecord(statusValue) ? statusValue : {};
  let engineStatus: EngineStatus = 'provisioning';
  if (status.is_started === true && status.succeeded === true) {
    engineStatus = 'ready';
  } else if (status.failed === true) {
    engineStatus = 'error';
  }

  const sizeId = readString(raw, 'size_id');
  const createdAt = parseTimestamp(raw, 'created_at', 'creation_time', 'created');
  const type = readString(raw, 'type_id', 'type');

  return {
    id,
    status: engineStatus,
    endpoint: readString(status, 'endpoint') ?? null,
    size: sizeId && isEngineSizeId(sizeId) ? sizeId : null,
    ...(createdAt !== undefined ? { createdAt } : {}),
    ...(type ? { type } : {}),
  };
}

export class ManagedEngineConnection extends BaseEngineConnection {
  readonly deploymentMode = 'amp' as const;
  readonly capabilities: EngineCapabilities = {
    sizedEngines: true,
    meteredBilling: true,
    namedGraphs: false,
  };

  private readonly managementBase: string;
  private readonly documentStore: IDocumentStore | null;

  constructor(deps: ManagedEngineConnectionDependencies) {
    super({
      ...deps,
      jobStatusAdapter: managedJobStatusAdapter,
      logger: deps.logger ?? createChildLogger({ service: 'ManagedEngineConnection' }),
    });
    this.managementBase = `${deps.deploymentUrl.replace(/\/+$/, '')}:${deps.port}/graph-analytics/api/graphanalytics/v1`;
    this.documentStore = deps.documentStore ?? null;
  }

  async listEngines(signal?: AbortSignal): Promise<EngineSummary[]> {
    const body = await this.http.get(`${this.managementBase}/engines`, signal);
    const itemsValue = isRecord(body) ? body.items : undefined;
    const items: unknown[] = Array.isArray(itemsValue) ? itemsValue : [];
    const engines: EngineSummary[] = [];
    for (const item of items) {
      const detail = parseEngineDetail(item);
      if (!detail) continue;
      engines.push({
        id: detail.id,
        status: detail.status,
        size: detail.size,
        ...(detail.createdAt !== undefined ? { createdAt: detail.createdAt } : {}),
        ...(detail.type ? { type: detail.type } : {}),
      });
    }
    return engines;
  }

  async discoverOrProvision(size: EngineSizeId, options: DiscoverOptions = {}): Promise<EngineHandle> {
    const { exclusive = false, signal, onHandle } = options;
    const engines = await this.listEngines(signal);

    if (engines.length > 0) {
      this.log.warn(
        { count: engines.length, engineIds: engines.map((engine) => engine.id) },
        'Engines already running; each one is billed until it is deleted'
      );
    }

    const reusable = exclusive ? undefined : engines.find((engine) => engine.status === 'ready');
    if (reusable) {
      const detail = await this.getEngineDetail(reusable.id, signal);
      const handle: EngineHandle = {
        id: detail.id,
        size: detail.size ?? size,
        status: detail.status,
        createdAt: this.clock(),
        baseUrl: detail.endpoint,
        reused: true,
        deploymentMode: this.deploymentMode,
      };
      onHandle?.(handle);
      this.log.warn({ engineId: handle.id, size: handle.size }, 'Reusing running engine');
      if (handle.status === 'ready' && handle.baseUrl) {
        await this.waitForEngineApi(handle, signal);
        return handle;
      }
      return this.waitForEngineReady(handle, signal);
    }

    const body = await this.http.post(`${this.managementBase}/engines`, { type_id: 'gral', size_id: size }, signal);
    const engineId = isRecord(body) ? readString(body, 'id') : undefined;
    if (!engineId) {
      throw new EngineApiError(200, 'Engine provisioning response did not include an engine id');
    }

    const provisioning: EngineHandle = {
      id: engineId,
      size,
      status: 'provisioning',
      createdAt: this.clock(),
      baseUrl: null,
      reused: false,
      deploymentMode: this.deploymentMode,
    };
    onHandle?.(provisioning);
    this.log.info({ engineId, size }, 'Engine provisioning started');

    return this.waitForEngineReady(provisioning, signal);
  }

  async teardown(handle: EngineHandle, signal?: AbortSignal): Promise<EngineHandle> {
    await this.stopEngine(handle.id, signal);
    return { ...handle, status: 'stopped' };
  }

  async stopEngine(engineId: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.http.delete(`${this.managementBase}/engines/${encodeURIComponent(engineId)}`, signal);
      this.log.info({ engineId }, 'Engine deleted');
    } catch (error) {
      if (error instanceof EngineApiError && error.notFound) {
        this.log.info({ engineId }, 'Engine already gone');
        return;
      }
      throw error;
    }
  }

  protected override async buildLoadPayload(request: AnalysisRequest, signal?: AbortSignal): Promise<RawRecord> {
    if (request.graph.kind !== 'named') {
      return super.buildLoadPayload(request, signal);
    }

    if (!this.documentStore) {
      throw new ConfigError(
        `Named graph ${request.graph.graphName} cannot be loaded on the managed platform without a database connection`,
        ['ARANGO_ENDPOINT is required to resolve named graphs in amp mode']
      );
    }

    const collections = await this.documentStore.getNamedGraphCollections(request.graph.graphName, signal);
    if (collections.vertexCollections.length === 0 || collections.edgeCollections.length === 0) {
      throw new ConfigError(`Named graph ${request.graph.graphName} has no vertex or edge collections`);
    }

    this.log.info(
      { graphName: request.graph.graphName, ...collections },
      'Resolved named graph to collections'
    );

    return super.buildLoadPayload(
      {
        ...request,
        graph: {
          kind: 'collections',
          vertexCollections: collections.vertexCollections,
          edgeCollections: collections.edgeCollections,
        },
      },
      signal
    );
  }

  private async getEngineDetail(engineId: string, signal?: AbortSignal): Promise<EngineDetail> {
    const body = await this.http.get(`${this.managementBase}/engines/${encodeURIComponent(engineId)}`, signal);
    const detail = parseEngineDetail(body);
    if (!detail) {
      throw new EngineApiError(200, `Engine ${engineId} detail response was malformed`);
    }
    return detail;
  }

  /**
   * Poll the engine detail until it reports started and succeeded, then
   * probe the engine API.
   */
  private async waitForEngineReady(handle: EngineHandle, signal?: AbortSignal): Promise<EngineHandle> {
    const { readyTimeoutMs, readyProbeIntervalMs } = this.readiness;
    const deadline = this.clock() + readyTimeoutMs;

    for (;;) {
      const detail = await this.getEngineDetail(handle.id, signal);

      if (detail.status === 'error') {
        throw new EngineApiError(200, `Engine ${handle.id} failed to start`, { details: { engineId: handle.id } });
      }

      if (detail.status === 'ready' && detail.endpoint) {
        const ready: EngineHandle = { ...handle, status: 'ready', baseUrl: detail.endpoint };
        this.log.info({ engineId: ready.id, baseUrl: ready.baseUrl }, 'Engine started');
        await this.waitForEngineApi(ready, signal);
        return ready;
      }

      if (this.clock() + readyProbeIntervalMs > deadline) {
        throw new TimeoutExceededError(readyTimeoutMs, `Engine ${handle.id} did not start within ${readyTimeoutMs}ms`, {
          details: { engineId: handle.id },
        });
      }
      await sleep(readyProbeIntervalMs, signal);
    }
  }
}
