/**
 * Self-Managed Engine Connection
 *
 * Engines run as services on a self-hosted platform next to the database.
 * Services are listed and started under `{endpoint}/gen-ai/v1`; the engine
 * API is served at `{endpoint}/gral/{shortId}`. Engines are not sized and
 * not metered.
 *
 * @module services/engine/SelfManagedEngineConnection
 */

import type {
  EngineCapabilities,
  EngineHandle,
  EngineSizeId,
  EngineStatus,
  EngineSummary,
} from '@graph-orchestrator/shared';
import { AuthError, CancelledError, EngineApiError, errorMessage } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import {
  BaseEngineConnection,
  type BaseEngineConnectionDependencies,
} from './BaseEngineConnection';
import type { DiscoverOptions } from './IEngineConnection';
import { isRecord, readString, selfManagedJobStatusAdapter } from './JobStatusAdapter';

const ENGINE_SERVICE_PREFIX = 'arangodb-gral-';

export interface SelfManagedEngineConnectionDependencies
  extends Omit<BaseEngineConnectionDependencies, 'jobStatusAdapter' | 'logger'> {
  /** Database endpoint, e.g. https://db.example.test:8529 */
  endpoint: string;
  logger?: BaseEngineConnectionDependencies['logger'];
}

export interface ServiceEntry {
  serviceId: string;
  status: string;
  type?: string;
}

/**
 * Short id used in the engine URL: the last `-` segment of the service id.
 */
export function serviceShortId(serviceId: string): string {
  const segments = serviceId.split('-');
  return segments[segments.length - 1] ?? serviceId;
}

export function isEngineService(service: ServiceEntry): boolean {
  return service.type === 'gral' || service.serviceId.startsWith(ENGINE_SERVICE_PREFIX);
}

function mapServiceStatus(status: string): EngineStatus {
  switch (status.toUpperCase()) {
    case 'DEPLOYED':
      return 'ready';
    case 'FAILED':
    case 'ERROR':
      return 'error';
    case 'DELETED':
    case 'STOPPED':
      return 'stopped';
    default:
      return 'provisioning';
  }
}

export class SelfManagedEngineConnection extends BaseEngineConnection {
  readonly deploymentMode = 'self_managed' as const;
  readonly capabilities: EngineCapabilities = {
    sizedEngines: false,
    meteredBilling: false,
    namedGraphs: true,
  };

  private readonly endpoint: string;

  constructor(deps: SelfManagedEngineConnectionDependencies) {
    super({
      ...deps,
      jobStatusAdapter: selfManagedJobStatusAdapter,
      logger: deps.logger ?? createChildLogger({ service: 'SelfManagedEngineConnection' }),
    });
    this.endpoint = deps.endpoint.replace(/\/+$/, '');
  }

  async listServices(signal?: AbortSignal): Promise<ServiceEntry[]> {
    const body = await this.http.post(`${this.endpoint}/gen-ai/v1/list_services`, {}, signal);
    const servicesValue = isRecord(body) ? body.services : undefined;
    const services: ServiceEntry[] = [];

    for (const entry of Array.isArray(servicesValue) ? servicesValue : []) {
      if (!isRecord(entry)) continue;
      const serviceId = readString(entry, 'serviceId');
      if (!serviceId) continue;
      const type = readString(entry, 'type');
      services.push({
        serviceId,
        status: readString(entry, 'status') ?? 'UNKNOWN',
        ...(type ? { type } : {}),
      });
    }
    return services;
  }

  async listEngines(signal?: AbortSignal): Promise<EngineSummary[]> {
    const services = await this.listServices(signal);
    return services.filter(isEngineService).map((service) => ({
      id: service.serviceId,
      status: mapServiceStatus(service.status),
      size: null,
      ...(service.type ? { type: service.type } : {}),
    }));
  }

  async discoverOrProvision(size: EngineSizeId, options: DiscoverOptions = {}): Promise<EngineHandle> {
    const { exclusive = false, signal, onHandle } = options;
    this.log.debug({ size }, 'Engine size is not configurable on self-managed deployments; ignoring');

    if (!exclusive) {
      const reused = await this.findResponsiveService(signal);
      if (reused) {
        onHandle?.(reused);
        this.log.warn({ engineId: reused.id }, 'Reusing deployed engine service');
        return reused;
      }
    }

    const body = await this.http.post(`${this.endpoint}/gen-ai/v1/graphanalytics`, {}, signal);
    const serviceInfo = isRecord(body) ? body.serviceInfo : undefined;
    const serviceId = isRecord(serviceInfo) ? readString(serviceInfo, 'serviceId') : undefined;
    if (!serviceId || serviceId === 'null') {
      throw new EngineApiError(200, 'Engine service start response did not include a service id');
    }

    const handle = this.buildHandle(serviceId, 'provisioning', false);
    onHandle?.(handle);
    this.log.info({ engineId: serviceId }, 'Engine service started');

    await this.waitForEngineApi(handle, signal);
    return { ...handle, status: 'ready' };
  }

  async teardown(handle: EngineHandle, signal?: AbortSignal): Promise<EngineHandle> {
    await this.stopEngine(handle.id, signal);
    return { ...handle, status: 'stopped' };
  }

  async stopEngine(engineId: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.http.delete(`${this.endpoint}/gen-ai/v1/service/${encodeURIComponent(engineId)}`, signal);
      this.log.info({ engineId }, 'Engine service stopped');
    } catch (error) {
      if (error instanceof EngineApiError && error.notFound) {
        this.log.info({ engineId }, 'Engine service already gone');
        return;
      }
      throw error;
    }
  }

  /**
   * First deployed engine service whose API answers, or null.
   */
  private async findResponsiveService(signal?: AbortSignal): Promise<EngineHandle | null> {
    let services: ServiceEntry[];
    try {
      services = await this.listServices(signal);
    } catch (error) {
      if (error instanceof AuthError || error instanceof CancelledError) {
        throw error;
      }
      this.log.warn({ error: errorMessage(error) }, 'Could not list engine services; starting a new one');
      return null;
    }

    const candidates = services.filter((service) => service.status === 'DEPLOYED' && isEngineService(service));

    for (const candidate of candidates) {
      const handle = this.buildHandle(candidate.serviceId, 'ready', true);
      try {
        await this.getVersion(handle, signal);
        return handle;
      } catch (error) {
        if (error instanceof AuthError || error instanceof CancelledError) {
          throw error;
        }
        this.log.debug({ engineId: candidate.serviceId, error: errorMessage(error) }, 'Candidate service not responding');
      }
    }

    return null;
  }

  private buildHandle(serviceId: string, status: EngineStatus, reused: boolean): EngineHandle {
    return {
      id: serviceId,
      size: null,
      status,
      createdAt: this.clock(),
      baseUrl: `${this.endpoint}/gral/${serviceShortId(serviceId)}`,
      reused,
      deploymentMode: this.deploymentMode,
    };
  }
}
