/**
 * Engine and Job Handle Types
 *
 * Canonical shapes produced by the engine connection adapters.
 * Downstream code depends only on these, never on raw backend payloads.
 *
 * @module @graph-orchestrator/shared/types/engine
 */

import type { EngineSizeId } from './analysis.types';

/**
 * Deployment regime selector.
 * - `amp`: managed cloud platform (sized, metered engines)
 * - `self_managed`: self-hosted platform (service discovery, unmetered)
 */
export type DeploymentMode = 'amp' | 'self_managed';

export type EngineStatus = 'provisioning' | 'ready' | 'stopped' | 'error';

/**
 * One provisioned (or discovered) remote engine.
 */
export interface EngineHandle {
  readonly id: string;
  /** Null when the backend does not size engines */
  readonly size: EngineSizeId | null;
  readonly status: EngineStatus;
  /** Epoch ms; start of the billable uptime window */
  readonly createdAt: number;
  /** Engine API base URL, null until the engine is reachable */
  readonly baseUrl: string | null;
  /** True when an already-running engine was reused */
  readonly reused: boolean;
  readonly deploymentMode: DeploymentMode;
}

export type JobKind = 'load' | 'algorithm' | 'store';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

/**
 * Status snapshot of one job on an engine.
 *
 * Pollers replace the whole snapshot; they never patch it.
 */
export interface JobHandle {
  readonly id: string;
  readonly kind: JobKind;
  readonly status: JobStatus;
  /** Graph produced by a load job */
  readonly graphId?: string;
  readonly progress?: number;
  readonly total?: number;
  /** Rows/documents produced, when the backend reports it */
  readonly resultCount?: number;
  readonly error?: string;
  readonly raw?: Record<string, unknown>;
}

/**
 * Entry returned by engine enumeration (discovery and cleanup audits).
 */
export interface EngineSummary {
  readonly id: string;
  readonly status: EngineStatus;
  readonly size: EngineSizeId | null;
  /** Epoch ms when known */
  readonly createdAt?: number;
  readonly type?: string;
}

/**
 * Graph loaded in engine memory.
 */
export interface GraphSummary {
  readonly id: string;
  readonly vertexCount?: number;
  readonly edgeCount?: number;
}

/**
 * What a backend can do; used instead of runtime type inspection.
 */
export interface EngineCapabilities {
  /** Engine size is honoured when provisioning */
  readonly sizedEngines: boolean;
  /** Engine uptime is billed */
  readonly meteredBilling: boolean;
  /** Named graphs can be loaded directly */
  readonly namedGraphs: boolean;
}
