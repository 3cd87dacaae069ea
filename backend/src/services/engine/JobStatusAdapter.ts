/**
 * Job Status Adapters
 *
 * The engine reports job progress in several shapes:
 * - nested: `{ status: { state: 'running' } }`
 * - progress envelope: `{ progress: 3, total: 5, error: false, error_message? }`
 * - status string: `{ status: 'succeeded' }`
 * - flat state: `{ state: 'done' }`
 * and names the id `id` or `job_id`.
 *
 * One adapter per backend turns these into a canonical `JobHandle`; each
 * backend checks its native shape first.
 *
 * @module services/engine/JobStatusAdapter
 */

import type { JobHandle, JobKind, JobStatus } from '@graph-orchestrator/shared';

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: RawRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim() !== '') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

export function readNumber(record: RawRecord, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  }
  return undefined;
}

const COMPLETED_STATES = new Set(['done', 'finished', 'completed', 'succeeded', 'success']);
const FAILED_STATES = new Set(['failed', 'error', 'errored']);
const CANCELLED_STATES = new Set(['cancelled', 'canceled', 'aborted']);
const PENDING_STATES = new Set(['pending', 'queued', 'created', 'new', 'scheduled']);

/**
 * Map a backend state word onto the canonical job status.
 * Unrecognised words are treated as still running.
 */
export function mapJobState(state: string): JobStatus {
  const normalized = state.trim().toLowerCase();
  if (COMPLETED_STATES.has(normalized)) return 'completed';
  if (FAILED_STATES.has(normalized)) return 'failed';
  if (CANCELLED_STATES.has(normalized)) return 'cancelled';
  if (PENDING_STATES.has(normalized)) return 'pending';
  return 'running';
}

interface StatusReading {
  status: JobStatus;
  progress?: number;
  total?: number;
  error?: string;
}

/**
 * Reads one payload shape; returns null when the shape does not apply.
 */
type StatusReader = (raw: RawRecord) => StatusReading | null;

export const readNestedState: StatusReader = (raw) => {
  const status = raw.status;
  if (!isRecord(status)) return null;
  const state = readString(status, 'state');
  if (!state) return null;
  const error = readString(status, 'error_message', 'error', 'message');
  return { status: mapJobState(state), ...(error ? { error } : {}) };
};

export const readProgressEnvelope: StatusReader = (raw) => {
  const progress = readNumber(raw, 'progress');
  const total = readNumber(raw, 'total');
  if (progress === undefined || total === undefined) return null;

  if (raw.error === true) {
    return {
      status: 'failed',
      progress,
      total,
      error: readString(raw, 'error_message') ?? 'Unknown error',
    };
  }
  if (total > 0 && progress >= total) {
    return { status: 'completed', progress, total };
  }
  return { status: progress > 0 ? 'running' : 'pending', progress, total };
};

export const readStatusString: StatusReader = (raw) => {
  const value = raw.status;
  if (typeof value !== 'string' || value.trim() === '') return null;
  const status = mapJobState(value);
  const error = status === 'failed' ? readString(raw, 'error_message', 'error') ?? 'Unknown error' : undefined;
  return { status, ...(error ? { error } : {}) };
};

export const readFlatState: StatusReader = (raw) => {
  const state = readString(raw, 'state');
  if (!state) return null;
  const status = mapJobState(state);
  const error = status === 'failed' ? readString(raw, 'error_message', 'error') ?? 'Unknown error' : undefined;
  return { status, ...(error ? { error } : {}) };
};

export interface JobHandleOverrides {
  /** Id to use when the payload carries none (e.g. the id that was polled) */
  fallbackId?: string;
}

/**
 * Normalizes raw job payloads for one backend.
 */
export class JobStatusAdapter {
  constructor(private readonly readers: readonly StatusReader[]) {}

  /**
   * Canonical status for a payload. Payloads in no known shape read as `pending`.
   */
  readStatus(raw: RawRecord): StatusReading {
    for (const reader of this.readers) {
      const reading = reader(raw);
      if (reading) return reading;
    }
    return { status: 'pending' };
  }

  /**
   * @returns The handle, or null when neither the payload nor the
   * overrides provide a job id
   */
  toJobHandle(raw: unknown, kind: JobKind, overrides: JobHandleOverrides = {}): JobHandle | null {
    const record = isRecord(raw) ? raw : {};
    const id = readString(record, 'job_id', 'id') ?? overrides.fallbackId;
    if (!id) return null;

    const reading = this.readStatus(record);
    const graphId = readString(record, 'graph_id');
    const resultCount = readNumber(record, 'result_count', 'documents_written');

    return {
      id,
      kind,
      status: reading.status,
      ...(graphId ? { graphId } : {}),
      ...(reading.progress !== undefined ? { progress: reading.progress } : {}),
      ...(reading.total !== undefined ? { total: reading.total } : {}),
      ...(resultCount !== undefined ? { resultCount } : {}),
      ...(reading.error ? { error: reading.error } : {}),
      raw: record,
    };
  }
}

/**
 * Managed platform: nested `status.state`, then the progress envelope.
 */
export const managedJobStatusAdapter = new JobStatusAdapter([
  readNestedState,
  readProgressEnvelope,
  readStatusString,
  readFlatState,
]);

/**
 * Self-managed platform: flat `state`/`status` strings, `job_id` ids.
 */
export const selfManagedJobStatusAdapter = new JobStatusAdapter([
  readFlatState,
  readStatusString,
  readProgressEnvelope,
  readNestedState,
]);
