/**
 * Engine Constants
 *
 * Engine sizes, size aliases and the job status vocabulary.
 *
 * @module @graph-orchestrator/shared/constants/engine
 */

import type { EngineSizeAlias, EngineSizeId } from '../types/analysis.types';
import type { JobStatus } from '../types/engine.types';

export const ENGINE_SIZES: readonly EngineSizeId[] = ['e4', 'e8', 'e16', 'e32', 'e64', 'e128'];

export const DEFAULT_ENGINE_SIZE: EngineSizeId = 'e16';

export const ENGINE_SIZE_ALIASES: Record<EngineSizeAlias, EngineSizeId> = {
  xsmall: 'e4',
  small: 'e8',
  medium: 'e16',
  large: 'e32',
  xlarge: 'e64',
};

export function isEngineSizeId(value: string): value is EngineSizeId {
  return ENGINE_SIZES.some((size) => size === value);
}

export function isEngineSizeAlias(value: string): value is EngineSizeAlias {
  return Object.prototype.hasOwnProperty.call(ENGINE_SIZE_ALIASES, value);
}

/**
 * Map a size id or generic alias to a size id.
 * Missing or unknown names resolve to `fallback`.
 */
export function resolveEngineSize(value: string | undefined, fallback: EngineSizeId = DEFAULT_ENGINE_SIZE): EngineSizeId {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (isEngineSizeId(normalized)) {
    return normalized;
  }
  if (isEngineSizeAlias(normalized)) {
    return ENGINE_SIZE_ALIASES[normalized];
  }
  return fallback;
}

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'completed',
  'failed',
  'cancelled',
]);

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.has(status);
}
