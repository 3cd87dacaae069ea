/**
 * Cost Estimator
 *
 * Pure engine-cost arithmetic: `uptimeSeconds * hourlyRate(size) / 3600`.
 * Unmetered backends and unknown sizes cost nothing.
 *
 * @module domains/billing/CostEstimator
 */

import type { AnalysisRequest, EngineSizeId } from '@graph-orchestrator/shared';
import { COST_DECIMALS, ENGINE_HOURLY_RATES_USD, type EngineHourlyRates } from '@/infrastructure/config';

export interface CostOptions {
  /** False for backends that do not bill engine uptime */
  metered: boolean;
  rates?: EngineHourlyRates;
}

export interface CostEstimate {
  engineSize: EngineSizeId;
  hourlyRateUsd: number;
  expectedMinutes: number;
  estimatedCostUsd: number;
}

function roundCost(value: number): number {
  const factor = Math.pow(10, COST_DECIMALS);
  return Math.round(value * factor) / factor;
}

export function hourlyRateFor(size: EngineSizeId | null, rates: EngineHourlyRates = ENGINE_HOURLY_RATES_USD): number {
  if (size === null) return 0;
  return rates[size] ?? 0;
}

/**
 * Cost of keeping an engine of `size` up for `elapsedSeconds`.
 */
export function estimateEngineCost(
  size: EngineSizeId | null,
  elapsedSeconds: number,
  options: CostOptions
): number {
  if (!options.metered || elapsedSeconds <= 0) {
    return 0;
  }
  const rate = hourlyRateFor(size, options.rates);
  return roundCost((elapsedSeconds * rate) / 3600);
}

/**
 * Up-front estimate for a request expected to hold its engine for
 * `expectedMinutes`.
 */
export function estimateAnalysisCost(
  request: AnalysisRequest,
  expectedMinutes: number,
  options: CostOptions
): CostEstimate {
  const hourlyRateUsd = options.metered ? hourlyRateFor(request.engineSize, options.rates) : 0;
  return {
    engineSize: request.engineSize,
    hourlyRateUsd,
    expectedMinutes,
    estimatedCostUsd: estimateEngineCost(request.engineSize, expectedMinutes * 60, options),
  };
}
