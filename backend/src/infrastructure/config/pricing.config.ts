/**
 * Pricing Configuration
 *
 * Hourly rates for managed analytics engines. Self-managed engines run on
 * infrastructure the operator already pays for and are not metered.
 *
 * Rates are list prices in USD per engine-hour, billed on uptime from
 * provisioning to teardown.
 *
 * @module infrastructure/config/pricing
 */

import type { EngineSizeId } from '@graph-orchestrator/shared';

export type EngineHourlyRates = Readonly<Record<EngineSizeId, number>>;

/**
 * USD per engine-hour, by engine size.
 */
export const ENGINE_HOURLY_RATES_USD: EngineHourlyRates = {
  e4: 0.2,
  e8: 0.3,
  e16: 0.4,
  e32: 0.8,
  e64: 1.6,
  e128: 3.2,
};

/**
 * Cost figures are rounded to this many decimals before reporting.
 */
export const COST_DECIMALS = 4;
