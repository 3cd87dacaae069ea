import { describe, it, expect } from 'vitest';
import { estimateAnalysisCost, estimateEngineCost, hourlyRateFor } from '@/domains/billing/CostEstimator';
import { AnalysisRequestFixture } from '../../../fixtures/AnalysisRequestFixture';

describe('CostEstimator', () => {
  describe('hourlyRateFor', () => {
    it('should look up the list price by size', () => {
      expect(hourlyRateFor('e16')).toBe(0.4);
      expect(hourlyRateFor('e128')).toBe(3.2);
    });

    it('should charge nothing for unsized engines', () => {
      expect(hourlyRateFor(null)).toBe(0);
    });

    it('should use custom rates when given', () => {
      expect(hourlyRateFor('e4', { e4: 1, e8: 2, e16: 3, e32: 4, e64: 5, e128: 6 })).toBe(1);
    });
  });

  describe('estimateEngineCost', () => {
    it('should bill uptime at the hourly rate', () => {
      expect(estimateEngineCost('e16', 3600, { metered: true })).toBe(0.4);
      expect(estimateEngineCost('e8', 1800, { metered: true })).toBe(0.15);
    });

    it('should round to four decimals', () => {
      expect(estimateEngineCost('e16', 42, { metered: true })).toBe(0.0047);
    });

    it('should be zero for unmetered backends and empty uptime', () => {
      expect(estimateEngineCost('e16', 3600, { metered: false })).toBe(0);
      expect(estimateEngineCost('e16', 0, { metered: true })).toBe(0);
      expect(estimateEngineCost(null, 3600, { metered: true })).toBe(0);
    });
  });

  describe('estimateAnalysisCost', () => {
    it('should estimate from the request engine size and expected minutes', () => {
      const request = AnalysisRequestFixture.createRequest({ engineSize: 'e32' });

      expect(estimateAnalysisCost(request, 15, { metered: true })).toEqual({
        engineSize: 'e32',
        hourlyRateUsd: 0.8,
        expectedMinutes: 15,
        estimatedCostUsd: 0.2,
      });
    });

    it('should report a zero rate when billing is off', () => {
      const request = AnalysisRequestFixture.createRequest();

      expect(estimateAnalysisCost(request, 60, { metered: false })).toMatchObject({
        hourlyRateUsd: 0,
        estimatedCostUsd: 0,
      });
    });
  });
});
