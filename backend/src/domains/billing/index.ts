export {
  estimateEngineCost,
  estimateAnalysisCost,
  hourlyRateFor,
  type CostOptions,
  type CostEstimate,
} from './CostEstimator';
