/**
 * Algorithm Catalogue
 *
 * One entry per supported algorithm. Submission is a single parameterized
 * primitive; the entries only differ in endpoint, defaults and result field.
 *
 * @module @graph-orchestrator/shared/constants/algorithms
 */

import type { AlgorithmId, AlgorithmParams } from '../types/analysis.types';

export interface AlgorithmDefinition {
  id: AlgorithmId;
  label: string;
  /** Engine API path segment under `v1/` */
  endpoint: string;
  /** Version string recorded in the execution catalog */
  version: string;
  defaultParams: AlgorithmParams;
  /** Standard attribute name written to the target collection */
  resultField: string;
}

export const ALGORITHM_CATALOG: Record<AlgorithmId, AlgorithmDefinition> = {
  pagerank: {
    id: 'pagerank',
    label: 'PageRank',
    endpoint: 'pagerank',
    version: '1.0',
    defaultParams: { damping_factor: 0.85, maximum_supersteps: 100 },
    resultField: 'rank',
  },
  wcc: {
    id: 'wcc',
    label: 'Weakly Connected Components',
    endpoint: 'wcc',
    version: '1.0',
    defaultParams: {},
    resultField: 'component',
  },
  scc: {
    id: 'scc',
    label: 'Strongly Connected Components',
    endpoint: 'scc',
    version: '1.0',
    defaultParams: {},
    resultField: 'component',
  },
  label_propagation: {
    id: 'label_propagation',
    label: 'Label Propagation',
    endpoint: 'labelpropagation',
    version: '1.0',
    defaultParams: {
      start_label_attribute: '_key',
      synchronous: false,
      random_tiebreak: false,
      maximum_supersteps: 100,
    },
    resultField: 'community',
  },
  betweenness: {
    id: 'betweenness',
    label: 'Betweenness Centrality',
    endpoint: 'betweenness',
    version: '1.0',
    defaultParams: { maximum_supersteps: 100 },
    resultField: 'centrality',
  },
};

export const SUPPORTED_ALGORITHMS: readonly AlgorithmId[] = [
  'pagerank',
  'wcc',
  'scc',
  'label_propagation',
  'betweenness',
];

/**
 * Caller spellings that map onto catalogue ids.
 */
const ALGORITHM_ALIASES: Record<string, AlgorithmId> = {
  'rank-propagation': 'pagerank',
  rank_propagation: 'pagerank',
  'weak-connectivity': 'wcc',
  weakly_connected_components: 'wcc',
  'strong-connectivity': 'scc',
  strongly_connected_components: 'scc',
  'label-propagation': 'label_propagation',
  labelpropagation: 'label_propagation',
};

export function isAlgorithmId(value: string): value is AlgorithmId {
  return Object.prototype.hasOwnProperty.call(ALGORITHM_CATALOG, value);
}

/**
 * Resolve a caller-supplied algorithm name to a catalogue id.
 *
 * @returns The id, or null when the algorithm is not supported
 */
export function resolveAlgorithmId(value: string): AlgorithmId | null {
  const normalized = value.trim().toLowerCase();
  if (isAlgorithmId(normalized)) {
    return normalized;
  }
  return ALGORITHM_ALIASES[normalized] ?? null;
}

export function getAlgorithmDefinition(id: AlgorithmId): AlgorithmDefinition {
  return ALGORITHM_CATALOG[id];
}
