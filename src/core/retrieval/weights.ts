import type { RetrievalWeights, Strategy, UserRole } from './types';
import { roleProfile } from './roles';

export const DEFAULT_HYBRID_WEIGHTS: Readonly<RetrievalWeights> = { vectorWeight: 0.7, graphWeight: 0.3 };

const SINGLE_SOURCE_WEIGHTS: Readonly<Record<Exclude<Strategy, 'hybrid'>, RetrievalWeights>> = {
  vector_only: { vectorWeight: 1, graphWeight: 0 },
  graph_only: { vectorWeight: 0, graphWeight: 1 },
};

function normalize(weights: RetrievalWeights): RetrievalWeights {
  const v = Math.max(0, weights.vectorWeight);
  const g = Math.max(0, weights.graphWeight);
  const total = v + g;
  if (total <= 0) return { ...DEFAULT_HYBRID_WEIGHTS };
  return { vectorWeight: v / total, graphWeight: g / total };
}

/**
 * Fusion weights for a strategy. Single-source strategies put the whole
 * weight on the source that ran; hybrid uses the role's weights normalized
 * to sum to 1.
 */
export function computeWeights(strategy: Strategy, role?: UserRole): RetrievalWeights {
  if (strategy !== 'hybrid') return { ...SINGLE_SOURCE_WEIGHTS[strategy] };
  return normalize(roleProfile(role).hybridWeights);
}
