import type { RetrievalWeights, UserRole } from './types';

export interface RoleProfile {
  /** Vector similarity floor applied by the vector executor. */
  similarityThreshold: number;
  /** Hybrid-mode fusion weights; normalized to sum to 1 before use. */
  hybridWeights: RetrievalWeights;
}

export const USER_ROLES: readonly UserRole[] = ['investor', 'developer', 'buyer', 'agent', 'general'];

// Investors and agents lean on graph facts (comps, agents, market metrics);
// buyers and developers lean on descriptive listing and zoning text.
export const ROLE_PROFILES: Readonly<Record<UserRole, RoleProfile>> = {
  investor: { similarityThreshold: 0.65, hybridWeights: { vectorWeight: 0.6, graphWeight: 0.4 } },
  developer: { similarityThreshold: 0.6, hybridWeights: { vectorWeight: 0.7, graphWeight: 0.3 } },
  buyer: { similarityThreshold: 0.6, hybridWeights: { vectorWeight: 0.75, graphWeight: 0.25 } },
  agent: { similarityThreshold: 0.65, hybridWeights: { vectorWeight: 0.6, graphWeight: 0.4 } },
  general: { similarityThreshold: 0.65, hybridWeights: { vectorWeight: 0.7, graphWeight: 0.3 } },
};

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function roleProfile(role: UserRole | undefined): RoleProfile {
  return ROLE_PROFILES[role ?? 'general'];
}
