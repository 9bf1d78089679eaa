export * from './types';
export { extractEntities, splitLocation, canonicalLocation, hasAnyEntity } from './entities';
export { analyzeIntent, classifyIntent, INTENT_PRECEDENCE } from './classifier';
export type { IntentAnalysis } from './classifier';
export { explainStrategy, selectStrategy, hasStructuredFilters, STRATEGY_RULES } from './strategy';
export type { StrategyRule } from './strategy';
export { USER_ROLES, ROLE_PROFILES, roleProfile, isUserRole } from './roles';
export type { RoleProfile } from './roles';
export { computeWeights, DEFAULT_HYBRID_WEIGHTS } from './weights';
export { fuseResults, assertValidWeights, CROSS_SOURCE_BONUS } from './fuser';
export { GRAPH_TEMPLATES, planGraphQueries } from './graphTemplates';
export type { GraphTemplateKey, GraphParams, GraphQueryPlan } from './graphTemplates';
export { VectorSearchExecutor, GraphSearchExecutor } from './executors';
export type { VectorStore, GraphStore, SearchExecutor, ExecutorRequest } from './executors';
export { runGuarded, withTimeout, retryOnce, DEFAULT_EXECUTION_POLICY } from './resilience';
export type { ExecutionPolicy, GuardedResult } from './resilience';
