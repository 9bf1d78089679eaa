import type { EntitySet, IntentLabel, SearchFilters, Strategy } from './types';

export interface StrategyInput {
  intent: IntentLabel;
  entities: EntitySet;
  hasStructuredFilters: boolean;
}

export interface StrategyRule {
  readonly name: string;
  readonly strategy: Strategy;
  readonly when: (input: StrategyInput) => boolean;
}

/** Evaluated top to bottom; the first rule whose condition holds decides. */
export const STRATEGY_RULES: readonly StrategyRule[] = [
  { name: 'relationship', strategy: 'graph_only', when: (i) => i.intent === 'relationship_query' },
  { name: 'located_fact', strategy: 'graph_only', when: (i) => i.intent === 'factual_lookup' && i.entities.location.length > 0 },
  { name: 'comparative', strategy: 'hybrid', when: (i) => i.intent === 'comparative_analysis' },
  { name: 'investment', strategy: 'hybrid', when: (i) => i.intent === 'investment_analysis' },
  { name: 'semantic', strategy: 'vector_only', when: (i) => i.intent === 'semantic_analysis' },
  { name: 'fallback', strategy: 'hybrid', when: () => true },
];

export function explainStrategy(intent: IntentLabel, entities: EntitySet, hasStructuredFilters: boolean): StrategyRule {
  const input: StrategyInput = { intent, entities, hasStructuredFilters };
  for (const rule of STRATEGY_RULES) {
    if (rule.when(input)) return rule;
  }
  throw new Error('strategy table has no fallback rule');
}

export function selectStrategy(intent: IntentLabel, entities: EntitySet, hasStructuredFilters: boolean): Strategy {
  return explainStrategy(intent, entities, hasStructuredFilters).strategy;
}

export function hasStructuredFilters(filters: SearchFilters | undefined): boolean {
  if (!filters) return false;
  return Boolean(filters.propertyType) || filters.minPrice !== undefined || filters.maxPrice !== undefined;
}
