export type IntentLabel =
  | 'factual_lookup'
  | 'semantic_analysis'
  | 'relationship_query'
  | 'investment_analysis'
  | 'comparative_analysis'
  | 'general';

export type Strategy = 'vector_only' | 'graph_only' | 'hybrid';

export type UserRole = 'investor' | 'developer' | 'buyer' | 'agent' | 'general';

export type EntityCategory = 'location' | 'propertyId' | 'metric' | 'agent';

export type EntitySet = { readonly [C in EntityCategory]: readonly string[] };

export interface SearchFilters {
  propertyType?: string;
  minPrice?: number;
  maxPrice?: number;
}

export interface QueryContext {
  role?: UserRole;
  filters?: SearchFilters;
  limit?: number;
  signal?: AbortSignal;
}

export type RetrievalSource = 'vector' | 'graph';

export interface SearchResult {
  readonly id: string;
  readonly source: RetrievalSource;
  readonly content: string;
  /** Similarity in [0,1] for vector hits; normalized template relevance for graph hits. */
  readonly score: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface RankedResult extends SearchResult {
  readonly combinedScore: number;
  readonly rank: number;
  readonly vectorScore: number | null;
  readonly graphScore: number | null;
  readonly sources: readonly RetrievalSource[];
}

export interface RetrievalWeights {
  vectorWeight: number;
  graphWeight: number;
}

export interface QueryAnalysis {
  readonly query: string;
  readonly entities: EntitySet;
  readonly intent: IntentLabel;
  readonly intentScores: Readonly<Record<IntentLabel, number>>;
  readonly strategy: Strategy;
  readonly strategyRule: string;
  readonly hasStructuredFilters: boolean;
}

export type SourceStatus = 'ok' | 'empty' | 'unavailable' | 'timeout' | 'failed' | 'skipped';

export interface SourceOutcome {
  readonly status: SourceStatus;
  readonly resultCount: number;
  readonly attempts: number;
  readonly durationMs: number;
  readonly error?: string;
}

export interface RankedResults extends QueryAnalysis {
  readonly role: UserRole;
  readonly weights: RetrievalWeights;
  readonly results: readonly RankedResult[];
  readonly sourceOutcomes: Readonly<Record<RetrievalSource, SourceOutcome>>;
  readonly fellBackToVector: boolean;
  readonly status: 'ok' | 'no_evidence';
  readonly message?: string;
  readonly latencyMs: number;
}

export type IssueKind = 'unsupported_claim' | 'ungrounded_language' | 'entity_drift';

export type IssueSeverity = 'low' | 'medium' | 'high';

export interface ValidationIssue {
  readonly kind: IssueKind;
  readonly span: string;
  readonly severity: IssueSeverity;
  readonly index: number;
}

export interface ValidationScores {
  readonly factualAccuracy: number;
  readonly grounding: number;
  readonly entityConsistency: number;
}

export interface ValidationOutcome {
  readonly passed: boolean;
  readonly confidence: number;
  readonly issues: readonly ValidationIssue[];
  readonly scores: ValidationScores;
}

export const EMPTY_ENTITY_SET: EntitySet = Object.freeze({
  location: [],
  propertyId: [],
  metric: [],
  agent: [],
});
