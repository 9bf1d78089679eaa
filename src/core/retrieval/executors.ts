import type { EntitySet, IntentLabel, RetrievalSource, SearchFilters, SearchResult, UserRole } from './types';
import type { Embedder } from '../embedding';
import { GRAPH_TEMPLATES, planGraphQueries, type GraphParams, type GraphTemplateKey } from './graphTemplates';
import { roleProfile } from './roles';
import { RequestCancelledError } from '../errors';

/** Nearest-neighbour search over embedded property and market chunks. */
export interface VectorStore {
  search(
    embedding: readonly number[],
    limit: number,
    threshold: number,
    filters: SearchFilters | undefined,
    signal?: AbortSignal
  ): Promise<SearchResult[]>;
}

/** Runs a named, parameterized traversal. `score` on each row is the template's native relevance. */
export interface GraphStore {
  runTemplate(templateKey: GraphTemplateKey, params: GraphParams, signal?: AbortSignal): Promise<SearchResult[]>;
}

export interface ExecutorRequest {
  query: string;
  intent: IntentLabel;
  entities: EntitySet;
  limit: number;
  role?: UserRole;
  filters?: SearchFilters;
  signal?: AbortSignal;
}

export interface SearchExecutor {
  readonly source: RetrievalSource;
  execute(request: ExecutorRequest): Promise<SearchResult[]>;
}

function throwIfAborted(signal: AbortSignal | undefined, source: RetrievalSource): void {
  if (signal?.aborted) throw new RequestCancelledError(`${source} search`);
}

function clamp01(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export interface VectorExecutorOptions {
  store: VectorStore;
  embedder: Embedder;
  /** Overrides the role's similarity floor for every request. */
  similarityThreshold?: number;
}

export class VectorSearchExecutor implements SearchExecutor {
  readonly source = 'vector' as const;
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly thresholdOverride: number | undefined;

  constructor(options: VectorExecutorOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.thresholdOverride = options.similarityThreshold;
  }

  thresholdFor(role?: UserRole): number {
    return this.thresholdOverride ?? roleProfile(role).similarityThreshold;
  }

  async execute(request: ExecutorRequest): Promise<SearchResult[]> {
    const { query, limit, filters, signal } = request;
    throwIfAborted(signal, this.source);
    if (limit <= 0) return [];

    const threshold = this.thresholdFor(request.role);
    const embedding = await this.embedder.embed(query, signal);
    throwIfAborted(signal, this.source);
    const hits = await this.store.search(embedding, limit, threshold, filters, signal);

    return hits
      .map((hit, idx) => ({ hit, idx, score: clamp01(hit.score) }))
      .filter((h) => h.score >= threshold)
      .sort((a, b) => b.score - a.score || a.idx - b.idx)
      .slice(0, limit)
      .map(({ hit, score }) => ({ ...hit, source: 'vector' as const, score }));
  }
}

export const GRAPH_RANK_DECAY = 0.1;

/** Rank-based inverse scaling: the store's own ordering decides, the template sets the ceiling. */
export function graphRankScore(baseRelevance: number, position: number): number {
  return clamp01(baseRelevance / (1 + GRAPH_RANK_DECAY * position));
}

export interface GraphExecutorOptions {
  store: GraphStore;
}

export class GraphSearchExecutor implements SearchExecutor {
  readonly source = 'graph' as const;
  private readonly store: GraphStore;

  constructor(options: GraphExecutorOptions) {
    this.store = options.store;
  }

  async execute(request: ExecutorRequest): Promise<SearchResult[]> {
    const { query, intent, entities, filters, limit, signal } = request;
    throwIfAborted(signal, this.source);
    if (limit <= 0) return [];

    const plans = planGraphQueries(query, intent, entities, filters, limit);
    if (plans.length === 0) return [];

    const batches = await Promise.all(plans.map((plan) => this.store.runTemplate(plan.template, plan.params, signal)));
    throwIfAborted(signal, this.source);

    const byId = new Map<string, SearchResult>();
    const order: string[] = [];
    batches.forEach((rows, planIdx) => {
      const plan = plans[planIdx];
      if (!plan) return;
      const base = GRAPH_TEMPLATES[plan.template].baseRelevance;
      rows.forEach((row, position) => {
        const scored: SearchResult = {
          ...row,
          source: 'graph',
          score: graphRankScore(base, position),
          metadata: { ...row.metadata, template: plan.template, nativeScore: row.score },
        };
        const existing = byId.get(row.id);
        if (!existing) order.push(row.id);
        if (!existing || scored.score > existing.score) byId.set(row.id, scored);
      });
    });

    const out: SearchResult[] = [];
    for (const id of order) {
      const result = byId.get(id);
      if (result) out.push(result);
    }
    return out.slice(0, limit);
  }
}
