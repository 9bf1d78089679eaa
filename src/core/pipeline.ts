import { z } from 'zod';
import type {
  QueryAnalysis,
  QueryContext,
  RankedResults,
  RetrievalSource,
  SourceOutcome,
  UserRole,
  ValidationIssue,
  ValidationOutcome,
} from './retrieval/types';
import { extractEntities } from './retrieval/entities';
import { analyzeIntent } from './retrieval/classifier';
import { explainStrategy, hasStructuredFilters } from './retrieval/strategy';
import { USER_ROLES } from './retrieval/roles';
import { computeWeights } from './retrieval/weights';
import { fuseResults } from './retrieval/fuser';
import {
  GraphSearchExecutor,
  VectorSearchExecutor,
  type ExecutorRequest,
  type GraphStore,
  type SearchExecutor,
  type VectorStore,
} from './retrieval/executors';
import { runGuarded, type ExecutionPolicy, type GuardedResult } from './retrieval/resilience';
import { validateResponse, type Evidence } from './validation/hallucination';
import type { Embedder } from './embedding';
import type { AnalyticsSink } from './analytics';
import { defaultRouterConfig, type RouterConfig } from './config';
import {
  InvalidRequestError,
  NO_RELIABLE_INFORMATION_MESSAGE,
  RequestCancelledError,
  ValidationFailedError,
} from './errors';
import { createLogger, type Logger } from './log';

const FiltersSchema = z
  .object({
    propertyType: z.string().trim().min(1).optional(),
    minPrice: z.number().finite().nonnegative().optional(),
    maxPrice: z.number().finite().nonnegative().optional(),
  })
  .strict()
  .refine((f) => f.minPrice === undefined || f.maxPrice === undefined || f.minPrice <= f.maxPrice, {
    message: 'minPrice must not exceed maxPrice',
  });

const RoleSchema = z.custom<UserRole>((v) => USER_ROLES.some((role) => role === v), {
  message: `role must be one of ${USER_ROLES.join(', ')}`,
});

const QueryContextSchema = z.object({
  role: RoleSchema.optional(),
  filters: FiltersSchema.optional(),
  limit: z.number().int().min(1).max(200).optional(),
  signal: z.instanceof(AbortSignal).optional(),
});

const DEGRADED: ReadonlySet<SourceOutcome['status']> = new Set(['unavailable', 'timeout', 'failed']);

const SKIPPED: SourceOutcome = { status: 'skipped', resultCount: 0, attempts: 0, durationMs: 0 };

export interface PipelineDeps {
  vectorStore: VectorStore;
  graphStore: GraphStore;
  embedder: Embedder;
  recorder?: AnalyticsSink;
  config?: RouterConfig;
  logger?: Logger;
}

export type ReleasedAnswer =
  | { status: 'released'; answer: string; confidence: number }
  | {
      status: 'low_confidence';
      answer: string;
      confidence: number;
      message: string;
      issues: readonly ValidationIssue[];
    };

function parseContext(context: QueryContext): QueryContext {
  const parsed = QueryContextSchema.safeParse(context);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues.map((i) => `${i.path.join('.') || 'context'}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

/** Extraction and classification run side by side; strategy selection waits on both. */
export async function analyzeQuery(
  query: string,
  context: Pick<QueryContext, 'filters'>,
  logger: Logger
): Promise<QueryAnalysis> {
  const text = String(query ?? '');
  const [entities, intent] = await Promise.all([
    Promise.resolve().then(() => extractEntities(text)),
    Promise.resolve().then(() => analyzeIntent(text)),
  ]);
  if (intent.tied.length > 1) {
    logger.warn('ExtractionAmbiguous', { query: text, tied: intent.tied, chosen: intent.intent });
  }
  const structured = hasStructuredFilters(context.filters);
  const rule = explainStrategy(intent.intent, entities, structured);
  return {
    query: text,
    entities,
    intent: intent.intent,
    intentScores: intent.scores,
    strategy: rule.strategy,
    strategyRule: rule.name,
    hasStructuredFilters: structured,
  };
}

/**
 * A failed answer is never suppressed: it is returned flagged as low
 * confidence alongside the no-reliable-information message.
 */
export function releaseAnswer(generatedText: string, outcome: ValidationOutcome): ReleasedAnswer {
  if (outcome.passed) return { status: 'released', answer: generatedText, confidence: outcome.confidence };
  return {
    status: 'low_confidence',
    answer: generatedText,
    confidence: outcome.confidence,
    message: NO_RELIABLE_INFORMATION_MESSAGE,
    issues: outcome.issues,
  };
}

export class RetrievalPipeline {
  private readonly vector: SearchExecutor;
  private readonly graph: SearchExecutor;
  private readonly recorder: AnalyticsSink | undefined;
  private readonly config: RouterConfig;
  private readonly logger: Logger;

  constructor(deps: PipelineDeps) {
    this.config = deps.config ?? defaultRouterConfig();
    this.logger = deps.logger ?? createLogger({ component: 'pipeline' });
    this.recorder = deps.recorder;
    this.vector = new VectorSearchExecutor({
      store: deps.vectorStore,
      embedder: deps.embedder,
      similarityThreshold: this.config.retrieval.similarityThreshold,
    });
    this.graph = new GraphSearchExecutor({ store: deps.graphStore });
  }

  private get policy(): ExecutionPolicy {
    return { timeoutMs: this.config.retrieval.executorTimeoutMs, retryBackoffMs: this.config.retrieval.retryBackoffMs };
  }

  analyze(query: string, context: Pick<QueryContext, 'filters'> = {}): Promise<QueryAnalysis> {
    return analyzeQuery(query, context, this.logger);
  }

  async routeAndSearch(query: string, context: QueryContext = {}): Promise<RankedResults> {
    const startedAt = Date.now();
    const ctx = parseContext(context);
    const { signal } = ctx;
    if (signal?.aborted) throw new RequestCancelledError('analysis');

    const analysis = await this.analyze(query, ctx);
    const role: UserRole = ctx.role ?? 'general';
    const limit = ctx.limit ?? this.config.retrieval.defaultLimit;
    const request: ExecutorRequest = {
      query: analysis.query,
      intent: analysis.intent,
      entities: analysis.entities,
      limit,
      role,
      filters: ctx.filters,
      signal,
    };

    try {
      const runVector = analysis.strategy !== 'graph_only';
      const runGraph = analysis.strategy !== 'vector_only';
      const [firstVector, graph] = await Promise.all([
        runVector ? this.run(this.vector, request) : Promise.resolve(null),
        runGraph ? this.run(this.graph, request) : Promise.resolve(null),
      ]);

      let vector = firstVector;
      let fellBackToVector = false;
      if (
        analysis.strategy === 'graph_only' &&
        graph &&
        DEGRADED.has(graph.outcome.status) &&
        this.config.retrieval.fallbackToVectorOnGraphFailure
      ) {
        this.logger.warn('graph failed, falling back to vector search', { status: graph.outcome.status });
        vector = await this.run(this.vector, request);
        fellBackToVector = true;
      }

      if (signal?.aborted) throw new RequestCancelledError('fusion');

      const weights = computeWeights(fellBackToVector ? 'vector_only' : analysis.strategy, role);
      const results = fuseResults(vector?.results ?? [], graph?.results ?? [], weights, limit);
      const sourceOutcomes: Record<RetrievalSource, SourceOutcome> = {
        vector: vector?.outcome ?? SKIPPED,
        graph: graph?.outcome ?? SKIPPED,
      };
      const hadError = Object.values(sourceOutcomes).some((o) => DEGRADED.has(o.status));
      const latencyMs = Date.now() - startedAt;
      const noEvidence = results.length === 0;

      this.recorder?.record(analysis.query, analysis.strategy, latencyMs, results.length, hadError);
      this.logger.info('route_and_search', {
        intent: analysis.intent,
        strategy: analysis.strategy,
        rule: analysis.strategyRule,
        role,
        vector: sourceOutcomes.vector.status,
        graph: sourceOutcomes.graph.status,
        fell_back: fellBackToVector,
        results: results.length,
        duration_ms: latencyMs,
      });
      if (noEvidence) this.logger.warn('NoEvidenceFound', { query: analysis.query, strategy: analysis.strategy });

      return {
        ...analysis,
        role,
        weights,
        results,
        sourceOutcomes,
        fellBackToVector,
        status: noEvidence ? 'no_evidence' : 'ok',
        ...(noEvidence ? { message: NO_RELIABLE_INFORMATION_MESSAGE } : {}),
        latencyMs,
      };
    } catch (e) {
      if (e instanceof RequestCancelledError) {
        this.recorder?.record(analysis.query, analysis.strategy, Date.now() - startedAt, 0, true);
        this.logger.info('request cancelled', { strategy: analysis.strategy });
      }
      throw e;
    }
  }

  private run(executor: SearchExecutor, request: ExecutorRequest): Promise<GuardedResult> {
    const logger = this.logger.child({ source: executor.source });
    return runGuarded(
      executor.source,
      (signal) => executor.execute({ ...request, signal }),
      this.policy,
      logger,
      request.signal
    );
  }

  validate(generatedText: string, evidence: Evidence): ValidationOutcome {
    const outcome = validateResponse(generatedText, evidence, this.config.validation);
    const fields = {
      passed: outcome.passed,
      confidence: Number(outcome.confidence.toFixed(3)),
      issues: outcome.issues.length,
      ...outcome.scores,
    };
    if (outcome.passed) this.logger.info('validation', fields);
    else this.logger.warn('ValidationFailed', fields);
    return outcome;
  }

  releaseAnswer(generatedText: string, outcome: ValidationOutcome): ReleasedAnswer {
    return releaseAnswer(generatedText, outcome);
  }

  assertValidated(outcome: ValidationOutcome): void {
    if (!outcome.passed) throw new ValidationFailedError(outcome.confidence, outcome.issues.length);
  }
}
