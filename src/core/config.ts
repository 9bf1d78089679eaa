import { z } from 'zod';
import type { IssueSeverity } from './retrieval/types';
import { DEFAULT_VALIDATOR_OPTIONS, type ValidatorOptions } from './validation/hallucination';
import { DEFAULT_EXECUTION_POLICY } from './retrieval/resilience';
import { InvalidConfigError } from './errors';

export interface RetrievalConfig {
  defaultLimit: number;
  /** Budget for one executor call, retry included. */
  executorTimeoutMs: number;
  retryBackoffMs: number;
  /** Overrides every role's vector similarity floor when set. */
  similarityThreshold?: number;
  fallbackToVectorOnGraphFailure: boolean;
}

export type EmbeddingProvider = 'hash' | 'openai';

export interface StoresConfig {
  lancedbDir: string;
  neo4j: { uri: string; user: string; password: string; database: string };
  embedding: { provider: EmbeddingProvider; model: string; dim: number; apiKey?: string };
  analyticsLog: string;
}

export interface RouterConfig {
  retrieval: RetrievalConfig;
  validation: ValidatorOptions;
  stores: StoresConfig;
}

export interface RouterConfigOverrides {
  retrieval?: Partial<RetrievalConfig>;
  validation?: Partial<ValidatorOptions>;
  stores?: Partial<Omit<StoresConfig, 'neo4j' | 'embedding'>> & {
    neo4j?: Partial<StoresConfig['neo4j']>;
    embedding?: Partial<StoresConfig['embedding']>;
  };
}

export function defaultRetrievalConfig(): RetrievalConfig {
  return {
    defaultLimit: 10,
    executorTimeoutMs: DEFAULT_EXECUTION_POLICY.timeoutMs,
    retryBackoffMs: DEFAULT_EXECUTION_POLICY.retryBackoffMs,
    fallbackToVectorOnGraphFailure: true,
  };
}

export function defaultStoresConfig(): StoresConfig {
  return {
    lancedbDir: '.realty-rag/lancedb',
    neo4j: { uri: 'bolt://localhost:7687', user: 'neo4j', password: '', database: 'neo4j' },
    embedding: { provider: 'hash', model: 'text-embedding-3-small', dim: 1536 },
    analyticsLog: '.realty-rag/analytics.jsonl',
  };
}

export function defaultRouterConfig(): RouterConfig {
  return {
    retrieval: defaultRetrievalConfig(),
    validation: { ...DEFAULT_VALIDATOR_OPTIONS },
    stores: defaultStoresConfig(),
  };
}

function applyOverrides(base: RouterConfig, overrides?: RouterConfigOverrides): RouterConfig {
  if (!overrides) return base;
  return {
    retrieval: { ...base.retrieval, ...overrides.retrieval },
    validation: { ...base.validation, ...overrides.validation },
    stores: {
      ...base.stores,
      ...overrides.stores,
      neo4j: { ...base.stores.neo4j, ...overrides.stores?.neo4j },
      embedding: { ...base.stores.embedding, ...overrides.stores?.embedding },
    },
  };
}

export function mergeRouterConfig(overrides?: RouterConfigOverrides): RouterConfig {
  return applyOverrides(defaultRouterConfig(), overrides);
}

// Unset and blank variables both mean "use the default".
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);
const optional = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema.optional());

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'].includes(v), 'expected a boolean flag')
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const severity: z.ZodType<IssueSeverity> = z.enum(['low', 'medium', 'high']);

const EnvSchema = z.object({
  REALTY_RAG_DEFAULT_LIMIT: optional(z.coerce.number().int().min(1).max(200)),
  REALTY_RAG_EXECUTOR_TIMEOUT_MS: optional(z.coerce.number().int().min(100).max(60_000)),
  REALTY_RAG_RETRY_BACKOFF_MS: optional(z.coerce.number().int().min(0).max(10_000)),
  REALTY_RAG_SIMILARITY_THRESHOLD: optional(z.coerce.number().min(0).max(1)),
  REALTY_RAG_GRAPH_FALLBACK: optional(flag),
  REALTY_RAG_VALIDATION_THRESHOLD: optional(z.coerce.number().min(0).max(1)),
  REALTY_RAG_SEVERITY_CUTOFF: optional(severity),
  REALTY_RAG_THIN_EVIDENCE_COUNT: optional(z.coerce.number().int().min(0).max(100)),
  REALTY_RAG_MAX_UNSUPPORTED_ENTITIES: optional(z.coerce.number().int().min(0).max(20)),
  REALTY_RAG_ANALYTICS_LOG: optional(z.string()),
  LANCEDB_DIR: optional(z.string()),
  NEO4J_URI: optional(z.string().regex(/^(?:bolt|neo4j)(?:\+s|\+ssc)?:\/\//, 'expected a bolt:// or neo4j:// uri')),
  NEO4J_USER: optional(z.string()),
  NEO4J_PASSWORD: optional(z.string()),
  NEO4J_DATABASE: optional(z.string()),
  OPENAI_API_KEY: optional(z.string()),
  EMBEDDING_PROVIDER: optional(z.enum(['hash', 'openai'])),
  EMBEDDING_MODEL: optional(z.string()),
  EMBEDDING_DIM: optional(z.coerce.number().int().min(8).max(8192)),
});

/**
 * Reads configuration from environment variables over the defaults. The
 * embedding provider defaults to `openai` when `OPENAI_API_KEY` is set.
 */
export function loadRouterConfig(env: NodeJS.ProcessEnv = process.env, overrides?: RouterConfigOverrides): RouterConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  const d = defaultRouterConfig();
  const fromEnv: RouterConfig = {
    retrieval: {
      defaultLimit: e.REALTY_RAG_DEFAULT_LIMIT ?? d.retrieval.defaultLimit,
      executorTimeoutMs: e.REALTY_RAG_EXECUTOR_TIMEOUT_MS ?? d.retrieval.executorTimeoutMs,
      retryBackoffMs: e.REALTY_RAG_RETRY_BACKOFF_MS ?? d.retrieval.retryBackoffMs,
      similarityThreshold: e.REALTY_RAG_SIMILARITY_THRESHOLD ?? d.retrieval.similarityThreshold,
      fallbackToVectorOnGraphFailure: e.REALTY_RAG_GRAPH_FALLBACK ?? d.retrieval.fallbackToVectorOnGraphFailure,
    },
    validation: {
      threshold: e.REALTY_RAG_VALIDATION_THRESHOLD ?? d.validation.threshold,
      severityCutoff: e.REALTY_RAG_SEVERITY_CUTOFF ?? d.validation.severityCutoff,
      thinEvidenceCount: e.REALTY_RAG_THIN_EVIDENCE_COUNT ?? d.validation.thinEvidenceCount,
      maxUnsupportedEntities: e.REALTY_RAG_MAX_UNSUPPORTED_ENTITIES ?? d.validation.maxUnsupportedEntities,
    },
    stores: {
      lancedbDir: e.LANCEDB_DIR ?? d.stores.lancedbDir,
      analyticsLog: e.REALTY_RAG_ANALYTICS_LOG ?? d.stores.analyticsLog,
      neo4j: {
        uri: e.NEO4J_URI ?? d.stores.neo4j.uri,
        user: e.NEO4J_USER ?? d.stores.neo4j.user,
        password: e.NEO4J_PASSWORD ?? d.stores.neo4j.password,
        database: e.NEO4J_DATABASE ?? d.stores.neo4j.database,
      },
      embedding: {
        provider: e.EMBEDDING_PROVIDER ?? (e.OPENAI_API_KEY ? 'openai' : d.stores.embedding.provider),
        model: e.EMBEDDING_MODEL ?? d.stores.embedding.model,
        dim: e.EMBEDDING_DIM ?? d.stores.embedding.dim,
        apiKey: e.OPENAI_API_KEY,
      },
    },
  };
  return applyOverrides(fromEnv, overrides);
}
