export * from './core/retrieval';
export { RetrievalPipeline, analyzeQuery, releaseAnswer } from './core/pipeline';
export type { PipelineDeps, ReleasedAnswer } from './core/pipeline';
export { validateResponse, DEFAULT_VALIDATOR_OPTIONS } from './core/validation/hallucination';
export type { ValidatorOptions, Evidence, EvidenceItem } from './core/validation/hallucination';
export { extractClaims } from './core/validation/claims';
export type { Claim, ClaimKind } from './core/validation/claims';
export {
  AnalyticsRecorder,
  InMemoryAnalyticsLog,
  JsonlAnalyticsLog,
  buildPerformanceReport,
} from './core/analytics';
export type { AnalyticsLog, AnalyticsRecord, AnalyticsSink, PerformanceReport } from './core/analytics';
export { loadRouterConfig, mergeRouterConfig, defaultRouterConfig } from './core/config';
export type { RouterConfig, RouterConfigOverrides } from './core/config';
export { openRuntime, createEmbedder } from './core/runtime';
export type { Runtime } from './core/runtime';
export { LanceVectorStore } from './core/stores/lancedb';
export { Neo4jGraphStore } from './core/stores/neo4j';
export { OpenAIEmbedder } from './core/stores/openaiEmbedder';
export { HashEmbedder } from './core/embedding';
export type { Embedder } from './core/embedding';
export * from './core/errors';
export { createLogger } from './core/log';
export type { Logger, LogLevel } from './core/log';
