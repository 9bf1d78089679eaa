import { HashEmbedder, type Embedder } from './embedding';
import { OpenAIEmbedder } from './stores/openaiEmbedder';
import { LanceVectorStore } from './stores/lancedb';
import { Neo4jGraphStore } from './stores/neo4j';
import { AnalyticsRecorder, JsonlAnalyticsLog } from './analytics';
import { RetrievalPipeline } from './pipeline';
import type { RouterConfig, StoresConfig } from './config';
import { InvalidConfigError } from './errors';
import type { Logger } from './log';

export function createEmbedder(config: StoresConfig['embedding']): Embedder {
  if (config.provider === 'openai') {
    if (!config.apiKey) throw new InvalidConfigError(['OPENAI_API_KEY: required when EMBEDDING_PROVIDER=openai']);
    return new OpenAIEmbedder({ model: config.model, dim: config.dim, apiKey: config.apiKey });
  }
  return new HashEmbedder(config.dim);
}

export interface Runtime {
  pipeline: RetrievalPipeline;
  recorder: AnalyticsRecorder;
  /** Drains pending analytics and closes the graph driver. */
  close(): Promise<void>;
}

/** Wires the pipeline to LanceDB, Neo4j and the JSON-lines analytics log. */
export async function openRuntime(config: RouterConfig, logger: Logger): Promise<Runtime> {
  const embedder = createEmbedder(config.stores.embedding);
  const vectorStore = await LanceVectorStore.open({ dbDir: config.stores.lancedbDir, logger: logger.child({ store: 'lancedb' }) });
  const graphStore = Neo4jGraphStore.connect(config.stores.neo4j, logger.child({ store: 'neo4j' }));
  const recorder = new AnalyticsRecorder(new JsonlAnalyticsLog(config.stores.analyticsLog, logger), logger.child({ component: 'analytics' }));
  const pipeline = new RetrievalPipeline({ vectorStore, graphStore, embedder, recorder, config, logger: logger.child({ component: 'pipeline' }) });
  return {
    pipeline,
    recorder,
    close: async () => {
      await recorder.flush();
      await graphStore.close();
    },
  };
}
