import type { Logger, LogFields, LogLevel } from '../src/core/log';
import type { Embedder } from '../src/core/embedding';
import type { GraphStore, VectorStore } from '../src/core/retrieval/executors';
import type { GraphParams, GraphTemplateKey } from '../src/core/retrieval/graphTemplates';
import type { RetrievalSource, SearchFilters, SearchResult } from '../src/core/retrieval/types';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  fields: LogFields;
}

/** Logger that keeps every record in memory; children share the parent's buffer. */
export function recordingLogger(entries: LogEntry[] = [], base: LogFields = {}): Logger & { entries: LogEntry[] } {
  const write = (level: LogLevel) => (msg: string, fields?: LogFields) => {
    entries.push({ level, msg, fields: { ...base, ...fields } });
  };
  return {
    entries,
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (fields) => recordingLogger(entries, { ...base, ...fields }),
    span: async (_name, _fields, fn) => fn(),
  };
}

export function hit(id: string, score: number, content = `content of ${id}`, source: RetrievalSource = 'vector'): SearchResult {
  return { id, source, content, score, metadata: {} };
}

export class FixedEmbedder implements Embedder {
  readonly model = 'fixed';
  readonly dim = 4;
  calls: string[] = [];

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return [1, 0, 0, 0];
  }
}

type VectorBehaviour = (attempt: number, signal?: AbortSignal) => Promise<SearchResult[]>;

export class FakeVectorStore implements VectorStore {
  calls: { limit: number; threshold: number; filters: SearchFilters | undefined }[] = [];

  constructor(private readonly behaviour: VectorBehaviour) {}

  static returning(results: SearchResult[]): FakeVectorStore {
    return new FakeVectorStore(async () => results);
  }

  async search(
    _embedding: readonly number[],
    limit: number,
    threshold: number,
    filters: SearchFilters | undefined,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    this.calls.push({ limit, threshold, filters });
    return this.behaviour(this.calls.length, signal);
  }
}

type GraphBehaviour = (key: GraphTemplateKey, params: GraphParams, attempt: number) => Promise<SearchResult[]>;

export class FakeGraphStore implements GraphStore {
  calls: { key: GraphTemplateKey; params: GraphParams }[] = [];

  constructor(private readonly behaviour: GraphBehaviour) {}

  static returning(byTemplate: Partial<Record<GraphTemplateKey, SearchResult[]>>): FakeGraphStore {
    return new FakeGraphStore(async (key) => byTemplate[key] ?? []);
  }

  async runTemplate(key: GraphTemplateKey, params: GraphParams): Promise<SearchResult[]> {
    this.calls.push({ key, params });
    return this.behaviour(key, params, this.calls.length);
  }
}

/** A promise that never settles on its own; for stores that ignore their signal. */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}
