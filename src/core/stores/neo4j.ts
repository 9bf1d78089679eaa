import neo4j, { Neo4jError, type Driver } from 'neo4j-driver';
import type { SearchResult } from '../retrieval/types';
import type { GraphStore } from '../retrieval/executors';
import { GRAPH_TEMPLATES, type GraphParams, type GraphTemplateKey } from '../retrieval/graphTemplates';
import { RequestCancelledError, StoreUnavailableError } from '../errors';
import { serializeError, type Logger } from '../log';

export interface GraphRow {
  readonly keys: readonly string[];
  get(key: string): unknown;
}

/** The slice of a driver session the store uses. */
export interface GraphSession {
  run(cypher: string, params: Record<string, unknown>): Promise<GraphRow[]>;
  close(): Promise<void>;
}

export interface Neo4jConnectionConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
}

const UNAVAILABLE_CODES = new Set<string>([neo4j.error.SERVICE_UNAVAILABLE, neo4j.error.SESSION_EXPIRED]);

/** Connectivity and transient cluster errors become `StoreUnavailableError`; the rest pass through. */
export function mapNeo4jError(e: unknown): unknown {
  if (e instanceof Neo4jError && (UNAVAILABLE_CODES.has(e.code) || e.code.startsWith('Neo.TransientError.'))) {
    return new StoreUnavailableError('graph', `Neo4j unavailable: ${e.message}`, { cause: e });
  }
  return e;
}

/** Driver values to plain JSON-friendly values: integers to numbers, temporals to ISO strings. */
export function toPlainValue(value: unknown): unknown {
  if (neo4j.isInt(value)) return value.inSafeRange() ? value.toNumber() : value.toString();
  if (neo4j.isDate(value) || neo4j.isDateTime(value) || neo4j.isLocalDateTime(value)) return value.toString();
  if (Array.isArray(value)) return value.map((v: unknown) => toPlainValue(v));
  return value;
}

export function toCypherParams(params: GraphParams): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    out[key] = key === 'limit' && typeof value === 'number' ? neo4j.int(Math.max(0, Math.floor(value))) : value;
  }
  return out;
}

/** Maps one template row; rows without a string id or content are dropped. */
export function rowToResult(template: GraphTemplateKey, row: GraphRow): SearchResult | null {
  const id = toPlainValue(row.get('id'));
  const content = toPlainValue(row.get('content'));
  if ((typeof id !== 'string' && typeof id !== 'number') || typeof content !== 'string' || !content) return null;
  const score = toPlainValue(row.get('score'));
  const metadata: Record<string, unknown> = { template };
  for (const key of row.keys) {
    if (key === 'id' || key === 'content' || key === 'score') continue;
    const value = toPlainValue(row.get(key));
    if (value !== null && value !== undefined) metadata[key] = value;
  }
  return {
    id: String(id),
    source: 'graph',
    content,
    score: typeof score === 'number' && Number.isFinite(score) ? score : 0,
    metadata,
  };
}

export class Neo4jGraphStore implements GraphStore {
  constructor(
    private readonly openSession: () => GraphSession,
    private readonly logger: Logger,
    private readonly onClose: () => Promise<void> = async () => {}
  ) {}

  static connect(config: Neo4jConnectionConfig, logger: Logger): Neo4jGraphStore {
    const driver: Driver = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password));
    const openSession = (): GraphSession => {
      const session = driver.session({ database: config.database, defaultAccessMode: neo4j.session.READ });
      return {
        run: async (cypher, params) => {
          const result = await session.run(cypher, params);
          return result.records.map((record) => ({
            keys: record.keys.map((k) => String(k)),
            get: (key: string): unknown => record.get(key),
          }));
        },
        close: () => session.close(),
      };
    };
    return new Neo4jGraphStore(openSession, logger, () => driver.close());
  }

  async runTemplate(templateKey: GraphTemplateKey, params: GraphParams, signal?: AbortSignal): Promise<SearchResult[]> {
    if (signal?.aborted) throw new RequestCancelledError(`graph template ${templateKey}`);
    const template = GRAPH_TEMPLATES[templateKey];
    const session = this.openSession();
    // Closing the session is the only way to interrupt a running query.
    const onAbort = () => {
      session.close().catch((e: unknown) => this.logger.debug('neo4j session close on abort failed', { err: serializeError(e) }));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const rows = await session.run(template.cypher, toCypherParams(params));
      const out: SearchResult[] = [];
      for (const row of rows) {
        const result = rowToResult(templateKey, row);
        if (result) out.push(result);
      }
      this.logger.debug('graph template', { template: templateKey, rows: rows.length, kept: out.length });
      return out;
    } catch (e) {
      if (signal?.aborted) throw new RequestCancelledError(`graph template ${templateKey}`);
      throw mapNeo4jError(e);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!signal?.aborted) await session.close();
    }
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
