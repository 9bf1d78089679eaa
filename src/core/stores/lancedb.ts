import * as lancedb from '@lancedb/lancedb';
import fs from 'fs-extra';
import { z } from 'zod';
import type { SearchFilters, SearchResult } from '../retrieval/types';
import type { VectorStore } from '../retrieval/executors';
import { RequestCancelledError, StoreUnavailableError } from '../errors';
import type { Logger } from '../log';

export type ChunkTableName = 'property_chunks' | 'market_chunks';

export const CHUNK_TABLES: readonly ChunkTableName[] = ['property_chunks', 'market_chunks'];

const ChunkRowSchema = z
  .object({
    chunk_id: z.string(),
    content: z.string(),
    _distance: z.number(),
  })
  .passthrough();

// Columns that never reach result metadata.
const HIDDEN_COLUMNS = new Set(['vector', 'chunk_id', 'content', '_distance']);

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Caller filters as a LanceDB predicate. Only `property_chunks` carries
 * property type and price columns, so market chunks are never filtered.
 */
export function buildWhereClause(table: ChunkTableName, filters: SearchFilters | undefined): string | null {
  if (table !== 'property_chunks' || !filters) return null;
  const clauses: string[] = [];
  if (filters.propertyType) clauses.push(`lower(property_type) = ${sqlString(filters.propertyType.toLowerCase())}`);
  if (filters.minPrice !== undefined && Number.isFinite(filters.minPrice)) clauses.push(`price >= ${filters.minPrice}`);
  if (filters.maxPrice !== undefined && Number.isFinite(filters.maxPrice)) clauses.push(`price <= ${filters.maxPrice}`);
  return clauses.length > 0 ? clauses.join(' AND ') : null;
}

/** Cosine distance is in [0, 2]; similarity is `1 - distance`, clamped to [0, 1]. */
export function distanceToSimilarity(distance: number): number {
  if (!Number.isFinite(distance)) return 0;
  return Math.min(1, Math.max(0, 1 - distance));
}

export function rowToResult(table: ChunkTableName, row: unknown): SearchResult | null {
  const parsed = ChunkRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const metadata: Record<string, unknown> = { table };
  for (const [key, value] of Object.entries(parsed.data)) {
    if (HIDDEN_COLUMNS.has(key)) continue;
    if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) metadata[key] = value;
    else if (typeof value === 'bigint') metadata[key] = Number(value);
  }
  return {
    id: parsed.data.chunk_id,
    source: 'vector',
    content: parsed.data.content,
    score: distanceToSimilarity(parsed.data._distance),
    metadata,
  };
}

export interface LanceVectorStoreOptions {
  dbDir: string;
  logger: Logger;
}

export class LanceVectorStore implements VectorStore {
  private constructor(
    private readonly tables: ReadonlyMap<ChunkTableName, lancedb.Table>,
    private readonly logger: Logger
  ) {}

  static async open(options: LanceVectorStoreOptions): Promise<LanceVectorStore> {
    if (!await fs.pathExists(options.dbDir)) {
      throw new StoreUnavailableError('vector', `LanceDB directory not found: ${options.dbDir}`);
    }
    let db: lancedb.Connection;
    let names: string[];
    try {
      db = await lancedb.connect(options.dbDir);
      names = await db.tableNames();
    } catch (e) {
      throw new StoreUnavailableError('vector', `LanceDB connect failed: ${options.dbDir}`, { cause: e });
    }
    const tables = new Map<ChunkTableName, lancedb.Table>();
    for (const name of CHUNK_TABLES) {
      if (names.includes(name)) tables.set(name, await db.openTable(name));
      else options.logger.warn('lancedb table missing', { table: name, dbDir: options.dbDir });
    }
    return new LanceVectorStore(tables, options.logger);
  }

  async search(
    embedding: readonly number[],
    limit: number,
    threshold: number,
    filters: SearchFilters | undefined,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    if (signal?.aborted) throw new RequestCancelledError('vector search');
    const perTable = await Promise.all(
      [...this.tables].map(([name, table]) => this.searchTable(name, table, embedding, limit, filters))
    );
    if (signal?.aborted) throw new RequestCancelledError('vector search completed');
    return perTable
      .flat()
      .filter((r) => r.score >= threshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  private async searchTable(
    name: ChunkTableName,
    table: lancedb.Table,
    embedding: readonly number[],
    limit: number,
    filters: SearchFilters | undefined
  ): Promise<SearchResult[]> {
    const where = buildWhereClause(name, filters);
    let rows: unknown[];
    try {
      let query = table.vectorSearch([...embedding]).distanceType('cosine').limit(limit);
      if (where) query = query.where(where);
      rows = await query.toArray();
    } catch (e) {
      throw new StoreUnavailableError('vector', `LanceDB search failed on ${name}`, { cause: e });
    }
    const out: SearchResult[] = [];
    for (const row of rows) {
      const result = rowToResult(name, row);
      if (result) out.push(result);
      else this.logger.debug('lancedb row skipped', { table: name });
    }
    return out;
  }
}
