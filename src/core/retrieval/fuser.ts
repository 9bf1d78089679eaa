import type { RankedResult, RetrievalSource, RetrievalWeights, SearchResult } from './types';
import { sha256Hex } from '../crypto';
import { normalizeKey } from './matcher';
import { InvalidWeightsError } from '../errors';

export const CROSS_SOURCE_BONUS = 0.05;
const WEIGHT_EPSILON = 1e-6;

interface SourceEntry {
  result: SearchResult;
  score: number;
  /** Position in the executor's output after in-source dedupe. */
  order: number;
  contentHash: string;
}

interface MergedEntry {
  key: string;
  vector?: SourceEntry;
  graph?: SourceEntry;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export function contentHash(content: string): string {
  return sha256Hex(normalizeKey(content));
}

function dedupeSource(results: readonly SearchResult[]): SourceEntry[] {
  const byId = new Map<string, SourceEntry>();
  const out: SourceEntry[] = [];
  for (const result of results) {
    const score = clampScore(result.score);
    const existing = byId.get(result.id);
    if (existing) {
      if (score > existing.score) {
        existing.result = result;
        existing.score = score;
        existing.contentHash = contentHash(result.content);
      }
      continue;
    }
    const entry: SourceEntry = { result, score, order: out.length, contentHash: contentHash(result.content) };
    byId.set(result.id, entry);
    out.push(entry);
  }
  return out;
}

export function assertValidWeights(weights: RetrievalWeights): void {
  const { vectorWeight, graphWeight } = weights;
  if (!Number.isFinite(vectorWeight) || !Number.isFinite(graphWeight) || vectorWeight < 0 || graphWeight < 0) {
    throw new InvalidWeightsError(`weights must be finite and non-negative, got ${vectorWeight}/${graphWeight}`);
  }
  if (Math.abs(vectorWeight + graphWeight - 1) > WEIGHT_EPSILON) {
    throw new InvalidWeightsError(`weights must sum to 1.0, got ${vectorWeight + graphWeight}`);
  }
}

// Cross-source identity: the same native id, or failing that the same
// normalized content hash (stores that assign their own ids).
function mergeSources(vector: SourceEntry[], graph: SourceEntry[]): MergedEntry[] {
  const merged: MergedEntry[] = [];
  const byId = new Map<string, MergedEntry>();
  const byHash = new Map<string, MergedEntry>();

  for (const entry of vector) {
    const item: MergedEntry = { key: `vector:${entry.result.id}`, vector: entry };
    merged.push(item);
    byId.set(entry.result.id, item);
    if (!byHash.has(entry.contentHash)) byHash.set(entry.contentHash, item);
  }

  for (const entry of graph) {
    const match = byId.get(entry.result.id) ?? byHash.get(entry.contentHash);
    if (match && !match.graph) {
      match.graph = entry;
      continue;
    }
    merged.push({ key: `graph:${entry.result.id}`, graph: entry });
  }
  return merged;
}

function primaryOf(item: MergedEntry): { source: RetrievalSource; entry: SourceEntry } {
  const { vector, graph } = item;
  if (vector && graph) {
    return vector.score > graph.score ? { source: 'vector', entry: vector } : { source: 'graph', entry: graph };
  }
  if (graph) return { source: 'graph', entry: graph };
  if (vector) return { source: 'vector', entry: vector };
  throw new Error(`merged entry ${item.key} has no source`);
}

/**
 * Fuses vector and graph hits into one ranked list.
 *
 * `combinedScore = wV * vectorScore + wG * graphScore` (a missing source
 * contributes 0), plus `CROSS_SOURCE_BONUS` when both sources returned the
 * item, capped at 1. Order: combinedScore desc, graph-primary before
 * vector-primary, original rank, then key. Ranks are 0-based.
 */
export function fuseResults(
  vectorResults: readonly SearchResult[],
  graphResults: readonly SearchResult[],
  weights: RetrievalWeights,
  limit = 50
): RankedResult[] {
  assertValidWeights(weights);
  if (vectorResults.length === 0 && graphResults.length === 0) return [];

  const merged = mergeSources(dedupeSource(vectorResults), dedupeSource(graphResults));

  const scored = merged.map((item) => {
    const vectorScore = item.vector ? item.vector.score : null;
    const graphScore = item.graph ? item.graph.score : null;
    const corroborated = vectorScore !== null && graphScore !== null;
    const raw = weights.vectorWeight * (vectorScore ?? 0) + weights.graphWeight * (graphScore ?? 0);
    const combinedScore = Math.min(1, raw + (corroborated ? CROSS_SOURCE_BONUS : 0));
    const primary = primaryOf(item);
    const sources: RetrievalSource[] = [];
    if (item.vector) sources.push('vector');
    if (item.graph) sources.push('graph');
    const secondary = primary.source === 'vector' ? item.graph : item.vector;
    return {
      key: item.key,
      order: primary.entry.order,
      result: {
        id: primary.entry.result.id,
        source: primary.source,
        content: primary.entry.result.content,
        score: primary.entry.score,
        metadata: { ...(secondary?.result.metadata ?? {}), ...primary.entry.result.metadata },
        combinedScore,
        rank: 0,
        vectorScore,
        graphScore,
        sources,
      } satisfies RankedResult,
    };
  });

  scored.sort((a, b) => {
    const byScore = b.result.combinedScore - a.result.combinedScore;
    if (byScore !== 0) return byScore;
    const bySource = sourcePriority(a.result.source) - sourcePriority(b.result.source);
    if (bySource !== 0) return bySource;
    if (a.order !== b.order) return a.order - b.order;
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  });

  const max = Math.max(0, Math.floor(limit));
  return scored.slice(0, max).map((item, idx) => ({ ...item.result, rank: idx }));
}

function sourcePriority(source: RetrievalSource): number {
  return source === 'graph' ? 0 : 1;
}
