import { sha256Hex } from './crypto';

export interface EmbeddingOptions {
  dim: number;
}

/**
 * Turns query text into the vector the vector store is searched with.
 * Implementations that call a remote service should throw
 * `StoreUnavailableError` on connectivity failures so the vector executor
 * can retry.
 */
export interface Embedder {
  readonly model: string;
  readonly dim: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

function tokenise(text: string): string[] {
  return (text || '')
    .toLowerCase()
    .split(/[^a-z0-9_]+/g)
    .filter(Boolean);
}

function hashToUint32(hex: string): number {
  return parseInt(hex.slice(0, 8), 16) >>> 0;
}

export function hashEmbedding(text: string, options: EmbeddingOptions): number[] {
  const dim = options.dim;
  const vec = new Float32Array(dim);
  const tokens = tokenise(text);
  if (tokens.length === 0) return Array.from(vec);

  for (const t of tokens) {
    const h = sha256Hex(t);
    const u = hashToUint32(h);
    const idx = u % dim;
    const sign = (u & 1) === 0 ? 1 : -1;
    vec[idx] = (vec[idx] ?? 0) + sign;
  }

  let norm = 0;
  for (let i = 0; i < dim; i++) norm += (vec[i] ?? 0) * (vec[i] ?? 0);
  norm = Math.sqrt(norm);
  if (norm > 0) {
    for (let i = 0; i < dim; i++) vec[i] = (vec[i] ?? 0) / norm;
  }

  return Array.from(vec);
}

// Offline embedder: token hashing into a fixed-size signed bag of words.
export class HashEmbedder implements Embedder {
  readonly model = 'hash-bow';
  readonly dim: number;

  constructor(dim = 256) {
    this.dim = Math.max(8, Math.floor(dim));
  }

  async embed(text: string): Promise<number[]> {
    return hashEmbedding(text, { dim: this.dim });
  }
}
