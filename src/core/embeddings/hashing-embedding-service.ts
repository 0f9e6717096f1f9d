/**
 * Hashing embeddings
 *
 * Deterministic bag-of-words vectors: each lowercase alphanumeric token is
 * hashed (FNV-1a) into one of `dimensions` buckets and the counts are scaled to
 * unit length. Texts sharing tokens score a positive cosine similarity. Runs
 * without network, for tests and offline use.
 *
 * @module
 */

import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import { normalize } from "./similarity-service.js";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HashingEmbeddingService implements IEmbeddingService {
  readonly modelId = "hashing";

  constructor(readonly dimensions = 256) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const bucket = fnv1a(token) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    return normalize(vector);
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }
}
