/**
 * In-memory vector store
 *
 * Exhaustive cosine search over the vectors of one namespace.
 *
 * @module
 */

import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import type { IVectorStore, VectorMatch, VectorRecord } from "../interfaces/IVectorStore.js";
import { cosineSimilarity } from "../embeddings/similarity-service.js";
import { createLogger } from "../../utils/logger.js";
import { toVectorMatch } from "./matches.js";

const logger = createLogger("memory-vector-store");

export class InMemoryVectorStore implements IVectorStore {
  private readonly namespaces = new Map<string, Map<string, VectorRecord>>();
  private ready = false;

  constructor(private readonly embeddings: IEmbeddingService) {}

  get isReady(): boolean {
    return this.ready;
  }

  async initialize(): Promise<void> {
    this.ready = true;
  }

  async search(queryText: string, namespace: string, topK: number): Promise<VectorMatch[]> {
    const records = this.namespaces.get(namespace);
    if (!records || records.size === 0 || topK <= 0) return [];

    const query = await this.embeddings.embed(queryText);
    const matches = [...records.values()]
      .map((record) => toVectorMatch(record.id, record.metadata, cosineSimilarity(query, record.values)))
      .sort((a, b) => b.score - a.score || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0))
      .slice(0, topK);

    logger.debug({ namespace, results: matches.length }, "Vector search complete");
    return matches;
  }

  async upsert(vectors: readonly VectorRecord[], namespace: string): Promise<number> {
    let records = this.namespaces.get(namespace);
    if (!records) {
      records = new Map();
      this.namespaces.set(namespace, records);
    }
    for (const vector of vectors) {
      records.set(vector.id, vector);
    }
    return vectors.length;
  }

  async delete(namespace: string): Promise<void> {
    this.namespaces.delete(namespace);
  }

  /**
   * Number of vectors stored in a namespace.
   */
  size(namespace: string): number {
    return this.namespaces.get(namespace)?.size ?? 0;
  }

  async close(): Promise<void> {
    this.ready = false;
  }
}
