/**
 * Vector Module
 *
 * Semantic chunk storage: Neo4j vector index or in process.
 *
 * @module
 */

import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import type { IVectorStore } from "../interfaces/IVectorStore.js";
import type { Neo4jConfig, VectorConfig } from "../../utils/validation.js";
import { InMemoryVectorStore } from "./memory-vector-store.js";
import { Neo4jVectorStore } from "./neo4j-vector-store.js";

export type { IVectorStore, VectorMatch, VectorRecord, ChunkMetadata } from "../interfaces/IVectorStore.js";
export { InMemoryVectorStore } from "./memory-vector-store.js";
export { Neo4jVectorStore, type Neo4jVectorStoreOptions } from "./neo4j-vector-store.js";
export { toVectorMatch, vectorMatchFromRecord } from "./matches.js";

/**
 * Creates and initializes the vector store selected by `vector.backend`.
 */
export async function createVectorStore(
  config: { neo4j: Neo4jConfig; vector: VectorConfig },
  embeddings: IEmbeddingService
): Promise<IVectorStore> {
  const store =
    config.vector.backend === "memory"
      ? new InMemoryVectorStore(embeddings)
      : new Neo4jVectorStore({ neo4j: config.neo4j, vector: config.vector, embeddings });
  await store.initialize();
  return store;
}
