/**
 * Neo4j Vector Store
 *
 * Keeps chunks as `:CodeChunk` nodes carrying an `embedding` property, searched
 * through a cosine vector index. The namespace is the chunk's `repoId`.
 *
 * @module
 */

import neo4j, { type Driver } from "neo4j-driver";
import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import type { IVectorStore, VectorMatch, VectorRecord } from "../interfaces/IVectorStore.js";
import type { GraphRecord } from "../interfaces/IGraphStore.js";
import { CHUNK_LABEL } from "../graph/neo4j-graph-store.js";
import { compact } from "../graph/records.js";
import { ErrorCode, VectorError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import type { Neo4jConfig, VectorConfig } from "../../utils/validation.js";
import { vectorMatchFromRecord } from "./matches.js";

const logger = createLogger("neo4j-vector-store");

/** Candidates fetched per requested result, since the namespace filter runs after the index lookup */
const OVERSAMPLE = 10;

export interface Neo4jVectorStoreOptions {
  neo4j: Neo4jConfig;
  vector: Pick<VectorConfig, "indexName">;
  embeddings: IEmbeddingService;
}

/**
 * @example
 * ```typescript
 * const store = new Neo4jVectorStore({ neo4j: config.neo4j, vector: config.vector, embeddings });
 * await store.initialize();
 * const matches = await store.search("where are routes registered", "my-repo", 5);
 * ```
 */
export class Neo4jVectorStore implements IVectorStore {
  private driver: Driver | null = null;

  constructor(private readonly options: Neo4jVectorStoreOptions) {}

  get isReady(): boolean {
    return this.driver !== null;
  }

  async initialize(): Promise<void> {
    if (this.driver) return;

    const { uri, user, password, database, connectionTimeoutMs } = this.options.neo4j;
    const driver = neo4j.driver(uri, neo4j.auth.basic(user, password), { connectionTimeout: connectionTimeoutMs });
    try {
      await driver.verifyConnectivity({ database });
    } catch (error) {
      await driver.close();
      throw new VectorError(`Cannot connect to Neo4j at ${uri}`, ErrorCode.VECTOR_CONNECTION_FAILED, {
        cause: errorMessage(error),
      });
    }
    this.driver = driver;

    await this.run(
      `CREATE VECTOR INDEX ${this.options.vector.indexName} IF NOT EXISTS
       FOR (c:${CHUNK_LABEL}) ON c.embedding
       OPTIONS {
         indexConfig: {
           \`vector.dimensions\`: ${this.options.embeddings.dimensions},
           \`vector.similarity_function\`: 'cosine'
         }
       }`
    );
    await this.run(`CREATE INDEX codechunk_repo IF NOT EXISTS FOR (c:${CHUNK_LABEL}) ON (c.repoId)`);
    logger.info({ index: this.options.vector.indexName }, "Vector index ready");
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
    }
  }

  private async run(query: string, params: Record<string, unknown> = {}): Promise<GraphRecord[]> {
    if (!this.driver) {
      throw new VectorError("Neo4jVectorStore not initialized. Call initialize() first.", ErrorCode.VECTOR_CONNECTION_FAILED);
    }

    const session = this.driver.session({ database: this.options.neo4j.database });
    try {
      const result = await session.run(query, params);
      return result.records.map((record) => record.toObject());
    } finally {
      await session.close();
    }
  }

  async search(queryText: string, namespace: string, topK: number): Promise<VectorMatch[]> {
    const embedding = await this.options.embeddings.embed(queryText);

    let records: GraphRecord[];
    try {
      records = await this.run(
        `CALL db.index.vector.queryNodes($index, $candidates, $embedding) YIELD node, score
         WHERE node.repoId = $namespace
         RETURN node.chunkId AS chunkId, node.repoId AS repoId, node.filePath AS filePath,
                node.fileName AS fileName, node.startLine AS startLine, node.endLine AS endLine,
                node.language AS language, node.contentPreview AS contentPreview,
                node.chunkSizeLines AS chunkSizeLines, score
         ORDER BY score DESC
         LIMIT $topK`,
        {
          index: this.options.vector.indexName,
          candidates: neo4j.int(topK * OVERSAMPLE),
          embedding,
          namespace,
          topK: neo4j.int(topK),
        }
      );
    } catch (error) {
      throw new VectorError(`Vector search failed: ${errorMessage(error)}`, ErrorCode.VECTOR_SEARCH_FAILED, { namespace });
    }

    const matches = compact(records.map(vectorMatchFromRecord));
    logger.debug({ namespace, results: matches.length }, "Vector search complete");
    return matches;
  }

  async upsert(vectors: readonly VectorRecord[], namespace: string): Promise<number> {
    if (vectors.length === 0) return 0;

    const rows = vectors.map((vector) => ({
      id: vector.id,
      embedding: vector.values,
      properties: { ...vector.metadata, repoId: namespace },
    }));

    try {
      await this.run(
        `UNWIND $rows AS row
         MERGE (c:${CHUNK_LABEL} {chunkId: row.id})
         SET c += row.properties, c.embedding = row.embedding`,
        { rows }
      );
    } catch (error) {
      throw new VectorError(`Vector upsert failed: ${errorMessage(error)}`, ErrorCode.VECTOR_INDEX_FAILED, {
        namespace,
        count: vectors.length,
      });
    }

    logger.debug({ namespace, count: vectors.length }, "Vectors upserted");
    return vectors.length;
  }

  async delete(namespace: string): Promise<void> {
    await this.run(`MATCH (c:${CHUNK_LABEL} {repoId: $namespace}) DETACH DELETE c`, { namespace });
    logger.info({ namespace }, "Namespace deleted");
  }
}
