/**
 * IVectorStore - Semantic chunk index
 *
 * Stores embedded code chunks per namespace (one namespace per repository)
 * and answers nearest-neighbour queries by text.
 *
 * @module
 */

/**
 * Metadata stored with every chunk vector.
 */
export interface ChunkMetadata {
  repoId: string;
  filePath: string;
  fileName: string;
  startLine: number;
  endLine: number;
  language: string;
  contentPreview: string;
  chunkSizeLines: number;
}

export interface VectorRecord {
  /** `<repoId>#<filePath>#<n>` */
  id: string;
  values: number[];
  metadata: ChunkMetadata;
}

export interface VectorMatch {
  chunkId: string;
  filePath: string;
  /** "start-end", 1-indexed and inclusive */
  lineRange: string;
  contentPreview: string;
  /** Cosine similarity, higher is closer */
  score: number;
  metadata: ChunkMetadata;
}

export interface IVectorStore {
  readonly isReady: boolean;

  initialize(): Promise<void>;

  /**
   * Embeds the query text and returns the closest chunks of a namespace.
   */
  search(queryText: string, namespace: string, topK: number): Promise<VectorMatch[]>;

  /**
   * Inserts or replaces vectors by id.
   *
   * @returns Number of vectors written
   */
  upsert(vectors: readonly VectorRecord[], namespace: string): Promise<number>;

  /**
   * Removes every vector of a namespace.
   */
  delete(namespace: string): Promise<void>;

  close(): Promise<void>;
}
