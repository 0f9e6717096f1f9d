/**
 * Embeddings Module
 *
 * Chunking, embedding services and the embedding indexer.
 *
 * @module
 */

export type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
export {
  CodeChunker,
  chunkMetadata,
  previewOf,
  toCitation,
  PREVIEW_LENGTH,
  type CodeChunk,
  type Citation,
} from "./code-chunker.js";
export { OpenAIEmbeddingService, createOpenAIEmbeddingService, type OpenAIEmbeddingServiceConfig } from "./openai-embedding-service.js";
export { HashingEmbeddingService, tokenize } from "./hashing-embedding-service.js";
export { UnavailableEmbeddingService } from "./unavailable-embedding-service.js";
export { cosineSimilarity, normalize } from "./similarity-service.js";
export {
  EmbeddingIndexer,
  createEmbeddingIndexer,
  type EmbeddingIndexerOptions,
  type EmbeddingRunResult,
} from "./embedding-indexer.js";
