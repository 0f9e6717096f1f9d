/**
 * Embedding Indexer
 *
 * Chunks source files, embeds the chunks in bounded batches and upserts the
 * vectors into one namespace of the vector store. A batch whose embedding
 * request fails is logged and skipped; the rest continue. Each batch is
 * embedded and upserted before the next one is embedded, so at most one
 * batch of vectors is held at a time.
 *
 * @module
 */

import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import type { IVectorStore, VectorRecord } from "../interfaces/IVectorStore.js";
import type { IRepositorySource } from "../interfaces/IRepositorySource.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { CodeChunker, chunkMetadata, type CodeChunk } from "./code-chunker.js";

const logger = createLogger("embedding-indexer");

export interface EmbeddingIndexerOptions {
  embeddings: IEmbeddingService;
  store: IVectorStore;
  chunker?: CodeChunker;
  /** Texts per embedding request (default: 32) */
  batchSize?: number;
  /** Content is cut to this many characters before embedding (default: 2000) */
  maxChars?: number;
  /** Vectors per upsert call (default: 100) */
  upsertBatchSize?: number;
  onProgress?: (embedded: number, total: number) => void;
}

export interface EmbeddingRunResult {
  repoId: string;
  filesChunked: number;
  chunksCreated: number;
  /** Chunks whose content was empty after trimming */
  chunksSkipped: number;
  vectorsUpserted: number;
  failedBatches: number;
  durationMs: number;
}

export class EmbeddingIndexer {
  private readonly chunker: CodeChunker;
  private readonly batchSize: number;
  private readonly maxChars: number;
  private readonly upsertBatchSize: number;

  constructor(private readonly options: EmbeddingIndexerOptions) {
    this.chunker = options.chunker ?? new CodeChunker();
    this.batchSize = options.batchSize ?? 32;
    this.maxChars = options.maxChars ?? 2000;
    this.upsertBatchSize = options.upsertBatchSize ?? 100;
  }

  /**
   * Downloads the repository, reads its source files and indexes their chunks.
   */
  async indexRepository(source: IRepositorySource, reference: string, repoId: string): Promise<EmbeddingRunResult> {
    const localPath = await source.download(reference);
    const sourceFiles = await source.listSourceFiles(localPath);

    const files: Array<{ filePath: string; content: string }> = [];
    for (const file of sourceFiles) {
      try {
        files.push({ filePath: file.relativePath, content: await source.read(file.absolutePath) });
      } catch (error) {
        logger.warn({ file: file.relativePath, error: errorMessage(error) }, "File skipped");
      }
    }

    return this.indexFiles(files, repoId);
  }

  async indexFiles(files: ReadonlyArray<{ filePath: string; content: string }>, repoId: string): Promise<EmbeddingRunResult> {
    const startTime = Date.now();
    const chunks = this.chunker.chunkFiles(files, repoId);
    const { vectorsUpserted, skipped, failedBatches } = await this.embedChunks(chunks, repoId);
    if (vectorsUpserted === 0) {
      logger.warn({ namespace: repoId }, "No vectors upserted");
    }

    const result: EmbeddingRunResult = {
      repoId,
      filesChunked: files.length,
      chunksCreated: chunks.length,
      chunksSkipped: skipped,
      vectorsUpserted,
      failedBatches,
      durationMs: Date.now() - startTime,
    };
    logger.info(result, "Embedding run complete");
    return result;
  }

  async embedChunks(
    chunks: readonly CodeChunk[],
    namespace: string
  ): Promise<{ vectorsUpserted: number; skipped: number; failedBatches: number }> {
    let vectorsUpserted = 0;
    let skipped = 0;
    let failedBatches = 0;

    for (let start = 0; start < chunks.length; start += this.batchSize) {
      const batchNumber = start / this.batchSize + 1;
      const batch = chunks
        .slice(start, start + this.batchSize)
        .map((chunk) => ({ chunk, text: chunk.content.slice(0, this.maxChars).trim() }));
      const nonEmpty = batch.filter((item) => item.text.length > 0);
      skipped += batch.length - nonEmpty.length;

      if (nonEmpty.length === 0) {
        logger.warn({ batch: batchNumber }, "All chunks empty, skipping batch");
        continue;
      }

      let embeddings: number[][];
      try {
        embeddings = await this.options.embeddings.embedBatch(nonEmpty.map((item) => item.text));
      } catch (error) {
        failedBatches++;
        logger.error({ batch: batchNumber, error: errorMessage(error) }, "Embedding batch failed, skipping");
        continue;
      }

      const vectors: VectorRecord[] = [];
      nonEmpty.forEach(({ chunk }, index) => {
        const values = embeddings[index];
        if (values) {
          vectors.push({ id: chunk.chunkId, values, metadata: chunkMetadata(chunk) });
        }
      });
      vectorsUpserted += await this.upsert(vectors, namespace);
      this.options.onProgress?.(Math.min(start + this.batchSize, chunks.length), chunks.length);
      logger.debug({ batch: batchNumber, count: embeddings.length }, "Embedding batch complete");
    }

    return { vectorsUpserted, skipped, failedBatches };
  }

  /**
   * Upserts in batches; a failing batch aborts the run.
   */
  private async upsert(vectors: readonly VectorRecord[], namespace: string): Promise<number> {
    let upserted = 0;
    for (let start = 0; start < vectors.length; start += this.upsertBatchSize) {
      upserted += await this.options.store.upsert(vectors.slice(start, start + this.upsertBatchSize), namespace);
    }
    return upserted;
  }
}

export function createEmbeddingIndexer(options: EmbeddingIndexerOptions): EmbeddingIndexer {
  return new EmbeddingIndexer(options);
}
