/**
 * Stand-in embedding service for when no provider could be set up. Every call
 * rejects, so semantic search is reported as a failed source.
 *
 * @module
 */

import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import { ErrorCode, VectorError } from "../errors.js";

export class UnavailableEmbeddingService implements IEmbeddingService {
  readonly modelId = "unavailable";

  constructor(
    readonly dimensions: number,
    readonly reason: string
  ) {}

  async embed(): Promise<number[]> {
    throw this.failure();
  }

  async embedBatch(): Promise<number[][]> {
    throw this.failure();
  }

  private failure(): VectorError {
    return new VectorError(`Embedding service unavailable: ${this.reason}`, ErrorCode.VECTOR_CONNECTION_FAILED);
  }
}
