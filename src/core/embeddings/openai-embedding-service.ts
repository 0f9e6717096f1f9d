/**
 * OpenAI embeddings
 *
 * @module
 */

import OpenAI from "openai";
import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import { ErrorCode, VectorError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("openai-embeddings");

export interface OpenAIEmbeddingServiceConfig {
  /** Reads OPENAI_API_KEY when omitted */
  apiKey?: string;
  model?: string;
  dimensions?: number;
  maxRetries?: number;
}

export class OpenAIEmbeddingService implements IEmbeddingService {
  readonly modelId: string;
  readonly dimensions: number;
  private readonly client: OpenAI;

  constructor(config: OpenAIEmbeddingServiceConfig = {}) {
    const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new VectorError(
        "API key not found. Set OPENAI_API_KEY environment variable or provide apiKey in config.",
        ErrorCode.VECTOR_CONNECTION_FAILED
      );
    }
    this.modelId = config.model ?? "text-embedding-3-small";
    this.dimensions = config.dimensions ?? 1536;
    this.client = new OpenAI({ apiKey, maxRetries: config.maxRetries ?? 3 });
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new VectorError("OpenAI returned no embedding", ErrorCode.VECTOR_EMBEDDING_FAILED, { model: this.modelId });
    }
    return embedding;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.modelId,
        input: [...texts],
        dimensions: this.dimensions,
        encoding_format: "float",
      });
      // The API reports an index per item; order by it rather than trusting arrival order
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      logger.error({ err: error, count: texts.length }, "OpenAI embedding request failed");
      throw new VectorError(
        `Failed to generate embeddings with OpenAI: ${errorMessage(error)}`,
        ErrorCode.VECTOR_EMBEDDING_FAILED,
        { model: this.modelId }
      );
    }
  }
}

export function createOpenAIEmbeddingService(config?: OpenAIEmbeddingServiceConfig): OpenAIEmbeddingService {
  return new OpenAIEmbeddingService(config);
}
