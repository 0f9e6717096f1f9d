/**
 * Shared wiring for CLI commands: configuration, stores and services.
 */

import * as path from "node:path";
import chalk from "chalk";
import type { AppConfig } from "../utils/validation.js";
import { createGraphStore, type IGraphStore } from "../core/graph/index.js";
import { createVectorStore, type IVectorStore } from "../core/vector/index.js";
import {
  UnavailableEmbeddingService,
  createOpenAIEmbeddingService,
  type IEmbeddingService,
} from "../core/embeddings/index.js";
import { UnavailableLLMService, createInitializedAPILLMService, type ILLMService } from "../core/llm/index.js";
import { errorMessage } from "../core/errors.js";
import { isRemoteReference, repositoryNameFromUrl } from "../core/indexer/index.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

export function openGraphStore(config: AppConfig): Promise<IGraphStore> {
  return createGraphStore(config.neo4j);
}

export function createEmbeddings(config: AppConfig): IEmbeddingService {
  return createOpenAIEmbeddingService({
    model: config.embeddings.model,
    dimensions: config.embeddings.dimensions,
  });
}

/**
 * Embeddings for commands that only read or delete vectors. Without a usable
 * provider, searches fail as a source instead of aborting the command.
 */
export function createEmbeddingsOrUnavailable(config: AppConfig): IEmbeddingService {
  try {
    return createEmbeddings(config);
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, "Embedding service unavailable, semantic search disabled");
    return new UnavailableEmbeddingService(config.embeddings.dimensions, errorMessage(error));
  }
}

export function openVectorStore(config: AppConfig, embeddings: IEmbeddingService): Promise<IVectorStore> {
  return createVectorStore(config, embeddings);
}

/**
 * The configured reasoning service, or a stand-in that rejects every call when
 * the provider cannot be set up (a missing API key, for one).
 */
export async function createLLM(config: AppConfig): Promise<ILLMService> {
  try {
    return await createInitializedAPILLMService({
      provider: config.llm.provider,
      modelId: config.llm.modelId,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
    });
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, "Reasoning service unavailable, answering from retrieved context");
    return new UnavailableLLMService(errorMessage(error));
  }
}

/**
 * Namespace for a repository when `--repo-id` is not given.
 *
 * @example
 * ```typescript
 * defaultRepoId("https://github.com/acme/shop.git"); // "shop"
 * defaultRepoId("./projects/shop");                  // "shop"
 * ```
 */
export function defaultRepoId(reference: string): string {
  return isRemoteReference(reference) ? repositoryNameFromUrl(reference) : path.basename(path.resolve(reference));
}

export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds % 60).toFixed(0)}s`;
}

export function printHeading(title: string): void {
  console.log();
  console.log(chalk.cyan.bold(title));
  console.log(chalk.dim("─".repeat(40)));
  console.log();
}

/**
 * Closes every resource; a failed close is logged and does not stop the others.
 */
export async function closeAll(...resources: Array<{ close(): Promise<void> } | null>): Promise<void> {
  const results = await Promise.allSettled(resources.map((resource) => resource?.close()));
  for (const result of results) {
    if (result.status === "rejected") {
      logger.warn({ err: result.reason }, "Failed to close resource");
    }
  }
}
