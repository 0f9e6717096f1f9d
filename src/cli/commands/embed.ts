/**
 * embed command - Chunk and embed a repository into the vector store
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, loadConfig } from "../../utils/index.js";
import { CodeChunker, createEmbeddingIndexer, type IEmbeddingService } from "../../core/embeddings/index.js";
import type { IVectorStore } from "../../core/vector/index.js";
import { createRepositorySource } from "../../core/indexer/index.js";
import { closeAll, createEmbeddings, defaultRepoId, formatDuration, openVectorStore, printHeading } from "../runtime.js";

const logger = createLogger("embed");

export interface EmbedOptions {
  repoId?: string;
}

export async function embedCommand(source: string, options: EmbedOptions): Promise<void> {
  const config = await loadConfig();
  const repoId = options.repoId ?? defaultRepoId(source);
  logger.info({ source, repoId }, "Starting embedding");

  printHeading("Embedding Repository");

  const spinner = ora("Connecting to vector store...").start();
  let embeddings: IEmbeddingService;
  let store: IVectorStore;
  try {
    embeddings = createEmbeddings(config);
    store = await openVectorStore(config, embeddings);
  } catch (error) {
    spinner.fail(chalk.red("Could not connect to the embedding service or vector store"));
    throw error;
  }

  try {
    const indexer = createEmbeddingIndexer({
      embeddings,
      store,
      chunker: new CodeChunker(config.chunking),
      batchSize: config.embeddings.batchSize,
      maxChars: config.embeddings.maxChars,
      upsertBatchSize: config.vector.upsertBatchSize,
      onProgress: (embedded, total) => {
        spinner.text = `Embedding chunks (${embedded}/${total})`;
      },
    });

    spinner.text = "Reading source files...";
    const result = await indexer.indexRepository(createRepositorySource(source, config.repository), source, repoId);

    if (result.failedBatches > 0) {
      spinner.warn(chalk.yellow(`Embedded with ${result.failedBatches} failed batch(es)`));
    } else {
      spinner.succeed(chalk.green("Embedding complete!"));
    }

    console.log();
    console.log(chalk.white.bold("Results"));
    console.log(`  Namespace:        ${result.repoId}`);
    console.log(`  Files chunked:    ${result.filesChunked}`);
    console.log(`  Chunks:           ${result.chunksCreated}`);
    console.log(`  Empty skipped:    ${result.chunksSkipped}`);
    console.log(`  Vectors written:  ${result.vectorsUpserted}`);
    console.log(`  Duration:         ${formatDuration(result.durationMs)}`);
    console.log();
    console.log(chalk.dim(`Ask with: repo-lens ask "<question>" --repo-id ${result.repoId}`));
  } catch (error) {
    spinner.fail(chalk.red("Embedding failed"));
    logger.error({ err: error }, "Embedding failed");
    throw error;
  } finally {
    await closeAll(store);
  }
}
