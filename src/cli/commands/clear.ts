/**
 * clear command - Wipe the code graph and, optionally, a vector namespace
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, loadConfig } from "../../utils/index.js";
import { closeAll, createEmbeddingsOrUnavailable, openGraphStore, openVectorStore } from "../runtime.js";

const logger = createLogger("clear");

export interface ClearOptions {
  repoId?: string;
}

export async function clearCommand(options: ClearOptions): Promise<void> {
  const config = await loadConfig();
  const spinner = ora("Clearing graph...").start();

  const store = await openGraphStore(config).catch((error: unknown) => {
    spinner.fail(chalk.red("Could not connect to the graph store"));
    throw error;
  });
  try {
    await store.clearAll();
    logger.info("Graph cleared");
  } catch (error) {
    spinner.fail(chalk.red("Could not clear graph"));
    throw error;
  } finally {
    await closeAll(store);
  }

  if (options.repoId) {
    spinner.text = `Deleting vectors of ${options.repoId}...`;
    const vectors = await openVectorStore(config, createEmbeddingsOrUnavailable(config)).catch((error: unknown) => {
      spinner.fail(chalk.red("Could not connect to the vector store"));
      throw error;
    });
    try {
      await vectors.delete(options.repoId);
      logger.info({ namespace: options.repoId }, "Vector namespace deleted");
    } catch (error) {
      spinner.fail(chalk.red(`Could not delete vectors of ${options.repoId}`));
      throw error;
    } finally {
      await closeAll(vectors);
    }
  }

  spinner.succeed(chalk.green(options.repoId ? `Graph and namespace ${options.repoId} cleared` : "Graph cleared"));
}
