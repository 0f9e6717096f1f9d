/**
 * stats command - Show graph statistics
 */

import chalk from "chalk";
import { createLogger, loadConfig } from "../../utils/index.js";
import { closeAll, openGraphStore, printHeading } from "../runtime.js";
import { printStatistics } from "./index.js";

const logger = createLogger("stats");

export async function statsCommand(): Promise<void> {
  const config = await loadConfig();
  const store = await openGraphStore(config);

  try {
    const statistics = await store.getStatistics();
    logger.debug({ statistics }, "Graph statistics read");

    printHeading("Repo Lens Graph");
    console.log(`  Database:  ${config.neo4j.uri} (${config.neo4j.database})`);
    if (statistics.totalNodes === 0) {
      console.log();
      console.log(chalk.yellow("The graph is empty."));
      console.log(chalk.dim("Run"), chalk.white("repo-lens index <source>"), chalk.dim("first."));
      return;
    }
    printStatistics(statistics);
  } finally {
    await closeAll(store);
  }
}
