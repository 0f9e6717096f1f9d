/**
 * index command - Build the code graph of a repository
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, loadConfig } from "../../utils/index.js";
import { createParserManager } from "../../core/parser/parser-manager.js";
import {
  createIndexerCoordinator,
  createRepositorySource,
  type IndexingProgressEvent,
  type IndexingRunResult,
} from "../../core/indexer/index.js";
import type { GraphStatistics } from "../../core/graph/index.js";
import { closeAll, formatDuration, openGraphStore, printHeading } from "../runtime.js";

const logger = createLogger("index");

export interface IndexOptions {
  clear?: boolean;
  includeTests?: boolean;
}

/**
 * Index a git URL or local path into the graph store
 */
export async function indexCommand(source: string, options: IndexOptions): Promise<void> {
  logger.info({ source, options }, "Starting index");
  const config = await loadConfig();

  printHeading("Indexing Repository");

  const spinner = ora("Initializing...").start();
  const parser = createParserManager();
  spinner.text = "Loading Python grammar...";
  await parser.initialize().catch((error: unknown) => {
    spinner.fail(chalk.red("Could not load the Python grammar"));
    throw error;
  });

  spinner.text = "Connecting to graph database...";
  const store = await openGraphStore(config).catch(async (error: unknown) => {
    spinner.fail(chalk.red("Could not connect to the graph database"));
    await parser.close();
    throw error;
  });

  try {
    const coordinator = createIndexerCoordinator({
      source: createRepositorySource(source, config.repository),
      store,
      parser,
      skipTestFiles: !options.includeTests,
      clearFirst: options.clear ?? false,
      onProgress: (event) => updateSpinner(spinner, event),
    });

    const result = await coordinator.index(source);

    if (result.state === "failed") {
      spinner.fail(chalk.red("Indexing failed"));
    } else if (result.errors.length > 0 || result.writeFailures > 0) {
      spinner.warn(chalk.yellow("Indexing completed with errors"));
    } else {
      spinner.succeed(chalk.green("Indexing complete!"));
    }

    printResult(result);
    logger.info({ runId: result.runId, state: result.state }, "Indexing finished");

    if (result.state === "failed") {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail(chalk.red("Indexing failed"));
    logger.error({ err: error }, "Indexing failed");
    throw error;
  } finally {
    await closeAll(store, parser);
  }
}

function printResult(result: IndexingRunResult): void {
  console.log();
  console.log(chalk.white.bold("Results"));
  console.log(`  Repository:            ${result.repository}`);
  console.log(`  Files found:           ${result.filesFound}`);
  console.log(`  Test files skipped:    ${result.filesSkipped}`);
  console.log(`  Files written:         ${result.filesProcessed}`);
  console.log(`  Parse errors:          ${result.parsingErrors}`);
  console.log(`  Packages:              ${result.packagesCreated}`);
  console.log(`  Entities:              ${result.entitiesCreated}`);
  console.log(`  Relationships:         ${result.relationshipsCreated}`);
  console.log(`  Unresolved targets:    ${result.relationshipsUnresolved}`);
  console.log(`  Duration:              ${formatDuration(result.durationMs)}`);

  if (result.graphStatistics) {
    printStatistics(result.graphStatistics);
  }

  if (result.errors.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Errors (${result.errors.length})`));
    for (const err of result.errors.slice(0, 5)) {
      console.log(`  ${chalk.red("✗")} ${err.filePath || result.repository}: ${err.error}`);
    }
    if (result.errors.length > 5) {
      console.log(chalk.dim(`  ... and ${result.errors.length - 5} more errors`));
    }
  }

  console.log();
  console.log(chalk.dim("─".repeat(40)));
  console.log(chalk.dim("Run 'repo-lens stats' to view the graph"));
}

export function printStatistics(statistics: GraphStatistics): void {
  console.log();
  console.log(chalk.white.bold("Graph"));
  console.log(`  Nodes:          ${statistics.totalNodes}`);
  for (const [label, count] of Object.entries(statistics.nodes)) {
    console.log(chalk.dim(`    ${label.padEnd(14)}${count}`));
  }
  console.log(`  Relationships:  ${statistics.totalRelationships}`);
  for (const [type, count] of Object.entries(statistics.relationships)) {
    console.log(chalk.dim(`    ${type.padEnd(14)}${count}`));
  }
}

function updateSpinner(spinner: ReturnType<typeof ora>, event: IndexingProgressEvent): void {
  const progress = event.total > 0 ? ` (${event.processed}/${event.total}, ${event.percentage}%)` : "";

  if (event.currentFile) {
    const shortFile = event.currentFile.length > 30 ? "..." + event.currentFile.slice(-27) : event.currentFile;
    spinner.text = `${event.message}${progress} - ${shortFile}`;
  } else {
    spinner.text = `${event.message}${progress}`;
  }
}
