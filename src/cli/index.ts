#!/usr/bin/env node

/**
 * Repo Lens CLI
 * Index Python repositories into a code graph and ask questions about them
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { indexCommand } from "./commands/index.js";
import { embedCommand } from "./commands/embed.js";
import { askCommand } from "./commands/ask.js";
import { findCommand } from "./commands/find.js";
import { statsCommand } from "./commands/stats.js";
import { analyzeCommand } from "./commands/analyze.js";
import { clearCommand } from "./commands/clear.js";
import { createLogger, setLogLevel } from "../utils/logger.js";
import { loadConfig } from "../utils/config.js";
import { isRepoLensError } from "../core/errors.js";

const logger = createLogger("cli");

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

// Create the main program
const program = new Command();

program
  .name("repo-lens")
  .description("Code graph construction and question answering over Python repositories")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .hook("preAction", async () => {
    const config = await loadConfig();
    setLogLevel(config.logging.level);
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("index")
  .description("Build the code graph of a git URL or local path")
  .argument("<source>", "Git URL or local directory")
  .option("-c, --clear", "Wipe the graph before writing")
  .option("--include-tests", "Index test files too")
  .action(indexCommand);

program
  .command("embed")
  .description("Chunk and embed source files into the vector store")
  .argument("<source>", "Git URL or local directory")
  .option("-r, --repo-id <id>", "Vector namespace (default: repository name)")
  .action(embedCommand);

program
  .command("ask")
  .description("Ask a question about the indexed code")
  .argument("<question>", "Question in natural language")
  .option("-s, --session <id>", "Conversation session", "cli")
  .option("-r, --repo-id <id>", "Vector namespace to search", "default")
  .option("-e, --entity <name>", "Entity the question is about")
  .option("-v, --verbose", "Show per-source diagnostics")
  .action(askCommand);

program
  .command("find")
  .description("Look up an entity by name")
  .argument("<name>", "Class, function, method, file or package name")
  .action(findCommand);

program
  .command("stats")
  .description("Show graph statistics")
  .action(statsCommand);

program
  .command("analyze")
  .description("Report circular imports and dependency depth")
  .argument("<source>", "Git URL or local directory")
  .option("-m, --module <name>", "Only report this module's depth")
  .option("-t, --top <n>", "Modules to list", positiveInt)
  .action(analyzeCommand);

program
  .command("clear")
  .description("Wipe the code graph")
  .option("-r, --repo-id <id>", "Also delete this vector namespace")
  .action(clearCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors gracefully
 */
function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (isRepoLensError(error) && error.context) {
      console.error(chalk.dim(JSON.stringify(error.context)));
    }
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

let isShuttingDown = false;

function shutdown(signal: string): void {
  if (isShuttingDown) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, shutting down...`));

  // Commands close their own connections in finally blocks
  setTimeout(() => {
    logger.warn("Shutdown timeout, forcing exit");
    process.exit(1);
  }, 5000).unref();
  process.exitCode = 130;
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
