/**
 * ask command - Answer a question about an indexed repository
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, getSessionsPath, loadConfig } from "../../utils/index.js";
import { createEntityResolver } from "../../core/resolver/index.js";
import { createRetrievalOrchestrator } from "../../core/retrieval/index.js";
import { QueryAnalyzer } from "../../core/query/index.js";
import { createSynthesizer } from "../../core/synthesis/index.js";
import { FileConversationStore } from "../../core/memory/index.js";
import { createCodeAssistant, type AssistantAnswer } from "../../core/assistant/index.js";
import {
  closeAll,
  createEmbeddingsOrUnavailable,
  createLLM,
  formatDuration,
  openGraphStore,
  openVectorStore,
} from "../runtime.js";

const logger = createLogger("ask");

export interface AskCommandOptions {
  session: string;
  repoId: string;
  entity?: string;
  verbose?: boolean;
}

export async function askCommand(question: string, options: AskCommandOptions): Promise<void> {
  const config = await loadConfig();
  logger.info({ session: options.session, repoId: options.repoId }, "Answering question");

  const spinner = ora("Connecting...").start();
  const llm = await createLLM(config);
  const graph = await openGraphStore(config).catch((error: unknown) => {
    spinner.fail(chalk.red("Could not connect to the graph store"));
    throw error;
  });
  const vectors = await openVectorStore(config, createEmbeddingsOrUnavailable(config)).catch(async (error: unknown) => {
    spinner.fail(chalk.red("Could not connect to the vector store"));
    await closeAll(graph);
    throw error;
  });

  try {
    const memory = new FileConversationStore(getSessionsPath(), config.memory.maxTurns);
    const assistant = createCodeAssistant({
      analyzer: new QueryAnalyzer(llm),
      orchestrator: createRetrievalOrchestrator({
        resolver: createEntityResolver({ store: graph, llm, inventoryLimit: config.retrieval.inventoryLimit }),
        vectors,
        memory,
        config: config.retrieval,
      }),
      synthesizer: createSynthesizer(llm),
      memory,
    });

    spinner.text = "Retrieving context...";
    const answer = await assistant.ask(question, {
      sessionId: options.session,
      repoId: options.repoId,
      entityName: options.entity ?? null,
    });
    spinner.stop();

    printAnswer(answer, options.verbose ?? false);
  } catch (error) {
    spinner.fail(chalk.red("Could not answer"));
    logger.error({ err: error }, "Question failed");
    throw error;
  } finally {
    await closeAll(graph, vectors);
  }
}

function printAnswer(answer: AssistantAnswer, verbose: boolean): void {
  console.log();
  console.log(answer.answer);
  console.log();
  console.log(chalk.dim("─".repeat(40)));
  console.log(`${chalk.white.bold("Scenario:")} ${answer.scenario}`);
  if (answer.entities.length > 0) {
    console.log(`${chalk.white.bold("Entities:")} ${answer.entities.join(", ")}`);
  }
  if (answer.message) {
    console.log(chalk.yellow(answer.message));
  }

  if (answer.citations.length > 0) {
    console.log();
    console.log(chalk.white.bold(`Citations (${answer.citations.length})`));
    for (const citation of answer.citations) {
      const relevance = `${(citation.relevance * 100).toFixed(1)}%`;
      console.log(`  ${chalk.cyan(citation.file)}:${citation.lines} ${chalk.dim(relevance)}`);
    }
  }

  if (verbose) {
    console.log();
    console.log(chalk.white.bold("Sources"));
    for (const diagnostic of answer.diagnostics) {
      const status =
        diagnostic.status === "ok"
          ? chalk.green(diagnostic.status)
          : diagnostic.status === "failed"
            ? chalk.red(diagnostic.status)
            : chalk.dim(diagnostic.status);
      console.log(`  ${diagnostic.source.padEnd(14)}${status}${diagnostic.detail ? chalk.dim(` ${diagnostic.detail}`) : ""}`);
    }
    console.log(chalk.dim(`Answered from ${answer.answerSource} in ${formatDuration(answer.durationMs)}`));
  }
}
