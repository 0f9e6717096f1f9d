/**
 * analyze command - Report import cycles and dependency depth without touching the graph
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, loadConfig } from "../../utils/index.js";
import { createParserManager } from "../../core/parser/parser-manager.js";
import { RepositoryAnalyzer, createRepositorySource } from "../../core/indexer/index.js";
import {
  analyzeDependencyDepth,
  buildImportGraph,
  findCircularDependencies,
} from "../../core/extraction/index.js";
import { closeAll, printHeading } from "../runtime.js";

const logger = createLogger("analyze");

export interface AnalyzeOptions {
  module?: string;
  top?: number;
}

export async function analyzeCommand(source: string, options: AnalyzeOptions): Promise<void> {
  const config = await loadConfig();
  printHeading("Dependency Analysis");

  const spinner = ora("Loading Python grammar...").start();
  const parser = createParserManager();

  try {
    await parser.initialize();
    const analyzer = new RepositoryAnalyzer({
      source: createRepositorySource(source, config.repository),
      parser,
      onFile: (file, index, total) => {
        spinner.text = `Parsing (${index + 1}/${total}) ${file.relativePath}`;
      },
    });
    const analysis = await analyzer.analyze(source);
    spinner.succeed(chalk.green(`Parsed ${analysis.files.length} files`));

    const graph = buildImportGraph(analysis.files);
    const cycles = findCircularDependencies(graph);
    logger.info({ modules: graph.size, cycles: cycles.length }, "Dependency analysis complete");

    console.log();
    if (cycles.length === 0) {
      console.log(chalk.green("No circular imports"));
    } else {
      console.log(chalk.yellow.bold(`Circular imports (${cycles.length})`));
      for (const cycle of cycles) {
        console.log(`  ${cycle.join(" -> ")}`);
      }
    }

    const modules = options.module ? [options.module] : [...graph.keys()];
    const depths = modules
      .map((name) => analyzeDependencyDepth(graph, name))
      .sort((a, b) => b.maxDepth - a.maxDepth || b.totalDependencies - a.totalDependencies || a.module.localeCompare(b.module))
      .slice(0, options.top ?? 10);

    console.log();
    console.log(chalk.white.bold("Dependency depth"));
    for (const depth of depths) {
      console.log(
        `  ${depth.module.padEnd(40)} depth ${depth.maxDepth}  direct ${depth.directDependencies}  total ${depth.totalDependencies}`
      );
    }

    if (analysis.parsingErrors > 0) {
      console.log();
      console.log(chalk.dim(`${analysis.parsingErrors} file(s) could not be parsed and were left out`));
    }
  } catch (error) {
    spinner.fail(chalk.red("Analysis failed"));
    throw error;
  } finally {
    await closeAll(parser);
  }
}
