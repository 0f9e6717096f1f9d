/**
 * find command - Look up an entity by name and show its neighbourhood
 */

import chalk from "chalk";
import { createLogger, loadConfig } from "../../utils/index.js";
import { createEntityResolver } from "../../core/resolver/index.js";
import type { RelatedEntity } from "../../core/graph/index.js";
import { closeAll, openGraphStore } from "../runtime.js";

const logger = createLogger("find");

function formatRelated(label: string, related: RelatedEntity[]): string {
  if (related.length === 0) {
    return `  ${label} (0): ${chalk.dim("none")}`;
  }
  const names = related.map((entity) => `${entity.name} ${chalk.dim(`[${entity.relationship}]`)}`);
  return `  ${label} (${related.length}): ${names.join(", ")}`;
}

export async function findCommand(name: string): Promise<void> {
  const config = await loadConfig();
  const store = await openGraphStore(config);

  try {
    const resolver = createEntityResolver({ store });
    const lookup = await resolver.lookupEntity(name);

    if (!lookup.ok) {
      logger.info({ name, suggestions: lookup.error.suggestions.length }, "Entity not found");
      console.log(chalk.yellow(`No entity named "${name}"`));
      if (lookup.error.suggestions.length > 0) {
        console.log(chalk.dim("Did you mean:"));
        for (const suggestion of lookup.error.suggestions) {
          console.log(`  - ${suggestion}`);
        }
      }
      process.exitCode = 1;
      return;
    }

    const entity = lookup.value;
    console.log();
    console.log(`${chalk.cyan.bold(entity.type)} ${chalk.white.bold(entity.name)}`);
    if (entity.module) console.log(`  Module:    ${entity.module}`);
    if (entity.filePath) {
      console.log(`  Location:  ${entity.filePath}${entity.lineNumber !== null ? `:${entity.lineNumber}` : ""}`);
    }
    if (entity.docstring) console.log(`  Docstring: ${entity.docstring.split("\n")[0]}`);

    const expansion = await resolver.expandRelationships(entity.name);
    if (expansion.ok) {
      console.log();
      console.log(formatRelated("Dependents", expansion.value.dependents));
      console.log(formatRelated("Dependencies", expansion.value.dependencies));
      console.log(formatRelated("Parents", expansion.value.parents));
    }
  } finally {
    await closeAll(store);
  }
}
