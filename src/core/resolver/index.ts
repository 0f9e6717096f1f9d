/**
 * Resolver Module
 *
 * @module
 */

export {
  EntityResolver,
  createEntityResolver,
  extractBracketed,
  parseSingleBest,
  parseTopK,
  MESSAGES as RESOLVER_MESSAGES,
  type RankedCandidate,
  type ResolvedEntity,
  type Resolution,
  type EntityResolverOptions,
} from "./entity-resolver.js";
export {
  buildSingleBestPrompt,
  buildTopKPrompt,
  formatGroupedInventory,
  formatNumberedInventory,
  SINGLE_BEST_LISTED,
} from "./prompts.js";
