/**
 * Graph Builder Module
 *
 * Writes analyzed files into the graph store within an indexing run.
 *
 * @module
 */

export {
  GraphUpsertEngine,
  createGraphUpsertEngine,
  nodeKeyFor,
  nodeKeyForRef,
  type UpsertStats,
} from "./graph-upsert-engine.js";
export { UpsertRunContext } from "./run-context.js";
