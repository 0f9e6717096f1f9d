/**
 * Retrieval Module
 *
 * @module
 */

export {
  RetrievalOrchestrator,
  createRetrievalOrchestrator,
  isValidEntityName,
  FALLBACK_MESSAGES,
  type RetrievalOrchestratorOptions,
} from "./retrieval-orchestrator.js";
export {
  SCENARIOS,
  type Scenario,
  type SourceName,
  type SourceStatus,
  type SourceDiagnostic,
  type RetrievalRequest,
  type RetrievalContext,
} from "./types.js";
