/**
 * Retrieval types
 *
 * @module
 */

import type { ConversationTurn } from "../interfaces/IConversationStore.js";
import type { VectorMatch } from "../interfaces/IVectorStore.js";
import type { ResolvedEntity } from "../resolver/entity-resolver.js";
import type { AllSourcesFailedError } from "../errors.js";

/**
 * Which sources produced the context, in priority order.
 */
export const SCENARIOS = ["multi_entity_analysis", "direct_entity", "pinecone_only", "memory_fallback"] as const;

export type Scenario = (typeof SCENARIOS)[number];

export type SourceName = "multiEntity" | "semantic" | "directLookup" | "relationships" | "bestEntity" | "memory";

export type SourceStatus = "ok" | "empty" | "failed" | "skipped";

export interface SourceDiagnostic {
  source: SourceName;
  status: SourceStatus;
  detail: string | null;
}

export interface RetrievalRequest {
  query: string;
  /** Entity named by the question; empty or "unknown" means none */
  entityName?: string | null;
  sessionId: string;
  /** Vector store namespace */
  repoId: string;
}

/**
 * Everything gathered for one query. Discarded after synthesis.
 */
export interface RetrievalContext {
  query: string;
  scenario: Scenario;
  entities: ResolvedEntity[];
  chunks: VectorMatch[];
  memory: ConversationTurn[];
  message: string | null;
  diagnostics: SourceDiagnostic[];
  /** Set on memory_fallback */
  failure: AllSourcesFailedError | null;
}
