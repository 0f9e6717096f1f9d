/**
 * Retrieval Orchestrator
 *
 * Fans a question out to the graph and the vector store at once, waits for
 * every lookup to settle, then classifies what came back:
 *
 * 1. `multi_entity_analysis` - the top-K ranking verified at least one entity
 * 2. `direct_entity` - the named entity was found and expanded (or, without a
 *    name, the single-best pick was)
 * 3. `pinecone_only` - only the semantic search returned chunks
 * 4. `memory_fallback` - recent conversation turns, whatever they are
 *
 * No lookup cancels another and every branch resolves; failures end up in
 * the diagnostics.
 *
 * @module
 */

import type { EntityRelationships, EntitySummary } from "../interfaces/IGraphStore.js";
import type { IConversationStore, ConversationTurn } from "../interfaces/IConversationStore.js";
import type { IVectorStore, VectorMatch } from "../interfaces/IVectorStore.js";
import { EntityResolver, MESSAGES, type Resolution, type ResolvedEntity } from "../resolver/entity-resolver.js";
import { AllSourcesFailedError, EntityNotFoundError, errorMessage } from "../errors.js";
import { fromSettled, unwrapOr, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import type { RetrievalConfig } from "../../utils/validation.js";
import type { RetrievalContext, RetrievalRequest, SourceDiagnostic, SourceName } from "./types.js";

const logger = createLogger("retrieval-orchestrator");

export const FALLBACK_MESSAGES = {
  withMemory: "No search results, using conversation memory as context",
  noMemory: "No search results and no memory context available",
  memoryUnavailable: "No search results and memory context unavailable",
} as const;

export interface RetrievalOrchestratorOptions {
  resolver: EntityResolver;
  vectors: IVectorStore;
  memory: IConversationStore;
  config?: Partial<Pick<RetrievalConfig, "topK" | "chunkTopK" | "memoryTurns">>;
}

/**
 * A usable primary entity name: non-empty and not the literal "unknown".
 */
export function isValidEntityName(name: string | null | undefined): name is string {
  const trimmed = name?.trim() ?? "";
  return trimmed.length > 0 && trimmed.toLowerCase() !== "unknown";
}

function isolatedNote(relationships: EntityRelationships): string | null {
  const { dependents, dependencies, parents } = relationships.counts;
  return dependents + dependencies + parents === 0 ? MESSAGES.isolated : null;
}

const NOT_RUN: Promise<null> = Promise.resolve(null);

// =============================================================================
// Retrieval Orchestrator
// =============================================================================

/**
 * @example
 * ```typescript
 * const orchestrator = new RetrievalOrchestrator({ resolver, vectors, memory });
 * const context = await orchestrator.retrieve({
 *   query: "What does Sub inherit from?",
 *   entityName: "Sub",
 *   sessionId: "cli",
 *   repoId: "my-repo",
 * });
 * console.log(context.scenario);
 * ```
 */
export class RetrievalOrchestrator {
  private readonly topK: number;
  private readonly chunkTopK: number;
  private readonly memoryTurns: number;

  constructor(private readonly options: RetrievalOrchestratorOptions) {
    this.topK = options.config?.topK ?? 5;
    this.chunkTopK = options.config?.chunkTopK ?? 5;
    this.memoryTurns = options.config?.memoryTurns ?? 6;
  }

  async retrieve(request: RetrievalRequest): Promise<RetrievalContext> {
    const { resolver, vectors } = this.options;
    const named = isValidEntityName(request.entityName) ? request.entityName.trim() : null;

    logger.info({ query: request.query.slice(0, 80), entity: named }, "Dispatching retrieval");

    const [multi, semantic, lookup, expansion, best] = await Promise.allSettled([
      resolver.resolveTopK(request.query, this.topK),
      vectors.search(request.query, request.repoId, this.chunkTopK),
      named !== null ? resolver.lookupEntity(named) : NOT_RUN,
      named !== null ? resolver.expandRelationships(named) : NOT_RUN,
      named === null ? resolver.resolveBest(request.query) : NOT_RUN,
    ]);

    const diagnostics: SourceDiagnostic[] = [
      this.diagnoseResolution("multiEntity", multi),
      this.diagnoseChunks(semantic),
      this.diagnoseLookup("directLookup", lookup),
      this.diagnoseLookup("relationships", expansion),
      this.diagnoseResolution("bestEntity", best),
    ];

    const availableChunks: VectorMatch[] = unwrapOr(fromSettled(semantic), []);

    const base = {
      query: request.query,
      chunks: availableChunks,
      memory: [],
      message: null,
      diagnostics,
      failure: null,
    };

    // 1. Multi-entity analysis
    const multiResult = fromSettled(multi);
    if (multiResult.ok && multiResult.value.entities.some((entity) => entity.found)) {
      return this.finish({ ...base, scenario: "multi_entity_analysis", entities: multiResult.value.entities });
    }

    // 2. Direct entity
    const direct = this.directEntity(lookup, expansion, best);
    if (direct) {
      return this.finish({ ...base, scenario: "direct_entity", entities: [direct] });
    }

    // 3. Semantic chunks only
    if (availableChunks.length > 0) {
      return this.finish({ ...base, scenario: "pinecone_only", entities: [] });
    }

    // 4. Conversation memory
    const failures: Record<string, string> = {};
    for (const diagnostic of diagnostics) {
      if (diagnostic.status === "failed" || diagnostic.status === "empty") {
        failures[diagnostic.source] = diagnostic.detail ?? diagnostic.status;
      }
    }
    const failure = new AllSourcesFailedError(failures);
    const fallback = await this.memoryFallback(request.sessionId);
    diagnostics.push(fallback.diagnostic);

    return this.finish({
      ...base,
      scenario: "memory_fallback",
      entities: [],
      memory: fallback.turns,
      message: fallback.message,
      failure,
    });
  }

  // ===========================================================================
  // Classification helpers
  // ===========================================================================

  private directEntity(
    lookup: PromiseSettledResult<Result<EntitySummary, EntityNotFoundError> | null>,
    expansion: PromiseSettledResult<Result<EntityRelationships, EntityNotFoundError> | null>,
    best: PromiseSettledResult<Resolution | null>
  ): ResolvedEntity | null {
    if (lookup.status === "fulfilled" && expansion.status === "fulfilled") {
      const entity = lookup.value;
      const relationships = expansion.value;
      if (entity !== null && entity.ok && relationships !== null && relationships.ok) {
        return {
          entityName: entity.value.name,
          entityType: entity.value.type,
          confidence: 1,
          reason: "Named in the question",
          found: true,
          relationships: relationships.value,
          note: isolatedNote(relationships.value),
        };
      }
    }

    if (best.status === "fulfilled" && best.value) {
      return best.value.entities.find((entity) => entity.found && entity.relationships !== null) ?? null;
    }
    return null;
  }

  private async memoryFallback(
    sessionId: string
  ): Promise<{ turns: ConversationTurn[]; message: string; diagnostic: SourceDiagnostic }> {
    try {
      const turns = await this.options.memory.getRecentTurns(sessionId, this.memoryTurns);
      logger.info({ turns: turns.length }, "Using conversation memory as fallback");
      return {
        turns,
        message: turns.length > 0 ? FALLBACK_MESSAGES.withMemory : FALLBACK_MESSAGES.noMemory,
        diagnostic: { source: "memory", status: turns.length > 0 ? "ok" : "empty", detail: null },
      };
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Memory fetch failed");
      return {
        turns: [],
        message: FALLBACK_MESSAGES.memoryUnavailable,
        diagnostic: { source: "memory", status: "failed", detail: errorMessage(error) },
      };
    }
  }

  private finish(context: RetrievalContext): RetrievalContext {
    logger.info(
      { scenario: context.scenario, entities: context.entities.length, chunks: context.chunks.length },
      "Retrieval classified"
    );
    return context;
  }

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  private diagnoseResolution(source: SourceName, settled: PromiseSettledResult<Resolution | null>): SourceDiagnostic {
    if (settled.status === "rejected") {
      return { source, status: "failed", detail: errorMessage(settled.reason) };
    }
    if (settled.value === null) return { source, status: "skipped", detail: null };

    const resolution = settled.value;
    if (resolution.error) return { source, status: "failed", detail: resolution.message };
    const found = resolution.entities.filter((entity) => entity.found).length;
    return found > 0
      ? { source, status: "ok", detail: `${found} verified` }
      : { source, status: "empty", detail: resolution.message ?? MESSAGES.notFound };
  }

  private diagnoseChunks(settled: PromiseSettledResult<VectorMatch[]>): SourceDiagnostic {
    if (settled.status === "rejected") {
      return { source: "semantic", status: "failed", detail: errorMessage(settled.reason) };
    }
    return settled.value.length > 0
      ? { source: "semantic", status: "ok", detail: `${settled.value.length} chunks` }
      : { source: "semantic", status: "empty", detail: "No matching chunks" };
  }

  private diagnoseLookup(
    source: SourceName,
    settled: PromiseSettledResult<Result<unknown, EntityNotFoundError> | null>
  ): SourceDiagnostic {
    if (settled.status === "rejected") {
      return { source, status: "failed", detail: errorMessage(settled.reason) };
    }
    if (settled.value === null) return { source, status: "skipped", detail: null };
    if (settled.value.ok) return { source, status: "ok", detail: null };

    const { message, suggestions } = settled.value.error;
    return {
      source,
      status: "empty",
      detail: suggestions.length > 0 ? `${message} (did you mean: ${suggestions.join(", ")})` : message,
    };
  }
}

export function createRetrievalOrchestrator(options: RetrievalOrchestratorOptions): RetrievalOrchestrator {
  return new RetrievalOrchestrator(options);
}
