/**
 * RetrievalOrchestrator Tests
 *
 * Graph, vectors and memory all run in process; the ranker is a stub that
 * answers by system prompt.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { FALLBACK_MESSAGES, RetrievalOrchestrator, isValidEntityName } from "../retrieval-orchestrator.js";
import { EntityResolver, MESSAGES } from "../../resolver/entity-resolver.js";
import { TOP_K_SYSTEM_PROMPT } from "../../resolver/prompts.js";
import { InMemoryGraphStore } from "../../graph/memory-graph-store.js";
import { InMemoryVectorStore } from "../../vector/memory-vector-store.js";
import { InMemoryConversationStore } from "../../memory/conversation-store.js";
import { AllSourcesFailedError } from "../../errors.js";
import { UnavailableEmbeddingService } from "../../embeddings/unavailable-embedding-service.js";
import type { IEmbeddingService } from "../../interfaces/IEmbeddingService.js";
import type { IConversationStore } from "../../interfaces/IConversationStore.js";
import type { ILLMService } from "../../llm/interfaces/ILLMService.js";

const flatEmbeddings: IEmbeddingService = {
  modelId: "flat",
  dimensions: 2,
  embed: async () => [1, 0],
  embedBatch: async (texts) => texts.map(() => [1, 0]),
};

function ranker(topK: string, best: string): ILLMService {
  return {
    complete: vi.fn<ILLMService["complete"]>(async (systemPrompt) => (systemPrompt === TOP_K_SYSTEM_PROMPT ? topK : best)),
  };
}

function failingRanker(): ILLMService {
  return { complete: vi.fn<ILLMService["complete"]>().mockRejectedValue(new Error("boom")) };
}

async function seededGraph(): Promise<InMemoryGraphStore> {
  const store = new InMemoryGraphStore();
  await store.initialize();
  await store.upsertNode("Class", { name: "Base", module: "pkg" }, { filePath: "pkg/__init__.py", lineNumber: 1 });
  await store.upsertNode("Class", { name: "Sub", module: "pkg.sub" }, { filePath: "pkg/sub.py", lineNumber: 3 });
  await store.upsertNode("Function", { name: "helper", module: "pkg.util" }, { filePath: "pkg/util.py", lineNumber: 1 });
  await store.upsertEdge(
    { kind: "Class", key: { name: "Sub", module: "pkg.sub" } },
    { kind: "Class", key: { name: "Base" } },
    "INHERITS_FROM"
  );
  return store;
}

describe("isValidEntityName", () => {
  it("rejects blanks and the literal unknown", () => {
    expect(isValidEntityName("Sub")).toBe(true);
    expect(isValidEntityName("  ")).toBe(false);
    expect(isValidEntityName("Unknown")).toBe(false);
    expect(isValidEntityName(null)).toBe(false);
    expect(isValidEntityName(undefined)).toBe(false);
  });
});

describe("RetrievalOrchestrator", () => {
  let graph: InMemoryGraphStore;
  let vectors: InMemoryVectorStore;
  let memory: InMemoryConversationStore;

  beforeEach(async () => {
    graph = await seededGraph();
    vectors = new InMemoryVectorStore(flatEmbeddings);
    await vectors.initialize();
    memory = new InMemoryConversationStore();
  });

  function orchestrator(llm: ILLMService, memoryStore: IConversationStore = memory): RetrievalOrchestrator {
    return new RetrievalOrchestrator({
      resolver: new EntityResolver({ store: graph, llm }),
      vectors,
      memory: memoryStore,
    });
  }

  async function addChunk(): Promise<void> {
    await vectors.upsert(
      [
        {
          id: "shop#pkg/sub.py#1",
          values: [1, 0],
          metadata: {
            repoId: "shop",
            filePath: "pkg/sub.py",
            fileName: "sub.py",
            startLine: 1,
            endLine: 8,
            language: "python",
            contentPreview: "class Sub(Base):",
            chunkSizeLines: 8,
          },
        },
      ],
      "shop"
    );
  }

  const request = { query: "What does Sub inherit from?", sessionId: "s1", repoId: "shop" };

  it("prefers multi-entity analysis when the ranking verifies an entity", async () => {
    await addChunk();
    const context = await orchestrator(ranker('[{"entity_name": "Sub"}]', "{}")).retrieve({
      ...request,
      entityName: "Base",
    });

    expect(context.scenario).toBe("multi_entity_analysis");
    expect(context.entities.map((entity) => entity.entityName)).toEqual(["Sub"]);
    expect(context.chunks.map((chunk) => chunk.chunkId)).toEqual(["shop#pkg/sub.py#1"]);
    expect(context.message).toBeNull();
    expect(context.failure).toBeNull();
    expect(context.diagnostics.find((d) => d.source === "multiEntity")).toEqual({
      source: "multiEntity",
      status: "ok",
      detail: "1 verified",
    });
  });

  it("uses the named entity when the ranking finds nothing", async () => {
    const context = await orchestrator(ranker("[]", "{}")).retrieve({ ...request, entityName: "Base" });

    expect(context.scenario).toBe("direct_entity");
    expect(context.entities).toHaveLength(1);
    expect(context.entities[0]).toMatchObject({
      entityName: "Base",
      entityType: "Class",
      confidence: 1,
      found: true,
      note: null,
    });
    expect(context.entities[0]?.relationships?.dependents).toEqual([
      { name: "Sub", type: "Class", relationship: "INHERITS_FROM" },
    ]);
    expect(context.diagnostics).toEqual([
      { source: "multiEntity", status: "empty", detail: MESSAGES.notIdentified },
      { source: "semantic", status: "empty", detail: "No matching chunks" },
      { source: "directLookup", status: "ok", detail: null },
      { source: "relationships", status: "ok", detail: null },
      { source: "bestEntity", status: "skipped", detail: null },
    ]);
  });

  it("falls back to the single best pick without a named entity", async () => {
    const llm = ranker('[{"entity_name": "Ghost"}]', '{"entity_name": "helper", "entity_type": "Function"}');
    const context = await orchestrator(llm).retrieve({ ...request, entityName: "unknown" });

    expect(context.scenario).toBe("direct_entity");
    expect(context.entities[0]).toMatchObject({ entityName: "helper", found: true, note: MESSAGES.isolated });
    expect(context.diagnostics.find((d) => d.source === "directLookup")?.status).toBe("skipped");
  });

  it("answers from chunks alone when no entity resolves", async () => {
    await addChunk();
    const context = await orchestrator(ranker("[]", "nothing")).retrieve(request);

    expect(context.scenario).toBe("pinecone_only");
    expect(context.entities).toEqual([]);
    expect(context.chunks).toHaveLength(1);
  });

  it("falls back to conversation memory when every source comes back empty", async () => {
    await memory.addTurn("s1", { role: "user", content: "Tell me about Sub", timestamp: "2024-01-01T00:00:00.000Z" });

    const context = await orchestrator(ranker("[]", "nothing")).retrieve({ ...request, entityName: "Unknown123" });

    expect(context.scenario).toBe("memory_fallback");
    expect(context.memory.map((turn) => turn.content)).toEqual(["Tell me about Sub"]);
    expect(context.message).toBe(FALLBACK_MESSAGES.withMemory);
    expect(context.failure).toBeInstanceOf(AllSourcesFailedError);
    expect(context.failure?.failures).toEqual({
      multiEntity: MESSAGES.notIdentified,
      semantic: "No matching chunks",
      directLookup: "Entity not found: Unknown123",
      relationships: "Entity not found: Unknown123",
    });
    expect(context.diagnostics.at(-1)).toEqual({ source: "memory", status: "ok", detail: null });
  });

  it("reports when there is no memory either", async () => {
    const context = await orchestrator(ranker("[]", "nothing")).retrieve({ ...request, entityName: "Unknown123" });

    expect(context.scenario).toBe("memory_fallback");
    expect(context.memory).toEqual([]);
    expect(context.message).toBe("No search results and no memory context available");
  });

  it("reports when memory cannot be read", async () => {
    const broken: IConversationStore = {
      getRecentTurns: vi.fn<IConversationStore["getRecentTurns"]>().mockRejectedValue(new Error("disk gone")),
      addTurn: vi.fn<IConversationStore["addTurn"]>(),
      clear: vi.fn<IConversationStore["clear"]>(),
    };

    const context = await orchestrator(ranker("[]", "nothing"), broken).retrieve(request);

    expect(context.message).toBe(FALLBACK_MESSAGES.memoryUnavailable);
    expect(context.diagnostics.at(-1)).toEqual({ source: "memory", status: "failed", detail: "disk gone" });
  });

  it("keeps direct lookups working when the ranker is down", async () => {
    const context = await orchestrator(failingRanker()).retrieve({ ...request, entityName: "Sub" });

    expect(context.scenario).toBe("direct_entity");
    expect(context.entities[0]?.entityName).toBe("Sub");
    expect(context.diagnostics[0]).toEqual({
      source: "multiEntity",
      status: "failed",
      detail: "Ranking service unavailable: boom",
    });
  });

  it("does not treat an unverified pick as a multi-entity match", async () => {
    vi.spyOn(graph, "entityExists").mockRejectedValue(new Error("graph down"));

    const context = await orchestrator(ranker('[{"entity_name": "Ghost"}]', "nothing")).retrieve(request);

    expect(context.scenario).toBe("memory_fallback");
    expect(context.diagnostics[0]).toEqual({ source: "multiEntity", status: "empty", detail: MESSAGES.notFound });
  });

  it("records a failed vector search and carries on", async () => {
    vi.spyOn(vectors, "search").mockRejectedValue(new Error("index offline"));

    const context = await orchestrator(ranker('[{"entity_name": "Sub"}]', "{}")).retrieve(request);

    expect(context.scenario).toBe("multi_entity_analysis");
    expect(context.chunks).toEqual([]);
    expect(context.diagnostics[1]).toEqual({ source: "semantic", status: "failed", detail: "index offline" });
  });

  it("reports semantic search failed when no embedding service is available", async () => {
    vectors = new InMemoryVectorStore(new UnavailableEmbeddingService(2, "no API key"));
    await addChunk();

    const context = await orchestrator(ranker("[]", "nothing")).retrieve({ ...request, entityName: "Sub" });

    expect(context.scenario).toBe("direct_entity");
    expect(context.chunks).toEqual([]);
    expect(context.diagnostics[1]).toEqual({
      source: "semantic",
      status: "failed",
      detail: "Embedding service unavailable: no API key",
    });
  });
});
