/**
 * CodeAssistant Tests
 *
 * End to end over the in-memory stores with a scripted reasoning service.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { CodeAssistant } from "../code-assistant.js";
import { QueryAnalyzer } from "../../query/query-analyzer.js";
import { RetrievalOrchestrator } from "../../retrieval/retrieval-orchestrator.js";
import { Synthesizer } from "../../synthesis/synthesizer.js";
import { EntityResolver } from "../../resolver/entity-resolver.js";
import { TOP_K_SYSTEM_PROMPT } from "../../resolver/prompts.js";
import { InMemoryGraphStore } from "../../graph/memory-graph-store.js";
import { InMemoryVectorStore } from "../../vector/memory-vector-store.js";
import { InMemoryConversationStore } from "../../memory/conversation-store.js";
import type { IConversationStore } from "../../interfaces/IConversationStore.js";
import type { IEmbeddingService } from "../../interfaces/IEmbeddingService.js";
import type { ILLMService } from "../../llm/interfaces/ILLMService.js";
import { UnavailableLLMService } from "../../llm/unavailable-llm-service.js";

const flatEmbeddings: IEmbeddingService = {
  modelId: "flat",
  dimensions: 2,
  embed: async () => [1, 0],
  embedBatch: async (texts) => texts.map(() => [1, 0]),
};

/**
 * Answers the analysis, ranking and synthesis prompts by their system prompt.
 */
function scriptedLLM() {
  return vi.fn<ILLMService["complete"]>(async (systemPrompt) => {
    if (systemPrompt.startsWith("Analyze the user query")) {
      return '{"intent": "explain", "entities": ["Sub"], "repo_url": null, "confidence": 0.9}';
    }
    if (systemPrompt === TOP_K_SYSTEM_PROMPT) return "[]";
    return "Sub inherits from Base.";
  });
}

describe("CodeAssistant", () => {
  let graph: InMemoryGraphStore;
  let vectors: InMemoryVectorStore;
  let memory: InMemoryConversationStore;
  let complete: ReturnType<typeof scriptedLLM>;

  beforeEach(async () => {
    graph = new InMemoryGraphStore();
    await graph.initialize();
    await graph.upsertNode("Class", { name: "Base", module: "pkg" }, { filePath: "pkg/__init__.py", lineNumber: 1 });
    await graph.upsertNode("Class", { name: "Sub", module: "pkg.sub" }, { filePath: "pkg/sub.py", lineNumber: 3 });
    await graph.upsertEdge(
      { kind: "Class", key: { name: "Sub", module: "pkg.sub" } },
      { kind: "Class", key: { name: "Base" } },
      "INHERITS_FROM"
    );

    vectors = new InMemoryVectorStore(flatEmbeddings);
    await vectors.initialize();
    memory = new InMemoryConversationStore();
    complete = scriptedLLM();
  });

  function assistant(memoryStore: IConversationStore = memory, llm: ILLMService = { complete }): CodeAssistant {
    return new CodeAssistant({
      analyzer: new QueryAnalyzer(llm),
      orchestrator: new RetrievalOrchestrator({
        resolver: new EntityResolver({ store: graph, llm }),
        vectors,
        memory: memoryStore,
      }),
      synthesizer: new Synthesizer(llm),
      memory: memoryStore,
    });
  }

  it("answers about the entity the question names", async () => {
    const answer = await assistant().ask("What does Sub inherit from?", { sessionId: "s1", repoId: "shop" });

    expect(answer.answer).toBe("Sub inherits from Base.");
    expect(answer.answerSource).toBe("llm");
    expect(answer.scenario).toBe("direct_entity");
    expect(answer.analysis?.primaryEntity).toBe("Sub");
    expect(answer.entities).toEqual(["Sub"]);
    expect(answer.citations).toEqual([]);
    expect(answer.message).toBeNull();
  });

  it("records the exchange in the session", async () => {
    await assistant().ask("What does Sub inherit from?", { sessionId: "s1", repoId: "shop" });

    const turns = await memory.getRecentTurns("s1", 10);
    expect(turns.map((turn) => [turn.role, turn.content])).toEqual([
      ["user", "What does Sub inherit from?"],
      ["assistant", "Sub inherits from Base."],
    ]);
    expect(turns[1]?.metadata).toEqual({ scenario: "direct_entity" });
  });

  it("skips query analysis when the entity is given", async () => {
    const answer = await assistant().ask("Explain it", { sessionId: "s1", repoId: "shop", entityName: "Base" });

    expect(answer.analysis).toBeNull();
    expect(answer.entities).toEqual(["Base"]);
    expect(complete.mock.calls.some(([systemPrompt]) => systemPrompt.startsWith("Analyze the user query"))).toBe(false);
  });

  it("cites the chunks it retrieved", async () => {
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

    const answer = await assistant().ask("What does Sub inherit from?", { sessionId: "s1", repoId: "shop" });

    expect(answer.citations).toEqual([
      {
        type: "code_chunk",
        file: "pkg/sub.py",
        fileName: "sub.py",
        lines: "1-8",
        language: "python",
        preview: "class Sub(Base):",
        relevance: 1,
        chunkId: "shop#pkg/sub.py#1",
      },
    ]);
  });

  it("still answers when the turns cannot be stored", async () => {
    const readOnly: IConversationStore = {
      getRecentTurns: async () => [],
      addTurn: vi.fn<IConversationStore["addTurn"]>().mockRejectedValue(new Error("read-only")),
      clear: async () => undefined,
    };

    const answer = await assistant(readOnly).ask("What does Sub inherit from?", { sessionId: "s1", repoId: "shop" });
    expect(answer.answer).toBe("Sub inherits from Base.");
  });

  it("answers from the retrieved context without a reasoning service", async () => {
    const answer = await assistant(memory, new UnavailableLLMService("no API key")).ask("Explain it", {
      sessionId: "s1",
      repoId: "shop",
      entityName: "Base",
    });

    expect(answer.scenario).toBe("direct_entity");
    expect(answer.answerSource).toBe("context");
    expect(answer.answer.split("\n").slice(0, 3)).toEqual(["CODE RELATIONSHIPS (graph):", "", "1. Class: Base (module pkg)"]);
    expect(answer.diagnostics[0]).toEqual({
      source: "multiEntity",
      status: "failed",
      detail: "Ranking service unavailable: Reasoning service unavailable: no API key",
    });
  });
});
