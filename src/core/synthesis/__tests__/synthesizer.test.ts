import { describe, it, expect, vi } from "vitest";
import { EMPTY_CONTEXT_GUIDANCE, Synthesizer } from "../synthesizer.js";
import { formatContext, isEmptyContext } from "../context-formatter.js";
import type { RetrievalContext } from "../../retrieval/types.js";
import type { ResolvedEntity } from "../../resolver/entity-resolver.js";
import type { VectorMatch } from "../../interfaces/IVectorStore.js";
import type { ILLMService } from "../../llm/interfaces/ILLMService.js";

const SUB: ResolvedEntity = {
  entityName: "Sub",
  entityType: "Class",
  confidence: 0.9,
  reason: "named",
  found: true,
  note: null,
  relationships: {
    entity: {
      name: "Sub",
      type: "Class",
      module: "pkg.sub",
      filePath: "pkg/sub.py",
      lineNumber: 3,
      docstring: "A subclass.",
    },
    dependents: [],
    dependencies: [{ name: "Base", type: "Class", relationship: "INHERITS_FROM" }],
    parents: [],
    counts: { dependents: 0, dependencies: 1, parents: 0 },
  },
};

const CHUNK: VectorMatch = {
  chunkId: "shop#pkg/sub.py#1",
  filePath: "pkg/sub.py",
  lineRange: "1-8",
  contentPreview: "class Sub(Base):",
  score: 0.8123,
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
};

function context(overrides: Partial<RetrievalContext> = {}): RetrievalContext {
  return {
    query: "What does Sub inherit from?",
    scenario: "multi_entity_analysis",
    entities: [SUB],
    chunks: [CHUNK],
    memory: [{ role: "user", content: "Tell me about Sub", timestamp: "2024-01-01T00:00:00.000Z" }],
    message: null,
    diagnostics: [],
    failure: null,
    ...overrides,
  };
}

const FORMATTED = [
  "CODE RELATIONSHIPS (graph):",
  "",
  "1. Class: Sub (module pkg.sub)",
  "   Dependents (0): none",
  "   Dependencies (1): Base [INHERITS_FROM]",
  "   Parents (0): none",
  "   Location: pkg/sub.py:3",
  "   Documentation: A subclass.",
  "   Why relevant: named",
  "",
  "CODE CHUNKS (semantic search):",
  "",
  "1. File: pkg/sub.py",
  "   Lines: 1-8",
  "   Relevance: 81.2%",
  "   Preview: class Sub(Base):",
  "",
  "CONVERSATION MEMORY:",
  "",
  "[user] Tell me about Sub",
].join("\n");

describe("formatContext", () => {
  it("renders relationships, then chunks, then memory", () => {
    expect(formatContext(context())).toBe(FORMATTED);
  });

  it("notes truncated neighbour lists and entity notes", () => {
    const text = formatContext(
      context({
        chunks: [],
        memory: [],
        entities: [
          {
            ...SUB,
            reason: "",
            note: "No relationships found - entity may be isolated",
            relationships: SUB.relationships && {
              ...SUB.relationships,
              entity: { ...SUB.relationships.entity, module: null, lineNumber: null, docstring: null },
              counts: { dependents: 0, dependencies: 3, parents: 0 },
            },
          },
        ],
      })
    );

    expect(text).toBe(
      [
        "CODE RELATIONSHIPS (graph):",
        "",
        "1. Class: Sub",
        "   Dependents (0): none",
        "   Dependencies (3): Base [INHERITS_FROM], +2 more",
        "   Parents (0): none",
        "   Location: pkg/sub.py",
        "   Note: No relationships found - entity may be isolated",
      ].join("\n")
    );
  });

  it("renders an empty context as empty text", () => {
    const empty = context({ entities: [], chunks: [], memory: [] });
    expect(isEmptyContext(empty)).toBe(true);
    expect(formatContext(empty)).toBe("");
  });
});

describe("Synthesizer", () => {
  it("returns guidance for an empty context without calling the service", async () => {
    const complete = vi.fn<ILLMService["complete"]>();
    const result = await new Synthesizer({ complete }).synthesize(
      context({ scenario: "memory_fallback", entities: [], chunks: [], memory: [] })
    );

    expect(result).toEqual({ answer: EMPTY_CONTEXT_GUIDANCE, source: "guidance", scenario: "memory_fallback" });
    expect(complete).not.toHaveBeenCalled();
  });

  it("passes the scenario, question and context to the service", async () => {
    const complete = vi.fn<ILLMService["complete"]>(async () => "  Sub inherits from Base.\n");
    const result = await new Synthesizer({ complete }).synthesize(
      context({ scenario: "memory_fallback", message: "No search results, using conversation memory as context" })
    );

    expect(result).toEqual({ answer: "Sub inherits from Base.", source: "llm", scenario: "memory_fallback" });
    const [, userPrompt] = complete.mock.calls[0] ?? [];
    expect(userPrompt).toBe(
      "Context scenario: memory_fallback (No search results, using conversation memory as context)\n\n" +
        "User Question:\nWhat does Sub inherit from?\n\n" +
        `Retrieved Context:\n${FORMATTED}`
    );
  });

  it("answers with the formatted context when the service fails", async () => {
    const complete = vi.fn<ILLMService["complete"]>().mockRejectedValue(new Error("overloaded"));
    const result = await new Synthesizer({ complete }).synthesize(context());

    expect(result).toEqual({ answer: FORMATTED, source: "context", scenario: "multi_entity_analysis" });
  });

  it("answers with the formatted context when the service returns nothing", async () => {
    const complete = vi.fn<ILLMService["complete"]>(async () => "   ");
    const result = await new Synthesizer({ complete }).synthesize(context());

    expect(result.source).toBe("context");
    expect(result.answer).toBe(FORMATTED);
  });
});
