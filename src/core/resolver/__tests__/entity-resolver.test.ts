/**
 * EntityResolver Tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import {
  EntityResolver,
  MESSAGES,
  extractBracketed,
  parseSingleBest,
  parseTopK,
} from "../entity-resolver.js";
import {
  TOP_K_SYSTEM_PROMPT,
  buildSingleBestPrompt,
  buildTopKPrompt,
  formatGroupedInventory,
  formatNumberedInventory,
} from "../prompts.js";
import { InMemoryGraphStore } from "../../graph/memory-graph-store.js";
import { EntityNotFoundError, GraphError, RankingUnavailableError } from "../../errors.js";
import type { EntitySummary } from "../../interfaces/IGraphStore.js";
import type { ILLMService } from "../../llm/interfaces/ILLMService.js";

function summary(name: string, type: EntitySummary["type"], module: string | null): EntitySummary {
  return { name, type, module, filePath: null, lineNumber: null, docstring: null };
}

function llmReturning(response: string): ILLMService & { complete: Mock<ILLMService["complete"]> } {
  return { complete: vi.fn<ILLMService["complete"]>(async () => response) };
}

async function seededStore(): Promise<InMemoryGraphStore> {
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

describe("ranking response parsing", () => {
  it("extracts the outermost bracketed text", () => {
    expect(extractBracketed('Here: {"a": {"b": 1}} ok', "{", "}")).toBe('{"a": {"b": 1}}');
    expect(extractBracketed("no json", "[", "]")).toBeNull();
    expect(extractBracketed("] backwards [", "[", "]")).toBeNull();
  });

  it("parses a single best pick surrounded by prose", () => {
    const parsed = parseSingleBest(
      'Sure! {"entity_name": "Sub", "entity_type": "Class", "confidence": 0.9, "reason": "named"} Hope that helps.'
    );
    expect(parsed).toEqual({
      ok: true,
      candidates: [{ entityName: "Sub", entityType: "Class", confidence: 0.9, reason: "named" }],
    });
  });

  it("distinguishes a missing answer from an unparseable one", () => {
    expect(parseSingleBest("I am not sure.")).toEqual({ ok: false, message: MESSAGES.notIdentified });
    expect(parseSingleBest("{not json}")).toEqual({ ok: false, message: MESSAGES.unparseable });
    expect(parseSingleBest('{"entity_type": "Class"}')).toEqual({ ok: false, message: MESSAGES.unparseable });
  });

  it("defaults optional candidate fields", () => {
    expect(parseTopK('[{"entity_name": "Sub"}]', 5)).toEqual({
      ok: true,
      candidates: [{ entityName: "Sub", entityType: "Unknown", confidence: 0, reason: "" }],
    });
  });

  it("keeps at most k picks in order", () => {
    const parsed = parseTopK('[{"entity_name": "A"}, {"entity_name": "B"}, {"entity_name": "C"}]', 2);
    expect(parsed.ok && parsed.candidates.map((candidate) => candidate.entityName)).toEqual(["A", "B"]);
  });

  it("treats an empty array as no identification", () => {
    expect(parseTopK("[]", 5)).toEqual({ ok: false, message: MESSAGES.notIdentified });
    expect(parseTopK('[{"entity_name": ""}]', 5)).toEqual({ ok: false, message: MESSAGES.unparseable });
  });
});

describe("ranking prompts", () => {
  const inventory = [summary("Sub", "Class", "pkg.sub"), summary("helper", "Function", null), summary("Base", "Class", "pkg")];

  it("numbers the inventory for the single best prompt", () => {
    expect(formatNumberedInventory(inventory)).toBe(
      [
        "Available entities:",
        "1. Sub (Type: Class, Module: pkg.sub)",
        "2. helper (Type: Function, Module: N/A)",
        "3. Base (Type: Class, Module: pkg)",
      ].join("\n")
    );
  });

  it("groups the inventory by type for the top-k prompt", () => {
    expect(formatGroupedInventory(inventory)).toBe(
      "Available entities in codebase:\n\nClasses (2):\n  - Base\n  - Sub\n\nFunctions (1):\n  - helper\n\n"
    );
  });

  it("inserts the query verbatim", () => {
    expect(buildSingleBestPrompt("what is $& here?", inventory)).toContain('User Query: "what is $& here?"');
    expect(buildTopKPrompt("what is $1?", inventory, 3)).toContain('User Query: "what is $1?"');
  });

  it("states k throughout the top-k prompt", () => {
    const prompt = buildTopKPrompt("routes", inventory, 3);
    expect(prompt).toContain("find the TOP 3 entities");
    expect(prompt).toContain("If you find fewer than 3 entities");
    expect(prompt).not.toContain("{k}");
  });
});

describe("EntityResolver", () => {
  let store: InMemoryGraphStore;

  beforeEach(async () => {
    store = await seededStore();
  });

  it("verifies every pick against the graph and drops duplicates", async () => {
    const llm = llmReturning(
      JSON.stringify([
        { entity_name: "Sub", entity_type: "Class", confidence: 0.9, reason: "named" },
        { entity_name: "Ghost", entity_type: "Class", confidence: 0.4, reason: "guess" },
        { entity_name: "sub", entity_type: "Class", confidence: 0.3, reason: "again" },
      ])
    );
    const resolver = new EntityResolver({ store, llm });

    const resolution = await resolver.resolveTopK("What does Sub inherit from?", 5);

    expect(resolution.message).toBeNull();
    expect(resolution.error).toBeNull();
    expect(resolution.inventorySize).toBe(3);
    expect(resolution.entities.map((entity) => [entity.entityName, entity.found, entity.note])).toEqual([
      ["Sub", true, null],
      ["Ghost", false, MESSAGES.notFound],
    ]);
    expect(resolution.entities[0]?.relationships?.dependencies).toEqual([
      { name: "Base", type: "Class", relationship: "INHERITS_FROM" },
    ]);
    expect(resolution.totalRelationships).toBe(1);
    expect(llm.complete).toHaveBeenCalledWith(TOP_K_SYSTEM_PROMPT, expect.stringContaining("Classes (2)"), {
      maxTokens: 800,
      temperature: 0.3,
    });
  });

  it("notes an isolated best pick", async () => {
    const resolver = new EntityResolver({ store, llm: llmReturning('{"entity_name": "helper", "confidence": 0.8}') });

    const resolution = await resolver.resolveBest("where is the helper?");

    expect(resolution.entities).toHaveLength(1);
    expect(resolution.entities[0]).toMatchObject({
      entityName: "helper",
      found: true,
      note: MESSAGES.isolated,
      relationships: { counts: { dependents: 0, dependencies: 0, parents: 0 } },
    });
  });

  it("degrades to an empty resolution when the ranking call fails", async () => {
    const llm: ILLMService = { complete: vi.fn().mockRejectedValue(new Error("quota exceeded")) };
    const resolver = new EntityResolver({ store, llm });

    const resolution = await resolver.resolveTopK("anything", 5);

    expect(resolution.entities).toEqual([]);
    expect(resolution.message).toBe("Ranking service unavailable: quota exceeded");
    expect(resolution.error).toBeInstanceOf(RankingUnavailableError);
  });

  it("leaves a pick unverified when the existence check fails", async () => {
    vi.spyOn(store, "entityExists").mockRejectedValue(new Error("graph down"));
    const resolver = new EntityResolver({ store, llm: llmReturning('[{"entity_name": "Ghost"}]') });

    const resolution = await resolver.resolveTopK("anything", 5);

    expect(resolution.entities).toEqual([
      {
        entityName: "Ghost",
        entityType: "Unknown",
        confidence: 0,
        reason: "",
        found: false,
        relationships: null,
        note: "graph down",
      },
    ]);
  });

  it("keeps a verified pick when only the relationship fetch fails", async () => {
    vi.spyOn(store, "getRelationships").mockRejectedValue(new Error("timeout"));
    const resolver = new EntityResolver({ store, llm: llmReturning('[{"entity_name": "Sub"}]') });

    const resolution = await resolver.resolveTopK("anything", 5);

    expect(resolution.entities[0]).toMatchObject({ entityName: "Sub", found: true, relationships: null, note: "timeout" });
  });

  it("degrades to an empty resolution when the inventory cannot be read", async () => {
    vi.spyOn(store, "listEntities").mockRejectedValue(new Error("graph down"));
    const llm = llmReturning("[]");

    const resolution = await new EntityResolver({ store, llm }).resolveBest("anything");

    expect(resolution.entities).toEqual([]);
    expect(resolution.inventorySize).toBe(0);
    expect(resolution.message).toBe("Could not read entities from graph database: graph down");
    expect(resolution.error).toBeInstanceOf(GraphError);
    expect(llm.complete).not.toHaveBeenCalled();
  });

  it("reports an unusable answer as a message", async () => {
    const resolver = new EntityResolver({ store, llm: llmReturning("I could not decide.") });

    const resolution = await resolver.resolveTopK("anything", 5);

    expect(resolution.entities).toEqual([]);
    expect(resolution.message).toBe(MESSAGES.notIdentified);
    expect(resolution.error).toBeNull();
  });

  it("skips the ranking call on an empty graph", async () => {
    const empty = new InMemoryGraphStore();
    await empty.initialize();
    const llm = llmReturning("[]");

    const resolution = await new EntityResolver({ store: empty, llm }).resolveBest("anything");

    expect(resolution.message).toBe(MESSAGES.noEntities);
    expect(llm.complete).not.toHaveBeenCalled();
  });

  it("reports ranking unavailable without a reasoning service", async () => {
    const resolution = await new EntityResolver({ store }).resolveTopK("anything", 5);

    expect(resolution.message).toBe(MESSAGES.rankingUnavailable);
    expect(resolution.error).toBeInstanceOf(RankingUnavailableError);
  });

  it("limits the inventory", async () => {
    const inventory = await new EntityResolver({ store, inventoryLimit: 2 }).fetchInventory();
    expect(inventory.map((entity) => entity.name)).toEqual(["Base", "Sub"]);
  });

  describe("lookupEntity", () => {
    it("matches names case-insensitively", async () => {
      const result = await new EntityResolver({ store }).lookupEntity("sub");
      expect(result.ok && result.value.name).toBe("Sub");
    });

    it("suggests similar names on a miss", async () => {
      const result = await new EntityResolver({ store }).lookupEntity("Su");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(EntityNotFoundError);
        expect(result.error.entityName).toBe("Su");
        expect(result.error.suggestions).toEqual(["Sub"]);
      }
    });
  });

  describe("expandRelationships", () => {
    it("returns the neighbourhood of a known entity", async () => {
      const result = await new EntityResolver({ store }).expandRelationships("Base");
      expect(result.ok && result.value.dependents).toEqual([{ name: "Sub", type: "Class", relationship: "INHERITS_FROM" }]);
    });

    it("fails for an unknown entity", async () => {
      const result = await new EntityResolver({ store }).expandRelationships("Unknown123");
      expect(result.ok).toBe(false);
    });
  });
});
