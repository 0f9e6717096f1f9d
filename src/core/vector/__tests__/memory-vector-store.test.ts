import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryVectorStore } from "../memory-vector-store.js";
import { vectorMatchFromRecord } from "../matches.js";
import type { ChunkMetadata, VectorRecord } from "../../interfaces/IVectorStore.js";
import type { IEmbeddingService } from "../../interfaces/IEmbeddingService.js";

/**
 * Embeds "x" as [1, 0] and anything else as [0, 1].
 */
const axisEmbeddings: IEmbeddingService = {
  modelId: "axis",
  dimensions: 2,
  embed: async (text) => (text === "x" ? [1, 0] : [0, 1]),
  embedBatch: async (texts) => texts.map((text) => (text === "x" ? [1, 0] : [0, 1])),
};

function metadata(filePath: string, startLine: number, endLine: number): ChunkMetadata {
  return {
    repoId: "shop",
    filePath,
    fileName: filePath,
    startLine,
    endLine,
    language: "python",
    contentPreview: `${filePath} preview`,
    chunkSizeLines: endLine - startLine + 1,
  };
}

function record(id: string, values: number[], filePath = "a.py"): VectorRecord {
  return { id, values, metadata: metadata(filePath, 1, 10) };
}

describe("InMemoryVectorStore", () => {
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    store = new InMemoryVectorStore(axisEmbeddings);
    await store.initialize();
    await store.upsert(
      [record("shop#a.py#1", [1, 0]), record("shop#b.py#1", [0.6, 0.8], "b.py"), record("shop#c.py#1", [0, 1], "c.py")],
      "shop"
    );
  });

  it("ranks by cosine similarity and applies topK", async () => {
    const matches = await store.search("x", "shop", 2);

    expect(matches.map((match) => match.chunkId)).toEqual(["shop#a.py#1", "shop#b.py#1"]);
    expect(matches[0]?.score).toBe(1);
    expect(matches[1]?.score).toBeCloseTo(0.6, 10);
  });

  it("breaks score ties by chunk id", async () => {
    await store.upsert([record("shop#0.py#1", [1, 0], "0.py")], "shop");

    const matches = await store.search("x", "shop", 2);
    expect(matches.map((match) => match.chunkId)).toEqual(["shop#0.py#1", "shop#a.py#1"]);
  });

  it("replaces vectors with the same id", async () => {
    expect(await store.upsert([record("shop#a.py#1", [0, 1])], "shop")).toBe(1);
    expect(store.size("shop")).toBe(3);

    const [best] = await store.search("x", "shop", 1);
    expect(best?.chunkId).toBe("shop#b.py#1");
  });

  it("keeps namespaces apart and deletes them whole", async () => {
    expect(await store.search("x", "other", 5)).toEqual([]);

    await store.delete("shop");
    expect(store.size("shop")).toBe(0);
    expect(await store.search("x", "shop", 5)).toEqual([]);
  });

  it("returns nothing for a non-positive topK", async () => {
    expect(await store.search("x", "shop", 0)).toEqual([]);
  });
});

describe("vectorMatchFromRecord", () => {
  it("reads a stored chunk row", () => {
    const match = vectorMatchFromRecord({
      chunkId: "shop#a.py#1",
      repoId: "shop",
      filePath: "pkg/a.py",
      fileName: "a.py",
      startLine: 1,
      endLine: 12,
      language: "python",
      contentPreview: "def a():",
      chunkSizeLines: 12,
      score: 0.75,
    });

    expect(match).toEqual({
      chunkId: "shop#a.py#1",
      filePath: "pkg/a.py",
      lineRange: "1-12",
      contentPreview: "def a():",
      score: 0.75,
      metadata: {
        repoId: "shop",
        filePath: "pkg/a.py",
        fileName: "a.py",
        startLine: 1,
        endLine: 12,
        language: "python",
        contentPreview: "def a():",
        chunkSizeLines: 12,
      },
    });
  });

  it("fills optional columns and drops rows without an identity", () => {
    const match = vectorMatchFromRecord({
      chunkId: "shop#a.py#2",
      repoId: "shop",
      filePath: "a.py",
      startLine: 5,
      endLine: 9,
      score: 0.5,
    });
    expect(match?.metadata).toEqual({
      repoId: "shop",
      filePath: "a.py",
      fileName: "a.py",
      startLine: 5,
      endLine: 9,
      language: "python",
      contentPreview: "",
      chunkSizeLines: 5,
    });

    expect(vectorMatchFromRecord({ chunkId: "shop#a.py#3", score: 0.5 })).toBeNull();
  });
});
