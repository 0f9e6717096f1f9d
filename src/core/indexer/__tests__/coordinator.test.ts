/**
 * IndexerCoordinator Tests
 *
 * Indexes small Python trees written to a temp directory into the in-memory graph.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { InMemoryGraphStore } from "../../graph/memory-graph-store.js";
import { ParserManager } from "../../parser/parser-manager.js";
import { IndexerCoordinator, type IndexingProgressEvent, type IndexingError } from "../coordinator.js";
import { LocalRepositorySource } from "../repository-source.js";

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

const BASE_AND_SUB = {
  "pkg/base.py": "class Base:\n    pass\n",
  "pkg/sub.py": "from pkg.base import Base\n\n\nclass Sub(Base):\n    pass\n",
};

describe("IndexerCoordinator", () => {
  let parser: ParserManager;
  let tempDir: string;
  let store: InMemoryGraphStore;
  const source = new LocalRepositorySource({ maxFileSizeMb: 10 });

  beforeAll(async () => {
    parser = new ParserManager();
    await parser.initialize();
  });

  afterAll(async () => {
    await parser.close();
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "coordinator-test-"));
    store = new InMemoryGraphStore();
    await store.initialize();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("builds the package, file and inheritance graph", async () => {
    await writeTree(tempDir, BASE_AND_SUB);
    const coordinator = new IndexerCoordinator({ source, store, parser });

    const result = await coordinator.index(tempDir);

    expect(result.state).toBe("completed");
    expect(coordinator.state).toBe("completed");
    expect(result).toMatchObject({
      filesFound: 2,
      filesSkipped: 0,
      parsingErrors: 0,
      filesProcessed: 2,
      packagesCreated: 1,
      entitiesCreated: 4,
      relationshipsCreated: 5,
      relationshipsUnresolved: 0,
      writeFailures: 0,
    });
    expect(result.graphStatistics).toEqual({
      nodes: { Package: 1, File: 2, Class: 2 },
      relationships: { CONTAINS: 2, DEFINES: 2, INHERITS_FROM: 1 },
      totalNodes: 5,
      totalRelationships: 5,
    });

    const sub = await store.getRelationships("Sub");
    expect(sub?.dependencies).toEqual([{ name: "Base", type: "Class", relationship: "INHERITS_FROM" }]);
    const packages = (await store.listEntities(50)).filter((entity) => entity.type === "Package");
    expect(packages.map((entity) => entity.name)).toEqual(["pkg"]);
  });

  it("links each file to the class it defines", async () => {
    await writeTree(tempDir, BASE_AND_SUB);
    const upsertEdge = vi.spyOn(store, "upsertEdge");

    await new IndexerCoordinator({ source, store, parser }).index(tempDir);

    const files = (await store.listEntities(50)).filter((entity) => entity.type === "File");
    expect(files.map((entity) => entity.name)).toEqual(["pkg.base", "pkg.sub"]);
    const defines = upsertEdge.mock.calls
      .filter(([, , kind]) => kind === "DEFINES")
      .map(([source, target]) => [source.key.name, target.key.name, target.key.module]);
    expect(defines).toEqual([
      ["pkg.base", "Base", "pkg.base"],
      ["pkg.sub", "Sub", "pkg.sub"],
    ]);
  });

  it("writes the same graph when run twice", async () => {
    await writeTree(tempDir, BASE_AND_SUB);
    const coordinator = new IndexerCoordinator({ source, store, parser });

    await coordinator.index(tempDir);
    const second = await coordinator.index(tempDir);

    expect(second.graphStatistics?.totalNodes).toBe(5);
    expect(second.graphStatistics?.totalRelationships).toBe(5);
  });

  it("leaves out test files unless asked", async () => {
    await writeTree(tempDir, { ...BASE_AND_SUB, "tests/test_sub.py": "def test_sub():\n    pass\n" });

    const skipped = await new IndexerCoordinator({ source, store, parser }).index(tempDir);
    expect(skipped.filesFound).toBe(3);
    expect(skipped.filesSkipped).toBe(1);
    expect(skipped.filesProcessed).toBe(2);

    const included = await new IndexerCoordinator({ source, store, parser, skipTestFiles: false }).index(tempDir);
    expect(included.filesSkipped).toBe(0);
    expect(included.filesProcessed).toBe(3);
  });

  it("skips a file that does not parse and indexes the rest", async () => {
    await writeTree(tempDir, { ...BASE_AND_SUB, "pkg/broken.py": "def broken(:\n    pass\n" });
    const errors: IndexingError[] = [];

    const result = await new IndexerCoordinator({ source, store, parser, onError: (error) => errors.push(error) }).index(
      tempDir
    );

    expect(result.state).toBe("completed");
    expect(result.parsingErrors).toBe(1);
    expect(result.filesProcessed).toBe(2);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ filePath: "pkg/broken.py", phase: "parsing", recoverable: true });
  });

  it("fails a run without parseable files", async () => {
    await writeTree(tempDir, { "README.md": "# nothing here\n" });
    const coordinator = new IndexerCoordinator({ source, store, parser });

    const result = await coordinator.index(tempDir);

    expect(result.state).toBe("failed");
    expect(coordinator.state).toBe("failed");
    expect(result.filesFound).toBe(0);
    expect(result.entitiesCreated).toBe(0);
    expect(result.graphStatistics?.totalNodes).toBe(0);
  });

  it("fails a run whose repository cannot be opened", async () => {
    const result = await new IndexerCoordinator({ source, store, parser }).index(path.join(tempDir, "missing"));

    expect(result.state).toBe("failed");
    expect(result.localPath).toBeNull();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({ filePath: "", phase: "downloading", recoverable: false });
  });

  it("clears the graph first when asked", async () => {
    await store.upsertNode("Class", { name: "Stale", module: "old" }, {});
    await writeTree(tempDir, BASE_AND_SUB);

    await new IndexerCoordinator({ source, store, parser, clearFirst: true }).index(tempDir);

    expect(await store.entityExists("Stale")).toBe(false);
    expect(await store.entityExists("Sub")).toBe(true);
  });

  it("returns a failed run when the graph cannot be cleared", async () => {
    await writeTree(tempDir, BASE_AND_SUB);
    vi.spyOn(store, "clearAll").mockRejectedValue(new Error("graph offline"));
    const onError = vi.fn();
    const coordinator = new IndexerCoordinator({ source, store, parser, clearFirst: true, onError });

    const result = await coordinator.index(tempDir);

    expect(coordinator.state).toBe("failed");
    expect(result.state).toBe("failed");
    expect(result.filesProcessed).toBe(0);
    expect(result.errors).toEqual([{ filePath: "", phase: "writing", error: "graph offline", recoverable: false }]);
    expect(onError).toHaveBeenCalledWith({ filePath: "", phase: "writing", error: "graph offline", recoverable: false });
  });

  it("reports progress from running to completed", async () => {
    await writeTree(tempDir, BASE_AND_SUB);
    const events: IndexingProgressEvent[] = [];

    await new IndexerCoordinator({ source, store, parser, onProgress: (event) => events.push(event) }).index(tempDir);

    expect(events[0]).toMatchObject({ state: "running", phase: "downloading", percentage: 0 });
    expect(events.filter((event) => event.phase === "parsing").map((event) => event.currentFile)).toEqual([
      "pkg/base.py",
      "pkg/sub.py",
    ]);
    expect(events.at(-1)).toMatchObject({ state: "completed", phase: "complete", percentage: 100 });
  });
});
