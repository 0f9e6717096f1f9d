import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { applyEnvOverrides, loadConfig, parseConfig } from "../config.js";
import { getConfigPath } from "../paths.js";
import { ConfigurationError } from "../../core/errors.js";

describe("applyEnvOverrides", () => {
  it("overlays the supported variables and keeps other file values", () => {
    const merged = applyEnvOverrides(
      { neo4j: { uri: "bolt://graph:7687", database: "code" }, retrieval: { topK: 3 } },
      { NEO4J_URI: "bolt://override:7687", NEO4J_PASSWORD: "", LLM_PROVIDER: "anthropic", LOG_LEVEL: "DEBUG" }
    );

    expect(merged).toEqual({
      neo4j: { uri: "bolt://override:7687", database: "code", password: "" },
      llm: { provider: "anthropic" },
      repository: {},
      logging: { level: "debug" },
      retrieval: { topK: 3 },
    });
  });
});

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});

    expect(config.neo4j).toEqual({
      uri: "bolt://localhost:7687",
      user: "neo4j",
      password: "password",
      database: "neo4j",
      connectionTimeoutMs: 30_000,
    });
    expect(config.llm).toEqual({ provider: "openai", temperature: 0.2, maxTokens: 1500 });
    expect(config.chunking).toEqual({ chunkSize: 650, overlap: 50 });
    expect(config.retrieval).toEqual({ topK: 5, chunkTopK: 5, memoryTurns: 6, inventoryLimit: 200 });
    expect(config.vector.backend).toBe("neo4j");
    expect(config.logging.level).toBe("info");
  });

  it("lists every invalid field", () => {
    let caught: unknown;
    try {
      parseConfig({ retrieval: { topK: 0 }, chunking: { chunkSize: 10, overlap: 10 } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.context?.issues).toEqual([
      "chunking.overlap: overlap must be smaller than chunkSize",
      "retrieval.topK: Number must be greater than 0",
    ]);
  });

  it("rejects an unknown provider", () => {
    expect(() => parseConfig({ llm: { provider: "acme" } })).toThrow(ConfigurationError);
  });
});

describe("loadConfig", () => {
  let projectRoot: string;

  beforeEach(async () => {
    projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.rm(projectRoot, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<void> {
    const configPath = getConfigPath(projectRoot);
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, content);
  }

  it("uses defaults and the environment without a config file", async () => {
    const config = await loadConfig(projectRoot, { NEO4J_USER: "reader" });
    expect(config.neo4j.user).toBe("reader");
    expect(config.embeddings.model).toBe("text-embedding-3-small");
  });

  it("merges the config file under the environment", async () => {
    await writeConfig(JSON.stringify({ neo4j: { user: "file-user" }, memory: { maxTurns: 10 } }));

    const config = await loadConfig(projectRoot, { LLM_MODEL: "test-model" });
    expect(config.neo4j.user).toBe("file-user");
    expect(config.memory.maxTurns).toBe(10);
    expect(config.llm.modelId).toBe("test-model");
  });

  it("rejects a config file that is not an object", async () => {
    await writeConfig("[1, 2]");
    await expect(loadConfig(projectRoot, {})).rejects.toThrow(`${getConfigPath(projectRoot)} must contain a JSON object`);
  });

  it("rejects a config file that is not JSON", async () => {
    await writeConfig("{ nope");
    await expect(loadConfig(projectRoot, {})).rejects.toBeInstanceOf(ConfigurationError);
  });
});
