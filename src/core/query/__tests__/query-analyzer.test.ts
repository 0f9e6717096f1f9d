import { describe, it, expect, vi } from "vitest";
import { QueryAnalyzer, defaultAnalysis, parseAnalysis } from "../query-analyzer.js";
import type { ILLMService } from "../../llm/interfaces/ILLMService.js";

describe("parseAnalysis", () => {
  it("reads the JSON object out of the response", () => {
    const analysis = parseAnalysis(
      "How does Router dispatch?",
      'Analysis:\n{"intent": "explain", "entities": ["Router", " dispatch ", ""], "repo_url": null, "confidence": 0.8}'
    );

    expect(analysis).toEqual({
      query: "How does Router dispatch?",
      intent: "explain",
      entities: ["Router", "dispatch"],
      repoUrl: null,
      confidence: 0.8,
      primaryEntity: "Router",
    });
  });

  it("replaces unknown or out-of-range fields with defaults", () => {
    const analysis = parseAnalysis("q", '{"intent": "dance", "entities": "Router", "confidence": 7}');

    expect(analysis.intent).toBe("search");
    expect(analysis.entities).toEqual([]);
    expect(analysis.repoUrl).toBeNull();
    expect(analysis.confidence).toBe(0.5);
    expect(analysis.primaryEntity).toBeNull();
  });

  it("keeps a repository URL for indexing requests", () => {
    const analysis = parseAnalysis("index it", '{"intent": "index", "repo_url": "https://example.com/acme/shop.git"}');
    expect(analysis.intent).toBe("index");
    expect(analysis.repoUrl).toBe("https://example.com/acme/shop.git");
  });

  it("falls back to the default for text without JSON", () => {
    expect(parseAnalysis("q", "no idea")).toEqual(defaultAnalysis("q"));
    expect(parseAnalysis("q", "{broken")).toEqual(defaultAnalysis("q"));
    expect(parseAnalysis("q", "{broken}")).toEqual(defaultAnalysis("q"));
  });
});

describe("QueryAnalyzer", () => {
  it("asks with a small budget and the question as the user prompt", async () => {
    const complete = vi.fn<ILLMService["complete"]>(async () => '{"intent": "stats"}');
    const analysis = await new QueryAnalyzer({ complete }).analyze("How big is the graph?");

    expect(analysis.intent).toBe("stats");
    expect(complete).toHaveBeenCalledWith(expect.stringContaining("Analyze the user query"), "How big is the graph?", {
      maxTokens: 200,
      temperature: 0.5,
    });
  });

  it("returns the default analysis when the call fails", async () => {
    const complete = vi.fn<ILLMService["complete"]>(async () => {
      throw new Error("timeout");
    });

    expect(await new QueryAnalyzer({ complete }).analyze("anything")).toEqual({
      query: "anything",
      intent: "search",
      entities: [],
      repoUrl: null,
      confidence: 0.5,
      primaryEntity: null,
    });
  });
});
