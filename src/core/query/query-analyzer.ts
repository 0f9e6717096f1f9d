/**
 * Query Analyzer
 *
 * Asks the reasoning service for the intent of a question and the entity
 * names it mentions. Any failure yields the default analysis.
 *
 * @module
 */

import { z } from "zod";
import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { extractBracketed } from "../resolver/entity-resolver.js";

const logger = createLogger("query-analyzer");

export const QUERY_INTENTS = ["search", "explain", "analyze", "index", "embed", "implement", "stats"] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

export interface QueryAnalysis {
  query: string;
  intent: QueryIntent;
  entities: string[];
  repoUrl: string | null;
  confidence: number;
  /** First mentioned entity, the one a direct lookup starts from */
  primaryEntity: string | null;
}

const ANALYSIS_SYSTEM_PROMPT = `Analyze the user query for a codebase analysis system.
Return JSON:
{
    "intent": "search|explain|analyze|index|embed|implement|stats",
    "entities": ["entity1", "entity2"],
    "repo_url": "url if indexing" or null,
    "confidence": 0.0-1.0
}`;

const AnalysisSchema = z.object({
  intent: z.enum(QUERY_INTENTS).catch("search"),
  entities: z.array(z.string()).catch([]),
  repo_url: z.string().nullable().catch(null),
  confidence: z.coerce.number().min(0).max(1).catch(0.5),
});

export function defaultAnalysis(query: string): QueryAnalysis {
  return { query, intent: "search", entities: [], repoUrl: null, confidence: 0.5, primaryEntity: null };
}

export function parseAnalysis(query: string, response: string): QueryAnalysis {
  const payload = extractBracketed(response, "{", "}");
  if (payload === null) return defaultAnalysis(query);

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return defaultAnalysis(query);
  }

  const parsed = AnalysisSchema.safeParse(json);
  if (!parsed.success) return defaultAnalysis(query);

  const entities = parsed.data.entities.map((name) => name.trim()).filter((name) => name.length > 0);
  return {
    query,
    intent: parsed.data.intent,
    entities,
    repoUrl: parsed.data.repo_url,
    confidence: parsed.data.confidence,
    primaryEntity: entities[0] ?? null,
  };
}

export class QueryAnalyzer {
  constructor(private readonly llm: ILLMService) {}

  async analyze(query: string): Promise<QueryAnalysis> {
    try {
      const response = await this.llm.complete(ANALYSIS_SYSTEM_PROMPT, query, { maxTokens: 200, temperature: 0.5 });
      const analysis = parseAnalysis(query, response);
      logger.debug({ intent: analysis.intent, entities: analysis.entities }, "Query analyzed");
      return analysis;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Query analysis failed, using default");
      return defaultAnalysis(query);
    }
  }
}
