/**
 * Entity Resolver / Ranker
 *
 * Picks the entities a question is about. The candidate pool is fetched from
 * the graph deterministically; the relevance judgment is delegated to the
 * reasoning service, whose JSON answer is located between the outermost
 * brackets and validated. Neither a failed call nor an unusable answer is
 * raised: both come back as an empty, successful resolution with a message.
 * Every selected name is checked against the graph before its relationships
 * are fetched.
 *
 * @module
 */

import { z } from "zod";
import type { EntityRelationships, EntitySummary, IGraphStore } from "../interfaces/IGraphStore.js";
import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import { EntityNotFoundError, GraphError, RankingUnavailableError, errorMessage } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";
import {
  SINGLE_BEST_SYSTEM_PROMPT,
  TOP_K_SYSTEM_PROMPT,
  buildSingleBestPrompt,
  buildTopKPrompt,
} from "./prompts.js";

const logger = createLogger("entity-resolver");

export const MESSAGES = {
  noEntities: "No entities found in graph database",
  notIdentified: "LLM could not identify relevant entities for this query",
  unparseable: "Could not parse LLM response",
  rankingUnavailable: "Ranking service unavailable",
  inventoryUnavailable: "Could not read entities from graph database",
  notFound: "Entity not found in graph database",
  isolated: "No relationships found - entity may be isolated",
} as const;

const SUGGESTION_LIMIT = 5;

// =============================================================================
// Types
// =============================================================================

const CandidateSchema = z.object({
  entity_name: z.string().min(1),
  entity_type: z.string().catch("Unknown"),
  confidence: z.coerce.number().catch(0),
  reason: z.string().catch(""),
});

type RawCandidate = z.infer<typeof CandidateSchema>;

/**
 * One entity picked by the reasoning service. Confidence is advisory: it is
 * reported, never used to reject a pick.
 */
export interface RankedCandidate {
  entityName: string;
  entityType: string;
  confidence: number;
  reason: string;
}

export interface ResolvedEntity extends RankedCandidate {
  /** Whether the name exists in the graph */
  found: boolean;
  relationships: EntityRelationships | null;
  /** Not-found, isolated or graph-failure note */
  note: string | null;
}

export interface Resolution {
  query: string;
  /** Size of the candidate pool shown to the ranker */
  inventorySize: number;
  entities: ResolvedEntity[];
  totalRelationships: number;
  /** Why the list is empty, when it is */
  message: string | null;
  /** Set when the inventory read or the reasoning call failed */
  error: RankingUnavailableError | GraphError | null;
}

export interface EntityResolverOptions {
  store: IGraphStore;
  /** Without one, ranking reports the service unavailable; lookups still work */
  llm?: ILLMService | null;
  /** Candidate pool size (default: 200) */
  inventoryLimit?: number;
}

type ParsedRanking =
  | { ok: true; candidates: RankedCandidate[] }
  | { ok: false; message: string };

// =============================================================================
// Parsing
// =============================================================================

/**
 * Text from the first `open` to the last `close`, inclusive, or null.
 */
export function extractBracketed(text: string, open: "{" | "[", close: "}" | "]"): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start >= 0 && end > start ? text.slice(start, end + 1) : null;
}

function toCandidate(raw: RawCandidate): RankedCandidate {
  return {
    entityName: raw.entity_name,
    entityType: raw.entity_type,
    confidence: raw.confidence,
    reason: raw.reason,
  };
}

function parseJson(payload: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(payload) };
  } catch {
    return { ok: false };
  }
}

export function parseSingleBest(response: string): ParsedRanking {
  const payload = extractBracketed(response, "{", "}");
  if (payload === null) return { ok: false, message: MESSAGES.notIdentified };

  const json = parseJson(payload);
  const parsed = json.ok ? CandidateSchema.safeParse(json.value) : null;
  if (!parsed?.success) return { ok: false, message: MESSAGES.unparseable };
  return { ok: true, candidates: [toCandidate(parsed.data)] };
}

export function parseTopK(response: string, k: number): ParsedRanking {
  const payload = extractBracketed(response, "[", "]");
  if (payload === null) return { ok: false, message: MESSAGES.notIdentified };

  const json = parseJson(payload);
  const parsed = json.ok ? z.array(CandidateSchema).safeParse(json.value) : null;
  if (!parsed?.success) return { ok: false, message: MESSAGES.unparseable };
  if (parsed.data.length === 0) return { ok: false, message: MESSAGES.notIdentified };
  return { ok: true, candidates: parsed.data.slice(0, k).map(toCandidate) };
}

// =============================================================================
// Entity Resolver
// =============================================================================

/**
 * @example
 * ```typescript
 * const resolver = new EntityResolver({ store, llm });
 * const resolution = await resolver.resolveTopK("how are routes registered?", 5);
 * for (const entity of resolution.entities) {
 *   console.log(entity.entityName, entity.relationships?.counts);
 * }
 * ```
 */
export class EntityResolver {
  private readonly inventoryLimit: number;

  constructor(private readonly options: EntityResolverOptions) {
    this.inventoryLimit = options.inventoryLimit ?? 200;
  }

  /**
   * Named entities ordered by type then name.
   */
  fetchInventory(): Promise<EntitySummary[]> {
    return this.options.store.listEntities(this.inventoryLimit);
  }

  async resolveBest(query: string): Promise<Resolution> {
    return this.resolve(query, (inventory) => ({
      systemPrompt: SINGLE_BEST_SYSTEM_PROMPT,
      userPrompt: buildSingleBestPrompt(query, inventory),
      maxTokens: 500,
      parse: parseSingleBest,
    }));
  }

  async resolveTopK(query: string, k: number): Promise<Resolution> {
    return this.resolve(query, (inventory) => ({
      systemPrompt: TOP_K_SYSTEM_PROMPT,
      userPrompt: buildTopKPrompt(query, inventory, k),
      maxTokens: 800,
      parse: (response: string) => parseTopK(response, k),
    }));
  }

  /**
   * Exact (case-insensitive) name lookup. A miss carries substring matches as
   * suggestions.
   */
  async lookupEntity(name: string): Promise<Result<EntitySummary, EntityNotFoundError>> {
    const matches = await this.options.store.findEntities(name, SUGGESTION_LIMIT + 1);
    const exact = matches.find((entity) => entity.name.toLowerCase() === name.toLowerCase());
    if (exact) return ok(exact);

    const suggestions = [...new Set(matches.map((entity) => entity.name))].slice(0, SUGGESTION_LIMIT);
    return err(new EntityNotFoundError(name, suggestions));
  }

  async expandRelationships(name: string): Promise<Result<EntityRelationships, EntityNotFoundError>> {
    const relationships = await this.options.store.getRelationships(name);
    return relationships ? ok(relationships) : err(new EntityNotFoundError(name));
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async resolve(
    query: string,
    build: (inventory: EntitySummary[]) => {
      systemPrompt: string;
      userPrompt: string;
      maxTokens: number;
      parse: (response: string) => ParsedRanking;
    }
  ): Promise<Resolution> {
    const empty = (message: string, error: Resolution["error"] = null, inventorySize = 0): Resolution => ({
      query,
      inventorySize,
      entities: [],
      totalRelationships: 0,
      message,
      error,
    });

    let inventory: EntitySummary[];
    try {
      inventory = await this.fetchInventory();
    } catch (error) {
      const cause = errorMessage(error);
      logger.warn({ error: cause }, "Inventory fetch failed");
      return empty(`${MESSAGES.inventoryUnavailable}: ${cause}`, new GraphError(cause));
    }

    if (inventory.length === 0) {
      logger.warn("No entities in graph, skipping ranking");
      return empty(MESSAGES.noEntities);
    }

    const llm = this.options.llm;
    if (!llm) {
      return empty(
        MESSAGES.rankingUnavailable,
        new RankingUnavailableError("No reasoning endpoint configured"),
        inventory.length
      );
    }

    const request = build(inventory);
    let response: string;
    try {
      response = await llm.complete(request.systemPrompt, request.userPrompt, {
        maxTokens: request.maxTokens,
        temperature: 0.3,
      });
    } catch (error) {
      const cause = errorMessage(error);
      logger.warn({ error: cause }, "Ranking call failed");
      return empty(`${MESSAGES.rankingUnavailable}: ${cause}`, new RankingUnavailableError(cause), inventory.length);
    }

    const ranking = request.parse(response);
    if (!ranking.ok) {
      logger.warn({ preview: response.slice(0, 200), message: ranking.message }, "Ranking response unusable");
      return empty(ranking.message, null, inventory.length);
    }

    const entities: ResolvedEntity[] = [];
    const seen = new Set<string>();
    for (const candidate of ranking.candidates) {
      const key = candidate.entityName.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      entities.push(await this.verify(candidate));
    }

    const totalRelationships = entities.reduce((sum, entity) => {
      const counts = entity.relationships?.counts;
      return sum + (counts ? counts.dependents + counts.dependencies + counts.parents : 0);
    }, 0);

    logger.info({ selected: entities.length, found: entities.filter((e) => e.found).length }, "Entities resolved");
    return { query, inventorySize: inventory.length, entities, totalRelationships, message: null, error: null };
  }

  /**
   * A pick counts as found only once the graph confirms it. When the check
   * itself fails the pick stays unverified.
   */
  private async verify(candidate: RankedCandidate): Promise<ResolvedEntity> {
    let exists: boolean;
    try {
      exists = await this.options.store.entityExists(candidate.entityName);
    } catch (error) {
      logger.warn({ entity: candidate.entityName, error: errorMessage(error) }, "Existence check failed");
      return { ...candidate, found: false, relationships: null, note: errorMessage(error) };
    }
    if (!exists) {
      logger.debug({ entity: candidate.entityName }, "Selected entity not in graph");
      return { ...candidate, found: false, relationships: null, note: MESSAGES.notFound };
    }

    try {
      const relationships = await this.options.store.getRelationships(candidate.entityName);
      const counts = relationships?.counts;
      const isolated = !counts || counts.dependents + counts.dependencies + counts.parents === 0;
      return { ...candidate, found: true, relationships, note: isolated ? MESSAGES.isolated : null };
    } catch (error) {
      logger.warn({ entity: candidate.entityName, error: errorMessage(error) }, "Relationship fetch failed");
      return { ...candidate, found: true, relationships: null, note: errorMessage(error) };
    }
  }
}

export function createEntityResolver(options: EntityResolverOptions): EntityResolver {
  return new EntityResolver(options);
}
