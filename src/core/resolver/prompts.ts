/**
 * Ranking prompts
 *
 * @module
 */

import type { EntitySummary } from "../interfaces/IGraphStore.js";

/** Entities listed in the single-best prompt */
export const SINGLE_BEST_LISTED = 30;

export const SINGLE_BEST_SYSTEM_PROMPT =
  "You are an expert at finding the most relevant code entity for a user query. Always return valid JSON.";

export const TOP_K_SYSTEM_PROMPT =
  "You are an expert at finding the most relevant code entities for a user query. Return ONLY valid JSON array, no extra text.";

const SINGLE_BEST_PROMPT = `Given the user query and list of available entities, find the BEST matching entity.

User Query: "{query}"

{entities}

Return ONLY a JSON object with:
{
    "entity_name": "exact name from list",
    "entity_type": "Class/Function/Method/Package/File",
    "confidence": 0.0-1.0,
    "reason": "why this is the best match"
}

If no good match exists, return the closest semantic match or related entity.`;

const TOP_K_PROMPT = `You are an expert at finding relevant code entities in a Python codebase.

User Query: "{query}"

Below is the COMPLETE list of all entities in the codebase. Your job is to find the TOP {k} entities that match this query.

{entities}

INSTRUCTIONS:
1. Search for entities that DIRECTLY match the query keywords
2. Look for exact name matches, substring matches, or semantically related entities
3. Return the TOP {k} most relevant entities (or fewer if not found)
4. Rank by relevance to the query (highest confidence first)
5. For each entity, explain WHY it matches the query

CRITICAL RULES:
- Return ONLY a valid JSON array. No markdown, no preamble, no explanation.
- If you find fewer than {k} entities, return just those.
- If you find NO entities, return an empty array: []

JSON Format:
[
  {"entity_name": "Router", "entity_type": "Class", "confidence": 0.95, "reason": "Exactly matches query keyword"},
  {"entity_name": "add_route", "entity_type": "Method", "confidence": 0.75, "reason": "Registers the routes the query asks about"}
]

Requirements:
- entity_name: MUST exist in the list above
- entity_type: the type shown in the list
- confidence: Float between 0.0 and 1.0
- reason: Brief explanation of relevance`;

/**
 * Numbered list of the first entities: `1. name (Type: Class, Module: pkg)`.
 */
export function formatNumberedInventory(entities: readonly EntitySummary[]): string {
  const lines = entities
    .slice(0, SINGLE_BEST_LISTED)
    .map((entity, i) => `${i + 1}. ${entity.name} (Type: ${entity.type}, Module: ${entity.module ?? "N/A"})`);
  return `Available entities:\n${lines.join("\n")}`;
}

function plural(type: string): string {
  return type.endsWith("s") ? `${type}es` : `${type}s`;
}

/**
 * Names grouped by type in first-seen type order, sorted within each group.
 */
export function formatGroupedInventory(entities: readonly EntitySummary[]): string {
  const groups = new Map<string, string[]>();
  for (const entity of entities) {
    const names = groups.get(entity.type) ?? [];
    names.push(entity.name);
    groups.set(entity.type, names);
  }

  let text = "Available entities in codebase:\n\n";
  for (const [type, names] of groups) {
    text += `${plural(type)} (${names.length}):\n`;
    for (const name of [...names].sort()) {
      text += `  - ${name}\n`;
    }
    text += "\n";
  }
  return text;
}

export function buildSingleBestPrompt(query: string, entities: readonly EntitySummary[]): string {
  return SINGLE_BEST_PROMPT.replace("{query}", () => query).replace("{entities}", () => formatNumberedInventory(entities));
}

export function buildTopKPrompt(query: string, entities: readonly EntitySummary[], k: number): string {
  return TOP_K_PROMPT.replaceAll("{k}", String(k))
    .replace("{query}", () => query)
    .replace("{entities}", () => formatGroupedInventory(entities));
}
