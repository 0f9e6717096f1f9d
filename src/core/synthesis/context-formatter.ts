/**
 * Context formatting
 *
 * Renders a RetrievalContext as one text block: graph relationships first,
 * then code chunks, then prior turns. An empty context renders as "".
 *
 * @module
 */

import type { RelatedEntity } from "../interfaces/IGraphStore.js";
import type { ResolvedEntity } from "../resolver/entity-resolver.js";
import type { RetrievalContext } from "../retrieval/types.js";

/** Related entities listed per direction */
const RELATED_LISTED = 10;
/** Characters of chunk preview included */
const PREVIEW_CHARS = 300;

export function isEmptyContext(context: Pick<RetrievalContext, "entities" | "chunks" | "memory">): boolean {
  return context.entities.length === 0 && context.chunks.length === 0 && context.memory.length === 0;
}

function formatRelated(label: string, related: readonly RelatedEntity[], count: number): string {
  if (count === 0) return `   ${label} (0): none`;
  const listed = related.slice(0, RELATED_LISTED).map((entity) => `${entity.name} [${entity.relationship}]`);
  const more = count > listed.length ? `, +${count - listed.length} more` : "";
  return `   ${label} (${count}): ${listed.join(", ")}${more}`;
}

function formatEntity(entity: ResolvedEntity, index: number): string[] {
  const relationships = entity.relationships;
  const module = relationships?.entity.module;
  const lines = [`${index}. ${entity.entityType}: ${entity.entityName}${module ? ` (module ${module})` : ""}`];

  if (relationships) {
    const { counts } = relationships;
    lines.push(formatRelated("Dependents", relationships.dependents, counts.dependents));
    lines.push(formatRelated("Dependencies", relationships.dependencies, counts.dependencies));
    lines.push(formatRelated("Parents", relationships.parents, counts.parents));
    if (relationships.entity.filePath) {
      const line = relationships.entity.lineNumber !== null ? `:${relationships.entity.lineNumber}` : "";
      lines.push(`   Location: ${relationships.entity.filePath}${line}`);
    }
    if (relationships.entity.docstring) {
      lines.push(`   Documentation: ${relationships.entity.docstring.slice(0, 200)}`);
    }
  }
  if (entity.reason) lines.push(`   Why relevant: ${entity.reason}`);
  if (entity.note) lines.push(`   Note: ${entity.note}`);
  return lines;
}

export function formatContext(context: RetrievalContext): string {
  const sections: string[] = [];

  if (context.entities.length > 0) {
    const lines = ["CODE RELATIONSHIPS (graph):", ""];
    context.entities.forEach((entity, i) => lines.push(...formatEntity(entity, i + 1)));
    sections.push(lines.join("\n"));
  }

  if (context.chunks.length > 0) {
    const lines = ["CODE CHUNKS (semantic search):", ""];
    context.chunks.forEach((chunk, i) => {
      lines.push(`${i + 1}. File: ${chunk.filePath}`);
      lines.push(`   Lines: ${chunk.lineRange}`);
      lines.push(`   Relevance: ${(chunk.score * 100).toFixed(1)}%`);
      lines.push(`   Preview: ${chunk.contentPreview.slice(0, PREVIEW_CHARS)}`);
    });
    sections.push(lines.join("\n"));
  }

  if (context.memory.length > 0) {
    const lines = ["CONVERSATION MEMORY:", ""];
    for (const turn of context.memory) {
      lines.push(`[${turn.role}] ${turn.content}`);
    }
    sections.push(lines.join("\n"));
  }

  return sections.join("\n\n");
}
