/**
 * Relationship Inferencer
 *
 * Derives typed edges from the entities of one file, its imports and its raw text.
 * Structural edges (HAS_METHOD, HAS_PARAM, RETURNS, DOCUMENTED_BY) are exact.
 * INHERITS_FROM and DECORATED_BY point at names resolved later by the graph.
 * IMPORTS and CALLS are textual heuristics and over-approximate.
 *
 * Sources are always entities of the current file. No deduplication happens
 * here; the graph merges edges on (source, kind, target).
 *
 * @module
 */

import { lastSegment, refByName, refOf } from "./id-generator.js";
import type { AnalyzedFile, Entity, EntityRef, FileExtraction, Relationship } from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

function isCallable(entity: Entity): boolean {
  return entity.kind === "Function" || entity.kind === "Method";
}

/**
 * Owner label used by Parameter, ReturnType and Docstring entities.
 */
function ownerLabel(entity: Entity): string {
  if (entity.kind === "File") return entity.qualifiedModule;
  return entity.parentClass && isCallable(entity) ? `${entity.parentClass}.${entity.name}` : entity.name;
}

function docstringName(entity: Entity): string {
  return entity.kind === "File"
    ? `${entity.filePath}::docstring`
    : `${entity.filePath}::${ownerLabel(entity)}::docstring`;
}

/**
 * Innermost identifier of a decorator expression:
 * `app.route("/x")` → `route`, `functools.lru_cache` → `lru_cache`.
 */
export function decoratorTarget(decorator: string): string {
  const withoutCall = decorator.replace(/\(.*$/s, "").trim();
  return lastSegment(withoutCall);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// =============================================================================
// Relationship Inferencer
// =============================================================================

/**
 * @example
 * ```typescript
 * const inferencer = new RelationshipInferencer();
 * const relationships = inferencer.infer(extraction, sourceCode);
 * ```
 */
export class RelationshipInferencer {
  infer(extraction: FileExtraction, sourceCode: string): Relationship[] {
    const { entities, imports } = extraction;
    const relationships: Relationship[] = [];

    const byKindAndOwner = new Map<string, Entity[]>();
    const docstrings = new Map<string, Entity>();
    for (const entity of entities) {
      if (entity.kind === "Docstring") {
        docstrings.set(entity.name, entity);
      } else if ((entity.kind === "Parameter" || entity.kind === "ReturnType") && entity.owner !== null) {
        const key = `${entity.kind}:${entity.owner}`;
        const owned = byKindAndOwner.get(key) ?? [];
        owned.push(entity);
        byKindAndOwner.set(key, owned);
      }
    }

    const callables = entities.filter(isCallable);
    const callableNames = new Set(callables.map((e) => e.name));

    const add = (kind: Relationship["kind"], source: Entity, target: EntityRef): void => {
      relationships.push({ kind, source: refOf(source), target });
    };

    for (const entity of entities) {
      if (entity.kind === "Class") {
        for (const base of entity.bases) {
          add("INHERITS_FROM", entity, refByName(lastSegment(base), "Class"));
        }
        for (const method of callables) {
          if (method.kind === "Method" && method.parentClass === entity.name) {
            add("HAS_METHOD", entity, refOf(method));
          }
        }
      }

      if (entity.kind === "Class" || isCallable(entity)) {
        for (const decorator of entity.decorators) {
          const target = decoratorTarget(decorator);
          if (target) add("DECORATED_BY", entity, refByName(target, "Function"));
        }
      }

      if (isCallable(entity)) {
        const owner = ownerLabel(entity);
        for (const parameter of byKindAndOwner.get(`Parameter:${owner}`) ?? []) {
          add("HAS_PARAM", entity, refOf(parameter));
        }
        for (const returnType of byKindAndOwner.get(`ReturnType:${owner}`) ?? []) {
          add("RETURNS", entity, refOf(returnType));
        }
      }

      if (entity.kind === "File" || entity.kind === "Class" || isCallable(entity)) {
        const docstring = docstrings.get(docstringName(entity));
        if (docstring) add("DOCUMENTED_BY", entity, refOf(docstring));
      }

      if (entity.docstring) {
        for (const imported of imports) {
          const moduleName = imported.replace(/^\.+/, "");
          if (moduleName && entity.docstring.includes(lastSegment(moduleName))) {
            add("IMPORTS", entity, refByName(moduleName, "Package"));
          }
        }
      }
    }

    relationships.push(...this.inferCalls(callables, callableNames, sourceCode));
    return relationships;
  }

  /**
   * Textual CALLS: A → B for distinct local callables when `B(` occurs anywhere
   * in the file outside B's own `def` line, plus each callee collected from A's
   * body that is not local.
   */
  private inferCalls(callables: Entity[], localNames: Set<string>, sourceCode: string): Relationship[] {
    const result: Relationship[] = [];
    const mentioned = new Set(
      [...localNames].filter((name) => new RegExp(`(?<!def\\s+)\\b${escapeRegExp(name)}\\(`).test(sourceCode))
    );

    for (const caller of callables) {
      for (const callee of callables) {
        if (callee === caller || !mentioned.has(callee.name)) continue;
        result.push({ kind: "CALLS", source: refOf(caller), target: refOf(callee) });
      }

      const external = new Set<string>();
      for (const call of caller.calls) {
        if (localNames.has(call.name) || external.has(call.name)) continue;
        external.add(call.name);
        result.push({
          kind: "CALLS",
          source: refOf(caller),
          target: refByName(call.name, call.kind === "method" ? "Method" : "Function"),
        });
      }
    }
    return result;
  }

  /**
   * Extraction plus inferred relationships.
   */
  analyze(extraction: FileExtraction, sourceCode: string): AnalyzedFile {
    return { ...extraction, relationships: this.infer(extraction, sourceCode) };
  }
}

export function createRelationshipInferencer(): RelationshipInferencer {
  return new RelationshipInferencer();
}
