/**
 * Call Extractor
 *
 * Collects the callees invoked directly inside a Python function body.
 * This is a syntactic collection, not a resolved call graph.
 *
 * @module
 */

import type { CallReference } from "../extraction/types.js";
import { walk, type SyntaxNode } from "./syntax-nodes.js";

/**
 * Nodes that open a new scope; calls inside them belong to that scope.
 */
const SCOPE_NODES = new Set(["function_definition", "class_definition", "decorated_definition"]);

/**
 * Extracts call references from function bodies.
 *
 * @example
 * ```typescript
 * const extractor = new CallExtractor();
 * const body = functionNode.childForFieldName("body");
 * const calls = extractor.extractFromBody(body);
 * // [{ kind: "function", name: "helper" }, { kind: "method", object: "self.repo", name: "save" }]
 * ```
 */
export class CallExtractor {
  /**
   * Returns the distinct callees of a body in first-seen order.
   */
  extractFromBody(body: SyntaxNode | null): CallReference[] {
    if (!body) return [];

    const calls: CallReference[] = [];
    const seen = new Set<string>();

    walk(body, (node) => {
      if (node !== body && SCOPE_NODES.has(node.type)) {
        return false;
      }
      if (node.type === "call") {
        const reference = this.toReference(node);
        if (reference) {
          const key = reference.kind === "method" ? `${reference.object}.${reference.name}` : reference.name;
          if (!seen.has(key)) {
            seen.add(key);
            calls.push(reference);
          }
        }
      }
      return true;
    });

    return calls;
  }

  private toReference(callNode: SyntaxNode): CallReference | null {
    const callee = callNode.childForFieldName("function");
    if (!callee) return null;

    if (callee.type === "identifier") {
      return { kind: "function", name: callee.text };
    }

    if (callee.type === "attribute") {
      const object = callee.childForFieldName("object");
      const attribute = callee.childForFieldName("attribute");
      if (!object || !attribute) return null;
      return { kind: "method", object: object.text, name: attribute.text };
    }

    // Calls on subscripts, call results or literals have no stable name
    return null;
  }
}

export function createCallExtractor(): CallExtractor {
  return new CallExtractor();
}
