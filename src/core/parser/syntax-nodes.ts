/**
 * Syntax Node Helpers
 *
 * Small accessors over Tree-sitter nodes shared by the call extractor and
 * the entity extractor.
 *
 * @module
 */

import type { Node } from "web-tree-sitter";

export type SyntaxNode = Node;

/**
 * All children, without the null slots the runtime may report.
 */
export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (const child of node.children) {
    if (child) result.push(child);
  }
  return result;
}

/**
 * Named children only (skips punctuation and keywords).
 */
export function namedChildrenOf(node: SyntaxNode): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (const child of node.namedChildren) {
    if (child) result.push(child);
  }
  return result;
}

/**
 * 1-based line where the node starts.
 */
export function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/**
 * Depth-first pre-order walk. Returning false from the visitor skips the subtree.
 */
export function walk(node: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
  if (visit(node) === false) return;
  for (const child of childrenOf(node)) {
    walk(child, visit);
  }
}

/**
 * First ERROR or MISSING node in document order, if any.
 */
export function findFirstError(node: SyntaxNode): SyntaxNode | null {
  if (node.type === "ERROR" || node.isMissing) return node;
  if (!node.hasError) return null;
  for (const child of childrenOf(node)) {
    const found = findFirstError(child);
    if (found) return found;
  }
  return null;
}

const STRING_PREFIX = /^[rRuUbBfF]{0,2}/;

/**
 * Literal body of a Python string node, without prefix and quotes.
 */
export function stringLiteralValue(text: string): string {
  const unprefixed = text.replace(STRING_PREFIX, "");
  for (const quote of ['"""', "'''", '"', "'"]) {
    if (unprefixed.startsWith(quote) && unprefixed.endsWith(quote) && unprefixed.length >= quote.length * 2) {
      return unprefixed.slice(quote.length, unprefixed.length - quote.length);
    }
  }
  return unprefixed;
}

/**
 * Normalizes docstring indentation: the first line is trimmed, the common
 * leading whitespace of the remaining lines is removed, and blank lines at
 * either end are dropped.
 */
export function cleanDocstring(raw: string): string {
  const lines = raw.replace(/\t/g, "        ").split("\n");
  const first = (lines[0] ?? "").trim();
  const rest = lines.slice(1);

  let margin = Number.POSITIVE_INFINITY;
  for (const line of rest) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const dedented = rest.map((line) =>
    Number.isFinite(margin) ? line.slice(margin).trimEnd() : line.trimEnd()
  );
  const all = [first, ...dedented];

  while (all.length > 0 && all[0] === "") all.shift();
  while (all.length > 0 && all[all.length - 1] === "") all.pop();
  return all.join("\n");
}

/**
 * Docstring of a module, class or function body: the first statement when it
 * is a bare string expression.
 */
export function docstringOf(body: SyntaxNode | null): string | null {
  if (!body) return null;
  const first = namedChildrenOf(body).find((child) => child.type !== "comment");
  if (!first || first.type !== "expression_statement") return null;

  const expression = namedChildrenOf(first)[0];
  if (!expression || expression.type !== "string") return null;

  return cleanDocstring(stringLiteralValue(expression.text));
}
