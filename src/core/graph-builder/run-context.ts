/**
 * Upsert Run Context
 *
 * State scoped to one indexing run. Relationship targets resolved by name do
 * not say whether a callable is a module function or a method, so the run
 * remembers which names it wrote as Function nodes.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import type { EntityKind } from "../extraction/types.js";

export class UpsertRunContext {
  readonly runId: string;
  private readonly functionNames = new Set<string>();

  constructor(runId: string = randomUUID()) {
    this.runId = runId;
  }

  recordFunction(name: string): void {
    this.functionNames.add(name);
  }

  /**
   * Label for an endpoint known only by name. Callables become "Function"
   * when this run wrote a Function of that name, else "Method".
   */
  labelFor(name: string, kind: EntityKind): EntityKind {
    if (kind !== "Function" && kind !== "Method") return kind;
    return this.functionNames.has(name) ? "Function" : "Method";
  }
}
