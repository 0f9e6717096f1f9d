/**
 * Record Readers
 *
 * Narrowing helpers for rows coming back from the graph store. Neo4j returns
 * 64-bit integers as `Integer` objects unless told otherwise; both shapes are read.
 *
 * @module
 */

import neo4j from "neo4j-driver";
import { isEntityKind, isRelationshipKind, type EntityKind, type RelationshipKind } from "../extraction/types.js";
import type { EntitySummary, GraphRecord, RelatedEntity } from "../interfaces/IGraphStore.js";

export function readString(record: GraphRecord, field: string): string | null {
  const value = record[field];
  return typeof value === "string" ? value : null;
}

export function readNumber(record: GraphRecord, field: string): number | null {
  const value = record[field];
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (neo4j.isInt(value)) return value.toNumber();
  return null;
}

export function readKind(record: GraphRecord, field: string): EntityKind | null {
  const value = readString(record, field);
  return value !== null && isEntityKind(value) ? value : null;
}

export function readRelationshipKind(record: GraphRecord, field: string): RelationshipKind | null {
  const value = readString(record, field);
  return value !== null && isRelationshipKind(value) ? value : null;
}

/**
 * Reads `name, type, module, filePath, lineNumber, docstring` columns.
 */
export function toEntitySummary(record: GraphRecord): EntitySummary | null {
  const name = readString(record, "name");
  const type = readKind(record, "type");
  if (name === null || type === null) return null;
  return {
    name,
    type,
    module: readString(record, "module"),
    filePath: readString(record, "filePath"),
    lineNumber: readNumber(record, "lineNumber"),
    docstring: readString(record, "docstring"),
  };
}

/**
 * Reads `name, type, relationship` columns.
 */
export function toRelatedEntity(record: GraphRecord): RelatedEntity | null {
  const name = readString(record, "name");
  const type = readKind(record, "type");
  const relationship = readRelationshipKind(record, "relationship");
  if (name === null || type === null || relationship === null) return null;
  return { name, type, relationship };
}

export function compact<T>(values: ReadonlyArray<T | null>): T[] {
  return values.filter((value): value is T => value !== null);
}
