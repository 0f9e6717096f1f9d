/**
 * Extraction Types
 *
 * Entities and relationships produced from a single Python source file,
 * before they are materialized in the graph.
 *
 * @module
 */

// =============================================================================
// Entity Kinds
// =============================================================================

export const ENTITY_KINDS = [
  "Package",
  "File",
  "Class",
  "Function",
  "Method",
  "Parameter",
  "ReturnType",
  "Docstring",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

/** Entity kinds that own a body and can call, decorate or document */
export type CallableKind = "Function" | "Method";

export const RELATIONSHIP_KINDS = [
  "CONTAINS",
  "IMPORTS",
  "INHERITS_FROM",
  "CALLS",
  "DECORATED_BY",
  "HAS_METHOD",
  "HAS_PARAM",
  "RETURNS",
  "DEFINES",
  "DOCUMENTED_BY",
] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value);
}

export function isRelationshipKind(value: string): value is RelationshipKind {
  return RELATIONSHIP_KINDS.some((kind) => kind === value);
}

// =============================================================================
// Call References
// =============================================================================

/**
 * A callee collected syntactically from a function body.
 * `helper()` is a function call; `self.repo.save()` is a method call on `self.repo`.
 */
export type CallReference =
  | { kind: "function"; name: string }
  | { kind: "method"; object: string; name: string };

// =============================================================================
// Entity
// =============================================================================

/**
 * One extracted code construct. Immutable once created.
 *
 * Identity is (name, qualifiedModule, kind), with the owning class added for
 * methods so that `A.save` and `B.save` in one module stay distinct; see `entityKey`.
 */
export interface Entity {
  readonly kind: EntityKind;
  readonly name: string;
  /** Dotted module path, e.g. "pkg.sub" for pkg/sub.py */
  readonly qualifiedModule: string;
  /** Dotted directory path, "" for files at the repository root */
  readonly packagePath: string;
  /** Repository-relative path with forward slashes */
  readonly filePath: string;
  /** 1-based line of the construct */
  readonly lineNumber: number;
  readonly docstring: string | null;
  /** Unparsed decorator source text, in source order */
  readonly decorators: readonly string[];
  /** Base class expressions (Class only) */
  readonly bases: readonly string[];
  /** Parameter names (Function/Method only) */
  readonly parameters: readonly string[];
  readonly isAsync: boolean;
  /** Owning class name (Method only) */
  readonly parentClass: string | null;
  /** Return annotation source text (Function/Method only) */
  readonly returnType: string | null;
  /** Directly invoked callees (Function/Method only) */
  readonly calls: readonly CallReference[];
  /** Name of the entity this one belongs to (Parameter, ReturnType, Docstring) */
  readonly owner: string | null;
  /** Docstring body (Docstring only) */
  readonly content: string | null;
}

// =============================================================================
// Relationship
// =============================================================================

/**
 * One endpoint of a relationship. Module is known for entities of the current
 * file and unknown for targets resolved by name at upsert time.
 */
export interface EntityRef {
  readonly name: string;
  readonly kind: EntityKind;
  readonly module: string | null;
  /** Owning class, which disambiguates methods of the same name in one module */
  readonly parentClass: string | null;
}

/**
 * Directed typed edge between two entity identities.
 */
export interface Relationship {
  readonly kind: RelationshipKind;
  readonly source: EntityRef;
  readonly target: EntityRef;
}

// =============================================================================
// Per-file Results
// =============================================================================

/**
 * Everything the extractor produces for one file.
 */
export interface FileExtraction {
  filePath: string;
  qualifiedModule: string;
  packagePath: string;
  entities: Entity[];
  /** Imported module names, e.g. "os.path" or ".models" */
  imports: string[];
}

/**
 * A file that passed extraction and inference.
 */
export interface AnalyzedFile extends FileExtraction {
  relationships: Relationship[];
}
