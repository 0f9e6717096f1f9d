/**
 * Entity Extraction Module
 *
 * Pass 1: the entity extractor turns a syntax tree into ordered entities.
 * Pass 2: the relationship inferencer derives typed edges between them.
 *
 * @module
 */

// =============================================================================
// Types
// =============================================================================

export type {
  EntityKind,
  CallableKind,
  RelationshipKind,
  CallReference,
  Entity,
  EntityRef,
  Relationship,
  FileExtraction,
  AnalyzedFile,
} from "./types.js";

export { ENTITY_KINDS, RELATIONSHIP_KINDS, isEntityKind, isRelationshipKind } from "./types.js";

// =============================================================================
// Identity
// =============================================================================

export {
  entityKey,
  refOf,
  refByName,
  modulePathFor,
  packagePathFor,
  packagePrefixes,
  parentPackage,
  lastSegment,
} from "./id-generator.js";

// =============================================================================
// Extraction and Inference
// =============================================================================

export { EntityExtractor, createEntityExtractor } from "./entity-extractor.js";
export {
  RelationshipInferencer,
  createRelationshipInferencer,
  decoratorTarget,
} from "./relationship-inferencer.js";

// =============================================================================
// Dependency Analysis
// =============================================================================

export type { ImportGraph, DependencyDepth } from "./dependency-analysis.js";
export {
  resolveImport,
  buildImportGraph,
  findCircularDependencies,
  analyzeDependencyDepth,
} from "./dependency-analysis.js";
