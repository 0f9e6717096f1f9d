/**
 * Graph Upsert Engine
 *
 * Materializes analyzed files in the graph:
 * 1. the package hierarchy derived from file locations,
 * 2. File nodes and Package→File containment,
 * 3. entity nodes kind by kind with File→Entity DEFINES and Class→Method HAS_METHOD,
 * 4. inferred relationships, resolving name-only endpoints.
 *
 * Every write is isolated: a failure is logged and counted, never retried or
 * rolled back.
 *
 * @module
 */

import type { AnalyzedFile, Entity, EntityKind, EntityRef, RelationshipKind } from "../extraction/types.js";
import { packagePrefixes, parentPackage } from "../extraction/id-generator.js";
import type { GraphEndpoint, IGraphStore, NodeKey, NodeProperties, PropertyValue } from "../interfaces/IGraphStore.js";
import { RelationshipWriteError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { UpsertRunContext } from "./run-context.js";

const logger = createLogger("graph-upsert-engine");

// =============================================================================
// Types
// =============================================================================

export interface UpsertStats {
  filesProcessed: number;
  packagesCreated: number;
  /** Entity nodes written (created or matched) */
  entitiesCreated: number;
  /** Edges written (created or matched) */
  relationshipsCreated: number;
  /** Edges skipped because an endpoint did not exist */
  relationshipsUnresolved: number;
  /** Node or edge writes that threw */
  writeFailures: number;
}

/**
 * Node write order. Parameters, return types and docstrings come after their owners.
 */
const ENTITY_ORDER: readonly EntityKind[] = ["Class", "Function", "Method", "Parameter", "ReturnType", "Docstring"];

// =============================================================================
// Keys and Properties
// =============================================================================

/**
 * Identity properties of an entity node.
 */
export function nodeKeyFor(entity: Pick<Entity, "kind" | "name" | "qualifiedModule" | "parentClass">): NodeKey {
  if (entity.kind === "File" || entity.kind === "Package") {
    return { name: entity.name };
  }
  return entity.parentClass
    ? { name: entity.name, module: entity.qualifiedModule, parentClass: entity.parentClass }
    : { name: entity.name, module: entity.qualifiedModule };
}

/**
 * Identity properties of a relationship endpoint; name only when the module is unknown.
 */
export function nodeKeyForRef(ref: EntityRef): NodeKey {
  if (ref.module === null) return { name: ref.name };
  return nodeKeyFor({ kind: ref.kind, name: ref.name, qualifiedModule: ref.module, parentClass: ref.parentClass });
}

function nodeProperties(entity: Entity): NodeProperties {
  const candidates: Record<string, PropertyValue> = {
    filePath: entity.filePath,
    packagePath: entity.packagePath,
    lineNumber: entity.lineNumber,
    docstring: entity.docstring,
    returnType: entity.returnType,
    owner: entity.owner,
    content: entity.content,
  };
  if (entity.kind === "Class") {
    candidates.bases = entity.bases;
    candidates.decorators = entity.decorators;
  }
  if (entity.kind === "Function" || entity.kind === "Method") {
    candidates.parameters = entity.parameters;
    candidates.decorators = entity.decorators;
    candidates.isAsync = entity.isAsync;
  }

  const properties: Record<string, PropertyValue> = {};
  for (const [field, value] of Object.entries(candidates)) {
    if (value !== null) properties[field] = value;
  }
  return properties;
}

// =============================================================================
// Graph Upsert Engine
// =============================================================================

/**
 * @example
 * ```typescript
 * const engine = new GraphUpsertEngine(store);
 * const stats = await engine.upsert(analyzedFiles);
 * console.log(`${stats.entitiesCreated} entities, ${stats.relationshipsUnresolved} unresolved`);
 * ```
 */
export class GraphUpsertEngine {
  constructor(private readonly store: IGraphStore) {}

  async upsert(files: readonly AnalyzedFile[], context: UpsertRunContext = new UpsertRunContext()): Promise<UpsertStats> {
    const stats: UpsertStats = {
      filesProcessed: 0,
      packagesCreated: 0,
      entitiesCreated: 0,
      relationshipsCreated: 0,
      relationshipsUnresolved: 0,
      writeFailures: 0,
    };

    await this.writePackages(files, stats);

    for (const file of files) {
      await this.writeFile(file, stats);
    }

    for (const kind of ENTITY_ORDER) {
      for (const file of files) {
        for (const entity of file.entities) {
          if (entity.kind !== kind) continue;
          if (kind === "Function") context.recordFunction(entity.name);
          await this.writeEntity(file, entity, stats);
        }
      }
    }

    for (const file of files) {
      for (const relationship of file.relationships) {
        await this.writeEdge(
          this.endpoint(relationship.source, context),
          this.endpoint(relationship.target, context),
          relationship.kind,
          stats
        );
      }
      stats.filesProcessed++;
    }

    logger.info({ runId: context.runId, ...stats }, "Graph upsert complete");
    return stats;
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private async writePackages(files: readonly AnalyzedFile[], stats: UpsertStats): Promise<void> {
    const packages = new Set<string>();
    for (const file of files) {
      for (const prefix of packagePrefixes(file.packagePath)) packages.add(prefix);
      for (const entity of file.entities) {
        for (const prefix of packagePrefixes(entity.packagePath)) packages.add(prefix);
      }
    }

    const ordered = [...packages].sort();
    for (const name of ordered) {
      if (await this.writeNode("Package", { name }, {})) stats.packagesCreated++;
      else stats.writeFailures++;
    }

    for (const name of ordered) {
      const parent = parentPackage(name);
      if (parent !== null && packages.has(parent)) {
        await this.writeEdge(
          { kind: "Package", key: { name: parent } },
          { kind: "Package", key: { name } },
          "CONTAINS",
          stats
        );
      }
    }
  }

  private async writeFile(file: AnalyzedFile, stats: UpsertStats): Promise<void> {
    const fileEntity = file.entities.find((entity) => entity.kind === "File");
    const properties: Record<string, PropertyValue> = {
      path: file.filePath,
      filePath: file.filePath,
      module: file.qualifiedModule,
      packagePath: file.packagePath,
    };
    if (fileEntity?.docstring) properties.docstring = fileEntity.docstring;

    if (!(await this.writeNode("File", { name: file.qualifiedModule }, properties))) {
      stats.writeFailures++;
      return;
    }
    stats.entitiesCreated++;

    if (file.packagePath) {
      await this.writeEdge(
        { kind: "Package", key: { name: file.packagePath } },
        { kind: "File", key: { name: file.qualifiedModule } },
        "CONTAINS",
        stats
      );
    }
  }

  private async writeEntity(file: AnalyzedFile, entity: Entity, stats: UpsertStats): Promise<void> {
    const key = nodeKeyFor(entity);
    if (!(await this.writeNode(entity.kind, key, nodeProperties(entity)))) {
      stats.writeFailures++;
      return;
    }
    stats.entitiesCreated++;

    const self: GraphEndpoint = { kind: entity.kind, key };
    if (entity.kind === "Class" || entity.kind === "Function" || entity.kind === "Method") {
      await this.writeEdge({ kind: "File", key: { name: file.qualifiedModule } }, self, "DEFINES", stats);
    }
    if (entity.kind === "Method" && entity.parentClass) {
      const owner = file.entities.find((candidate) => candidate.kind === "Class" && candidate.name === entity.parentClass);
      if (owner) {
        await this.writeEdge({ kind: "Class", key: nodeKeyFor(owner) }, self, "HAS_METHOD", stats);
      }
    }
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  private endpoint(ref: EntityRef, context: UpsertRunContext): GraphEndpoint {
    const kind = ref.module === null ? context.labelFor(ref.name, ref.kind) : ref.kind;
    return { kind, key: nodeKeyForRef(ref) };
  }

  private async writeNode(kind: EntityKind, key: NodeKey, properties: NodeProperties): Promise<boolean> {
    try {
      await this.store.upsertNode(kind, key, properties);
      return true;
    } catch (error) {
      logger.warn({ err: error, kind, key }, "Node write failed");
      return false;
    }
  }

  private async writeEdge(
    source: GraphEndpoint,
    target: GraphEndpoint,
    kind: RelationshipKind,
    stats: UpsertStats
  ): Promise<void> {
    try {
      const matched = await this.store.upsertEdge(source, target, kind);
      if (matched > 0) {
        stats.relationshipsCreated++;
      } else {
        stats.relationshipsUnresolved++;
        logger.debug({ kind, source: source.key, target: target.key }, "Relationship endpoint not found");
      }
    } catch (error) {
      stats.writeFailures++;
      const failure = new RelationshipWriteError(
        `${source.key.name ?? "?"} -[${kind}]-> ${target.key.name ?? "?"}`,
        errorMessage(error)
      );
      logger.warn({ err: failure }, failure.message);
    }
  }
}

export function createGraphUpsertEngine(store: IGraphStore): GraphUpsertEngine {
  return new GraphUpsertEngine(store);
}
