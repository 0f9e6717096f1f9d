/**
 * Indexer Coordinator
 *
 * Orchestrates one indexing run: Download → Scan → Parse → Extract → Write.
 * Tracks the run state (`pending → running → completed | failed`) and reports
 * progress. A run never throws: it ends `failed` when the repository yields no
 * parseable file or the graph cannot be written at all, with the cause in
 * `errors`.
 *
 * @module
 */

import type { IGraphStore, GraphStatistics } from "../interfaces/IGraphStore.js";
import type { IRepositorySource } from "../interfaces/IRepositorySource.js";
import type { ParserManager } from "../parser/parser-manager.js";
import { GraphUpsertEngine, type UpsertStats } from "../graph-builder/graph-upsert-engine.js";
import { UpsertRunContext } from "../graph-builder/run-context.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { RepositoryAnalyzer, type AnalysisError, type AnalysisPhase } from "./repository-analyzer.js";

const logger = createLogger("indexer-coordinator");

// =============================================================================
// Types
// =============================================================================

export type RunState = "pending" | "running" | "completed" | "failed";

/**
 * Indexing phases
 */
export type IndexingPhase = "downloading" | "parsing" | "writing" | "complete";

/**
 * Progress event for indexing
 */
export interface IndexingProgressEvent {
  state: RunState;
  phase: IndexingPhase;
  /** Current file being processed (if applicable) */
  currentFile?: string;
  processed: number;
  total: number;
  /** Overall percentage complete (0-100) */
  percentage: number;
  message: string;
}

export interface IndexingError extends Omit<AnalysisError, "phase"> {
  phase: AnalysisPhase | "writing";
}

/**
 * Result of an indexing run
 */
export interface IndexingRunResult extends UpsertStats {
  runId: string;
  state: RunState;
  repository: string;
  localPath: string | null;
  filesFound: number;
  /** Test files left out */
  filesSkipped: number;
  parsingErrors: number;
  errors: IndexingError[];
  /** Graph counts after the run, null when they could not be read */
  graphStatistics: GraphStatistics | null;
  durationMs: number;
}

/**
 * Options for IndexerCoordinator
 */
export interface IndexerCoordinatorOptions {
  source: IRepositorySource;
  store: IGraphStore;
  parser: ParserManager;
  /** Leave out test files (default: true) */
  skipTestFiles?: boolean;
  /** Wipe the graph before writing (default: false) */
  clearFirst?: boolean;
  onProgress?: (event: IndexingProgressEvent) => void;
  onError?: (error: IndexingError) => void;
}

const EMPTY_UPSERT: UpsertStats = {
  filesProcessed: 0,
  packagesCreated: 0,
  entitiesCreated: 0,
  relationshipsCreated: 0,
  relationshipsUnresolved: 0,
  writeFailures: 0,
};

// =============================================================================
// IndexerCoordinator Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const coordinator = new IndexerCoordinator({
 *   source: new LocalRepositorySource(config.repository),
 *   store,
 *   parser,
 *   onProgress: (event) => console.log(`${event.phase}: ${event.percentage}%`),
 * });
 *
 * const result = await coordinator.index("./my-project");
 * console.log(result.state, result.entitiesCreated);
 * ```
 */
export class IndexerCoordinator {
  private readonly engine: GraphUpsertEngine;
  private readonly analyzer: RepositoryAnalyzer;
  private runState: RunState = "pending";

  constructor(private readonly options: IndexerCoordinatorOptions) {
    this.engine = new GraphUpsertEngine(options.store);
    this.analyzer = new RepositoryAnalyzer({
      source: options.source,
      parser: options.parser,
      skipTestFiles: options.skipTestFiles,
      onFile: (file, index, total) => {
        this.emitProgress("parsing", index, total, Math.round((index / Math.max(total, 1)) * 80), `Parsing ${file.relativePath}`, file.relativePath);
      },
      onError: options.onError,
    });
  }

  get state(): RunState {
    return this.runState;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Indexes a repository reference (git URL or local path).
   */
  async index(reference: string): Promise<IndexingRunResult> {
    const startTime = Date.now();
    const context = new UpsertRunContext();

    this.runState = "pending";
    this.transition("running", "downloading", `Indexing ${reference}`);

    const analysis = await this.analyzer.analyze(reference);
    const errors: IndexingError[] = [...analysis.errors];
    const base = {
      runId: context.runId,
      repository: reference,
      localPath: analysis.localPath,
      filesFound: analysis.filesFound,
      filesSkipped: analysis.filesSkipped,
      parsingErrors: analysis.parsingErrors,
      errors,
    };

    if (analysis.files.length === 0) {
      this.transition("failed", "complete", "No parseable source files");
      logger.error({ repository: reference, found: analysis.filesFound }, "Indexing failed: no parseable source files");
      return {
        ...base,
        ...EMPTY_UPSERT,
        state: "failed",
        graphStatistics: await this.readStatistics(),
        durationMs: Date.now() - startTime,
      };
    }

    let upsert: UpsertStats;
    try {
      if (this.options.clearFirst) {
        await this.options.store.clearAll();
      }
      this.emitProgress("writing", 0, analysis.files.length, 85, "Writing graph...");
      upsert = await this.engine.upsert(analysis.files, context);
    } catch (error) {
      const failure: IndexingError = { filePath: "", phase: "writing", error: errorMessage(error), recoverable: false };
      errors.push(failure);
      this.options.onError?.(failure);
      this.transition("failed", "complete", "Graph write failed");
      logger.error({ repository: reference, error: failure.error }, "Indexing failed: graph write failed");
      return {
        ...base,
        ...EMPTY_UPSERT,
        state: "failed",
        graphStatistics: await this.readStatistics(),
        durationMs: Date.now() - startTime,
      };
    }

    this.transition("completed", "complete", "Indexing complete");
    const result: IndexingRunResult = {
      ...base,
      ...upsert,
      state: "completed",
      graphStatistics: await this.readStatistics(),
      durationMs: Date.now() - startTime,
    };

    logger.info(
      {
        runId: result.runId,
        files: result.filesProcessed,
        entities: result.entitiesCreated,
        relationships: result.relationshipsCreated,
        durationMs: result.durationMs,
      },
      "Indexing complete"
    );
    return result;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async readStatistics(): Promise<GraphStatistics | null> {
    try {
      return await this.options.store.getStatistics();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Could not read graph statistics");
      return null;
    }
  }

  private transition(state: RunState, phase: IndexingPhase, message: string): void {
    logger.debug({ from: this.runState, to: state }, "Run state changed");
    this.runState = state;
    this.emitProgress(phase, 0, 0, state === "running" ? 0 : 100, message);
  }

  private emitProgress(
    phase: IndexingPhase,
    processed: number,
    total: number,
    percentage: number,
    message: string,
    currentFile?: string
  ): void {
    this.options.onProgress?.({
      state: this.runState,
      phase,
      currentFile,
      processed,
      total,
      percentage,
      message,
    });
  }
}

export function createIndexerCoordinator(options: IndexerCoordinatorOptions): IndexerCoordinator {
  return new IndexerCoordinator(options);
}
