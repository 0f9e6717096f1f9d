/**
 * Indexer Module
 *
 * Repository sources, file analysis and the indexing run coordinator.
 *
 * @module
 */

export type { IRepositorySource, SourceFile } from "../interfaces/IRepositorySource.js";

export {
  LocalRepositorySource,
  GitRepositorySource,
  createRepositorySource,
  isRemoteReference,
  isTestFile,
  repositoryNameFromUrl,
  SKIPPED_DIRECTORIES,
} from "./repository-source.js";

export {
  RepositoryAnalyzer,
  type AnalysisError,
  type AnalysisPhase,
  type RepositoryAnalysis,
  type RepositoryAnalyzerOptions,
} from "./repository-analyzer.js";

export {
  IndexerCoordinator,
  createIndexerCoordinator,
  type RunState,
  type IndexingPhase,
  type IndexingProgressEvent,
  type IndexingError,
  type IndexingRunResult,
  type IndexerCoordinatorOptions,
} from "./coordinator.js";
