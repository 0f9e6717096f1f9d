/**
 * Repository Analyzer
 *
 * Download → scan → parse → extract → infer, without touching the graph.
 * A file that fails to parse is recorded and skipped; the others carry on.
 *
 * @module
 */

import type { IRepositorySource, SourceFile } from "../interfaces/IRepositorySource.js";
import type { AnalyzedFile } from "../extraction/types.js";
import { EntityExtractor } from "../extraction/entity-extractor.js";
import { RelationshipInferencer } from "../extraction/relationship-inferencer.js";
import type { ParserManager } from "../parser/parser-manager.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { isTestFile } from "./repository-source.js";

const logger = createLogger("repository-analyzer");

// =============================================================================
// Types
// =============================================================================

export type AnalysisPhase = "downloading" | "scanning" | "parsing";

/**
 * Error during analysis
 */
export interface AnalysisError {
  /** File that caused the error, "" for repository-level failures */
  filePath: string;
  phase: AnalysisPhase;
  error: string;
  /** Whether the rest of the run continued */
  recoverable: boolean;
}

export interface RepositoryAnalysis {
  /** Root directory the files were read from, null when the download failed */
  localPath: string | null;
  files: AnalyzedFile[];
  filesFound: number;
  /** Test files left out */
  filesSkipped: number;
  parsingErrors: number;
  errors: AnalysisError[];
}

export interface RepositoryAnalyzerOptions {
  source: IRepositorySource;
  parser: ParserManager;
  /** Leave out test files (default: true) */
  skipTestFiles?: boolean;
  /** Called before each file is parsed */
  onFile?: (file: SourceFile, index: number, total: number) => void;
  onError?: (error: AnalysisError) => void;
}

// =============================================================================
// Repository Analyzer
// =============================================================================

/**
 * @example
 * ```typescript
 * const analyzer = new RepositoryAnalyzer({ source, parser });
 * const analysis = await analyzer.analyze("./my-project");
 * console.log(`${analysis.files.length} files, ${analysis.parsingErrors} parse errors`);
 * ```
 */
export class RepositoryAnalyzer {
  private readonly extractor: EntityExtractor;
  private readonly inferencer = new RelationshipInferencer();
  private readonly skipTestFiles: boolean;

  constructor(private readonly options: RepositoryAnalyzerOptions) {
    this.extractor = new EntityExtractor(options.parser);
    this.skipTestFiles = options.skipTestFiles ?? true;
  }

  async analyze(reference: string): Promise<RepositoryAnalysis> {
    const analysis: RepositoryAnalysis = {
      localPath: null,
      files: [],
      filesFound: 0,
      filesSkipped: 0,
      parsingErrors: 0,
      errors: [],
    };

    let localPath: string;
    let sourceFiles: SourceFile[];
    try {
      localPath = await this.options.source.download(reference);
      analysis.localPath = localPath;
    } catch (error) {
      this.record(analysis, { filePath: "", phase: "downloading", error: errorMessage(error), recoverable: false });
      return analysis;
    }

    try {
      sourceFiles = await this.options.source.listSourceFiles(localPath);
    } catch (error) {
      this.record(analysis, { filePath: "", phase: "scanning", error: errorMessage(error), recoverable: false });
      return analysis;
    }
    analysis.filesFound = sourceFiles.length;

    const selected = this.skipTestFiles
      ? sourceFiles.filter((file) => !isTestFile(file.relativePath))
      : sourceFiles;
    analysis.filesSkipped = sourceFiles.length - selected.length;

    for (const [index, file] of selected.entries()) {
      this.options.onFile?.(file, index, selected.length);
      try {
        const content = await this.options.source.read(file.absolutePath);
        const extraction = this.extractor.extract(file.relativePath, content);
        analysis.files.push(this.inferencer.analyze(extraction, content));
      } catch (error) {
        analysis.parsingErrors++;
        this.record(analysis, {
          filePath: file.relativePath,
          phase: "parsing",
          error: errorMessage(error),
          recoverable: true,
        });
      }
    }

    logger.info(
      {
        found: analysis.filesFound,
        analyzed: analysis.files.length,
        skipped: analysis.filesSkipped,
        parsingErrors: analysis.parsingErrors,
      },
      "Repository analyzed"
    );
    return analysis;
  }

  private record(analysis: RepositoryAnalysis, error: AnalysisError): void {
    analysis.errors.push(error);
    if (error.recoverable) {
      logger.warn({ file: error.filePath, error: error.error }, "File skipped");
    } else {
      logger.error({ phase: error.phase, error: error.error }, "Repository analysis failed");
    }
    this.options.onError?.(error);
  }
}
