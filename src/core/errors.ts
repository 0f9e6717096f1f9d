/**
 * Error Classes for repo-lens
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Parsing errors (2xxx)
  PARSE_FAILED = "E2000",
  PARSE_UNSUPPORTED_LANGUAGE = "E2001",
  PARSE_SYNTAX_ERROR = "E2003",
  PARSE_TREE_SITTER_ERROR = "E2004",

  // Graph errors (3xxx)
  GRAPH_CONNECTION_FAILED = "E3000",
  GRAPH_QUERY_FAILED = "E3001",
  GRAPH_QUERY_UNSUPPORTED = "E3002",
  GRAPH_WRITE_FAILED = "E3003",
  GRAPH_NODE_NOT_FOUND = "E3004",
  GRAPH_EDGE_WRITE_FAILED = "E3005",
  GRAPH_NOT_INITIALIZED = "E3006",

  // Vector errors (4xxx)
  VECTOR_CONNECTION_FAILED = "E4000",
  VECTOR_INDEX_FAILED = "E4001",
  VECTOR_SEARCH_FAILED = "E4002",
  VECTOR_EMBEDDING_FAILED = "E4003",

  // Retrieval errors (5xxx)
  RANKING_UNAVAILABLE = "E5000",
  ALL_SOURCES_FAILED = "E5002",

  // LLM errors (6xxx)
  LLM_CONNECTION_FAILED = "E6000",
  LLM_INFERENCE_FAILED = "E6001",

  // Repository errors (7xxx)
  REPOSITORY_CLONE_FAILED = "E7002",
  REPOSITORY_READ_FAILED = "E7003",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all repo-lens errors
 */
export class RepoLensError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RepoLensError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Generic parsing errors (grammar loading, unsupported input)
 */
export class ParsingError extends RepoLensError {
  public readonly filePath?: string;
  public readonly line?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { filePath?: string; line?: number }
  ) {
    super(message, code, context);
    this.name = "ParsingError";
    this.filePath = context?.filePath;
    this.line = context?.line;
  }

  override toString(): string {
    let location = "";
    if (this.filePath) {
      location = ` at ${this.filePath}`;
      if (this.line !== undefined) {
        location += `:${this.line}`;
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * A single source file could not be parsed. Fatal to that file only.
 */
export class FileParsingError extends ParsingError {
  public readonly detail: string;

  constructor(filePath: string, detail: string, line?: number) {
    super(`Failed to parse ${filePath}: ${detail}`, ErrorCode.PARSE_SYNTAX_ERROR, {
      filePath,
      line,
    });
    this.name = "FileParsingError";
    this.detail = detail;
  }
}

/**
 * Graph database errors
 */
export class GraphError extends RepoLensError {
  public readonly query?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GRAPH_QUERY_FAILED,
    context?: Record<string, unknown> & { query?: string }
  ) {
    super(message, code, context);
    this.name = "GraphError";
    this.query = context?.query;
  }
}

/**
 * One relationship could not be written. Counted and skipped by the upsert engine.
 */
export class RelationshipWriteError extends GraphError {
  public readonly relationship: string;

  constructor(relationship: string, cause: string) {
    super(`Failed to write relationship ${relationship}: ${cause}`, ErrorCode.GRAPH_EDGE_WRITE_FAILED, {
      relationship,
    });
    this.name = "RelationshipWriteError";
    this.relationship = relationship;
  }
}

/**
 * A name did not resolve to any entity in the graph.
 */
export class EntityNotFoundError extends GraphError {
  public readonly entityName: string;
  public readonly suggestions: string[];

  constructor(entityName: string, suggestions: string[] = []) {
    super(`Entity not found: ${entityName}`, ErrorCode.GRAPH_NODE_NOT_FOUND, {
      entityName,
      suggestions,
    });
    this.name = "EntityNotFoundError";
    this.entityName = entityName;
    this.suggestions = suggestions;
  }
}

/**
 * Vector database errors
 */
export class VectorError extends RepoLensError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VECTOR_INDEX_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "VectorError";
  }
}

/**
 * LLM inference errors
 */
export class LLMError extends RepoLensError {
  public readonly model?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.LLM_INFERENCE_FAILED,
    context?: Record<string, unknown> & { model?: string }
  ) {
    super(message, code, context);
    this.name = "LLMError";
    this.model = context?.model;
  }
}

/**
 * The ranking call failed or returned output that could not be used.
 */
export class RankingUnavailableError extends RepoLensError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RANKING_UNAVAILABLE,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "RankingUnavailableError";
  }
}

/**
 * Every structural and semantic source came back empty or failed.
 */
export class AllSourcesFailedError extends RepoLensError {
  public readonly failures: Record<string, string>;

  constructor(failures: Record<string, string>) {
    super("All retrieval sources failed or returned nothing", ErrorCode.ALL_SOURCES_FAILED, {
      failures,
    });
    this.name = "AllSourcesFailedError";
    this.failures = failures;
  }
}

/**
 * Repository download and file access errors
 */
export class RepositoryError extends RepoLensError {
  public readonly source?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.REPOSITORY_CLONE_FAILED,
    context?: Record<string, unknown> & { source?: string }
  ) {
    super(message, code, context);
    this.name = "RepositoryError";
    this.source = context?.source;
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigurationError extends RepoLensError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Check if an error is a RepoLensError
 */
export function isRepoLensError(error: unknown): error is RepoLensError {
  return error instanceof RepoLensError;
}

/**
 * Extract a printable message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}
