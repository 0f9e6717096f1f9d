/**
 * Parser Manager
 *
 * Owns the Tree-sitter runtime and the Python grammar.
 * Provides a single entry point for parsing Python source into syntax trees.
 *
 * @module
 */

import { Parser, Language, type Tree } from "web-tree-sitter";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ErrorCode, ParsingError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("parser-manager");

// =============================================================================
// Types
// =============================================================================

/**
 * Supported language identifiers
 */
export type SupportedLanguage = "python";

/**
 * Parse result from Tree-sitter
 */
export interface ParseResult {
  /** The parsed syntax tree */
  tree: Tree;
  /** Source code that was parsed */
  sourceCode: string;
  /** Language that was used */
  language: SupportedLanguage;
  /** Parse time in milliseconds */
  parseTimeMs: number;
  /** Whether the tree contains ERROR or MISSING nodes */
  hasErrors: boolean;
}

export interface ParserManagerOptions {
  /** Explicit location of tree-sitter-python.wasm */
  wasmPath?: string;
}

// =============================================================================
// Constants
// =============================================================================

const EXTENSION_TO_LANGUAGE: Record<string, SupportedLanguage> = {
  ".py": "python",
  ".pyi": "python",
};

const GRAMMAR_MODULE = "tree-sitter-python";
const GRAMMAR_WASM = "tree-sitter-python.wasm";

// =============================================================================
// Parser Manager Class
// =============================================================================

/**
 * Manages the Tree-sitter parser for Python.
 *
 * @example
 * ```typescript
 * const manager = new ParserManager();
 * await manager.initialize();
 *
 * const result = manager.parseCode("class Base:\n    pass\n");
 * console.log(result.tree.rootNode.type); // "module"
 *
 * await manager.close();
 * ```
 */
export class ParserManager {
  private parser: Parser | null = null;
  private language: Language | null = null;
  private initialized = false;

  constructor(private readonly options: ParserManagerOptions = {}) {}

  /**
   * Initializes Tree-sitter and loads the Python grammar.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const wasmPath = this.options.wasmPath ?? this.resolveWasmPath();
    try {
      await Parser.init();
      this.language = await Language.load(wasmPath);
    } catch (error) {
      throw new ParsingError(
        `Failed to load Python grammar from ${wasmPath}`,
        ErrorCode.PARSE_TREE_SITTER_ERROR,
        { cause: error instanceof Error ? error.message : String(error) }
      );
    }

    const parser = new Parser();
    parser.setLanguage(this.language);
    this.parser = parser;
    this.initialized = true;
    logger.debug({ wasmPath }, "Python grammar loaded");
  }

  /**
   * Closes the parser and releases WASM memory.
   */
  async close(): Promise<void> {
    this.parser?.delete();
    this.parser = null;
    this.language = null;
    this.initialized = false;
  }

  /**
   * Parses a source file, detecting the language from its extension.
   */
  parseFile(filePath: string, content: string): ParseResult {
    const language = this.detectLanguage(filePath);
    if (!language) {
      throw new ParsingError(
        `Unsupported file type: ${path.extname(filePath)}`,
        ErrorCode.PARSE_UNSUPPORTED_LANGUAGE,
        { filePath }
      );
    }
    return this.parseCode(content);
  }

  /**
   * Parses Python source code directly.
   */
  parseCode(code: string): ParseResult {
    const parser = this.getParser();
    const startTime = performance.now();

    const tree = parser.parse(code);
    const parseTimeMs = performance.now() - startTime;

    if (!tree) {
      throw new ParsingError("Tree-sitter returned no tree", ErrorCode.PARSE_TREE_SITTER_ERROR);
    }

    return {
      tree,
      sourceCode: code,
      language: "python",
      parseTimeMs,
      hasErrors: tree.rootNode.hasError,
    };
  }

  detectLanguage(filePath: string): SupportedLanguage | null {
    const ext = path.extname(filePath).toLowerCase();
    return EXTENSION_TO_LANGUAGE[ext] ?? null;
  }

  isSupported(filePath: string): boolean {
    return this.detectLanguage(filePath) !== null;
  }

  getSupportedExtensions(): string[] {
    return Object.keys(EXTENSION_TO_LANGUAGE);
  }

  get isReady(): boolean {
    return this.initialized;
  }

  private getParser(): Parser {
    if (!this.initialized || !this.parser) {
      throw new ParsingError("ParserManager not initialized. Call initialize() first.");
    }
    return this.parser;
  }

  /**
   * The grammar package ships its WASM build at its root. Both src/core/parser
   * and dist/core/parser sit three levels below the project root.
   */
  private resolveWasmPath(): string {
    const moduleDir = path.dirname(fileURLToPath(import.meta.url));
    const nodeModulesPath = path.resolve(moduleDir, "../../../node_modules");
    return path.join(nodeModulesPath, GRAMMAR_MODULE, GRAMMAR_WASM);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Creates a ParserManager instance.
 */
export function createParserManager(options?: ParserManagerOptions): ParserManager {
  return new ParserManager(options);
}

let sharedManager: ParserManager | null = null;

/**
 * Gets a shared, initialized ParserManager.
 */
export async function getSharedParserManager(): Promise<ParserManager> {
  if (!sharedManager) {
    const manager = new ParserManager();
    await manager.initialize();
    sharedManager = manager;
  }
  return sharedManager;
}

/**
 * Releases the shared parser manager.
 */
export async function resetSharedParserManager(): Promise<void> {
  if (sharedManager) {
    await sharedManager.close();
    sharedManager = null;
  }
}
