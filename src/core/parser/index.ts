/**
 * Parser Module
 *
 * Tree-sitter parsing of Python source and the syntax helpers built on it.
 *
 * @module
 */

export * from "./parser-manager.js";
export * from "./call-extractor.js";
export * from "./syntax-nodes.js";
