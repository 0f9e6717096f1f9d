/**
 * Core module - Graph construction and retrieval shared by the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./parser/index.js";
export * from "./extraction/index.js";
export * from "./graph/index.js";
export * from "./graph-builder/index.js";
export * from "./indexer/index.js";
export * from "./embeddings/index.js";
export * from "./vector/index.js";
export * from "./llm/index.js";
export * from "./resolver/index.js";
export * from "./query/index.js";
export * from "./retrieval/index.js";
export * from "./synthesis/index.js";
export * from "./memory/index.js";
export * from "./assistant/index.js";

// Re-export types
export * from "../types/result.js";
