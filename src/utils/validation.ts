/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";

// =============================================================================
// Configuration Sections
// =============================================================================

export const Neo4jConfigSchema = z.object({
  uri: z.string().min(1).default("bolt://localhost:7687"),
  user: z.string().min(1).default("neo4j"),
  password: z.string().default("password"),
  database: z.string().min(1).default("neo4j"),
  /** Bounds each individual driver call */
  connectionTimeoutMs: z.number().int().positive().default(30_000),
});

export const LLMProviderSchema = z.enum(["openai", "anthropic", "google"]);

export type LLMProvider = z.infer<typeof LLMProviderSchema>;

export const LLMConfigSchema = z.object({
  provider: LLMProviderSchema.default("openai"),
  /** Falls back to the provider default when omitted */
  modelId: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().positive().default(1500),
});

export const EmbeddingsConfigSchema = z.object({
  model: z.string().min(1).default("text-embedding-3-small"),
  dimensions: z.number().int().positive().default(1536),
  batchSize: z.number().int().positive().default(32),
  /** Chunk content is cut to this many characters before embedding */
  maxChars: z.number().int().positive().default(2000),
});

export const ChunkingConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(650),
    overlap: z.number().int().nonnegative().default(50),
  })
  .refine((value) => value.overlap < value.chunkSize, {
    message: "overlap must be smaller than chunkSize",
    path: ["overlap"],
  });

export const VectorConfigSchema = z.object({
  backend: z.enum(["neo4j", "memory"]).default("neo4j"),
  indexName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).default("codechunk_embedding"),
  upsertBatchSize: z.number().int().positive().default(100),
});

export const RepositoryConfigSchema = z.object({
  clonePath: z.string().min(1).default(path.join(os.tmpdir(), "repositories")),
  maxFileSizeMb: z.number().positive().default(10),
});

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  chunkTopK: z.number().int().positive().default(5),
  memoryTurns: z.number().int().nonnegative().default(6),
  inventoryLimit: z.number().int().positive().default(200),
});

export const MemoryConfigSchema = z.object({
  maxTurns: z.number().int().positive().default(50),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

// =============================================================================
// Application Configuration Schema
// =============================================================================

export const AppConfigSchema = z.object({
  neo4j: Neo4jConfigSchema.default({}),
  llm: LLMConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  chunking: ChunkingConfigSchema.default({}),
  vector: VectorConfigSchema.default({}),
  repository: RepositoryConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type Neo4jConfig = z.infer<typeof Neo4jConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type VectorConfig = z.infer<typeof VectorConfigSchema>;
export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const issuePath = issue.path.join(".");
    return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
  });
}
