/**
 * Configuration Loader
 *
 * Reads `.repo-lens/config.json` when present, overlays environment variables
 * and validates the merged object against {@link AppConfigSchema}.
 *
 * @module
 */

import { ConfigurationError } from "../core/errors.js";
import { readJson } from "./fs.js";
import { getConfigPath } from "./paths.js";
import { AppConfigSchema, formatZodError, safeValidate, type AppConfig } from "./validation.js";

type Env = Record<string, string | undefined>;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Returns `value[key]` when it is an object, otherwise a fresh object
 */
function section(value: JsonObject, key: string): JsonObject {
  const existing = value[key];
  return isJsonObject(existing) ? { ...existing } : {};
}

/**
 * Applies the supported environment variables on top of file configuration.
 */
export function applyEnvOverrides(fileConfig: JsonObject, env: Env): JsonObject {
  const merged: JsonObject = { ...fileConfig };

  const neo4j = section(merged, "neo4j");
  if (env.NEO4J_URI) neo4j.uri = env.NEO4J_URI;
  if (env.NEO4J_USER) neo4j.user = env.NEO4J_USER;
  if (env.NEO4J_PASSWORD !== undefined) neo4j.password = env.NEO4J_PASSWORD;
  if (env.NEO4J_DATABASE) neo4j.database = env.NEO4J_DATABASE;
  merged.neo4j = neo4j;

  const llm = section(merged, "llm");
  if (env.LLM_PROVIDER) llm.provider = env.LLM_PROVIDER;
  if (env.LLM_MODEL) llm.modelId = env.LLM_MODEL;
  merged.llm = llm;

  const repository = section(merged, "repository");
  if (env.REPO_LENS_CLONE_PATH) repository.clonePath = env.REPO_LENS_CLONE_PATH;
  merged.repository = repository;

  const logging = section(merged, "logging");
  if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL.toLowerCase();
  merged.logging = logging;

  return merged;
}

/**
 * Validates a raw configuration object.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = safeValidate(AppConfigSchema, raw);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

/**
 * Loads configuration for a project root.
 */
export async function loadConfig(
  projectRoot: string = process.cwd(),
  env: Env = process.env
): Promise<AppConfig> {
  const configPath = getConfigPath(projectRoot);

  let fileConfig: unknown;
  try {
    fileConfig = await readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(`Could not read ${configPath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (fileConfig === null) {
    return parseConfig(applyEnvOverrides({}, env));
  }
  if (!isJsonObject(fileConfig)) {
    throw new ConfigurationError(`${configPath} must contain a JSON object`);
  }

  return parseConfig(applyEnvOverrides(fileConfig, env));
}
