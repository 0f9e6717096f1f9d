/**
 * LLM Module
 *
 * @module
 */

export type { ILLMService, CompletionOptions } from "./interfaces/ILLMService.js";
export { UnavailableLLMService } from "./unavailable-llm-service.js";
export {
  APILLMService,
  createAPILLMService,
  createInitializedAPILLMService,
  DEFAULT_MODELS,
  API_KEY_ENV_VARS,
  type APILLMServiceConfig,
} from "./api-llm-service.js";
