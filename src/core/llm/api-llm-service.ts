/**
 * API-based LLM Service
 *
 * Reasoning endpoint over external APIs (Anthropic, OpenAI, Google).
 *
 * @module
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { createLogger } from "../../utils/logger.js";
import { ErrorCode, LLMError, errorMessage } from "../errors.js";
import type { LLMProvider } from "../../utils/validation.js";
import type { CompletionOptions, ILLMService } from "./interfaces/ILLMService.js";

const logger = createLogger("api-llm-service");

// =============================================================================
// Types
// =============================================================================

export interface APILLMServiceConfig {
  provider: LLMProvider;
  /** API key (reads from env if not provided) */
  apiKey?: string;
  /** Model ID to use */
  modelId?: string;
  /** Used when a request sets none */
  temperature?: number;
  /** Used when a request sets none */
  maxTokens?: number;
  /** Max retries for failed requests */
  maxRetries?: number;
}

// Default models per provider
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o-mini",
  google: "gemini-1.5-flash",
};

export const API_KEY_ENV_VARS: Record<LLMProvider, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_API_KEY",
};

// =============================================================================
// API LLM Service
// =============================================================================

/**
 * @example
 * ```typescript
 * const llm = await createInitializedAPILLMService({ provider: "openai" });
 * const answer = await llm.complete("You are a code expert.", "What does Sub inherit from?");
 * ```
 */
export class APILLMService implements ILLMService {
  private config: Required<APILLMServiceConfig>;
  private anthropicClient: Anthropic | null = null;
  private openaiClient: OpenAI | null = null;
  private googleModel: GenerativeModel | null = null;
  private ready = false;

  constructor(config: APILLMServiceConfig) {
    this.config = {
      provider: config.provider,
      apiKey: config.apiKey || this.getApiKeyFromEnv(config.provider),
      modelId: config.modelId || DEFAULT_MODELS[config.provider],
      temperature: config.temperature ?? 0.2,
      maxTokens: config.maxTokens ?? 1500,
      maxRetries: config.maxRetries ?? 3,
    };
  }

  get isReady(): boolean {
    return this.ready;
  }

  get modelId(): string {
    return this.config.modelId;
  }

  /**
   * Get API key from environment variables
   */
  private getApiKeyFromEnv(provider: LLMProvider): string {
    const envVar = API_KEY_ENV_VARS[provider];
    const key = process.env[envVar];
    if (!key) {
      throw new LLMError(
        `API key not found. Set ${envVar} environment variable or provide apiKey in config.`,
        ErrorCode.LLM_CONNECTION_FAILED,
        { provider }
      );
    }
    return key;
  }

  async initialize(): Promise<void> {
    if (this.ready) return;

    logger.debug({ provider: this.config.provider, model: this.config.modelId }, "Initializing API LLM service");

    switch (this.config.provider) {
      case "anthropic":
        this.anthropicClient = new Anthropic({
          apiKey: this.config.apiKey,
          maxRetries: this.config.maxRetries,
        });
        break;

      case "openai":
        this.openaiClient = new OpenAI({
          apiKey: this.config.apiKey,
          maxRetries: this.config.maxRetries,
        });
        break;

      case "google":
        this.googleModel = new GoogleGenerativeAI(this.config.apiKey).getGenerativeModel({
          model: this.config.modelId,
        });
        break;
    }

    this.ready = true;
    logger.debug({ provider: this.config.provider }, "API LLM service initialized");
  }

  async complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<string> {
    if (!this.ready) {
      throw new LLMError("Service not initialized. Call initialize() first.", ErrorCode.LLM_CONNECTION_FAILED, {
        model: this.config.modelId,
      });
    }

    const startTime = Date.now();
    const request: CompletionRequest = {
      systemPrompt,
      userPrompt,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      temperature: options?.temperature ?? this.config.temperature,
    };

    let result: { text: string; tokens: number };
    try {
      result = await this.dispatch(request);
    } catch (error) {
      logger.error({ err: error, provider: this.config.provider }, "LLM API call failed");
      throw new LLMError(`${this.config.provider} completion failed: ${errorMessage(error)}`, ErrorCode.LLM_INFERENCE_FAILED, {
        model: this.config.modelId,
      });
    }

    logger.debug({ tokens: result.tokens, durationMs: Date.now() - startTime }, "Completion finished");
    return result.text;
  }

  private dispatch(request: CompletionRequest): Promise<{ text: string; tokens: number }> {
    switch (this.config.provider) {
      case "anthropic":
        return this.completeAnthropic(request);
      case "openai":
        return this.completeOpenAI(request);
      case "google":
        return this.completeGoogle(request);
    }
  }

  /**
   * Streams the Anthropic response so long generations do not hit the
   * non-streaming request timeout.
   */
  private async completeAnthropic(request: CompletionRequest): Promise<{ text: string; tokens: number }> {
    if (!this.anthropicClient) {
      throw new Error("Anthropic client not initialized");
    }

    const stream = this.anthropicClient.messages.stream({
      model: this.config.modelId,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      system: request.systemPrompt || undefined,
      messages: [{ role: "user", content: request.userPrompt }],
    });

    let text = "";
    stream.on("text", (chunk) => {
      text += chunk;
    });

    const finalMessage = await stream.finalMessage();
    return { text, tokens: finalMessage.usage.output_tokens };
  }

  private async completeOpenAI(request: CompletionRequest): Promise<{ text: string; tokens: number }> {
    if (!this.openaiClient) {
      throw new Error("OpenAI client not initialized");
    }

    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: "system", content: request.systemPrompt });
    }
    messages.push({ role: "user", content: request.userPrompt });

    const response = await this.openaiClient.chat.completions.create({
      model: this.config.modelId,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages,
    });

    const text = response.choices[0]?.message?.content ?? "";
    return { text, tokens: response.usage?.completion_tokens ?? Math.ceil(text.length / 4) };
  }

  private async completeGoogle(request: CompletionRequest): Promise<{ text: string; tokens: number }> {
    if (!this.googleModel) {
      throw new Error("Google Gemini model not initialized");
    }

    const result = await this.googleModel.generateContent({
      systemInstruction: request.systemPrompt || undefined,
      contents: [{ role: "user", parts: [{ text: request.userPrompt }] }],
      generationConfig: {
        maxOutputTokens: request.maxTokens,
        temperature: request.temperature,
      },
    });

    const text = result.response.text();
    // Google doesn't report generated tokens the same way, estimate from text length
    return { text, tokens: Math.ceil(text.length / 4) };
  }

  async close(): Promise<void> {
    this.ready = false;
    this.anthropicClient = null;
    this.openaiClient = null;
    this.googleModel = null;
    logger.debug("API LLM service shut down");
  }
}

interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createAPILLMService(config: APILLMServiceConfig): APILLMService {
  return new APILLMService(config);
}

/**
 * Create and initialize an API LLM service
 */
export async function createInitializedAPILLMService(config: APILLMServiceConfig): Promise<APILLMService> {
  const service = createAPILLMService(config);
  await service.initialize();
  return service;
}
