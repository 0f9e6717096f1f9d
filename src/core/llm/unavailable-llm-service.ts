/**
 * Stand-in reasoning service for when no provider could be set up. Every call
 * rejects with the setup failure, so consumers take their no-LLM paths:
 * ranking reports unavailable, query analysis uses its default and synthesis
 * answers with the formatted context.
 *
 * @module
 */

import { ErrorCode, LLMError } from "../errors.js";
import type { ILLMService } from "./interfaces/ILLMService.js";

export class UnavailableLLMService implements ILLMService {
  constructor(readonly reason: string) {}

  async complete(): Promise<string> {
    throw new LLMError(`Reasoning service unavailable: ${this.reason}`, ErrorCode.LLM_CONNECTION_FAILED);
  }
}
