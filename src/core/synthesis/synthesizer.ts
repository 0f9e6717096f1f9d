/**
 * Synthesizer
 *
 * Turns a RetrievalContext into the answer. Always returns text:
 * an empty context gets the fixed guidance without a reasoning call, and a
 * failed or empty reasoning answer is replaced by the formatted context.
 *
 * @module
 */

import type { ILLMService } from "../llm/interfaces/ILLMService.js";
import type { RetrievalContext, Scenario } from "../retrieval/types.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { formatContext, isEmptyContext } from "./context-formatter.js";

const logger = createLogger("synthesizer");

export const EMPTY_CONTEXT_GUIDANCE =
  "I could not find any code or conversation context for this question. " +
  "Index the repository first (repo-lens index <source> and repo-lens embed <source>), " +
  "or ask about a class, function or module by its name.";

const SYSTEM_PROMPT = `You are a software engineering assistant explaining a Python codebase.

You have access to:
1. CODE RELATIONSHIPS: imports, calls, inheritance and containment from the code graph (how things connect)
2. CODE CHUNKS: actual code from files (what happens)
3. CONVERSATION MEMORY: earlier turns of this conversation

Response Guidelines:
- Start with WHAT the code does
- Then explain WHERE it is used and what depends on it
- Reference file paths and line numbers
- Say so when the context does not answer the question

Only use the provided context. Do NOT add external knowledge.`;

export type AnswerSource = "guidance" | "llm" | "context";

export interface SynthesisResult {
  answer: string;
  source: AnswerSource;
  scenario: Scenario;
}

export class Synthesizer {
  constructor(private readonly llm: ILLMService) {}

  async synthesize(context: RetrievalContext): Promise<SynthesisResult> {
    if (isEmptyContext(context)) {
      logger.info({ scenario: context.scenario }, "Empty context, returning guidance");
      return { answer: EMPTY_CONTEXT_GUIDANCE, source: "guidance", scenario: context.scenario };
    }

    const formatted = formatContext(context);
    const userPrompt = `Context scenario: ${context.scenario}${context.message ? ` (${context.message})` : ""}

User Question:
${context.query}

Retrieved Context:
${formatted}`;

    try {
      const answer = (await this.llm.complete(SYSTEM_PROMPT, userPrompt)).trim();
      if (answer.length > 0) {
        return { answer, source: "llm", scenario: context.scenario };
      }
      logger.warn("Reasoning service returned an empty answer, using formatted context");
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Answer generation failed, using formatted context");
    }
    return { answer: formatted, source: "context", scenario: context.scenario };
  }
}

export function createSynthesizer(llm: ILLMService): Synthesizer {
  return new Synthesizer(llm);
}
