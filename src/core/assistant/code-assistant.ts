/**
 * Code Assistant
 *
 * One call per question: analyze → retrieve → synthesize → remember.
 * A failure to record the turns is logged; the answer is still returned.
 *
 * @module
 */

import type { IConversationStore } from "../interfaces/IConversationStore.js";
import { QueryAnalyzer, type QueryAnalysis } from "../query/query-analyzer.js";
import { RetrievalOrchestrator, isValidEntityName } from "../retrieval/retrieval-orchestrator.js";
import type { Scenario, SourceDiagnostic } from "../retrieval/types.js";
import { Synthesizer, type AnswerSource } from "../synthesis/synthesizer.js";
import { toCitation, type Citation } from "../embeddings/code-chunker.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("code-assistant");

export interface AskOptions {
  sessionId: string;
  repoId: string;
  /** Skips query analysis for the primary entity when given */
  entityName?: string | null;
}

export interface AssistantAnswer {
  question: string;
  answer: string;
  answerSource: AnswerSource;
  scenario: Scenario;
  analysis: QueryAnalysis | null;
  /** Entities the answer drew on that exist in the graph */
  entities: string[];
  citations: Citation[];
  message: string | null;
  diagnostics: SourceDiagnostic[];
  durationMs: number;
}

export interface CodeAssistantOptions {
  analyzer: QueryAnalyzer;
  orchestrator: RetrievalOrchestrator;
  synthesizer: Synthesizer;
  memory: IConversationStore;
}

export class CodeAssistant {
  constructor(private readonly options: CodeAssistantOptions) {}

  async ask(question: string, options: AskOptions): Promise<AssistantAnswer> {
    const startTime = Date.now();

    let analysis: QueryAnalysis | null = null;
    let entityName = isValidEntityName(options.entityName) ? options.entityName : null;
    if (entityName === null) {
      analysis = await this.options.analyzer.analyze(question);
      entityName = analysis.primaryEntity;
    }

    const context = await this.options.orchestrator.retrieve({
      query: question,
      entityName,
      sessionId: options.sessionId,
      repoId: options.repoId,
    });
    const synthesis = await this.options.synthesizer.synthesize(context);

    await this.remember(options.sessionId, question, synthesis.answer, context.scenario);

    const answer: AssistantAnswer = {
      question,
      answer: synthesis.answer,
      answerSource: synthesis.source,
      scenario: context.scenario,
      analysis,
      entities: context.entities.filter((entity) => entity.found).map((entity) => entity.entityName),
      citations: context.chunks.map(toCitation),
      message: context.message,
      diagnostics: context.diagnostics,
      durationMs: Date.now() - startTime,
    };
    logger.info({ scenario: answer.scenario, source: answer.answerSource, durationMs: answer.durationMs }, "Question answered");
    return answer;
  }

  private async remember(sessionId: string, question: string, answer: string, scenario: Scenario): Promise<void> {
    try {
      const timestamp = new Date().toISOString();
      await this.options.memory.addTurn(sessionId, { role: "user", content: question, timestamp });
      await this.options.memory.addTurn(sessionId, { role: "assistant", content: answer, timestamp, metadata: { scenario } });
    } catch (error) {
      logger.warn({ sessionId, error: errorMessage(error) }, "Could not store conversation turns");
    }
  }
}

export function createCodeAssistant(options: CodeAssistantOptions): CodeAssistant {
  return new CodeAssistant(options);
}
