/**
 * Conversation Stores
 *
 * Per-session turn history, bounded to the most recent `maxTurns` turns.
 * `InMemoryConversationStore` lives for the process; `FileConversationStore`
 * keeps every session in one JSON file so separate CLI invocations share it.
 *
 * @module
 */

import { z } from "zod";
import type { ConversationTurn, IConversationStore } from "../interfaces/IConversationStore.js";
import { ErrorCode, RepoLensError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { readJson, writeJson } from "../../utils/fs.js";

const logger = createLogger("conversation-store");

const DEFAULT_MAX_TURNS = 50;

const TurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

const SessionsSchema = z.record(z.array(TurnSchema));

type Sessions = z.infer<typeof SessionsSchema>;

function lastTurns(turns: readonly ConversationTurn[], limit: number): ConversationTurn[] {
  return limit <= 0 ? [] : turns.slice(-limit);
}

// =============================================================================
// In-memory
// =============================================================================

export class InMemoryConversationStore implements IConversationStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();

  constructor(private readonly maxTurns = DEFAULT_MAX_TURNS) {}

  async getRecentTurns(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    return lastTurns(this.sessions.get(sessionId) ?? [], limit);
  }

  async addTurn(sessionId: string, turn: ConversationTurn): Promise<void> {
    const turns = [...(this.sessions.get(sessionId) ?? []), turn];
    this.sessions.set(sessionId, lastTurns(turns, this.maxTurns));
  }

  async clear(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }
}

// =============================================================================
// JSON file
// =============================================================================

/**
 * @example
 * ```typescript
 * const store = new FileConversationStore(getSessionsPath(), config.memory.maxTurns);
 * await store.addTurn("cli", { role: "user", content: "What is Sub?", timestamp: new Date().toISOString() });
 * ```
 */
export class FileConversationStore implements IConversationStore {
  constructor(
    private readonly filePath: string,
    private readonly maxTurns = DEFAULT_MAX_TURNS
  ) {}

  async getRecentTurns(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    const sessions = await this.load();
    return lastTurns(sessions[sessionId] ?? [], limit);
  }

  async addTurn(sessionId: string, turn: ConversationTurn): Promise<void> {
    const sessions = await this.load();
    sessions[sessionId] = lastTurns([...(sessions[sessionId] ?? []), turn], this.maxTurns);
    await writeJson(this.filePath, sessions);
  }

  async clear(sessionId: string): Promise<void> {
    const sessions = await this.load();
    delete sessions[sessionId];
    await writeJson(this.filePath, sessions);
  }

  private async load(): Promise<Sessions> {
    let raw: unknown;
    try {
      raw = await readJson(this.filePath);
    } catch (error) {
      throw new RepoLensError(`Cannot read conversation file ${this.filePath}`, ErrorCode.FILE_SYSTEM_ERROR, {
        cause: errorMessage(error),
      });
    }
    if (raw === null) return {};

    const parsed = SessionsSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ file: this.filePath }, "Conversation file is malformed, starting empty");
      return {};
    }
    return parsed.data;
  }
}
