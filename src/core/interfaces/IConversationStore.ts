/**
 * IConversationStore - Per-session turn history
 *
 * @module
 */

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  /** ISO-8601 */
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface IConversationStore {
  /**
   * The last `limit` turns of a session, oldest first.
   */
  getRecentTurns(sessionId: string, limit: number): Promise<ConversationTurn[]>;

  addTurn(sessionId: string, turn: ConversationTurn): Promise<void>;

  clear(sessionId: string): Promise<void>;
}
