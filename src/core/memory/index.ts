/**
 * Memory Module
 *
 * Conversation history per session.
 *
 * @module
 */

export type { ConversationTurn, IConversationStore, TurnRole } from "../interfaces/IConversationStore.js";
export { InMemoryConversationStore, FileConversationStore } from "./conversation-store.js";
