import { ChatKey, ConversationTurn, NewTurn, TurnRole } from '../entities/Conversation.js';

/**
 * Interface for conversation persistence.
 * Turns are append-only; message indexes are assigned by the store.
 */
export interface IConversationRepository {
  appendTurn(key: ChatKey, role: TurnRole, content: string): ConversationTurn;

  /** Appends all turns in one transaction, or none of them */
  appendTurns(key: ChatKey, turns: NewTurn[]): ConversationTurn[];

  getHistory(key: ChatKey): ConversationTurn[];

  listChats(clientId: string, configId: string): string[];
}
