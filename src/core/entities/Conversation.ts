/**
 * Conversation domain entities
 */
export type TurnRole = 'user' | 'assistant';

export interface ChatKey {
  clientId: string;
  configId: string;
  chatId: string;
}

export interface NewTurn {
  role: TurnRole;
  content: string;
}

export interface ConversationTurn extends NewTurn {
  messageIndex: number;
  createdAt: string;
}

export interface ConversationTurnRecord {
  id?: number;
  client_id: string;
  config_id: string;
  chat_id: string;
  message_index: number;
  role: string;
  content: string;
  created_at: string;
}
