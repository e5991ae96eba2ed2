import Database from 'better-sqlite3';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import {
  ChatKey,
  ConversationTurn,
  ConversationTurnRecord,
  NewTurn,
  TurnRole,
} from '../../../core/entities/Conversation.js';
import { StorageError } from '../../../core/errors.js';

/**
 * SQLite implementation of the conversation collection.
 * Rows are only ever inserted; message_index orders a chat's turns.
 */
export class ConversationRepository implements IConversationRepository {
  constructor(
    private db: Database.Database,
    private collection: string,
    private now: () => Date = () => new Date()
  ) {}

  appendTurn(key: ChatKey, role: TurnRole, content: string): ConversationTurn {
    return this.appendTurns(key, [{ role, content }])[0];
  }

  appendTurns(key: ChatKey, turns: NewTurn[]): ConversationTurn[] {
    return this.run('append turns', () => {
      const nextIndex = this.db.prepare(`
        SELECT COALESCE(MAX(message_index), -1) + 1 FROM ${this.collection}
        WHERE client_id = ? AND config_id = ? AND chat_id = ?
      `);
      const insert = this.db.prepare(`
        INSERT INTO ${this.collection} (client_id, config_id, chat_id, message_index, role, content, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);

      const append = this.db.transaction((batch: NewTurn[]): ConversationTurn[] => {
        const start = nextIndex.pluck().get(key.clientId, key.configId, key.chatId);
        let messageIndex = typeof start === 'number' ? start : 0;

        return batch.map((turn) => {
          const createdAt = this.now().toISOString();
          insert.run(
            key.clientId,
            key.configId,
            key.chatId,
            messageIndex,
            turn.role,
            turn.content,
            createdAt
          );
          return { ...turn, messageIndex: messageIndex++, createdAt };
        });
      });

      return append(turns);
    });
  }

  getHistory(key: ChatKey): ConversationTurn[] {
    const records = this.run('load history', () =>
      this.db
        .prepare(`
        SELECT * FROM ${this.collection}
        WHERE client_id = ? AND config_id = ? AND chat_id = ?
        ORDER BY message_index
      `)
        .all(key.clientId, key.configId, key.chatId) as ConversationTurnRecord[]
    );

    return records.map((record): ConversationTurn => ({
      role: record.role === 'assistant' ? 'assistant' : 'user',
      content: record.content,
      messageIndex: record.message_index,
      createdAt: record.created_at,
    }));
  }

  listChats(clientId: string, configId: string): string[] {
    return this.run('list chats', () =>
      this.db
        .prepare(`
        SELECT chat_id FROM ${this.collection}
        WHERE client_id = ? AND config_id = ?
        GROUP BY chat_id
        ORDER BY MIN(id)
      `)
        .pluck()
        .all(clientId, configId) as string[]
    );
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Failed to ${operation}: ${reason}`, error);
    }
  }
}
