import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export interface DatabaseOptions {
  /** Directory holding the database file, or ':memory:' */
  uri: string;
  name: string;
  configCollection: string;
  conversationCollection: string;
}

export interface DatabaseStatistics {
  totalConfigs: number;
  totalClients: number;
  totalChats: number;
  totalMessages: number;
  databaseSize: number;
}

/**
 * Document store connection.
 * Each collection is a table; agent settings are stored as JSON documents.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(private options: DatabaseOptions) {
    if (options.uri === ':memory:') {
      this.dbPath = ':memory:';
    } else {
      this.dbPath = path.resolve(options.uri, options.name);

      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    const configs = this.options.configCollection;
    const conversations = this.options.conversationCollection;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${configs} (
        client_id TEXT NOT NULL,
        config_id TEXT NOT NULL,
        bot_name TEXT NOT NULL,
        agent_config TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (client_id, config_id)
      );

      CREATE TABLE IF NOT EXISTS ${conversations} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        client_id TEXT NOT NULL,
        config_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        message_index INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE(client_id, config_id, chat_id, message_index)
      );

      CREATE INDEX IF NOT EXISTS idx_${conversations}_chat
        ON ${conversations}(client_id, config_id, chat_id);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  getCollections(): { configs: string; conversations: string } {
    return {
      configs: this.options.configCollection,
      conversations: this.options.conversationCollection,
    };
  }

  /**
   * Liveness probe used by the health route
   */
  ping(): boolean {
    try {
      return this.db.prepare('SELECT 1 AS ok').pluck().get() === 1;
    } catch (error) {
      console.error('[DatabaseConnection] Ping failed:', error);
      return false;
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): DatabaseStatistics {
    const { configs, conversations } = this.getCollections();
    const count = (sql: string): number => {
      const value: unknown = this.db.prepare(sql).pluck().get();
      return typeof value === 'number' ? value : 0;
    };

    // Get database file size
    let databaseSize = 0;
    if (this.dbPath !== ':memory:' && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalConfigs: count(`SELECT COUNT(*) FROM ${configs}`),
      totalClients: count(`SELECT COUNT(DISTINCT client_id) FROM ${configs}`),
      totalChats: count(
        `SELECT COUNT(*) FROM (SELECT DISTINCT client_id, config_id, chat_id FROM ${conversations})`
      ),
      totalMessages: count(`SELECT COUNT(*) FROM ${conversations}`),
      databaseSize,
    };
  }
}
