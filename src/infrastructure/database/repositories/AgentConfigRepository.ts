import Database from 'better-sqlite3';
import { IAgentConfigRepository } from '../../../core/interfaces/IAgentConfigRepository.js';
import {
  AgentConfigRecord,
  AgentSettings,
  ClientAgentConfig,
  UpsertOutcome,
} from '../../../core/entities/AgentConfig.js';
import { AgentSettingsSchema } from '../../../core/schemas.js';
import { ConfigNotFoundError, GatewayError, StorageError } from '../../../core/errors.js';

/**
 * SQLite implementation of the agent config collection
 */
export class AgentConfigRepository implements IAgentConfigRepository {
  constructor(
    private db: Database.Database,
    private collection: string,
    private now: () => Date = () => new Date()
  ) {}

  upsertConfig(
    clientId: string,
    configId: string,
    botName: string,
    settings: AgentSettings
  ): UpsertOutcome {
    return this.run('upsert config', () => {
      const timestamp = this.now().toISOString();
      const document = JSON.stringify(settings);

      const upsert = this.db.transaction((): UpsertOutcome => {
        const existing = this.db
          .prepare(`SELECT 1 FROM ${this.collection} WHERE client_id = ? AND config_id = ?`)
          .get(clientId, configId);

        this.db
          .prepare(
            `
          INSERT INTO ${this.collection} (client_id, config_id, bot_name, agent_config, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?)
          ON CONFLICT (client_id, config_id) DO UPDATE SET
            bot_name = excluded.bot_name,
            agent_config = excluded.agent_config,
            updated_at = excluded.updated_at
        `
          )
          .run(clientId, configId, botName, document, timestamp, timestamp);

        return existing ? 'updated' : 'inserted';
      });

      return upsert();
    });
  }

  getConfig(clientId: string, configId: string): ClientAgentConfig {
    const record = this.run('read config', () =>
      this.db
        .prepare(`SELECT * FROM ${this.collection} WHERE client_id = ? AND config_id = ?`)
        .get(clientId, configId) as AgentConfigRecord | undefined
    );

    if (!record) {
      throw new ConfigNotFoundError(clientId, configId);
    }
    return this.toEntity(record);
  }

  listClients(): string[] {
    return this.run('list clients', () =>
      this.db
        .prepare(`SELECT DISTINCT client_id FROM ${this.collection} ORDER BY client_id`)
        .pluck()
        .all() as string[]
    );
  }

  listConfigs(clientId: string): string[] {
    return this.run('list configs', () =>
      this.db
        .prepare(`SELECT config_id FROM ${this.collection} WHERE client_id = ? ORDER BY config_id`)
        .pluck()
        .all(clientId) as string[]
    );
  }

  private toEntity(record: AgentConfigRecord): ClientAgentConfig {
    let document: unknown;
    try {
      document = JSON.parse(record.agent_config);
    } catch (error) {
      throw new StorageError(
        `Stored config ${record.client_id}/${record.config_id} is not valid JSON`,
        error
      );
    }

    const parsed = AgentSettingsSchema.safeParse(document);
    if (!parsed.success) {
      throw new StorageError(
        `Stored config ${record.client_id}/${record.config_id} is malformed: ${parsed.error.message}`,
        parsed.error
      );
    }

    return {
      client_id: record.client_id,
      config_id: record.config_id,
      bot_name: record.bot_name,
      agent_config: parsed.data,
      created_at: record.created_at,
      updated_at: record.updated_at,
    };
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Failed to ${operation}: ${reason}`, error);
    }
  }
}
