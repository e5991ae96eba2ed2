import { AgentSettings, ClientAgentConfig, UpsertOutcome } from '../entities/AgentConfig.js';

/**
 * Interface for agent configuration persistence
 */
export interface IAgentConfigRepository {
  /** Full replace of the document keyed by (clientId, configId) */
  upsertConfig(
    clientId: string,
    configId: string,
    botName: string,
    settings: AgentSettings
  ): UpsertOutcome;

  /** Throws ConfigNotFoundError when no record matches */
  getConfig(clientId: string, configId: string): ClientAgentConfig;

  listClients(): string[];

  listConfigs(clientId: string): string[];
}
