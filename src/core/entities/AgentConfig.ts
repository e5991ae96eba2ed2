/**
 * Agent configuration domain entities
 */
export interface AgentSettings {
  /** System prompt; an empty preamble sends no system message */
  prompt_preamble: string;
  model_name: string;
  max_tokens: number;
  temperature: number;
  /** Sent to the agent on behalf of the user when a new chat opens */
  user_initial_message?: string;
  /** Stored and sent as the bot's first turn when a new chat opens */
  bot_initial_message?: string;
}

export interface ClientAgentConfig {
  client_id: string;
  config_id: string;
  bot_name: string;
  agent_config: AgentSettings;
  created_at?: string;
  updated_at?: string;
}

export type UpsertOutcome = 'inserted' | 'updated';

export interface AgentConfigRecord {
  client_id: string;
  config_id: string;
  bot_name: string;
  agent_config: string;
  created_at: string;
  updated_at: string;
}
