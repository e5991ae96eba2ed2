import {
  ChatCompletionRequest,
  IChatCompletionClient,
} from '../../core/interfaces/IChatCompletionClient.js';
import { AgentSettings } from '../../core/entities/AgentConfig.js';
import { ConversationTurn } from '../../core/entities/Conversation.js';
import { ChatTemplate, PromptTemplate } from '../../core/templates/index.js';
import { ProviderError } from '../../core/errors.js';
import { withTimeout } from '../../utils/timeout.js';

/**
 * Wraps the provider client: turns a stored agent config plus the
 * conversation so far into one chat completion call.
 */
export class AgentService {
  constructor(
    private client: IChatCompletionClient,
    private turnTimeoutMs: number,
    private template: PromptTemplate = new ChatTemplate()
  ) {}

  buildRequest(
    settings: AgentSettings,
    history: ReadonlyArray<Pick<ConversationTurn, 'role' | 'content'>>,
    userMessage: string
  ): ChatCompletionRequest {
    return {
      model: settings.model_name,
      messages: this.template.formatPrompt(history, userMessage, settings.prompt_preamble),
      max_tokens: settings.max_tokens,
      temperature: settings.temperature,
    };
  }

  /**
   * Generate the assistant's reply to `userMessage`.
   * Every failure, including the turn timeout, surfaces as a ProviderError.
   */
  async generateReply(
    settings: AgentSettings,
    history: ReadonlyArray<Pick<ConversationTurn, 'role' | 'content'>>,
    userMessage: string
  ): Promise<string> {
    const request = this.buildRequest(settings, history, userMessage);

    try {
      const result = await withTimeout(
        this.client.createChatCompletion(request),
        this.turnTimeoutMs,
        () => new ProviderError(`Provider did not reply within ${this.turnTimeoutMs}ms`)
      );
      return result.content;
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Provider call failed: ${reason}`, error);
    }
  }
}
