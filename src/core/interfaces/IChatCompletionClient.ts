import { ChatMessage } from '../templates/types.js';

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

export interface ChatCompletionResult {
  model: string;
  content: string;
}

/**
 * Interface for the LLM provider's chat completion API
 */
export interface IChatCompletionClient {
  /**
   * Run one completion; failures reject with ProviderError
   */
  createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}
