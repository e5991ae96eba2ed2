/**
 * Chat message format for structured conversation
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Abstract interface for prompt templates
 */
export interface PromptTemplate {
  /**
   * Format conversation history and new message into provider messages
   * @param history - Previous conversation turns, oldest first
   * @param newMessage - The new user message
   * @param systemPrompt - Optional system prompt for context
   */
  formatPrompt(
    history: ReadonlyArray<{ role: 'user' | 'assistant'; content: string }>,
    newMessage: string,
    systemPrompt?: string
  ): ChatMessage[];
}
