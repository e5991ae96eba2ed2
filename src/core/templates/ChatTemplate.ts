import { PromptTemplate, ChatMessage } from './types.js';

/**
 * Chat template using a structured messages array, as taken by
 * OpenAI-compatible /chat/completions endpoints.
 *
 * Consecutive assistant turns (for example a greeting followed by a reply)
 * are merged into one assistant message joined by a space.
 */
export class ChatTemplate implements PromptTemplate {
  formatPrompt(
    history: ReadonlyArray<{ role: 'user' | 'assistant'; content: string }>,
    newMessage: string,
    systemPrompt?: string
  ): ChatMessage[] {
    const chatMessages: ChatMessage[] = [];

    if (systemPrompt) {
      chatMessages.push({
        role: 'system',
        content: systemPrompt,
      });
    }

    history.forEach((turn) => {
      const previous = chatMessages[chatMessages.length - 1];
      if (turn.role === 'assistant' && previous?.role === 'assistant') {
        previous.content = `${previous.content} ${turn.content}`;
        return;
      }
      chatMessages.push({
        role: turn.role,
        content: turn.content,
      });
    });

    chatMessages.push({
      role: 'user',
      content: newMessage,
    });

    return chatMessages;
  }
}
