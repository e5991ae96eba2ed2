/**
 * Template system for formatting provider prompts
 */
export type { PromptTemplate, ChatMessage } from './types.js';
export { ChatTemplate } from './ChatTemplate.js';
