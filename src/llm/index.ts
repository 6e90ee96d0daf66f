/**
 * Minutes Insights - LLM Module
 */

export { OpenAIChatModel } from './client.js';
export type { ChatModel, ChatMessage, ChatRole, CompletionOptions } from './client.js';
export { extractJson } from './json.js';
