/**
 * Conversation and message type definitions
 */

/**
 * Role of a message sent to a chat-style provider
 */
export type MessageRole = 'system' | 'user';

/**
 * Single message in a chat-style request
 */
export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * One turn's worth of input for the generation backend
 */
export interface GenerationRequest {
  userMessage: string;
  systemPrompt: string;
}
