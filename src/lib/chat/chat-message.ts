/**
 * Chat Message
 * Immutable transcript entry. Updates return a new object.
 */

import { v4 as uuidv4 } from 'uuid';

export type MessageRole = 'user' | 'assistant' | 'system';

export interface ChatMessage {
  readonly id: string;
  readonly content: string;
  readonly role: MessageRole;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly isStreaming: boolean;
  readonly hasAudio: boolean;
}

export function createChatMessage(content: string, role: MessageRole, isStreaming: boolean = false): ChatMessage {
  return {
    id: uuidv4(),
    content,
    role,
    timestamp: Date.now(),
    isStreaming,
    hasAudio: false,
  };
}

export const withContent = (message: ChatMessage, content: string): ChatMessage => ({ ...message, content });

export const withStreaming = (message: ChatMessage, isStreaming: boolean): ChatMessage => ({ ...message, isStreaming });

export const withAudio = (message: ChatMessage, hasAudio: boolean): ChatMessage => ({ ...message, hasAudio });
