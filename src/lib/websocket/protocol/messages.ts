/**
 * Wire Messages
 * JSON shapes exchanged with the chat server
 */

import { z } from 'zod';
import { WEBSOCKET_CONSTANTS } from '../constants';

const { MESSAGE_TYPES } = WEBSOCKET_CONSTANTS;

export interface PersonalityMessage {
  name: string;
  description: string;
  traits: Record<string, unknown>;
  mood: string;
}

export interface ConfigurationMessage {
  provider: string;
  model_name: string;
  personality: PersonalityMessage;
  system_prompt: string;
  temperature: number;
  max_tokens: number;
}

export interface ChatRequestMessage {
  type: typeof MESSAGE_TYPES.CHAT_REQUEST;
  user_id: string;
  message: string;
  configuration: ConfigurationMessage;
  context: Record<string, unknown>;
  stream_audio: boolean;
  voice_id?: string;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Any incoming message: an object with a non-empty string discriminator */
export const IncomingEnvelopeSchema = z.object({
  type: z.string().min(1),
});

export const TextChunkMessageSchema = z.object({
  type: z.literal(MESSAGE_TYPES.TEXT_CHUNK),
  chunk: z.string().default(''),
});

export const AudioChunkMessageSchema = z.object({
  type: z.literal(MESSAGE_TYPES.AUDIO_CHUNK),
  data: z.string().min(1).regex(BASE64_PATTERN),
});

export const ErrorMessageSchema = z.object({
  type: z.literal(MESSAGE_TYPES.ERROR),
  message: z.string().default(''),
});

export const ConnectionStatusMessageSchema = z.object({
  type: z.literal(MESSAGE_TYPES.CONNECTION_STATUS),
  message: z.string().default(''),
});

export type TextChunkMessage = z.infer<typeof TextChunkMessageSchema>;
export type AudioChunkMessage = z.infer<typeof AudioChunkMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type ConnectionStatusMessage = z.infer<typeof ConnectionStatusMessageSchema>;
