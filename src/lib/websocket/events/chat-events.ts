/**
 * Chat Events
 * The output vocabulary of the transport layer. Nothing above it sees raw frames.
 */

import type { ConnectionState } from '../client/types';

interface ChatEventBase {
  /** Epoch milliseconds at creation */
  timestamp: number;
}

export interface TextChunkReceived extends ChatEventBase {
  type: 'text_chunk_received';
  text: string;
}

export interface AudioChunkReceived extends ChatEventBase {
  type: 'audio_chunk_received';
  data: Uint8Array;
}

export interface ResponseCompleted extends ChatEventBase {
  type: 'response_completed';
}

export interface ResponseInterrupted extends ChatEventBase {
  type: 'response_interrupted';
}

export interface ErrorOccurred extends ChatEventBase {
  type: 'error_occurred';
  message: string;
}

export interface ConnectionStateChanged extends ChatEventBase {
  type: 'connection_state_changed';
  state: ConnectionState;
}

export interface StatusMessageReceived extends ChatEventBase {
  type: 'status_message_received';
  message: string;
}

export type ChatEvent =
  | TextChunkReceived
  | AudioChunkReceived
  | ResponseCompleted
  | ResponseInterrupted
  | ErrorOccurred
  | ConnectionStateChanged
  | StatusMessageReceived;

export type ChatEventType = ChatEvent['type'];

export const textChunkReceived = (text: string): TextChunkReceived => ({
  type: 'text_chunk_received',
  text,
  timestamp: Date.now(),
});

export const audioChunkReceived = (data: Uint8Array): AudioChunkReceived => ({
  type: 'audio_chunk_received',
  data,
  timestamp: Date.now(),
});

export const responseCompleted = (): ResponseCompleted => ({
  type: 'response_completed',
  timestamp: Date.now(),
});

export const responseInterrupted = (): ResponseInterrupted => ({
  type: 'response_interrupted',
  timestamp: Date.now(),
});

export const errorOccurred = (message: string): ErrorOccurred => ({
  type: 'error_occurred',
  message,
  timestamp: Date.now(),
});

export const connectionStateChanged = (state: ConnectionState): ConnectionStateChanged => ({
  type: 'connection_state_changed',
  state,
  timestamp: Date.now(),
});

export const statusMessageReceived = (message: string): StatusMessageReceived => ({
  type: 'status_message_received',
  message,
  timestamp: Date.now(),
});
