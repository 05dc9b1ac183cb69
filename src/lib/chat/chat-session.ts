/**
 * ChatSession
 * Conversation state on top of WebSocketClient: the transcript, the
 * processing flag and routing of audio chunks to the player
 */

import { EventEmitter } from '../websocket/events/event-emitter';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';
import type { WebSocketClient } from '../websocket/manager/websocket-client';
import type { ChatEvent } from '../websocket/events/chat-events';
import type { ConnectionState } from '../websocket/client/types';
import type { AudioPlayer } from '../audio/playback';
import type { ChatSettings } from './settings';
import {
  createChatMessage,
  withAudio,
  withContent,
  withStreaming,
  type ChatMessage,
} from './chat-message';

export type ChatSessionEvents = {
  messageAdded: ChatMessage;
  messageUpdated: ChatMessage;
  processingChanged: boolean;
  stateChanged: ConnectionState;
};

const INTERRUPTED_MARKER = ' [Interrupted]';

export class ChatSession extends EventEmitter<ChatSessionEvents> {
  private messages: ChatMessage[] = [];
  private currentAssistantId: string | null = null;
  private processing = false;
  private connectionState: ConnectionState;
  private readonly unsubscribe: () => void;

  constructor(
    private readonly client: WebSocketClient,
    private readonly audio: AudioPlayer,
    private readonly settings: ChatSettings
  ) {
    super();
    this.connectionState = client.getState();
    this.unsubscribe = client.events.subscribe((event) => this.handleEvent(event));
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  getMessages(): readonly ChatMessage[] {
    return [...this.messages];
  }

  canSend(input: string): boolean {
    return this.connectionState === 'connected' && !this.processing && input.trim().length > 0;
  }

  async connect(signal?: AbortSignal): Promise<boolean> {
    logger.info('Connecting to server');
    return this.client.connect(signal);
  }

  /**
   * Send a user message. A new message interrupts any audio still playing
   * from the previous turn. Resolves false when nothing was sent.
   */
  async sendMessage(input: string, signal?: AbortSignal): Promise<boolean> {
    const text = input.trim();
    if (!text) {
      return false;
    }

    this.audio.reset();
    this.addMessage(createChatMessage(text, 'user'));
    const placeholder = createChatMessage('', 'assistant', true);
    this.currentAssistantId = placeholder.id;
    this.addMessage(placeholder);
    this.setProcessing(true);

    try {
      await this.client.send(text, signal);
      return true;
    } catch (error) {
      const message = toError(error).message;
      logger.error('Failed to send chat message', error);
      this.addSystemMessage(`Error: ${message}`);
      this.finalizeAssistantMessage();
      this.setProcessing(false);
      return false;
    }
  }

  async disconnect(signal?: AbortSignal): Promise<void> {
    logger.info('Disconnecting');
    await this.client.disconnect(signal);
  }

  dispose(): void {
    this.unsubscribe();
    this.audio.clear();
    this.removeAllListeners();
  }

  private handleEvent(event: ChatEvent): void {
    switch (event.type) {
      case 'connection_state_changed':
        this.connectionState = event.state;
        this.emit('stateChanged', event.state);
        break;
      case 'text_chunk_received':
        this.updateAssistant((message) => withContent(message, message.content + event.text));
        break;
      case 'audio_chunk_received':
        this.handleAudioChunk(event.data);
        break;
      case 'response_completed':
        this.finalizeAssistantMessage();
        this.audio.flush();
        this.setProcessing(false);
        break;
      case 'response_interrupted':
        this.updateAssistant((message) => withStreaming(withContent(message, message.content + INTERRUPTED_MARKER), false));
        this.currentAssistantId = null;
        this.audio.clear();
        this.setProcessing(false);
        break;
      case 'error_occurred':
        logger.error('Chat error', undefined, { message: event.message });
        this.addSystemMessage(`Error: ${event.message}`);
        this.finalizeAssistantMessage();
        this.setProcessing(false);
        break;
      case 'status_message_received':
        logger.info('Status', { message: event.message });
        this.addSystemMessage(event.message);
        break;
    }
  }

  private handleAudioChunk(data: Uint8Array): void {
    if (!this.currentAssistantId) {
      return;
    }
    this.updateAssistant((message) => withAudio(message, true));
    if (this.settings.audioEnabled) {
      this.audio.enqueue(data);
    }
  }

  private finalizeAssistantMessage(): void {
    this.updateAssistant((message) => withStreaming(message, false));
    this.currentAssistantId = null;
  }

  private updateAssistant(update: (message: ChatMessage) => ChatMessage): void {
    const id = this.currentAssistantId;
    if (!id) {
      return;
    }
    const index = this.messages.findIndex((message) => message.id === id);
    if (index < 0) {
      return;
    }

    const updated = update(this.messages[index]);
    this.messages[index] = updated;
    this.emit('messageUpdated', updated);
  }

  private addSystemMessage(content: string): void {
    this.addMessage(createChatMessage(content, 'system'));
  }

  private addMessage(message: ChatMessage): void {
    this.messages.push(message);
    this.emit('messageAdded', message);
  }

  private setProcessing(processing: boolean): void {
    if (this.processing === processing) {
      return;
    }
    this.processing = processing;
    this.emit('processingChanged', processing);
  }
}
