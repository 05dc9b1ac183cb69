/**
 * WebSocketClient
 * Session orchestrator: connection state machine, receive loop and reconnects
 */

import { SocketConnection } from '../client/socket-connection';
import { SocketReceiver } from '../client/socket-receiver';
import { ReconnectStrategy, type RandomSource } from '../client/reconnect-strategy';
import { EventStream } from '../events/event-stream';
import { connectionStateChanged, errorOccurred, type ChatEvent } from '../events/chat-events';
import { buildChatRequest, serializeChatRequest } from '../protocol/message-builder';
import { parseChatEvent } from '../protocol/message-parser';
import { getWebSocketConfig, type WebSocketConfig } from '../config/websocket-config';
import { logger } from '../../utils/logger';
import { anySignal, createAbortError, delay, isAbortError } from '../../utils/abort';
import { ConnectionError, ReceiveError, SendError, SendWhileDisconnectedError, toError } from '../../utils/errors';
import type { ChatSettings } from '../../chat/settings';
import type { ConnectionState, TransportFactory } from '../client/types';

export interface WebSocketClientOptions {
  config?: WebSocketConfig;
  transportFactory?: TransportFactory;
  random?: RandomSource;
}

export class WebSocketClient {
  readonly events = new EventStream<ChatEvent>();

  private readonly config: WebSocketConfig;
  private readonly connection: SocketConnection;
  private readonly receiver: SocketReceiver;
  private readonly strategy: ReconnectStrategy;

  private state: ConnectionState = 'disconnected';
  private stateChangeCallbacks = new Set<(state: ConnectionState) => void>();
  private connectPromise: Promise<boolean> | null = null;
  private receiveController: AbortController | null = null;
  private receiveTask: Promise<void> | null = null;
  private reconnectController: AbortController | null = null;
  private disposed = false;

  constructor(
    private readonly settings: ChatSettings,
    options: WebSocketClientOptions = {}
  ) {
    this.config = options.config ?? getWebSocketConfig();
    this.connection = new SocketConnection(this.config, options.transportFactory);
    this.receiver = new SocketReceiver(this.config);
    this.strategy = new ReconnectStrategy(this.config, options.random);
  }

  /**
   * Connect to the chat server
   * Resolves true once connected, false if the attempt failed (a retry is
   * scheduled when the strategy allows one). Concurrent calls share one attempt.
   */
  connect(signal?: AbortSignal): Promise<boolean> {
    if (this.disposed) {
      return Promise.resolve(false);
    }
    if (this.isConnected()) {
      return Promise.resolve(true);
    }
    if (this.connectPromise) {
      return this.connectPromise;
    }

    // A user-initiated connect starts a fresh retry budget
    this.cancelPendingReconnect();
    this.strategy.reset();
    return this.startConnect(signal);
  }

  /**
   * Send a chat message. Fails fast unless connected; nothing is queued.
   */
  async send(text: string, signal?: AbortSignal): Promise<void> {
    if (!this.isConnected()) {
      throw new SendWhileDisconnectedError(this.state);
    }

    const payload = serializeChatRequest(buildChatRequest(this.settings, text));
    try {
      await this.connection.send(payload, signal);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.error('Failed to send message', error, { connectionId: this.connection.id ?? undefined });
      throw new SendError(`Failed to send message: ${toError(error).message}`, error);
    }
  }

  /**
   * Disconnect and stay disconnected until connect() is called again
   */
  async disconnect(signal?: AbortSignal): Promise<void> {
    this.strategy.preventAutoReconnect();
    this.cancelPendingReconnect();

    const pendingConnect = this.connectPromise;
    const receiveTask = this.receiveTask;
    this.receiveController?.abort();
    this.receiveController = null;
    this.receiveTask = null;

    if (!signal?.aborted) {
      await this.connection.close();
    }
    this.connection.dispose();

    // The attempt sees the aborted lifetime signal and settles as cancelled
    if (pendingConnect) {
      await pendingConnect;
    }
    if (receiveTask) {
      await receiveTask;
    }

    this.setState('disconnected');
    logger.info('Disconnected by client');
  }

  /**
   * Disconnect and complete the events stream. The client is unusable afterwards.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    await this.disconnect();
    this.events.complete();
    this.stateChangeCallbacks.clear();
  }

  /**
   * Subscribe to connection state changes
   */
  onStateChange(callback: (state: ConnectionState) => void): () => void {
    this.stateChangeCallbacks.add(callback);
    return () => {
      this.stateChangeCallbacks.delete(callback);
    };
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.connection.isOpen;
  }

  getReconnectAttempts(): number {
    return this.strategy.attempts;
  }

  private startConnect(signal?: AbortSignal): Promise<boolean> {
    const attempt = this.runConnect(signal).finally(() => {
      if (this.connectPromise === attempt) {
        this.connectPromise = null;
      }
    });
    this.connectPromise = attempt;
    return attempt;
  }

  private async runConnect(signal?: AbortSignal): Promise<boolean> {
    if (this.state !== 'reconnecting') {
      this.setState('connecting');
    }

    try {
      await this.stopReceiveLoop();
      this.throwIfCancelled();
      await this.connection.connect(this.settings.serverUri, signal);
      if (this.settings.awaitStatusHandshake) {
        await this.receiveStatus(signal);
      }
      if (!this.connection.isOpen) {
        throw new ConnectionError('Connection closed during handshake', this.strategy.attempts + 1);
      }

      this.throwIfCancelled();

      this.strategy.reset();
      this.setState('connected');
      this.startReceiveLoop();
      logger.info('Connected to chat server', { connectionId: this.connection.id ?? undefined });
      return true;
    } catch (error) {
      this.connection.dispose();

      if (this.disposed || this.strategy.isPrevented || signal?.aborted) {
        logger.info('Connection attempt cancelled');
        this.setState('disconnected');
        return false;
      }

      logger.error('Connection failed', error, { attempt: this.strategy.attempts });
      this.events.emit(errorOccurred(`Connection failed: ${toError(error).message}`));
      this.scheduleReconnect();
      return false;
    }
  }

  /**
   * Read the server's greeting before handing the session out
   */
  private async receiveStatus(signal?: AbortSignal): Promise<void> {
    const text = await this.receiver.receiveOne(this.connection, anySignal(signal, this.connection.signal));
    const event = parseChatEvent(text);
    if (event) {
      this.events.emit(event);
    }
  }

  /**
   * disconnect() or dispose() ran while this attempt was awaiting
   */
  private throwIfCancelled(): void {
    if (this.disposed || this.strategy.isPrevented) {
      throw createAbortError('Connection attempt cancelled');
    }
  }

  private async stopReceiveLoop(): Promise<void> {
    const receiveTask = this.receiveTask;
    this.receiveController?.abort();
    this.receiveController = null;
    this.receiveTask = null;
    if (receiveTask) {
      await receiveTask;
    }
  }

  private startReceiveLoop(): void {
    const controller = new AbortController();
    this.receiveController = controller;
    this.receiveTask = this.runReceiveLoop(controller.signal).catch((error) => {
      logger.error('Receive loop failed', error);
    });
  }

  private async runReceiveLoop(signal: AbortSignal): Promise<void> {
    let failure: unknown = null;

    try {
      for await (const text of this.receiver.createReceiveStream(this.connection, signal)) {
        const event = parseChatEvent(text);
        if (event) {
          logger.debug('Incoming chat event', { eventType: event.type });
          this.events.emit(event);
        }
      }
    } catch (error) {
      failure = error;
    }

    // A loop that was stopped or replaced must not touch the current connection
    if (signal.aborted || this.receiveController?.signal !== signal || this.disposed || this.strategy.isPrevented) {
      return;
    }

    if (failure) {
      const receiveError = new ReceiveError(`Receive error: ${toError(failure).message}`, failure);
      logger.error('Receive error', receiveError, { connectionId: this.connection.id ?? undefined });
      this.events.emit(errorOccurred(receiveError.message));
    } else {
      logger.warn('Connection dropped by server', { connectionId: this.connection.id ?? undefined });
    }

    this.receiveController = null;
    this.receiveTask = null;
    this.connection.dispose();
    this.scheduleReconnect();
  }

  /**
   * Schedule reconnection with exponential backoff
   */
  private scheduleReconnect(): void {
    if (this.disposed || !this.strategy.canRetry()) {
      logger.error('Reconnection stopped', undefined, {
        attempt: this.strategy.attempts,
        maxAttempts: this.strategy.maxAttempts,
        prevented: this.strategy.isPrevented,
      });
      this.setState('disconnected');
      return;
    }

    this.strategy.recordAttempt();
    const delayMs = this.strategy.getNextDelay();
    this.setState('reconnecting');

    logger.info('Scheduling reconnect attempt', {
      attempt: this.strategy.attempts,
      maxAttempts: this.strategy.maxAttempts,
      delayMs,
    });

    const controller = new AbortController();
    this.reconnectController = controller;

    delay(delayMs, controller.signal)
      .then(() => {
        if (this.reconnectController === controller) {
          this.reconnectController = null;
        }
        return this.startConnect();
      })
      .catch((error) => {
        if (!isAbortError(error)) {
          logger.error('Reconnect attempt failed', error);
        }
      });
  }

  private cancelPendingReconnect(): void {
    if (this.reconnectController) {
      this.reconnectController.abort();
      this.reconnectController = null;
    }
  }

  /**
   * Update state and emit event
   */
  private setState(newState: ConnectionState): void {
    if (this.state === newState) {
      return;
    }
    this.state = newState;
    logger.info('Connection state changed', { state: newState });

    this.stateChangeCallbacks.forEach((callback) => {
      try {
        callback(newState);
      } catch (error) {
        logger.error('Error in state change callback', error, { state: newState });
      }
    });
    this.events.emit(connectionStateChanged(newState));
  }
}
