/**
 * SocketConnection
 * Owns at most one live transport and the abort signal tied to its lifetime
 */

import { v7 as uuidv7 } from 'uuid';
import { logger } from '../../utils/logger';
import { anySignal, createAbortError, isAbortError } from '../../utils/abort';
import { ConnectTimeoutError } from '../../utils/errors';
import { WEBSOCKET_CONSTANTS, type WebSocketConfig } from '../config/websocket-config';
import { createWsTransport } from './transport';
import type { SocketTransport, TransportFactory, TransportFrame } from './types';

export class SocketConnection {
  private transport: SocketTransport | null = null;
  private lifetime: AbortController | null = null;
  private connectionId: string | null = null;

  constructor(
    private readonly config: WebSocketConfig,
    private readonly transportFactory: TransportFactory = createWsTransport
  ) {}

  get isOpen(): boolean {
    return this.transport?.isOpen ?? false;
  }

  /**
   * Aborts when the current transport is disposed. An already aborted
   * signal when nothing is connected.
   */
  get signal(): AbortSignal {
    return this.lifetime?.signal ?? AbortSignal.abort();
  }

  get id(): string | null {
    return this.connectionId;
  }

  /**
   * Open a new transport, replacing any previous one.
   *
   * Rejects with ConnectTimeoutError when the handshake outlives
   * `connectTimeout`, and with an AbortError when `signal` aborts.
   */
  async connect(uri: string, signal?: AbortSignal): Promise<void> {
    this.dispose();

    const connectionId = uuidv7();
    const lifetime = new AbortController();
    const transport = this.transportFactory(uri, this.config);
    this.connectionId = connectionId;
    this.lifetime = lifetime;
    this.transport = transport;

    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), this.config.connectTimeout);
    const linked = anySignal(signal, timeout.signal, lifetime.signal);

    logger.info('Opening connection', { connectionId, url: uri });

    try {
      await transport.open(linked);
    } catch (error) {
      // Only tear down if this transport was not already replaced
      if (this.transport === transport) {
        this.dispose();
      }

      if (timeout.signal.aborted && !signal?.aborted) {
        logger.warn('Connection attempt timed out', { connectionId, timeoutMs: this.config.connectTimeout });
        throw new ConnectTimeoutError(this.config.connectTimeout);
      }
      if (signal?.aborted) {
        throw isAbortError(error) ? error : createAbortError();
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  async send(text: string, signal?: AbortSignal): Promise<void> {
    const transport = this.transport;
    if (!transport || !transport.isOpen) {
      throw new Error('Socket is not connected');
    }
    await transport.send(text, signal);
  }

  receive(maxBytes: number, signal: AbortSignal): Promise<TransportFrame> {
    const transport = this.transport;
    if (!transport) {
      return Promise.reject(new Error('Socket is not connected'));
    }
    return transport.receive(maxBytes, signal);
  }

  /**
   * Graceful close. Failures are logged, never thrown.
   */
  async close(): Promise<void> {
    const transport = this.transport;
    if (!transport || !transport.isOpen) {
      return;
    }

    try {
      await transport.close(WEBSOCKET_CONSTANTS.CLOSE_CODES.NORMAL, WEBSOCKET_CONSTANTS.CLOSE_REASONS.CLIENT_CLOSE);
    } catch (error) {
      logger.warn('Error during graceful close', {
        connectionId: this.connectionId ?? undefined,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  dispose(): void {
    const transport = this.transport;
    const lifetime = this.lifetime;
    if (!transport && !lifetime) {
      return;
    }

    this.transport = null;
    this.lifetime = null;
    lifetime?.abort();
    transport?.terminate();

    logger.debug('Connection disposed', { connectionId: this.connectionId ?? undefined });
  }
}
