/**
 * WsTransport
 * SocketTransport over the `ws` package, with ping/pong liveness checks
 */

import WebSocket from 'ws';
import type { IncomingMessage } from 'node:http';
import { v7 as uuidv7 } from 'uuid';
import { logger } from '../../utils/logger';
import { createAbortError, throwIfAborted } from '../../utils/abort';
import type { WebSocketConfig } from '../config/websocket-config';
import type { SocketTransport, TransportFactory, TransportFrame } from './types';

const CLOSE_HANDSHAKE_TIMEOUT = 5000;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

export class WsTransport implements SocketTransport {
  readonly connectionId = uuidv7();

  private socket: WebSocket | null = null;
  private messages: Buffer[] = [];
  private offset = 0;
  private closeFrame: { code: number; reason: string } | null = null;
  private failure: Error | null = null;
  private wakeReceiver: (() => void) | null = null;

  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private pongTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly uri: string,
    private readonly config: WebSocketConfig
  ) {}

  get isOpen(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /**
   * Perform the opening handshake. Aborting terminates the half-open socket.
   */
  open(signal: AbortSignal): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('Transport already opened'));
    }
    if (signal.aborted) {
      return Promise.reject(createAbortError());
    }

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.uri);
      this.socket = socket;
      this.bindSocket(socket);

      const cleanup = () => {
        socket.off('open', onOpen);
        socket.off('error', onError);
        socket.off('close', onClose);
        signal.removeEventListener('abort', onAbort);
      };
      const onOpen = () => {
        cleanup();
        logger.info('WebSocket connection opened', { connectionId: this.connectionId, url: this.uri });
        this.startPingTimer();
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        socket.terminate();
        reject(error);
      };
      const onClose = (code: number) => {
        cleanup();
        reject(new Error(`Connection closed during handshake (code ${code})`));
      };
      const onAbort = () => {
        cleanup();
        socket.terminate();
        reject(createAbortError());
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
      socket.once('close', onClose);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Hand out the next slice of at most `maxBytes` of the oldest pending
   * message, or the close frame once every message has been read.
   */
  async receive(maxBytes: number, signal: AbortSignal): Promise<TransportFrame> {
    const sliceSize = Math.max(1, maxBytes);

    for (;;) {
      throwIfAborted(signal);

      const current = this.messages[0];
      if (current) {
        const end = Math.min(this.offset + sliceSize, current.length);
        const data = current.subarray(this.offset, end);
        if (end >= current.length) {
          this.messages.shift();
          this.offset = 0;
          return { kind: 'data', data, endOfMessage: true };
        }
        this.offset = end;
        return { kind: 'data', data, endOfMessage: false };
      }

      if (this.failure) {
        throw this.failure;
      }
      if (this.closeFrame) {
        return { kind: 'close', ...this.closeFrame };
      }
      if (!this.socket) {
        throw new Error('Transport not opened');
      }

      await this.waitForActivity(signal);
    }
  }

  send(text: string, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('Socket is not connected'));
    }

    return new Promise((resolve, reject) => {
      socket.send(text, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Close handshake. Falls back to terminate if the peer never answers.
   */
  async close(code: number, reason: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }
    if (socket.readyState === WebSocket.CONNECTING) {
      this.terminate();
      return;
    }

    const closed = new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn('Close handshake timed out, terminating', { connectionId: this.connectionId });
        socket.terminate();
        resolve();
      }, CLOSE_HANDSHAKE_TIMEOUT);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
    });

    if (socket.readyState === WebSocket.OPEN) {
      socket.close(code, reason);
    }
    await closed;
  }

  terminate(): void {
    this.stopPingTimer();
    if (this.socket && this.socket.readyState !== WebSocket.CLOSED) {
      this.socket.terminate();
    }
  }

  private bindSocket(socket: WebSocket): void {
    socket.on('upgrade', (response: IncomingMessage) => {
      response.socket.setKeepAlive(true, this.config.keepAliveInterval);
    });

    socket.on('message', (data) => {
      this.messages.push(toBuffer(data));
      this.wake();
    });

    socket.on('pong', () => {
      if (this.pongTimer) {
        clearTimeout(this.pongTimer);
        this.pongTimer = null;
      }
    });

    socket.on('error', (error) => {
      logger.error('WebSocket native error', error, { connectionId: this.connectionId });
      this.failure = error;
      this.wake();
    });

    socket.on('close', (code, reason) => {
      logger.info('WebSocket connection closed', {
        connectionId: this.connectionId,
        code,
        reason: reason.toString(),
      });
      this.stopPingTimer();
      this.closeFrame = { code, reason: reason.toString() };
      this.wake();
    });
  }

  private waitForActivity(signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.wakeReceiver = null;
        reject(createAbortError());
      };
      this.wakeReceiver = () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private wake(): void {
    const wake = this.wakeReceiver;
    this.wakeReceiver = null;
    wake?.();
  }

  /**
   * Ping on every interval; a pong must arrive within pongTimeout or the
   * socket is terminated, which surfaces as a close frame to the reader.
   */
  private startPingTimer(): void {
    this.stopPingTimer();
    if (this.config.pingInterval <= 0) {
      return;
    }

    this.pingTimer = setInterval(() => {
      const socket = this.socket;
      if (!socket || socket.readyState !== WebSocket.OPEN) {
        this.stopPingTimer();
        return;
      }
      socket.ping();
      if (!this.pongTimer) {
        this.pongTimer = setTimeout(() => {
          this.pongTimer = null;
          logger.error('WebSocket pong timeout, terminating', undefined, { connectionId: this.connectionId });
          this.terminate();
        }, this.config.pongTimeout);
        this.pongTimer.unref();
      }
    }, this.config.pingInterval);
    this.pingTimer.unref();
  }

  private stopPingTimer(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }
}

export const createWsTransport: TransportFactory = (uri, config) => new WsTransport(uri, config);


