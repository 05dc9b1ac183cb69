/**
 * SocketReceiver
 * Reassembles transport fragments into complete UTF-8 text messages
 */

import { logger } from '../../utils/logger';
import { createAbortError, isAbortError } from '../../utils/abort';
import { TransportClosedDuringReadError } from '../../utils/errors';
import type { WebSocketConfig } from '../config/websocket-config';
import type { TransportFrame } from './types';

/**
 * The part of SocketConnection the receiver reads from.
 */
export interface ReadableConnection {
  readonly isOpen: boolean;
  receive(maxBytes: number, signal: AbortSignal): Promise<TransportFrame>;
}

type ReadResult = { kind: 'message'; text: string } | { kind: 'closed' };

export class SocketReceiver {
  constructor(private readonly config: WebSocketConfig) {}

  /**
   * Yield every complete message until the peer closes, `signal` aborts or
   * the connection is no longer open. Transport errors propagate.
   */
  async *createReceiveStream(connection: ReadableConnection, signal?: AbortSignal): AsyncGenerator<string> {
    const readSignal = signal ?? new AbortController().signal;

    while (connection.isOpen && !readSignal.aborted) {
      let result: ReadResult;
      try {
        result = await this.readMessage(connection, readSignal);
      } catch (error) {
        if (isAbortError(error) && readSignal.aborted) {
          logger.debug('Receive stream cancelled');
          return;
        }
        throw error;
      }

      if (result.kind === 'closed') {
        return;
      }
      yield result.text;
    }
  }

  /**
   * Read exactly one complete message.
   */
  async receiveOne(connection: ReadableConnection, signal: AbortSignal): Promise<string> {
    if (signal.aborted) {
      throw createAbortError();
    }

    const result = await this.readMessage(connection, signal);
    if (result.kind === 'closed') {
      throw new TransportClosedDuringReadError();
    }
    return result.text;
  }

  private async readMessage(connection: ReadableConnection, signal: AbortSignal): Promise<ReadResult> {
    const fragments: Uint8Array[] = [];

    for (;;) {
      const frame = await connection.receive(this.config.receiveBufferSize, signal);

      if (frame.kind === 'close') {
        logger.info('Server closed the connection', { code: frame.code, reason: frame.reason });
        return { kind: 'closed' };
      }

      fragments.push(frame.data);
      if (frame.endOfMessage) {
        return { kind: 'message', text: Buffer.concat(fragments).toString('utf8') };
      }
    }
  }
}
