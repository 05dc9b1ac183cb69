/**
 * Client Types
 * Connection state and the transport seam below SocketConnection
 */

import type { WebSocketConfig } from '../config/websocket-config';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

/**
 * One read from the transport: a fragment of a logical message, or the
 * peer's close frame.
 */
export type TransportFrame =
  | { kind: 'data'; data: Uint8Array; endOfMessage: boolean }
  | { kind: 'close'; code: number; reason: string };

/**
 * A single physical socket. Implementations own exactly one handle and are
 * never reopened.
 */
export interface SocketTransport {
  readonly isOpen: boolean;
  open(signal: AbortSignal): Promise<void>;
  receive(maxBytes: number, signal: AbortSignal): Promise<TransportFrame>;
  send(text: string, signal?: AbortSignal): Promise<void>;
  close(code: number, reason: string): Promise<void>;
  terminate(): void;
}

export type TransportFactory = (uri: string, config: WebSocketConfig) => SocketTransport;
