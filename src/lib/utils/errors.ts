/**
 * Error Types
 * Typed failures of the chat transport, each with a stable code
 */

export type ChatErrorCode =
  | 'CONNECTION_FAILED'
  | 'CONNECT_TIMEOUT'
  | 'TRANSPORT_CLOSED_DURING_READ'
  | 'SEND_WHILE_DISCONNECTED'
  | 'SEND_FAILED'
  | 'RECEIVE_FAILED'
  | 'PLAYBACK_ADAPTER_ERROR'
  | 'TOKEN_REQUEST_FAILED';

export class ChatError extends Error {
  public readonly code: ChatErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ChatErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChatError';
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class ConnectionError extends ChatError {
  public readonly attemptCount: number;

  constructor(message: string, attemptCount: number = 1, cause?: unknown) {
    super(message, 'CONNECTION_FAILED', { attemptCount }, { cause });
    this.name = 'ConnectionError';
    this.attemptCount = attemptCount;
  }
}

/**
 * The opening handshake did not finish within the configured connect timeout.
 * Never raised for caller-initiated cancellation.
 */
export class ConnectTimeoutError extends ChatError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs / 1000}s`, 'CONNECT_TIMEOUT', { timeoutMs });
    this.name = 'ConnectTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class TransportClosedDuringReadError extends ChatError {
  constructor() {
    super('Connection closed during receive', 'TRANSPORT_CLOSED_DURING_READ');
    this.name = 'TransportClosedDuringReadError';
  }
}

export class SendWhileDisconnectedError extends ChatError {
  constructor(state: string) {
    super('Not connected', 'SEND_WHILE_DISCONNECTED', { state });
    this.name = 'SendWhileDisconnectedError';
  }
}

export class SendError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SEND_FAILED', undefined, { cause });
    this.name = 'SendError';
  }
}

export class ReceiveError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super(message, 'RECEIVE_FAILED', undefined, { cause });
    this.name = 'ReceiveError';
  }
}

export class PlaybackAdapterError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PLAYBACK_ADAPTER_ERROR', undefined, { cause });
    this.name = 'PlaybackAdapterError';
  }
}

export class TokenRequestError extends ChatError {
  constructor(message: string, status?: number, cause?: unknown) {
    super(message, 'TOKEN_REQUEST_FAILED', status === undefined ? undefined : { status }, { cause });
    this.name = 'TokenRequestError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
