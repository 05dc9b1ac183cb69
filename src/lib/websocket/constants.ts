/**
 * WebSocket Constants
 * Centralized WebSocket-related constants
 */

export const WEBSOCKET_CONSTANTS = {
  // Connection close codes
  CLOSE_CODES: {
    NORMAL: 1000,
  },

  CLOSE_REASONS: {
    CLIENT_CLOSE: 'Closing',
  },

  // Reconnect backoff
  BACKOFF: {
    MAX_EXPONENT: 10,
    JITTER_RATIO: 0.3,
  },

  // Wire discriminators
  MESSAGE_TYPES: {
    CHAT_REQUEST: 'chat_request',
    TEXT_CHUNK: 'text_chunk',
    AUDIO_CHUNK: 'audio_chunk',
    COMPLETE: 'complete',
    INTERRUPTED: 'interrupted',
    ERROR: 'error',
    CONNECTION_STATUS: 'connection_status',
  },
} as const;
