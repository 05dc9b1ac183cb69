/**
 * WebSocket Library
 * Public API exports
 */

// Manager (High-Level API)
export { WebSocketClient } from './manager/websocket-client';
export type { WebSocketClientOptions } from './manager/websocket-client';

// Client (Low-Level API - for advanced use cases)
export { SocketConnection } from './client/socket-connection';
export { SocketReceiver } from './client/socket-receiver';
export type { ReadableConnection } from './client/socket-receiver';
export { ReconnectStrategy } from './client/reconnect-strategy';
export type { RandomSource } from './client/reconnect-strategy';
export { WsTransport, createWsTransport } from './client/transport';
export type { ConnectionState, SocketTransport, TransportFactory, TransportFrame } from './client/types';

// Protocol
export { buildChatRequest, serializeChatRequest } from './protocol/message-builder';
export { parseChatEvent } from './protocol/message-parser';
export type { ChatRequestMessage, ConfigurationMessage, PersonalityMessage } from './protocol/messages';

// Events
export { EventEmitter } from './events/event-emitter';
export { EventStream } from './events/event-stream';
export type { StreamObserver } from './events/event-stream';
export * from './events/chat-events';

// Config
export {
  MOBILE_WEBSOCKET_CONFIG,
  STABLE_WEBSOCKET_CONFIG,
  createWebSocketConfig,
  getWebSocketConfig,
  WEBSOCKET_CONSTANTS,
} from './config/websocket-config';
export type { WebSocketConfig, WebSocketProfile } from './config/websocket-config';
