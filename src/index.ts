/**
 * chat-stream-client
 * Real-time chat transport: WebSocket session, protocol and interruptible audio playback
 */

export * from './lib/websocket';
export * from './lib/audio';

export { ChatSession } from './lib/chat/chat-session';
export type { ChatSessionEvents } from './lib/chat/chat-session';
export { createChatMessage, withAudio, withContent, withStreaming } from './lib/chat/chat-message';
export type { ChatMessage, MessageRole } from './lib/chat/chat-message';
export { DEFAULT_CHAT_SETTINGS, loadChatSettings } from './lib/chat/settings';
export type { AgentConfiguration, AgentPersonality, ChatSettings } from './lib/chat/settings';

export { TokenClient, createTokenClientFromEnv } from './lib/livekit/token-client';
export type { TokenClientOptions, TokenRequest, TokenResponse } from './lib/livekit/token-client';

export { Logger, LogLevel, logger, getLoggerOptions } from './lib/utils/logger';
export type { LogContext, LogLevelName, LogLevelValue, LogSink, LoggerOptions } from './lib/utils/logger';
export * from './lib/utils/errors';
export { createAbortError, isAbortError } from './lib/utils/abort';
