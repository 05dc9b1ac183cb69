/**
 * WebSocket Configuration
 * Immutable connection settings and the two canonical profiles
 */

export interface WebSocketConfig {
  // Connection settings (ms)
  readonly connectTimeout: number;
  readonly pingInterval: number;
  readonly keepAliveInterval: number;
  readonly pongTimeout: number;

  // Reconnection (exponential backoff, ms)
  readonly reconnectBaseDelay: number;
  readonly reconnectMaxDelay: number;
  readonly maxReconnectAttempts: number;
  readonly infiniteReconnect: boolean;

  // Largest slice handed out per transport read (bytes)
  readonly receiveBufferSize: number;
}

export type WebSocketProfile = 'mobile' | 'stable';

/**
 * Default profile for mobile networks: retries forever, pings often.
 */
export const MOBILE_WEBSOCKET_CONFIG: WebSocketConfig = Object.freeze({
  connectTimeout: 30000, // 30 seconds
  pingInterval: 15000, // 15 seconds
  keepAliveInterval: 30000, // 30 seconds
  pongTimeout: 10000, // 10 seconds
  reconnectBaseDelay: 1000, // 1 second
  reconnectMaxDelay: 30000, // 30 seconds
  maxReconnectAttempts: Number.MAX_SAFE_INTEGER,
  infiniteReconnect: true,
  receiveBufferSize: 8192,
});

/**
 * Conservative profile for stable connections: bounded retries, longer intervals.
 */
export const STABLE_WEBSOCKET_CONFIG: WebSocketConfig = Object.freeze({
  ...MOBILE_WEBSOCKET_CONFIG,
  pingInterval: 30000, // 30 seconds
  keepAliveInterval: 60000, // 1 minute
  maxReconnectAttempts: 10,
  infiniteReconnect: false,
});

const PROFILES: Record<WebSocketProfile, WebSocketConfig> = {
  mobile: MOBILE_WEBSOCKET_CONFIG,
  stable: STABLE_WEBSOCKET_CONFIG,
};

/**
 * Create a frozen config from a preset plus overrides.
 * A new session that needs different settings needs a new config.
 */
export function createWebSocketConfig(
  overrides: Partial<WebSocketConfig> = {},
  preset: WebSocketConfig = MOBILE_WEBSOCKET_CONFIG
): WebSocketConfig {
  return Object.freeze({ ...preset, ...overrides });
}

function isProfile(value: string | undefined): value is WebSocketProfile {
  return value === 'mobile' || value === 'stable';
}

/**
 * Get WebSocket configuration
 * Can be overridden via environment variables
 */
export function getWebSocketConfig(env: NodeJS.ProcessEnv = process.env): WebSocketConfig {
  const profile = env.CHAT_WS_PROFILE?.toLowerCase();
  const base = isProfile(profile) ? PROFILES[profile] : MOBILE_WEBSOCKET_CONFIG;
  const maxAttempts = Number(env.CHAT_WS_MAX_RECONNECT_ATTEMPTS);

  return createWebSocketConfig(
    {
      connectTimeout: Number(env.CHAT_WS_CONNECT_TIMEOUT) || base.connectTimeout,
      pingInterval: Number(env.CHAT_WS_PING_INTERVAL) || base.pingInterval,
      keepAliveInterval: Number(env.CHAT_WS_KEEP_ALIVE_INTERVAL) || base.keepAliveInterval,
      pongTimeout: Number(env.CHAT_WS_PONG_TIMEOUT) || base.pongTimeout,
      reconnectBaseDelay: Number(env.CHAT_WS_RECONNECT_BASE_DELAY) || base.reconnectBaseDelay,
      reconnectMaxDelay: Number(env.CHAT_WS_RECONNECT_MAX_DELAY) || base.reconnectMaxDelay,
      // An explicit attempt limit turns infinite retries off
      maxReconnectAttempts: maxAttempts || base.maxReconnectAttempts,
      infiniteReconnect: maxAttempts ? false : base.infiniteReconnect,
      receiveBufferSize: Number(env.CHAT_WS_RECEIVE_BUFFER_SIZE) || base.receiveBufferSize,
    },
    base
  );
}

// Re-export constants for convenience
export { WEBSOCKET_CONSTANTS } from '../constants';
