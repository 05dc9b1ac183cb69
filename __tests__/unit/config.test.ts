import {
  MOBILE_WEBSOCKET_CONFIG,
  STABLE_WEBSOCKET_CONFIG,
  createWebSocketConfig,
  getWebSocketConfig,
} from '../../src/lib/websocket/config/websocket-config';
import { DEFAULT_CHAT_SETTINGS, loadChatSettings } from '../../src/lib/chat/settings';

describe('WebSocket config', () => {
  test('the mobile profile retries forever', () => {
    expect(MOBILE_WEBSOCKET_CONFIG).toMatchObject({
      pingInterval: 15000,
      keepAliveInterval: 30000,
      maxReconnectAttempts: Number.MAX_SAFE_INTEGER,
      infiniteReconnect: true,
    });
  });

  test('the stable profile bounds retries', () => {
    expect(STABLE_WEBSOCKET_CONFIG).toMatchObject({
      connectTimeout: 30000,
      pingInterval: 30000,
      keepAliveInterval: 60000,
      maxReconnectAttempts: 10,
      infiniteReconnect: false,
    });
  });

  test('createWebSocketConfig applies overrides and freezes the result', () => {
    const config = createWebSocketConfig({ connectTimeout: 5000 }, STABLE_WEBSOCKET_CONFIG);

    expect(config.connectTimeout).toBe(5000);
    expect(config.maxReconnectAttempts).toBe(10);
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('getWebSocketConfig picks the profile and overrides from the environment', () => {
    const config = getWebSocketConfig({
      CHAT_WS_PROFILE: 'STABLE',
      CHAT_WS_CONNECT_TIMEOUT: '2500',
      CHAT_WS_RECEIVE_BUFFER_SIZE: 'not a number',
    });

    expect(config.connectTimeout).toBe(2500);
    expect(config.pingInterval).toBe(30000);
    expect(config.receiveBufferSize).toBe(8192);
  });

  test('an explicit attempt limit turns infinite retries off', () => {
    const config = getWebSocketConfig({ CHAT_WS_MAX_RECONNECT_ATTEMPTS: '3' });

    expect(config.maxReconnectAttempts).toBe(3);
    expect(config.infiniteReconnect).toBe(false);
  });

  test('defaults to the mobile profile', () => {
    expect(getWebSocketConfig({})).toEqual(MOBILE_WEBSOCKET_CONFIG);
  });
});

describe('loadChatSettings', () => {
  test('returns the defaults for an empty environment', () => {
    expect(loadChatSettings({})).toEqual(DEFAULT_CHAT_SETTINGS);
  });

  test('reads overrides from the environment', () => {
    const settings = loadChatSettings({
      CHAT_SERVER_URI: 'ws://chat.test/ws',
      CHAT_USER_ID: 'alice',
      CHAT_ENABLE_AUDIO: 'false',
      CHAT_AGENT_MODEL: 'test-model',
      CHAT_AGENT_VOICE_ID: 'voice-1',
      CHAT_AGENT_TEMPERATURE: '0.2',
      CHAT_AGENT_NAME: 'Max',
    });

    expect(settings).toMatchObject({
      serverUri: 'ws://chat.test/ws',
      userId: 'alice',
      audioEnabled: false,
      awaitStatusHandshake: true,
      agent: {
        modelName: 'test-model',
        voiceId: 'voice-1',
        temperature: 0.2,
        maxTokens: 500,
        personality: { name: 'Max', mood: 'cheerful' },
      },
    });
  });
});
