import { buildChatRequest, serializeChatRequest } from '../../src/lib/websocket/protocol/message-builder';
import { DEFAULT_CHAT_SETTINGS, type ChatSettings } from '../../src/lib/chat/settings';

const settings: ChatSettings = {
  ...DEFAULT_CHAT_SETTINGS,
  userId: 'u1',
  agent: {
    ...DEFAULT_CHAT_SETTINGS.agent,
    modelName: 'gpt-4o-mini',
    temperature: 0.7,
  },
};

describe('buildChatRequest', () => {
  test('serializes the full configuration with every request', () => {
    const json = serializeChatRequest(buildChatRequest(settings, 'hello'));

    expect(json).toContain('"type":"chat_request"');
    expect(json).toContain('"user_id":"u1"');
    expect(JSON.parse(json)).toEqual({
      type: 'chat_request',
      user_id: 'u1',
      message: 'hello',
      configuration: {
        provider: 'langraph',
        model_name: 'gpt-4o-mini',
        system_prompt: DEFAULT_CHAT_SETTINGS.agent.systemPrompt,
        temperature: 0.7,
        max_tokens: 500,
        personality: {
          name: 'Aria',
          description: 'A friendly AI assistant',
          traits: {},
          mood: 'cheerful',
        },
      },
      context: {},
      stream_audio: true,
    });
  });

  test('omits voice_id when no voice is configured', () => {
    const request = buildChatRequest(settings, 'hello');
    expect('voice_id' in request).toBe(false);
  });

  test('includes voice_id when configured', () => {
    const withVoice: ChatSettings = { ...settings, agent: { ...settings.agent, voiceId: 'voice-1' } };
    expect(buildChatRequest(withVoice, 'hello').voice_id).toBe('voice-1');
  });

  test('reflects the audio setting and the supplied context', () => {
    const request = buildChatRequest({ ...settings, audioEnabled: false }, 'hello', { turn: 3 });
    expect(request.stream_audio).toBe(false);
    expect(request.context).toEqual({ turn: 3 });
  });

  test('does not share nested objects with the settings', () => {
    const traits: Record<string, unknown> = { humor: 'dry' };
    const source: ChatSettings = {
      ...settings,
      agent: { ...settings.agent, personality: { ...settings.agent.personality, traits } },
    };

    const request = buildChatRequest(source, 'hello');
    traits.humor = 'slapstick';

    expect(request.configuration.personality.traits).toEqual({ humor: 'dry' });
  });
});
