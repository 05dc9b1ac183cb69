/**
 * Message Builder
 * Builds outgoing chat requests. Every request carries the full agent configuration.
 */

import type { ChatSettings } from '../../chat/settings';
import { WEBSOCKET_CONSTANTS } from '../constants';
import type { ChatRequestMessage, ConfigurationMessage } from './messages';

function createConfiguration(settings: ChatSettings): ConfigurationMessage {
  const { agent } = settings;
  return {
    provider: agent.provider,
    model_name: agent.modelName,
    system_prompt: agent.systemPrompt,
    temperature: agent.temperature,
    max_tokens: agent.maxTokens,
    personality: {
      name: agent.personality.name,
      description: agent.personality.description,
      traits: { ...agent.personality.traits },
      mood: agent.personality.mood,
    },
  };
}

export function buildChatRequest(
  settings: ChatSettings,
  text: string,
  context: Record<string, unknown> = {}
): ChatRequestMessage {
  const request: ChatRequestMessage = {
    type: WEBSOCKET_CONSTANTS.MESSAGE_TYPES.CHAT_REQUEST,
    user_id: settings.userId,
    message: text,
    configuration: createConfiguration(settings),
    context: { ...context },
    stream_audio: settings.audioEnabled,
  };

  if (settings.agent.voiceId) {
    request.voice_id = settings.agent.voiceId;
  }

  return request;
}

export function serializeChatRequest(request: ChatRequestMessage): string {
  return JSON.stringify(request);
}
