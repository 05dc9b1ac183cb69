/**
 * Chat Settings
 * Server endpoint, user identity and the agent configuration sent with every request
 */

export interface AgentPersonality {
  name: string;
  description: string;
  traits: Record<string, unknown>;
  mood: string;
}

export interface AgentConfiguration {
  provider: string;
  modelName: string;
  voiceId?: string;
  temperature: number;
  maxTokens: number;
  systemPrompt: string;
  personality: AgentPersonality;
}

export interface ChatSettings {
  serverUri: string;
  userId: string;
  audioEnabled: boolean;
  /** Read one connection_status message right after the socket opens */
  awaitStatusHandshake: boolean;
  agent: AgentConfiguration;
}

const DEFAULT_SYSTEM_PROMPT =
  'You are Aria, a friendly AI assistant. ' +
  "Respond directly to the user's message. Be concise. " +
  'Never summarize previous conversations. ' +
  'If interrupted, just respond to the new message naturally.';

export const DEFAULT_CHAT_SETTINGS: ChatSettings = {
  serverUri: 'ws://localhost:8000/api/v1/ws/chat',
  userId: 'User',
  audioEnabled: true,
  awaitStatusHandshake: true,
  agent: {
    provider: 'langraph',
    modelName: 'gpt-4o-mini',
    temperature: 0.7,
    maxTokens: 500,
    systemPrompt: DEFAULT_SYSTEM_PROMPT,
    personality: {
      name: 'Aria',
      description: 'A friendly AI assistant',
      traits: {},
      mood: 'cheerful',
    },
  },
};

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.toLowerCase() === 'true';
}

/**
 * Load chat settings
 * Defaults can be overridden via environment variables
 */
export function loadChatSettings(env: NodeJS.ProcessEnv = process.env): ChatSettings {
  const defaults = DEFAULT_CHAT_SETTINGS;
  const agent = defaults.agent;

  return {
    serverUri: env.CHAT_SERVER_URI || defaults.serverUri,
    userId: env.CHAT_USER_ID || defaults.userId,
    audioEnabled: readBoolean(env.CHAT_ENABLE_AUDIO, defaults.audioEnabled),
    awaitStatusHandshake: readBoolean(env.CHAT_AWAIT_STATUS_HANDSHAKE, defaults.awaitStatusHandshake),
    agent: {
      provider: env.CHAT_AGENT_PROVIDER || agent.provider,
      modelName: env.CHAT_AGENT_MODEL || agent.modelName,
      voiceId: env.CHAT_AGENT_VOICE_ID || agent.voiceId,
      temperature: Number(env.CHAT_AGENT_TEMPERATURE) || agent.temperature,
      maxTokens: Number(env.CHAT_AGENT_MAX_TOKENS) || agent.maxTokens,
      systemPrompt: env.CHAT_AGENT_SYSTEM_PROMPT || agent.systemPrompt,
      personality: {
        ...agent.personality,
        name: env.CHAT_AGENT_NAME || agent.personality.name,
        mood: env.CHAT_AGENT_MOOD || agent.personality.mood,
      },
    },
  };
}
