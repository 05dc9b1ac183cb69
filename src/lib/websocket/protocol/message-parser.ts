/**
 * Message Parser
 * Turns incoming JSON text into chat events. Anything unrecognised is dropped.
 */

import { logger } from '../../utils/logger';
import { WEBSOCKET_CONSTANTS } from '../constants';
import {
  audioChunkReceived,
  errorOccurred,
  responseCompleted,
  responseInterrupted,
  statusMessageReceived,
  textChunkReceived,
  type ChatEvent,
} from '../events/chat-events';
import {
  AudioChunkMessageSchema,
  ConnectionStatusMessageSchema,
  ErrorMessageSchema,
  IncomingEnvelopeSchema,
  TextChunkMessageSchema,
} from './messages';

const { MESSAGE_TYPES } = WEBSOCKET_CONSTANTS;

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return undefined;
  }
}

/**
 * Parse one complete message. Returns undefined for malformed JSON, a
 * missing or unknown `type`, or an audio chunk without valid base64 data.
 * Never throws.
 */
export function parseChatEvent(json: string): ChatEvent | undefined {
  const raw = parseJson(json);
  const envelope = IncomingEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    logger.debug('Dropping message without a type');
    return undefined;
  }

  switch (envelope.data.type) {
    case MESSAGE_TYPES.TEXT_CHUNK: {
      const result = TextChunkMessageSchema.safeParse(raw);
      return result.success ? textChunkReceived(result.data.chunk) : undefined;
    }
    case MESSAGE_TYPES.AUDIO_CHUNK: {
      const result = AudioChunkMessageSchema.safeParse(raw);
      if (!result.success) {
        logger.debug('Dropping audio chunk without valid data');
        return undefined;
      }
      return audioChunkReceived(new Uint8Array(Buffer.from(result.data.data, 'base64')));
    }
    case MESSAGE_TYPES.COMPLETE:
      return responseCompleted();
    case MESSAGE_TYPES.INTERRUPTED:
      return responseInterrupted();
    case MESSAGE_TYPES.ERROR: {
      const result = ErrorMessageSchema.safeParse(raw);
      return result.success ? errorOccurred(result.data.message) : undefined;
    }
    case MESSAGE_TYPES.CONNECTION_STATUS: {
      const result = ConnectionStatusMessageSchema.safeParse(raw);
      return result.success ? statusMessageReceived(result.data.message) : undefined;
    }
    default:
      logger.debug('Dropping message of unknown type', { eventType: envelope.data.type });
      return undefined;
  }
}
