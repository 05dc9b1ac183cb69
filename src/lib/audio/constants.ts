/**
 * Audio Constants
 * Centralized audio-related constants
 */

export const AUDIO_CONSTANTS = {
  // TTS output format (24kHz mono 16-bit PCM)
  SAMPLE_RATE: 24000,
  CHANNEL_COUNT: 1, // Mono
  BIT_DEPTH: 16, // 16-bit PCM

  // RIFF/WAVE header size in bytes
  WAV_HEADER_SIZE: 44,
} as const;
