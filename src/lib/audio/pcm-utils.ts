/**
 * PCM Utilities
 * WAV container helpers for raw 16-bit PCM
 */

import { AUDIO_CONSTANTS } from './constants';

export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

export const DEFAULT_PCM_FORMAT: PcmFormat = {
  sampleRate: AUDIO_CONSTANTS.SAMPLE_RATE,
  channels: AUDIO_CONSTANTS.CHANNEL_COUNT,
  bitsPerSample: AUDIO_CONSTANTS.BIT_DEPTH,
};

export function totalBytes(chunks: readonly Uint8Array[]): number {
  return chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
}

/**
 * 44-byte little-endian RIFF/WAVE header for `dataLength` bytes of PCM
 */
export function createWavHeader(dataLength: number, format: PcmFormat = DEFAULT_PCM_FORMAT): Uint8Array {
  const header = Buffer.alloc(AUDIO_CONSTANTS.WAV_HEADER_SIZE);
  const blockAlign = format.channels * (format.bitsPerSample / 8);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataLength, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataLength, 40);

  return new Uint8Array(header.buffer, header.byteOffset, header.byteLength);
}

/**
 * Wrap PCM chunks in a single WAV file
 */
export function createWav(chunks: readonly Uint8Array[], format: PcmFormat = DEFAULT_PCM_FORMAT): Uint8Array {
  const header = createWavHeader(totalBytes(chunks), format);
  const wav = Buffer.concat([header, ...chunks]);
  return new Uint8Array(wav.buffer, wav.byteOffset, wav.byteLength);
}

export function decodeBase64Audio(base64: string): Uint8Array {
  const bytes = Buffer.from(base64, 'base64');
  return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
