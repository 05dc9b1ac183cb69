/**
 * Audio Utilities
 * Public API exports
 */

export { AudioPlayer } from './playback';
export type { AudioPlayerOptions } from './playback';
export { AudioStream } from './stream';
export type { AudioStreamEvents } from './stream';
export { AudioAdapter } from './adapters/types';
export type { AudioAdapterEvents, AudioAdapterFactory, AudioAdapterMode, AudioFormat, PlaybackDevice } from './adapters/types';
export { StreamingAudioAdapter } from './adapters/streaming-adapter';
export { BufferedWavAdapter } from './adapters/buffered-wav-adapter';
export { createAudioAdapter } from './adapters/factory';
export { WritablePlaybackDevice } from './adapters/writable-device';
export { createWav, createWavHeader, decodeBase64Audio, DEFAULT_PCM_FORMAT } from './pcm-utils';
export type { PcmFormat } from './pcm-utils';
export { AUDIO_CONSTANTS } from './constants';
