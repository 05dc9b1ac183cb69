/**
 * Audio Playback
 * Facade over AudioStream for TTS audio from the server
 */

import { logger } from '../utils/logger';
import { AudioStream } from './stream';
import { createAudioAdapter } from './adapters/factory';
import { decodeBase64Audio } from './pcm-utils';
import type { AudioAdapterMode, PlaybackDevice } from './adapters/types';

export interface AudioPlayerOptions {
  enabled?: boolean;
  mode?: AudioAdapterMode;
}

/**
 * Audio playback manager
 */
export class AudioPlayer {
  private stream: AudioStream | null = null;
  private unsubscribers: Array<() => void> = [];
  private isPlaying = false;
  private readonly enabled: boolean;
  private readonly mode: AudioAdapterMode;

  constructor(
    private readonly device: PlaybackDevice,
    options: AudioPlayerOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.mode = options.mode ?? 'streaming';
  }

  /**
   * Create the playback pipeline. Every other call is a no-op until this runs.
   */
  async initialize(): Promise<boolean> {
    if (this.stream) {
      return true;
    }
    if (!this.enabled) {
      logger.warn('Audio playback disabled');
      return false;
    }

    const stream = new AudioStream(() => createAudioAdapter(this.device, this.mode));
    this.unsubscribers = [
      stream.on('ended', () => {
        this.isPlaying = false;
      }),
      stream.on('cleared', () => {
        this.isPlaying = false;
      }),
      stream.on('error', (error) => {
        logger.error('Audio playback error', error);
        this.isPlaying = false;
      }),
    ];
    this.stream = stream;

    logger.info('Audio playback initialized', { mode: this.mode });
    return true;
  }

  get isEnabled(): boolean {
    return this.enabled && this.stream !== null;
  }

  /**
   * Queue a chunk of PCM, raw or base64 encoded
   */
  enqueue(audio: Uint8Array | string): void {
    if (!this.stream) {
      return;
    }

    const bytes = typeof audio === 'string' ? decodeBase64Audio(audio) : audio;
    if (bytes.byteLength === 0) {
      logger.warn('Ignoring empty audio chunk');
      return;
    }

    this.stream.enqueue(bytes);
    this.isPlaying = true;
  }

  /**
   * Play out whatever is buffered and end the turn
   */
  flush(): void {
    this.stream?.flush();
  }

  /**
   * Interrupt: stop playback and drop buffered audio
   */
  clear(): void {
    this.stream?.clear();
    this.isPlaying = false;
  }

  stop(): void {
    this.clear();
  }

  /**
   * Prepare for a new response stream
   */
  reset(): void {
    this.clear();
  }

  getIsPlaying(): boolean {
    return this.isPlaying;
  }

  /**
   * Cleanup. The player must be initialized again before reuse.
   */
  destroy(): void {
    this.clear();
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
    this.stream?.removeAllListeners();
    this.stream = null;
    logger.debug('Audio playback destroyed');
  }
}
