/**
 * Playback Adapter Types
 * The capability the audio buffer drives, and the device underneath it
 */

import { EventEmitter } from '../../websocket/events/event-emitter';
import type { PcmFormat } from '../pcm-utils';

export interface AudioFormat extends PcmFormat {
  container: 'raw' | 'wav';
}

/**
 * Injected output. Raw PCM or a complete WAV file is written to it.
 */
export interface PlaybackDevice {
  write(bytes: Uint8Array, format: AudioFormat): Promise<void>;
  /** Resolves once everything written so far has been played out */
  drain(): Promise<void>;
  /** Stop waiting on playback. Releases any write or drain still pending. */
  stop(): void;
}

export type AudioAdapterEvents = {
  ready: void;
  ended: void;
  error: Error;
};

export type AudioAdapterMode = 'streaming' | 'buffered';

/**
 * One turn of playback. An adapter is used once and then disposed.
 */
export abstract class AudioAdapter extends EventEmitter<AudioAdapterEvents> {
  private readyFlag = false;
  protected disposed = false;

  get isReady(): boolean {
    return this.readyFlag;
  }

  abstract append(chunk: Uint8Array): Promise<void>;

  /** Signal end-of-stream; `ended` follows once playback finishes */
  abstract end(): void;

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.release();
    this.removeAllListeners();
  }

  protected abstract release(): void;

  protected markReady(): void {
    if (this.disposed || this.readyFlag) {
      return;
    }
    this.readyFlag = true;
    this.emit('ready', undefined);
  }

  protected notifyEnded(): void {
    if (!this.disposed) {
      this.emit('ended', undefined);
    }
  }

  protected notifyError(error: Error): void {
    if (!this.disposed) {
      this.emit('error', error);
    }
  }
}

export type AudioAdapterFactory = () => AudioAdapter;
