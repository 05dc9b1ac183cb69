/**
 * WritablePlaybackDevice
 * PlaybackDevice over a Node Writable (a speaker binding, a file, a pipe)
 */

import type { Writable } from 'node:stream';
import { logger } from '../../utils/logger';
import type { AudioFormat, PlaybackDevice } from './types';

export class WritablePlaybackDevice implements PlaybackDevice {
  private drainWaiters = new Set<() => void>();
  private failure: Error | null = null;

  constructor(private readonly output: Writable) {
    this.output.on('error', (error) => {
      logger.error('Playback output error', error);
      this.failure = error;
      this.releaseWaiters();
    });
  }

  /**
   * Honours backpressure: resolves once the output accepts more data.
   */
  async write(bytes: Uint8Array, format: AudioFormat): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    logger.debug('Writing audio', { bytes: bytes.byteLength, container: format.container });

    if (!this.output.write(bytes)) {
      await this.waitForDrain();
    }
    if (this.failure) {
      throw this.failure;
    }
  }

  async drain(): Promise<void> {
    if (this.output.writableNeedDrain) {
      await this.waitForDrain();
    }
    if (this.failure) {
      throw this.failure;
    }
  }

  /**
   * Releases pending writers. Bytes the output has already accepted are not
   * recalled; a sink that can discard its buffer must do so itself.
   */
  stop(): void {
    this.releaseWaiters();
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.output.off('drain', done);
        this.drainWaiters.delete(done);
        resolve();
      };
      this.drainWaiters.add(done);
      this.output.once('drain', done);
    });
  }

  private releaseWaiters(): void {
    const waiters = [...this.drainWaiters];
    this.drainWaiters.clear();
    waiters.forEach((release) => release());
  }
}
