/**
 * AudioStream
 * Ordered playback buffer for one response turn, with interruption.
 *
 * Chunks reach the adapter strictly in enqueue order, one append at a time.
 * `clear()` stops the pipeline and tears the adapter down immediately; a
 * chunk enqueued afterwards starts a fresh adapter.
 */

import { EventEmitter } from '../websocket/events/event-emitter';
import { logger } from '../utils/logger';
import { isAbortError } from '../utils/abort';
import { PlaybackAdapterError, toError } from '../utils/errors';
import type { AudioAdapter, AudioAdapterFactory } from './adapters/types';

export type AudioStreamEvents = {
  /** Playback of the turn finished naturally */
  ended: void;
  /** The turn was interrupted or torn down after an error */
  cleared: void;
  error: PlaybackAdapterError;
};

export class AudioStream extends EventEmitter<AudioStreamEvents> {
  private adapter: AudioAdapter | null = null;
  private adapterSubscriptions: Array<() => void> = [];
  private pipeline: AbortController | null = null;
  private queue: Uint8Array[] = [];
  private pending = 0;
  private flushing = false;
  private draining = false;
  private endSignalled = false;

  constructor(private readonly createAdapter: AudioAdapterFactory) {
    super();
  }

  get pendingCount(): number {
    return this.pending;
  }

  get isFlushing(): boolean {
    return this.flushing;
  }

  get hasAdapter(): boolean {
    return this.adapter !== null;
  }

  enqueue(chunk: Uint8Array): void {
    const adapter = this.ensureAdapter();
    this.pending++;
    this.queue.push(chunk);

    if (!this.draining) {
      this.startDrain(adapter);
    }
  }

  /**
   * Mark the turn complete. The adapter is ended once every pending chunk
   * has been appended.
   */
  flush(): void {
    const adapter = this.adapter;
    if (!adapter) {
      return;
    }
    this.flushing = true;
    if (this.pending === 0) {
      this.endAdapter(adapter);
    }
  }

  /**
   * Interrupt playback and drop everything buffered. Safe at any point.
   */
  clear(): void {
    this.teardown();
    this.emit('cleared', undefined);
  }

  private ensureAdapter(): AudioAdapter {
    if (this.adapter) {
      return this.adapter;
    }

    const adapter = this.createAdapter();
    this.adapter = adapter;
    this.pipeline = new AbortController();
    this.adapterSubscriptions = [
      adapter.on('ended', () => this.handleAdapterEnded(adapter)),
      adapter.on('error', (error) => this.handleAdapterError(adapter, error)),
    ];
    logger.debug('Audio adapter created');
    return adapter;
  }

  private startDrain(adapter: AudioAdapter): void {
    const pipeline = this.pipeline;
    if (!pipeline) {
      return;
    }
    const signal = pipeline.signal;
    this.draining = true;

    this.drain(adapter, signal).catch((error) => {
      if (signal.aborted || isAbortError(error)) {
        return;
      }
      this.draining = false;
      this.handleAdapterError(adapter, toError(error));
    });
  }

  private async drain(adapter: AudioAdapter, signal: AbortSignal): Promise<void> {
    if (!adapter.isReady) {
      await adapter.waitFor('ready', signal);
    }

    for (;;) {
      if (signal.aborted) {
        return;
      }

      const chunk = this.queue.shift();
      if (!chunk) {
        this.draining = false;
        return;
      }

      await adapter.append(chunk);

      // Cleared mid-append: this pipeline is dead, leave state alone
      if (signal.aborted) {
        return;
      }

      this.pending--;
      if (this.flushing && this.pending === 0) {
        this.endAdapter(adapter);
      }
    }
  }

  private endAdapter(adapter: AudioAdapter): void {
    if (this.endSignalled) {
      return;
    }
    this.endSignalled = true;
    adapter.end();
  }

  private handleAdapterEnded(adapter: AudioAdapter): void {
    if (this.adapter !== adapter) {
      return;
    }
    this.teardown();
    this.emit('ended', undefined);
  }

  private handleAdapterError(adapter: AudioAdapter, error: Error): void {
    if (this.adapter !== adapter) {
      return;
    }
    logger.error('Audio adapter failed', error);
    this.emit('error', new PlaybackAdapterError(`Playback failed: ${error.message}`, error));
    this.clear();
  }

  private teardown(): void {
    this.pipeline?.abort();
    this.pipeline = null;

    this.adapterSubscriptions.forEach((unsubscribe) => unsubscribe());
    this.adapterSubscriptions = [];

    const adapter = this.adapter;
    this.adapter = null;
    this.queue = [];
    this.pending = 0;
    this.flushing = false;
    this.draining = false;
    this.endSignalled = false;

    if (adapter) {
      try {
        adapter.dispose();
      } catch (error) {
        logger.warn('Error disposing audio adapter', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
