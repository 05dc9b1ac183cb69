/**
 * BufferedWavAdapter
 * Collects a whole turn of PCM and plays it as one WAV file on end()
 */

import { logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import { createWav, DEFAULT_PCM_FORMAT } from '../pcm-utils';
import { AudioAdapter, type AudioFormat, type PlaybackDevice } from './types';

const WAV_FORMAT: AudioFormat = { container: 'wav', ...DEFAULT_PCM_FORMAT };

export class BufferedWavAdapter extends AudioAdapter {
  private chunks: Uint8Array[] = [];
  private ending = false;

  constructor(private readonly device: PlaybackDevice) {
    super();
    queueMicrotask(() => this.markReady());
  }

  async append(chunk: Uint8Array): Promise<void> {
    if (this.disposed || this.ending) {
      return;
    }
    this.chunks.push(chunk);
  }

  end(): void {
    if (this.disposed || this.ending) {
      return;
    }
    this.ending = true;

    // Nothing buffered: end right away
    if (this.chunks.length === 0) {
      queueMicrotask(() => this.notifyEnded());
      return;
    }

    const wav = createWav(this.chunks);
    this.chunks = [];
    logger.debug('Playing buffered WAV', { bytes: wav.byteLength });

    this.device
      .write(wav, WAV_FORMAT)
      .then(() => this.device.drain())
      .then(() => this.notifyEnded())
      .catch((error) => {
        this.notifyError(toError(error));
      });
  }

  protected release(): void {
    this.chunks = [];
    this.device.stop();
  }
}
