/**
 * StreamingAudioAdapter
 * Writes raw PCM chunks to the device as they arrive
 */

import { logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import { DEFAULT_PCM_FORMAT } from '../pcm-utils';
import { AudioAdapter, type AudioFormat, type PlaybackDevice } from './types';

const RAW_FORMAT: AudioFormat = { container: 'raw', ...DEFAULT_PCM_FORMAT };

export class StreamingAudioAdapter extends AudioAdapter {
  private ending = false;

  constructor(private readonly device: PlaybackDevice) {
    super();
    queueMicrotask(() => this.markReady());
  }

  async append(chunk: Uint8Array): Promise<void> {
    if (this.disposed || this.ending) {
      return;
    }
    await this.device.write(chunk, RAW_FORMAT);
  }

  end(): void {
    if (this.disposed || this.ending) {
      return;
    }
    this.ending = true;

    this.device
      .drain()
      .then(() => {
        logger.debug('Streaming playback finished');
        this.notifyEnded();
      })
      .catch((error) => {
        this.notifyError(toError(error));
      });
  }

  protected release(): void {
    this.device.stop();
  }
}
