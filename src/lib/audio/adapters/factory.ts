/**
 * Audio adapter factory
 */

import { BufferedWavAdapter } from './buffered-wav-adapter';
import { StreamingAudioAdapter } from './streaming-adapter';
import type { AudioAdapter, AudioAdapterMode, PlaybackDevice } from './types';

export function createAudioAdapter(device: PlaybackDevice, mode: AudioAdapterMode = 'streaming'): AudioAdapter {
  switch (mode) {
    case 'buffered':
      return new BufferedWavAdapter(device);
    case 'streaming':
      return new StreamingAudioAdapter(device);
  }
}
