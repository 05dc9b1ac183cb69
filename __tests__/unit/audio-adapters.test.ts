import { Writable } from 'node:stream';
import { StreamingAudioAdapter } from '../../src/lib/audio/adapters/streaming-adapter';
import { BufferedWavAdapter } from '../../src/lib/audio/adapters/buffered-wav-adapter';
import { createAudioAdapter } from '../../src/lib/audio/adapters/factory';
import { WritablePlaybackDevice } from '../../src/lib/audio/adapters/writable-device';
import type { AudioFormat } from '../../src/lib/audio/adapters/types';
import { FakePlaybackDevice } from '../helpers/fake-device';

const RAW: AudioFormat = { container: 'raw', sampleRate: 24000, channels: 1, bitsPerSample: 16 };

describe('StreamingAudioAdapter', () => {
  test('becomes ready asynchronously', async () => {
    const adapter = new StreamingAudioAdapter(new FakePlaybackDevice());

    expect(adapter.isReady).toBe(false);
    await Promise.resolve();
    expect(adapter.isReady).toBe(true);
  });

  test('writes raw chunks to the device as they are appended', async () => {
    const device = new FakePlaybackDevice();
    const adapter = new StreamingAudioAdapter(device);

    await adapter.append(new Uint8Array([1, 2]));
    await adapter.append(new Uint8Array([3, 4]));

    expect(device.writes.map((write) => Array.from(write.bytes))).toEqual([[1, 2], [3, 4]]);
    expect(device.writes[0].format).toEqual(RAW);
  });

  test('reports ended once the device drains', async () => {
    const device = new FakePlaybackDevice();
    const adapter = new StreamingAudioAdapter(device);
    const ended = adapter.waitFor('ended');

    adapter.end();

    await ended;
    expect(device.drainCalls).toBe(1);
  });

  test('reports drain failures on the error channel', async () => {
    const device = new FakePlaybackDevice();
    device.drainError = new Error('device unplugged');
    const adapter = new StreamingAudioAdapter(device);
    const failed = adapter.waitFor('error');

    adapter.end();

    await expect(failed).resolves.toMatchObject({ message: 'device unplugged' });
  });

  test('stops the device on dispose and ignores later appends', async () => {
    const device = new FakePlaybackDevice();
    const adapter = new StreamingAudioAdapter(device);

    adapter.dispose();
    adapter.dispose();
    await adapter.append(new Uint8Array([1]));

    expect(device.stopCalls).toBe(1);
    expect(device.writes).toHaveLength(0);
  });
});

describe('BufferedWavAdapter', () => {
  test('plays the whole turn as one WAV file on end', async () => {
    const device = new FakePlaybackDevice();
    const adapter = new BufferedWavAdapter(device);
    const ended = adapter.waitFor('ended');

    await adapter.append(new Uint8Array([1, 2]));
    await adapter.append(new Uint8Array([3]));
    expect(device.writes).toHaveLength(0);

    adapter.end();
    await ended;

    expect(device.writes).toHaveLength(1);
    const { bytes, format } = device.writes[0];
    expect(format.container).toBe('wav');
    expect(bytes.byteLength).toBe(47);
    expect(Buffer.from(bytes).toString('ascii', 0, 4)).toBe('RIFF');
    expect(Array.from(bytes.subarray(44))).toEqual([1, 2, 3]);
    expect(device.drainCalls).toBe(1);
  });

  test('ends without writing when nothing was buffered', async () => {
    const device = new FakePlaybackDevice();
    const adapter = new BufferedWavAdapter(device);
    const ended = adapter.waitFor('ended');

    adapter.end();
    await ended;

    expect(device.writes).toHaveLength(0);
  });
});

describe('createAudioAdapter', () => {
  test('creates the adapter for the requested mode', () => {
    const device = new FakePlaybackDevice();

    expect(createAudioAdapter(device)).toBeInstanceOf(StreamingAudioAdapter);
    expect(createAudioAdapter(device, 'buffered')).toBeInstanceOf(BufferedWavAdapter);
  });
});

describe('WritablePlaybackDevice', () => {
  test('waits for the output to drain under backpressure', async () => {
    const received: Buffer[] = [];
    const output = new Writable({
      highWaterMark: 4,
      write(data: Buffer, _encoding, callback) {
        received.push(Buffer.from(data));
        setTimeout(callback, 5);
      },
    });
    const device = new WritablePlaybackDevice(output);

    await device.write(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]), RAW);
    await device.drain();

    expect(Array.from(Buffer.concat(received))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(output.writableNeedDrain).toBe(false);
  });

  test('stop releases a write blocked on backpressure', async () => {
    const output = new Writable({
      highWaterMark: 1,
      write(_data: Buffer, _encoding, _callback) {
        // never completes
      },
    });
    const device = new WritablePlaybackDevice(output);

    const blocked = device.write(new Uint8Array([1, 2]), RAW);
    device.stop();

    await expect(blocked).resolves.toBeUndefined();
  });

  test('stop leaves bytes the output already accepted with the output', async () => {
    const output = new Writable({
      highWaterMark: 1,
      write(_data: Buffer, _encoding, _callback) {
        // never completes
      },
    });
    const device = new WritablePlaybackDevice(output);

    const blocked = device.write(new Uint8Array([1, 2]), RAW);
    device.stop();
    await blocked;

    expect(output.destroyed).toBe(false);
    expect(output.writableLength).toBe(2);
  });

  test('rejects writes once the output has failed', async () => {
    const output = new Writable({
      write(_data: Buffer, _encoding, callback) {
        callback();
      },
    });
    const device = new WritablePlaybackDevice(output);

    output.destroy(new Error('device gone'));
    await new Promise((resolve) => setImmediate(resolve));

    await expect(device.write(new Uint8Array([1]), RAW)).rejects.toThrow('device gone');
  });
});
