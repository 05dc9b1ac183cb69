import { SocketReceiver } from '../../src/lib/websocket/client/socket-receiver';
import { createWebSocketConfig } from '../../src/lib/websocket/config/websocket-config';
import { TransportClosedDuringReadError } from '../../src/lib/utils/errors';
import { FakeTransport } from '../helpers/fake-transport';
import { collect, sleep } from '../helpers/wait';

async function openTransport(): Promise<FakeTransport> {
  const transport = new FakeTransport();
  await transport.open(new AbortController().signal);
  return transport;
}

describe('SocketReceiver', () => {
  const receiver = new SocketReceiver(createWebSocketConfig({ receiveBufferSize: 4 }));

  describe('createReceiveStream', () => {
    test('reassembles fragmented messages in order', async () => {
      const transport = await openTransport();
      transport.pushMessage('hello world');
      transport.pushMessage('{"a":1}');
      transport.pushClose();

      await expect(collect(receiver.createReceiveStream(transport))).resolves.toEqual(['hello world', '{"a":1}']);
    });

    test('decodes multi-byte characters split across fragments', async () => {
      const narrow = new SocketReceiver(createWebSocketConfig({ receiveBufferSize: 3 }));
      const transport = await openTransport();
      transport.pushMessage('héllo wörld ✓');
      transport.pushClose();

      await expect(collect(narrow.createReceiveStream(transport))).resolves.toEqual(['héllo wörld ✓']);
    });

    test('yields empty messages', async () => {
      const transport = await openTransport();
      transport.pushMessage('');
      transport.pushClose();

      await expect(collect(receiver.createReceiveStream(transport))).resolves.toEqual(['']);
    });

    test('completes without error on a close frame', async () => {
      const transport = await openTransport();
      transport.pushClose(1001, 'going away');

      await expect(collect(receiver.createReceiveStream(transport))).resolves.toEqual([]);
    });

    test('completes without error when cancelled mid-read', async () => {
      const transport = await openTransport();
      const controller = new AbortController();
      const collecting = collect(receiver.createReceiveStream(transport, controller.signal));

      transport.pushMessage('first');
      await sleep(5);
      controller.abort();

      await expect(collecting).resolves.toEqual(['first']);
    });

    test('yields nothing when the connection is not open', async () => {
      const transport = new FakeTransport();
      transport.pushMessage('never read');

      await expect(collect(receiver.createReceiveStream(transport))).resolves.toEqual([]);
    });

    test('propagates other transport errors', async () => {
      const transport = await openTransport();
      transport.pushMessage('ok');
      transport.failReceive(new Error('socket reset'));

      const received: string[] = [];
      const consume = async () => {
        for await (const message of receiver.createReceiveStream(transport)) {
          received.push(message);
        }
      };

      await expect(consume()).rejects.toThrow('socket reset');
      expect(received).toEqual(['ok']);
    });
  });

  describe('receiveOne', () => {
    test('returns one complete message', async () => {
      const transport = await openTransport();
      transport.pushMessage('{"type":"connection_status","message":"Connected"}');
      transport.pushMessage('second');

      await expect(receiver.receiveOne(transport, new AbortController().signal)).resolves.toBe(
        '{"type":"connection_status","message":"Connected"}'
      );
    });

    test('fails with TransportClosedDuringReadError on a close frame', async () => {
      const transport = await openTransport();
      transport.pushClose();

      const read = receiver.receiveOne(transport, new AbortController().signal);
      await expect(read).rejects.toBeInstanceOf(TransportClosedDuringReadError);
      await expect(read).rejects.toThrow('Connection closed during receive');
    });

    test('fails with an AbortError when cancelled', async () => {
      const transport = await openTransport();
      const controller = new AbortController();
      const read = receiver.receiveOne(transport, controller.signal);

      controller.abort();

      await expect(read).rejects.toMatchObject({ name: 'AbortError' });
    });

    test('fails with an AbortError for an already aborted signal', async () => {
      const transport = await openTransport();
      transport.pushMessage('unread');

      await expect(receiver.receiveOne(transport, AbortSignal.abort())).rejects.toMatchObject({ name: 'AbortError' });
    });
  });
});
