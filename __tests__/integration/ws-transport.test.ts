import { WebSocketServer, type WebSocket } from 'ws';
import { WebSocketClient } from '../../src/lib/websocket/manager/websocket-client';
import { createWebSocketConfig, type WebSocketConfig } from '../../src/lib/websocket/config/websocket-config';
import { DEFAULT_CHAT_SETTINGS } from '../../src/lib/chat/settings';
import type { ChatEvent } from '../../src/lib/websocket/events/chat-events';
import { waitUntil } from '../helpers/wait';

function portOf(server: WebSocketServer): number {
  const address = server.address();
  if (typeof address === 'string' || !address) {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

/**
 * In-process chat server: greets every connection and answers each
 * chat_request with one text chunk and a completion.
 */
class ChatServer {
  readonly requests: Array<Record<string, unknown>> = [];
  readonly closes: Array<{ code: number; reason: string }> = [];
  readonly sockets: WebSocket[] = [];
  reply: (message: string) => string = (message) => `Echo: ${message}`;

  private constructor(private readonly server: WebSocketServer) {
    server.on('connection', (socket) => {
      this.sockets.push(socket);
      socket.send(JSON.stringify({ type: 'connection_status', message: 'Connected' }));

      socket.on('message', (data) => {
        const request: Record<string, unknown> = JSON.parse(data.toString());
        this.requests.push(request);
        socket.send(JSON.stringify({ type: 'text_chunk', chunk: this.reply(String(request.message)) }));
        socket.send(JSON.stringify({ type: 'complete' }));
      });
      socket.on('close', (code, reason) => {
        this.closes.push({ code, reason: reason.toString() });
      });
    });
  }

  static async start(): Promise<ChatServer> {
    const server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    return new ChatServer(server);
  }

  get uri(): string {
    return `ws://127.0.0.1:${portOf(this.server)}/api/v1/ws/chat`;
  }

  async stop(): Promise<void> {
    this.server.clients.forEach((socket) => socket.terminate());
    await new Promise<void>((resolve, reject) => this.server.close((error) => (error ? reject(error) : resolve())));
  }
}

describe('WebSocketClient over ws', () => {
  let server: ChatServer;
  let client: WebSocketClient;
  let events: ChatEvent[];

  function createClient(overrides: Partial<WebSocketConfig> = {}): WebSocketClient {
    const config = createWebSocketConfig({
      pingInterval: 0,
      reconnectBaseDelay: 5,
      reconnectMaxDelay: 20,
      maxReconnectAttempts: 1,
      infiniteReconnect: false,
      ...overrides,
    });
    client = new WebSocketClient({ ...DEFAULT_CHAT_SETTINGS, serverUri: server.uri }, { config });
    events = [];
    client.events.subscribe((event) => events.push(event));
    return client;
  }

  function texts(): string[] {
    return events.flatMap((event) => (event.type === 'text_chunk_received' ? [event.text] : []));
  }

  beforeEach(async () => {
    server = await ChatServer.start();
    createClient();
  });

  afterEach(async () => {
    await client.dispose();
    await server.stop();
  });

  test('connects, sends a chat request and streams the reply', async () => {
    await expect(client.connect()).resolves.toBe(true);

    await client.send('hello');
    await waitUntil(() => events.some((event) => event.type === 'response_completed'));

    expect(server.requests).toHaveLength(1);
    expect(server.requests[0]).toMatchObject({ type: 'chat_request', user_id: 'User', message: 'hello' });
    expect(texts()).toEqual(['Echo: hello']);
    expect(events.find((event) => event.type === 'status_message_received')).toMatchObject({ message: 'Connected' });
  });

  test('reassembles messages larger than the receive buffer', async () => {
    createClient({ receiveBufferSize: 16 });
    server.reply = () => 'x'.repeat(100);
    await client.connect();

    await client.send('long');
    await waitUntil(() => events.some((event) => event.type === 'response_completed'));

    expect(texts()).toEqual(['x'.repeat(100)]);
  });

  test('closes with a normal close frame on disconnect', async () => {
    await client.connect();

    await client.disconnect();
    await waitUntil(() => server.closes.length === 1);

    expect(server.closes[0]).toEqual({ code: 1000, reason: 'Closing' });
    expect(client.getState()).toBe('disconnected');
  });

  test('reconnects when the server drops the connection', async () => {
    await client.connect();

    server.sockets[0].close(1001, 'restarting');
    await waitUntil(() => server.sockets.length === 2 && client.getState() === 'connected');

    await client.send('again');
    await waitUntil(() => texts().includes('Echo: again'));
  });
});
