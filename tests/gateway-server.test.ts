import { once } from 'events';
import { afterEach, describe, expect, it } from 'vitest';
import { WebSocket, type RawData } from 'ws';
import { GatewayServer } from '../src/gateway/server.js';
import type { SessionManager } from '../src/session/session-manager.js';
import { waitFor } from './helpers/fake-gdb.js';
import { createTestManager } from './helpers/manager.js';

interface WireMessage {
  type: string;
  session_id?: string;
  [key: string]: unknown;
}

function isWireMessage(value: unknown): value is WireMessage {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

class TestClient {
  readonly received: WireMessage[] = [];

  private constructor(readonly ws: WebSocket) {
    ws.on('message', (data: RawData) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (isWireMessage(parsed)) {
        this.received.push(parsed);
      }
    });
  }

  static async open(url: string): Promise<TestClient> {
    const client = new TestClient(new WebSocket(url));
    await once(client.ws, 'open');
    return client;
  }

  ofType(type: string): WireMessage[] {
    return this.received.filter((message) => message.type === type);
  }

  async message(type: string, index = 0): Promise<WireMessage> {
    await waitFor(() => this.ofType(type).length > index);
    return this.ofType(type)[index];
  }

  send(message: Record<string, unknown>): void {
    this.ws.send(JSON.stringify(message));
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return;
    }
    const closed = once(this.ws, 'close');
    this.ws.close();
    await closed;
  }
}

interface Running {
  manager: SessionManager;
  server: GatewayServer;
  url: string;
  port: number;
}

const running: Running[] = [];
const clients: TestClient[] = [];

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.close()));
  for (const { server, manager } of running.splice(0)) {
    await server.stop();
    await manager.shutdown();
  }
});

async function startGateway(gracePeriodMs = 50) {
  const { manager, spawner } = createTestManager();
  const server = new GatewayServer(manager, { host: '127.0.0.1', port: 0, gracePeriodMs });
  const { port, url } = await server.start();
  running.push({ manager, server, url, port });
  return { manager, spawner, server, url, port };
}

async function openClient(url: string): Promise<TestClient> {
  const client = await TestClient.open(url);
  clients.push(client);
  return client;
}

async function health(port: number): Promise<unknown> {
  const response = await fetch(`http://127.0.0.1:${port}/health`);
  return response.json();
}

async function waitForClients(port: number, count: number): Promise<void> {
  for (let attempt = 0; attempt < 200; attempt++) {
    const body = await health(port);
    if (typeof body === 'object' && body !== null && 'clients' in body && body.clients === count) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error(`Gateway never reached ${count} client(s)`);
}

describe('GatewayServer', () => {
  it('binds a free port and serves the websocket endpoint', async () => {
    const { url, port } = await startGateway();

    expect(port).toBeGreaterThan(0);
    expect(url).toBe(`ws://127.0.0.1:${port}/ws`);

    const client = await openClient(url);
    const ready = await client.message('session_ready');

    expect(ready).toMatchObject({ resumed: false, state: 'idle' });
    expect(typeof ready.session_id).toBe('string');
    expect(typeof ready.timestamp).toBe('string');
  });

  it('round-trips a connect request', async () => {
    const { url, spawner } = await startGateway();
    const client = await openClient(url);
    const ready = await client.message('session_ready');

    client.send({ type: 'connect_target', request_id: 'c', target: 'localhost:1234' });
    const result = await client.message('connect_result');

    expect(result).toMatchObject({ request_id: 'c', session_id: ready.session_id, state: 'connected', success: true });
    expect(spawner.processes[0].commands).toEqual(['-target-select remote localhost:1234']);
  });

  it('reports health', async () => {
    const { url, port } = await startGateway();
    await openClient(url);
    await waitForClients(port, 1);

    expect(await health(port)).toEqual({ status: 'ok', sessions: 1, clients: 1 });
  });

  it('answers unknown paths with 404', async () => {
    const { port } = await startGateway();

    const response = await fetch(`http://127.0.0.1:${port}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('tears an abandoned session down after the grace period', async () => {
    const { url, manager, spawner } = await startGateway(50);
    const client = await openClient(url);
    const ready = await client.message('session_ready');
    client.send({ type: 'connect_target', target: 'localhost:1234' });
    await client.message('connect_result');
    const sessionId = String(ready.session_id);

    await client.close();

    await waitFor(() => !manager.hasSession(sessionId));
    expect(spawner.processes[0].signals).toEqual(['SIGTERM']);
  });

  it('lets a client resume its session within the grace period', async () => {
    const { url, port, manager, spawner } = await startGateway(300);
    const first = await openClient(url);
    const ready = await first.message('session_ready');
    first.send({ type: 'connect_target', target: 'localhost:1234' });
    await first.message('connect_result');
    const sessionId = String(ready.session_id);

    await first.close();
    await waitForClients(port, 0);

    const second = await openClient(`${url}?session=${sessionId}`);
    const resumed = await second.message('session_ready');
    expect(resumed).toMatchObject({ session_id: sessionId, resumed: true, state: 'connected' });

    await new Promise((resolve) => setTimeout(resolve, 400));
    expect(manager.hasSession(sessionId)).toBe(true);
    expect(spawner.processes[0].signals).toEqual([]);

    second.send({ type: 'get_status', request_id: 1 });
    expect(await second.message('status_result')).toMatchObject({
      success: true,
      session: { id: sessionId, state: 'connected' }
    });
  });

  it('gives a new session to a client asking for one that is still owned', async () => {
    const { url } = await startGateway();
    const owner = await openClient(url);
    const ready = await owner.message('session_ready');

    const intruder = await openClient(`${url}?session=${String(ready.session_id)}`);
    const other = await intruder.message('session_ready');

    expect(other.resumed).toBe(false);
    expect(other.session_id).not.toBe(ready.session_id);
  });

  it('ignores unknown session ids', async () => {
    const { url } = await startGateway();

    const client = await openClient(`${url}?session=does-not-exist`);
    const ready = await client.message('session_ready');

    expect(ready.resumed).toBe(false);
    expect(ready.session_id).not.toBe('does-not-exist');
  });

  it('closes clients when stopped', async () => {
    const { url, server } = await startGateway();
    const client = await openClient(url);
    await client.message('session_ready');
    const closed = once(client.ws, 'close');

    await server.stop();

    const [code] = await closed;
    expect(code).toBe(1001);
  });
});
