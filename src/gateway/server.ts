/**
 * Gateway Server
 *
 * HTTP server with a WebSocket endpoint. Each socket on `/ws` becomes a
 * GatewayConnection bound to one session. A client that drops keeps its
 * session for a grace period and may resume it with `/ws?session=<id>`;
 * otherwise the session is destroyed and its GDB process terminated.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { URL } from 'url';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { GatewayConnection } from './gateway.js';
import type { SessionManager } from '../session/session-manager.js';
import { createLogger } from '../logger.js';

export interface GatewayServerOptions {
  host: string;
  /** 0 picks a free port */
  port: number;
  gracePeriodMs: number;
  path?: string;
}

export class GatewayServer {
  private httpServer: Server;
  private wsServer: WebSocketServer;
  private connections: Map<WebSocket, GatewayConnection> = new Map();
  private orphaned: Map<string, ReturnType<typeof setTimeout>> = new Map();
  private closing = false;
  private stopping: Promise<void> | null = null;
  private readonly logger = createLogger('gateway-server');

  constructor(
    private readonly manager: SessionManager,
    private readonly options: GatewayServerOptions
  ) {
    this.httpServer = createServer((request, response) => this.handleHttpRequest(request, response));
    this.wsServer = new WebSocketServer({
      server: this.httpServer,
      path: options.path ?? '/ws'
    });

    this.wsServer.on('connection', (ws: WebSocket, request: IncomingMessage) => {
      this.handleConnection(ws, request);
    });
  }

  /**
   * Start listening and return the bound port and URL
   */
  async start(): Promise<{ port: number; url: string }> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(this.options.port, this.options.host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    const address = this.httpServer.address();
    if (!address || typeof address === 'string') {
      throw new Error('Failed to get server address');
    }

    const url = `ws://${this.options.host}:${address.port}${this.options.path ?? '/ws'}`;
    this.logger.info({ url }, 'gateway listening');
    return { port: address.port, url };
  }

  /**
   * Close every client and stop listening. Sessions are left to the
   * session manager's own shutdown.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.close();
    }
    return this.stopping;
  }

  private async close(): Promise<void> {
    this.closing = true;
    for (const timer of this.orphaned.values()) {
      clearTimeout(timer);
    }
    this.orphaned.clear();

    for (const [ws, connection] of this.connections) {
      connection.detach();
      ws.close(1001, 'Server shutting down');
    }
    this.connections.clear();

    await new Promise<void>((resolve) => {
      this.wsServer.close(() => resolve());
    });
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }

  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const resumeId = this.resumableSession(request);
    if (resumeId) {
      const timer = this.orphaned.get(resumeId);
      clearTimeout(timer);
      this.orphaned.delete(resumeId);
    }

    const connection = new GatewayConnection(
      this.manager,
      {
        send: (message) => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.send(JSON.stringify(message));
          }
        }
      },
      resumeId
    );
    this.connections.set(ws, connection);
    this.logger.info({ sessionId: connection.sessionId, resumed: resumeId !== undefined }, 'client connected');

    ws.on('message', (data: RawData) => {
      void connection.receive(data.toString());
    });

    ws.on('error', (error: Error) => {
      this.logger.warn({ err: error, sessionId: connection.sessionId }, 'websocket error');
    });

    ws.on('close', () => {
      connection.detach();
      this.connections.delete(ws);
      if (!this.closing) {
        this.scheduleTeardown(connection.sessionId);
      }
    });
  }

  /**
   * The session named in `?session=`, if it exists and no live client owns it
   */
  private resumableSession(request: IncomingMessage): string | undefined {
    const url = new URL(request.url ?? '/', 'http://localhost');
    const sessionId = url.searchParams.get('session');
    if (!sessionId || !this.manager.hasSession(sessionId)) {
      return undefined;
    }
    for (const connection of this.connections.values()) {
      if (connection.sessionId === sessionId) {
        return undefined;
      }
    }
    return sessionId;
  }

  private scheduleTeardown(sessionId: string): void {
    this.logger.info({ sessionId, gracePeriodMs: this.options.gracePeriodMs }, 'client gone, session orphaned');
    const timer = setTimeout(() => {
      this.orphaned.delete(sessionId);
      if (!this.manager.hasSession(sessionId)) {
        return;
      }
      this.manager.destroySession(sessionId).catch((error: unknown) => {
        this.logger.error({ err: error, sessionId }, 'failed to destroy orphaned session');
      });
    }, this.options.gracePeriodMs);
    this.orphaned.set(sessionId, timer);
  }

  private handleHttpRequest(request: IncomingMessage, response: ServerResponse): void {
    if (request.method === 'GET' && request.url === '/health') {
      response.writeHead(200, { 'Content-Type': 'application/json' });
      response.end(
        JSON.stringify({
          status: 'ok',
          sessions: this.manager.listSessions().length,
          clients: this.connections.size
        })
      );
      return;
    }
    response.writeHead(404, { 'Content-Type': 'application/json' });
    response.end(JSON.stringify({ error: 'Not found' }));
  }
}
