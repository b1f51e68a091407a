import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { type Duplex } from 'node:stream';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { errorMessage, type SafeLogger } from '@roomcast/shared';
import { Connection, type ConnectionOptions, type Transport } from './connection';
import { type BroadcastContext } from './context';

export const CHAT_PATH = '/ws/chat';

export interface GatewayOptions {
  port: number;
  host: string;
  maxFrameBytes: number;
  connection: ConnectionOptions;
  context: BroadcastContext;
  logger: SafeLogger;
}

export class WsTransport implements Transport {
  constructor(private readonly ws: WebSocket) {}

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new Error('WebSocket is not open'));
        return;
      }
      this.ws.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  ping(): void {
    this.ws.ping();
  }

  close(code = 1000, reason?: string): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(code, reason);
    }
  }

  terminate(): void {
    this.ws.terminate();
  }
}

export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export function createGateway(options: GatewayOptions): {
  server: Server;
  start: () => Promise<void>;
  stop: () => Promise<void>;
} {
  const { port, host, maxFrameBytes, context, logger } = options;
  const connections = new Set<Connection>();
  const wss = new WebSocketServer({ noServer: true, maxPayload: maxFrameBytes });

  function handleHttp(req: IncomingMessage, res: ServerResponse): void {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (req.method === 'GET' && path === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          status: 'ok',
          ...context.broadcaster.stats(),
          timestamp: new Date().toISOString(),
        }),
      );
      return;
    }
    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ code: 'NOT_FOUND', message: 'Not found' }));
  }

  function attach(ws: WebSocket): void {
    const conn = new Connection(new WsTransport(ws), context.broadcaster, options.connection, logger);
    connections.add(conn);
    logger.info({ connectionId: conn.connectionId }, 'WebSocket connection opened');

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        logger.warn({ connectionId: conn.connectionId }, 'Dropping binary frame');
        return;
      }
      conn.receive(rawDataToString(data)).catch((err) => {
        logger.error({ connectionId: conn.connectionId, err: errorMessage(err) }, 'Inbound pump failed');
      });
    });
    ws.on('pong', () => conn.handlePong());
    ws.on('close', (code) => {
      connections.delete(conn);
      conn.handleClose(code);
    });
    ws.on('error', (err) => {
      logger.warn({ connectionId: conn.connectionId, err: err.message }, 'WebSocket error');
      connections.delete(conn);
      conn.handleClose();
    });

    conn.start().catch((err) => {
      logger.error({ connectionId: conn.connectionId, err: errorMessage(err) }, 'Outbound pump crashed');
    });
  }

  const server = createServer(handleHttp);
  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (path !== CHAT_PATH) {
      rejectUpgrade(socket, '404 Not Found');
      return;
    }
    wss.handleUpgrade(req, socket, head, attach);
  });

  return {
    server,
    start: () =>
      new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          logger.info({ host, port, path: CHAT_PATH }, 'Gateway listening');
          resolve();
        });
      }),
    stop: async () => {
      for (const conn of connections) {
        conn.handleClose(1001);
      }
      connections.clear();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve())),
      );
      logger.info({}, 'Gateway stopped');
    },
  };
}
