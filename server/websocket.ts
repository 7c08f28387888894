import WebSocket, { WebSocketServer } from 'ws';
import type { Server as HTTPServer } from 'http';
import type { Server as HTTPSServer } from 'https';
import type { IncomingMessage } from 'http';
import { ConnectionSession, type SessionServices } from './connection-session';
import { createLogger } from './logger';

const wsLogger = createLogger('WebSocket');

interface ClientData {
  session: ConnectionSession;
  isAlive: boolean;
  missedPings: number;
}

export interface WebSocketOptions {
  path?: string;
  heartbeatIntervalMs?: number;
  /** Missed pongs tolerated before the client is terminated. */
  maxMissedPings?: number;
}

/**
 * Write one text frame, resolving once ws has handed it to the socket.
 * Fails fast when the socket is no longer open instead of queueing.
 */
export function sendText(ws: WebSocket, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (ws.readyState !== WebSocket.OPEN) {
      reject(new Error('socket is not open'));
      return;
    }
    ws.send(text, (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Attach the gateway socket endpoint to an HTTP(S) server.
 *
 * Every connection gets a ConnectionSession, which registers with the
 * listener registry for as long as the connection lives. Use
 * closeWebSocketServer() to shut down: it terminates the clients, and their
 * sessions release their subscriptions through the normal close path.
 */
export function setupWebSocket(
  httpServer: HTTPServer | HTTPSServer,
  services: SessionServices,
  options: WebSocketOptions = {}
): WebSocketServer {
  const path = options.path ?? '/ws';
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;
  const maxMissedPings = options.maxMissedPings ?? 2;

  const wss = new WebSocketServer({ server: httpServer, path });
  const clients = new Map<WebSocket, ClientData>();

  const heartbeatInterval = setInterval(() => {
    clients.forEach((clientData, ws) => {
      if (!clientData.isAlive) {
        clientData.missedPings++;
        wsLogger.debug(
          `${clientData.session.label} missed heartbeat (${clientData.missedPings}/${maxMissedPings})`
        );

        if (clientData.missedPings >= maxMissedPings) {
          wsLogger.info(`${clientData.session.label} failed multiple heartbeats, terminating`);
          ws.terminate();
          return;
        }
      } else {
        clientData.missedPings = 0;
      }

      clientData.isAlive = false;
      ws.ping();
    });
  }, heartbeatIntervalMs);
  heartbeatInterval.unref();

  wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
    const label = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
    const session = new ConnectionSession({ send: (text) => sendText(ws, text) }, services, label);
    clients.set(ws, { session, isAlive: true, missedPings: 0 });
    wsLogger.info(`Client connected from ${label}`);

    ws.on('pong', () => {
      const client = clients.get(ws);
      if (client) {
        client.isAlive = true;
        client.missedPings = 0;
      }
    });

    ws.on('message', (data, isBinary) => {
      session.receive(data, isBinary);
    });

    ws.on('close', () => {
      session.close('peer disconnected');
    });

    ws.on('error', (error: Error) => {
      wsLogger.error(`Client ${label} error`, error);
      session.fail(error);
      ws.terminate();
    });

    session
      .run()
      .then((end) => {
        if (end.error !== undefined) {
          wsLogger.warn(`Client ${label} session ended: ${end.reason}`);
        } else {
          wsLogger.info(`Client ${label} disconnected`);
        }
      })
      .catch((error: unknown) => {
        wsLogger.error(`Client ${label} session crashed`, error);
      })
      .finally(() => {
        clients.delete(ws);
      });
  });

  wss.on('error', (error: Error) => {
    wsLogger.error('WebSocket server error', error);
  });

  wss.on('close', () => {
    clearInterval(heartbeatInterval);
    clients.clear();
  });

  wsLogger.info(`WebSocket server initialized at ${path}`);
  return wss;
}

/**
 * Terminate every client, then close the server. ws only emits 'close' once
 * the last client is gone, so the clients have to go first.
 */
export function closeWebSocketServer(wss: WebSocketServer): Promise<void> {
  wsLogger.info(`Terminating ${wss.clients.size} client connections...`);
  wss.clients.forEach((client) => {
    client.terminate();
  });

  return new Promise((resolve, reject) => {
    wss.close((error) => (error ? reject(error) : resolve()));
  });
}
