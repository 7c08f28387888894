// Load environment variables from .env file FIRST before any other imports
import { config } from 'dotenv';
config();

import fs from 'fs';
import { createServer as createHttpsServer, type Server as HTTPSServer } from 'https';
import type { Server as HTTPServer } from 'http';
import express, { type NextFunction, type Request, type Response } from 'express';
import type { EventEnvelope } from '@shared/gateway-protocol';
import { CommandDispatcher } from './command-dispatcher';
import { loadGatewayConfig } from './config';
import { loadDemoData } from './demo-data';
import { ListenerRegistry } from './listener-registry';
import { createLogger, log, setLogLevel } from './logger';
import { MemMusicLibrary } from './music-library';
import { MemPlayerRegistry } from './player-registry';
import { registerRoutes } from './routes';
import { YamlSettingsStore } from './settings-store';
import { closeWebSocketServer, setupWebSocket } from './websocket';

const gatewayLogger = createLogger('Gateway');

const app = express();

// Settings values may be bare JSON scalars, so strict mode is off
app.use(express.json({ strict: false }));
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json.bind(res);
  res.json = (bodyJson?: unknown) => {
    capturedJsonResponse = bodyJson;
    return originalResJson(bodyJson);
  };

  res.on('finish', () => {
    const duration = Date.now() - start;
    if (path.startsWith('/api') || path === '/jsonrpc.js') {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + '…';
      }

      log(logLine);
    }
  });

  next();
});

function errorStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    if ('status' in err && typeof err.status === 'number') return err.status;
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  }
  return 500;
}

function listen(server: HTTPServer | HTTPSServer, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function closeServer(server: HTTPServer | HTTPSServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const gatewayConfig = loadGatewayConfig();
  setLogLevel(gatewayConfig.logLevel);

  const registry = new ListenerRegistry({ sendTimeoutMs: gatewayConfig.broadcastTimeoutMs });
  const publish = (envelope: EventEnvelope) => {
    registry
      .broadcast(envelope)
      .then((report) => {
        if (report.failed.length > 0) {
          gatewayLogger.warn(
            `"${envelope.message}" reached ${report.delivered} listeners, ${report.failed.length} failed`
          );
        }
      })
      .catch((error: unknown) => {
        gatewayLogger.error(`Broadcast of "${envelope.message}" failed`, error);
      });
  };

  const players = new MemPlayerRegistry();
  const library = new MemMusicLibrary();
  const settings = await YamlSettingsStore.load(gatewayConfig.settingsFile);

  if (gatewayConfig.demoMode) {
    const demo = loadDemoData(publish);
    for (const player of demo.players) {
      players.add(player);
      if (!settings.has('player_settings', player.id)) {
        settings.set('player_settings', player.id, { name: player.name, enabled: true });
      }
    }
    demo.items.forEach((item) => library.add(item));
    log(`🎭 DEMO MODE enabled: ${demo.players.length} players, ${demo.items.length} library items`);
  }

  const dispatcher = new CommandDispatcher(players);
  const httpServer = registerRoutes(app, { players, dispatcher, library, settings });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    gatewayLogger.error('Unhandled request error', err);
    if (res.headersSent) {
      return next(err);
    }
    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : 'Internal Server Error';
    res.status(status).json({ message });
  });

  const servers: (HTTPServer | HTTPSServer)[] = [httpServer];
  const sessionServices = { registry, dispatcher, players };
  const socketOptions = { heartbeatIntervalMs: gatewayConfig.heartbeatIntervalMs };
  const socketServers = [setupWebSocket(httpServer, sessionServices, socketOptions)];

  await listen(httpServer, gatewayConfig.httpPort, gatewayConfig.host);
  log(`serving HTTP on ${gatewayConfig.host}:${gatewayConfig.httpPort}`);

  if (gatewayConfig.tls) {
    const httpsServer = createHttpsServer(
      {
        cert: fs.readFileSync(gatewayConfig.tls.certificate),
        key: fs.readFileSync(gatewayConfig.tls.key),
      },
      app
    );
    servers.push(httpsServer);
    socketServers.push(setupWebSocket(httpsServer, sessionServices, socketOptions));
    await listen(httpsServer, gatewayConfig.httpsPort, gatewayConfig.host);
    const fqdn = gatewayConfig.certFqdnHost || gatewayConfig.host;
    log(`serving HTTPS on https://${fqdn}:${gatewayConfig.httpsPort}`);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`${signal} received, shutting down gracefully`);
    await Promise.all(socketServers.map((wss) => closeWebSocketServer(wss)));
    await Promise.all(servers.map((server) => closeServer(server)));
    log('Server closed');
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          gatewayLogger.error('Shutdown failed', error);
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  gatewayLogger.error('Failed to start gateway', error);
  process.exit(1);
});
