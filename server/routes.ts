import type { Express } from 'express';
import { createServer, type Server } from 'http';
import type { CommandDispatcher } from './command-dispatcher';
import { createConfigRouter } from './config-routes';
import { createLegacyRpcRouter } from './jsonrpc-routes';
import { createLibraryRouter } from './library-routes';
import type { MusicLibrary } from './music-library';
import type { PlayerRegistry } from './player-registry';
import { createPlayerRouter } from './player-routes';
import type { SettingsStore } from './settings-store';

export interface RouteServices {
  players: PlayerRegistry;
  dispatcher: CommandDispatcher;
  library: MusicLibrary;
  settings: SettingsStore;
}

export function registerRoutes(app: Express, services: RouteServices): Server {
  const { players, dispatcher, library, settings } = services;

  // Legacy JSON-RPC control surface
  app.use(createLegacyRpcRouter(dispatcher));

  app.use('/api/config', createConfigRouter(settings));

  app.use('/api/players', createPlayerRouter({ players, dispatcher, library }));

  // Library last: its /:mediaType routes match any single segment under /api
  app.use('/api', createLibraryRouter(library));

  return createServer(app);
}
