/**
 * Player API Routes
 *
 * Listing, queue inspection, path-style commands and play_media for the
 * players known to the player registry. Commands go through the same
 * dispatcher the socket protocol uses.
 */

import { Router, type Response } from 'express';
import { z } from 'zod';
import type { DispatchFailureKind, ParseFailureKind } from '@shared/gateway-protocol';
import { isQueueOption, mediaTypeFromString, type QueueOption } from '@shared/player-types';
import type { CommandDispatcher } from './command-dispatcher';
import { parsePathCommand } from './command-normalizer';
import type { MusicLibrary } from './music-library';
import {
  listPlayersByName,
  playMedia,
  UnknownPlayerError,
  type PlayerRegistry,
} from './player-registry';

export interface PlayerRouteServices {
  players: PlayerRegistry;
  dispatcher: CommandDispatcher;
  library: MusicLibrary;
}

const FAILURE_STATUS: Record<DispatchFailureKind | ParseFailureKind, number> = {
  MalformedFrame: 400,
  CommandNotSupported: 400,
  UnknownCommand: 400,
  UnknownTarget: 404,
  InvocationFailed: 500,
};

const QueueQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const ProviderQuerySchema = z.object({
  provider: z.string().min(1).optional(),
});

function sendFailure(
  res: Response,
  error: DispatchFailureKind | ParseFailureKind,
  message: string
): Response {
  return res.status(FAILURE_STATUS[error]).json({ error, message });
}

export function createPlayerRouter(services: PlayerRouteServices): Router {
  const { players, dispatcher, library } = services;
  const router = Router();

  // Get all players, sorted by name
  router.get('/', async (_req, res) => {
    try {
      res.json(await listPlayersByName(players));
    } catch (error) {
      console.error('Error fetching players:', error);
      res.status(500).json({ error: 'Failed to fetch players' });
    }
  });

  // Get single player
  router.get('/:playerId', async (req, res) => {
    try {
      const player = await players.getPlayer(req.params.playerId);
      if (!player) {
        return res.status(404).json({ error: 'Player not found' });
      }
      res.json(player.summary());
    } catch (error) {
      console.error('Error fetching player:', error);
      res.status(500).json({ error: 'Failed to fetch player' });
    }
  });

  // Get a page of the player's queue
  router.get('/:playerId/queue', async (req, res) => {
    const queryResult = QueueQuerySchema.safeParse(req.query);
    if (!queryResult.success) {
      return res.status(400).json({
        error: 'Invalid query parameters',
        message: queryResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
      });
    }
    const { offset, limit } = queryResult.data;

    try {
      const player = await players.getPlayer(req.params.playerId);
      if (!player) {
        return res.status(404).json({ error: 'Player not found' });
      }
      res.json(player.queueItems().slice(offset, offset + limit));
    } catch (error) {
      console.error('Error fetching player queue:', error);
      res.status(500).json({ error: 'Failed to fetch player queue' });
    }
  });

  /**
   * GET /api/players/:playerId/cmd/:cmd[/:cmdArgs]
   *
   * Success answers 200 with the command's result (false when it has none).
   * Failures answer { error, message } with 400 / 404 / 500.
   */
  router.get('/:playerId/cmd/:cmd/:cmdArgs?', async (req, res) => {
    const { playerId, cmd, cmdArgs } = req.params;
    const parsed = parsePathCommand(playerId, cmd, cmdArgs);
    if (!parsed.ok) {
      return sendFailure(res, parsed.error, parsed.reason);
    }

    const result = await dispatcher.dispatchCommand(parsed.value);
    if (!result.ok) {
      return sendFailure(res, result.error, result.message);
    }
    res.json(result.value);
  });

  // Play a library item on the player
  router.get('/:playerId/play_media/:mediaType/:mediaId/:queueOpt?', async (req, res) => {
    const { playerId, mediaId } = req.params;
    const mediaType = mediaTypeFromString(req.params.mediaType);
    if (!mediaType) {
      return res.status(400).json({ error: `Unknown media type: ${req.params.mediaType}` });
    }

    const queueOpt = req.params.queueOpt ?? 'play';
    if (!isQueueOption(queueOpt)) {
      return res.status(400).json({ error: `Unknown queue option: ${queueOpt}` });
    }
    const option: QueueOption = queueOpt;

    const queryResult = ProviderQuerySchema.safeParse(req.query);
    const provider = queryResult.success ? queryResult.data.provider : undefined;

    try {
      const item = await library.item(mediaId, mediaType, provider);
      if (!item) {
        return res.status(404).json({ error: 'Media item not found' });
      }
      res.json(await playMedia(players, playerId, item, option));
    } catch (error) {
      if (error instanceof UnknownPlayerError) {
        return res.status(404).json({ error: 'Player not found' });
      }
      console.error('Error playing media:', error);
      res.status(500).json({
        error: 'Failed to play media',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return router;
}
