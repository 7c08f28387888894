/**
 * Demo fixtures: players and library records read from demo/*.json so the
 * gateway has something to control without a real backend.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { MediaItem } from '@shared/player-types';
import { DemoPlayer, type EventPublisher } from './demo-player';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// server/demo-data.ts -> ../demo
export const DEMO_DIR = path.resolve(__dirname, '..', 'demo');

const DemoPlayerSchema = z.object({
  player_id: z.string().min(1),
  name: z.string().min(1),
  powered: z.boolean().optional(),
  volume_level: z.number().int().min(0).max(100).optional(),
});

const MediaItemSchema = z.object({
  item_id: z.string().min(1),
  provider: z.string().min(1),
  media_type: z.enum(['artists', 'albums', 'tracks', 'playlists', 'radios']),
  name: z.string().min(1),
  duration: z.number().nonnegative().optional(),
  artist_id: z.string().optional(),
  album_id: z.string().optional(),
  playlist_id: z.string().optional(),
  rank: z.number().int().positive().optional(),
  in_library: z.boolean().default(true),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export interface DemoData {
  players: DemoPlayer[];
  items: MediaItem[];
}

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf8'));
}

/**
 * Load demo players and library items from `dir`.
 *
 * @throws ZodError when a fixture does not match its schema
 */
export function loadDemoData(publish: EventPublisher, dir: string = DEMO_DIR): DemoData {
  const players = z
    .array(DemoPlayerSchema)
    .parse(readJson(path.join(dir, 'players.json')))
    .map(
      (entry) =>
        new DemoPlayer(entry.player_id, entry.name, publish, {
          powered: entry.powered,
          volumeLevel: entry.volume_level,
        })
    );

  const items: MediaItem[] = z.array(MediaItemSchema).parse(readJson(path.join(dir, 'library.json')));

  return { players, items };
}
