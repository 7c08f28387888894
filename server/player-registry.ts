import type { MediaItem, PlayerSummary, QueueItem, QueueOption } from '@shared/player-types';
import type { CapabilityTarget } from './capabilities';
import type { TargetLookup } from './command-dispatcher';

/**
 * A player as seen by the gateway: a capability target plus the read-only
 * views the REST API serves. Playback itself lives behind `capabilities`.
 */
export interface Player extends CapabilityTarget {
  summary(): PlayerSummary;
  queueItems(): readonly QueueItem[];
  playMedia(items: readonly MediaItem[], option: QueueOption): Promise<unknown>;
}

export interface PlayerRegistry extends TargetLookup {
  getPlayer(playerId: string): Promise<Player | undefined>;
  /** All players, in no particular order. */
  listPlayers(): Promise<Player[]>;
}

export class UnknownPlayerError extends Error {
  readonly playerId: string;

  constructor(playerId: string) {
    super(`Unknown player: ${playerId}`);
    this.name = 'UnknownPlayerError';
    this.playerId = playerId;
  }
}

/** Player summaries sorted by name, as served to clients. */
export async function listPlayersByName(registry: PlayerRegistry): Promise<PlayerSummary[]> {
  const players = await registry.listPlayers();
  return players
    .map((player) => player.summary())
    .sort((a, b) => a.name.localeCompare(b.name));
}

export async function playMedia(
  registry: PlayerRegistry,
  playerId: string,
  item: MediaItem,
  option: QueueOption
): Promise<unknown> {
  const player = await registry.getPlayer(playerId);
  if (!player) {
    throw new UnknownPlayerError(playerId);
  }
  return player.playMedia([item], option);
}

export class MemPlayerRegistry implements PlayerRegistry {
  private players: Map<string, Player>;

  constructor(players: Iterable<Player> = []) {
    this.players = new Map();
    for (const player of players) {
      this.add(player);
    }
  }

  add(player: Player): void {
    this.players.set(player.id, player);
  }

  async getPlayer(playerId: string): Promise<Player | undefined> {
    return this.players.get(playerId);
  }

  async listPlayers(): Promise<Player[]> {
    return Array.from(this.players.values());
  }
}
