/**
 * Player and library record shapes exchanged over the REST and socket APIs.
 *
 * Keys are snake_case on the wire so that existing control surfaces keep
 * working against the gateway without a translation layer.
 */

export type PlayerState = 'off' | 'stopped' | 'playing' | 'paused';

export interface PlayerSummary {
  player_id: string;
  name: string;
  state: PlayerState;
  powered: boolean;
  volume_level: number;
  muted: boolean;
  cur_queue_index: number;
}

export interface QueueItem {
  queue_item_id: string;
  item_id: string;
  name: string;
  media_type: MediaType;
  duration: number;
}

/** How a play_media request is merged into the player's queue. */
export type QueueOption = 'play' | 'replace' | 'next' | 'add';

export const QUEUE_OPTIONS: readonly QueueOption[] = ['play', 'replace', 'next', 'add'];

export function isQueueOption(value: string): value is QueueOption {
  return (QUEUE_OPTIONS as readonly string[]).includes(value);
}

export type MediaType = 'artists' | 'albums' | 'tracks' | 'playlists' | 'radios';

export const MEDIA_TYPES: readonly MediaType[] = [
  'artists',
  'albums',
  'tracks',
  'playlists',
  'radios',
];

/**
 * Resolve a media type from its URL segment. Accepts the singular form as
 * well (`track` -> `tracks`).
 */
export function mediaTypeFromString(value: string): MediaType | undefined {
  const normalized = value.toLowerCase();
  const plural = normalized.endsWith('s') ? normalized : `${normalized}s`;
  return MEDIA_TYPES.find((type) => type === plural);
}

export interface MediaItem {
  item_id: string;
  provider: string;
  media_type: MediaType;
  name: string;
  duration?: number;
  /** Parent references, e.g. the album of a track or the artist of an album. */
  artist_id?: string;
  album_id?: string;
  playlist_id?: string;
  /** Popularity rank used for artist top tracks; lower is more popular. */
  rank?: number;
  in_library: boolean;
  metadata?: Record<string, unknown>;
}

export type SearchResult = Partial<Record<MediaType, MediaItem[]>>;
