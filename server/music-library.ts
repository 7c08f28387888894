/**
 * Music Library
 *
 * The catalog is an external collaborator: the gateway only queries it and
 * serializes what comes back. `MemMusicLibrary` keeps records in memory so
 * the gateway can run standalone (and in demo mode).
 */

import type { MediaItem, MediaType, SearchResult } from '@shared/player-types';

export type LibraryOrder = 'name' | 'duration';

export interface LibraryQuery {
  limit: number;
  offset: number;
  orderBy: LibraryOrder;
  provider?: string;
}

export interface MusicLibrary {
  libraryItems(mediaType: MediaType, query: LibraryQuery): Promise<MediaItem[]>;
  item(itemId: string, mediaType: MediaType, provider?: string): Promise<MediaItem | undefined>;
  /** Run a named action on an item, e.g. `library_add`. */
  itemAction(
    itemId: string,
    mediaType: MediaType,
    provider: string | undefined,
    action: string
  ): Promise<unknown>;
  artistTopTracks(artistId: string, provider?: string): Promise<MediaItem[]>;
  artistAlbums(artistId: string, provider?: string): Promise<MediaItem[]>;
  albumTracks(albumId: string, provider?: string): Promise<MediaItem[]>;
  playlistTracks(
    playlistId: string,
    provider: string | undefined,
    offset: number,
    limit: number
  ): Promise<MediaItem[]>;
  /** Case-insensitive name search, at most `limit` results per media type. */
  search(query: string, mediaTypes: readonly MediaType[], limit: number): Promise<SearchResult>;
}

export class UnsupportedActionError extends Error {
  constructor(action: string) {
    super(`Unsupported item action: ${action}`);
    this.name = 'UnsupportedActionError';
  }
}

export class ItemNotFoundError extends Error {
  constructor(mediaType: MediaType, itemId: string) {
    super(`No ${mediaType} with id ${itemId}`);
    this.name = 'ItemNotFoundError';
  }
}

const TOP_TRACKS_LIMIT = 10;

function compareBy(order: LibraryOrder): (a: MediaItem, b: MediaItem) => number {
  return (a, b) => {
    if (order === 'duration') {
      const delta = (a.duration ?? 0) - (b.duration ?? 0);
      if (delta !== 0) return delta;
    }
    return a.name.localeCompare(b.name);
  };
}

export class MemMusicLibrary implements MusicLibrary {
  private items: Map<string, MediaItem>;

  constructor(items: Iterable<MediaItem> = []) {
    this.items = new Map();
    for (const item of items) {
      this.add(item);
    }
  }

  add(item: MediaItem): void {
    this.items.set(this.key(item.media_type, item.item_id), item);
  }

  async libraryItems(mediaType: MediaType, query: LibraryQuery): Promise<MediaItem[]> {
    return this.select(mediaType, query.provider, (item) => item.in_library)
      .sort(compareBy(query.orderBy))
      .slice(query.offset, query.offset + query.limit);
  }

  async item(itemId: string, mediaType: MediaType, provider?: string): Promise<MediaItem | undefined> {
    const item = this.items.get(this.key(mediaType, itemId));
    if (!item || (provider && item.provider !== provider)) {
      return undefined;
    }
    return item;
  }

  async itemAction(
    itemId: string,
    mediaType: MediaType,
    provider: string | undefined,
    action: string
  ): Promise<unknown> {
    const item = await this.item(itemId, mediaType, provider);
    if (!item) {
      throw new ItemNotFoundError(mediaType, itemId);
    }

    switch (action) {
      case 'library_add':
        this.add({ ...item, in_library: true });
        return true;
      case 'library_remove':
        this.add({ ...item, in_library: false });
        return true;
      default:
        throw new UnsupportedActionError(action);
    }
  }

  async artistTopTracks(artistId: string, provider?: string): Promise<MediaItem[]> {
    return this.select('tracks', provider, (item) => item.artist_id === artistId)
      .sort((a, b) => (a.rank ?? Number.MAX_SAFE_INTEGER) - (b.rank ?? Number.MAX_SAFE_INTEGER))
      .slice(0, TOP_TRACKS_LIMIT);
  }

  async artistAlbums(artistId: string, provider?: string): Promise<MediaItem[]> {
    return this.select('albums', provider, (item) => item.artist_id === artistId).sort(
      compareBy('name')
    );
  }

  async albumTracks(albumId: string, provider?: string): Promise<MediaItem[]> {
    return this.select('tracks', provider, (item) => item.album_id === albumId);
  }

  async playlistTracks(
    playlistId: string,
    provider: string | undefined,
    offset: number,
    limit: number
  ): Promise<MediaItem[]> {
    return this.select('tracks', provider, (item) => item.playlist_id === playlistId).slice(
      offset,
      offset + limit
    );
  }

  async search(query: string, mediaTypes: readonly MediaType[], limit: number): Promise<SearchResult> {
    const needle = query.trim().toLowerCase();
    const result: SearchResult = {};
    for (const mediaType of mediaTypes) {
      result[mediaType] = this.select(mediaType, undefined, (item) =>
        item.name.toLowerCase().includes(needle)
      )
        .sort(compareBy('name'))
        .slice(0, limit);
    }
    return result;
  }

  private select(
    mediaType: MediaType,
    provider: string | undefined,
    predicate: (item: MediaItem) => boolean
  ): MediaItem[] {
    return Array.from(this.items.values()).filter(
      (item) =>
        item.media_type === mediaType && (!provider || item.provider === provider) && predicate(item)
    );
  }

  private key(mediaType: MediaType, itemId: string): string {
    return `${mediaType}:${itemId}`;
  }
}
