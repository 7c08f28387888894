/**
 * Library API Routes
 *
 * Thin delegation to the music library. Mounted under /api after the player
 * and config routers, since `/:mediaType` would otherwise shadow them.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { MEDIA_TYPES, mediaTypeFromString, type MediaType } from '@shared/player-types';
import { ItemNotFoundError, UnsupportedActionError, type MusicLibrary } from './music-library';

const provider = z.string().min(1).optional();

const SearchQuerySchema = z.object({
  query: z.string().min(1),
  media_types: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(5),
});

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  orderby: z.enum(['name', 'duration']).default('name'),
  provider,
});

const PageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  provider,
});

const ProviderQuerySchema = z.object({ provider });

/**
 * Parse `req.query` or answer 400. Returns null when a response was sent.
 */
function parseQuery<T extends z.ZodTypeAny>(
  schema: T,
  req: Request,
  res: Response
): z.infer<T> | null {
  const queryResult = schema.safeParse(req.query);
  if (!queryResult.success) {
    res.status(400).json({
      error: 'Invalid query parameters',
      message: queryResult.error.errors
        .map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`)
        .join('; '),
    });
    return null;
  }
  return queryResult.data;
}

function parseMediaType(value: string, res: Response): MediaType | null {
  const mediaType = mediaTypeFromString(value);
  if (!mediaType) {
    res.status(400).json({ error: `Unknown media type: ${value}` });
    return null;
  }
  return mediaType;
}

/**
 * Media types named in a `media_types` filter such as "artists,tracks".
 * No filter means every type.
 */
export function selectMediaTypes(filter: string | undefined): MediaType[] {
  if (!filter) return [...MEDIA_TYPES];
  return MEDIA_TYPES.filter((type) => filter.includes(type));
}

export function createLibraryRouter(library: MusicLibrary): Router {
  const router = Router();

  const fail = (res: Response, what: string, error: unknown) => {
    console.error(`Error fetching ${what}:`, error);
    res.status(500).json({ error: `Failed to fetch ${what}` });
  };

  router.get('/search', async (req, res) => {
    const query = parseQuery(SearchQuerySchema, req, res);
    if (!query) return;
    try {
      res.json(await library.search(query.query, selectMediaTypes(query.media_types), query.limit));
    } catch (error) {
      fail(res, 'search results', error);
    }
  });

  router.get('/playlists/:playlistId/tracks', async (req, res) => {
    const query = parseQuery(PageQuerySchema, req, res);
    if (!query) return;
    try {
      res.json(
        await library.playlistTracks(req.params.playlistId, query.provider, query.offset, query.limit)
      );
    } catch (error) {
      fail(res, 'playlist tracks', error);
    }
  });

  router.get('/artists/:artistId/toptracks', async (req, res) => {
    const query = parseQuery(ProviderQuerySchema, req, res);
    if (!query) return;
    try {
      res.json(await library.artistTopTracks(req.params.artistId, query.provider));
    } catch (error) {
      fail(res, 'artist top tracks', error);
    }
  });

  router.get('/artists/:artistId/albums', async (req, res) => {
    const query = parseQuery(ProviderQuerySchema, req, res);
    if (!query) return;
    try {
      res.json(await library.artistAlbums(req.params.artistId, query.provider));
    } catch (error) {
      fail(res, 'artist albums', error);
    }
  });

  router.get('/albums/:albumId/tracks', async (req, res) => {
    const query = parseQuery(ProviderQuerySchema, req, res);
    if (!query) return;
    try {
      res.json(await library.albumTracks(req.params.albumId, query.provider));
    } catch (error) {
      fail(res, 'album tracks', error);
    }
  });

  // Library listing for one media type
  router.get('/:mediaType', async (req, res) => {
    const mediaType = parseMediaType(req.params.mediaType, res);
    if (!mediaType) return;
    const query = parseQuery(ListQuerySchema, req, res);
    if (!query) return;
    try {
      res.json(
        await library.libraryItems(mediaType, {
          limit: query.limit,
          offset: query.offset,
          orderBy: query.orderby,
          provider: query.provider,
        })
      );
    } catch (error) {
      fail(res, 'library items', error);
    }
  });

  // Item details, or an item action such as library_add
  router.get('/:mediaType/:mediaId/:action?', async (req, res) => {
    const mediaType = parseMediaType(req.params.mediaType, res);
    if (!mediaType) return;
    const query = parseQuery(ProviderQuerySchema, req, res);
    if (!query) return;
    const { mediaId, action } = req.params;

    try {
      if (action) {
        res.json(await library.itemAction(mediaId, mediaType, query.provider, action));
        return;
      }
      const item = await library.item(mediaId, mediaType, query.provider);
      if (!item) {
        res.status(404).json({ error: 'Media item not found' });
        return;
      }
      res.json(item);
    } catch (error) {
      if (error instanceof ItemNotFoundError) {
        res.status(404).json({ error: 'Media item not found' });
        return;
      }
      if (error instanceof UnsupportedActionError) {
        res.status(400).json({ error: error.message });
        return;
      }
      fail(res, 'media item', error);
    }
  });

  return router;
}
