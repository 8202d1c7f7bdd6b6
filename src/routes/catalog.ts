import { FastifyInstance } from 'fastify';
import { isMediaKind, toItemId } from '../utils/item.js';
import { errorMessage } from '../utils/errors.js';
import type { CatalogBrowser } from '../catalog/base.js';
import type { QueueManager } from '../services/queue-manager.js';

export interface CatalogRoutesOptions {
  manager: QueueManager;
  catalog: CatalogBrowser;
}

const PROVIDER_UNAVAILABLE = { error: 'Catalog provider unavailable' };

/**
 * Catalog listings, each downloadable entry flagged as queued and/or downloaded
 */
export async function catalogRoutes(fastify: FastifyInstance, options: CatalogRoutesOptions): Promise<void> {
  const { manager, catalog } = options;

  fastify.get('/api/categories', async (_request, reply) => {
    try {
      return reply.send(await catalog.getCategories());
    } catch (error) {
      console.error(`[API] Categories unavailable: ${errorMessage(error)}`);
      return reply.status(502).send(PROVIDER_UNAVAILABLE);
    }
  });

  // ?category=<kind>:<id>, e.g. movie:12 or series:7
  fastify.get<{ Querystring: { category?: string } }>('/api/streams', async (request, reply) => {
    const [kind, categoryId] = (request.query.category ?? '').split(':');
    if (!kind || !categoryId || !isMediaKind(kind)) {
      return reply.status(400).send({ error: 'category must look like "movie:<id>" or "series:<id>"' });
    }

    try {
      const streams = await catalog.getStreams(kind, categoryId);
      if (kind === 'series') {
        // Shows, not episodes: nothing to flag at this level
        return reply.send(streams);
      }

      const annotated = [];
      for (const stream of streams) {
        const itemId = toItemId('movie', stream.id);
        annotated.push({
          ...stream,
          itemId,
          queued: manager.isQueued(itemId),
          downloaded: await manager.checkDownloaded(itemId, { kind: 'movie', name: stream.name }),
        });
      }
      return reply.send(annotated);
    } catch (error) {
      console.error(`[API] Streams of ${request.query.category} unavailable: ${errorMessage(error)}`);
      return reply.status(502).send(PROVIDER_UNAVAILABLE);
    }
  });

  fastify.get<{ Params: { seriesId: string } }>('/api/series/:seriesId/episodes', async (request, reply) => {
    try {
      const episodes = await catalog.getSeriesEpisodes(request.params.seriesId);
      const annotated = [];
      for (const episode of episodes) {
        const itemId = toItemId('series', episode.id);
        annotated.push({
          ...episode,
          itemId,
          queued: manager.isQueued(itemId),
          downloaded: await manager.checkDownloaded(itemId, {
            kind: 'episode',
            seriesName: episode.seriesName,
            season: episode.season,
            episode: episode.episode,
          }),
        });
      }
      return reply.send(annotated);
    } catch (error) {
      console.error(`[API] Episodes of series ${request.params.seriesId} unavailable: ${errorMessage(error)}`);
      return reply.status(502).send(PROVIDER_UNAVAILABLE);
    }
  });
}
