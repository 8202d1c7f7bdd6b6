import { FastifyInstance, FastifyReply } from 'fastify';
import { isCatalogId, isMediaKind, parseItemId } from '../utils/item.js';
import { errorMessage } from '../utils/errors.js';
import { asRecord, readInt, readString, readStringList } from './params.js';
import type { QueueManager } from '../services/queue-manager.js';
import type { EnqueueRequest, EnqueueResult } from '../types/download.js';

export interface QueueRoutesOptions {
  manager: QueueManager;
}

function parseEnqueueBody(raw: unknown): EnqueueRequest | string {
  const body = asRecord(raw);
  const kind = readString(body, 'kind');
  const catalogId = readString(body, 'catalogId');

  if (!kind || !isMediaKind(kind)) return 'kind must be "movie" or "series"';
  if (!catalogId) return 'catalogId is required';
  if (!isCatalogId(catalogId)) return 'catalogId may only contain letters, digits, "_", "." and "-"';

  const request: EnqueueRequest = {
    kind,
    catalogId,
    extension: readString(body, 'extension') ?? 'mp4',
    title: readString(body, 'title') ?? '',
  };

  const seriesName = readString(body, 'seriesName');
  const season = readInt(body, 'season');
  const episode = readInt(body, 'episode');
  if (kind === 'series' && seriesName && season !== null && episode !== null) {
    request.episode = { seriesName, season, episode };
  }
  return request;
}

function sendEnqueueResult(reply: FastifyReply, result: EnqueueResult) {
  switch (result.status) {
    case 'queued':
      return reply.status(201).send(result);
    case 'already-queued':
    case 'already-downloaded':
      return reply.status(409).send(result);
  }
}

export async function queueRoutes(fastify: FastifyInstance, options: QueueRoutesOptions): Promise<void> {
  const { manager } = options;

  // Pending jobs, in processing order
  fastify.get('/api/queue', async () => {
    return manager.listQueue();
  });

  fastify.post<{ Body: unknown }>('/api/queue', async (request, reply) => {
    const parsed = parseEnqueueBody(request.body);
    if (typeof parsed === 'string') {
      return reply.status(400).send({ error: parsed });
    }
    return sendEnqueueResult(reply, await manager.enqueue(parsed));
  });

  fastify.delete('/api/queue', async () => {
    return { cleared: manager.clearQueue() };
  });

  fastify.delete<{ Params: { jobId: string } }>('/api/queue/:jobId', async (request, reply) => {
    const result = manager.removeJob(request.params.jobId);
    if (result === 'not-found') {
      return reply.status(404).send({ status: result });
    }
    return reply.send({ status: result });
  });

  fastify.post<{ Body: unknown }>('/api/queue/reorder', async (request) => {
    manager.reorder(readStringList(asRecord(request.body), 'jobIds'));
    return manager.listQueue();
  });

  fastify.post('/api/queue/pause', async () => {
    manager.pause();
    return manager.currentProgress();
  });

  fastify.post('/api/queue/resume', async () => {
    manager.resume();
    return manager.currentProgress();
  });

  fastify.post('/api/queue/stop', async () => {
    manager.stop();
    return manager.currentProgress();
  });

  fastify.get('/api/status', async () => {
    return manager.currentProgress();
  });

  fastify.post<{ Params: { seriesId: string } }>('/api/series/:seriesId/queue', async (request, reply) => {
    try {
      const added = await manager.enqueueSeries(request.params.seriesId);
      return reply.send({ added });
    } catch (error) {
      console.error(`[API] Series ${request.params.seriesId} could not be queued: ${errorMessage(error)}`);
      return reply.status(502).send({ error: 'Catalog provider unavailable' });
    }
  });

  // ==================== Downloaded items ====================

  fastify.get<{ Params: { itemId: string } }>('/api/items/:itemId', async (request, reply) => {
    const { itemId } = request.params;
    if (!parseItemId(itemId)) {
      return reply.status(400).send({ error: 'Invalid item id' });
    }
    return reply.send({
      itemId,
      queued: manager.isQueued(itemId),
      downloaded: manager.isDownloaded(itemId),
    });
  });

  fastify.post<{ Body: unknown }>('/api/downloaded', async (request, reply) => {
    const body = asRecord(request.body);
    const itemId = readString(body, 'itemId');
    const filename = readString(body, 'filename');
    if (!itemId || !parseItemId(itemId) || !filename) {
      return reply.status(400).send({ error: 'itemId and filename are required' });
    }

    const success = await manager.markDownloaded(itemId, filename, readString(body, 'filepath') ?? undefined);
    return reply.status(success ? 200 : 500).send({ success });
  });

  fastify.delete<{ Params: { itemId: string } }>('/api/downloaded/:itemId', async (request, reply) => {
    const result = await manager.unmarkDownloaded(request.params.itemId);
    switch (result) {
      case 'removed':
        return reply.send({ status: result });
      case 'not-found':
        return reply.status(404).send({ status: result });
      case 'save-failed':
        return reply.status(500).send({ status: result });
    }
  });

  fastify.post('/api/scan', async () => {
    return { count: await manager.scanFiles() };
  });
}
