import { FastifyInstance } from 'fastify';
import { catalogRoutes } from './catalog.js';
import { queueRoutes } from './queue.js';
import type { CatalogBrowser } from '../catalog/base.js';
import type { QueueManager } from '../services/queue-manager.js';

export interface RouteDeps {
  manager: QueueManager;
  catalog: CatalogBrowser;
}

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDeps): Promise<void> {
  await fastify.register(catalogRoutes, deps);
  await fastify.register(queueRoutes, { manager: deps.manager });
}
