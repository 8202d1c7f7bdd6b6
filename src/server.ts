import Fastify, { FastifyInstance } from 'fastify';
import fastifyFormbody from '@fastify/formbody';
import { registerRoutes, type RouteDeps } from './routes/index.js';

export async function buildServer(deps: RouteDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  // Plain HTML forms post url-encoded bodies
  await fastify.register(fastifyFormbody);

  await registerRoutes(fastify, deps);

  fastify.get('/health', async (_request, reply) => {
    return reply.send({ status: 'ok' });
  });

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ error: 'Not found' });
  });

  return fastify;
}
