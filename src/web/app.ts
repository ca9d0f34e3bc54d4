import Fastify, { type FastifyInstance } from 'fastify';
import { registerAuctionRoutes } from './routes/auctions.js';
import { registerMetaRoutes } from './routes/meta.js';
import type { LiveSources } from '../core/sources.js';

/** Fastify app with every API route registered; not yet listening. */
export function buildApp(sources: LiveSources): FastifyInstance {
  const server = Fastify({ logger: false });

  registerAuctionRoutes(server, sources);
  registerMetaRoutes(server, sources.cache);

  // Global error handler
  server.setErrorHandler((error: Error, _request, reply) => {
    console.error('Server error:', error.message);
    return reply.status(500).send({ error: { type: 'internal', message: 'Internal server error' } });
  });

  return server;
}
