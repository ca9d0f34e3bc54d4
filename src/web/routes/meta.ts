import type { FastifyInstance } from 'fastify';
import { getMethodology } from '../../processing/methodology.js';
import type { ResponseCache } from '../../core/cache.js';

export function registerMetaRoutes(server: FastifyInstance, cache: ResponseCache) {
  server.get('/api/methodology', async () => {
    return getMethodology();
  });

  server.get('/api/cache-stats', async () => {
    return cache.stats();
  });
}
