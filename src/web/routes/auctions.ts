import type { FastifyInstance } from 'fastify';
import { executeAuctionListCore, executeAuctionAnalysisCore } from '../../core/auction-engine.js';
import { parseAnalysisQuery, parseAuctionsQuery } from '../serialization.js';
import type { AuctionSources } from '../../core/types.js';

export function registerAuctionRoutes(server: FastifyInstance, sources: AuctionSources) {
  server.get('/api/auctions', async (request, reply) => {
    const parsed = parseAuctionsQuery(request.query);
    if (!parsed.ok) {
      return reply.status(400).send(parsed.body);
    }
    return reply.send(await executeAuctionListCore(sources, parsed.params));
  });

  server.get('/api/analysis', async (request, reply) => {
    const parsed = parseAnalysisQuery(request.query);
    if (!parsed.ok) {
      return reply.status(400).send(parsed.body);
    }
    return reply.send(await executeAuctionAnalysisCore(sources, parsed.params));
  });
}
