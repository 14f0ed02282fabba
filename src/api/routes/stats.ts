import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';

export async function registerStatsRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/stats', async () => opts.studio.stats());
}
