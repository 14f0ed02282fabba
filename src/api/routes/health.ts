import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';
import { API_VERSION } from '../types.js';

export async function registerHealthRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get('/v1/health', async () => {
    const { studio } = opts;
    return {
      status: 'ok',
      version: API_VERSION,
      worker: studio.running,
      providers: studio.factory.describe(),
      circuits: studio.breaker.snapshot(),
    };
  });
}
