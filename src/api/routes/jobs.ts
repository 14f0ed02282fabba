import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';
import { JobListQuerySchema, SubmitJobSchema } from '../../shared/schemas.js';

export async function registerJobRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { studio } = opts;

  fastify.get('/v1/jobs', async (req) => {
    const query = JobListQuerySchema.parse(req.query);
    const jobs = studio.store.listJobs({
      status: query.status,
      channel: query.channel,
      limit: query.limit,
    });
    return { jobs, limit: query.limit };
  });

  fastify.get<{ Params: { id: string } }>('/v1/jobs/:id', async (req) => {
    return studio.status(req.params.id);
  });

  fastify.post(
    '/v1/jobs',
    { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } },
    async (req, reply) => {
      const body = SubmitJobSchema.parse(req.body ?? {});
      const job = studio.submit(body);
      return reply.status(202).send({ job });
    },
  );

  fastify.post<{ Params: { id: string } }>('/v1/jobs/:id/cancel', async (req) => {
    const result = await studio.cancel(req.params.id, 'cancelled via API');
    return result.status === 'signalled'
      ? { status: 'cancelling' }
      : { status: 'cancelled', job: result.job };
  });
}
