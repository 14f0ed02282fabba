import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';
import { ApprovalDecisionSchema, ApprovalListQuerySchema } from '../../shared/schemas.js';

export async function registerApprovalRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { studio } = opts;

  fastify.get('/v1/approvals', async (req) => {
    const query = ApprovalListQuerySchema.parse(req.query);
    return { approvals: studio.approvals.list(query) };
  });

  fastify.post<{ Params: { jobId: string } }>(
    '/v1/approvals/:jobId/decide',
    { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } },
    async (req) => {
      const body = ApprovalDecisionSchema.parse(req.body ?? {});
      const job = await studio.resolveApproval(req.params.jobId, body.decision, body.reason, body.actor ?? 'api');
      return { job };
    },
  );
}
