import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { Studio } from '../runtime/studio.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { registerErrorHandler } from './errors.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerJobRoutes } from './routes/jobs.js';
import { registerApprovalRoutes } from './routes/approvals.js';
import { registerChannelRoutes } from './routes/channels.js';
import { registerStatsRoutes } from './routes/stats.js';

export interface ServerOptions {
  studio: Studio;
  host?: string;
  port?: number;
}

export async function createServer(opts: ServerOptions) {
  const { studio } = opts;
  const { api } = studio.options.config;
  const host = opts.host ?? process.env['SHORTSMITH_API_HOST'] ?? api.host;
  const port = opts.port ?? parseInt(process.env['SHORTSMITH_API_PORT'] ?? String(api.port), 10);

  const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
  if (!isLoopback) {
    logger.warn('Non-loopback bind requested. The API has no authentication.', { host });
  }

  const fastify = Fastify({
    logger: false,
    trustProxy: false,
  });

  await fastify.register(cors, {
    origin: api.allowed_origins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: true,
  });

  // Per-route limits opt in through `config.rateLimit`
  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
  });

  fastify.addHook('onSend', async (_req, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Content-Security-Policy', "default-src 'none'");
    reply.header('Referrer-Policy', 'no-referrer');
  });

  registerErrorHandler(fastify);

  const routeOpts = { studio };
  await registerHealthRoutes(fastify, routeOpts);
  await registerJobRoutes(fastify, routeOpts);
  await registerApprovalRoutes(fastify, routeOpts);
  await registerChannelRoutes(fastify, routeOpts);
  await registerStatsRoutes(fastify, routeOpts);

  return { fastify, host, port };
}

export interface StartServerOptions {
  cwd?: string;
  host?: string;
  port?: number;
  /** Also run the job worker in this process. */
  worker?: boolean;
}

export async function startServer(opts: StartServerOptions = {}): Promise<void> {
  const studio = Studio.open(opts.cwd);
  const { fastify, host, port } = await createServer({ studio, host: opts.host, port: opts.port });

  if (opts.worker) {
    studio.recover();
    studio.start();
  }

  const shutdown = () => {
    Promise.all([fastify.close(), studio.stop()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await fastify.listen({ host, port });
    logger.info('Shortsmith API listening', { host, port, url: `http://${host}:${port}/v1`, worker: Boolean(opts.worker) });
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    await studio.stop();
    process.exit(1);
  }
}
