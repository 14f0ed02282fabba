import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { CapacityExceededError, InvalidStateError, NotFoundError } from '../shared/errors.js';
import { formatZodError } from '../shared/schemas.js';
import { logger } from '../shared/logger.js';

function statusFor(err: FastifyError | Error): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof ZodError) return 400;
  if (err instanceof CapacityExceededError) return 429;
  if (err instanceof InvalidStateError) return 409;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return 500;
}

/** Map domain errors to HTTP statuses with a `{ error }` body. */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((err, req, reply) => {
    const status = statusFor(err);
    if (status >= 500) {
      logger.error('Request failed', { method: req.method, url: req.url, error: err.message });
      return reply.status(status).send({ error: 'Internal server error' });
    }
    const message = err instanceof ZodError ? `Invalid request: ${formatZodError(err)}` : err.message;
    return reply.status(status).send({ error: message });
  });
}
