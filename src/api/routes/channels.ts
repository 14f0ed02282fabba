import type { FastifyInstance } from 'fastify';
import type { RouteOpts } from '../types.js';
import { ChannelInputSchema } from '../../shared/schemas.js';
import { channelFromInput } from '../../state/channels.js';
import { NotFoundError } from '../../shared/errors.js';

export async function registerChannelRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  const { store } = opts.studio;

  fastify.get('/v1/channels', async () => {
    return { channels: store.listChannels() };
  });

  fastify.get<{ Params: { name: string } }>('/v1/channels/:name', async (req) => {
    const channel = store.loadChannel(req.params.name);
    if (!channel) throw new NotFoundError(`Channel ${req.params.name} not found`);
    return channel;
  });

  fastify.post('/v1/channels', async (req, reply) => {
    const input = ChannelInputSchema.parse(req.body ?? {});
    const existing = store.loadChannel(input.name);
    const channel = channelFromInput(input, existing);
    store.saveChannel(channel);
    return reply.status(existing ? 200 : 201).send(channel);
  });

  fastify.delete<{ Params: { name: string } }>('/v1/channels/:name', async (req, reply) => {
    store.deleteChannel(req.params.name);
    return reply.status(204).send();
  });
}
