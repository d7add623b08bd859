import { FastifyInstance } from 'fastify';
import { createSseTransport } from '../lib/sse.js';
import { toSnapshotMessage } from '../engine/streaming/snapshot.js';

export async function realtimeRoutes(fastify: FastifyInstance): Promise<void> {
  const { sessions, publisher } = fastify.licenseCore;

  // GET /api/realtime/stream — SSE feed, one frame per published snapshot
  fastify.get('/api/realtime/stream', async (request, reply) => {
    const initial = publisher.latest() ?? (await publisher.compose());

    reply.hijack();
    const transport = createSseTransport(reply.raw, reply.getHeaders());
    const session = sessions.subscribe(transport, initial);
    request.log.debug({ sessionId: session.id }, 'realtime stream attached');
    return reply;
  });

  // GET /api/realtime/snapshot — one snapshot, composed on demand
  fastify.get('/api/realtime/snapshot', async (_request, reply) => {
    const snapshot = await publisher.compose();
    return reply.code(200).send(toSnapshotMessage(snapshot));
  });

  // GET /api/realtime/sessions — live sessions and publisher counters
  fastify.get('/api/realtime/sessions', async (_request, reply) => {
    return reply.code(200).send({
      sessions: sessions.list(),
      publisher: publisher.stats(),
    });
  });
}
