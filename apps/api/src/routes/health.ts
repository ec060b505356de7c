import { FastifyInstance } from 'fastify';

export async function healthRoutes(fastify: FastifyInstance) {
  // Liveness plus the state of the cached snapshot, if one has been loaded
  fastify.get('/', async (_request, reply) => {
    const { source, snapshots } = fastify.analytics;
    const snapshot = snapshots.peek(source.id);

    return reply.send({
      status: 'ok' as const,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      snapshot: snapshot
        ? {
            sourceId: snapshot.sourceId,
            loadedAt: snapshot.loadedAt.toISOString(),
            events: snapshot.events.length,
            ageSeconds: snapshots.ageSeconds(snapshot),
          }
        : null,
    });
  });

  fastify.get('/live', async (_request, reply) => {
    return reply.send({
      alive: true,
      uptime: process.uptime(),
    });
  });
}
