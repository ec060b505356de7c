import { FastifyInstance } from 'fastify';

import { computeWeeklyInsights } from '../analytics/index.js';

import { resolveRequest } from './selection.js';

export async function alertRoutes(fastify: FastifyInstance) {
  // Evaluate the latest week under the requested filters and notify on a breach
  fastify.post('/evaluate', async (request, reply) => {
    const { events, stale } = await resolveRequest(fastify, request.query);
    const dispatch = await fastify.analytics.alerting.run(computeWeeklyInsights(events));

    return reply.send({
      success: true,
      data: dispatch,
      stale,
    });
  });
}
