import { FastifyInstance, FastifyReply } from 'fastify';

import { buildGroupedFailureTable, computeWeeklyInsights } from '../analytics/index.js';
import { failuresToCsv, insightsToCsv, toTrendExportRows } from '../services/export-service.js';

import { resolveRequest } from './selection.js';

function sendCsv(reply: FastifyReply, filename: string, body: string) {
  return reply
    .header('content-type', 'text/csv; charset=utf-8')
    .header('content-disposition', `attachment; filename="${filename}"`)
    .send(body);
}

export async function exportRoutes(fastify: FastifyInstance) {
  fastify.get('/failures.csv', async (request, reply) => {
    const { events } = await resolveRequest(fastify, request.query);
    return sendCsv(reply, 'failures.csv', failuresToCsv(buildGroupedFailureTable(events)));
  });

  fastify.get('/trend.csv', async (request, reply) => {
    const { events } = await resolveRequest(fastify, request.query);
    return sendCsv(reply, 'trend.csv', insightsToCsv(computeWeeklyInsights(events)));
  });

  fastify.get('/trend.json', async (request, reply) => {
    const { events, stale } = await resolveRequest(fastify, request.query);
    return reply.send({
      success: true,
      data: toTrendExportRows(computeWeeklyInsights(events)),
      stale,
    });
  });
}
