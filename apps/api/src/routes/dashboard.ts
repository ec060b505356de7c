import type { ApiErrorBody } from '@flakelens/shared';
import { SESSION_HEADER, filterQuerySchema } from '@flakelens/shared';
import { FastifyInstance, FastifyRequest } from 'fastify';

import { DashboardSession } from '../services/dashboard-session.js';

import { resolveRequest } from './selection.js';

function sessionFor(fastify: FastifyInstance, request: FastifyRequest): DashboardSession {
  const header = request.headers[SESSION_HEADER];
  const sessionId = typeof header === 'string' ? header.trim() : '';
  const { sessions, current, settings } = fastify.analytics;

  // Without a session id every request stands alone
  return sessionId === '' ? new DashboardSession(current, settings) : sessions.get(sessionId);
}

export async function dashboardRoutes(fastify: FastifyInstance) {
  fastify.get('/', async (request, reply) => {
    const query = filterQuerySchema.parse(request.query);
    const outcome = await sessionFor(fastify, request).select(query);

    switch (outcome.status) {
      case 'ok':
        return reply.send({
          success: true,
          data: outcome.view,
          stale: outcome.stale,
        });
      case 'rejected': {
        const body: ApiErrorBody = {
          statusCode: 400,
          error: 'Validation Error',
          message: outcome.error.message,
          details: {
            field: outcome.error.field,
            lastValidSelection: outcome.lastValidSelection,
          },
        };
        return reply.status(400).send(body);
      }
      case 'superseded': {
        const body: ApiErrorBody = {
          statusCode: 409,
          error: 'Conflict',
          message: 'Superseded by a newer request in the same session',
        };
        return reply.status(409).send(body);
      }
    }
  });

  fastify.get('/filters', async (request, reply) => {
    const { selection, options, stale } = await resolveRequest(fastify, request.query);

    return reply.send({
      success: true,
      data: { selection, options },
      stale,
    });
  });

  fastify.post('/refresh', async (_request, reply) => {
    const { source, snapshots } = fastify.analytics;
    const { snapshot, warning } = await snapshots.refresh(source);

    return reply.send({
      success: true,
      data: {
        sourceId: snapshot.sourceId,
        loadedAt: snapshot.loadedAt.toISOString(),
        events: snapshot.events.length,
        horizon: snapshot.horizon,
      },
      stale: warning,
    });
  });
}
