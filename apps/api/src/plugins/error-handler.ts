import type { ApiErrorBody } from '@flakelens/shared';
import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';

import { ConfigurationError, ValidationError } from '../analytics/errors.js';
import { logger } from '../utils/logger.js';

async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      const body: ApiErrorBody = {
        statusCode: 400,
        error: 'Validation Error',
        message: 'Request validation failed',
        details: error.errors,
      };
      return reply.status(400).send(body);
    }

    if (error instanceof ValidationError) {
      const body: ApiErrorBody = {
        statusCode: 400,
        error: 'Validation Error',
        message: error.message,
        details: { field: error.field, ...error.details },
      };
      return reply.status(400).send(body);
    }

    if (error.validation) {
      const body: ApiErrorBody = {
        statusCode: 400,
        error: 'Validation Error',
        message: error.message,
      };
      return reply.status(400).send(body);
    }

    if (error instanceof ConfigurationError) {
      const configError: ConfigurationError = error;
      logger.error({ err: error, details: configError.details }, 'Analytics data source misconfigured');
      const body: ApiErrorBody = {
        statusCode: 500,
        error: 'Configuration Error',
        message: error.message,
      };
      return reply.status(500).send(body);
    }

    logger.error({
      err: error,
      request: {
        method: request.method,
        url: request.url,
        query: request.query,
      },
    }, 'Request error');

    const statusCode = error.statusCode ?? 500;
    const body: ApiErrorBody = {
      statusCode,
      error: statusCode >= 500 ? 'Internal Server Error' : error.name,
      message: statusCode >= 500 ? 'An unexpected error occurred' : error.message,
    };
    return reply.status(statusCode).send(body);
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
});
