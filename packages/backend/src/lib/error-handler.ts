import type { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  HierarchyError,
  TransientStoreError,
} from './errors.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const response: ErrorResponse = {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    };

    if (error instanceof ZodError) {
      response.error = 'Validation Error';
      response.message = 'Request validation failed';
      response.statusCode = 400;
      response.details = error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    if (error instanceof NotFoundError) {
      response.error = 'Not Found';
      response.message = error.message;
      response.statusCode = 404;
      return reply.status(404).send(response);
    }

    // HierarchyError is a ValidationError; its details carry the violation kind.
    if (error instanceof ValidationError) {
      response.error = error instanceof HierarchyError ? 'Hierarchy Violation' : 'Validation Error';
      response.message = error.message;
      response.statusCode = 400;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(400).send(response);
    }

    if (error instanceof TransientStoreError) {
      request.log.warn({ err: error }, 'Store unavailable');
      response.error = 'Service Unavailable';
      response.message = `${error.message}. Retry the request.`;
      response.statusCode = 503;
      return reply.status(503).header('retry-after', '1').send(response);
    }

    // Handle Fastify errors (e.g., malformed JSON bodies)
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      response.statusCode = error.statusCode;
      response.message = error.message;
      if (error.statusCode === 400) {
        response.error = 'Bad Request';
      } else if (error.statusCode === 404) {
        response.error = 'Not Found';
      } else if (error.statusCode === 415) {
        response.error = 'Unsupported Media Type';
      }
      return reply.status(error.statusCode).send(response);
    }

    // Log unexpected errors
    request.log.error(error);

    return reply.status(500).send(response);
  });
}
