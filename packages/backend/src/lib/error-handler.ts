import { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  CapacityExceededError,
  UnknownBorrowError,
  PoolInactiveError,
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
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    // No seat right now; the caller may retry
    if (error instanceof CapacityExceededError) {
      response.error = 'Unavailable';
      response.message = error.message;
      response.statusCode = 409;
      response.details = {
        tool: error.poolName,
        reason: error.reason,
        retryable: error.retryable,
      };
      return reply.status(409).send(response);
    }

    if (error instanceof UnknownBorrowError) {
      response.error = 'Unknown Borrow';
      response.message = error.message;
      response.statusCode = 404;
      return reply.status(404).send(response);
    }

    if (error instanceof NotFoundError) {
      response.error = 'Not Found';
      response.message = error.message;
      response.statusCode = 404;
      return reply.status(404).send(response);
    }

    if (error instanceof ValidationError) {
      response.error = 'Validation Error';
      response.message = error.message;
      response.statusCode = 400;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(400).send(response);
    }

    if (error instanceof PoolInactiveError) {
      response.error = 'Pool Inactive';
      response.message = error.message;
      response.statusCode = 409;
      response.details = { tool: error.poolName };
      return reply.status(409).send(response);
    }

    // Fastify errors (malformed JSON bodies, unknown content types, ...)
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

    request.log.error(error);

    return reply.status(500).send(response);
  });
}
